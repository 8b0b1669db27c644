/**
 * Game Processor
 *
 * Applies one finished game to the season's ratings. A game moves from scheduled to
 * processed exactly once; everything that changes (both ratings, both records, the
 * deltas on the game, the prediction evaluation) is committed in one transaction.
 *
 * Ratings are path-dependent, so each team's games must be applied in schedule order.
 * A game that precedes the latest processed game of either team is rejected.
 */

import { EngineConfig, getEngineConfig } from '../config/engine-config';
import {
  InvalidGameError,
  OutOfOrderProcessingError,
  RatingEngineError,
} from '../errors';
import { AccuracyEvaluator, GameEvaluation } from '../predictions/accuracy-evaluator';
import { TeamRatingStore, compareSchedulePosition, getTeamPair } from '../store/TeamRatingStore';
import { Game, Team } from '../types';
import { createLogger } from '../utils/logger';
import { applyHomeField, computeRatingChange } from './elo';

const log = createLogger('game-processor');

export interface ProcessResult {
  gameId: string;
  winnerId: string;
  loserId: string;
  homeDelta: number;
  awayDelta: number;
  winnerExpected: number;
  movMultiplier: number;
  tierMultiplier: number;
  evaluation: GameEvaluation | null;
}

export interface BatchFailure {
  gameId: string;
  error: RatingEngineError;
}

export interface BatchResult {
  processed: ProcessResult[];
  /** First game that was rejected; processing stops there */
  failure: BatchFailure | null;
}

interface CompletedGame {
  game: Game;
  homeScore: number;
  awayScore: number;
  home: Team;
  away: Team;
}

export class GameProcessor {
  constructor(
    private readonly store: TeamRatingStore,
    private readonly evaluator: AccuracyEvaluator,
    private readonly config: EngineConfig = getEngineConfig()
  ) {}

  /**
   * Process one completed game. The game is re-read inside the transaction, so a
   * stale copy held by the caller cannot be processed twice.
   */
  async process(game: Game | string): Promise<ProcessResult> {
    const gameId = typeof game === 'string' ? game : game.id;

    return this.store.transaction(async (tx) => {
      const checked = await this.validate(tx, gameId);
      await this.assertChronological(tx, checked.game);

      const { game: current, homeScore, awayScore, home, away } = checked;
      const elo = this.config.elo;
      const adjusted = applyHomeField(home.rating, away.rating, current.neutralSite, elo.home_field_advantage);
      const homeWon = homeScore > awayScore;

      const change = computeRatingChange(
        {
          winnerRating: homeWon ? adjusted.home : adjusted.away,
          loserRating: homeWon ? adjusted.away : adjusted.home,
          winnerTier: homeWon ? home.conference : away.conference,
          loserTier: homeWon ? away.conference : home.conference,
          pointDifferential: homeScore - awayScore,
        },
        elo
      );

      const homeDelta = homeWon ? change.delta : -change.delta;
      const awayDelta = -homeDelta;
      const winnerId = homeWon ? home.id : away.id;
      const loserId = homeWon ? away.id : home.id;

      await tx.commitGameResult({
        gameId: current.id,
        season: current.season,
        winnerId,
        loserId,
        homeTeamId: home.id,
        awayTeamId: away.id,
        homeDelta,
        awayDelta,
      });

      const evaluation = await this.evaluator.evaluate(
        { ...current, isProcessed: true, homeRatingDelta: homeDelta, awayRatingDelta: awayDelta },
        tx
      );

      log.debug(
        `${current.id}: ${winnerId} def. ${loserId} ${Math.max(homeScore, awayScore)}-${Math.min(homeScore, awayScore)}, ` +
          `delta ${change.delta.toFixed(2)} (exp ${change.winnerExpected.toFixed(3)}, mov ${change.movMultiplier.toFixed(2)}, tier ${change.tierMultiplier})`
      );

      return {
        gameId: current.id,
        winnerId,
        loserId,
        homeDelta,
        awayDelta,
        winnerExpected: change.winnerExpected,
        movMultiplier: change.movMultiplier,
        tierMultiplier: change.tierMultiplier,
        evaluation,
      };
    });
  }

  /**
   * Process every completed, unprocessed game of a season in schedule order.
   * Stops at the first rejected game; earlier games stay committed.
   */
  async processPending(season: number, throughWeek?: number): Promise<BatchResult> {
    const pending = await this.store.listGames({ season, processed: false, throughWeek });
    const ready = pending
      .filter(g => g.result.status === 'completed')
      .sort(compareSchedulePosition);

    const processed: ProcessResult[] = [];
    for (const game of ready) {
      try {
        processed.push(await this.process(game.id));
      } catch (error) {
        if (!(error instanceof RatingEngineError)) throw error;
        log.error(`Stopped at ${game.id} after ${processed.length} games: ${error.message}`);
        return { processed, failure: { gameId: game.id, error } };
      }
    }

    log.success(`Processed ${processed.length} games for ${season}${throughWeek !== undefined ? ` through week ${throughWeek}` : ''}`);
    return { processed, failure: null };
  }

  private async validate(tx: TeamRatingStore, gameId: string): Promise<CompletedGame> {
    const game = await tx.getGame(gameId);
    if (!game) {
      throw new InvalidGameError(gameId, 'unknown-game');
    }
    if (game.isProcessed) {
      throw new InvalidGameError(gameId, 'already-processed');
    }
    if (game.result.status !== 'completed') {
      throw new InvalidGameError(gameId, 'unplayed', 'no final score recorded');
    }
    if (game.homeTeamId === game.awayTeamId) {
      throw new InvalidGameError(gameId, 'same-team', game.homeTeamId);
    }

    const { min_week, max_week } = this.config.season;
    if (!Number.isInteger(game.week) || game.week < min_week || game.week > max_week) {
      throw new InvalidGameError(gameId, 'week-out-of-range', `week ${game.week} not in ${min_week}-${max_week}`);
    }

    const { homeScore, awayScore } = game.result;
    if (homeScore === awayScore) {
      throw new InvalidGameError(gameId, 'tied-score', `${homeScore}-${awayScore}`);
    }

    const { home, away } = await getTeamPair(tx, game.season, game.homeTeamId, game.awayTeamId);
    if (!home || !away) {
      const missing = [home ? null : game.homeTeamId, away ? null : game.awayTeamId].filter(Boolean).join(', ');
      throw new InvalidGameError(gameId, 'missing-team', `${missing} not seeded for ${game.season}`);
    }

    return { game, homeScore, awayScore, home, away };
  }

  private async assertChronological(tx: TeamRatingStore, game: Game): Promise<void> {
    const attempted = { week: game.week, gameDate: game.gameDate };

    for (const teamId of [game.homeTeamId, game.awayTeamId]) {
      const latest = await tx.latestProcessedGame(game.season, teamId);
      if (!latest) continue;

      const position = { week: latest.week, gameDate: latest.gameDate };
      if (compareSchedulePosition(attempted, position) < 0) {
        throw new OutOfOrderProcessingError(game.id, teamId, attempted, { ...position, gameId: latest.id });
      }
    }
  }
}
