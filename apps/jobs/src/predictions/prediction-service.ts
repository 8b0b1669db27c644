/**
 * Prediction Service
 *
 * Pre-game picks from the current ratings. The win probability uses the same
 * expectation (including home-field advantage) as game processing. Both ratings are
 * frozen into the prediction when it is created.
 *
 * Score model:
 *   shift = (adjustedHome - adjustedAway) / 100 * points_per_100
 *   home  = round(base_score + shift), away = round(base_score - shift), clamped to [0, max_score]
 */

import { EngineConfig, getEngineConfig } from '../config/engine-config';
import { AlreadyPredictedError, InvalidGameError, RatingEngineError } from '../errors';
import { applyHomeField, expectedWinProbability } from '../ratings/elo';
import { TeamRatingStore, getTeamPair } from '../store/TeamRatingStore';
import { Game, Prediction, PredictionConfidence } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('predictions');

export interface MatchupForecast {
  homeWinProbability: number;
  predictedHomeScore: number;
  predictedAwayScore: number;
}

export interface SkippedPrediction {
  gameId: string;
  reason: string;
}

export interface WeekPredictions {
  created: Prediction[];
  skipped: SkippedPrediction[];
}

export function confidenceFor(winProbability: number, config: EngineConfig['prediction']): PredictionConfidence {
  if (winProbability >= config.confidence.high) return 'High';
  if (winProbability >= config.confidence.medium) return 'Medium';
  return 'Low';
}

export function forecastMatchup(
  homeRating: number,
  awayRating: number,
  neutralSite: boolean,
  config: EngineConfig
): MatchupForecast {
  const adjusted = applyHomeField(homeRating, awayRating, neutralSite, config.elo.home_field_advantage);
  const { base_score, points_per_100, max_score } = config.prediction;
  const shift = ((adjusted.home - adjusted.away) / 100) * points_per_100;
  const clampScore = (points: number) => Math.max(0, Math.min(max_score, Math.round(points)));

  return {
    homeWinProbability: expectedWinProbability(adjusted.home, adjusted.away, config.elo.rating_scale),
    predictedHomeScore: clampScore(base_score + shift),
    predictedAwayScore: clampScore(base_score - shift),
  };
}

export class PredictionService {
  constructor(
    private readonly store: TeamRatingStore,
    private readonly config: EngineConfig = getEngineConfig(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async predict(game: Game | string): Promise<Prediction> {
    const gameId = typeof game === 'string' ? game : game.id;

    return this.store.transaction(async (tx) => {
      const current = await tx.getGame(gameId);
      if (!current) {
        throw new InvalidGameError(gameId, 'unknown-game');
      }
      if (current.isProcessed) {
        throw new InvalidGameError(gameId, 'already-processed', 'predictions are only made before a game is processed');
      }
      if (await tx.getPrediction(gameId)) {
        throw new AlreadyPredictedError(gameId);
      }
      if (current.homeTeamId === current.awayTeamId) {
        throw new InvalidGameError(gameId, 'same-team', current.homeTeamId);
      }

      const { home, away } = await getTeamPair(tx, current.season, current.homeTeamId, current.awayTeamId);
      if (!home || !away) {
        const missing = [home ? null : current.homeTeamId, away ? null : current.awayTeamId].filter(Boolean).join(', ');
        throw new InvalidGameError(gameId, 'missing-team', `${missing} not seeded for ${current.season}`);
      }

      const forecast = forecastMatchup(home.rating, away.rating, current.neutralSite, this.config);
      const homeFavored = forecast.homeWinProbability > 0.5;
      const winProbability = homeFavored ? forecast.homeWinProbability : 1 - forecast.homeWinProbability;

      const prediction: Prediction = {
        gameId: current.id,
        season: current.season,
        week: current.week,
        homeTeamId: home.id,
        awayTeamId: away.id,
        predictedWinnerId: homeFavored ? home.id : away.id,
        predictedHomeScore: forecast.predictedHomeScore,
        predictedAwayScore: forecast.predictedAwayScore,
        winProbability,
        confidence: confidenceFor(winProbability, this.config.prediction),
        ratingsAtPrediction: Object.freeze({ home: home.rating, away: away.rating }),
        createdAt: this.now(),
        wasCorrect: null,
      };

      await tx.insertPrediction(prediction);
      return prediction;
    });
  }

  /**
   * Predict every unprocessed game of a week. Games that already have a prediction
   * are skipped, so the call can be repeated.
   */
  async predictWeek(season: number, week: number): Promise<WeekPredictions> {
    const games = await this.store.listGames({ season, week, processed: false });
    const result: WeekPredictions = { created: [], skipped: [] };

    for (const game of games) {
      try {
        result.created.push(await this.predict(game.id));
      } catch (error) {
        if (error instanceof AlreadyPredictedError) {
          result.skipped.push({ gameId: game.id, reason: 'already-predicted' });
          continue;
        }
        if (error instanceof RatingEngineError) {
          log.warn(`Skipping ${game.id}: ${error.message}`);
          result.skipped.push({ gameId: game.id, reason: error.code });
          continue;
        }
        throw error;
      }
    }

    log.info(`Week ${week} ${season}: ${result.created.length} predictions created, ${result.skipped.length} skipped`);
    return result;
  }

  async getPredictions(season: number, week?: number): Promise<Prediction[]> {
    return this.store.listPredictions({ season, week });
  }
}
