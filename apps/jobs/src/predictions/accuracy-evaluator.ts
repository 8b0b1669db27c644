/**
 * Accuracy Evaluator
 *
 * Grades stored predictions once their games are processed, and compares the engine's
 * picks against the pick implied by the reference poll for the same week:
 *   - the better-ranked team (lower number) is the pick
 *   - a ranked team is the pick over an unranked one
 *   - equal ranks or two unranked teams give no pick and are left out of the comparison
 *
 * `report` is read-only; it aggregates whatever has been graded so far.
 */

import { getMatchupClass, MatchupClass } from '../ratings/elo';
import { TeamRatingStore } from '../store/TeamRatingStore';
import { ConferenceTier, Game, Prediction, PredictionConfidence } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('accuracy');

export interface GameEvaluation {
  gameId: string;
  predictedWinnerId: string;
  actualWinnerId: string;
  wasCorrect: boolean;
  referencePickId: string | null;
  referenceCorrect: boolean | null;
}

export type ReportScope =
  | { kind: 'season' }
  | { kind: 'week'; week: number }
  | { kind: 'tier'; tier: ConferenceTier }
  | { kind: 'team'; teamId: string };

export interface AccuracyBucket {
  total: number;
  correct: number;
  accuracy: number;
}

export interface WeekAccuracy extends AccuracyBucket {
  week: number;
}

export interface MatchupAccuracy extends AccuracyBucket {
  matchup: MatchupClass;
}

export interface ConfidenceAccuracy extends AccuracyBucket {
  confidence: PredictionConfidence;
}

export interface Disagreement {
  gameId: string;
  week: number;
  homeTeamId: string;
  awayTeamId: string;
  enginePickId: string;
  referencePickId: string;
  actualWinnerId: string;
  engineCorrect: boolean;
  referenceCorrect: boolean;
}

export interface ReferenceWeek {
  week: number;
  games: number;
  engineAccuracy: number;
  referenceAccuracy: number;
}

export interface ReferenceComparison {
  gamesCompared: number;
  engineCorrect: number;
  referenceCorrect: number;
  bothCorrect: number;
  engineOnlyCorrect: number;
  referenceOnlyCorrect: number;
  bothWrong: number;
  engineAccuracy: number;
  referenceAccuracy: number;
  /** engineAccuracy - referenceAccuracy over the compared games */
  engineAdvantage: number;
  byWeek: ReferenceWeek[];
  disagreements: Disagreement[];
}

export interface TeamAccuracy {
  teamId: string;
  /** Games where the engine picked this team */
  asFavorite: AccuracyBucket;
  /** Games where the engine picked the opponent */
  asUnderdog: AccuracyBucket;
}

export interface AccuracyReport {
  season: number;
  scope: ReportScope;
  /** Stored predictions in scope, graded or not */
  totalPredictions: number;
  evaluated: number;
  correct: number;
  accuracy: number;
  byWeek: WeekAccuracy[];
  byMatchup: MatchupAccuracy[];
  byConfidence: ConfidenceAccuracy[];
  reference: ReferenceComparison;
  team: TeamAccuracy | null;
}

const MATCHUP_ORDER: MatchupClass[] = ['P5_P5', 'P5_G5', 'P5_FCS', 'G5_G5', 'G5_FCS', 'FCS_FCS'];
const CONFIDENCE_ORDER: PredictionConfidence[] = ['High', 'Medium', 'Low'];

const ratio = (correct: number, total: number): number => (total > 0 ? correct / total : 0);

class Tally {
  total = 0;
  correct = 0;

  add(wasCorrect: boolean): void {
    this.total++;
    if (wasCorrect) this.correct++;
  }

  toBucket(): AccuracyBucket {
    return { total: this.total, correct: this.correct, accuracy: ratio(this.correct, this.total) };
  }
}

/**
 * Winner of a completed, decided game; null for scheduled or tied games
 */
export function actualWinnerId(game: Game): string | null {
  if (game.result.status !== 'completed') return null;
  const { homeScore, awayScore } = game.result;
  if (homeScore === awayScore) return null;
  return homeScore > awayScore ? game.homeTeamId : game.awayTeamId;
}

/**
 * Pick implied by a poll: better rank wins, ranked beats unranked, otherwise no pick
 */
export function referencePick(
  homeTeamId: string,
  homeRank: number | null,
  awayTeamId: string,
  awayRank: number | null
): string | null {
  if (homeRank === null && awayRank === null) return null;
  if (homeRank === null) return awayTeamId;
  if (awayRank === null) return homeTeamId;
  if (homeRank < awayRank) return homeTeamId;
  if (awayRank < homeRank) return awayTeamId;
  return null;
}

export class AccuracyEvaluator {
  constructor(private readonly store: TeamRatingStore) {}

  /**
   * Grade the stored prediction for a processed game. Returns null when the game has
   * no prediction. A prediction that was already graded keeps its original grade.
   */
  async evaluate(game: Game, store: TeamRatingStore = this.store): Promise<GameEvaluation | null> {
    const winnerId = actualWinnerId(game);
    if (!game.isProcessed || winnerId === null) {
      return null;
    }

    const prediction = await store.getPrediction(game.id);
    if (!prediction) {
      log.debug(`No prediction stored for ${game.id}`);
      return null;
    }

    let wasCorrect = prediction.predictedWinnerId === winnerId;
    const recorded = await store.recordEvaluation(game.id, wasCorrect);
    if (!recorded && prediction.wasCorrect !== null) {
      log.warn(`Prediction for ${game.id} was already graded; keeping the stored result`);
      wasCorrect = prediction.wasCorrect;
    }

    const [homeRank, awayRank] = await Promise.all([
      store.getReferenceRank(game.season, game.week, game.homeTeamId),
      store.getReferenceRank(game.season, game.week, game.awayTeamId),
    ]);
    const referencePickId = referencePick(game.homeTeamId, homeRank, game.awayTeamId, awayRank);

    return {
      gameId: game.id,
      predictedWinnerId: prediction.predictedWinnerId,
      actualWinnerId: winnerId,
      wasCorrect,
      referencePickId,
      referenceCorrect: referencePickId === null ? null : referencePickId === winnerId,
    };
  }

  async report(season: number, scope: ReportScope = { kind: 'season' }): Promise<AccuracyReport> {
    const [predictions, processedGames, teams] = await Promise.all([
      this.store.listPredictions({ season }),
      this.store.listGames({ season, processed: true }),
      this.store.listTeams(season),
    ]);

    const tiers = new Map<string, ConferenceTier>(teams.map(t => [t.id, t.conference]));
    const gamesById = new Map(processedGames.map(g => [g.id, g]));
    const inScope = predictions.filter(p => this.matchesScope(p, scope, tiers));

    const overall = new Tally();
    const byWeek = new Map<number, Tally>();
    const byMatchup = new Map<MatchupClass, Tally>();
    const byConfidence = new Map<PredictionConfidence, Tally>();
    const asFavorite = new Tally();
    const asUnderdog = new Tally();
    const graded: Array<{ prediction: Prediction; game: Game }> = [];

    for (const prediction of inScope) {
      const wasCorrect = prediction.wasCorrect;
      if (wasCorrect === null) continue;

      overall.add(wasCorrect);
      tallyFor(byWeek, prediction.week).add(wasCorrect);
      tallyFor(byConfidence, prediction.confidence).add(wasCorrect);

      const homeTier = tiers.get(prediction.homeTeamId);
      const awayTier = tiers.get(prediction.awayTeamId);
      if (homeTier && awayTier) {
        tallyFor(byMatchup, getMatchupClass(homeTier, awayTier)).add(wasCorrect);
      }

      if (scope.kind === 'team') {
        const tally = prediction.predictedWinnerId === scope.teamId ? asFavorite : asUnderdog;
        tally.add(wasCorrect);
      }

      const game = gamesById.get(prediction.gameId);
      if (game) graded.push({ prediction, game });
    }

    const totals = overall.toBucket();
    return {
      season,
      scope,
      totalPredictions: inScope.length,
      evaluated: totals.total,
      correct: totals.correct,
      accuracy: totals.accuracy,
      byWeek: [...byWeek.entries()]
        .sort(([a], [b]) => a - b)
        .map(([week, tally]) => ({ week, ...tally.toBucket() })),
      byMatchup: MATCHUP_ORDER.flatMap(matchup => {
        const tally = byMatchup.get(matchup);
        return tally ? [{ matchup, ...tally.toBucket() }] : [];
      }),
      byConfidence: CONFIDENCE_ORDER.flatMap(confidence => {
        const tally = byConfidence.get(confidence);
        return tally ? [{ confidence, ...tally.toBucket() }] : [];
      }),
      reference: await this.compareWithReference(graded),
      team:
        scope.kind === 'team'
          ? { teamId: scope.teamId, asFavorite: asFavorite.toBucket(), asUnderdog: asUnderdog.toBucket() }
          : null,
    };
  }

  private matchesScope(prediction: Prediction, scope: ReportScope, tiers: Map<string, ConferenceTier>): boolean {
    switch (scope.kind) {
      case 'season':
        return true;
      case 'week':
        return prediction.week === scope.week;
      case 'tier':
        return tiers.get(prediction.homeTeamId) === scope.tier || tiers.get(prediction.awayTeamId) === scope.tier;
      case 'team':
        return prediction.homeTeamId === scope.teamId || prediction.awayTeamId === scope.teamId;
    }
  }

  private async compareWithReference(
    graded: Array<{ prediction: Prediction; game: Game }>
  ): Promise<ReferenceComparison> {
    let engineCorrect = 0;
    let referenceCorrect = 0;
    let bothCorrect = 0;
    let engineOnlyCorrect = 0;
    let referenceOnlyCorrect = 0;
    let bothWrong = 0;
    const weeks = new Map<number, { games: number; engine: number; reference: number }>();
    const disagreements: Disagreement[] = [];

    for (const { prediction, game } of graded) {
      const winnerId = actualWinnerId(game);
      if (winnerId === null) continue;

      const [homeRank, awayRank] = await Promise.all([
        this.store.getReferenceRank(game.season, game.week, game.homeTeamId),
        this.store.getReferenceRank(game.season, game.week, game.awayTeamId),
      ]);
      const pick = referencePick(game.homeTeamId, homeRank, game.awayTeamId, awayRank);
      if (pick === null) continue;

      const engineRight = prediction.predictedWinnerId === winnerId;
      const referenceRight = pick === winnerId;
      if (engineRight) engineCorrect++;
      if (referenceRight) referenceCorrect++;
      if (engineRight && referenceRight) bothCorrect++;
      else if (engineRight) engineOnlyCorrect++;
      else if (referenceRight) referenceOnlyCorrect++;
      else bothWrong++;

      const week = weeks.get(game.week) ?? { games: 0, engine: 0, reference: 0 };
      week.games++;
      if (engineRight) week.engine++;
      if (referenceRight) week.reference++;
      weeks.set(game.week, week);

      if (prediction.predictedWinnerId !== pick) {
        disagreements.push({
          gameId: game.id,
          week: game.week,
          homeTeamId: game.homeTeamId,
          awayTeamId: game.awayTeamId,
          enginePickId: prediction.predictedWinnerId,
          referencePickId: pick,
          actualWinnerId: winnerId,
          engineCorrect: engineRight,
          referenceCorrect: referenceRight,
        });
      }
    }

    const gamesCompared = bothCorrect + engineOnlyCorrect + referenceOnlyCorrect + bothWrong;
    const engineAccuracy = ratio(engineCorrect, gamesCompared);
    const referenceAccuracy = ratio(referenceCorrect, gamesCompared);

    return {
      gamesCompared,
      engineCorrect,
      referenceCorrect,
      bothCorrect,
      engineOnlyCorrect,
      referenceOnlyCorrect,
      bothWrong,
      engineAccuracy,
      referenceAccuracy,
      engineAdvantage: engineAccuracy - referenceAccuracy,
      byWeek: [...weeks.entries()]
        .sort(([a], [b]) => a - b)
        .map(([week, w]) => ({
          week,
          games: w.games,
          engineAccuracy: ratio(w.engine, w.games),
          referenceAccuracy: ratio(w.reference, w.games),
        })),
      disagreements,
    };
  }
}

function tallyFor<K>(tallies: Map<K, Tally>, key: K): Tally {
  let tally = tallies.get(key);
  if (!tally) {
    tally = new Tally();
    tallies.set(key, tally);
  }
  return tally;
}
