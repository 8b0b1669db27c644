/**
 * TeamRatingStore
 *
 * Persistence boundary for the engine. Components never touch a database directly;
 * they receive a store (or the transaction-scoped store handed to `transaction`).
 *
 * Ownership rules enforced by the API shape:
 *  - Team.rating / wins / losses and Game.isProcessed / rating deltas change only through
 *    `commitGameResult`, which applies the whole game atomically.
 *  - Prediction.wasCorrect is written once through `recordEvaluation`.
 *  - Snapshots and reference rankings are append-only.
 */

import {
  Game,
  GameInput,
  Prediction,
  RankingSnapshot,
  ReferenceRankingEntry,
  Team,
} from '../types';

export interface GameFilter {
  season: number;
  week?: number;
  teamId?: string;
  processed?: boolean;
  throughWeek?: number;
}

export interface PredictionFilter {
  season: number;
  week?: number;
  teamId?: string;
  evaluatedOnly?: boolean;
}

export interface SnapshotFilter {
  season: number;
  week?: number;
  teamId?: string;
}

export interface TeamSeedUpdate {
  rating: number;
  initialRating: number;
}

/**
 * Everything that changes when one game is processed
 */
export interface GameResultCommit {
  gameId: string;
  season: number;
  winnerId: string;
  loserId: string;
  homeTeamId: string;
  awayTeamId: string;
  homeDelta: number;
  awayDelta: number;
}

export interface TeamRatingStore {
  // Teams
  getTeam(season: number, teamId: string): Promise<Team | null>;
  listTeams(season: number): Promise<Team[]>;
  /** Inserts a seeded team; returns false (and writes nothing) if it already exists */
  createTeam(team: Team): Promise<boolean>;
  /** Explicit preseason reset: overwrites seed and zeroes the record */
  replaceSeed(season: number, teamId: string, seed: TeamSeedUpdate): Promise<void>;

  // Games
  getGame(gameId: string): Promise<Game | null>;
  /** Inserts a fixture or updates an unprocessed one; a processed game is returned unchanged */
  saveGame(game: GameInput): Promise<Game>;
  listGames(filter: GameFilter): Promise<Game[]>;
  latestProcessedGame(season: number, teamId: string): Promise<Game | null>;
  commitGameResult(commit: GameResultCommit): Promise<void>;

  // Ranking snapshots
  hasSnapshot(season: number, week: number): Promise<boolean>;
  insertSnapshots(rows: RankingSnapshot[]): Promise<void>;
  listSnapshots(filter: SnapshotFilter): Promise<RankingSnapshot[]>;

  // Predictions
  getPrediction(gameId: string): Promise<Prediction | null>;
  /** Throws AlreadyPredictedError when the game already has a prediction */
  insertPrediction(prediction: Prediction): Promise<void>;
  listPredictions(filter: PredictionFilter): Promise<Prediction[]>;
  /** Sets wasCorrect if still null; returns false when it was already set */
  recordEvaluation(gameId: string, wasCorrect: boolean): Promise<boolean>;

  // Reference rankings
  saveReferenceRankings(entries: ReferenceRankingEntry[]): Promise<number>;
  getReferenceRank(season: number, week: number, teamId: string): Promise<number | null>;

  /**
   * Run `work` as one unit. If it throws, nothing it wrote is kept.
   * Calls made on the store passed to `work` join the same transaction.
   */
  transaction<T>(work: (store: TeamRatingStore) => Promise<T>): Promise<T>;
}

/**
 * Read both teams of a game in ascending id order. Stores that lock rows on read inside a
 * transaction then always lock the pair in the same order.
 */
export async function getTeamPair(
  store: TeamRatingStore,
  season: number,
  homeTeamId: string,
  awayTeamId: string
): Promise<{ home: Team | null; away: Team | null }> {
  const [firstId, secondId] = [homeTeamId, awayTeamId].sort();
  const first = await store.getTeam(season, firstId);
  const second = await store.getTeam(season, secondId);
  return firstId === homeTeamId ? { home: first, away: second } : { home: second, away: first };
}

/**
 * Chronological processing key: week first, then kickoff time. Games without a date
 * sort before dated games of the same week.
 */
export function compareSchedulePosition(
  a: { week: number; gameDate: Date | null; id?: string },
  b: { week: number; gameDate: Date | null; id?: string }
): number {
  if (a.week !== b.week) return a.week - b.week;
  const aTime = a.gameDate ? a.gameDate.getTime() : Number.NEGATIVE_INFINITY;
  const bTime = b.gameDate ? b.gameDate.getTime() : Number.NEGATIVE_INFINITY;
  if (aTime !== bTime) return aTime < bTime ? -1 : 1;
  if (a.id !== undefined && b.id !== undefined) return a.id.localeCompare(b.id);
  return 0;
}
