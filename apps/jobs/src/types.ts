/**
 * Rating Engine Domain Types
 *
 * Records exchanged between the engine, its store and the import adapters.
 * Team ids are slugs (e.g. 'ohio-state'); a team record is scoped to one season.
 */

/**
 * Competitive classification: P5 = top tier, G5 = mid tier, FCS = sub-division
 */
export type ConferenceTier = 'P5' | 'G5' | 'FCS';

export const CONFERENCE_TIERS: readonly ConferenceTier[] = ['P5', 'G5', 'FCS'];

/**
 * Preseason talent signals. Any of them may be unknown at seed time.
 */
export interface PreseasonSignals {
  recruitingRank: number | null;
  transferRank: number | null;
  /** Share of last season's production that returns, 0-1 */
  returningProduction: number | null;
}

export interface Team extends PreseasonSignals {
  id: string;
  season: number;
  name: string;
  conference: ConferenceTier;
  conferenceName: string | null;
  rating: number;
  initialRating: number;
  wins: number;
  losses: number;
}

/**
 * Normalized team record as supplied by the import collaborator (not yet seeded)
 */
export interface TeamSeedInput extends Partial<PreseasonSignals> {
  id: string;
  season: number;
  name: string;
  conference: ConferenceTier;
  conferenceName?: string | null;
}

/**
 * Whether a fixture has been played. A completed 0-0 is a real result;
 * a scheduled game carries no scores at all.
 */
export type GameResult =
  | { status: 'scheduled' }
  | { status: 'completed'; homeScore: number; awayScore: number };

export interface Game {
  id: string;
  season: number;
  week: number;
  gameDate: Date | null;
  homeTeamId: string;
  awayTeamId: string;
  neutralSite: boolean;
  result: GameResult;
  isProcessed: boolean;
  homeRatingDelta: number;
  awayRatingDelta: number;
}

/**
 * Fixture or result as supplied by the import collaborator
 */
export type GameInput = Omit<Game, 'isProcessed' | 'homeRatingDelta' | 'awayRatingDelta'>;

export interface RankingSnapshot {
  teamId: string;
  season: number;
  week: number;
  rank: number;
  rating: number;
  wins: number;
  losses: number;
  sos: number;
  sosRank: number;
  createdAt: Date;
}

export type PredictionConfidence = 'High' | 'Medium' | 'Low';

/**
 * Ratings captured when a prediction was made. Never a live reference to Team.
 */
export type RatingsAtPrediction = Readonly<{ home: number; away: number }>;

export interface Prediction {
  gameId: string;
  season: number;
  week: number;
  homeTeamId: string;
  awayTeamId: string;
  predictedWinnerId: string;
  predictedHomeScore: number;
  predictedAwayScore: number;
  /** Probability that the predicted winner wins (always >= 0.5) */
  winProbability: number;
  confidence: PredictionConfidence;
  ratingsAtPrediction: RatingsAtPrediction;
  createdAt: Date;
  wasCorrect: boolean | null;
}

export interface ReferenceRankingEntry {
  season: number;
  week: number;
  teamId: string;
  rank: number;
  pollName: string;
}
