/**
 * Elo rating math shared by game processing and predictions.
 *
 * Ratings are on the classic Elo scale (baseline 1500). Home-field advantage is
 * applied in rating points to the home side before any expectation is computed.
 */

import { ConferenceTier } from '../types';
import { EngineConfig } from '../config/engine-config';

type EloConfig = EngineConfig['elo'];

export interface AdjustedRatings {
  home: number;
  away: number;
}

/**
 * Expected win probability of a team rated `own` against `opponent`
 */
export function expectedWinProbability(own: number, opponent: number, ratingScale: number): number {
  return 1 / (1 + Math.pow(10, (opponent - own) / ratingScale));
}

/**
 * Add home-field advantage to the home rating unless the game is at a neutral site
 */
export function applyHomeField(
  homeRating: number,
  awayRating: number,
  neutralSite: boolean,
  homeFieldAdvantage: number
): AdjustedRatings {
  return {
    home: homeRating + (neutralSite ? 0 : homeFieldAdvantage),
    away: awayRating,
  };
}

/**
 * Margin-of-victory multiplier.
 *
 * Grows with ln(margin + 1) up to `max_mov_multiplier`, then is damped by the winner's
 * pre-game rating edge: a heavy favourite winning gains less, an underdog winning gains more.
 * The gap is floored at -1000 so the damping term stays finite.
 */
export function movMultiplier(pointDifferential: number, winnerRatingGap: number, config: EloConfig): number {
  const margin = Math.abs(pointDifferential);
  if (margin === 0) return 1;

  const base = Math.min(Math.log(margin + 1), config.max_mov_multiplier);
  const gap = Math.max(winnerRatingGap, -1000);
  const damping = config.mov_gap_damping / (gap * 0.001 + config.mov_gap_damping);
  return base * damping;
}

/**
 * Scales the rating swing for cross-tier games. Wins over a lower tier count for less,
 * upsets of a higher tier count for more. Same-tier games are 1.0.
 */
export function tierMultiplier(winner: ConferenceTier, loser: ConferenceTier, config: EloConfig): number {
  const m = config.tier_multipliers;
  if (winner === loser) return 1;

  switch (winner) {
    case 'P5':
      return loser === 'G5' ? m.P5_G5 : m.P5_FCS;
    case 'G5':
      return loser === 'P5' ? m.G5_P5 : m.G5_FCS;
    case 'FCS':
      return loser === 'P5' ? m.FCS_P5 : m.FCS_G5;
  }
}

export type MatchupClass = 'P5_P5' | 'P5_G5' | 'P5_FCS' | 'G5_G5' | 'G5_FCS' | 'FCS_FCS';

const TIER_ORDER: Record<ConferenceTier, number> = { P5: 0, G5: 1, FCS: 2 };

/**
 * Order-independent matchup class, higher tier first (G5 vs P5 -> P5_G5)
 */
export function getMatchupClass(a: ConferenceTier, b: ConferenceTier): MatchupClass {
  const [high, low] = TIER_ORDER[a] <= TIER_ORDER[b] ? [a, b] : [b, a];
  switch (`${high}_${low}`) {
    case 'P5_P5':
      return 'P5_P5';
    case 'P5_G5':
      return 'P5_G5';
    case 'P5_FCS':
      return 'P5_FCS';
    case 'G5_G5':
      return 'G5_G5';
    case 'G5_FCS':
      return 'G5_FCS';
    default:
      return 'FCS_FCS';
  }
}

export interface RatingChange {
  /** Points added to the winner; the loser receives the exact negation */
  delta: number;
  winnerExpected: number;
  movMultiplier: number;
  tierMultiplier: number;
}

export interface RatingChangeInput {
  winnerRating: number;
  loserRating: number;
  winnerTier: ConferenceTier;
  loserTier: ConferenceTier;
  pointDifferential: number;
}

/**
 * Zero-sum rating change for one game. Ratings passed in must already include
 * home-field advantage where it applies.
 */
export function computeRatingChange(input: RatingChangeInput, config: EloConfig): RatingChange {
  const winnerExpected = expectedWinProbability(input.winnerRating, input.loserRating, config.rating_scale);
  const mov = movMultiplier(input.pointDifferential, input.winnerRating - input.loserRating, config);
  const tier = tierMultiplier(input.winnerTier, input.loserTier, config);

  return {
    delta: config.k_factor * mov * tier * (1 - winnerExpected),
    winnerExpected,
    movMultiplier: mov,
    tierMultiplier: tier,
  };
}
