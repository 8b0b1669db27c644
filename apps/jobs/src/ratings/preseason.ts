/**
 * Preseason Rating Initializer
 *
 * Seeds each team's starting rating from three talent signals:
 * - recruiting class rank: weight * e^(-(rank - 1) / decay), so the top classes dominate
 * - transfer portal rank: same shape, smaller weight
 * - returning production: linear around the midpoint (0.5), negative below it
 *
 * The sum is offset from the league baseline (sub-division teams start lower) and clamped to
 * baseline ± clamp_band so no seed can distort early-season predictions.
 * Unknown inputs fall back to neutral values (worst-rank sentinel, midpoint production).
 */

import { EngineConfig, getEngineConfig } from '../config/engine-config';
import { MissingPreseasonDataError, PreseasonField, SeasonAlreadyStartedError } from '../errors';
import { TeamRatingStore } from '../store/TeamRatingStore';
import { ConferenceTier, PreseasonSignals, Team, TeamSeedInput } from '../types';
import { createLogger } from '../utils/logger';

type PreseasonConfig = EngineConfig['preseason'];

const log = createLogger('preseason');

export interface SeedBreakdown {
  baseline: number;
  tierOffset: number;
  recruitingBonus: number;
  transferBonus: number;
  productionAdjustment: number;
  seed: number;
  missing: PreseasonField[];
}

function isUsableRank(rank: number | null | undefined): rank is number {
  return typeof rank === 'number' && Number.isFinite(rank) && rank > 0;
}

// Above this a value is read as a percentage; a fraction slightly over 1 is clamped instead
const PERCENTAGE_THRESHOLD = 1.5;

/**
 * Accepts 0-1 fractions or 0-100 percentages, clamped to [0, 1]
 */
export function normalizeReturningProduction(value: number): number {
  const fraction = value > PERCENTAGE_THRESHOLD ? value / 100 : value;
  return Math.max(0, Math.min(1, fraction));
}

export function rankBonus(rank: number, weight: number, decay: number): number {
  return weight * Math.exp(-(Math.max(1, rank) - 1) / decay);
}

/**
 * Pure seed computation; reports which inputs were replaced by neutral defaults
 */
export function computePreseasonSeed(
  tier: ConferenceTier,
  signals: Partial<PreseasonSignals>,
  config: PreseasonConfig
): SeedBreakdown {
  const missing: PreseasonField[] = [];

  let recruitingRank = config.unknown_rank;
  if (isUsableRank(signals.recruitingRank)) {
    recruitingRank = signals.recruitingRank;
  } else {
    missing.push('recruitingRank');
  }

  let transferRank = config.unknown_rank;
  if (isUsableRank(signals.transferRank)) {
    transferRank = signals.transferRank;
  } else {
    missing.push('transferRank');
  }

  let production = config.returning_production.midpoint;
  const rawProduction = signals.returningProduction;
  if (typeof rawProduction === 'number' && Number.isFinite(rawProduction) && rawProduction >= 0) {
    production = normalizeReturningProduction(rawProduction);
  } else {
    missing.push('returningProduction');
  }

  const baseline = config.baseline;
  const tierOffset = config.tier_offsets[tier];
  const recruitingBonus = rankBonus(recruitingRank, config.recruiting.weight, config.recruiting.decay);
  const transferBonus = rankBonus(transferRank, config.transfer.weight, config.transfer.decay);
  const productionAdjustment =
    config.returning_production.weight * (production - config.returning_production.midpoint);

  const raw = baseline + tierOffset + recruitingBonus + transferBonus + productionAdjustment;
  const seed = Math.max(baseline - config.clamp_band, Math.min(baseline + config.clamp_band, raw));

  return { baseline, tierOffset, recruitingBonus, transferBonus, productionAdjustment, seed, missing };
}

export interface SeedResult {
  team: Team;
  /** false when the team was already seeded and left untouched */
  created: boolean;
  warning: MissingPreseasonDataError | null;
}

export interface SeedSummary {
  created: number;
  skipped: number;
  warnings: MissingPreseasonDataError[];
}

export class PreseasonInitializer {
  constructor(
    private readonly store: TeamRatingStore,
    private readonly config: EngineConfig = getEngineConfig()
  ) {}

  /**
   * Seed rating for one team. Missing inputs are logged as data-quality warnings.
   */
  initialize(
    team: Pick<TeamSeedInput, 'id' | 'season' | 'conference'>,
    recruitingRank: number | null | undefined,
    transferSignal: number | null | undefined,
    returningProductionFraction: number | null | undefined
  ): number {
    return this.evaluate(team, {
      recruitingRank,
      transferRank: transferSignal,
      returningProduction: returningProductionFraction,
    }).seed;
  }

  /**
   * Create the team with rating = initialRating = seed. Re-seeding an existing team is a no-op.
   */
  async seedTeam(input: TeamSeedInput, store: TeamRatingStore = this.store): Promise<SeedResult> {
    const existing = await store.getTeam(input.season, input.id);
    if (existing) {
      log.debug(`${input.id} already seeded for ${input.season} (${existing.initialRating.toFixed(1)}), skipping`);
      return { team: existing, created: false, warning: null };
    }

    const { seed, warning } = this.evaluate(input, input);
    const team: Team = {
      id: input.id,
      season: input.season,
      name: input.name,
      conference: input.conference,
      conferenceName: input.conferenceName ?? null,
      recruitingRank: input.recruitingRank ?? null,
      transferRank: input.transferRank ?? null,
      returningProduction: input.returningProduction ?? null,
      rating: seed,
      initialRating: seed,
      wins: 0,
      losses: 0,
    };

    const created = await store.createTeam(team);
    if (!created) {
      const raced = await store.getTeam(input.season, input.id);
      if (raced) return { team: raced, created: false, warning: null };
    }
    return { team, created, warning };
  }

  /**
   * Seed every team of a season in one transaction. Records tagged with another season are skipped.
   */
  async seedSeason(season: number, inputs: TeamSeedInput[]): Promise<SeedSummary> {
    return this.store.transaction(async (tx) => {
      const summary: SeedSummary = { created: 0, skipped: 0, warnings: [] };
      for (const input of inputs) {
        if (input.season !== season) {
          log.warn(`Ignoring ${input.id}: record is for ${input.season}, seeding ${season}`);
          summary.skipped++;
          continue;
        }
        const result = await this.seedTeam(input, tx);
        if (result.created) summary.created++;
        else summary.skipped++;
        if (result.warning) summary.warnings.push(result.warning);
      }
      log.info(`Seeded ${summary.created} teams for ${season} (${summary.skipped} already seeded, ${summary.warnings.length} with missing data)`);
      return summary;
    });
  }

  /**
   * Explicit reset: recompute every seed for the season and zero the records.
   * Refused once any game of the season has been processed.
   */
  async resetSeason(season: number): Promise<number> {
    return this.store.transaction(async (tx) => {
      const processed = await tx.listGames({ season, processed: true });
      if (processed.length > 0) {
        throw new SeasonAlreadyStartedError(season);
      }

      const teams = await tx.listTeams(season);
      for (const team of teams) {
        const { seed } = this.evaluate(team, team);
        await tx.replaceSeed(season, team.id, { rating: seed, initialRating: seed });
      }
      log.info(`Reset preseason ratings for ${teams.length} teams in ${season}`);
      return teams.length;
    });
  }

  private evaluate(
    team: Pick<TeamSeedInput, 'id' | 'season' | 'conference'>,
    signals: Partial<PreseasonSignals>
  ): { seed: number; warning: MissingPreseasonDataError | null } {
    const breakdown = computePreseasonSeed(team.conference, signals, this.config.preseason);
    if (breakdown.missing.length === 0) {
      return { seed: breakdown.seed, warning: null };
    }

    const warning = new MissingPreseasonDataError(team.id, team.season, breakdown.missing);
    log.warn(warning.message);
    return { seed: breakdown.seed, warning };
  }
}
