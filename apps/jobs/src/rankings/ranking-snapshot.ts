/**
 * Ranking Snapshot Service
 *
 * Orders a season's teams and writes the weekly ranking history.
 *
 * Order: rating desc, then SOS desc, then win percentage desc, then team id so the
 * result is fully deterministic. Snapshots are append-only: one row per team per week,
 * taken before any game of a later week is processed.
 */

import { EngineConfig, getEngineConfig } from '../config/engine-config';
import { SnapshotExistsError, SnapshotOutOfDateError } from '../errors';
import { rankScheduleStrength } from '../ratings/strength-of-schedule';
import { TeamRatingStore } from '../store/TeamRatingStore';
import { ConferenceTier, RankingSnapshot } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('rankings');

export interface RankingEntry {
  rank: number;
  teamId: string;
  name: string;
  conference: ConferenceTier;
  rating: number;
  wins: number;
  losses: number;
  sos: number;
  sosRank: number;
}

export function winPercentage(wins: number, losses: number): number {
  const played = wins + losses;
  return played > 0 ? wins / played : 0;
}

export class RankingSnapshotService {
  constructor(
    private readonly store: TeamRatingStore,
    private readonly config: EngineConfig = getEngineConfig(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async computeRankings(
    season: number,
    asOfWeek?: number,
    store: TeamRatingStore = this.store
  ): Promise<RankingEntry[]> {
    const [teams, games] = await Promise.all([
      store.listTeams(season),
      store.listGames({ season, processed: true, throughWeek: asOfWeek }),
    ]);
    const schedule = rankScheduleStrength(teams, games, this.config.sos.neutral_value);

    const rows = teams.map(team => {
      const strength = schedule.get(team.id);
      return {
        team,
        sos: strength ? strength.sos : this.config.sos.neutral_value,
        sosRank: strength ? strength.sosRank : teams.length,
        winPct: winPercentage(team.wins, team.losses),
      };
    });

    rows.sort(
      (a, b) =>
        b.team.rating - a.team.rating ||
        b.sos - a.sos ||
        b.winPct - a.winPct ||
        a.team.id.localeCompare(b.team.id)
    );

    return rows.map((row, index) => ({
      rank: index + 1,
      teamId: row.team.id,
      name: row.team.name,
      conference: row.team.conference,
      rating: row.team.rating,
      wins: row.team.wins,
      losses: row.team.losses,
      sos: row.sos,
      sosRank: row.sosRank,
    }));
  }

  /**
   * Persist the rankings for a week. Each week is written once, and only while the
   * ratings still reflect that week.
   */
  async snapshot(season: number, week: number): Promise<RankingSnapshot[]> {
    return this.store.transaction(async (tx) => {
      if (await tx.hasSnapshot(season, week)) {
        throw new SnapshotExistsError(season, week);
      }

      const processed = await tx.listGames({ season, processed: true });
      const latestWeek = processed.reduce((max, game) => Math.max(max, game.week), Number.NEGATIVE_INFINITY);
      if (latestWeek > week) {
        throw new SnapshotOutOfDateError(season, week, latestWeek);
      }

      const createdAt = this.now();
      const rankings = await this.computeRankings(season, week, tx);
      const rows: RankingSnapshot[] = rankings.map(entry => ({
        teamId: entry.teamId,
        season,
        week,
        rank: entry.rank,
        rating: entry.rating,
        wins: entry.wins,
        losses: entry.losses,
        sos: entry.sos,
        sosRank: entry.sosRank,
        createdAt,
      }));

      await tx.insertSnapshots(rows);
      log.success(`Saved ${rows.length} ranking rows for ${season} week ${week}`);
      return rows;
    });
  }

  async getRankingHistory(teamId: string, season: number): Promise<RankingSnapshot[]> {
    const history = await this.store.listSnapshots({ season, teamId });
    return history.sort((a, b) => a.week - b.week);
  }
}
