/**
 * JSON File Data Source Adapter
 *
 * Reads one file per season from a local directory (`{dataPath}/{season}.json`):
 *
 *   { "season": 2024, "teams": [...], "games": [...], "referenceRankings": [...] }
 *
 * Every record is validated before it reaches the engine. A game is only treated as
 * played when it says `"completed": true`; a 0-0 without that flag is a fixture.
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { GameInput, ReferenceRankingEntry, TeamSeedInput } from '../src/types';
import { createLogger } from '../src/utils/logger';
import { DataSourceAdapter } from './DataSourceAdapter';

const log = createLogger('json-adapter');

const DEFAULT_POLL = 'AP Top 25';

const rank = z.number().int().positive().nullable().optional();

const TeamRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  conference: z.enum(['P5', 'G5', 'FCS']),
  conferenceName: z.string().nullable().optional(),
  recruitingRank: rank,
  transferRank: rank,
  // 0-1 fraction or 0-100 percentage
  returningProduction: z.number().min(0).max(100).nullable().optional(),
});

const score = z.number().int().nonnegative().nullable().optional();

const GameRecordSchema = z
  .object({
    id: z.string().min(1),
    week: z.number().int(),
    date: z
      .string()
      .refine(value => !Number.isNaN(Date.parse(value)), { message: 'Invalid date' })
      .nullable()
      .optional(),
    homeTeamId: z.string().min(1),
    awayTeamId: z.string().min(1),
    neutralSite: z.boolean().default(false),
    completed: z.boolean().default(false),
    homeScore: score,
    awayScore: score,
  })
  .refine(game => !game.completed || (typeof game.homeScore === 'number' && typeof game.awayScore === 'number'), {
    message: 'Completed games need both scores',
    path: ['completed'],
  });

const ReferenceRecordSchema = z.object({
  week: z.number().int().nonnegative(),
  teamId: z.string().min(1),
  rank: z.number().int().positive(),
  pollName: z.string().min(1).default(DEFAULT_POLL),
});

export const SeasonFileSchema = z.object({
  season: z.number().int(),
  teams: z.array(TeamRecordSchema).default([]),
  games: z.array(GameRecordSchema).default([]),
  referenceRankings: z.array(ReferenceRecordSchema).default([]),
});

export type SeasonFile = z.infer<typeof SeasonFileSchema>;

export class JsonFileAdapter implements DataSourceAdapter {
  private dataPath: string;
  private cache = new Map<number, SeasonFile>();

  constructor(config: { dataPath: string }) {
    this.dataPath = config.dataPath;
  }

  getName(): string {
    return 'JSON Files';
  }

  async isAvailable(): Promise<boolean> {
    return existsSync(this.dataPath);
  }

  async getTeams(season: number): Promise<TeamSeedInput[]> {
    const file = await this.load(season);
    return file.teams.map((team): TeamSeedInput => ({
      id: team.id,
      season,
      name: team.name,
      conference: team.conference,
      conferenceName: team.conferenceName ?? null,
      recruitingRank: team.recruitingRank ?? null,
      transferRank: team.transferRank ?? null,
      returningProduction: team.returningProduction ?? null,
    }));
  }

  async getGames(season: number, weeks?: number[]): Promise<GameInput[]> {
    const file = await this.load(season);
    const wanted = weeks ? new Set(weeks) : null;

    return file.games
      .filter(game => !wanted || wanted.has(game.week))
      .map((game): GameInput => ({
        id: game.id,
        season,
        week: game.week,
        gameDate: game.date ? new Date(game.date) : null,
        homeTeamId: game.homeTeamId,
        awayTeamId: game.awayTeamId,
        neutralSite: game.neutralSite,
        result:
          game.completed && typeof game.homeScore === 'number' && typeof game.awayScore === 'number'
            ? { status: 'completed', homeScore: game.homeScore, awayScore: game.awayScore }
            : { status: 'scheduled' },
      }));
  }

  async getReferenceRankings(season: number): Promise<ReferenceRankingEntry[]> {
    const file = await this.load(season);
    return file.referenceRankings.map(entry => ({ season, ...entry }));
  }

  private async load(season: number): Promise<SeasonFile> {
    const cached = this.cache.get(season);
    if (cached) return cached;

    const filePath = path.join(this.dataPath, `${season}.json`);
    if (!existsSync(filePath)) {
      throw new Error(`Season file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Cannot parse ${filePath}: ${reason}`);
    }

    const parsed = SeasonFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid season file ${filePath} at "${issue.path.join('.')}": ${issue.message}`);
    }
    if (parsed.data.season !== season) {
      throw new Error(`Season file ${filePath} is for ${parsed.data.season}, expected ${season}`);
    }

    log.debug(
      `Loaded ${filePath}: ${parsed.data.teams.length} teams, ${parsed.data.games.length} games, ` +
        `${parsed.data.referenceRankings.length} reference entries`
    );
    this.cache.set(season, parsed.data);
    return parsed.data;
  }
}
