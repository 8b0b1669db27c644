#!/usr/bin/env node

/**
 * Rating engine job runner
 *
 * Usage:
 *   npm run jobs -- seed --season 2024
 *   npm run jobs -- import-games --season 2024 --weeks 1,2 --predict
 *   npm run jobs -- process --season 2024 --through-week 2
 *   npm run jobs -- snapshot --season 2024 --week 2
 *   npm run jobs -- report --season 2024 --tier G5
 *
 * Reads season files from --data (default: DATA_DIR or ./data) and writes to DATABASE_URL.
 */

import 'dotenv/config';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { JsonFileAdapter } from '../adapters/JsonFileAdapter';
import { loadEngineConfig } from './config/engine-config';
import { createDatabase } from './db/client';
import { RatingEngine } from './engine';
import { RatingEngineError } from './errors';
import { ReportScope } from './predictions/accuracy-evaluator';
import { PostgresRatingStore } from './store/PostgresRatingStore';
import { ConferenceTier } from './types';
import { createLogger } from './utils/logger';

const log = createLogger('cli');

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseWeeks(value: string): number[] {
  return value.split(',').map(part => parseInteger(part.trim()));
}

function parseTier(value: string): ConferenceTier {
  if (value === 'P5' || value === 'G5' || value === 'FCS') return value;
  throw new InvalidArgumentError('Expected P5, G5 or FCS.');
}

interface GlobalOptions {
  data: string;
}

async function withEngine(
  program: Command,
  task: (engine: RatingEngine, adapter: JsonFileAdapter) => Promise<void>
): Promise<void> {
  const { data } = program.opts<GlobalOptions>();
  const adapter = new JsonFileAdapter({ dataPath: path.resolve(data) });
  const database = createDatabase();

  try {
    const engine = new RatingEngine(new PostgresRatingStore(database.db), { config: loadEngineConfig() });
    await task(engine, adapter);
  } catch (error) {
    if (error instanceof RatingEngineError) {
      log.error(`${error.code}: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await database.close();
  }
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name('rating-engine')
    .description('Seed, process and report team ratings')
    .option('--data <dir>', 'Directory holding {season}.json files', process.env.DATA_DIR ?? 'data');

  program
    .command('init-db')
    .description('Create the rating tables if they do not exist')
    .action(async () => {
      const database = createDatabase();
      try {
        await database.applySchema();
      } finally {
        await database.close();
      }
    });

  program
    .command('seed')
    .description('Seed preseason ratings for every team of a season')
    .requiredOption('--season <year>', 'Season', parseInteger)
    .action(async (options: { season: number }) => {
      await withEngine(program, async (engine, adapter) => {
        const teams = await adapter.getTeams(options.season);
        const summary = await engine.seedSeason(options.season, teams);
        log.success(`${summary.created} teams seeded, ${summary.skipped} skipped`);
      });
    });

  program
    .command('reset')
    .description('Recompute preseason ratings (only before any game is processed)')
    .requiredOption('--season <year>', 'Season', parseInteger)
    .action(async (options: { season: number }) => {
      await withEngine(program, async (engine) => {
        const count = await engine.resetSeason(options.season);
        log.success(`Reset ${count} teams`);
      });
    });

  program
    .command('import-games')
    .description('Import fixtures and results')
    .requiredOption('--season <year>', 'Season', parseInteger)
    .option('--weeks <list>', 'Comma-separated weeks', parseWeeks)
    .option('--predict', 'Predict newly imported fixtures', false)
    .action(async (options: { season: number; weeks?: number[]; predict: boolean }) => {
      await withEngine(program, async (engine, adapter) => {
        const games = await adapter.getGames(options.season, options.weeks);
        const result = await engine.importGames(games, { predict: options.predict });
        log.success(`${result.inserted} new, ${result.updated} updated, ${result.predictions} predictions created`);
        for (const skipped of result.skipped) {
          log.warn(`No prediction for ${skipped.gameId} (${skipped.reason})`);
        }
      });
    });

  program
    .command('import-reference')
    .description('Import reference poll rankings')
    .requiredOption('--season <year>', 'Season', parseInteger)
    .action(async (options: { season: number }) => {
      await withEngine(program, async (engine, adapter) => {
        const entries = await adapter.getReferenceRankings(options.season);
        await engine.importReferenceRankings(entries);
      });
    });

  program
    .command('process')
    .description('Apply completed games to the ratings in schedule order')
    .requiredOption('--season <year>', 'Season', parseInteger)
    .option('--through-week <week>', 'Last week to process', parseInteger)
    .option('--game <id>', 'Process a single game')
    .action(async (options: { season: number; throughWeek?: number; game?: string }) => {
      await withEngine(program, async (engine) => {
        if (options.game) {
          const result = await engine.processGame(options.game);
          log.success(`${result.winnerId} def. ${result.loserId}, rating swing ${Math.abs(result.homeDelta).toFixed(2)}`);
          return;
        }

        const batch = await engine.processPending(options.season, options.throughWeek);
        if (batch.failure) {
          log.error(`Rejected ${batch.failure.gameId} (${batch.failure.error.code}): ${batch.failure.error.message}`);
          process.exitCode = 1;
        }
      });
    });

  program
    .command('snapshot')
    .description('Save the weekly ranking snapshot')
    .requiredOption('--season <year>', 'Season', parseInteger)
    .requiredOption('--week <week>', 'Week', parseInteger)
    .action(async (options: { season: number; week: number }) => {
      await withEngine(program, async (engine) => {
        await engine.snapshot(options.season, options.week);
      });
    });

  program
    .command('predict')
    .description('Predict unplayed games of a week')
    .requiredOption('--season <year>', 'Season', parseInteger)
    .option('--week <week>', 'Week', parseInteger)
    .option('--game <id>', 'Predict a single game')
    .action(async (options: { season: number; week?: number; game?: string }) => {
      await withEngine(program, async (engine) => {
        if (options.game) {
          const prediction = await engine.generatePrediction(options.game);
          log.success(
            `${prediction.predictedWinnerId} (${(prediction.winProbability * 100).toFixed(1)}%, ${prediction.confidence}) ` +
              `${prediction.predictedHomeScore}-${prediction.predictedAwayScore}`
          );
          return;
        }
        if (options.week === undefined) {
          throw new InvalidArgumentError('Either --week or --game is required.');
        }
        await engine.generatePredictionsForWeek(options.season, options.week);
      });
    });

  program
    .command('rankings')
    .description('Print current rankings')
    .requiredOption('--season <year>', 'Season', parseInteger)
    .option('--top <n>', 'Rows to print', parseInteger, 25)
    .action(async (options: { season: number; top: number }) => {
      await withEngine(program, async (engine) => {
        const rankings = await engine.getCurrentRankings(options.season);
        console.log(`\n🏆 ${options.season} rankings`);
        for (const row of rankings.slice(0, options.top)) {
          console.log(
            `${String(row.rank).padStart(3)}. ${row.name.padEnd(24)} ${row.rating.toFixed(1).padStart(7)}  ` +
              `${row.wins}-${row.losses}  SOS ${row.sos.toFixed(1)} (#${row.sosRank})`
          );
        }
      });
    });

  program
    .command('report')
    .description('Print prediction accuracy')
    .requiredOption('--season <year>', 'Season', parseInteger)
    .option('--week <week>', 'Limit to one week', parseInteger)
    .option('--tier <tier>', 'Limit to games involving a tier', parseTier)
    .option('--team <id>', 'Limit to one team')
    .action(async (options: { season: number; week?: number; tier?: ConferenceTier; team?: string }) => {
      await withEngine(program, async (engine) => {
        let scope: ReportScope = { kind: 'season' };
        if (options.week !== undefined) scope = { kind: 'week', week: options.week };
        else if (options.tier) scope = { kind: 'tier', tier: options.tier };
        else if (options.team) scope = { kind: 'team', teamId: options.team };

        const report = await engine.getAccuracyReport(options.season, scope);
        const pct = (value: number) => `${(value * 100).toFixed(1)}%`;
        console.log(`\n📊 Accuracy ${options.season} (${scope.kind})`);
        console.log(`   Graded: ${report.evaluated}/${report.totalPredictions}, correct ${report.correct} (${pct(report.accuracy)})`);
        for (const row of report.byConfidence) {
          console.log(`   ${row.confidence.padEnd(6)} ${row.correct}/${row.total} (${pct(row.accuracy)})`);
        }
        const ref = report.reference;
        console.log(
          `   vs reference: ${ref.gamesCompared} games, engine ${pct(ref.engineAccuracy)}, ` +
            `reference ${pct(ref.referenceAccuracy)}, ${ref.disagreements.length} disagreements`
        );
        if (report.team) {
          console.log(`   As favorite: ${pct(report.team.asFavorite.accuracy)}, as underdog: ${pct(report.team.asUnderdog.accuracy)}`);
        }
      });
    });

  return program;
}

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

main().catch(error => {
  log.error('Job failed', error);
  process.exit(1);
});
