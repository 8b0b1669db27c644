/**
 * RatingEngine
 *
 * Entry points for jobs and API layers. Wires every component to one store and one
 * configuration; holds no rating state of its own.
 */

import { EngineConfig, getEngineConfig } from './config/engine-config';
import { AlreadyPredictedError, RatingEngineError } from './errors';
import { AccuracyEvaluator, AccuracyReport, ReportScope } from './predictions/accuracy-evaluator';
import { PredictionService, SkippedPrediction, WeekPredictions } from './predictions/prediction-service';
import { RankingEntry, RankingSnapshotService } from './rankings/ranking-snapshot';
import { BatchResult, GameProcessor, ProcessResult } from './ratings/game-processor';
import { PreseasonInitializer, SeedSummary } from './ratings/preseason';
import { StrengthOfScheduleCalculator } from './ratings/strength-of-schedule';
import { TeamRatingStore } from './store/TeamRatingStore';
import {
  Game,
  GameInput,
  GameResult,
  Prediction,
  RankingSnapshot,
  ReferenceRankingEntry,
  TeamSeedInput,
} from './types';
import { createLogger } from './utils/logger';

const log = createLogger('engine');

export interface RatingEngineOptions {
  config?: EngineConfig;
  /** Clock used for prediction and snapshot timestamps */
  now?: () => Date;
}

export interface ImportGamesOptions {
  /** Also create predictions for newly imported scheduled games */
  predict?: boolean;
}

export interface ImportGamesResult {
  inserted: number;
  updated: number;
  /** Already processed; left untouched */
  unchanged: number;
  predictions: number;
  /** New fixtures that could not be predicted; they stay imported */
  skipped: SkippedPrediction[];
}

function sameResult(a: GameResult, b: GameResult): boolean {
  if (a.status === 'scheduled' || b.status === 'scheduled') return a.status === b.status;
  return a.homeScore === b.homeScore && a.awayScore === b.awayScore;
}

export class RatingEngine {
  readonly preseason: PreseasonInitializer;
  readonly processor: GameProcessor;
  readonly schedule: StrengthOfScheduleCalculator;
  readonly rankings: RankingSnapshotService;
  readonly predictions: PredictionService;
  readonly accuracy: AccuracyEvaluator;

  constructor(
    private readonly store: TeamRatingStore,
    options: RatingEngineOptions = {}
  ) {
    const config = options.config ?? getEngineConfig();
    const now = options.now ?? (() => new Date());

    this.preseason = new PreseasonInitializer(store, config);
    this.accuracy = new AccuracyEvaluator(store);
    this.processor = new GameProcessor(store, this.accuracy, config);
    this.schedule = new StrengthOfScheduleCalculator(store, config);
    this.rankings = new RankingSnapshotService(store, config, now);
    this.predictions = new PredictionService(store, config, now);
  }

  seedSeason(season: number, teams: TeamSeedInput[]): Promise<SeedSummary> {
    return this.preseason.seedSeason(season, teams);
  }

  resetSeason(season: number): Promise<number> {
    return this.preseason.resetSeason(season);
  }

  /**
   * Store fixtures and results. Results of unprocessed games may be corrected;
   * processed games are never modified.
   */
  async importGames(games: GameInput[], options: ImportGamesOptions = {}): Promise<ImportGamesResult> {
    const result: ImportGamesResult = { inserted: 0, updated: 0, unchanged: 0, predictions: 0, skipped: [] };
    const newlyScheduled: Game[] = [];

    await this.store.transaction(async (tx) => {
      for (const input of games) {
        const existing = await tx.getGame(input.id);
        if (existing?.isProcessed) {
          if (!sameResult(existing.result, input.result)) {
            log.warn(`Ignoring changed result for processed game ${input.id}`);
          }
          result.unchanged++;
          continue;
        }

        const saved = await tx.saveGame(input);
        if (existing) {
          result.updated++;
        } else {
          result.inserted++;
          if (saved.result.status === 'scheduled') newlyScheduled.push(saved);
        }
      }
    });

    if (options.predict) {
      for (const game of newlyScheduled) {
        try {
          await this.predictions.predict(game.id);
          result.predictions++;
        } catch (error) {
          if (error instanceof AlreadyPredictedError) {
            result.skipped.push({ gameId: game.id, reason: 'already-predicted' });
            continue;
          }
          if (error instanceof RatingEngineError) {
            log.warn(`Not predicting ${game.id}: ${error.message}`);
            result.skipped.push({ gameId: game.id, reason: error.code });
            continue;
          }
          throw error;
        }
      }
    }

    log.info(
      `Imported games: ${result.inserted} new, ${result.updated} updated, ${result.unchanged} already processed`
    );
    return result;
  }

  async importReferenceRankings(entries: ReferenceRankingEntry[]): Promise<number> {
    const inserted = await this.store.transaction(tx => tx.saveReferenceRankings(entries));
    log.info(`Imported ${inserted} reference ranking entries (${entries.length - inserted} already present)`);
    return inserted;
  }

  processGame(gameId: string): Promise<ProcessResult> {
    return this.processor.process(gameId);
  }

  processPending(season: number, throughWeek?: number): Promise<BatchResult> {
    return this.processor.processPending(season, throughWeek);
  }

  generatePrediction(gameId: string): Promise<Prediction> {
    return this.predictions.predict(gameId);
  }

  generatePredictionsForWeek(season: number, week: number): Promise<WeekPredictions> {
    return this.predictions.predictWeek(season, week);
  }

  snapshot(season: number, week: number): Promise<RankingSnapshot[]> {
    return this.rankings.snapshot(season, week);
  }

  getCurrentRankings(season: number): Promise<RankingEntry[]> {
    return this.rankings.computeRankings(season);
  }

  getRankingHistory(teamId: string, season: number): Promise<RankingSnapshot[]> {
    return this.rankings.getRankingHistory(teamId, season);
  }

  getPredictions(season: number, week?: number): Promise<Prediction[]> {
    return this.predictions.getPredictions(season, week);
  }

  getAccuracyReport(season: number, scope: ReportScope = { kind: 'season' }): Promise<AccuracyReport> {
    return this.accuracy.report(season, scope);
  }
}
