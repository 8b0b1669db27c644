export * from './types';
export * from './errors';
export * from './engine';
export {
  EngineConfig,
  EngineConfigSchema,
  defaultEngineConfig,
  loadEngineConfig,
  getEngineConfig,
  clearEngineConfigCache,
  parseEngineConfig,
} from './config/engine-config';
export * from './ratings/elo';
export { PreseasonInitializer, computePreseasonSeed, SeedSummary, SeedResult } from './ratings/preseason';
export { GameProcessor, ProcessResult, BatchResult } from './ratings/game-processor';
export { StrengthOfScheduleCalculator, ScheduleStrength } from './ratings/strength-of-schedule';
export { RankingSnapshotService, RankingEntry } from './rankings/ranking-snapshot';
export { PredictionService, forecastMatchup, WeekPredictions } from './predictions/prediction-service';
export {
  AccuracyEvaluator,
  AccuracyReport,
  GameEvaluation,
  ReportScope,
  referencePick,
} from './predictions/accuracy-evaluator';
export { TeamRatingStore } from './store/TeamRatingStore';
export { InMemoryRatingStore } from './store/InMemoryRatingStore';
export { PostgresRatingStore } from './store/PostgresRatingStore';
export { createDatabase } from './db/client';
export { createLogger } from './utils/logger';
export { DataSourceAdapter } from '../adapters/DataSourceAdapter';
export { JsonFileAdapter } from '../adapters/JsonFileAdapter';
