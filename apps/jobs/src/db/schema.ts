import {
  pgTable,
  pgEnum,
  varchar,
  text,
  integer,
  doublePrecision,
  boolean,
  timestamp,
  primaryKey,
  unique,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Rating engine schema (PostgreSQL)
 *
 * teams            one row per team per season, owns the live rating
 * games            fixtures and results; deltas written once when processed
 * ranking_snapshots   weekly rankings, append-only
 * predictions      one per game, ratings frozen at creation
 * reference_rankings  external poll positions, comparison only
 */

export const conferenceTierEnum = pgEnum('conference_tier', ['P5', 'G5', 'FCS']);
export const gameStatusEnum = pgEnum('game_status', ['scheduled', 'completed']);
export const confidenceEnum = pgEnum('prediction_confidence', ['High', 'Medium', 'Low']);

export const teams = pgTable(
  'teams',
  {
    id: varchar('id', { length: 100 }).notNull(),
    season: integer('season').notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    conference: conferenceTierEnum('conference').notNull(),
    conferenceName: varchar('conference_name', { length: 50 }),
    recruitingRank: integer('recruiting_rank'),
    transferRank: integer('transfer_rank'),
    returningProduction: doublePrecision('returning_production'),
    rating: doublePrecision('rating').notNull(),
    initialRating: doublePrecision('initial_rating').notNull(),
    wins: integer('wins').default(0).notNull(),
    losses: integer('losses').default(0).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.season, table.id] }),
  })
);

export const games = pgTable(
  'games',
  {
    id: varchar('id', { length: 100 }).primaryKey(),
    season: integer('season').notNull(),
    week: integer('week').notNull(),
    gameDate: timestamp('game_date'),
    homeTeamId: varchar('home_team_id', { length: 100 }).notNull(),
    awayTeamId: varchar('away_team_id', { length: 100 }).notNull(),
    neutralSite: boolean('neutral_site').default(false).notNull(),
    status: gameStatusEnum('status').default('scheduled').notNull(),
    homeScore: integer('home_score'),
    awayScore: integer('away_score'),
    isProcessed: boolean('is_processed').default(false).notNull(),
    homeRatingDelta: doublePrecision('home_rating_delta').default(0).notNull(),
    awayRatingDelta: doublePrecision('away_rating_delta').default(0).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    seasonWeekIdx: index('games_season_week_idx').on(table.season, table.week),
  })
);

export const rankingSnapshots = pgTable(
  'ranking_snapshots',
  {
    teamId: varchar('team_id', { length: 100 }).notNull(),
    season: integer('season').notNull(),
    week: integer('week').notNull(),
    rank: integer('rank').notNull(),
    rating: doublePrecision('rating').notNull(),
    wins: integer('wins').notNull(),
    losses: integer('losses').notNull(),
    sos: doublePrecision('sos').notNull(),
    sosRank: integer('sos_rank').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.season, table.week, table.teamId] }),
  })
);

export const predictions = pgTable(
  'predictions',
  {
    gameId: varchar('game_id', { length: 100 }).notNull(),
    season: integer('season').notNull(),
    week: integer('week').notNull(),
    homeTeamId: varchar('home_team_id', { length: 100 }).notNull(),
    awayTeamId: varchar('away_team_id', { length: 100 }).notNull(),
    predictedWinnerId: varchar('predicted_winner_id', { length: 100 }).notNull(),
    predictedHomeScore: integer('predicted_home_score').notNull(),
    predictedAwayScore: integer('predicted_away_score').notNull(),
    winProbability: doublePrecision('win_probability').notNull(),
    confidence: confidenceEnum('confidence').notNull(),
    homeRatingAtPrediction: doublePrecision('home_rating_at_prediction').notNull(),
    awayRatingAtPrediction: doublePrecision('away_rating_at_prediction').notNull(),
    wasCorrect: boolean('was_correct'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    gameUnique: unique('predictions_game_id_unique').on(table.gameId),
    seasonWeekIdx: index('predictions_season_week_idx').on(table.season, table.week),
  })
);

export const referenceRankings = pgTable(
  'reference_rankings',
  {
    season: integer('season').notNull(),
    week: integer('week').notNull(),
    teamId: varchar('team_id', { length: 100 }).notNull(),
    rank: integer('rank').notNull(),
    pollName: text('poll_name').default('AP Top 25').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.season, table.week, table.teamId] }),
  })
);

export type TeamRow = typeof teams.$inferSelect;
export type GameRow = typeof games.$inferSelect;
export type RankingSnapshotRow = typeof rankingSnapshots.$inferSelect;
export type PredictionRow = typeof predictions.$inferSelect;
