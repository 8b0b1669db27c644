/**
 * PostgreSQL TeamRatingStore (drizzle-orm over pg).
 *
 * Rows for the game and both teams are locked FOR UPDATE before a result is committed,
 * so two writers on the same season serialise on the database rather than in the process.
 */

import { and, eq, inArray, isNotNull, isNull, lte, or, sql } from 'drizzle-orm';
import { PgDatabase } from 'drizzle-orm/pg-core';
import { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { AlreadyPredictedError } from '../errors';
import {
  Game,
  GameInput,
  Prediction,
  RankingSnapshot,
  ReferenceRankingEntry,
  Team,
} from '../types';
import {
  games,
  predictions,
  rankingSnapshots,
  referenceRankings,
  teams,
  GameRow,
  PredictionRow,
  RankingSnapshotRow,
  TeamRow,
} from '../db/schema';
import {
  GameFilter,
  GameResultCommit,
  PredictionFilter,
  SnapshotFilter,
  TeamRatingStore,
  TeamSeedUpdate,
  compareSchedulePosition,
} from './TeamRatingStore';

/** Either the pooled database or an open transaction */
type Executor = PgDatabase<NodePgQueryResultHKT>;

function toTeam(row: TeamRow): Team {
  return {
    id: row.id,
    season: row.season,
    name: row.name,
    conference: row.conference,
    conferenceName: row.conferenceName,
    recruitingRank: row.recruitingRank,
    transferRank: row.transferRank,
    returningProduction: row.returningProduction,
    rating: row.rating,
    initialRating: row.initialRating,
    wins: row.wins,
    losses: row.losses,
  };
}

function toGame(row: GameRow): Game {
  return {
    id: row.id,
    season: row.season,
    week: row.week,
    gameDate: row.gameDate,
    homeTeamId: row.homeTeamId,
    awayTeamId: row.awayTeamId,
    neutralSite: row.neutralSite,
    result:
      row.status === 'completed' && row.homeScore !== null && row.awayScore !== null
        ? { status: 'completed', homeScore: row.homeScore, awayScore: row.awayScore }
        : { status: 'scheduled' },
    isProcessed: row.isProcessed,
    homeRatingDelta: row.homeRatingDelta,
    awayRatingDelta: row.awayRatingDelta,
  };
}

function toSnapshot(row: RankingSnapshotRow): RankingSnapshot {
  return { ...row };
}

function toPrediction(row: PredictionRow): Prediction {
  return {
    gameId: row.gameId,
    season: row.season,
    week: row.week,
    homeTeamId: row.homeTeamId,
    awayTeamId: row.awayTeamId,
    predictedWinnerId: row.predictedWinnerId,
    predictedHomeScore: row.predictedHomeScore,
    predictedAwayScore: row.predictedAwayScore,
    winProbability: row.winProbability,
    confidence: row.confidence,
    ratingsAtPrediction: Object.freeze({ home: row.homeRatingAtPrediction, away: row.awayRatingAtPrediction }),
    createdAt: row.createdAt,
    wasCorrect: row.wasCorrect,
  };
}

function gameColumns(game: GameInput) {
  return {
    season: game.season,
    week: game.week,
    gameDate: game.gameDate,
    homeTeamId: game.homeTeamId,
    awayTeamId: game.awayTeamId,
    neutralSite: game.neutralSite,
    status: game.result.status,
    homeScore: game.result.status === 'completed' ? game.result.homeScore : null,
    awayScore: game.result.status === 'completed' ? game.result.awayScore : null,
  };
}

export class PostgresRatingStore implements TeamRatingStore {
  constructor(private readonly db: Executor, private readonly joined: boolean = false) {}

  async getTeam(season: number, teamId: string): Promise<Team | null> {
    const query = this.db
      .select()
      .from(teams)
      .where(and(eq(teams.season, season), eq(teams.id, teamId)))
      .$dynamic();
    // Inside a transaction the row stays locked until commit
    const rows = this.joined ? await query.for('update') : await query;
    return rows.length > 0 ? toTeam(rows[0]) : null;
  }

  async listTeams(season: number): Promise<Team[]> {
    const rows = await this.db.select().from(teams).where(eq(teams.season, season)).orderBy(teams.id);
    return rows.map(toTeam);
  }

  async createTeam(team: Team): Promise<boolean> {
    const inserted = await this.db
      .insert(teams)
      .values({
        id: team.id,
        season: team.season,
        name: team.name,
        conference: team.conference,
        conferenceName: team.conferenceName,
        recruitingRank: team.recruitingRank,
        transferRank: team.transferRank,
        returningProduction: team.returningProduction,
        rating: team.rating,
        initialRating: team.initialRating,
        wins: team.wins,
        losses: team.losses,
      })
      .onConflictDoNothing()
      .returning({ id: teams.id });
    return inserted.length > 0;
  }

  async replaceSeed(season: number, teamId: string, seed: TeamSeedUpdate): Promise<void> {
    await this.db
      .update(teams)
      .set({ rating: seed.rating, initialRating: seed.initialRating, wins: 0, losses: 0, updatedAt: new Date() })
      .where(and(eq(teams.season, season), eq(teams.id, teamId)));
  }

  async getGame(gameId: string): Promise<Game | null> {
    const query = this.db.select().from(games).where(eq(games.id, gameId)).$dynamic();
    const rows = this.joined ? await query.for('update') : await query;
    return rows.length > 0 ? toGame(rows[0]) : null;
  }

  async saveGame(input: GameInput): Promise<Game> {
    const existing = await this.db.select().from(games).where(eq(games.id, input.id)).for('update');

    if (existing.length > 0) {
      if (existing[0].isProcessed) {
        return toGame(existing[0]);
      }
      const updated = await this.db
        .update(games)
        .set(gameColumns(input))
        .where(and(eq(games.id, input.id), eq(games.isProcessed, false)))
        .returning();
      return toGame(updated[0]);
    }

    const inserted = await this.db
      .insert(games)
      .values({ id: input.id, ...gameColumns(input) })
      .returning();
    return toGame(inserted[0]);
  }

  async listGames(filter: GameFilter): Promise<Game[]> {
    const conditions = [eq(games.season, filter.season)];
    if (filter.week !== undefined) conditions.push(eq(games.week, filter.week));
    if (filter.throughWeek !== undefined) conditions.push(lte(games.week, filter.throughWeek));
    if (filter.processed !== undefined) conditions.push(eq(games.isProcessed, filter.processed));
    if (filter.teamId !== undefined) {
      const teamCondition = or(eq(games.homeTeamId, filter.teamId), eq(games.awayTeamId, filter.teamId));
      if (teamCondition) conditions.push(teamCondition);
    }

    const rows = await this.db.select().from(games).where(and(...conditions));
    return rows.map(toGame).sort(compareSchedulePosition);
  }

  async latestProcessedGame(season: number, teamId: string): Promise<Game | null> {
    const played = await this.listGames({ season, teamId, processed: true });
    return played.length > 0 ? played[played.length - 1] : null;
  }

  async commitGameResult(commit: GameResultCommit): Promise<void> {
    const locked = await this.db
      .select({ id: games.id, isProcessed: games.isProcessed })
      .from(games)
      .where(eq(games.id, commit.gameId))
      .for('update');
    if (locked.length === 0 || locked[0].isProcessed) {
      throw new Error(`Game ${commit.gameId} is missing or already processed`);
    }

    await this.db
      .select({ id: teams.id })
      .from(teams)
      .where(and(eq(teams.season, commit.season), inArray(teams.id, [commit.homeTeamId, commit.awayTeamId])))
      .for('update');

    for (const [teamId, delta] of [
      [commit.homeTeamId, commit.homeDelta],
      [commit.awayTeamId, commit.awayDelta],
    ] as const) {
      const won = teamId === commit.winnerId;
      await this.db
        .update(teams)
        .set({
          rating: sql`${teams.rating} + ${delta}`,
          wins: sql`${teams.wins} + ${won ? 1 : 0}`,
          losses: sql`${teams.losses} + ${won ? 0 : 1}`,
          updatedAt: new Date(),
        })
        .where(and(eq(teams.season, commit.season), eq(teams.id, teamId)));
    }

    await this.db
      .update(games)
      .set({
        homeRatingDelta: commit.homeDelta,
        awayRatingDelta: commit.awayDelta,
        isProcessed: true,
      })
      .where(eq(games.id, commit.gameId));
  }

  async hasSnapshot(season: number, week: number): Promise<boolean> {
    const rows = await this.db
      .select({ teamId: rankingSnapshots.teamId })
      .from(rankingSnapshots)
      .where(and(eq(rankingSnapshots.season, season), eq(rankingSnapshots.week, week)))
      .limit(1);
    return rows.length > 0;
  }

  async insertSnapshots(rows: RankingSnapshot[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.insert(rankingSnapshots).values(rows);
  }

  async listSnapshots(filter: SnapshotFilter): Promise<RankingSnapshot[]> {
    const conditions = [eq(rankingSnapshots.season, filter.season)];
    if (filter.week !== undefined) conditions.push(eq(rankingSnapshots.week, filter.week));
    if (filter.teamId !== undefined) conditions.push(eq(rankingSnapshots.teamId, filter.teamId));

    const rows = await this.db
      .select()
      .from(rankingSnapshots)
      .where(and(...conditions))
      .orderBy(rankingSnapshots.week, rankingSnapshots.rank);
    return rows.map(toSnapshot);
  }

  async getPrediction(gameId: string): Promise<Prediction | null> {
    const rows = await this.db.select().from(predictions).where(eq(predictions.gameId, gameId)).limit(1);
    return rows.length > 0 ? toPrediction(rows[0]) : null;
  }

  async insertPrediction(prediction: Prediction): Promise<void> {
    const inserted = await this.db
      .insert(predictions)
      .values({
        gameId: prediction.gameId,
        season: prediction.season,
        week: prediction.week,
        homeTeamId: prediction.homeTeamId,
        awayTeamId: prediction.awayTeamId,
        predictedWinnerId: prediction.predictedWinnerId,
        predictedHomeScore: prediction.predictedHomeScore,
        predictedAwayScore: prediction.predictedAwayScore,
        winProbability: prediction.winProbability,
        confidence: prediction.confidence,
        homeRatingAtPrediction: prediction.ratingsAtPrediction.home,
        awayRatingAtPrediction: prediction.ratingsAtPrediction.away,
        wasCorrect: prediction.wasCorrect,
        createdAt: prediction.createdAt,
      })
      .onConflictDoNothing({ target: predictions.gameId })
      .returning({ gameId: predictions.gameId });

    if (inserted.length === 0) {
      throw new AlreadyPredictedError(prediction.gameId);
    }
  }

  async listPredictions(filter: PredictionFilter): Promise<Prediction[]> {
    const conditions = [eq(predictions.season, filter.season)];
    if (filter.week !== undefined) conditions.push(eq(predictions.week, filter.week));
    if (filter.evaluatedOnly) conditions.push(isNotNull(predictions.wasCorrect));
    if (filter.teamId !== undefined) {
      const teamCondition = or(eq(predictions.homeTeamId, filter.teamId), eq(predictions.awayTeamId, filter.teamId));
      if (teamCondition) conditions.push(teamCondition);
    }

    const rows = await this.db
      .select()
      .from(predictions)
      .where(and(...conditions))
      .orderBy(predictions.week, predictions.gameId);
    return rows.map(toPrediction);
  }

  async recordEvaluation(gameId: string, wasCorrect: boolean): Promise<boolean> {
    const updated = await this.db
      .update(predictions)
      .set({ wasCorrect })
      .where(and(eq(predictions.gameId, gameId), isNull(predictions.wasCorrect)))
      .returning({ gameId: predictions.gameId });
    return updated.length > 0;
  }

  async saveReferenceRankings(entries: ReferenceRankingEntry[]): Promise<number> {
    if (entries.length === 0) return 0;
    const inserted = await this.db
      .insert(referenceRankings)
      .values(entries)
      .onConflictDoNothing()
      .returning({ teamId: referenceRankings.teamId });
    return inserted.length;
  }

  async getReferenceRank(season: number, week: number, teamId: string): Promise<number | null> {
    const rows = await this.db
      .select({ rank: referenceRankings.rank })
      .from(referenceRankings)
      .where(
        and(
          eq(referenceRankings.season, season),
          eq(referenceRankings.week, week),
          eq(referenceRankings.teamId, teamId)
        )
      )
      .limit(1);
    return rows.length > 0 ? rows[0].rank : null;
  }

  async transaction<T>(work: (store: TeamRatingStore) => Promise<T>): Promise<T> {
    if (this.joined) {
      return work(this);
    }
    return this.db.transaction(async (tx) => work(new PostgresRatingStore(tx, true)));
  }
}
