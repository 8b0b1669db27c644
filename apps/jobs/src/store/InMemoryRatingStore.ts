/**
 * In-memory TeamRatingStore.
 *
 * Used by the test suite and for dry runs of a season. Records are copied on the way in
 * and out, so callers never hold a live reference to stored state. Transactions are
 * serialised and roll back to a checkpoint on error.
 */

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
  GameFilter,
  GameResultCommit,
  PredictionFilter,
  SnapshotFilter,
  TeamRatingStore,
  TeamSeedUpdate,
  compareSchedulePosition,
} from './TeamRatingStore';

const teamKey = (season: number, teamId: string) => `${season}:${teamId}`;
const referenceKey = (season: number, week: number, teamId: string) => `${season}:${week}:${teamId}`;

interface Tables {
  teams: Map<string, Team>;
  games: Map<string, Game>;
  snapshots: RankingSnapshot[];
  predictions: Map<string, Prediction>;
  reference: Map<string, ReferenceRankingEntry>;
}

class MemoryState {
  tables: Tables = {
    teams: new Map(),
    games: new Map(),
    snapshots: [],
    predictions: new Map(),
    reference: new Map(),
  };

  checkpoint(): Tables {
    return structuredClone(this.tables);
  }

  rollback(checkpoint: Tables): void {
    this.tables = checkpoint;
  }
}

/**
 * Runs one transaction at a time, in arrival order
 */
class TransactionLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

export class InMemoryRatingStore implements TeamRatingStore {
  constructor(
    private readonly state: MemoryState = new MemoryState(),
    private readonly lock: TransactionLock = new TransactionLock(),
    private readonly joined: boolean = false
  ) {}

  private get tables(): Tables {
    return this.state.tables;
  }

  async getTeam(season: number, teamId: string): Promise<Team | null> {
    const team = this.tables.teams.get(teamKey(season, teamId));
    return team ? structuredClone(team) : null;
  }

  async listTeams(season: number): Promise<Team[]> {
    return [...this.tables.teams.values()]
      .filter(t => t.season === season)
      .sort((a, b) => a.id.localeCompare(b.id))
      .map(t => structuredClone(t));
  }

  async createTeam(team: Team): Promise<boolean> {
    const key = teamKey(team.season, team.id);
    if (this.tables.teams.has(key)) return false;
    this.tables.teams.set(key, structuredClone(team));
    return true;
  }

  async replaceSeed(season: number, teamId: string, seed: TeamSeedUpdate): Promise<void> {
    const team = this.tables.teams.get(teamKey(season, teamId));
    if (!team) throw new Error(`Team ${teamId} not found for season ${season}`);
    team.rating = seed.rating;
    team.initialRating = seed.initialRating;
    team.wins = 0;
    team.losses = 0;
  }

  async getGame(gameId: string): Promise<Game | null> {
    const game = this.tables.games.get(gameId);
    return game ? structuredClone(game) : null;
  }

  async saveGame(input: GameInput): Promise<Game> {
    const existing = this.tables.games.get(input.id);
    if (existing?.isProcessed) {
      return structuredClone(existing);
    }

    const game: Game = {
      ...structuredClone(input),
      isProcessed: false,
      homeRatingDelta: 0,
      awayRatingDelta: 0,
    };
    this.tables.games.set(game.id, game);
    return structuredClone(game);
  }

  async listGames(filter: GameFilter): Promise<Game[]> {
    return [...this.tables.games.values()]
      .filter(g => g.season === filter.season)
      .filter(g => filter.week === undefined || g.week === filter.week)
      .filter(g => filter.throughWeek === undefined || g.week <= filter.throughWeek)
      .filter(g => filter.teamId === undefined || g.homeTeamId === filter.teamId || g.awayTeamId === filter.teamId)
      .filter(g => filter.processed === undefined || g.isProcessed === filter.processed)
      .sort(compareSchedulePosition)
      .map(g => structuredClone(g));
  }

  async latestProcessedGame(season: number, teamId: string): Promise<Game | null> {
    const played = await this.listGames({ season, teamId, processed: true });
    return played.length > 0 ? played[played.length - 1] : null;
  }

  async commitGameResult(commit: GameResultCommit): Promise<void> {
    const game = this.tables.games.get(commit.gameId);
    const home = this.tables.teams.get(teamKey(commit.season, commit.homeTeamId));
    const away = this.tables.teams.get(teamKey(commit.season, commit.awayTeamId));
    if (!game || !home || !away) {
      throw new Error(`Cannot commit result for game ${commit.gameId}: game or team record missing`);
    }
    if (game.isProcessed) {
      throw new Error(`Game ${commit.gameId} is already processed`);
    }

    home.rating += commit.homeDelta;
    away.rating += commit.awayDelta;
    const winner = commit.winnerId === home.id ? home : away;
    const loser = winner === home ? away : home;
    winner.wins += 1;
    loser.losses += 1;

    game.homeRatingDelta = commit.homeDelta;
    game.awayRatingDelta = commit.awayDelta;
    game.isProcessed = true;
  }

  async hasSnapshot(season: number, week: number): Promise<boolean> {
    return this.tables.snapshots.some(s => s.season === season && s.week === week);
  }

  async insertSnapshots(rows: RankingSnapshot[]): Promise<void> {
    for (const row of rows) {
      const duplicate = this.tables.snapshots.some(
        s => s.season === row.season && s.week === row.week && s.teamId === row.teamId
      );
      if (duplicate) {
        throw new Error(`Snapshot already exists for ${row.teamId} ${row.season} week ${row.week}`);
      }
    }
    this.tables.snapshots.push(...rows.map(r => structuredClone(r)));
  }

  async listSnapshots(filter: SnapshotFilter): Promise<RankingSnapshot[]> {
    return this.tables.snapshots
      .filter(s => s.season === filter.season)
      .filter(s => filter.week === undefined || s.week === filter.week)
      .filter(s => filter.teamId === undefined || s.teamId === filter.teamId)
      .sort((a, b) => a.week - b.week || a.rank - b.rank)
      .map(s => structuredClone(s));
  }

  async getPrediction(gameId: string): Promise<Prediction | null> {
    const prediction = this.tables.predictions.get(gameId);
    return prediction ? structuredClone(prediction) : null;
  }

  async insertPrediction(prediction: Prediction): Promise<void> {
    if (this.tables.predictions.has(prediction.gameId)) {
      throw new AlreadyPredictedError(prediction.gameId);
    }
    this.tables.predictions.set(prediction.gameId, structuredClone(prediction));
  }

  async listPredictions(filter: PredictionFilter): Promise<Prediction[]> {
    return [...this.tables.predictions.values()]
      .filter(p => p.season === filter.season)
      .filter(p => filter.week === undefined || p.week === filter.week)
      .filter(p => filter.teamId === undefined || p.homeTeamId === filter.teamId || p.awayTeamId === filter.teamId)
      .filter(p => !filter.evaluatedOnly || p.wasCorrect !== null)
      .sort((a, b) => a.week - b.week || a.gameId.localeCompare(b.gameId))
      .map(p => structuredClone(p));
  }

  async recordEvaluation(gameId: string, wasCorrect: boolean): Promise<boolean> {
    const prediction = this.tables.predictions.get(gameId);
    if (!prediction || prediction.wasCorrect !== null) return false;
    prediction.wasCorrect = wasCorrect;
    return true;
  }

  async saveReferenceRankings(entries: ReferenceRankingEntry[]): Promise<number> {
    let inserted = 0;
    for (const entry of entries) {
      const key = referenceKey(entry.season, entry.week, entry.teamId);
      if (this.tables.reference.has(key)) continue;
      this.tables.reference.set(key, { ...entry });
      inserted++;
    }
    return inserted;
  }

  async getReferenceRank(season: number, week: number, teamId: string): Promise<number | null> {
    return this.tables.reference.get(referenceKey(season, week, teamId))?.rank ?? null;
  }

  async transaction<T>(work: (store: TeamRatingStore) => Promise<T>): Promise<T> {
    if (this.joined) {
      return work(this);
    }

    return this.lock.run(async () => {
      const checkpoint = this.state.checkpoint();
      try {
        return await work(new InMemoryRatingStore(this.state, this.lock, true));
      } catch (error) {
        this.state.rollback(checkpoint);
        throw error;
      }
    });
  }
}
