/**
 * Rating engine error taxonomy.
 *
 * Every error carries a stable `code` so a caller (CLI, API layer) can report which
 * invariant was violated instead of retrying blindly.
 */

export class RatingEngineError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export type InvalidGameReason =
  | 'unknown-game'
  | 'unplayed'
  | 'missing-team'
  | 'same-team'
  | 'week-out-of-range'
  | 'already-processed'
  | 'tied-score';

export class InvalidGameError extends RatingEngineError {
  readonly gameId: string;
  readonly reason: InvalidGameReason;

  constructor(gameId: string, reason: InvalidGameReason, detail?: string) {
    super('INVALID_GAME', `Game ${gameId} rejected (${reason})${detail ? `: ${detail}` : ''}`);
    this.gameId = gameId;
    this.reason = reason;
  }
}

export class AlreadyPredictedError extends RatingEngineError {
  readonly gameId: string;

  constructor(gameId: string) {
    super('ALREADY_PREDICTED', `A prediction already exists for game ${gameId}`);
    this.gameId = gameId;
  }
}

export type PreseasonField = 'recruitingRank' | 'transferRank' | 'returningProduction';

/**
 * Raised for data-quality reporting only: the initializer substitutes neutral
 * defaults and logs it, it is never thrown out of seeding.
 */
export class MissingPreseasonDataError extends RatingEngineError {
  readonly teamId: string;
  readonly season: number;
  readonly missing: PreseasonField[];

  constructor(teamId: string, season: number, missing: PreseasonField[]) {
    super('MISSING_PRESEASON_DATA', `Team ${teamId} (${season}) missing ${missing.join(', ')}; using neutral defaults`);
    this.teamId = teamId;
    this.season = season;
    this.missing = missing;
  }
}

export interface SchedulePosition {
  week: number;
  gameDate: Date | null;
}

export class OutOfOrderProcessingError extends RatingEngineError {
  readonly gameId: string;
  readonly teamId: string;
  readonly attempted: SchedulePosition;
  readonly latestProcessed: SchedulePosition & { gameId: string };

  constructor(
    gameId: string,
    teamId: string,
    attempted: SchedulePosition,
    latestProcessed: SchedulePosition & { gameId: string }
  ) {
    super(
      'OUT_OF_ORDER',
      `Game ${gameId} (week ${attempted.week}) precedes game ${latestProcessed.gameId} ` +
        `(week ${latestProcessed.week}) already processed for ${teamId}`
    );
    this.gameId = gameId;
    this.teamId = teamId;
    this.attempted = attempted;
    this.latestProcessed = latestProcessed;
  }
}

export class SnapshotExistsError extends RatingEngineError {
  constructor(readonly season: number, readonly week: number) {
    super('SNAPSHOT_EXISTS', `Rankings for ${season} week ${week} were already snapshotted`);
  }
}

export class SnapshotOutOfDateError extends RatingEngineError {
  constructor(readonly season: number, readonly week: number, readonly latestProcessedWeek: number) {
    super(
      'SNAPSHOT_OUT_OF_DATE',
      `Cannot snapshot ${season} week ${week}: games through week ${latestProcessedWeek} are already processed`
    );
  }
}

export class SeasonAlreadyStartedError extends RatingEngineError {
  constructor(readonly season: number) {
    super('SEASON_STARTED', `Season ${season} already has processed games; preseason seeds are frozen`);
  }
}

export class ConfigError extends RatingEngineError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}
