/**
 * DataSourceAdapter Interface
 *
 * Contract for import collaborators. Adapters hand the engine records that are already
 * normalized: team ids resolved, conference tiers assigned, played games marked as
 * completed with both scores.
 */

import { GameInput, ReferenceRankingEntry, TeamSeedInput } from '../src/types';

export interface DataSourceAdapter {
  /**
   * Fetch team records (with preseason signals) for a given season
   */
  getTeams(season: number): Promise<TeamSeedInput[]>;

  /**
   * Fetch fixtures and results for a season, optionally limited to some weeks
   */
  getGames(season: number, weeks?: number[]): Promise<GameInput[]>;

  /**
   * Fetch reference poll positions for a season
   */
  getReferenceRankings(season: number): Promise<ReferenceRankingEntry[]>;

  /**
   * Get the name of this adapter
   */
  getName(): string;

  /**
   * Check if this adapter is available/configured
   */
  isAvailable(): Promise<boolean>;
}
