/**
 * Strength of Schedule
 *
 * SOS = mean *current* rating of every opponent a team has played (processed games only).
 * It is a live metric: when an opponent's rating moves, every team that played them
 * sees its SOS move too. An opponent met twice counts twice.
 */

import { EngineConfig, getEngineConfig } from '../config/engine-config';
import { TeamRatingStore } from '../store/TeamRatingStore';
import { Game, Team } from '../types';

export interface ScheduleStrength {
  teamId: string;
  sos: number;
  sosRank: number;
  gamesPlayed: number;
}

/**
 * Pure SOS for one team given the season's processed games and current ratings
 */
export function scheduleStrength(
  teamId: string,
  games: Game[],
  ratings: Map<string, number>,
  neutralValue: number
): { sos: number; gamesPlayed: number } {
  let sum = 0;
  let count = 0;

  for (const game of games) {
    if (!game.isProcessed) continue;
    const opponentId =
      game.homeTeamId === teamId ? game.awayTeamId : game.awayTeamId === teamId ? game.homeTeamId : null;
    if (opponentId === null) continue;

    const rating = ratings.get(opponentId);
    if (rating === undefined) continue;
    sum += rating;
    count++;
  }

  return { sos: count > 0 ? sum / count : neutralValue, gamesPlayed: count };
}

export class StrengthOfScheduleCalculator {
  constructor(
    private readonly store: TeamRatingStore,
    private readonly config: EngineConfig = getEngineConfig()
  ) {}

  async calculateSOS(team: Pick<Team, 'id' | 'season'>, asOfWeek?: number): Promise<number> {
    const [games, teams] = await Promise.all([
      this.store.listGames({ season: team.season, teamId: team.id, processed: true, throughWeek: asOfWeek }),
      this.store.listTeams(team.season),
    ]);
    const ratings = new Map(teams.map(t => [t.id, t.rating]));
    return scheduleStrength(team.id, games, ratings, this.config.sos.neutral_value).sos;
  }

  /**
   * SOS for every team of the season, ranked hardest first (ties by team id)
   */
  async calculateAll(season: number, asOfWeek?: number): Promise<Map<string, ScheduleStrength>> {
    const [games, teams] = await Promise.all([
      this.store.listGames({ season, processed: true, throughWeek: asOfWeek }),
      this.store.listTeams(season),
    ]);
    return rankScheduleStrength(teams, games, this.config.sos.neutral_value);
  }
}

export function rankScheduleStrength(
  teams: Team[],
  games: Game[],
  neutralValue: number
): Map<string, ScheduleStrength> {
  const ratings = new Map(teams.map(t => [t.id, t.rating]));
  const rows = teams.map(t => ({ teamId: t.id, ...scheduleStrength(t.id, games, ratings, neutralValue) }));
  rows.sort((a, b) => b.sos - a.sos || a.teamId.localeCompare(b.teamId));

  return new Map(rows.map((row, index) => [row.teamId, { ...row, sosRank: index + 1 }]));
}
