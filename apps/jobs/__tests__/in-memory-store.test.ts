// In-memory store: copies, transactions and write-once rules

import { AlreadyPredictedError } from '../src/errors';
import { InMemoryRatingStore } from '../src/store/InMemoryRatingStore';
import { getTeamPair } from '../src/store/TeamRatingStore';
import { Prediction, Team } from '../src/types';
import { SEASON, fixture, makeTeam, played, storeWith } from './support/builders';

function prediction(gameId: string, week = 1): Prediction {
  return {
    gameId,
    season: SEASON,
    week,
    homeTeamId: 'a',
    awayTeamId: 'b',
    predictedWinnerId: 'a',
    predictedHomeScore: 32,
    predictedAwayScore: 28,
    winProbability: 0.59,
    confidence: 'Low',
    ratingsAtPrediction: { home: 1500, away: 1500 },
    createdAt: new Date('2024-09-01T12:00:00Z'),
    wasCorrect: null,
  };
}

const commitA = {
  gameId: 'g1',
  season: SEASON,
  winnerId: 'a',
  loserId: 'b',
  homeTeamId: 'a',
  awayTeamId: 'b',
  homeDelta: 12.5,
  awayDelta: -12.5,
};

class RecordingStore extends InMemoryRatingStore {
  readonly reads: string[] = [];

  async getTeam(season: number, teamId: string): Promise<Team | null> {
    this.reads.push(teamId);
    return super.getTeam(season, teamId);
  }
}

describe('InMemoryRatingStore', () => {
  test('returns copies, not stored records', async () => {
    const store = await storeWith([makeTeam('a')]);

    const team = await store.getTeam(SEASON, 'a');
    expect(team).not.toBeNull();
    if (team) team.rating = 9999;

    expect((await store.getTeam(SEASON, 'a'))?.rating).toBe(1500);
  });

  test('createTeam refuses duplicates', async () => {
    const store = await storeWith([makeTeam('a', 1600)]);

    expect(await store.createTeam(makeTeam('a', 1400))).toBe(false);
    expect((await store.getTeam(SEASON, 'a'))?.rating).toBe(1600);
  });

  test('commitGameResult applies ratings, record and flag together', async () => {
    const store = await storeWith([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 21, 14)]);

    await store.commitGameResult(commitA);

    expect(await store.getTeam(SEASON, 'a')).toMatchObject({ rating: 1512.5, wins: 1, losses: 0 });
    expect(await store.getTeam(SEASON, 'b')).toMatchObject({ rating: 1487.5, wins: 0, losses: 1 });
    expect(await store.getGame('g1')).toMatchObject({ isProcessed: true, homeRatingDelta: 12.5, awayRatingDelta: -12.5 });
    await expect(store.commitGameResult(commitA)).rejects.toThrow('Game g1 is already processed');
  });

  test('saveGame leaves processed games unchanged', async () => {
    const store = await storeWith([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 21, 14)]);
    await store.commitGameResult(commitA);

    const saved = await store.saveGame(played('g1', 1, 'a', 'b', 0, 35));

    expect(saved.result).toEqual({ status: 'completed', homeScore: 21, awayScore: 14 });
    expect(saved.isProcessed).toBe(true);
  });

  test('saveGame updates unprocessed fixtures', async () => {
    const store = await storeWith([], [fixture('g1', 1, 'a', 'b')]);

    const saved = await store.saveGame(played('g1', 1, 'a', 'b', 10, 3));

    expect(saved.result).toEqual({ status: 'completed', homeScore: 10, awayScore: 3 });
    expect(saved.isProcessed).toBe(false);
  });

  test('listGames is in schedule order', async () => {
    const store = await storeWith(
      [],
      [
        fixture('late', 2, 'a', 'b', { gameDate: new Date('2024-09-07T23:00:00Z') }),
        fixture('early', 2, 'c', 'd', { gameDate: new Date('2024-09-07T16:00:00Z') }),
        fixture('undated', 2, 'e', 'f'),
        fixture('opener', 1, 'a', 'c'),
      ]
    );

    const games = await store.listGames({ season: SEASON });
    expect(games.map(g => g.id)).toEqual(['opener', 'undated', 'early', 'late']);

    const forA = await store.listGames({ season: SEASON, teamId: 'a', throughWeek: 1 });
    expect(forA.map(g => g.id)).toEqual(['opener']);
  });

  test('transaction rolls back on error', async () => {
    const store = await storeWith([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 21, 14)]);

    await expect(
      store.transaction(async (tx) => {
        await tx.commitGameResult(commitA);
        await tx.insertPrediction(prediction('g2'));
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect((await store.getTeam(SEASON, 'a'))?.rating).toBe(1500);
    expect((await store.getGame('g1'))?.isProcessed).toBe(false);
    expect(await store.getPrediction('g2')).toBeNull();
  });

  test('transaction keeps writes on success', async () => {
    const store = await storeWith([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 21, 14)]);

    const result = await store.transaction(async (tx) => {
      await tx.commitGameResult(commitA);
      return 'done';
    });

    expect(result).toBe('done');
    expect((await store.getTeam(SEASON, 'a'))?.rating).toBe(1512.5);
  });

  test('duplicate prediction → AlreadyPredictedError', async () => {
    const store = await storeWith([]);
    await store.insertPrediction(prediction('g1'));

    await expect(store.insertPrediction(prediction('g1'))).rejects.toThrow(AlreadyPredictedError);
  });

  test('evaluation is recorded once', async () => {
    const store = await storeWith([]);
    await store.insertPrediction(prediction('g1'));

    expect(await store.recordEvaluation('g1', true)).toBe(true);
    expect(await store.recordEvaluation('g1', false)).toBe(false);
    expect(await store.recordEvaluation('missing', true)).toBe(false);
    expect((await store.getPrediction('g1'))?.wasCorrect).toBe(true);

    await store.insertPrediction(prediction('g2', 2));
    const graded = await store.listPredictions({ season: SEASON, evaluatedOnly: true });
    expect(graded.map(p => p.gameId)).toEqual(['g1']);
  });

  test('reference rankings ignore repeats', async () => {
    const store = await storeWith([]);
    const entry = { season: SEASON, week: 3, teamId: 'a', rank: 7, pollName: 'AP Top 25' };

    expect(await store.saveReferenceRankings([entry, { ...entry, teamId: 'b', rank: 9 }])).toBe(2);
    expect(await store.saveReferenceRankings([{ ...entry, rank: 1 }])).toBe(0);
    expect(await store.getReferenceRank(SEASON, 3, 'a')).toBe(7);
    expect(await store.getReferenceRank(SEASON, 4, 'a')).toBeNull();
  });

  test('team pairs are read in id order whichever side is home', async () => {
    const store = new RecordingStore();
    await store.createTeam(makeTeam('zulu', 1550));
    await store.createTeam(makeTeam('alpha', 1450));

    const pair = await getTeamPair(store, SEASON, 'zulu', 'alpha');
    const mirrored = await getTeamPair(store, SEASON, 'alpha', 'zulu');

    expect(store.reads).toEqual(['alpha', 'zulu', 'alpha', 'zulu']);
    expect([pair.home?.id, pair.away?.id]).toEqual(['zulu', 'alpha']);
    expect([mirrored.home?.id, mirrored.away?.id]).toEqual(['alpha', 'zulu']);
  });

  test('team pair reports a missing side as null', async () => {
    const store = await storeWith([makeTeam('a')]);

    const pair = await getTeamPair(store, SEASON, 'missing', 'a');

    expect(pair.home).toBeNull();
    expect(pair.away?.id).toBe('a');
  });
});
