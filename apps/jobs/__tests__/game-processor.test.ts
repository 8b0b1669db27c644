// Game processing: rating updates, validation and ordering

import { InvalidGameError, OutOfOrderProcessingError } from '../src/errors';
import { AccuracyEvaluator, GameEvaluation } from '../src/predictions/accuracy-evaluator';
import { PredictionService } from '../src/predictions/prediction-service';
import { GameProcessor } from '../src/ratings/game-processor';
import { InMemoryRatingStore } from '../src/store/InMemoryRatingStore';
import { Game, GameInput, Team } from '../src/types';
import { SEASON, config, fixedClock, fixture, makeTeam, played, storeWith } from './support/builders';

function processorFor(store: InMemoryRatingStore): GameProcessor {
  return new GameProcessor(store, new AccuracyEvaluator(store), config);
}

async function setup(teams: Team[], games: GameInput[]) {
  const store = await storeWith(teams, games);
  return { store, processor: processorFor(store) };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to be rejected');
}

describe('GameProcessor', () => {
  describe('rating updates', () => {
    test('even teams, home win by 14', async () => {
      const { store, processor } = await setup(
        [makeTeam('a'), makeTeam('b')],
        [played('g1', 1, 'a', 'b', 28, 14)]
      );

      const result = await processor.process('g1');

      expect(result.winnerId).toBe('a');
      expect(result.loserId).toBe('b');
      expect(result.winnerExpected).toBeCloseTo(0.592466, 5);
      expect(result.homeDelta).toBeCloseTo(31.667083, 4);
      expect(result.awayDelta).toBe(-result.homeDelta);
      expect(result.homeDelta + result.awayDelta).toBe(0);

      const home = await store.getTeam(SEASON, 'a');
      const away = await store.getTeam(SEASON, 'b');
      expect(home?.rating).toBeCloseTo(1531.667083, 4);
      expect(away?.rating).toBeCloseTo(1468.332917, 4);
      expect([home?.wins, home?.losses, away?.wins, away?.losses]).toEqual([1, 0, 0, 1]);

      const game = await store.getGame('g1');
      expect(game?.isProcessed).toBe(true);
      expect(game?.homeRatingDelta).toBe(result.homeDelta);
      expect(game?.awayRatingDelta).toBe(result.awayDelta);
    });

    test('road win against home field advantage gains more', async () => {
      const { processor } = await setup([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 14, 21)]);

      const result = await processor.process('g1');

      expect(result.winnerId).toBe('b');
      expect(result.awayDelta).toBeCloseTo(40.624226, 4);
      expect(result.homeDelta).toBeCloseTo(-40.624226, 4);
    });

    test('neutral site removes home field advantage', async () => {
      const { processor } = await setup(
        [makeTeam('a'), makeTeam('b')],
        [played('g1', 1, 'a', 'b', 28, 14, { neutralSite: true })]
      );

      const result = await processor.process('g1');

      expect(result.winnerExpected).toBe(0.5);
      expect(result.homeDelta).toBeCloseTo(40, 10);
    });

    test('top-tier win over a sub-division team moves half as much', async () => {
      const { processor } = await setup(
        [makeTeam('a'), makeTeam('b'), makeTeam('c'), makeTeam('fcs', 1500, 'FCS')],
        [
          played('g1', 1, 'a', 'b', 28, 14, { neutralSite: true }),
          played('g2', 1, 'c', 'fcs', 28, 14, { neutralSite: true }),
        ]
      );

      const sameTier = await processor.process('g1');
      const subDivision = await processor.process('g2');

      expect(subDivision.tierMultiplier).toBe(0.5);
      expect(subDivision.homeDelta).toBeCloseTo(sameTier.homeDelta / 2, 10);
    });

    test('lopsided mismatch barely moves the favourite', async () => {
      const { processor } = await setup(
        [makeTeam('big', 1700), makeTeam('small', 1300)],
        [played('g1', 1, 'big', 'small', 24, 21, { neutralSite: true })]
      );

      const result = await processor.process('g1');

      expect(result.homeDelta).toBeCloseTo(3.412417, 5);
    });

    test('current rating = initial rating + sum of deltas', async () => {
      const { store, processor } = await setup(
        [makeTeam('a', 1550), makeTeam('b', 1480), makeTeam('c', 1420, 'G5')],
        [
          played('g1', 1, 'a', 'b', 31, 17),
          played('g2', 2, 'c', 'a', 27, 24),
          played('g3', 3, 'b', 'c', 10, 35),
          played('g4', 4, 'a', 'c', 42, 0, { neutralSite: true }),
        ]
      );

      const batch = await processor.processPending(SEASON);
      expect(batch.failure).toBeNull();
      expect(batch.processed.map(r => r.gameId)).toEqual(['g1', 'g2', 'g3', 'g4']);

      const games = await store.listGames({ season: SEASON, processed: true });
      for (const team of await store.listTeams(SEASON)) {
        const deltas = games.reduce((sum: number, g: Game) => {
          if (g.homeTeamId === team.id) return sum + g.homeRatingDelta;
          if (g.awayTeamId === team.id) return sum + g.awayRatingDelta;
          return sum;
        }, 0);
        expect(team.rating).toBeCloseTo(team.initialRating + deltas, 9);
      }

      const total = (await store.listTeams(SEASON)).reduce((sum, t) => sum + t.rating, 0);
      expect(total).toBeCloseTo(1550 + 1480 + 1420, 9);
    });

    test('results depend on the order games are applied', async () => {
      const inOrder = await setup(
        [makeTeam('a'), makeTeam('b')],
        [played('g1', 1, 'a', 'b', 24, 21), played('g2', 2, 'b', 'a', 35, 14)]
      );
      const reversed = await setup(
        [makeTeam('a'), makeTeam('b')],
        [played('g1', 2, 'a', 'b', 24, 21), played('g2', 1, 'b', 'a', 35, 14)]
      );

      await inOrder.processor.processPending(SEASON);
      await reversed.processor.processPending(SEASON);

      const first = await inOrder.store.getTeam(SEASON, 'a');
      const second = await reversed.store.getTeam(SEASON, 'a');
      expect(first?.rating).toBeCloseTo(1481.481586, 4);
      expect(second?.rating).toBeCloseTo(1490.390577, 4);
    });
  });

  describe('validation', () => {
    const noGames: GameInput[] = [];

    test('processing the same game twice is rejected', async () => {
      const { store, processor } = await setup([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 28, 14)]);
      await processor.process('g1');
      const after = await store.listTeams(SEASON);

      const error = await rejection(processor.process('g1'));

      expect(error).toBeInstanceOf(InvalidGameError);
      expect(error).toMatchObject({ reason: 'already-processed', code: 'INVALID_GAME' });
      expect(await store.listTeams(SEASON)).toEqual(after);
    });

    test.each([
      ['unknown game', noGames, 'missing', 'unknown-game'],
      ['scheduled game', [fixture('g1', 1, 'a', 'b')], 'g1', 'unplayed'],
      ['team against itself', [played('g1', 1, 'a', 'a', 21, 7)], 'g1', 'same-team'],
      ['week past the postseason', [played('g1', 21, 'a', 'b', 21, 7)], 'g1', 'week-out-of-range'],
      ['negative week', [played('g1', -1, 'a', 'b', 21, 7)], 'g1', 'week-out-of-range'],
      ['unseeded opponent', [played('g1', 1, 'a', 'ghost', 21, 7)], 'g1', 'missing-team'],
      ['tied score', [played('g1', 1, 'a', 'b', 17, 17)], 'g1', 'tied-score'],
      ['completed 0-0', [played('g1', 1, 'a', 'b', 0, 0)], 'g1', 'tied-score'],
    ])('%s → InvalidGameError', async (_label, games, gameId, reason) => {
      const { store, processor } = await setup([makeTeam('a'), makeTeam('b')], games);

      const error = await rejection(processor.process(gameId));

      expect(error).toBeInstanceOf(InvalidGameError);
      expect(error).toMatchObject({ gameId, reason });
      expect((await store.getTeam(SEASON, 'a'))?.rating).toBe(1500);
      expect((await store.getGame(gameId))?.isProcessed ?? false).toBe(false);
    });

    test('a shutout with an explicit final score is processed', async () => {
      const { processor } = await setup([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 0, 3)]);

      const result = await processor.process('g1');

      expect(result.winnerId).toBe('b');
    });
  });

  describe('chronological order', () => {
    test('a game earlier than a processed game of either team is rejected', async () => {
      const { store, processor } = await setup(
        [makeTeam('a'), makeTeam('b'), makeTeam('c')],
        [played('g2', 2, 'a', 'b', 21, 14), played('g1', 1, 'c', 'a', 17, 10)]
      );
      await processor.process('g2');

      const error = await rejection(processor.process('g1'));

      expect(error).toBeInstanceOf(OutOfOrderProcessingError);
      expect(error).toMatchObject({
        gameId: 'g1',
        teamId: 'a',
        latestProcessed: { gameId: 'g2', week: 2, gameDate: null },
      });
      expect((await store.getTeam(SEASON, 'c'))?.rating).toBe(1500);
    });

    test('kickoff time orders games within a week', async () => {
      const { processor } = await setup(
        [makeTeam('a'), makeTeam('b'), makeTeam('c')],
        [
          played('late', 5, 'a', 'b', 21, 14, { gameDate: new Date('2024-09-28T23:30:00Z') }),
          played('early', 5, 'c', 'a', 24, 20, { gameDate: new Date('2024-09-28T16:00:00Z') }),
        ]
      );
      await processor.process('late');

      await expect(processor.process('early')).rejects.toBeInstanceOf(OutOfOrderProcessingError);
    });

    test('games of unrelated teams may be processed in any order', async () => {
      const { processor } = await setup(
        [makeTeam('a'), makeTeam('b'), makeTeam('c'), makeTeam('d')],
        [played('g2', 2, 'a', 'b', 21, 14), played('g1', 1, 'c', 'd', 17, 10)]
      );
      await processor.process('g2');

      await expect(processor.process('g1')).resolves.toMatchObject({ winnerId: 'c' });
    });
  });

  describe('atomicity', () => {
    test('a failure after the ratings change rolls the whole game back', async () => {
      class FailingEvaluator extends AccuracyEvaluator {
        async evaluate(): Promise<GameEvaluation | null> {
          throw new Error('evaluation unavailable');
        }
      }
      const store = await storeWith([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 28, 14)]);
      const processor = new GameProcessor(store, new FailingEvaluator(store), config);

      await expect(processor.process('g1')).rejects.toThrow('evaluation unavailable');

      expect((await store.getTeam(SEASON, 'a'))?.rating).toBe(1500);
      expect((await store.getTeam(SEASON, 'b'))?.losses).toBe(0);
      const game = await store.getGame('g1');
      expect(game?.isProcessed).toBe(false);
      expect(game?.homeRatingDelta).toBe(0);
    });
  });

  describe('prediction grading', () => {
    test('the stored prediction is graded in the same step', async () => {
      const { store, processor } = await setup([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 28, 14)]);
      await new PredictionService(store, config, fixedClock).predict('g1');

      const result = await processor.process('g1');

      expect(result.evaluation).toMatchObject({ predictedWinnerId: 'a', actualWinnerId: 'a', wasCorrect: true });
      expect((await store.getPrediction('g1'))?.wasCorrect).toBe(true);
    });

    test('games without a prediction have no evaluation', async () => {
      const { processor } = await setup([makeTeam('a'), makeTeam('b')], [played('g1', 1, 'a', 'b', 28, 14)]);
      expect((await processor.process('g1')).evaluation).toBeNull();
    });
  });

  describe('processPending', () => {
    test('stops at the first rejected game and keeps earlier results', async () => {
      const { store, processor } = await setup(
        [makeTeam('a'), makeTeam('b'), makeTeam('c'), makeTeam('d')],
        [
          played('g1', 1, 'a', 'b', 21, 14),
          fixture('g2', 2, 'a', 'c'),
          played('g3', 2, 'c', 'd', 10, 10),
          played('g4', 3, 'b', 'd', 30, 3),
        ]
      );

      const batch = await processor.processPending(SEASON);

      expect(batch.processed.map(r => r.gameId)).toEqual(['g1']);
      expect(batch.failure?.gameId).toBe('g3');
      expect(batch.failure?.error).toMatchObject({ reason: 'tied-score' });
      expect((await store.getGame('g4'))?.isProcessed).toBe(false);
      expect((await store.getGame('g1'))?.isProcessed).toBe(true);
    });

    test('throughWeek limits the batch', async () => {
      const { processor } = await setup(
        [makeTeam('a'), makeTeam('b')],
        [played('g1', 1, 'a', 'b', 21, 14), played('g2', 2, 'b', 'a', 21, 14)]
      );

      const batch = await processor.processPending(SEASON, 1);

      expect(batch.processed.map(r => r.gameId)).toEqual(['g1']);
      expect(batch.failure).toBeNull();
    });
  });
});
