import { describe, it, expect, vi } from 'vitest';
import { describeBreakdown, playCribbageGame, runSimulation, summarizeRun } from './cribbageSimulation';
import type { CribbagePolicy } from './cribbageBotLogic';
import { createMemorySink } from './cribbageEventLog';
import type { CribbageRecordSink } from './cribbageEventLog';
import type { CribbageLogger } from './logger';
import type { GameSummaryRecord } from './cribbageTypes';
import { CRIBBAGE_WINNING_SCORE } from './cribbageTypes';
import { deriveSeed } from './cribbageRng';

const now = () => new Date('2024-05-01T12:00:00Z');

const summary = (gameId: number, winnerPlayerId: string, handsPlayed: number, seed: number | null): GameSummaryRecord => ({
  gameId,
  winnerPlayerId,
  players: [],
  handsPlayed,
  seed,
  timestamp: '2024-05-01T12:00:00Z',
});

describe('describeBreakdown', () => {
  it('names pegging scores', () => {
    expect(describeBreakdown({ 'play-fifteen': 2, 'play-run': 3 })).toBe('15 for 2, run of 3 for 3');
    expect(describeBreakdown({ 'play-pair': 6 })).toBe('triple for 6');
    expect(describeBreakdown({ heels: 2 })).toBe('his heels for 2');
  });

  it('falls back to category and points for counted hands', () => {
    expect(describeBreakdown({ fifteens: 4, pairs: 0, nobs: 1 })).toBe('fifteens 4, nobs 1');
  });
});

describe('playCribbageGame', () => {
  const play = () => playCribbageGame({ seed: 12345, policyName: 'first-legal', now });

  it('plays to 121 and stops', () => {
    const { state, summary: result, hands } = play();
    const scores = result.players.map(p => p.score);

    expect(state.phase).toBe('complete');
    expect(Math.max(...scores)).toBeGreaterThanOrEqual(CRIBBAGE_WINNING_SCORE);
    expect(Math.min(...scores)).toBeLessThan(CRIBBAGE_WINNING_SCORE);
    expect(result.players.find(p => p.playerId === result.winnerPlayerId)?.score).toBe(Math.max(...scores));
    expect(result.handsPlayed).toBe(hands.length);
    expect(hands.map(h => h.handNumber)).toEqual(hands.map((_, i) => i + 1));
    expect(hands.slice(0, -1).every(h => h.endedDuring === null)).toBe(true);
    expect(hands[hands.length - 1].endedDuring).not.toBeNull();
  });

  it('books every point to play or count', () => {
    for (const player of play().summary.players) {
      expect(player.playPoints + player.countPoints).toBe(player.score);
    }
  });

  it('accounts for each deal through its score events', () => {
    const before: Record<string, number> = { p1: 0, p2: 0 };
    for (const hand of play().hands) {
      for (const player of hand.players) {
        const earned = hand.scoreEvents
          .filter(e => e.playerId === player.playerId)
          .reduce((sum, e) => sum + e.points, 0);
        expect(player.scoreAfter - before[player.playerId]).toBe(earned);
        before[player.playerId] = player.scoreAfter;
      }
    }
  });

  it('is reproducible from its seed', () => {
    const a = play();
    const b = play();
    expect(b.summary).toEqual(a.summary);
    expect(b.hands).toEqual(a.hands);
  });

  it('reports each deal and the result to the sink', () => {
    const sink = createMemorySink();
    const { summary: result, hands } = playCribbageGame({ seed: 2024, sink, now });
    expect(sink.hands).toEqual(hands);
    expect(sink.games).toEqual([result]);
  });

  it('logs the start and the end of the game', () => {
    const lines: string[] = [];
    const logger: CribbageLogger = {
      log: message => lines.push(message),
      debug: () => undefined,
      error: () => undefined,
    };
    playCribbageGame({ seed: 77, players: [{ playerId: 'a', name: 'Ann' }, { playerId: 'b', name: 'Ben' }], logger, now });
    expect(lines[0]).toMatch(/^Game 1 initialized\. (Ann|Ben) deals first\.$/);
    expect(lines[lines.length - 1]).toMatch(/^GAME OVER! (Ann|Ben) wins with \d+ points after \d+ hands\.$/);
  });

  it('logs every counted combination at the detailed level', () => {
    const detailed: string[] = [];
    const logger: CribbageLogger = {
      log: (message, level) => {
        if (level === 2) detailed.push(message);
      },
      debug: () => undefined,
      error: () => undefined,
    };
    playCribbageGame({ seed: 12345, policyName: 'first-legal', logger, now });
    expect(detailed.some(line => /^ {4}15 for 2: /.test(line))).toBe(true);
    expect(detailed.some(line => /^ {2}fifteens: \d+$/.test(line))).toBe(true);
  });

  it('fails when a policy declines a legal play', () => {
    const stubborn: CribbagePolicy = {
      name: 'stubborn',
      chooseDiscards: ({ hand }) => hand.slice(0, 2),
      choosePlay: () => null,
    };
    expect(() => playCribbageGame({ seed: 1, policies: [stubborn, stubborn] })).toThrow(
      'called go while holding a playable card'
    );
  });

  it('fails when a policy discards the wrong number of cards', () => {
    const greedy: CribbagePolicy = {
      name: 'greedy',
      chooseDiscards: ({ hand }) => hand.slice(0, 1),
      choosePlay: () => null,
    };
    expect(() => playCribbageGame({ seed: 1, policies: [greedy, greedy] })).toThrow(
      'Invalid discard: expected 2 cards, got 1'
    );
  });
});

describe('summarizeRun', () => {
  it('aggregates wins, hands and seeds', () => {
    const run = summarizeRun([summary(1, 'p1', 10, 5), summary(2, 'p2', 11, null), summary(3, 'p1', 12, 7)]);
    expect(run).toEqual({
      games: 3,
      wins: { p1: 2, p2: 1 },
      winPercentage: { p1: 66.7, p2: 33.3 },
      averageHands: 11,
      seeds: [5, 7],
    });
  });

  it('handles an empty run', () => {
    expect(summarizeRun([])).toEqual({ games: 0, wins: { p1: 0, p2: 0 }, winPercentage: { p1: 0, p2: 0 }, averageHands: 0, seeds: [] });
  });
});

describe('runSimulation', () => {
  it('derives one seed per game and closes the sink', async () => {
    const memory = createMemorySink();
    const close = vi.fn(async () => undefined);
    const sink: CribbageRecordSink = { ...memory, close };

    const result = await runSimulation({ nGames: 3, baseSeed: 99, trackStates: true, policy: 'random', sink, now });

    expect(result.baseSeed).toBe(99);
    expect(result.run.games).toBe(3);
    expect(result.run.seeds).toEqual([deriveSeed(99, 1), deriveSeed(99, 2), deriveSeed(99, 3)]);
    expect(Object.values(result.run.wins).reduce((a, b) => a + b, 0)).toBe(3);
    expect(memory.games.map(g => g.gameId)).toEqual([1, 2, 3]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('plays the same games as playCribbageGame with the derived seed', async () => {
    const { summaries } = await runSimulation({ nGames: 2, baseSeed: 5, trackStates: true, policy: 'first-legal', now });
    const second = playCribbageGame({ gameId: 2, seed: deriveSeed(5, 2), policyName: 'first-legal', now });
    expect(summaries[1]).toEqual(second.summary);
  });

  it('drops seeds when state tracking is off', async () => {
    const { summaries, run } = await runSimulation({ nGames: 2, baseSeed: 5, trackStates: false, policy: 'random', now });
    expect(summaries.map(s => s.seed)).toEqual([null, null]);
    expect(run.seeds).toEqual([]);
  });
});
