import { describe, it, expect, vi } from 'vitest';
import type { GameEndedPayload } from '../../src/core-engine/GameEventEmitter';
import { NertzEngine, selectBestMove } from '../../src/nertz/NertzEngine';
import type { Move } from '../../src/nertz/Move';
import { GameNotStartedError, GameOverError } from '../../src/nertz/NertzErrors';
import { collectViolations } from '../../src/nertz/NertzInvariants';
import type { PlayerPiles } from '../../src/nertz/PlayerPiles';
import { c, piles } from './fixtures';

/** Empty every pile of one player so a test can lay out the cards it needs. */
function clearPiles(p: PlayerPiles): void {
  for (const pile of [p.deck, p.stream, ...p.river, p.nertz, p.lake]) {
    pile.clear();
  }
}

function scored(playerIndex: number, priority: number, distance: number): Move {
  return {
    playerIndex,
    kind: 'deck-flip',
    source: 'deck',
    destination: 'deck',
    card: null,
    distance,
    priority,
  };
}

describe('selectBestMove', () => {
  it('should maximise priority + distance', () => {
    const a = scored(0, 0.5, 0);
    const b = scored(0, 0.4, 0.2);
    expect(selectBestMove([a, b])).toBe(b);
  });

  it('should keep the first of equal scores', () => {
    const a = scored(0, 0.3, 0.1);
    const b = scored(0, 0.4, 0);
    expect(selectBestMove([a, b])).toBe(a);
  });

  it('should return undefined for no moves', () => {
    expect(selectBestMove([])).toBeUndefined();
  });
});

describe('NertzEngine', () => {
  describe('before the first game', () => {
    it('should refuse to play a turn', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 1 });
      expect(() => engine.playTurn()).toThrow(GameNotStartedError);
      expect(() => engine.getSnapshot()).toThrow('Game has not been started.');
    });

    it('should not report game over', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 1 });
      expect(engine.isGameOver()).toBe(false);
      expect(engine.isStarted()).toBe(false);
    });

    it('should reject player names that do not match the player count', () => {
      expect(
        () => new NertzEngine({ playerCount: 2, playerNames: ['a', 'b', 'c'] }),
      ).toThrow('Got 3 player names for 2 players');
    });

    it('should reject a non-positive player count', () => {
      expect(() => new NertzEngine({ playerCount: 0 })).toThrow(
        'playerCount must be a positive integer, got 0',
      );
    });
  });

  describe('startNewGame', () => {
    it('should deal every player a starting hand', () => {
      const engine = new NertzEngine({ playerCount: 4, seed: 42 });
      engine.startNewGame();

      const snapshot = engine.getSnapshot();
      expect(snapshot.turnNumber).toBe(0);
      expect(snapshot.gameOver).toBe(false);
      expect(snapshot.foundations).toEqual([]);
      expect(snapshot.players).toHaveLength(4);
      for (const player of snapshot.players) {
        expect(player.nertzCount).toBe(13);
        expect(player.deckCount).toBe(32);
        expect(player.streamCount).toBe(3);
        expect(player.river.map((slot) => slot.length)).toEqual([1, 1, 1, 1]);
        expect(player.lakeCount).toBe(0);
        expect(player.score).toBe(0);
      }
      expect(snapshot.players[0].position).toEqual({ x: 0.98, y: 0.5 });
      expect(snapshot.players[0].name).toBe('Player 1');
    });

    it('should use the given player names', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 1, playerNames: ['Ada', 'Bo'] });
      engine.startNewGame();
      expect(engine.getSnapshot().players.map((p) => p.name)).toEqual(['Ada', 'Bo']);
    });

    it('should emit game-started', () => {
      const engine = new NertzEngine({ playerCount: 3, seed: 1 });
      const listener = vi.fn();
      engine.events.on('game-started', listener);
      engine.startNewGame();
      expect(listener).toHaveBeenCalledWith({ playerCount: 3 });
    });

    it('should start over with a fresh table', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 5 });
      engine.startNewGame();
      for (let i = 0; i < 10; i++) engine.playTurn();

      engine.startNewGame();

      const snapshot = engine.getSnapshot();
      expect(snapshot.turnNumber).toBe(0);
      expect(snapshot.foundations).toEqual([]);
      expect(snapshot.players.every((p) => p.lakeCount === 0)).toBe(true);
    });
  });

  describe('playTurn', () => {
    it('should advance the turn counter', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 3 });
      engine.startNewGame();

      expect(engine.playTurn().turnNumber).toBe(1);
      expect(engine.playTurn().turnNumber).toBe(2);
      expect(engine.getSnapshot().turnNumber).toBe(2);
    });

    it('should choose one move per player and execute the survivors', () => {
      const engine = new NertzEngine({ playerCount: 4, seed: 8 });
      engine.startNewGame();

      for (let i = 0; i < 10; i++) {
        const turn = engine.playTurn();
        expect(turn.chosen.map((m) => m.playerIndex)).toEqual([0, 1, 2, 3]);

        const discarded = turn.conflicts.reduce((n, conflict) => n + conflict.discarded.length, 0);
        expect(turn.executed).toHaveLength(turn.chosen.length - discarded);
      }
    });

    it('should emit turn, choice and execution events', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 4 });
      const started = vi.fn();
      const chosen = vi.fn();
      const executed = vi.fn();
      engine.events.on('turn-started', started);
      engine.events.on('move-chosen', chosen);
      engine.events.on('move-executed', executed);

      engine.startNewGame();
      const turn = engine.playTurn();

      expect(started).toHaveBeenCalledWith({ turnNumber: 1 });
      expect(chosen).toHaveBeenCalledTimes(2);
      expect(executed).toHaveBeenCalledTimes(turn.executed.length);
    });

    it('should be deterministic for a seed', () => {
      const a = new NertzEngine({ playerCount: 3, seed: 2024 });
      const b = new NertzEngine({ playerCount: 3, seed: 2024 });
      a.startNewGame();
      b.startNewGame();
      // Fewer turns than nertz cards, so neither game can end
      for (let i = 0; i < 12; i++) {
        a.playTurn();
        b.playTurn();
      }
      expect(a.getSnapshot()).toEqual(b.getSnapshot());
    });

    it('should keep the table consistent turn after turn', () => {
      const engine = new NertzEngine({ playerCount: 4, seed: 77 });
      engine.startNewGame();
      for (let i = 0; i < 100 && !engine.isGameOver(); i++) {
        engine.playTurn();
        expect(collectViolations(engine.getSession())).toEqual([]);
      }
    });

    it('should let two players start foundations of different suits in one turn', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 31 });
      engine.startNewGame();
      const session = engine.getSession();
      const p0 = piles(session, 0);
      const p1 = piles(session, 1);
      clearPiles(p0);
      clearPiles(p1);
      p0.nertz.push(c('K', 'clubs', 0), c('A', 'hearts', 0));
      p1.nertz.push(c('K', 'clubs', 1), c('A', 'spades', 1));

      const turn = engine.playTurn();

      expect(turn.conflicts).toEqual([]);
      expect(turn.executed.map((m) => [m.playerIndex, m.kind])).toEqual([
        [0, 'nertz-to-foundation'],
        [1, 'nertz-to-foundation'],
      ]);
      expect(
        engine.getSnapshot().foundations.map((f) => [f.identifier, f.size, f.top]),
      ).toEqual([
        ['foundation_0_hearts', 1, { rank: 'A', suit: 'hearts', owner: 0 }],
        ['foundation_1_spades', 1, { rank: 'A', suit: 'spades', owner: 1 }],
      ]);
      expect(p0.lake.toArray()).toEqual([c('A', 'hearts', 0)]);
      expect(p1.lake.toArray()).toEqual([c('A', 'spades', 1)]);
    });

    it('should let only one of two players racing for a foundation play', () => {
      // Centred foundations: rng 0.5 means no jitter, so both players
      // sit 0.48 from the foundation and tie on priority and distance
      const engine = new NertzEngine({ playerCount: 2, rng: () => 0.5 });
      engine.startNewGame();
      const session = engine.getSession();
      const p0 = piles(session, 0);
      const p1 = piles(session, 1);
      clearPiles(p0);
      clearPiles(p1);
      const hearts = session.foundations.create(c('A', 'hearts', 0), 0);
      session.layout.reserveFoundationPosition(hearts.identifier);
      p0.lake.push(c('A', 'hearts', 0));
      p0.nertz.push(c('K', 'clubs', 0), c('2', 'hearts', 0));
      p1.nertz.push(c('K', 'clubs', 1), c('2', 'hearts', 1));

      const turn = engine.playTurn();

      expect(turn.chosen.map((m) => m.foundationId)).toEqual([
        'foundation_0_hearts',
        'foundation_0_hearts',
      ]);
      expect(turn.chosen[0].priority).toBe(turn.chosen[1].priority);
      expect(turn.conflicts).toHaveLength(1);
      expect(turn.conflicts[0].winner.playerIndex).toBe(0);
      expect(turn.conflicts[0].discarded.map((m) => m.playerIndex)).toEqual([1]);
      expect(turn.executed.map((m) => m.playerIndex)).toEqual([0]);

      expect(hearts.cards()).toEqual([c('A', 'hearts', 0), c('2', 'hearts', 0)]);
      expect(p0.lake.toArray()).toEqual([c('A', 'hearts', 0), c('2', 'hearts', 0)]);

      // The losing move left every pile of player 1 alone
      expect(p1.nertz.toArray()).toEqual([c('K', 'clubs', 1), c('2', 'hearts', 1)]);
      expect(p1.lake.isEmpty()).toBe(true);
      expect(p1.deck.isEmpty()).toBe(true);
      expect(p1.stream.isEmpty()).toBe(true);
      expect(p1.river.every((slot) => slot.isEmpty())).toBe(true);
    });

    it('should play a single-player game', () => {
      const engine = new NertzEngine({ playerCount: 1, seed: 9 });
      engine.startNewGame();
      const turn = engine.playTurn();
      expect(turn.chosen).toHaveLength(1);
      expect(turn.conflicts).toEqual([]);
    });
  });

  describe('game over', () => {
    function finishedEngine(): NertzEngine {
      const engine = new NertzEngine({ playerCount: 2, seed: 6 });
      engine.startNewGame();
      piles(engine.getSession(), 1).nertz.clear();
      return engine;
    }

    it('should be detected from an empty nertz pile', () => {
      const engine = finishedEngine();
      expect(engine.isGameOver()).toBe(true);
      expect(engine.getSnapshot().gameOver).toBe(true);
    });

    it('should throw GameOverError after scoring the game', () => {
      const engine = finishedEngine();
      expect(() => engine.playTurn()).toThrow(GameOverError);
      // Player 0 still holds 13 nertz cards and no lake; player 1 has nothing
      expect(engine.getSnapshot().players.map((p) => p.score)).toEqual([-26, 0]);
    });

    it('should apply final scores only once', () => {
      const engine = finishedEngine();
      const ended: GameEndedPayload[] = [];
      engine.events.on('game-ended', (payload) => ended.push(payload));

      expect(() => engine.playTurn()).toThrow(GameOverError);
      expect(() => engine.playTurn()).toThrow(GameOverError);
      expect(engine.finalizeScores()).toEqual([-26, 0]);

      expect(engine.getSnapshot().players.map((p) => p.score)).toEqual([-26, 0]);
      expect(ended).toEqual([
        {
          finalTurnNumber: 0,
          winnerIndex: 1,
          scores: [-26, 0],
          reason: 'Player 2 emptied their nertz pile',
        },
      ]);
    });

    it('should count lake cards in the score', () => {
      const engine = new NertzEngine({ playerCount: 1, seed: 6 });
      engine.startNewGame();
      const p = piles(engine.getSession(), 0);
      p.nertz.clear();
      p.lake.push(c('A', 'spades'), c('2', 'spades'));

      expect(engine.finalizeScores()).toEqual([2]);
    });
  });

  describe('runGame', () => {
    it('should stop at the turn cap', () => {
      const engine = new NertzEngine({ playerCount: 3, seed: 12 });
      const result = engine.runGame(5);

      // One move per player per turn cannot empty 13 nertz cards in 5 turns
      expect(result.completed).toBe(false);
      expect(result.turnsPlayed).toBe(5);
      expect(result.finalScores).toHaveLength(3);
      expect(result.winner).toBe(
        result.finalScores.indexOf(Math.max(...result.finalScores)),
      );
      expect(result.foundationsCreated).toBe(engine.getSnapshot().foundations.length);
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should report every turn it plays', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 12 });
      const turns: number[] = [];
      engine.runGame(4, (turn) => turns.push(turn.turnNumber));
      expect(turns).toEqual([1, 2, 3, 4]);
    });

    it('should finish a game that is already over without playing', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 6 });
      engine.startNewGame();
      piles(engine.getSession(), 0).nertz.clear();

      const result = engine.runGame(10);

      expect(result.completed).toBe(true);
      expect(result.turnsPlayed).toBe(0);
      expect(result.finalScores).toEqual([0, -26]);
      expect(result.winner).toBe(0);
    });

    it('should deal a new game once the previous one was scored', () => {
      const engine = new NertzEngine({ playerCount: 2, seed: 12 });
      engine.runGame(3);
      const second = engine.runGame(2);
      expect(second.turnsPlayed).toBe(2);
    });
  });
});
