import { describe, it, expect } from 'vitest';
import { createSeededRng } from '../../src/card-system/Deck';
import { pilesOf, resolvePlayers, setupNertzGame } from '../../src/nertz/NertzGameState';

describe('resolvePlayers', () => {
  it('should default to numbered players', () => {
    expect(resolvePlayers(2)).toEqual([{ name: 'Player 1' }, { name: 'Player 2' }]);
  });

  it('should use one name per player', () => {
    expect(resolvePlayers(2, ['Ada', 'Bo'])).toEqual([{ name: 'Ada' }, { name: 'Bo' }]);
  });

  it('should reject too many or too few names', () => {
    expect(() => resolvePlayers(2, ['a', 'b', 'c'])).toThrow(RangeError);
    expect(() => resolvePlayers(3, ['a'])).toThrow('Got 1 player names for 3 players');
  });
});

describe('setupNertzGame', () => {
  it('should deal every player and leave the game not started', () => {
    const session = setupNertzGame({ playerCount: 3, rng: createSeededRng(4) });

    expect(session.gameState.phase).toBe('not-started');
    expect(session.gameState.playerStates).toHaveLength(3);
    expect(session.layout.playerCount).toBe(3);
    expect(session.foundations.size).toBe(0);
    expect(pilesOf(session, 2).nertz.size()).toBe(13);
  });

  it('should not let player names change the player count', () => {
    expect(() =>
      setupNertzGame({ playerCount: 2, playerNames: ['a', 'b', 'c'], rng: createSeededRng(1) }),
    ).toThrow('Got 3 player names for 2 players');
  });

  it('should reject an unknown player index', () => {
    const session = setupNertzGame({ playerCount: 1, rng: createSeededRng(1) });
    expect(() => pilesOf(session, 1)).toThrow('No player with index 1');
  });
});
