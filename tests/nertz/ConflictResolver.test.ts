import { describe, it, expect, vi } from 'vitest';
import { createSilentLogger } from '../../src/core-engine/Logger';
import {
  ConflictResolver,
  canConflict,
  compareCompetingMoves,
} from '../../src/nertz/ConflictResolver';
import type { Move } from '../../src/nertz/Move';
import { c } from './fixtures';

function foundationMove(
  playerIndex: number,
  priority: number,
  distance: number,
  foundationId: string = 'foundation_0_hearts',
): Move {
  return {
    playerIndex,
    kind: 'river-to-foundation',
    source: 'river',
    destination: 'foundation',
    card: c('5', 'hearts', playerIndex),
    distance,
    priority,
    foundationId,
    sourceSlot: 0,
  };
}

function flip(playerIndex: number): Move {
  return {
    playerIndex,
    kind: 'deck-flip',
    source: 'deck',
    destination: 'deck',
    card: null,
    distance: 0,
    priority: 0.1,
  };
}

function aceMove(playerIndex: number): Move {
  return {
    playerIndex,
    kind: 'nertz-to-foundation',
    source: 'nertz',
    destination: 'foundation',
    card: c('A', 'hearts', playerIndex),
    distance: 0.48,
    priority: 2.4,
    foundationId: `foundation_${playerIndex}_hearts`,
  };
}

describe('canConflict', () => {
  it('should only flag non-Ace foundation moves', () => {
    expect(canConflict(foundationMove(0, 0.5, 0.2))).toBe(true);
    expect(canConflict(aceMove(0))).toBe(false);
    expect(canConflict(flip(0))).toBe(false);
  });
});

describe('compareCompetingMoves', () => {
  it('should order by priority, then distance, then player', () => {
    const moves = [
      foundationMove(2, 0.5, 0.2),
      foundationMove(1, 0.5, 0.1),
      foundationMove(0, 0.5, 0.2),
      foundationMove(3, 0.9, 0.4),
    ];
    expect([...moves].sort(compareCompetingMoves).map((m) => m.playerIndex)).toEqual([
      3, 1, 0, 2,
    ]);
  });
});

describe('ConflictResolver', () => {
  it('should pass every move through when nothing collides', () => {
    const chosen = [flip(0), foundationMove(1, 0.5, 0.2), aceMove(2)];
    const { executable, conflicts } = new ConflictResolver().resolve(chosen);

    // Pass-through moves first, then the lone foundation move
    expect(executable.map((m) => m.playerIndex)).toEqual([0, 2, 1]);
    expect(conflicts).toEqual([]);
  });

  it('should keep the higher priority move', () => {
    const low = foundationMove(0, 0.4, 0.1);
    const high = foundationMove(1, 0.5, 0.4);
    const { executable, conflicts } = new ConflictResolver().resolve([low, high]);

    expect(executable).toEqual([high]);
    expect(conflicts).toEqual([
      { foundationId: 'foundation_0_hearts', winner: high, discarded: [low] },
    ]);
  });

  it('should break a priority tie by distance', () => {
    const far = foundationMove(0, 0.5, 0.3);
    const near = foundationMove(1, 0.5, 0.2);
    expect(new ConflictResolver().resolve([far, near]).executable).toEqual([near]);
  });

  it('should break a full tie by the lower player index', () => {
    const later = foundationMove(2, 0.5, 0.2);
    const earlier = foundationMove(1, 0.5, 0.2);
    expect(new ConflictResolver().resolve([later, earlier]).executable).toEqual([earlier]);
  });

  it('should resolve each foundation separately, in first-targeted order', () => {
    const spadesA = foundationMove(0, 0.5, 0.2, 'foundation_1_spades');
    const heartsA = foundationMove(1, 0.5, 0.2, 'foundation_0_hearts');
    const spadesB = foundationMove(2, 0.9, 0.2, 'foundation_1_spades');
    const { executable, conflicts } = new ConflictResolver().resolve([
      spadesA,
      heartsA,
      spadesB,
      flip(3),
    ]);

    expect(executable).toEqual([flip(3), spadesB, heartsA]);
    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].foundationId).toBe('foundation_1_spades');
    expect(conflicts[0].discarded).toEqual([spadesA]);
  });

  it('should never let two Aces collide', () => {
    const { executable, conflicts } = new ConflictResolver().resolve([aceMove(0), aceMove(1)]);
    expect(executable).toHaveLength(2);
    expect(conflicts).toEqual([]);
  });

  it('should log each conflict', () => {
    const logger = createSilentLogger();
    const info = vi.spyOn(logger, 'info');
    new ConflictResolver(logger).resolve([
      foundationMove(0, 0.5, 0.2),
      foundationMove(1, 0.4, 0.2),
      foundationMove(2, 0.3, 0.2),
    ]);

    expect(info).toHaveBeenCalledWith(
      'Conflict on foundation foundation_0_hearts. Accepted move by player 0 ' +
        '(priority=0.50, distance=0.20). 2 competing move(s) discarded.',
    );
  });
});
