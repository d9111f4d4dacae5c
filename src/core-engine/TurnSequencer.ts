/**
 * Turn sequencer for the Nertz engine.
 *
 * Nertz turns are simultaneous: every player acts in every turn, so
 * there is no player rotation. These functions manage the phase and
 * the turn counter of a GameState directly (mutation-based).
 */

import type { GamePhase, GameState } from './GameState';

// ── Query functions ─────────────────────────────────────────

/**
 * Whether turns may be played.
 */
export function isPlaying<T>(state: GameState<T>): boolean {
  return state.phase === 'in-progress';
}

// ── Mutation functions ──────────────────────────────────────

/**
 * Start the next turn: increments and returns the turn counter.
 *
 * @throws If the game has not been started.
 */
export function beginTurn<T>(state: GameState<T>): number {
  if (state.phase !== 'in-progress') {
    throw new Error('Cannot begin a turn before the game has started');
  }
  state.turnNumber++;
  return state.turnNumber;
}

/**
 * Transition the game to a new phase.
 *
 * Valid transitions:
 * - `not-started` -> `in-progress`
 *
 * A restart builds a fresh GameState rather than moving backwards.
 *
 * @throws If the transition is invalid or to the same phase.
 */
export function transitionTo<T>(
  state: GameState<T>,
  newPhase: GamePhase,
): void {
  const current = state.phase;

  if (current === newPhase) {
    throw new Error(`Game is already in phase "${current}"`);
  }

  const allowed = VALID_TRANSITIONS[current];
  if (!allowed.includes(newPhase)) {
    throw new Error(
      `Invalid phase transition: "${current}" -> "${newPhase}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ') || 'none'}`,
    );
  }

  state.phase = newPhase;
}

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<GamePhase, GamePhase[]> = {
  'not-started': ['in-progress'],
  'in-progress': [],
};

// ── Convenience ─────────────────────────────────────────────

/**
 * Start the game: resets the turn counter and enters `in-progress`.
 */
export function startGame<T>(state: GameState<T>): void {
  state.turnNumber = 0;
  transitionTo(state, 'in-progress');
}
