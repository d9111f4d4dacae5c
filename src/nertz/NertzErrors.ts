/**
 * Error classes thrown by the Nertz engine.
 *
 * Move-level errors (validation, card mismatch, bad pile reference)
 * mean the turn pipeline broke an invariant and are fatal to the
 * turn. Lifecycle errors (not started, game over) can be probed for
 * and avoided by the caller.
 */

import type { Card } from '../card-system/Card';
import { formatCard } from '../card-system/Card';

/** Base class for every error the engine throws. */
export class NertzEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A move broke the rules or does not fit the current state. */
export class InvalidMoveError extends NertzEngineError {
  readonly playerIndex: number | undefined;

  constructor(message: string, playerIndex?: number) {
    const prefix = playerIndex !== undefined ? `Player ${playerIndex}: ` : '';
    super(`${prefix}${message}`);
    this.playerIndex = playerIndex;
  }
}

/** A move is missing a field its pile kinds require. */
export class MoveValidationError extends InvalidMoveError {}

/** The card at the source pile is not the card the move recorded. */
export class CardMismatchError extends InvalidMoveError {
  readonly expected: Card | null;
  readonly actual: Card | null;
  readonly pileName: string;

  constructor(
    expected: Card | null,
    actual: Card | null,
    pileName: string,
    playerIndex?: number,
  ) {
    super(
      `Card mismatch at ${pileName}: expected ${formatCard(expected)}, got ${formatCard(actual)}`,
      playerIndex,
    );
    this.expected = expected;
    this.actual = actual;
    this.pileName = pileName;
  }
}

/** A pile reference (usually a foundation id) is not usable. */
export class InvalidPileError extends InvalidMoveError {
  readonly pileName: string;

  constructor(pileName: string, reason: string = 'does not exist', playerIndex?: number) {
    super(`Invalid pile '${pileName}': ${reason}`, playerIndex);
    this.pileName = pileName;
  }
}

/** A turn was requested before `startNewGame()`. */
export class GameNotStartedError extends NertzEngineError {
  constructor() {
    super('Game has not been started.');
  }
}

/** A turn was requested after a nertz pile emptied. */
export class GameOverError extends NertzEngineError {
  constructor() {
    super('Game is over. Cannot play further turns.');
  }
}
