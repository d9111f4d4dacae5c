/**
 * Typed Event Emitter for the Nertz engine.
 *
 * Provides a type-safe, zero-dependency event emitter for turn
 * lifecycle events. The engine emits these at key points; the
 * visualization layer, transcript tools and tests subscribe to them.
 */

import type { CardSnapshot } from './TranscriptTypes';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted once a new game has been dealt.
 */
export interface GameStartedPayload {
  readonly playerCount: number;
}

/**
 * Emitted when a new turn begins.
 */
export interface TurnStartedPayload {
  /** Turn number (1-based: the counter is incremented first). */
  readonly turnNumber: number;
}

/**
 * Emitted for each player's selected move, before conflict resolution.
 */
export interface MoveChosenPayload {
  readonly turnNumber: number;
  readonly playerIndex: number;
  /** Move kind, e.g. 'nertz-to-foundation'. */
  readonly kind: string;
  readonly card: CardSnapshot | null;
  readonly priority: number;
  readonly distance: number;
  /** How many legal moves the player had to pick from. */
  readonly legalMoveCount: number;
}

/**
 * Emitted when several players targeted the same foundation.
 */
export interface ConflictResolvedPayload {
  readonly turnNumber: number;
  readonly foundationId: string;
  readonly winnerIndex: number;
  readonly discardedCount: number;
}

/**
 * Emitted after a move has been applied to the piles.
 */
export interface MoveExecutedPayload {
  readonly turnNumber: number;
  readonly playerIndex: number;
  readonly kind: string;
  readonly card: CardSnapshot | null;
  /** Target foundation, for foundation moves. */
  readonly foundationId?: string;
}

/**
 * Emitted when final scores have been recorded.
 */
export interface GameEndedPayload {
  /** Final turn number. */
  readonly finalTurnNumber: number;
  /** Index of the winning player. */
  readonly winnerIndex: number;
  /** Per-player scores, indexed by player. */
  readonly scores: readonly number[];
  /** Optional human-readable reason (e.g. "Player 2 emptied their nertz pile"). */
  readonly reason?: string;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'game-started': GameStartedPayload;
  'turn-started': TurnStartedPayload;
  'move-chosen': MoveChosenPayload;
  'conflict-resolved': ConflictResolvedPayload;
  'move-executed': MoveExecutedPayload;
  'game-ended': GameEndedPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

type ListenerTable = {
  [K in GameEventName]: Array<GameEventListener<K>>;
};

function emptyListenerTable(): ListenerTable {
  return {
    'game-started': [],
    'turn-started': [],
    'move-chosen': [],
    'conflict-resolved': [],
    'move-executed': [],
    'game-ended': [],
  };
}

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for game lifecycle events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('turn-started', (payload) => {
 *   console.log(`Turn ${payload.turnNumber} started`);
 * });
 * emitter.emit('turn-started', { turnNumber: 1 });
 * ```
 */
export class GameEventEmitter {
  private listeners: ListenerTable = emptyListenerTable();

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    list.push(listener);

    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const wrapper: GameEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    if (list.length === 0) return;

    // Copy the array so listeners can safely unsubscribe during emission
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }
}
