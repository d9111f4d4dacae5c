/**
 * Moves and the move-priority model.
 *
 * A Move is a transient value: built fresh each turn by the move
 * generator, consumed by selection, conflict resolution and
 * execution, then dropped. Its priority is computed once, at
 * construction, from a {@link MoveContext} snapshot of the
 * foundations.
 */

import type { Card, Rank, Suit } from '../card-system/Card';
import { RANKS, formatCard, rankValue } from '../card-system/Card';
import type { Foundation, FoundationId } from './Foundation';
import type { Point, TableLayout } from './TableLayout';
import { MoveValidationError } from './NertzErrors';

// ── Kinds ───────────────────────────────────────────────────

/** Where a card can come from or go to. `deck` means the stream top. */
export type PileKind = 'nertz' | 'river' | 'deck' | 'foundation';

export type MoveKind =
  | 'nertz-to-foundation'
  | 'nertz-to-river'
  | 'river-to-foundation'
  | 'deck-to-foundation'
  | 'deck-to-river'
  | 'river-to-river'
  | 'deck-flip';

// ── Priority constants ──────────────────────────────────────

/** Base priority weight per move kind. */
export const MOVE_KIND_WEIGHTS: Readonly<Partial<Record<MoveKind, number>>> = {
  'nertz-to-foundation': 1.0,
  'nertz-to-river': 0.9,
  'river-to-foundation': 0.5,
  'deck-to-foundation': 0.4,
  'deck-to-river': 0.3,
  'river-to-river': 0.3,
  'deck-flip': 0.1,
};

/** Weight for a kind missing from {@link MOVE_KIND_WEIGHTS}. */
export const DEFAULT_MOVE_WEIGHT = 0.5;

/** A move at distance 1.0 keeps 70% of its base weight. */
export const MAX_DISTANCE_PENALTY_FACTOR = 0.3;

export const UNIQUE_FOUNDATION_BONUS_MULTIPLIER = 20;

// ── Move context ────────────────────────────────────────────

/** What priority and legality checks need to know about one foundation. */
export interface FoundationSummary {
  readonly identifier: FoundationId;
  readonly suit: Suit;
  readonly topRank: Rank;
  /** Rounded table position. */
  readonly position: Point;
}

/**
 * Immutable snapshot of the foundations, taken once at the start of
 * a turn and shared by every player's move generation.
 */
export interface MoveContext {
  readonly foundations: readonly FoundationSummary[];
}

/**
 * Snapshot live foundations (in creation order) with their positions.
 */
export function createMoveContext(
  foundations: readonly Foundation[],
  layout: TableLayout,
): MoveContext {
  return Object.freeze({
    foundations: Object.freeze(
      foundations.map((f) =>
        Object.freeze({
          identifier: f.identifier,
          suit: f.suit,
          topRank: f.top().rank,
          position: layout.getFoundationPosition(f.identifier),
        }),
      ),
    ),
  });
}

// ── Move ────────────────────────────────────────────────────

export interface Move {
  readonly playerIndex: number;
  readonly kind: MoveKind;
  readonly source: PileKind;
  readonly destination: PileKind;
  /** Null only for a deck flip. */
  readonly card: Card | null;
  readonly distance: number;
  readonly priority: number;
  readonly foundationId?: FoundationId;
  readonly sourceSlot?: number;
  readonly destinationSlot?: number;
}

export type MoveParams = Omit<Move, 'priority'>;

/**
 * Build a move, validating its fields and computing its priority.
 *
 * @throws MoveValidationError when a foundation destination lacks a
 *         foundation id or a river end lacks its slot index.
 */
export function createMove(params: MoveParams, context: MoveContext): Move {
  validateMoveParams(params);
  return Object.freeze({
    ...params,
    priority: calculatePriority(params, context),
  });
}

function validateMoveParams(params: MoveParams): void {
  if (params.destination === 'foundation' && !params.foundationId) {
    throw new MoveValidationError(
      'foundationId must be provided for foundation moves',
      params.playerIndex,
    );
  }
  if (params.source === 'river' && params.sourceSlot === undefined) {
    throw new MoveValidationError(
      'sourceSlot must be provided for river source moves',
      params.playerIndex,
    );
  }
  if (params.destination === 'river' && params.destinationSlot === undefined) {
    throw new MoveValidationError(
      'destinationSlot must be provided for river destination moves',
      params.playerIndex,
    );
  }
}

// ── Priority ────────────────────────────────────────────────

export function baseWeight(kind: MoveKind): number {
  return MOVE_KIND_WEIGHTS[kind] ?? DEFAULT_MOVE_WEIGHT;
}

/**
 * `baseWeight × (1 − distance × 0.3) + strategicBonus`
 */
export function calculatePriority(params: MoveParams, context: MoveContext): number {
  const distanceFactor = 1 - params.distance * MAX_DISTANCE_PENALTY_FACTOR;
  return baseWeight(params.kind) * distanceFactor + strategicBonus(params, context);
}

/**
 * Nertz-to-foundation moves onto the only foundation of their suit
 * earn `(rankIndex + 1) / 13 × 20`; every other move earns nothing.
 * High nertz cards with a single outlet are the hardest to unload
 * later.
 */
export function strategicBonus(params: MoveParams, context: MoveContext): number {
  const { card } = params;
  if (card === null) return 0;
  if (params.source !== 'nertz' || params.destination !== 'foundation') return 0;

  const duplicateFoundation = context.foundations.some(
    (f) => f.suit === card.suit && f.identifier !== params.foundationId,
  );
  if (duplicateFoundation) return 0;

  const rankWeight = (rankValue(card.rank) + 1) / RANKS.length;
  return rankWeight * UNIQUE_FOUNDATION_BONUS_MULTIPLIER;
}

/**
 * Selection score used by the engine: `priority + distance`. Adding
 * the distance back partly cancels the distance penalty already in
 * the priority; this is the heuristic the engine plays by.
 */
export function selectionScore(move: Move): number {
  return move.priority + move.distance;
}

/**
 * One-line description for logs.
 */
export function describeMove(move: Move): string {
  const from = move.source === 'river' ? `river[${move.sourceSlot}]` : move.source;
  let to: string = move.destination;
  if (move.destination === 'river') to = `river[${move.destinationSlot}]`;
  if (move.destination === 'foundation') to = `${move.foundationId}`;
  return (
    `P${move.playerIndex} ${move.kind} ${formatCard(move.card)} ${from} -> ${to} ` +
    `(priority=${move.priority.toFixed(2)}, distance=${move.distance.toFixed(2)})`
  );
}
