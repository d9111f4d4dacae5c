/**
 * Shared snapshot types for the Nertz engine.
 *
 * Provides the canonical CardSnapshot interface and snapshotCard()
 * helper used by engine snapshots, lifecycle events and the game
 * transcript.
 */

import type { Card, Rank, Suit } from '../card-system/Card';

// ── Snapshot types ──────────────────────────────────────────

/**
 * Serializable card snapshot (a plain, unfrozen copy).
 */
export interface CardSnapshot {
  rank: Rank;
  suit: Suit;
  owner: number;
}

/** A position in the normalized [0, 1] x [0, 1] table space. */
export interface PointSnapshot {
  x: number;
  y: number;
}

// ── Helpers ─────────────────────────────────────────────────

/**
 * Create a serializable snapshot of a card.
 */
export function snapshotCard(card: Card): CardSnapshot {
  return {
    rank: card.rank,
    suit: card.suit,
    owner: card.owner,
  };
}

/**
 * Snapshot a card that may be absent (empty pile top, deck flip).
 */
export function snapshotOptionalCard(
  card: Card | null | undefined,
): CardSnapshot | null {
  return card ? snapshotCard(card) : null;
}
