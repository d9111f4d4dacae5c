/**
 * Card types and factory functions for the Nertz engine.
 *
 * Defines Rank, Suit, and Card as the foundational data model
 * consumed by the pile, move and engine modules. Every player races
 * their own 52-card deck, so a card also carries the index of the
 * player who owns it.
 */

/** Standard playing card ranks. */
export type Rank =
  | 'A'
  | '2'
  | '3'
  | '4'
  | '5'
  | '6'
  | '7'
  | '8'
  | '9'
  | '10'
  | 'J'
  | 'Q'
  | 'K';

/** All ranks in order (Ace low). */
export const RANKS: readonly Rank[] = [
  'A',
  '2',
  '3',
  '4',
  '5',
  '6',
  '7',
  '8',
  '9',
  '10',
  'J',
  'Q',
  'K',
] as const;

/** Standard playing card suits. */
export type Suit = 'spades' | 'clubs' | 'hearts' | 'diamonds';

/** All suits in deck-building order. */
export const SUITS: readonly Suit[] = [
  'spades',
  'clubs',
  'hearts',
  'diamonds',
] as const;

/** Card colour, derived from the suit. */
export type CardColor = 'red' | 'black';

/**
 * An immutable playing card.
 *
 * Two cards with the same rank and suit but different owners are
 * different cards: use {@link sameCard} for membership checks, never
 * rank/suit comparison alone.
 */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
  /** Index of the player whose deck this card belongs to. */
  readonly owner: number;
}

/**
 * Create a single card owned by the given player.
 */
export function createCard(rank: Rank, suit: Suit, owner: number): Card {
  return Object.freeze({ rank, suit, owner });
}

/**
 * Identity equality: rank, suit and owner must all match.
 */
export function sameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit && a.owner === b.owner;
}

/** Map of rank -> numeric value for ordering (A=0, 2=1, ..., K=12). */
const RANK_VALUE = new Map<Rank, number>(RANKS.map((r, i) => [r, i]));

/**
 * Get the numeric value of a rank (A=0, K=12).
 */
export function rankValue(rank: Rank): number {
  const value = RANK_VALUE.get(rank);
  if (value === undefined) {
    throw new Error(`Invalid rank: ${String(rank)}`);
  }
  return value;
}

/**
 * Return the next rank up, or undefined for a King.
 */
export function nextRank(rank: Rank): Rank | undefined {
  const idx = rankValue(rank);
  return idx < RANKS.length - 1 ? RANKS[idx + 1] : undefined;
}

/**
 * Red for hearts and diamonds, black for spades and clubs.
 */
export function cardColor(card: Card): CardColor {
  return card.suit === 'hearts' || card.suit === 'diamonds' ? 'red' : 'black';
}

/**
 * Human-readable label, e.g. "10 of hearts (P1)".
 */
export function formatCard(card: Card | null | undefined): string {
  if (!card) return 'none';
  return `${card.rank} of ${card.suit} (P${card.owner})`;
}
