/**
 * Per-player decks.
 *
 * Every player shuffles their own full deck, so a deck is built for
 * one owner and every card in it carries that owner's index. Decks
 * are plain Card arrays; the last element is dealt first.
 */

import type { Card } from './Card';
import { RANKS, SUITS, createCard } from './Card';

/** Cards in one player's deck. */
export const DECK_SIZE = SUITS.length * RANKS.length;

/**
 * An unshuffled 52-card deck for `owner`: spades, clubs, hearts,
 * diamonds, each Ace through King.
 */
export function createStandardDeck(owner: number): Card[] {
  return SUITS.flatMap((suit) => RANKS.map((rank) => createCard(rank, suit, owner)));
}

/**
 * Fisher-Yates, in place. `rng` must return values in [0, 1).
 *
 * @returns `deck` itself.
 */
export function shuffle(deck: Card[], rng: () => number = Math.random): Card[] {
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const held = deck[i];
    deck[i] = deck[j];
    deck[j] = held;
  }
  return deck;
}

/** A fresh deck for `owner`, shuffled with `rng`. */
export function createShuffledDeck(owner: number, rng: () => number = Math.random): Card[] {
  return shuffle(createStandardDeck(owner), rng);
}

/**
 * Deterministic `() => number` for seeded games (32-bit LCG with
 * the Numerical Recipes constants).
 */
export function createSeededRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}
