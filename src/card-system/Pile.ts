/**
 * Double-ended card pile.
 *
 * The last element is the top. River slots also take cards off the
 * bottom (a whole-slot transfer starts with the bottom card), so both
 * ends are reachable. Every per-player pile and every foundation is a
 * Pile.
 *
 * Membership checks go through {@link sameCard}: two players' Aces of
 * spades are different cards here.
 */

import type { Card } from './Card';
import { sameCard } from './Card';

export class Pile {
  private readonly cards: Card[];

  /** `cards` is copied; its last element becomes the top. */
  constructor(cards: readonly Card[] = []) {
    this.cards = [...cards];
  }

  // ── Top ───────────────────────────────────────────────────

  push(...added: Card[]): void {
    this.cards.push(...added);
  }

  pop(): Card | undefined {
    return this.cards.pop();
  }

  /** Like {@link pop}, but an empty pile is a bug in the caller. */
  popOrThrow(): Card {
    const card = this.cards.pop();
    if (card === undefined) {
      throw new Error('Cannot pop from an empty pile');
    }
    return card;
  }

  peek(): Card | undefined {
    return this.cards.at(-1);
  }

  /**
   * Pop the top card only if it is `card` (same owner included).
   * @returns Whether the card was removed.
   */
  removeTop(card: Card): boolean {
    const top = this.peek();
    if (top === undefined || !sameCard(top, card)) return false;
    this.cards.pop();
    return true;
  }

  // ── Bottom ────────────────────────────────────────────────

  shift(): Card | undefined {
    return this.cards.shift();
  }

  peekBottom(): Card | undefined {
    return this.cards.at(0);
  }

  /** Bottom-end counterpart of {@link removeTop}. */
  removeBottom(card: Card): boolean {
    const bottom = this.peekBottom();
    if (bottom === undefined || !sameCard(bottom, card)) return false;
    this.cards.shift();
    return true;
  }

  // ── Whole pile ────────────────────────────────────────────

  isEmpty(): boolean {
    return this.cards.length === 0;
  }

  size(): number {
    return this.cards.length;
  }

  /** Copy of the cards, bottom to top. */
  toArray(): Card[] {
    return [...this.cards];
  }

  /** Empty the pile, returning its cards bottom to top. */
  takeAll(): Card[] {
    return this.cards.splice(0);
  }

  clear(): void {
    this.cards.length = 0;
  }
}
