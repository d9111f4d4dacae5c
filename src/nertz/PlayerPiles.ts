/**
 * A single player's piles: deck, stream, four river slots, nertz
 * pile and lake, plus the dealing and flipping rules that move cards
 * between them.
 *
 * Cards only ever move between piles; nothing here creates a card
 * after the deck is built.
 */

import type { Card } from '../card-system/Card';
import { createShuffledDeck } from '../card-system/Deck';
import { Pile } from '../card-system/Pile';

// ── Constants ───────────────────────────────────────────────

/** Number of river slots per player. */
export const RIVER_SLOT_COUNT = 4;

/** Cards dealt to the nertz pile. */
export const NERTZ_PILE_SIZE = 13;

/** Cards moved from deck to stream per flip. */
export const FLIP_COUNT = 3;

export type RiverSlots = readonly [Pile, Pile, Pile, Pile];

// ── PlayerPiles ─────────────────────────────────────────────

export class PlayerPiles {
  /** Face-down draw pile. Top = last element. */
  readonly deck = new Pile();
  /** Face-up waste built from flips. Only the top is playable. */
  readonly stream = new Pile();
  /** River slots building down in alternating colours. */
  readonly river: RiverSlots = [new Pile(), new Pile(), new Pile(), new Pile()];
  /** The objective pile; emptying it ends the game. */
  readonly nertz = new Pile();
  /**
   * Record of the cards this player has placed on any foundation.
   * Append-only; the cards themselves live on the foundations.
   */
  readonly lake = new Pile();

  constructor(readonly owner: number) {}

  /**
   * Build and shuffle a fresh 52-card deck, deal one card to each
   * river slot and 13 to the nertz pile, then flip the first group
   * into the stream.
   *
   * Clears every pile first, so a PlayerPiles can be re-dealt.
   */
  dealStartingHand(rng: () => number = Math.random): this {
    for (const pile of this.allPiles()) {
      pile.clear();
    }

    this.deck.push(...createShuffledDeck(this.owner, rng));

    for (const slot of this.river) {
      slot.push(this.deck.popOrThrow());
    }

    for (let i = 0; i < NERTZ_PILE_SIZE; i++) {
      this.nertz.push(this.deck.popOrThrow());
    }

    this.flipIntoStream();
    return this;
  }

  /**
   * Move up to `count` cards, one at a time, from the top of the deck
   * to the top of the stream. When the deck is empty the whole stream
   * is first turned back into the deck in its existing order.
   *
   * Stops short when cards run out; never recycles mid-flip.
   *
   * @returns The number of cards flipped.
   */
  flipIntoStream(count: number = FLIP_COUNT): number {
    if (this.deck.isEmpty()) {
      this.deck.push(...this.stream.takeAll());
    }

    let flipped = 0;
    while (flipped < count) {
      const card = this.deck.pop();
      if (card === undefined) break;
      this.stream.push(card);
      flipped++;
    }
    return flipped;
  }

  // ── Accessors ────────────────────────────────────────────

  /** Top of the nertz pile, or undefined when it is empty. */
  topNertzCard(): Card | undefined {
    return this.nertz.peek();
  }

  /** Top of the stream, or undefined when it is empty. */
  topStreamCard(): Card | undefined {
    return this.stream.peek();
  }

  /**
   * The top `count` stream cards, bottom to top.
   *
   * Unlike every other accessor this one throws when the pile is
   * short instead of returning fewer cards.
   */
  topStreamCards(count: number = FLIP_COUNT): Card[] {
    if (this.stream.size() < count) {
      throw new Error(
        `Not enough cards in stream: wanted ${count}, have ${this.stream.size()}`,
      );
    }
    return count === 0 ? [] : this.stream.toArray().slice(-count);
  }

  /** Top card of each river slot (undefined for an empty slot). */
  riverTopCards(): Array<Card | undefined> {
    return this.river.map((slot) => slot.peek());
  }

  /** Whether the nertz pile has been emptied. */
  hasEmptiedNertz(): boolean {
    return this.nertz.isEmpty();
  }

  /**
   * Every card still in the player's own piles: deck, stream, river
   * and nertz. Lake entries are excluded because those cards sit on
   * foundations.
   */
  cardsInPlay(): Card[] {
    return [this.deck, this.stream, ...this.river, this.nertz].flatMap((pile) =>
      pile.toArray(),
    );
  }

  private allPiles(): Pile[] {
    return [this.deck, this.stream, ...this.river, this.nertz, this.lake];
  }
}
