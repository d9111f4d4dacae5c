/**
 * Shared foundations: suit-pure piles built up from an Ace.
 *
 * A foundation is created by the player who plays its Ace and keeps
 * that player's index in its identifier forever, but any player's
 * next-rank card of the same suit may extend it.
 */

import type { Card, Suit } from '../card-system/Card';
import { Pile } from '../card-system/Pile';
import { InvalidPileError } from './NertzErrors';

/** Identifier format: `foundation_<owner>_<suit>`. */
export type FoundationId = string;

/**
 * Build the identifier of the foundation `owner` starts with an Ace of `suit`.
 */
export function foundationId(owner: number, suit: Suit): FoundationId {
  return `foundation_${owner}_${suit}`;
}

export class Foundation {
  readonly identifier: FoundationId;
  readonly suit: Suit;
  readonly owner: number;
  private readonly pile: Pile;

  /**
   * @throws If `ace` is not an Ace.
   */
  constructor(ace: Card, owner: number) {
    if (ace.rank !== 'A') {
      throw new Error(`Initial foundation card must be an Ace, got ${ace.rank}`);
    }
    this.suit = ace.suit;
    this.owner = owner;
    this.identifier = foundationId(owner, ace.suit);
    this.pile = new Pile([ace]);
  }

  /** The card on top. A foundation is never empty. */
  top(): Card {
    const card = this.pile.peek();
    if (card === undefined) {
      throw new Error(`Foundation ${this.identifier} is empty`);
    }
    return card;
  }

  /**
   * Append a card. Rank adjacency is the move generator's job; the
   * card is not re-checked here.
   */
  addCard(card: Card): void {
    this.pile.push(card);
  }

  size(): number {
    return this.pile.size();
  }

  /** Cards bottom (Ace) to top. */
  cards(): Card[] {
    return this.pile.toArray();
  }
}

/**
 * Create a foundation from an Ace.
 */
export function createFoundation(ace: Card, owner: number): Foundation {
  return new Foundation(ace, owner);
}

/**
 * All foundations in play, in creation order.
 */
export class FoundationRegistry {
  private readonly byId = new Map<FoundationId, Foundation>();

  /**
   * Create and register a foundation.
   *
   * @throws InvalidPileError if the identifier is already taken.
   */
  create(ace: Card, owner: number): Foundation {
    const id = foundationId(owner, ace.suit);
    if (this.byId.has(id)) {
      throw new InvalidPileError(id, 'already exists', owner);
    }
    const foundation = createFoundation(ace, owner);
    this.byId.set(id, foundation);
    return foundation;
  }

  get(id: FoundationId): Foundation | undefined {
    return this.byId.get(id);
  }

  has(id: FoundationId): boolean {
    return this.byId.has(id);
  }

  values(): Foundation[] {
    return [...this.byId.values()];
  }

  get size(): number {
    return this.byId.size;
  }

  clear(): void {
    this.byId.clear();
  }
}
