/**
 * Applies moves to the game state.
 *
 * Destination effects run before source effects. Every source pile is
 * checked with identity equality before a card leaves it, so a move
 * computed against stale state fails loudly instead of duplicating
 * or losing a card.
 */

import type { Card } from '../card-system/Card';
import type { Pile } from '../card-system/Pile';
import type { EngineLogger } from '../core-engine/Logger';
import { createSilentLogger } from '../core-engine/Logger';
import type { Move } from './Move';
import { describeMove } from './Move';
import type { NertzSession } from './NertzGameState';
import { pilesOf } from './NertzGameState';
import type { PlayerPiles } from './PlayerPiles';
import { CardMismatchError, InvalidPileError, MoveValidationError } from './NertzErrors';

export class MoveExecutor {
  private readonly logger: EngineLogger;

  constructor(
    private readonly session: NertzSession,
    logger?: EngineLogger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  execute(move: Move): void {
    this.logger.info(`Executing move: ${describeMove(move)}`);
    const piles = pilesOf(this.session, move.playerIndex);

    if (move.kind === 'deck-flip') {
      const flipped = piles.flipIntoStream();
      this.logger.info(`Player ${move.playerIndex} flipped ${flipped} card(s) into stream`);
      return;
    }

    const card = this.requireCard(move);
    this.applyDestination(move, card, piles);
    this.applySource(move, card, piles);

    this.logger.debug('Move executed successfully');
  }

  // ── Destination effects ───────────────────────────────────

  private applyDestination(move: Move, card: Card, piles: PlayerPiles): void {
    switch (move.destination) {
      case 'foundation':
        this.placeOnFoundation(move, card, piles);
        return;
      case 'river':
        this.riverSlot(piles, move.destinationSlot, move, 'destinationSlot').push(card);
        return;
      case 'nertz':
      case 'deck':
        throw new InvalidPileError(
          move.destination,
          'is never a move destination',
          move.playerIndex,
        );
    }
  }

  private placeOnFoundation(move: Move, card: Card, piles: PlayerPiles): void {
    const { foundations, layout } = this.session;

    if (card.rank === 'A') {
      const created = foundations.create(card, move.playerIndex);
      layout.reserveFoundationPosition(created.identifier);
      piles.lake.push(card);
      return;
    }

    const id = move.foundationId;
    const foundation = id === undefined ? undefined : foundations.get(id);
    if (foundation === undefined) {
      throw new InvalidPileError(id ?? 'foundation', 'does not exist', move.playerIndex);
    }
    foundation.addCard(card);
    piles.lake.push(card);
  }

  // ── Source effects ────────────────────────────────────────

  private applySource(move: Move, card: Card, piles: PlayerPiles): void {
    switch (move.source) {
      case 'nertz':
        this.popVerified(piles.nertz, card, 'nertz', move);
        return;
      case 'deck':
        this.popVerified(piles.stream, card, 'deck (stream)', move);
        return;
      case 'river':
        this.removeFromRiver(move, card, piles);
        return;
      case 'foundation':
        throw new InvalidPileError('foundation', 'is never a move source', move.playerIndex);
    }
  }

  /**
   * A river-to-river move carries the whole source slot: the bottom
   * card (already placed on the destination) is verified and removed,
   * then the rest follows in order. Any other river move takes the top.
   */
  private removeFromRiver(move: Move, card: Card, piles: PlayerPiles): void {
    const slotIndex = move.sourceSlot;
    const slot = this.riverSlot(piles, slotIndex, move, 'sourceSlot');

    if (move.destination !== 'river') {
      this.popVerified(slot, card, `river (slot ${slotIndex}, top)`, move);
      return;
    }

    if (!slot.removeBottom(card)) {
      this.logger.debug(`River slot ${slotIndex} cards: ${slot.size()}`);
      throw new CardMismatchError(
        card,
        slot.peekBottom() ?? null,
        `river (slot ${slotIndex}, bottom)`,
        move.playerIndex,
      );
    }

    const destination = this.riverSlot(piles, move.destinationSlot, move, 'destinationSlot');
    destination.push(...slot.takeAll());
  }

  private popVerified(pile: Pile, card: Card, pileName: string, move: Move): void {
    if (!pile.removeTop(card)) {
      throw new CardMismatchError(card, pile.peek() ?? null, pileName, move.playerIndex);
    }
  }

  // ── Helpers ───────────────────────────────────────────────

  private requireCard(move: Move): Card {
    if (move.card === null) {
      throw new MoveValidationError(`${move.kind} move has no card`, move.playerIndex);
    }
    return move.card;
  }

  private riverSlot(
    piles: PlayerPiles,
    index: number | undefined,
    move: Move,
    field: 'sourceSlot' | 'destinationSlot',
  ): Pile {
    if (index === undefined) {
      throw new MoveValidationError(
        `${field} must be specified for river moves`,
        move.playerIndex,
      );
    }
    const slot = piles.river[index];
    if (slot === undefined) {
      throw new InvalidPileError(`river slot ${index}`, 'does not exist', move.playerIndex);
    }
    return slot;
  }
}
