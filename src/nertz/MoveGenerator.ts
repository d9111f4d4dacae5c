/**
 * Legal-move enumeration for one player.
 *
 * Generation is read-only over the shared state: it sees foundations
 * only through the turn's {@link MoveContext} snapshot, so every
 * player in a turn is judged against the same foundations. The one
 * write it may cause is reserving a table position for a foundation
 * an Ace would create, and that reservation is idempotent.
 */

import type { Card } from '../card-system/Card';
import { cardColor, nextRank } from '../card-system/Card';
import type { EngineLogger } from '../core-engine/Logger';
import { createSilentLogger } from '../core-engine/Logger';
import { foundationId } from './Foundation';
import type { Move, MoveContext, MoveKind } from './Move';
import { createMove, describeMove } from './Move';
import type { PlayerPiles } from './PlayerPiles';
import { RIVER_SLOT_COUNT } from './PlayerPiles';
import type { Point, TableLayout } from './TableLayout';
import { distanceBetween } from './TableLayout';

// ── Card rules ──────────────────────────────────────────────

/**
 * Solitaire adjacency: `source` may go on `dest` when the colours
 * differ and `source` is exactly one rank below `dest`.
 */
export function isSolitaireAdjacent(source: Card, dest: Card): boolean {
  return cardColor(source) !== cardColor(dest) && nextRank(source.rank) === dest.rank;
}

type FoundationSource = 'nertz' | 'river' | 'deck';
type RiverSource = 'nertz' | 'deck';

const FOUNDATION_MOVE_KIND: Record<FoundationSource, MoveKind> = {
  nertz: 'nertz-to-foundation',
  river: 'river-to-foundation',
  deck: 'deck-to-foundation',
};

const RIVER_MOVE_KIND: Record<RiverSource, MoveKind> = {
  nertz: 'nertz-to-river',
  deck: 'deck-to-river',
};

// ── Generator ───────────────────────────────────────────────

export class MoveGenerator {
  private readonly logger: EngineLogger;

  constructor(
    private readonly layout: TableLayout,
    logger?: EngineLogger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Every legal move for `playerIndex`, in category order: nertz,
   * river-to-foundation, river-to-river, deck.
   */
  getLegalMoves(playerIndex: number, piles: PlayerPiles, context: MoveContext): Move[] {
    const moves: Move[] = [
      ...this.nertzMoves(playerIndex, piles, context),
      ...this.riverToFoundationMoves(playerIndex, piles, context),
      ...this.riverToRiverMoves(playerIndex, piles, context),
      ...this.deckMoves(playerIndex, piles, context),
    ];

    this.logger.info(`Player ${playerIndex} has ${moves.length} legal moves`);
    for (const move of moves) {
      this.logger.debug(`  legal: ${describeMove(move)}`);
    }
    return moves;
  }

  // ── Single-move builders ──────────────────────────────────

  /**
   * A move of `card` onto a foundation, if one accepts it. An Ace
   * always qualifies: it starts the player's own foundation of its
   * suit. Otherwise the first foundation (creation order) of the same
   * suit whose top is one rank below wins.
   */
  generateFoundationMove(
    playerIndex: number,
    card: Card,
    source: FoundationSource,
    context: MoveContext,
    sourceSlot?: number,
  ): Move | undefined {
    const playerPos = this.layout.getPlayerPosition(playerIndex);

    const build = (targetId: string, targetPos: Point): Move =>
      createMove(
        {
          playerIndex,
          kind: FOUNDATION_MOVE_KIND[source],
          source,
          destination: 'foundation',
          card,
          distance: distanceBetween(playerPos, targetPos),
          foundationId: targetId,
          sourceSlot,
        },
        context,
      );

    if (card.rank === 'A') {
      const id = foundationId(playerIndex, card.suit);
      this.layout.reserveFoundationPosition(id);
      return build(id, this.layout.getFoundationPosition(id));
    }

    const target = context.foundations.find(
      (f) => f.suit === card.suit && nextRank(f.topRank) === card.rank,
    );
    return target ? build(target.identifier, target.position) : undefined;
  }

  /**
   * A move of `card` into the first river slot that is empty or whose
   * top card it may be placed on.
   */
  generateRiverMove(
    playerIndex: number,
    card: Card,
    source: RiverSource,
    piles: PlayerPiles,
    context: MoveContext,
  ): Move | undefined {
    for (let slot = 0; slot < RIVER_SLOT_COUNT; slot++) {
      const top = piles.river[slot].peek();
      if (top === undefined || isSolitaireAdjacent(card, top)) {
        return createMove(
          {
            playerIndex,
            kind: RIVER_MOVE_KIND[source],
            source,
            destination: 'river',
            card,
            distance: this.distanceToRiver(playerIndex),
            destinationSlot: slot,
          },
          context,
        );
      }
    }
    return undefined;
  }

  /** Flip the next group of cards from deck to stream. Always legal. */
  generateStreamFlipMove(playerIndex: number, context: MoveContext): Move {
    return createMove(
      {
        playerIndex,
        kind: 'deck-flip',
        source: 'deck',
        destination: 'deck',
        card: null,
        distance: this.distanceToRiver(playerIndex),
      },
      context,
    );
  }

  // ── Categories ────────────────────────────────────────────

  private nertzMoves(playerIndex: number, piles: PlayerPiles, context: MoveContext): Move[] {
    const card = piles.topNertzCard();
    if (card === undefined) return [];

    const move =
      this.generateFoundationMove(playerIndex, card, 'nertz', context) ??
      this.generateRiverMove(playerIndex, card, 'nertz', piles, context);
    return move ? [move] : [];
  }

  private riverToFoundationMoves(
    playerIndex: number,
    piles: PlayerPiles,
    context: MoveContext,
  ): Move[] {
    const moves: Move[] = [];
    piles.riverTopCards().forEach((card, i) => {
      if (card === undefined) return;
      const move = this.generateFoundationMove(playerIndex, card, 'river', context, i);
      if (move) moves.push(move);
    });
    return moves;
  }

  /**
   * Whole-slot moves: slot i's bottom card must fit on slot j's top.
   */
  private riverToRiverMoves(
    playerIndex: number,
    piles: PlayerPiles,
    context: MoveContext,
  ): Move[] {
    const moves: Move[] = [];
    for (let i = 0; i < RIVER_SLOT_COUNT; i++) {
      const bottom = piles.river[i].peekBottom();
      if (bottom === undefined) continue;

      for (let j = 0; j < RIVER_SLOT_COUNT; j++) {
        if (i === j) continue;
        const destTop = piles.river[j].peek();
        if (destTop === undefined || !isSolitaireAdjacent(bottom, destTop)) continue;

        moves.push(
          createMove(
            {
              playerIndex,
              kind: 'river-to-river',
              source: 'river',
              destination: 'river',
              card: bottom,
              distance: this.distanceToRiver(playerIndex),
              sourceSlot: i,
              destinationSlot: j,
            },
            context,
          ),
        );
      }
    }
    return moves;
  }

  private deckMoves(playerIndex: number, piles: PlayerPiles, context: MoveContext): Move[] {
    const moves: Move[] = [this.generateStreamFlipMove(playerIndex, context)];

    const card = piles.topStreamCard();
    if (card === undefined) return moves;

    const move =
      this.generateRiverMove(playerIndex, card, 'deck', piles, context) ??
      this.generateFoundationMove(playerIndex, card, 'deck', context);
    if (move) moves.push(move);
    return moves;
  }

  /** Rivers sit at the player's own position. */
  private distanceToRiver(playerIndex: number): number {
    const position = this.layout.getPlayerPosition(playerIndex);
    return distanceBetween(position, position);
  }
}
