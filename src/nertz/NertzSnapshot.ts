/**
 * Read-only snapshots of a Nertz session for the visualization layer
 * and the transcript.
 *
 * Snapshots are plain serializable objects; mutating one never
 * touches the live game.
 */

import type { Suit } from '../card-system/Card';
import type { CardSnapshot, PointSnapshot } from '../core-engine/TranscriptTypes';
import { snapshotCard, snapshotOptionalCard } from '../core-engine/TranscriptTypes';
import type { Foundation } from './Foundation';
import type { NertzSession } from './NertzGameState';

// ── Snapshot types ──────────────────────────────────────────

export interface PlayerSnapshot {
  index: number;
  name: string;
  position: PointSnapshot;
  deckCount: number;
  streamCount: number;
  streamTop: CardSnapshot | null;
  /** Each river slot, bottom to top. */
  river: CardSnapshot[][];
  nertzCount: number;
  nertzTop: CardSnapshot | null;
  lakeCount: number;
  score: number;
}

export interface FoundationSnapshot {
  identifier: string;
  suit: Suit;
  owner: number;
  top: CardSnapshot;
  size: number;
  position: PointSnapshot;
}

export interface NertzSnapshot {
  turnNumber: number;
  gameOver: boolean;
  players: PlayerSnapshot[];
  /** In creation order. */
  foundations: FoundationSnapshot[];
}

// ── Helpers ─────────────────────────────────────────────────

function snapshotFoundation(session: NertzSession, foundation: Foundation): FoundationSnapshot {
  return {
    identifier: foundation.identifier,
    suit: foundation.suit,
    owner: foundation.owner,
    top: snapshotCard(foundation.top()),
    size: foundation.size(),
    position: session.layout.getFoundationPosition(foundation.identifier),
  };
}

/** Whether any player has emptied their nertz pile. */
export function anyNertzEmptied(session: NertzSession): boolean {
  return session.gameState.playerStates.some((p) => p.piles.hasEmptiedNertz());
}

/**
 * Take a snapshot of the whole table.
 */
export function snapshotSession(session: NertzSession): NertzSnapshot {
  const { gameState, layout, foundations } = session;

  return {
    turnNumber: gameState.turnNumber,
    gameOver: anyNertzEmptied(session),
    players: gameState.playerStates.map(({ piles, score }, index) => ({
      index,
      name: gameState.players[index].name,
      position: layout.getPlayerPosition(index),
      deckCount: piles.deck.size(),
      streamCount: piles.stream.size(),
      streamTop: snapshotOptionalCard(piles.topStreamCard()),
      river: piles.river.map((slot) => slot.toArray().map(snapshotCard)),
      nertzCount: piles.nertz.size(),
      nertzTop: snapshotOptionalCard(piles.topNertzCard()),
      lakeCount: piles.lake.size(),
      score,
    })),
    foundations: foundations.values().map((f) => snapshotFoundation(session, f)),
  };
}
