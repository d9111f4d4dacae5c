/**
 * Shared builders for Nertz tests: hand-arranged piles and sessions
 * with a fixed-position layout.
 */

import { createCard } from '../../src/card-system/Card';
import type { Card, Rank, Suit } from '../../src/card-system/Card';
import { createGameState, defaultPlayers } from '../../src/core-engine/GameState';
import { FoundationRegistry } from '../../src/nertz/Foundation';
import type { Foundation } from '../../src/nertz/Foundation';
import type { NertzPlayerState, NertzSession } from '../../src/nertz/NertzGameState';
import { PlayerPiles } from '../../src/nertz/PlayerPiles';
import { TableLayout } from '../../src/nertz/TableLayout';
import { RANKS } from '../../src/card-system/Card';

/** Shorthand card factory: `c('5', 'hearts')` is player 0's five of hearts. */
export function c(rank: Rank, suit: Suit, owner: number = 0): Card {
  return createCard(rank, suit, owner);
}

/**
 * A session whose players all start with empty piles. The layout's
 * rng always returns 0.5, so every foundation lands on the centre.
 */
export function emptySession(playerCount: number = 2): NertzSession {
  const gameState = createGameState<NertzPlayerState>({
    players: defaultPlayers(playerCount),
    createPlayerState: (i) => ({ piles: new PlayerPiles(i), score: 0 }),
  });
  return {
    gameState,
    foundations: new FoundationRegistry(),
    layout: new TableLayout(playerCount, { rng: () => 0.5 }),
  };
}

/**
 * Create a foundation for `owner` built up from the Ace to `topRank`,
 * and reserve its table position.
 */
export function buildFoundation(
  session: NertzSession,
  owner: number,
  suit: Suit,
  topRank: Rank,
): Foundation {
  const foundation = session.foundations.create(c('A', suit, owner), owner);
  for (const rank of RANKS.slice(1, RANKS.indexOf(topRank) + 1)) {
    foundation.addCard(c(rank, suit, owner));
  }
  session.layout.reserveFoundationPosition(foundation.identifier);
  return foundation;
}

/** The piles of player `index`, failing the test if there is none. */
export function piles(session: NertzSession, index: number): PlayerPiles {
  const player = session.gameState.playerStates[index];
  if (player === undefined) {
    throw new Error(`No player ${index} in fixture session`);
  }
  return player.piles;
}
