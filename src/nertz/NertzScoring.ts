/**
 * Scoring for Nertz.
 *
 * Each card a player got onto a foundation (their lake) is worth +1;
 * each card left in their nertz pile costs 2.
 */

import type { EngineLogger } from '../core-engine/Logger';
import type { NertzGameState } from './NertzGameState';
import type { PlayerPiles } from './PlayerPiles';

/** Points per lake card. */
export const LAKE_CARD_POINTS = 1;

/** Points per card left in the nertz pile. */
export const NERTZ_CARD_PENALTY = -2;

/**
 * Score one player's piles: `-2 × nertz + lake`.
 */
export function scorePlayer(piles: PlayerPiles): number {
  return NERTZ_CARD_PENALTY * piles.nertz.size() + LAKE_CARD_POINTS * piles.lake.size();
}

/**
 * Add each player's score for this game to their running total.
 *
 * Accumulates: calling it twice counts the game twice. The engine
 * guards against that.
 *
 * @returns The per-player scores for this game, indexed by player.
 */
export function applyFinalScores(state: NertzGameState, logger?: EngineLogger): number[] {
  return state.playerStates.map((player, i) => {
    const gained = scorePlayer(player.piles);
    player.score += gained;
    logger?.info(
      `Final score for ${state.players[i].name}: ${gained} ` +
        `(nertz=${player.piles.nertz.size()}, lake=${player.piles.lake.size()})`,
    );
    return gained;
  });
}

/**
 * Index of the highest score; the lowest index wins a tie.
 *
 * @throws If `scores` is empty.
 */
export function findWinner(scores: readonly number[]): number {
  if (scores.length === 0) {
    throw new Error('Cannot pick a winner without scores');
  }
  let best = 0;
  for (let i = 1; i < scores.length; i++) {
    if (scores[i] > scores[best]) best = i;
  }
  return best;
}
