/**
 * Nertz game state: per-player piles on top of the generic GameState,
 * plus the shared foundations and the table layout.
 */

import type { GameState, PlayerInfo } from '../core-engine/GameState';
import { createGameState, defaultPlayers } from '../core-engine/GameState';
import type { EngineLogger } from '../core-engine/Logger';
import { FoundationRegistry } from './Foundation';
import { PlayerPiles } from './PlayerPiles';
import { TableLayout } from './TableLayout';

// ── Per-player state ────────────────────────────────────────

export interface NertzPlayerState {
  readonly piles: PlayerPiles;
  /** Running score; final scores accumulate into it. */
  score: number;
}

// ── Full game state ─────────────────────────────────────────

export type NertzGameState = GameState<NertzPlayerState>;

/** A complete Nertz game: players plus everything they share. */
export interface NertzSession {
  readonly gameState: NertzGameState;
  readonly foundations: FoundationRegistry;
  readonly layout: TableLayout;
}

// ── Setup ───────────────────────────────────────────────────

export interface NertzSetupOptions {
  playerCount: number;
  /** Player names (defaults to "Player 1", "Player 2", etc.). */
  playerNames?: string[];
  /** RNG for shuffling and foundation placement (default Math.random). */
  rng?: () => number;
  logger?: EngineLogger;
}

/**
 * The players for a game of `playerCount`, named by `playerNames`
 * when given.
 *
 * @throws RangeError when the names do not match the player count.
 */
export function resolvePlayers(playerCount: number, playerNames?: readonly string[]): PlayerInfo[] {
  if (playerNames === undefined) return defaultPlayers(playerCount);
  if (playerNames.length !== playerCount) {
    throw new RangeError(
      `Got ${playerNames.length} player names for ${playerCount} players`,
    );
  }
  return playerNames.map((name) => ({ name }));
}

/**
 * Create a session and deal every player a starting hand, in player
 * order, from the same RNG. The game is left in `not-started`.
 *
 * @throws RangeError when `playerNames` does not have one name per player.
 */
export function setupNertzGame(options: NertzSetupOptions): NertzSession {
  const { playerCount, playerNames, rng = Math.random, logger } = options;

  const players = resolvePlayers(playerCount, playerNames);

  const gameState = createGameState<NertzPlayerState>({
    players,
    createPlayerState: (i) => ({
      piles: new PlayerPiles(i).dealStartingHand(rng),
      score: 0,
    }),
  });

  return {
    gameState,
    foundations: new FoundationRegistry(),
    layout: new TableLayout(players.length, { rng, logger }),
  };
}

/**
 * The piles of `playerIndex`.
 *
 * @throws RangeError for an unknown player.
 */
export function pilesOf(session: NertzSession, playerIndex: number): PlayerPiles {
  const player = session.gameState.playerStates[playerIndex];
  if (player === undefined) {
    throw new RangeError(`No player with index ${playerIndex}`);
  }
  return player.piles;
}
