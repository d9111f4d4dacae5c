/**
 * Game phase and state types for the Nertz engine.
 *
 * GamePhase represents the lifecycle of a game. Game over is not a
 * phase: it is a condition the engine checks at the top of every turn.
 * GameState is a generic container that tracks players, the turn
 * counter and the phase.
 */

/**
 * Lifecycle phases.
 *
 * - `not-started` -- Piles may be dealt but no turn may be played.
 * - `in-progress` -- Turns are being played.
 */
export type GamePhase = 'not-started' | 'in-progress';

/**
 * Identifies a player by display name.
 */
export interface PlayerInfo {
  readonly name: string;
}

/**
 * Generic game state container.
 *
 * @typeParam T  Game-specific per-player state (piles, score, etc.).
 */
export interface GameState<T> {
  /** Information about each player, indexed by player index. */
  readonly players: readonly PlayerInfo[];
  /** Per-player game-specific state, parallel to `players`. */
  readonly playerStates: T[];
  /** Current lifecycle phase. */
  phase: GamePhase;
  /** Monotonically increasing turn counter (starts at 0). */
  turnNumber: number;
}

/**
 * Options for creating a new GameState.
 */
export interface GameStateOptions<T> {
  /** Player info (at least one entry). */
  players: PlayerInfo[];
  /** Initial per-player state factory. Called once per player, in order. */
  createPlayerState: (playerIndex: number) => T;
}

/**
 * Create a new GameState from options.
 *
 * @throws If no players are provided.
 */
export function createGameState<T>(options: GameStateOptions<T>): GameState<T> {
  const { players, createPlayerState } = options;

  if (players.length < 1) {
    throw new Error('A game requires at least 1 player, got 0');
  }

  const playerStates = players.map((_, i) => createPlayerState(i));

  return {
    players,
    playerStates,
    phase: 'not-started',
    turnNumber: 0,
  };
}

/**
 * Default display names: "Player 1", "Player 2", ...
 */
export function defaultPlayers(count: number): PlayerInfo[] {
  return Array.from({ length: count }, (_, i) => ({ name: `Player ${i + 1}` }));
}
