/**
 * Core Engine Module
 *
 * Game-agnostic framework pieces: the generic game state and turn
 * sequencer, typed lifecycle events, card snapshots and logging.
 */
export const ENGINE_VERSION = '0.1.0';

// Game state types and factory
export type { GamePhase, PlayerInfo, GameState, GameStateOptions } from './GameState';
export { createGameState, defaultPlayers } from './GameState';

// Turn sequencer functions
export { isPlaying, beginTurn, transitionTo, startGame } from './TurnSequencer';

// Game event system
export type {
  GameStartedPayload,
  TurnStartedPayload,
  MoveChosenPayload,
  ConflictResolvedPayload,
  MoveExecutedPayload,
  GameEndedPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';

// Snapshot types
export type { CardSnapshot, PointSnapshot } from './TranscriptTypes';
export { snapshotCard, snapshotOptionalCard } from './TranscriptTypes';

// Logging
export type { EngineLogger, EngineLoggerOptions, LogLevel } from './Logger';
export { LOG_LEVELS, createEngineLogger, createSilentLogger } from './Logger';
