/**
 * Nertz Module
 *
 * The simultaneous-turn Nertz engine and everything it is built
 * from: piles, foundations, table layout, move generation, conflict
 * resolution, execution and scoring.
 */

// Engine
export type { NertzEngineOptions, TurnResult, GameResult } from './NertzEngine';
export { NertzEngine, DEFAULT_MAX_TURNS, selectBestMove } from './NertzEngine';

// State
export type {
  NertzPlayerState,
  NertzGameState,
  NertzSession,
  NertzSetupOptions,
} from './NertzGameState';
export { setupNertzGame, resolvePlayers, pilesOf } from './NertzGameState';
export type { RiverSlots } from './PlayerPiles';
export { PlayerPiles, RIVER_SLOT_COUNT, NERTZ_PILE_SIZE, FLIP_COUNT } from './PlayerPiles';
export type { FoundationId } from './Foundation';
export { Foundation, FoundationRegistry, createFoundation, foundationId } from './Foundation';
export type { Point, TableLayoutOptions } from './TableLayout';
export { TableLayout, distanceBetween } from './TableLayout';

// Moves
export type {
  PileKind,
  MoveKind,
  Move,
  MoveParams,
  MoveContext,
  FoundationSummary,
} from './Move';
export {
  MOVE_KIND_WEIGHTS,
  createMove,
  createMoveContext,
  calculatePriority,
  strategicBonus,
  selectionScore,
  describeMove,
} from './Move';
export { MoveGenerator, isSolitaireAdjacent } from './MoveGenerator';
export type { FoundationConflict, ConflictResolution } from './ConflictResolver';
export { ConflictResolver, compareCompetingMoves } from './ConflictResolver';
export { MoveExecutor } from './MoveExecutor';

// Scoring
export { scorePlayer, applyFinalScores, findWinner } from './NertzScoring';

// Snapshots, transcript, invariants
export type { NertzSnapshot, PlayerSnapshot, FoundationSnapshot } from './NertzSnapshot';
export { snapshotSession } from './NertzSnapshot';
export type { GameTranscript, TurnRecord, MoveRecord, ConflictRecord } from './GameTranscript';
export { TranscriptRecorder, recordMove } from './GameTranscript';
export {
  checkCardAccounting,
  checkLake,
  checkFoundation,
  collectViolations,
  assertInvariants,
} from './NertzInvariants';

// Errors
export {
  NertzEngineError,
  InvalidMoveError,
  MoveValidationError,
  CardMismatchError,
  InvalidPileError,
  GameNotStartedError,
  GameOverError,
} from './NertzErrors';

// Configuration
export type { NertzConfig } from './NertzConfig';
export { NertzConfigSchema, loadNertzConfig, parseCliArgs } from './NertzConfig';
