/**
 * Game transcript types and recorder for Nertz.
 *
 * Records a replay-ready JSON transcript capturing the deal, every
 * turn's chosen and executed moves, and the table after each turn.
 *
 * The recorder hooks into the game loop: call `recordTurn()` after
 * each `playTurn()`, and `finalize()` after the game ends.
 */

import type { CardSnapshot } from '../core-engine/TranscriptTypes';
import { snapshotOptionalCard } from '../core-engine/TranscriptTypes';
import type { Move, MoveKind, PileKind } from './Move';
import type { GameResult, NertzEngine, TurnResult } from './NertzEngine';
import type { NertzSnapshot } from './NertzSnapshot';

// ── Record types ────────────────────────────────────────────

/** Serializable form of a {@link Move}. */
export interface MoveRecord {
  playerIndex: number;
  kind: MoveKind;
  source: PileKind;
  destination: PileKind;
  card: CardSnapshot | null;
  priority: number;
  distance: number;
  foundationId?: string;
  sourceSlot?: number;
  destinationSlot?: number;
}

export interface ConflictRecord {
  foundationId: string;
  winnerIndex: number;
  discardedPlayers: number[];
}

/** Record of a single turn. */
export interface TurnRecord {
  /** Turn number (1-based). */
  turnNumber: number;
  chosen: MoveRecord[];
  executed: MoveRecord[];
  conflicts: ConflictRecord[];
  /** Table state AFTER the turn. */
  state: NertzSnapshot;
}

/** Metadata about the game. */
export interface GameMetadata {
  /** ISO 8601 timestamp of game start. */
  startedAt: string;
  /** ISO 8601 timestamp of game end (set on finalize). */
  endedAt: string;
  /** Seed the game was dealt from, when known. */
  seed?: number;
  players: Array<{ name: string }>;
}

/** A complete game transcript. */
export interface GameTranscript {
  /** Format version for future compatibility. */
  version: 1;
  metadata: GameMetadata;
  /** Table state after the deal, before the first turn. */
  initialState: NertzSnapshot;
  turns: TurnRecord[];
  /** Final results (set on finalize). */
  results: GameResult | null;
}

// ── Helpers ─────────────────────────────────────────────────

export function recordMove(move: Move): MoveRecord {
  return {
    playerIndex: move.playerIndex,
    kind: move.kind,
    source: move.source,
    destination: move.destination,
    card: snapshotOptionalCard(move.card),
    priority: move.priority,
    distance: move.distance,
    ...(move.foundationId !== undefined ? { foundationId: move.foundationId } : {}),
    ...(move.sourceSlot !== undefined ? { sourceSlot: move.sourceSlot } : {}),
    ...(move.destinationSlot !== undefined ? { destinationSlot: move.destinationSlot } : {}),
  };
}

// ── TranscriptRecorder ──────────────────────────────────────

/**
 * Records a game transcript by capturing state after each turn.
 *
 * Usage:
 *   engine.startNewGame();
 *   const recorder = new TranscriptRecorder(engine, seed);
 *   // ... game loop ...
 *   recorder.recordTurn(engine.playTurn());
 *   // ... after game ends ...
 *   const transcript = recorder.finalize(result);
 */
export class TranscriptRecorder {
  private readonly transcript: GameTranscript;

  constructor(
    private readonly engine: NertzEngine,
    seed?: number,
  ) {
    const initialState = engine.getSnapshot();

    this.transcript = {
      version: 1,
      metadata: {
        startedAt: new Date().toISOString(),
        endedAt: '',
        ...(seed !== undefined ? { seed } : {}),
        players: initialState.players.map((p) => ({ name: p.name })),
      },
      initialState,
      turns: [],
      results: null,
    };
  }

  /**
   * Record a turn that was just played.
   *
   * Call this immediately after `playTurn()`.
   */
  recordTurn(turn: TurnResult): void {
    this.transcript.turns.push({
      turnNumber: turn.turnNumber,
      chosen: turn.chosen.map(recordMove),
      executed: turn.executed.map(recordMove),
      conflicts: turn.conflicts.map((c) => ({
        foundationId: c.foundationId,
        winnerIndex: c.winner.playerIndex,
        discardedPlayers: c.discarded.map((m) => m.playerIndex),
      })),
      state: this.engine.getSnapshot(),
    });
  }

  /**
   * Finalize the transcript after the game ends.
   *
   * @returns The complete transcript.
   */
  finalize(result: GameResult): GameTranscript {
    this.transcript.metadata.endedAt = new Date().toISOString();
    this.transcript.results = result;
    return this.transcript;
  }
}
