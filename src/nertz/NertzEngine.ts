/**
 * Nertz engine: runs simultaneous turns for every player.
 *
 * Each turn:
 *   1. every player's legal moves are generated against one foundation
 *      snapshot taken at the start of the turn;
 *   2. each player's best move is selected;
 *   3. conflicting foundation moves are resolved;
 *   4. the surviving moves are executed in resolver order.
 *
 * There is no rollback: an executor error leaves the moves executed
 * before it applied.
 */

import { createSeededRng } from '../card-system/Deck';
import { GameEventEmitter } from '../core-engine/GameEventEmitter';
import type { EngineLogger } from '../core-engine/Logger';
import { createSilentLogger } from '../core-engine/Logger';
import { snapshotOptionalCard } from '../core-engine/TranscriptTypes';
import { beginTurn, isPlaying, startGame } from '../core-engine/TurnSequencer';
import type { FoundationConflict } from './ConflictResolver';
import { ConflictResolver } from './ConflictResolver';
import type { Move } from './Move';
import { createMoveContext, describeMove, selectionScore } from './Move';
import { MoveExecutor } from './MoveExecutor';
import { MoveGenerator } from './MoveGenerator';
import { GameNotStartedError, GameOverError } from './NertzErrors';
import type { NertzSession } from './NertzGameState';
import { resolvePlayers, setupNertzGame } from './NertzGameState';
import { applyFinalScores, findWinner } from './NertzScoring';
import type { NertzSnapshot } from './NertzSnapshot';
import { anyNertzEmptied, snapshotSession } from './NertzSnapshot';

// ── Types ───────────────────────────────────────────────────

export const DEFAULT_MAX_TURNS = 500;

export interface NertzEngineOptions {
  playerCount: number;
  playerNames?: string[];
  /** Seed for a deterministic game. Ignored when `rng` is given. */
  seed?: number;
  /** Random source for shuffling and foundation placement. */
  rng?: () => number;
  logger?: EngineLogger;
}

/** What happened in one turn. */
export interface TurnResult {
  turnNumber: number;
  /** Each player's selected move, in player order, before resolution. */
  chosen: Move[];
  /** Moves that were applied, in execution order. */
  executed: Move[];
  conflicts: FoundationConflict[];
}

export interface GameResult {
  /** Highest final score; lowest index on ties. */
  winner: number;
  turnsPlayed: number;
  finalScores: number[];
  foundationsCreated: number;
  durationMs: number;
  /** False when the turn cap was hit before any nertz pile emptied. */
  completed: boolean;
}

/** Collaborators bound to one dealt game. */
interface ActiveGame {
  session: NertzSession;
  generator: MoveGenerator;
  executor: MoveExecutor;
  /** Set once final scores have been applied. */
  finalScores?: number[];
}

// ── Selection ───────────────────────────────────────────────

/**
 * The move with the highest `priority + distance`. The first of equal
 * scores wins.
 */
export function selectBestMove(moves: readonly Move[]): Move | undefined {
  let best: Move | undefined;
  for (const move of moves) {
    if (best === undefined || selectionScore(move) > selectionScore(best)) {
      best = move;
    }
  }
  return best;
}

// ── Engine ──────────────────────────────────────────────────

export class NertzEngine {
  readonly events = new GameEventEmitter();
  readonly playerCount: number;

  private readonly rng: () => number;
  private readonly logger: EngineLogger;
  private readonly playerNames: string[] | undefined;
  private readonly resolver: ConflictResolver;
  private game: ActiveGame | undefined;

  constructor(options: NertzEngineOptions) {
    if (!Number.isInteger(options.playerCount) || options.playerCount < 1) {
      throw new RangeError(`playerCount must be a positive integer, got ${options.playerCount}`);
    }
    resolvePlayers(options.playerCount, options.playerNames);
    this.playerCount = options.playerCount;
    this.playerNames = options.playerNames;
    this.rng =
      options.rng ?? (options.seed !== undefined ? createSeededRng(options.seed) : Math.random);
    this.logger = options.logger ?? createSilentLogger();
    this.resolver = new ConflictResolver(this.logger);
  }

  // ── Lifecycle ─────────────────────────────────────────────

  /**
   * Deal a fresh game and enter `in-progress`. Calling it again
   * abandons the current game and starts over with empty foundations.
   */
  startNewGame(): void {
    const session = setupNertzGame({
      playerCount: this.playerCount,
      playerNames: this.playerNames,
      rng: this.rng,
      logger: this.logger,
    });
    startGame(session.gameState);

    this.game = {
      session,
      generator: new MoveGenerator(session.layout, this.logger),
      executor: new MoveExecutor(session, this.logger),
    };

    this.logger.info(`Started new game with ${this.playerCount} players`);
    this.events.emit('game-started', { playerCount: this.playerCount });
  }

  /** False before the first game; true once any nertz pile is empty. */
  isGameOver(): boolean {
    return this.game !== undefined && anyNertzEmptied(this.game.session);
  }

  /** Whether a game has been dealt. */
  isStarted(): boolean {
    return this.game !== undefined && isPlaying(this.game.session.gameState);
  }

  // ── Turns ─────────────────────────────────────────────────

  /**
   * Play one simultaneous turn.
   *
   * @throws GameNotStartedError before {@link startNewGame}.
   * @throws GameOverError once a nertz pile is empty (final scores are
   *         applied first, once per game).
   */
  playTurn(): TurnResult {
    const game = this.requireGame();
    const { session } = game;

    if (anyNertzEmptied(session)) {
      this.logger.info('Game over detected');
      this.finalizeScores();
      throw new GameOverError();
    }

    const turnNumber = beginTurn(session.gameState);
    this.logger.info(`--- Turn ${turnNumber} ---`);
    this.events.emit('turn-started', { turnNumber });

    const context = createMoveContext(session.foundations.values(), session.layout);

    const chosen: Move[] = [];
    session.gameState.playerStates.forEach((player, playerIndex) => {
      const legal = game.generator.getLegalMoves(playerIndex, player.piles, context);
      const best = selectBestMove(legal);
      if (best === undefined) {
        this.logger.debug(`Player ${playerIndex} has no move`);
        return;
      }

      this.logger.info(`Player ${playerIndex} chose ${describeMove(best)}`);
      chosen.push(best);
      this.events.emit('move-chosen', {
        turnNumber,
        playerIndex,
        kind: best.kind,
        card: snapshotOptionalCard(best.card),
        priority: best.priority,
        distance: best.distance,
        legalMoveCount: legal.length,
      });
    });

    const { executable, conflicts } = this.resolver.resolve(chosen);
    for (const conflict of conflicts) {
      this.events.emit('conflict-resolved', {
        turnNumber,
        foundationId: conflict.foundationId,
        winnerIndex: conflict.winner.playerIndex,
        discardedCount: conflict.discarded.length,
      });
    }

    const executed: Move[] = [];
    for (const move of executable) {
      game.executor.execute(move);
      executed.push(move);
      this.events.emit('move-executed', {
        turnNumber,
        playerIndex: move.playerIndex,
        kind: move.kind,
        card: snapshotOptionalCard(move.card),
        foundationId: move.foundationId,
      });
    }

    return { turnNumber, chosen, executed, conflicts: [...conflicts] };
  }

  // ── Scoring ───────────────────────────────────────────────

  /**
   * Apply this game's scores to every player's running total. Only
   * the first call per game has an effect; later calls return the
   * same scores.
   *
   * @returns This game's per-player scores.
   */
  finalizeScores(): number[] {
    const game = this.requireGame();
    if (game.finalScores) return [...game.finalScores];

    const { gameState } = game.session;
    const scores = applyFinalScores(gameState, this.logger);
    game.finalScores = scores;

    const winnerIndex = findWinner(scores);
    const emptied = gameState.playerStates.findIndex((p) => p.piles.hasEmptiedNertz());
    const reason =
      emptied >= 0
        ? `${gameState.players[emptied].name} emptied their nertz pile`
        : `Stopped after ${gameState.turnNumber} turns`;

    this.logger.info(`Game ended: ${reason}. Winner: ${gameState.players[winnerIndex].name}`);
    this.events.emit('game-ended', {
      finalTurnNumber: gameState.turnNumber,
      winnerIndex,
      scores: [...scores],
      reason,
    });
    return [...scores];
  }

  // ── Full game ─────────────────────────────────────────────

  /**
   * Play until a nertz pile empties or `maxTurns` turns have been
   * played, then finalize scores. Deals a new game first if none is
   * in progress. `onTurn` sees every turn as it is played.
   */
  runGame(
    maxTurns: number = DEFAULT_MAX_TURNS,
    onTurn?: (turn: TurnResult) => void,
  ): GameResult {
    const started = Date.now();
    if (this.game === undefined || this.game.finalScores !== undefined) {
      this.startNewGame();
    }
    const game = this.requireGame();
    const firstTurn = game.session.gameState.turnNumber;

    while (!this.isGameOver() && game.session.gameState.turnNumber - firstTurn < maxTurns) {
      const turn = this.playTurn();
      onTurn?.(turn);
    }

    const completed = this.isGameOver();
    if (!completed) {
      this.logger.warn(`Turn cap of ${maxTurns} reached before any nertz pile emptied`);
    }

    const finalScores = this.finalizeScores();
    return {
      winner: findWinner(finalScores),
      turnsPlayed: game.session.gameState.turnNumber,
      finalScores,
      foundationsCreated: game.session.foundations.size,
      durationMs: Date.now() - started,
      completed,
    };
  }

  // ── Read access ───────────────────────────────────────────

  /**
   * Read-only view of the table.
   *
   * @throws GameNotStartedError before {@link startNewGame}.
   */
  getSnapshot(): NertzSnapshot {
    return snapshotSession(this.requireGame().session);
  }

  /**
   * The live session, for invariant checks and the transcript.
   *
   * @throws GameNotStartedError before {@link startNewGame}.
   */
  getSession(): NertzSession {
    return this.requireGame().session;
  }

  private requireGame(): ActiveGame {
    if (this.game === undefined) {
      throw new GameNotStartedError();
    }
    return this.game;
  }
}
