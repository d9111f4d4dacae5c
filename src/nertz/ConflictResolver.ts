/**
 * Cross-player conflict resolution.
 *
 * Players choose their moves independently, so two of them may aim
 * at the same foundation in the same turn. Only foundation moves
 * with a non-Ace card can collide: an Ace always starts a brand-new
 * foundation whose identifier includes the mover's index.
 */

import type { EngineLogger } from '../core-engine/Logger';
import { createSilentLogger } from '../core-engine/Logger';
import type { FoundationId } from './Foundation';
import type { Move } from './Move';

export interface FoundationConflict {
  readonly foundationId: FoundationId;
  readonly winner: Move;
  readonly discarded: readonly Move[];
}

export interface ConflictResolution {
  /** Moves to execute, in execution order. */
  readonly executable: readonly Move[];
  /** One entry per foundation that more than one player targeted. */
  readonly conflicts: readonly FoundationConflict[];
}

/**
 * Order competing moves: highest priority first, then shortest
 * distance, then lowest player index.
 */
export function compareCompetingMoves(a: Move, b: Move): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.distance !== b.distance) return a.distance - b.distance;
  return a.playerIndex - b.playerIndex;
}

/** Whether a move can collide with another player's move. */
export function canConflict(move: Move): boolean {
  return (
    move.destination === 'foundation' &&
    move.card !== null &&
    move.card.rank !== 'A' &&
    move.foundationId !== undefined
  );
}

export class ConflictResolver {
  private readonly logger: EngineLogger;

  constructor(logger?: EngineLogger) {
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Keep at most one move per foundation.
   *
   * Non-conflicting moves pass through first, in input order; then
   * each targeted foundation contributes its winner, in the order the
   * foundation was first targeted.
   */
  resolve(chosen: readonly Move[]): ConflictResolution {
    const executable: Move[] = [];
    const conflicts: FoundationConflict[] = [];
    const byFoundation = new Map<FoundationId, Move[]>();

    for (const move of chosen) {
      if (!canConflict(move) || move.foundationId === undefined) {
        executable.push(move);
        continue;
      }
      const group = byFoundation.get(move.foundationId);
      if (group) {
        group.push(move);
      } else {
        byFoundation.set(move.foundationId, [move]);
      }
    }

    for (const [id, group] of byFoundation) {
      if (group.length === 1) {
        executable.push(group[0]);
        continue;
      }

      const [winner, ...discarded] = [...group].sort(compareCompetingMoves);
      executable.push(winner);
      conflicts.push({ foundationId: id, winner, discarded });

      this.logger.info(
        `Conflict on foundation ${id}. Accepted move by player ${winner.playerIndex} ` +
          `(priority=${winner.priority.toFixed(2)}, distance=${winner.distance.toFixed(2)}). ` +
          `${discarded.length} competing move(s) discarded.`,
      );
    }

    return { executable, conflicts };
  }
}
