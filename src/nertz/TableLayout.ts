/**
 * Spatial layout of the table.
 *
 * Players sit on a circle of radius 0.48 around the centre of the
 * unit square; foundations cluster near the centre with random
 * jitter. Distances between these points feed the move-priority
 * heuristic. The layout holds positions only, never cards.
 */

import type { EngineLogger } from '../core-engine/Logger';
import { createSilentLogger } from '../core-engine/Logger';
import type { FoundationId } from './Foundation';
import { InvalidPileError } from './NertzErrors';

// ── Constants ───────────────────────────────────────────────

export const TABLE_CENTER = 0.5;
export const PLAYER_RING_RADIUS = 0.48;
export const FOUNDATION_BASE_JITTER = 0.05;
export const FOUNDATION_JITTER_STEP = 0.01;
export const FOUNDATION_MIN_SPACING = 0.1;
export const FOUNDATION_MAX_ATTEMPTS = 100;

export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Euclidean distance between two points.
 */
export function distanceBetween(p: Point, q: Point): number {
  return Math.hypot(p.x - q.x, p.y - q.y);
}

/** Round to 4 decimal digits. */
export function roundCoordinate(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function roundPoint(p: Point): Point {
  return { x: roundCoordinate(p.x), y: roundCoordinate(p.y) };
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export interface TableLayoutOptions {
  rng?: () => number;
  logger?: EngineLogger;
}

export class TableLayout {
  private readonly playerPositions: Point[];
  private readonly foundationPositions = new Map<FoundationId, Point>();
  private readonly rng: () => number;
  private readonly logger: EngineLogger;

  constructor(
    readonly playerCount: number,
    options: TableLayoutOptions = {},
  ) {
    this.rng = options.rng ?? Math.random;
    this.logger = options.logger ?? createSilentLogger();

    const angleIncrement = (2 * Math.PI) / playerCount;
    this.playerPositions = Array.from({ length: playerCount }, (_, i) => ({
      x: TABLE_CENTER + PLAYER_RING_RADIUS * Math.cos(i * angleIncrement),
      y: TABLE_CENTER + PLAYER_RING_RADIUS * Math.sin(i * angleIncrement),
    }));
  }

  /**
   * Sample a position near the centre at least 0.1 away from every
   * other foundation, widening the jitter by 0.01 per attempt. After
   * 100 failed attempts the last sample is kept anyway.
   *
   * Not idempotent: calling it again for the same id re-samples and
   * overwrites. Use {@link reserveFoundationPosition} unless that is
   * what you want.
   */
  placeFoundation(id: FoundationId): Point {
    let candidate: Point = { x: TABLE_CENTER, y: TABLE_CENTER };

    for (let attempt = 0; attempt < FOUNDATION_MAX_ATTEMPTS; attempt++) {
      const radius = FOUNDATION_BASE_JITTER + attempt * FOUNDATION_JITTER_STEP;
      candidate = {
        x: clamp01(TABLE_CENTER + this.jitter(radius)),
        y: clamp01(TABLE_CENTER + this.jitter(radius)),
      };

      if (this.isClearOfFoundations(candidate, id)) {
        this.logger.debug(`Placed ${id} after ${attempt} tries`);
        this.foundationPositions.set(id, candidate);
        return candidate;
      }
    }

    this.logger.warn(
      `Could not place ${id} without overlap after ${FOUNDATION_MAX_ATTEMPTS} tries`,
    );
    this.foundationPositions.set(id, candidate);
    return candidate;
  }

  /**
   * Return the stored position for `id`, placing it first if needed.
   * Repeated calls have no further effect.
   */
  reserveFoundationPosition(id: FoundationId): Point {
    return this.foundationPositions.get(id) ?? this.placeFoundation(id);
  }

  /** Player position, rounded to 4 decimals. */
  getPlayerPosition(playerIndex: number): Point {
    const position = this.playerPositions[playerIndex];
    if (position === undefined) {
      throw new RangeError(
        `Player index ${playerIndex} is out of bounds for ${this.playerCount} players`,
      );
    }
    return roundPoint(position);
  }

  /**
   * Foundation position, rounded to 4 decimals.
   *
   * @throws InvalidPileError if the foundation was never placed.
   */
  getFoundationPosition(id: FoundationId): Point {
    const position = this.foundationPositions.get(id);
    if (position === undefined) {
      throw new InvalidPileError(id, 'has no table position');
    }
    return roundPoint(position);
  }

  private jitter(radius: number): number {
    return (this.rng() * 2 - 1) * radius;
  }

  private isClearOfFoundations(candidate: Point, self: FoundationId): boolean {
    for (const [id, other] of this.foundationPositions) {
      if (id === self) continue;
      if (distanceBetween(candidate, other) < FOUNDATION_MIN_SPACING) {
        return false;
      }
    }
    return true;
  }
}
