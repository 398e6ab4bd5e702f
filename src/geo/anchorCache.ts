import { haversineMiles } from './haversine.js';
import type { Anchor, Coordinate } from './types.js';

/**
 * How a query picks among several anchors inside the radius.
 * - `first`: earliest-registered anchor wins (greedy, matches earlier runs)
 * - `nearest`: closest anchor wins, earliest on ties
 */
export type MatchStrategy = 'first' | 'nearest';

/**
 * A cache hit: the matched anchor and how far the query point is from it.
 */
export interface AnchorMatch {
  anchor: Anchor;
  index: number;
  distanceMiles: number;
}

/**
 * Proximity cache of previously resolved locations.
 *
 * Anchors are kept in insertion order and never evicted, merged or
 * deduplicated, so the list only grows during a run. Queries are pure reads.
 */
export class AnchorCache {
  private readonly anchors: Anchor[];
  readonly radiusMiles: number;
  readonly strategy: MatchStrategy;

  /**
   * @param radiusMiles - Match threshold; 0 disables reuse entirely
   * @param anchors - Initial anchors, typically loaded from a previous run
   * @param strategy - Selection policy among anchors inside the radius
   */
  constructor(radiusMiles: number, anchors: readonly Anchor[] = [], strategy: MatchStrategy = 'first') {
    if (!Number.isFinite(radiusMiles) || radiusMiles < 0) {
      throw new RangeError(`Anchor radius must be a non-negative number of miles (got ${radiusMiles})`);
    }
    this.radiusMiles = radiusMiles;
    this.strategy = strategy;
    this.anchors = [...anchors];
  }

  get size(): number {
    return this.anchors.length;
  }

  /**
   * Finds the anchor that a coordinate should reuse, or null on a miss.
   */
  findMatch(coordinate: Coordinate): AnchorMatch | null {
    if (this.radiusMiles === 0) {
      return null;
    }

    let best: AnchorMatch | null = null;

    for (let index = 0; index < this.anchors.length; index++) {
      const anchor = this.anchors[index];
      const distanceMiles = haversineMiles(coordinate, anchor);
      if (distanceMiles > this.radiusMiles) {
        continue;
      }

      if (this.strategy === 'first') {
        return { anchor, index, distanceMiles };
      }

      if (!best || distanceMiles < best.distanceMiles) {
        best = { anchor, index, distanceMiles };
      }
    }

    return best;
  }

  /**
   * Appends an anchor. Callers register one anchor per external lookup.
   */
  add(anchor: Anchor): void {
    this.anchors.push({ ...anchor });
  }

  /**
   * Copy of the anchor list in insertion order, for persistence.
   */
  snapshot(): Anchor[] {
    return this.anchors.map(anchor => ({ ...anchor }));
  }
}
