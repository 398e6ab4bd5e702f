import { haversineMiles } from '../geo/haversine.js';
import type { Coordinate } from '../geo/types.js';
import { elapsedMsBetween } from './timezone.js';
import type { CaptureTime, MotionFields } from './types.js';

const MS_PER_HOUR = 3_600_000;

/**
 * A GPS-bearing point in time.
 */
export interface TrackPoint {
  coordinate: Coordinate;
  captureTime: CaptureTime;
}

/**
 * Absolute hours between two captures (UTC when both offsets are known).
 */
export function elapsedHoursBetween(a: CaptureTime, b: CaptureTime): number {
  return elapsedMsBetween(a, b) / MS_PER_HOUR;
}

/**
 * Distance, elapsed time and speed from `previous` to `current`.
 * Speed is left out when no time has passed.
 */
export function computeMotion(previous: TrackPoint, current: TrackPoint): MotionFields {
  const distanceMiles = haversineMiles(previous.coordinate, current.coordinate);
  const elapsedHours = elapsedHoursBetween(previous.captureTime, current.captureTime);

  if (!Number.isFinite(elapsedHours)) {
    return { distanceMiles };
  }

  return elapsedHours > 0
    ? { distanceMiles, elapsedHours, speedMph: distanceMiles / elapsedHours }
    : { distanceMiles, elapsedHours };
}

/**
 * Tracks the previous GPS-bearing record of a run and measures each new one
 * against it. Feed it GPS-bearing records only, in capture order.
 */
export class MotionTracker {
  private previous: TrackPoint | null = null;

  /**
   * Measures `point` against the cursor, then moves the cursor to `point`.
   *
   * @returns undefined for the first point of the run
   */
  advance(point: TrackPoint): MotionFields | undefined {
    const motion = this.previous ? computeMotion(this.previous, point) : undefined;
    this.previous = {
      coordinate: { ...point.coordinate },
      captureTime: { ...point.captureTime },
    };
    return motion;
  }

  reset(): void {
    this.previous = null;
  }
}
