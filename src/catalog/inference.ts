import logger from '../utils/logger.js';
import { elapsedMsBetween } from './timezone.js';
import type { PhotoRecord } from './types.js';

const MS_PER_MINUTE = 60_000;

export interface InferenceOptions {
  /** Largest allowed gap between donor and recipient (default: 60) */
  windowMinutes?: number;
}

export interface Inference {
  recipient: PhotoRecord;
  donor: PhotoRecord;
  gapMinutes: number;
}

/**
 * A record whose capture timestamp was present but unparseable takes no part
 * in inference. Records that never had one keep their modification time.
 */
function hasUsableTime(record: PhotoRecord): boolean {
  return !record.captureTime.parseFailed;
}

/**
 * Backfills coordinates for records without GPS from the record with GPS
 * closest in time, within a window.
 *
 * Must run after every record has been resolved. Donors are fixed before any
 * recipient is filled, so an inferred coordinate is never passed on. Ties go
 * to the donor that comes first in `records`. Only the coordinate is copied;
 * recipients are marked `inferred`.
 *
 * @param records - All records of the run, in capture order
 * @returns The inferences made, in record order
 */
export function inferMissingCoordinates(records: PhotoRecord[], options: InferenceOptions = {}): Inference[] {
  const windowMs = (options.windowMinutes ?? 60) * MS_PER_MINUTE;

  const donors = records.filter(
    record => record.geoSource === 'exif' && record.coordinate !== undefined && hasUsableTime(record)
  );
  if (donors.length === 0) {
    return [];
  }

  const inferences: Inference[] = [];

  for (const recipient of records) {
    if (recipient.geoSource !== 'unknown' || !hasUsableTime(recipient)) {
      continue;
    }

    let best: PhotoRecord | undefined;
    let bestGap = Infinity;
    for (const donor of donors) {
      const gap = elapsedMsBetween(recipient.captureTime, donor.captureTime);
      if (gap < bestGap) {
        best = donor;
        bestGap = gap;
      }
    }

    if (!best?.coordinate || bestGap > windowMs) {
      continue;
    }

    recipient.coordinate = { ...best.coordinate };
    recipient.geoSource = 'inferred';
    recipient.inferredFrom = best.sourcePath;

    const gapMinutes = bestGap / MS_PER_MINUTE;
    inferences.push({ recipient, donor: best, gapMinutes });
    logger.debug(`Inferred GPS for ${recipient.fileName} from ${best.fileName} (${gapMinutes.toFixed(1)} min apart)`);
  }

  return inferences;
}
