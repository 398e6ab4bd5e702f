import logger from '../utils/logger.js';
import type { CaptureTime, MetadataFields } from './types.js';

/** Offset fields in order of preference */
export const OFFSET_FIELDS = ['OffsetTimeOriginal', 'OffsetTime', 'OffsetTimeDigitized'] as const;

/** Timestamp fields in order of preference */
export const TIMESTAMP_FIELDS = ['DateTimeOriginal', 'CreateDate'] as const;

const MAX_OFFSET_MINUTES = 14 * 60;
const MS_PER_MINUTE = 60_000;

const OFFSET_PATTERN = /^([+-])(\d{1,2}):?(\d{2})$/;
const TIMESTAMP_PATTERN =
  /^(\d{4})[:-](\d{2})[:-](\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{1,2}:?\d{2})?$/;

/**
 * Parses an EXIF offset string ("+05:30", "-0800", "Z") into signed minutes.
 * Returns undefined for anything else, including offsets beyond ±14h.
 */
export function parseUtcOffset(value: unknown): number | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  if (trimmed === 'Z') {
    return 0;
  }

  const match = OFFSET_PATTERN.exec(trimmed);
  if (!match) {
    return undefined;
  }

  const [, sign, hours, minutes] = match;
  const h = Number(hours);
  const m = Number(minutes);
  if (m >= 60) {
    return undefined;
  }

  const total = h * 60 + m;
  if (total > MAX_OFFSET_MINUTES) {
    return undefined;
  }
  return sign === '-' ? -total : total;
}

/**
 * Formats signed minutes as `UTC±HH:MM`.
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const minutes = String(abs % 60).padStart(2, '0');
  return `UTC${sign}${hours}:${minutes}`;
}

/**
 * Picks the UTC offset from capture metadata: the original-capture offset
 * first, then the generic one, then the digitized one.
 */
export function resolveUtcOffset(meta: MetadataFields): number | undefined {
  for (const field of OFFSET_FIELDS) {
    const offset = parseUtcOffset(meta[field]);
    if (offset !== undefined) {
      return offset;
    }
  }
  return undefined;
}

interface ParsedTimestamp {
  wallClockMs: number;
  embeddedOffsetMinutes?: number;
}

/**
 * Parses `YYYY:MM:DD HH:MM:SS` or `YYYY-MM-DD HH:MM:SS`, with optional
 * fractional seconds and a trailing offset. Calendar-invalid values such
 * as the all-zero EXIF placeholder are rejected.
 */
export function parseExifTimestamp(value: string): ParsedTimestamp | undefined {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const parts = [year, month, day, hour, minute, second].map(Number);
  const [y, mo, d, h, mi, s] = parts;
  const ms = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  const wallClockMs = Date.UTC(y, mo - 1, d, h, mi, s, ms);
  const check = new Date(wallClockMs);
  if (
    check.getUTCFullYear() !== y ||
    check.getUTCMonth() !== mo - 1 ||
    check.getUTCDate() !== d ||
    check.getUTCHours() !== h ||
    check.getUTCMinutes() !== mi ||
    check.getUTCSeconds() !== s
  ) {
    return undefined;
  }

  return {
    wallClockMs,
    embeddedOffsetMinutes: offset === undefined ? undefined : parseUtcOffset(offset),
  };
}

function withOffset(wallClockMs: number, offsetMinutes: number | undefined): Pick<CaptureTime, 'wallClockMs' | 'offsetMinutes' | 'utcOffset'> {
  if (offsetMinutes === undefined) {
    return { wallClockMs };
  }
  return { wallClockMs, offsetMinutes, utcOffset: formatUtcOffset(offsetMinutes) };
}

/**
 * Determines when a photo was taken.
 *
 * The first timestamp field present is used, with the offset from
 * {@link resolveUtcOffset} (or one embedded in the timestamp itself). With no
 * offset it stays naive local time. Without a usable timestamp the file's
 * modification time is used, read as UTC.
 *
 * @param meta - Metadata for the file
 * @param mtimeMs - File modification time (epoch milliseconds)
 * @param label - File name used in log lines
 */
export function resolveCaptureTime(meta: MetadataFields, mtimeMs: number, label = 'file'): CaptureTime {
  const raw = TIMESTAMP_FIELDS.map(field => meta[field]).find(value => value !== undefined && value !== null && value !== '');

  if (raw !== undefined) {
    const parsed = typeof raw === 'string' ? parseExifTimestamp(raw) : undefined;
    if (parsed) {
      const offset = resolveUtcOffset(meta) ?? parsed.embeddedOffsetMinutes;
      return { ...withOffset(parsed.wallClockMs, offset), source: 'metadata' };
    }
    logger.warn(`Unparseable capture time ${JSON.stringify(raw)} for ${label}, using file modification time`);
  }

  return {
    ...withOffset(mtimeMs, 0),
    source: 'file-mtime',
    ...(raw !== undefined ? { parseFailed: true } : {}),
  };
}

/**
 * The UTC instant of a capture, when its offset is known.
 */
export function utcInstantMs(time: CaptureTime): number | undefined {
  return time.offsetMinutes === undefined ? undefined : time.wallClockMs - time.offsetMinutes * MS_PER_MINUTE;
}

/**
 * Absolute time between two captures in milliseconds. Uses UTC instants when
 * both offsets are known, otherwise subtracts the wall-clock readings.
 */
export function elapsedMsBetween(a: CaptureTime, b: CaptureTime): number {
  const utcA = utcInstantMs(a);
  const utcB = utcInstantMs(b);
  if (utcA !== undefined && utcB !== undefined) {
    return Math.abs(utcA - utcB);
  }
  return Math.abs(a.wallClockMs - b.wallClockMs);
}

/**
 * Key used to order records: UTC instant where known, else wall clock.
 */
export function sortKeyMs(time: CaptureTime): number {
  return utcInstantMs(time) ?? time.wallClockMs;
}

/** `YYYY-MM-DD` of the local wall clock */
export function captureDate(time: CaptureTime): string {
  return new Date(time.wallClockMs).toISOString().slice(0, 10);
}

/** `HH:MM:SS` of the local wall clock */
export function captureClock(time: CaptureTime): string {
  return new Date(time.wallClockMs).toISOString().slice(11, 19);
}
