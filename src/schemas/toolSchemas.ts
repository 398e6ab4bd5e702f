import { z } from 'zod';

/**
 * Zod schemas for CLI options and MCP tool input validation.
 */

const coordinateSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const radiusMiles = z.number().min(0, 'Radius cannot be negative');
const windowMinutes = z.number().min(0, 'Window cannot be negative');

/**
 * Schema for build_photo_catalog tool arguments
 */
export const buildCatalogSchema = z.object({
  src: z.string().min(1, 'Source directory is required'),
  out: z.string().min(1, 'Output CSV path is required'),
  radiusMiles: radiusMiles.optional(),
  cacheFile: z.string().optional(),
  windowMinutes: windowMinutes.optional(),
  limit: z.number().int().min(1).optional(),
  nearest: z.boolean().optional(),
  resolveInferredPlaces: z.boolean().optional(),
});

/**
 * Schema for reverse_geocode tool arguments
 */
export const reverseGeocodeSchema = coordinateSchema;

const timedPointSchema = coordinateSchema.extend({
  /** EXIF-style or ISO-like local timestamp */
  timestamp: z.string().min(1, 'Timestamp is required'),
  /** Optional "+HH:MM" offset */
  offset: z.string().optional(),
});

/**
 * Schema for measure_motion tool arguments
 */
export const measureMotionSchema = z.object({
  from: timedPointSchema,
  to: timedPointSchema,
});

/**
 * A numeric flag: a number, or a non-blank string coerced to one.
 */
function numericFlag(flag: string) {
  return z.union([z.number(), z.string().trim().min(1, `${flag} must not be empty`)]).pipe(z.coerce.number());
}

/**
 * Schema for the command line, after flags are mapped to names.
 * Numeric flags arrive as strings and are coerced.
 */
export const cliOptionsSchema = z.object({
  src: z.string().min(1, '--src is required'),
  out: z.string().min(1, '--out is required'),
  userAgent: z.string().min(1, '--user-agent is required (include contact info per Nominatim policy)'),
  radiusMiles: numericFlag('--radius-mi').pipe(radiusMiles).default(10),
  sleepSeconds: numericFlag('--sleep').pipe(z.number().min(0)).default(1),
  cacheFile: z.string().default(''),
  windowMinutes: numericFlag('--window-min').pipe(windowMinutes).default(60),
  limit: numericFlag('--limit').pipe(z.number().int().min(1)).optional(),
  nearest: z.boolean().default(false),
  resolveInferredPlaces: z.boolean().default(true),
});

// Type inference from schemas
export type BuildCatalogArgs = z.infer<typeof buildCatalogSchema>;
export type ReverseGeocodeArgs = z.infer<typeof reverseGeocodeSchema>;
export type MeasureMotionArgs = z.infer<typeof measureMotionSchema>;
export type CliOptions = z.infer<typeof cliOptionsSchema>;
