import fs from 'fs/promises';
import { z } from 'zod';
import logger from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import type { Anchor } from './types.js';

/**
 * On-disk shape of one anchor. Field names are snake_case so cache files
 * from earlier runs keep loading.
 */
export const persistedAnchorSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  city_label: z.string(),
  neighborhood: z.string().default(''),
  county: z.string().default(''),
  state: z.string().default(''),
  country_code: z.string().default(''),
  folder_label: z.string(),
});

export type PersistedAnchor = z.infer<typeof persistedAnchorSchema>;

export function toPersistedAnchor(anchor: Anchor): PersistedAnchor {
  return {
    lat: anchor.latitude,
    lon: anchor.longitude,
    city_label: anchor.cityLabel,
    neighborhood: anchor.neighborhood,
    county: anchor.county,
    state: anchor.state,
    country_code: anchor.countryCode,
    folder_label: anchor.folderLabel,
  };
}

export function fromPersistedAnchor(entry: PersistedAnchor): Anchor {
  return {
    latitude: entry.lat,
    longitude: entry.lon,
    cityLabel: entry.city_label,
    neighborhood: entry.neighborhood,
    county: entry.county,
    state: entry.state,
    countryCode: entry.country_code,
    folderLabel: entry.folder_label,
  };
}

/**
 * Loads the anchor cache written by a previous run.
 *
 * A missing file is a normal first run. An unreadable or malformed file is
 * treated as an empty cache; entries that fail validation are skipped.
 *
 * @param filePath - Path to the JSON cache file
 * @returns Anchors in their persisted order
 */
export async function loadAnchors(filePath: string): Promise<Anchor[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug(`No anchor cache at ${filePath}, starting empty`);
    } else {
      logger.warn(`Could not read anchor cache ${filePath}, starting empty: ${describeError(error)}`);
    }
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Anchor cache ${filePath} is not valid JSON, starting empty: ${describeError(error)}`);
    return [];
  }

  if (!Array.isArray(data)) {
    logger.warn(`Anchor cache ${filePath} does not contain a list, starting empty`);
    return [];
  }

  const anchors: Anchor[] = [];
  data.forEach((entry, index) => {
    const parsed = persistedAnchorSchema.safeParse(entry);
    if (parsed.success) {
      anchors.push(fromPersistedAnchor(parsed.data));
    } else {
      logger.warn(`Skipping invalid anchor #${index} in ${filePath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
  });

  logger.info(`Loaded ${anchors.length} anchors from ${filePath}`);
  return anchors;
}

/**
 * Overwrites the cache file with the full anchor list.
 */
export async function saveAnchors(filePath: string, anchors: readonly Anchor[]): Promise<void> {
  const payload = anchors.map(toPersistedAnchor);
  await fs.writeFile(filePath, `${JSON.stringify(payload, null, 2)}\n`, 'utf-8');
  logger.info(`Anchor cache saved to ${filePath} (total anchors: ${anchors.length})`);
}
