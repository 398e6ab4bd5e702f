import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, test } from 'node:test';
import { parse } from 'csv-parse/sync';

import { buildPhotoCatalog } from '../src/catalog/buildCatalog.js';
import { scanPhotos, type SourceFile } from '../src/catalog/fileScanner.js';
import { InMemoryMetadataProvider } from '../src/catalog/metadataProvider.js';
import { CatalogPipeline } from '../src/catalog/pipeline.js';
import type { PhotoRecord } from '../src/catalog/types.js';
import { AnchorCache } from '../src/geo/anchorCache.js';
import type { NominatimAddress } from '../src/geo/nominatimClient.js';
import { NoInputFilesError } from '../src/utils/errors.js';
import { FakeGeocoder, MILES_PER_DEGREE } from './fixtures.js';

const portland: NominatimAddress = { city: 'Portland', state: 'Oregon', country_code: 'us' };
const start = { latitude: 45, longitude: -122 };
const fiveMilesNorth = { latitude: 45 + 5 / MILES_PER_DEGREE, longitude: -122 };

/** Three photos: GPS at 09:00, none at 09:20, GPS five miles north at 10:30 */
const tripMetadata = {
  '/photos/t0.jpg': { DateTimeOriginal: '2024:05:10 09:00:00', GPSLatitude: start.latitude, GPSLongitude: start.longitude },
  '/photos/t1.jpg': { DateTimeOriginal: '2024:05:10 09:20:00' },
  '/photos/t2.jpg': {
    DateTimeOriginal: '2024:05:10 10:30:00',
    GPSLatitude: fiveMilesNorth.latitude,
    GPSLongitude: fiveMilesNorth.longitude,
  },
};

// Deliberately out of capture order
const tripFiles: SourceFile[] = ['/photos/t2.jpg', '/photos/t1.jpg', '/photos/t0.jpg'].map(filePath => ({
  path: filePath,
  mtimeMs: 0,
}));

function byName(records: PhotoRecord[], fileName: string): PhotoRecord {
  const record = records.find(candidate => candidate.fileName === fileName);
  assert.ok(record, `no record for ${fileName}`);
  return record;
}

function approx(actual: number | undefined, expected: number, tolerance = 1e-6): void {
  assert.ok(actual !== undefined, 'expected a value');
  assert.ok(Math.abs(actual - expected) < tolerance, `${actual} is not within ${tolerance} of ${expected}`);
}

describe('CatalogPipeline', () => {
  test('resolves, measures and infers a trip in capture order', async () => {
    const geocoder = new FakeGeocoder(() => portland);
    const pipeline = new CatalogPipeline(new AnchorCache(10), geocoder, new InMemoryMetadataProvider(tripMetadata));

    const { records, anchors, stats } = await pipeline.run(tripFiles);

    assert.deepEqual(
      records.map(record => record.fileName),
      ['t0.jpg', 't1.jpg', 't2.jpg']
    );
    assert.equal(geocoder.calls.length, 1);
    assert.equal(anchors.length, 1);

    const [t0, t1, t2] = records;
    assert.equal(t0.resolution, 'geocoded');
    assert.equal(t0.motion, undefined);
    assert.equal(t0.place.cityLabel, 'Portland, Oregon');

    assert.equal(t1.geoSource, 'inferred');
    assert.equal(t1.inferredFrom, '/photos/t0.jpg');
    assert.deepEqual(t1.coordinate, start);
    assert.equal(t1.resolution, 'cache-hit');
    assert.equal(t1.motion, undefined);

    assert.equal(t2.resolution, 'cache-hit');
    approx(t2.motion?.distanceMiles, 5);
    assert.equal(t2.motion?.elapsedHours, 1.5);
    approx(t2.motion?.speedMph, 5 / 1.5);

    assert.deepEqual(
      records.map(record => record.proposedFolder),
      ['Portland,_Oregon_2024-05-10', 'Portland,_Oregon_2024-05-10', 'Portland,_Oregon_2024-05-10']
    );
    assert.deepEqual(stats, {
      lookups: 1,
      cacheHits: 2,
      failures: 0,
      anchorsCreated: 1,
      files: 3,
      records: 3,
      withGps: 2,
      inferred: 1,
      emptyMetadata: 0,
      anchors: 1,
    });
  });

  test('each run starts with a fresh motion cursor and fresh counters', async () => {
    const geocoder = new FakeGeocoder(() => portland);
    const pipeline = new CatalogPipeline(new AnchorCache(10), geocoder, new InMemoryMetadataProvider(tripMetadata));

    await pipeline.run(tripFiles);
    const { records, stats } = await pipeline.run([{ path: '/photos/t2.jpg', mtimeMs: 0 }]);

    assert.equal(records[0].motion, undefined);
    assert.equal(records[0].resolution, 'cache-hit');
    assert.equal(stats.lookups, 0);
    assert.equal(stats.cacheHits, 1);
    assert.equal(stats.anchorsCreated, 0);
    assert.equal(stats.anchors, 1);
    assert.equal(geocoder.calls.length, 1);
  });

  test('with a zero radius an inferred record is looked up at its donor coordinate', async () => {
    const geocoder = new FakeGeocoder(() => portland);
    const pipeline = new CatalogPipeline(new AnchorCache(0), geocoder, new InMemoryMetadataProvider(tripMetadata));

    const { records, stats } = await pipeline.run(tripFiles);

    assert.deepEqual(geocoder.calls, [start, fiveMilesNorth, start]);
    assert.equal(byName(records, 't1.jpg').resolution, 'geocoded');
    assert.equal(stats.lookups, 3);
    assert.equal(stats.cacheHits, 0);
  });

  test('can leave inferred records without a place', async () => {
    const geocoder = new FakeGeocoder(() => portland);
    const pipeline = new CatalogPipeline(new AnchorCache(10), geocoder, new InMemoryMetadataProvider(tripMetadata), {
      resolveInferredPlaces: false,
    });

    const { records, stats } = await pipeline.run(tripFiles);
    const t1 = byName(records, 't1.jpg');

    assert.equal(t1.geoSource, 'inferred');
    assert.equal(t1.place.cityLabel, 'UnknownLocation');
    assert.equal(t1.resolution, 'no-coordinate');
    assert.equal(t1.proposedFolder, 'UnknownLocation_2024-05-10');
    assert.equal(stats.cacheHits, 1);
  });

  test('a failed lookup degrades to an unknown place and guards its area', async () => {
    const geocoder = new FakeGeocoder(() => new Error('socket hang up'));
    const pipeline = new CatalogPipeline(new AnchorCache(10), geocoder, new InMemoryMetadataProvider(tripMetadata));

    const { records, stats } = await pipeline.run(tripFiles);

    assert.equal(byName(records, 't0.jpg').resolution, 'lookup-failed');
    assert.equal(byName(records, 't2.jpg').resolution, 'cache-hit');
    assert.equal(byName(records, 't2.jpg').place.cityLabel, 'UnknownLocation');
    assert.equal(geocoder.calls.length, 1);
    assert.equal(stats.failures, 1);
  });

  test('without failed-lookup anchors every failure is retried', async () => {
    const geocoder = new FakeGeocoder(() => new Error('socket hang up'));
    const pipeline = new CatalogPipeline(new AnchorCache(10), geocoder, new InMemoryMetadataProvider(tripMetadata), {
      registerFailedLookups: false,
    });

    const { stats } = await pipeline.run(tripFiles);

    assert.equal(geocoder.calls.length, 3);
    assert.equal(stats.failures, 3);
    assert.equal(stats.anchors, 0);
  });

  test('photos without metadata fall back to the modification time', async () => {
    const geocoder = new FakeGeocoder(() => portland);
    const pipeline = new CatalogPipeline(new AnchorCache(10), geocoder, new InMemoryMetadataProvider(tripMetadata));
    const blank: SourceFile = { path: '/photos/blank.jpg', mtimeMs: Date.UTC(2024, 0, 1, 12, 0, 0) };

    const { records, stats } = await pipeline.run([...tripFiles, blank]);

    const record = records[0];
    assert.equal(record.fileName, 'blank.jpg');
    assert.equal(record.metadataStatus, 'empty');
    assert.equal(record.captureTime.source, 'file-mtime');
    assert.equal(record.geoSource, 'unknown');
    assert.equal(record.proposedFolder, 'UnknownLocation_2024-01-01');
    assert.equal(stats.emptyMetadata, 1);
    assert.equal(stats.inferred, 1);
  });

  test('a photo without metadata can borrow GPS taken close to its modification time', async () => {
    const geocoder = new FakeGeocoder(() => portland);
    const pipeline = new CatalogPipeline(new AnchorCache(10), geocoder, new InMemoryMetadataProvider(tripMetadata));
    const blank: SourceFile = { path: '/photos/blank.jpg', mtimeMs: Date.UTC(2024, 4, 10, 9, 5, 0) };

    const { records } = await pipeline.run([...tripFiles, blank]);
    const record = byName(records, 'blank.jpg');

    assert.equal(record.captureTime.source, 'file-mtime');
    assert.equal(record.geoSource, 'inferred');
    assert.equal(record.inferredFrom, '/photos/t0.jpg');
  });

  test('limit keeps the earliest photos', async () => {
    const geocoder = new FakeGeocoder(() => portland);
    const pipeline = new CatalogPipeline(new AnchorCache(10), geocoder, new InMemoryMetadataProvider(tripMetadata), {
      limit: 2,
    });

    const { records, stats } = await pipeline.run(tripFiles);

    assert.deepEqual(
      records.map(record => record.fileName),
      ['t0.jpg', 't1.jpg']
    );
    assert.equal(stats.files, 3);
    assert.equal(stats.records, 2);
  });

  test('rejects an empty input', async () => {
    const pipeline = new CatalogPipeline(
      new AnchorCache(10),
      new FakeGeocoder(() => portland),
      new InMemoryMetadataProvider()
    );

    await assert.rejects(pipeline.run([], '/empty'), NoInputFilesError);
  });
});

describe('buildPhotoCatalog', () => {
  async function withPhotoTree(run: (dir: string) => Promise<void>): Promise<void> {
    const dir = await fs.mkdtemp(path.join(tmpdir(), 'photo-catalog-'));
    try {
      const src = path.join(dir, 'src');
      await fs.mkdir(path.join(src, 'day2'), { recursive: true });
      await fs.writeFile(path.join(src, 'a.jpg'), 'jpeg bytes');
      await fs.writeFile(path.join(src, 'b.jpeg'), 'jpeg bytes');
      await fs.writeFile(path.join(src, 'notes.txt'), 'not a photo');
      await fs.writeFile(path.join(src, 'day2', 'c.JPG'), 'jpeg bytes');
      const newYear = Date.UTC(2024, 0, 1, 12, 0, 0) / 1000;
      await fs.utimes(path.join(src, 'b.jpeg'), newYear, newYear);
      await run(dir);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  test('scanPhotos finds JPG and JPEG files recursively', async () => {
    await withPhotoTree(async dir => {
      const files = await scanPhotos(path.join(dir, 'src'));

      assert.deepEqual(
        files.map(file => path.relative(path.join(dir, 'src'), file.path)),
        ['a.jpg', 'b.jpeg', path.join('day2', 'c.JPG')]
      );
    });
  });

  test('writes the catalog and reuses persisted anchors on the next run', async () => {
    await withPhotoTree(async dir => {
      const src = path.join(dir, 'src');
      const out = path.join(dir, 'catalog.csv');
      const cacheFile = path.join(dir, 'geo_cache.json');
      const metadata = new InMemoryMetadataProvider({
        [path.join(src, 'a.jpg')]: { DateTimeOriginal: '2024:05:10 09:00:00', GPSLatitude: 45, GPSLongitude: -122 },
        [path.join(src, 'day2', 'c.JPG')]: {
          DateTimeOriginal: '2024:05:10 10:00:00',
          GPSLatitude: 45.01,
          GPSLongitude: -122,
        },
      });

      const firstGeocoder = new FakeGeocoder(() => portland);
      const first = await buildPhotoCatalog({ src, out, cacheFile, geocoder: firstGeocoder, metadata, radiusMiles: 10 });

      assert.equal(firstGeocoder.calls.length, 1);
      assert.equal(first.stats.emptyMetadata, 1);

      const rows: Record<string, string>[] = parse(await fs.readFile(out, 'utf-8'), { columns: true });
      assert.deepEqual(
        rows.map(row => [row.file_name, row.resolution, row.proposed_folder]),
        [
          ['b.jpeg', 'no-coordinate', 'UnknownLocation_2024-01-01'],
          ['a.jpg', 'geocoded', 'Portland,_Oregon_2024-05-10'],
          ['c.JPG', 'cache-hit', 'Portland,_Oregon_2024-05-10'],
        ]
      );

      const persisted: unknown = JSON.parse(await fs.readFile(cacheFile, 'utf-8'));
      assert.ok(Array.isArray(persisted));
      assert.equal(persisted.length, 1);

      const secondGeocoder = new FakeGeocoder(() => portland);
      const second = await buildPhotoCatalog({ src, out, cacheFile, geocoder: secondGeocoder, metadata, radiusMiles: 10 });

      assert.equal(secondGeocoder.calls.length, 0);
      assert.equal(second.stats.cacheHits, 2);
      assert.equal(second.stats.anchors, 1);
    });
  });

  test('fails when the folder has no photos', async () => {
    const dir = await fs.mkdtemp(path.join(tmpdir(), 'photo-catalog-empty-'));
    try {
      await assert.rejects(
        buildPhotoCatalog({
          src: dir,
          out: path.join(dir, 'catalog.csv'),
          geocoder: new FakeGeocoder(() => portland),
          metadata: new InMemoryMetadataProvider(),
        }),
        NoInputFilesError
      );
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
