import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import {
  ExifrMetadataProvider,
  InMemoryMetadataProvider,
  normalizeMetadata,
  readCameraInfo,
  readCoordinate,
  toDecimalDegrees,
} from '../src/catalog/metadataProvider.js';

describe('toDecimalDegrees', () => {
  test('accepts decimal degrees and applies the reference', () => {
    assert.equal(toDecimalDegrees(45.5, 'N'), 45.5);
    assert.equal(toDecimalDegrees(122.25, 'W'), -122.25);
    assert.equal(toDecimalDegrees(-122.25, 'West'), -122.25);
  });

  test('converts degree, minute, second triples', () => {
    assert.equal(toDecimalDegrees([45, 30, 0], 'N'), 45.5);
    assert.equal(toDecimalDegrees([33, 45, 0], 'S'), -33.75);
    assert.equal(toDecimalDegrees([-33, 45, 0], undefined), -33.75);
  });

  test('rejects values that are not positions', () => {
    assert.equal(toDecimalDegrees('45.5', 'N'), undefined);
    assert.equal(toDecimalDegrees([], 'N'), undefined);
    assert.equal(toDecimalDegrees([45, 'thirty'], 'N'), undefined);
    assert.equal(toDecimalDegrees(Number.NaN, 'N'), undefined);
  });
});

test('normalizeMetadata signs GPS values and drops empty fields', () => {
  const fields = normalizeMetadata({
    GPSLatitude: [45, 30, 0],
    GPSLatitudeRef: 'S',
    GPSLongitude: 'garbled',
    GPSLongitudeRef: 'E',
    Make: '',
    Model: 'X100V',
    LensModel: null,
  });

  assert.deepEqual(fields, {
    GPSLatitude: -45.5,
    GPSLatitudeRef: 'S',
    GPSLongitudeRef: 'E',
    Model: 'X100V',
  });
});

describe('readCoordinate', () => {
  test('returns a complete in-range coordinate', () => {
    assert.deepEqual(readCoordinate({ GPSLatitude: 45.5, GPSLongitude: -122.25 }), {
      latitude: 45.5,
      longitude: -122.25,
    });
  });

  test('ignores partial or out-of-range positions', () => {
    assert.equal(readCoordinate({ GPSLatitude: 45.5 }), undefined);
    assert.equal(readCoordinate({ GPSLatitude: 95, GPSLongitude: 0 }), undefined);
    assert.equal(readCoordinate({}), undefined);
  });
});

test('readCameraInfo prefers EXIF image dimensions', () => {
  const camera = readCameraInfo({
    Make: ' FUJIFILM ',
    Model: 'X100V',
    FNumber: 2,
    ISO: 160,
    ImageWidth: 160,
    ExifImageWidth: 6240,
    ImageHeight: 4160,
  });

  assert.deepEqual(camera, {
    make: 'FUJIFILM',
    model: 'X100V',
    lens: '',
    fNumber: '2',
    exposure: '',
    iso: '160',
    focalLength: '',
    orientation: '',
    width: '6240',
    height: '4160',
  });
});

test('InMemoryMetadataProvider keys results by resolved path', async () => {
  const provider = new InMemoryMetadataProvider({ 'photos/a.jpg': { Model: 'X100V' } });

  const batch = await provider.readBatch(['photos/a.jpg', 'photos/b.jpg']);

  assert.deepEqual(batch.get(path.resolve('photos/a.jpg')), { Model: 'X100V' });
  assert.deepEqual(batch.get(path.resolve('photos/b.jpg')), {});
});

test('ExifrMetadataProvider maps unreadable files to empty metadata', async () => {
  const dir = await fs.mkdtemp(path.join(tmpdir(), 'catalog-exif-'));
  try {
    const notAnImage = path.join(dir, 'notes.jpg');
    await fs.writeFile(notAnImage, 'plain text, not a JPEG');
    const missing = path.join(dir, 'missing.jpg');

    const batch = await new ExifrMetadataProvider().readBatch([notAnImage, missing]);

    assert.equal(batch.size, 2);
    assert.deepEqual(batch.get(notAnImage), {});
    assert.deepEqual(batch.get(missing), {});
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
