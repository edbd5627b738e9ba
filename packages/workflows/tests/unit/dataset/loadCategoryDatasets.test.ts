import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { ValidationError } from '@adprep/utils';
import {
  listMetadataFiles,
  loadCategoryDatasets,
  loadCategoryDocument,
  normalizeCategoryMetadata,
  parseCategoryMetadata,
  resolveSamplePath,
} from '../../../src/dataset/loadCategoryDatasets.js';
import {
  bottleMetadata,
  createDatasetFixture,
  createTestDatasetContext,
  writeMetadata,
  type DatasetFixture,
} from '../../helpers/datasetFixture.js';

describe('resolveSamplePath', () => {
  it('joins image root, prefix and relative path', () => {
    expect(resolveSamplePath('/data/images', 'bottle', 'test/1.png')).toBe(
      '/data/images/bottle/test/1.png'
    );
  });

  it('keeps absolute entries unchanged', () => {
    expect(resolveSamplePath('/data/images', 'bottle', '/elsewhere/1.png')).toBe('/elsewhere/1.png');
  });

  it('tolerates an empty prefix', () => {
    expect(resolveSamplePath('/data/images', '', '1.png')).toBe('/data/images/1.png');
  });
});

describe('normalizeCategoryMetadata', () => {
  it('treats a train entry without anomaly_class as normal', () => {
    const phases = normalizeCategoryMetadata(
      parseCategoryMetadata(JSON.stringify(bottleMetadata()), 'bottle.json'),
      '/img'
    );

    expect(phases.train).toEqual([
      { imagePath: '/img/bottle/train/001.png', label: false, anomalyClass: 'good' },
      { imagePath: '/img/bottle/train/002.png', label: false, anomalyClass: 'good' },
    ]);
  });

  it('drops anomalous train entries', () => {
    const metadata = parseCategoryMetadata(
      JSON.stringify({
        meta: { normal_class: 'ok', prefix: 'p' },
        train: [
          { image_path: 'a.png', anomaly_class: 'ok' },
          { image_path: 'b.png', anomaly_class: 'dent' },
        ],
        test: [],
      }),
      'p.json'
    );

    const phases = normalizeCategoryMetadata(metadata, '/img');

    expect(phases.train).toHaveLength(1);
    expect(phases.train[0].imagePath).toBe('/img/p/a.png');
  });

  it('drops train entries whose anomaly_class is null', () => {
    const metadata = parseCategoryMetadata(
      JSON.stringify({
        meta: { normal_class: 'good', prefix: 'p' },
        train: [
          { image_path: 'a.png', anomaly_class: null },
          { image_path: 'b.png' },
        ],
      }),
      'p.json'
    );

    const phases = normalizeCategoryMetadata(metadata, '/img');

    expect(phases.train).toEqual([
      { imagePath: '/img/p/b.png', label: false, anomalyClass: 'good' },
    ]);
  });

  it('labels test entries and attaches masks only to anomalies', () => {
    const metadata = parseCategoryMetadata(
      JSON.stringify({
        meta: { normal_class: 'good', prefix: 'cap' },
        test: [
          { image_path: 'g.png', anomaly_class: 'good', mask_path: 'ignored.png' },
          { image_path: 's.png', anomaly_class: 'scratch', mask_path: 'ms.png' },
          { image_path: 'd.png', anomaly_class: 'dent' },
          { image_path: 'n.png', anomaly_class: 'dent', mask_path: null },
        ],
      }),
      'cap.json'
    );

    const phases = normalizeCategoryMetadata(metadata, '/img');

    expect(phases.train).toEqual([]);
    expect(phases.test).toEqual([
      { imagePath: '/img/cap/g.png', label: false, anomalyClass: 'good' },
      {
        imagePath: '/img/cap/s.png',
        label: true,
        anomalyClass: 'scratch',
        maskPath: '/img/cap/ms.png',
      },
      { imagePath: '/img/cap/d.png', label: true, anomalyClass: 'dent' },
      { imagePath: '/img/cap/n.png', label: true, anomalyClass: 'dent' },
    ]);
  });
});

describe('parseCategoryMetadata', () => {
  it('rejects malformed JSON', () => {
    expect(() => parseCategoryMetadata('{not json', 'broken.json')).toThrow(ValidationError);
    expect(() => parseCategoryMetadata('{not json', 'broken.json')).toThrow(
      /^Malformed JSON in broken\.json: /
    );
  });

  it('rejects a document without meta', () => {
    expect(() => parseCategoryMetadata(JSON.stringify({ train: [] }), 'x.json')).toThrow(
      /^Invalid metadata in x\.json:\n {2}meta: Required/
    );
  });

  it('rejects a test entry without anomaly_class', () => {
    const raw = JSON.stringify({
      meta: { normal_class: 'good', prefix: '' },
      test: [{ image_path: 'a.png' }],
    });

    expect(() => parseCategoryMetadata(raw, 'x.json')).toThrow(/test\.0\.anomaly_class: Required/);
  });

  it('rejects a train entry without image_path', () => {
    const raw = JSON.stringify({
      meta: { normal_class: 'good', prefix: '' },
      train: [{ anomaly_class: 'good' }],
    });

    expect(() => parseCategoryMetadata(raw, 'x.json')).toThrow(ValidationError);
    expect(() => parseCategoryMetadata(raw, 'x.json')).toThrow(/train\.0\.image_path: Required/);
  });

  it('defaults missing train and test arrays to empty', () => {
    const metadata = parseCategoryMetadata(
      JSON.stringify({ meta: { normal_class: 'good', prefix: '' } }),
      'x.json'
    );

    expect(metadata.train).toEqual([]);
    expect(metadata.test).toEqual([]);
  });
});

describe('loadCategoryDatasets', () => {
  let fixture: DatasetFixture;

  beforeEach(async () => {
    fixture = await createDatasetFixture();
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it('loads one category per JSON file, keyed by file stem in name order', async () => {
    await writeMetadata(fixture, 'zipper', {
      meta: { normal_class: 'good', prefix: 'zipper' },
      train: [{ image_path: 'z.png' }],
    });
    await writeMetadata(fixture, 'bottle', bottleMetadata());
    await writeFile(join(fixture.jsonDir, 'notes.txt'), 'skip me', 'utf-8');
    const { ctx } = createTestDatasetContext();

    const datasets = await loadCategoryDatasets(fixture.jsonDir, fixture.imageDir, ctx);

    expect([...datasets.keys()]).toEqual(['bottle', 'zipper']);
    expect(datasets.get('bottle')?.train).toHaveLength(2);
    expect(datasets.get('bottle')?.test).toHaveLength(2);
    expect(datasets.get('zipper')?.train[0].imagePath).toBe(
      join(fixture.imageDir, 'zipper', 'z.png')
    );
  });

  it('logs per-category counts', async () => {
    await writeMetadata(fixture, 'bottle', bottleMetadata());
    const { ctx, logger } = createTestDatasetContext();

    await loadCategoryDatasets(fixture.jsonDir, fixture.imageDir, ctx);

    expect(logger.info).toHaveBeenCalledWith("Category 'bottle': 2 train, 2 test samples", {
      category: 'bottle',
      trainSamples: 2,
      testSamples: 2,
    });
  });

  it('fails the whole load on one bad document', async () => {
    await writeMetadata(fixture, 'bottle', bottleMetadata());
    await writeFile(join(fixture.jsonDir, 'cable.json'), '[', 'utf-8');
    const { ctx } = createTestDatasetContext();

    await expect(loadCategoryDatasets(fixture.jsonDir, fixture.imageDir, ctx)).rejects.toThrow(
      ValidationError
    );
  });

  it('returns an empty map for a directory without JSON files', async () => {
    const { ctx } = createTestDatasetContext();

    const datasets = await loadCategoryDatasets(fixture.jsonDir, fixture.imageDir, ctx);

    expect(datasets.size).toBe(0);
  });

  it('ignores directories that end in .json', async () => {
    await mkdir(join(fixture.jsonDir, 'odd.json'));
    await writeMetadata(fixture, 'bottle', bottleMetadata());

    expect(await listMetadataFiles(fixture.jsonDir)).toEqual([
      join(fixture.jsonDir, 'bottle.json'),
    ]);
  });
});

describe('loadCategoryDocument', () => {
  let fixture: DatasetFixture;

  beforeEach(async () => {
    fixture = await createDatasetFixture();
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it('reads one document and resolves its paths', async () => {
    const file = await writeMetadata(fixture, 'bottle', bottleMetadata());

    const phases = await loadCategoryDocument(file, fixture.imageDir);

    expect(phases.train.map((sample) => sample.imagePath)).toEqual([
      join(fixture.imageDir, 'bottle/train/001.png'),
      join(fixture.imageDir, 'bottle/train/002.png'),
    ]);
    expect(phases.test[1]).toEqual({
      imagePath: join(fixture.imageDir, 'bottle/test/crack_01.png'),
      maskPath: join(fixture.imageDir, 'bottle/gt/crack_01.png'),
      label: true,
      anomalyClass: 'crack',
    });
  });

  it('names the file when the JSON is malformed', async () => {
    const file = join(fixture.jsonDir, 'broken.json');
    await writeFile(file, '{"meta": ', 'utf-8');

    const load = loadCategoryDocument(file, fixture.imageDir);

    await expect(load).rejects.toThrow(ValidationError);
    await expect(load).rejects.toThrow(`Malformed JSON in ${file}`);
  });
});
