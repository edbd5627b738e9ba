import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, symlink } from 'fs/promises';
import { join } from 'path';
import { NotFoundError } from '@adprep/utils';
import {
  listSubdirectories,
  scanDatasetStructure,
} from '../../../src/dataset/scanDatasetStructure.js';
import {
  createDatasetFixture,
  createTestDatasetContext,
  touchFiles,
  type DatasetFixture,
} from '../../helpers/datasetFixture.js';

describe('scanDatasetStructure', () => {
  let fixture: DatasetFixture;
  let dataRoot: string;

  beforeEach(async () => {
    fixture = await createDatasetFixture();
    dataRoot = fixture.outputDir;
    await touchFiles(dataRoot, [
      'cable/train/good/1.png',
      'cable/test/good/2.png',
      'cable/test/cut/3.png',
      'cable/test/bent/4.png',
      'cable/test/bent/5.png',
      'bottle/train/good/1.png',
      'bottle/train/good/2.png',
      'bottle/test/broken/3.png',
      'README.md',
    ]);
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it('lists objects and anomaly types in sorted order, good excluded', async () => {
    const { ctx } = createTestDatasetContext();

    const structure = await scanDatasetStructure(dataRoot, ctx);

    expect(structure.objects).toEqual(['bottle', 'cable']);
    expect([...structure.objectAnomalies]).toEqual([
      ['bottle', ['broken']],
      ['cable', ['bent', 'cut']],
    ]);
  });

  it('orders names by code point, astral characters last', async () => {
    await touchFiles(dataRoot, ['\u{FF5E}/train/good/1.png', '\u{1F600}/train/good/1.png']);
    const { ctx } = createTestDatasetContext();

    const structure = await scanDatasetStructure(dataRoot, ctx);

    expect(structure.objects).toEqual(['bottle', 'cable', '\u{FF5E}', '\u{1F600}']);
  });

  it('counts train and test samples per object', async () => {
    const { ctx, logger } = createTestDatasetContext();

    const structure = await scanDatasetStructure(dataRoot, ctx);

    expect(structure.stats).toEqual([
      { object: 'bottle', trainCount: 2, testCount: 1, anomalyTypes: ['broken'] },
      { object: 'cable', trainCount: 1, testCount: 4, anomalyTypes: ['bent', 'cut'] },
    ]);
    expect(logger.info).toHaveBeenCalledWith('cable: 1 train, 4 test samples, 2 anomaly types', {
      object: 'cable',
      trainCount: 1,
      testCount: 4,
      anomalyTypes: 2,
    });
  });

  it('gives an object without a test directory no anomaly types', async () => {
    await mkdir(join(dataRoot, 'capsule', 'train', 'good'), { recursive: true });
    const { ctx } = createTestDatasetContext();

    const structure = await scanDatasetStructure(dataRoot, ctx);

    expect(structure.objectAnomalies.get('capsule')).toEqual([]);
    expect(structure.stats.find((s) => s.object === 'capsule')).toEqual({
      object: 'capsule',
      trainCount: 0,
      testCount: 0,
      anomalyTypes: [],
    });
  });

  it('returns an empty structure for an empty root', async () => {
    const emptyRoot = join(fixture.root, 'empty');
    await mkdir(emptyRoot);
    const { ctx } = createTestDatasetContext();

    const structure = await scanDatasetStructure(emptyRoot, ctx);

    expect(structure.objects).toEqual([]);
    expect(structure.objectAnomalies.size).toBe(0);
  });

  it('fails for a missing root', async () => {
    const { ctx } = createTestDatasetContext();

    await expect(scanDatasetStructure(join(fixture.root, 'missing'), ctx)).rejects.toThrow(
      NotFoundError
    );
  });
});

describe('listSubdirectories', () => {
  let fixture: DatasetFixture;

  beforeEach(async () => {
    fixture = await createDatasetFixture();
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it('follows directory links and skips dangling ones', async () => {
    await mkdir(join(fixture.root, 'real'));
    const dir = join(fixture.root, 'listing');
    await mkdir(dir);
    await mkdir(join(dir, 'b'));
    await symlink(join(fixture.root, 'real'), join(dir, 'a'));
    await symlink(join(fixture.root, 'gone'), join(dir, 'c'));
    await touchFiles(dir, ['d.txt']);

    expect(await listSubdirectories(dir)).toEqual(['a', 'b']);
  });
});
