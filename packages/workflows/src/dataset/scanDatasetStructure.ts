/**
 * Dataset Structure Scanner
 *
 * Walks a materialized tree and recovers the object list and the anomaly
 * types per object. Needs no metadata: the directory names are the truth.
 */

import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import { NotFoundError } from '@adprep/utils';
import { sourceExists } from './linkers.js';
import { GOOD_BUCKET, compareCodePoints, type WorkflowLogger } from './types.js';

export interface ObjectStats {
  object: string;
  trainCount: number;
  testCount: number;
  anomalyTypes: string[];
}

export interface DatasetStructure {
  /** Sorted object (category) names */
  objects: string[];
  /** Sorted anomaly types per object, `good` excluded */
  objectAnomalies: Map<string, string[]>;
  stats: ObjectStats[];
}

export interface ScanDatasetContext {
  logger: WorkflowLogger;
}

/**
 * Sorted names of the subdirectories of `dir`; directory symlinks count
 */
export async function listSubdirectories(dir: string): Promise<string[]> {
  const names: string[] = [];
  for (const name of (await readdir(dir)).sort(compareCodePoints)) {
    const fullPath = join(dir, name);
    // Dangling links resolve to nothing and are skipped
    if ((await sourceExists(fullPath)) && (await stat(fullPath)).isDirectory()) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Number of entries directly inside `dir`, 0 when it does not exist
 */
async function countEntries(dir: string): Promise<number> {
  if (!(await sourceExists(dir))) {
    return 0;
  }
  return (await readdir(dir)).length;
}

/**
 * Number of non-directory entries anywhere below `dir`, 0 when it does not exist
 */
async function countFilesRecursive(dir: string): Promise<number> {
  if (!(await sourceExists(dir))) {
    return 0;
  }
  let count = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      count += await countFilesRecursive(join(dir, entry.name));
    } else {
      count += 1;
    }
  }
  return count;
}

/**
 * Scan `<root>/<object>/test/<anomaly-type>` directories
 *
 * @throws NotFoundError when the root does not exist
 */
export async function scanDatasetStructure(
  dataRoot: string,
  ctx: ScanDatasetContext
): Promise<DatasetStructure> {
  if (!(await sourceExists(dataRoot))) {
    throw new NotFoundError('Data root', dataRoot);
  }

  const objects = await listSubdirectories(dataRoot);
  const objectAnomalies = new Map<string, string[]>();
  const stats: ObjectStats[] = [];

  for (const object of objects) {
    const objectDir = join(dataRoot, object);
    const testDir = join(objectDir, 'test');

    const anomalyTypes = (await sourceExists(testDir))
      ? (await listSubdirectories(testDir)).filter((name) => name !== GOOD_BUCKET)
      : [];
    objectAnomalies.set(object, anomalyTypes);

    const trainCount = await countEntries(join(objectDir, 'train', GOOD_BUCKET));
    const testCount = await countFilesRecursive(testDir);
    stats.push({ object, trainCount, testCount, anomalyTypes });

    ctx.logger.info(
      `${object}: ${trainCount} train, ${testCount} test samples, ${anomalyTypes.length} anomaly types`,
      { object, trainCount, testCount, anomalyTypes: anomalyTypes.length }
    );
  }

  return { objects, objectAnomalies, stats };
}
