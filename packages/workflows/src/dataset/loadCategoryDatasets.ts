/**
 * Category Metadata Loader
 *
 * Reads every `<category>.json` in a metadata directory and normalizes its
 * entries into MetaSample lists. Paths are resolved against the image root
 * but never checked for existence here; the materializer does that.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { basename, extname, isAbsolute, join } from 'path';
import { z } from 'zod';
import { ValidationError } from '@adprep/utils';
import { CategoryMetadataSchema, type CategoryMetadata } from './metadata-schema.js';
import {
  compareCodePoints,
  type CategoryDataset,
  type CategoryPhases,
  type MetaSample,
  type WorkflowLogger,
} from './types.js';

export interface LoadDatasetContext {
  logger: WorkflowLogger;
}

/**
 * Resolve a document-relative path as `imageRoot / prefix / relative`.
 * Absolute entries are kept as they are.
 */
export function resolveSamplePath(imageRoot: string, prefix: string, relative: string): string {
  if (isAbsolute(relative)) {
    return relative;
  }
  return join(imageRoot, prefix, relative);
}

/**
 * Normalize one validated metadata document
 */
export function normalizeCategoryMetadata(
  metadata: CategoryMetadata,
  imageRoot: string
): CategoryPhases {
  const normalClass = metadata.meta.normal_class;
  const prefix = metadata.meta.prefix;

  const train: MetaSample[] = [];
  for (const entry of metadata.train) {
    const anomalyClass = entry.anomaly_class === undefined ? normalClass : entry.anomaly_class;
    // Anomalous training items (an explicit null included) are dropped
    if (anomalyClass !== normalClass) {
      continue;
    }
    train.push({
      imagePath: resolveSamplePath(imageRoot, prefix, entry.image_path),
      label: false,
      anomalyClass: normalClass,
    });
  }

  const test: MetaSample[] = metadata.test.map((entry) => {
    const isAnomaly = entry.anomaly_class !== normalClass;
    const sample: MetaSample = {
      imagePath: resolveSamplePath(imageRoot, prefix, entry.image_path),
      label: isAnomaly,
      anomalyClass: entry.anomaly_class,
    };
    if (isAnomaly && entry.mask_path != null) {
      sample.maskPath = resolveSamplePath(imageRoot, prefix, entry.mask_path);
    }
    return sample;
  });

  return { train, test };
}

/**
 * Parse and validate a metadata document's raw text
 *
 * @throws ValidationError for malformed JSON or schema violations
 */
export function parseCategoryMetadata(raw: string, source: string): CategoryMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `Malformed JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    );
  }

  try {
    return CategoryMetadataSchema.parse(parsed);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid metadata in ${source}:\n${messages.join('\n')}`, {
        source,
        issues: error.issues,
      });
    }
    throw error;
  }
}

/**
 * Load a single category document from disk
 */
export async function loadCategoryDocument(
  jsonFile: string,
  imageRoot: string
): Promise<CategoryPhases> {
  const raw = await readFile(jsonFile, 'utf-8');
  return normalizeCategoryMetadata(parseCategoryMetadata(raw, jsonFile), imageRoot);
}

/**
 * List `*.json` files directly inside a directory, sorted by name
 */
export async function listMetadataFiles(jsonDir: string): Promise<string[]> {
  const entries = await readdir(jsonDir);
  const files: string[] = [];
  for (const name of entries.sort(compareCodePoints)) {
    if (extname(name) !== '.json') {
      continue;
    }
    const fullPath = join(jsonDir, name);
    if ((await stat(fullPath)).isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Load every category in the metadata directory
 *
 * A bad document fails the whole load; categories are never silently skipped.
 */
export async function loadCategoryDatasets(
  jsonDir: string,
  imageRoot: string,
  ctx: LoadDatasetContext
): Promise<CategoryDataset> {
  const datasets: CategoryDataset = new Map();

  for (const jsonFile of await listMetadataFiles(jsonDir)) {
    ctx.logger.info('Loading dataset metadata', { path: jsonFile });
    const category = basename(jsonFile, '.json');
    const phases = await loadCategoryDocument(jsonFile, imageRoot);
    datasets.set(category, phases);

    ctx.logger.info(`Category '${category}': ${phases.train.length} train, ${phases.test.length} test samples`, {
      category,
      trainSamples: phases.train.length,
      testSamples: phases.test.length,
    });
  }

  return datasets;
}
