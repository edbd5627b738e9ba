/**
 * Dataset Materialization Workflow
 *
 * Builds the AnomalyDINO directory layout from per-category metadata:
 *
 *   <output>/<category>/train/good/<image>
 *   <output>/<category>/test/<bucket>/<image>
 *   <output>/<category>/ground_truth/<bucket>/<image>
 *
 * Every entry is a link to the source file (see FileLinker). Missing sources
 * are counted and reported, never fatal. Re-running skips entries that
 * already exist, so an interrupted run resumes where it stopped.
 */

import { mkdir } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { z } from 'zod';
import { LINK_MODES, NotFoundError, type LinkMode } from '@adprep/utils';
import { loadCategoryDatasets } from './loadCategoryDatasets.js';
import { createFileLinker, entryExists, sourceExists, type FileLinker } from './linkers.js';
import {
  GOOD_BUCKET,
  type CategoryDataset,
  type MetaSample,
  type Phase,
  type WorkflowLogger,
} from './types.js';

export const MaterializeDatasetSpecSchema = z.object({
  jsonDir: z.string().min(1),
  imageDir: z.string().min(1),
  outputDir: z.string().min(1),
  /** Required to write into an output directory that already exists */
  mergeExistingOutput: z.boolean().default(false),
  linkMode: z.enum(LINK_MODES).default('symlink'),
});

export type MaterializeDatasetSpec = z.input<typeof MaterializeDatasetSpecSchema>;

export type MissingFileKind = 'image' | 'mask';

export interface MissingFile {
  category: string;
  phase: Phase;
  bucket: string;
  kind: MissingFileKind;
  path: string;
}

export interface FilenameCollision {
  category: string;
  phase: Phase;
  bucket: string;
  fileName: string;
  keptSource: string;
  droppedSource: string;
}

export interface CategoryMaterializeSummary {
  category: string;
  trainSamples: number;
  testBuckets: Array<{ bucket: string; samples: number }>;
}

export interface MaterializeTally {
  categories: CategoryMaterializeSummary[];
  totalLinksCreated: number;
  existingLinksSkipped: number;
  missingFilesCount: number;
  missingFiles: MissingFile[];
  filenameCollisions: FilenameCollision[];
}

export type MaterializeDatasetResult = MaterializeTally & {
  status: 'completed' | 'aborted';
  outputDir: string;
  linkMode: LinkMode;
  timestamp: string;
};

export type MaterializeDatasetContext = {
  logger: WorkflowLogger;
  clock: {
    nowISO: () => string;
  };
  /** Overrides the linker chosen from `linkMode` */
  linker?: FileLinker;
};

function emptyTally(): MaterializeTally {
  return {
    categories: [],
    totalLinksCreated: 0,
    existingLinksSkipped: 0,
    missingFilesCount: 0,
    missingFiles: [],
    filenameCollisions: [],
  };
}

/**
 * Group test samples by output bucket, buckets in first-seen order
 */
export function groupTestSamples(samples: readonly MetaSample[]): Map<string, MetaSample[]> {
  const grouped = new Map<string, MetaSample[]>();
  for (const sample of samples) {
    const bucket = sample.label ? sample.anomalyClass : GOOD_BUCKET;
    const existing = grouped.get(bucket);
    if (existing) {
      existing.push(sample);
    } else {
      grouped.set(bucket, [sample]);
    }
  }
  return grouped;
}

/**
 * Per-run bookkeeping: counters plus which source claimed each target
 */
class LinkWriter {
  readonly tally: MaterializeTally = emptyTally();
  private readonly claimed = new Map<string, string>();

  constructor(
    private readonly linker: FileLinker,
    private readonly logger: WorkflowLogger
  ) {}

  recordMissing(missing: MissingFile): void {
    this.tally.missingFiles.push(missing);
    this.tally.missingFilesCount += 1;
    const label = missing.kind === 'image' ? 'Image' : 'Mask';
    this.logger.warn(`${label} not found: ${missing.path}`, { ...missing });
  }

  /**
   * Link `source` into `dir` under `fileName` unless that target is taken
   */
  async place(
    source: string,
    dir: string,
    fileName: string,
    where: { category: string; phase: Phase; bucket: string }
  ): Promise<void> {
    const target = join(dir, fileName);
    const claimedBy = this.claimed.get(target);

    if (claimedBy !== undefined) {
      if (claimedBy !== source) {
        const collision: FilenameCollision = {
          ...where,
          fileName,
          keptSource: claimedBy,
          droppedSource: source,
        };
        this.tally.filenameCollisions.push(collision);
        this.logger.warn(`Filename collision, keeping first source: ${target}`, { ...collision });
      }
      return;
    }

    this.claimed.set(target, source);
    if (await entryExists(target)) {
      this.tally.existingLinksSkipped += 1;
      return;
    }

    await this.linker.link(source, target);
    this.tally.totalLinksCreated += 1;
  }
}

async function materializeCategory(
  category: string,
  train: readonly MetaSample[],
  test: readonly MetaSample[],
  outputDir: string,
  writer: LinkWriter,
  logger: WorkflowLogger
): Promise<CategoryMaterializeSummary> {
  logger.info(`Processing category: ${category}`, { category });
  const categoryDir = join(outputDir, category);

  const trainDir = join(categoryDir, 'train', GOOD_BUCKET);
  await mkdir(trainDir, { recursive: true });

  for (const sample of train) {
    const where = { category, phase: 'train' as const, bucket: GOOD_BUCKET };
    if (!(await sourceExists(sample.imagePath))) {
      writer.recordMissing({ ...where, kind: 'image', path: sample.imagePath });
      continue;
    }
    await writer.place(sample.imagePath, trainDir, basename(sample.imagePath), where);
  }
  logger.info(`Linked ${train.length} train samples`, { category, samples: train.length });

  const testBuckets: CategoryMaterializeSummary['testBuckets'] = [];

  for (const [bucket, samples] of groupTestSamples(test)) {
    const where = { category, phase: 'test' as const, bucket };
    const testDir = join(categoryDir, 'test', bucket);
    await mkdir(testDir, { recursive: true });

    for (const sample of samples) {
      if (!(await sourceExists(sample.imagePath))) {
        writer.recordMissing({ ...where, kind: 'image', path: sample.imagePath });
        continue;
      }

      const fileName = basename(sample.imagePath);
      await writer.place(sample.imagePath, testDir, fileName, where);

      if (!sample.label || sample.maskPath === undefined) {
        continue;
      }
      if (!(await sourceExists(sample.maskPath))) {
        writer.recordMissing({ ...where, kind: 'mask', path: sample.maskPath });
        continue;
      }

      // ground_truth/<bucket> only appears once a mask actually exists
      const maskDir = join(categoryDir, 'ground_truth', bucket);
      await mkdir(maskDir, { recursive: true });
      await writer.place(sample.maskPath, maskDir, fileName, where);
    }

    testBuckets.push({ bucket, samples: samples.length });
    logger.info(`Linked ${samples.length} test samples for '${bucket}'`, {
      category,
      bucket,
      samples: samples.length,
    });
  }

  return { category, trainSamples: train.length, testBuckets };
}

/**
 * Materialize already-loaded category datasets under `outputDir`
 */
export async function materializeCategoryDatasets(
  datasets: CategoryDataset,
  outputDir: string,
  linker: FileLinker,
  logger: WorkflowLogger
): Promise<MaterializeTally> {
  const writer = new LinkWriter(linker, logger);

  for (const [category, phases] of datasets) {
    const summary = await materializeCategory(
      category,
      phases.train,
      phases.test,
      outputDir,
      writer,
      logger
    );
    writer.tally.categories.push(summary);
  }

  return writer.tally;
}

/**
 * Load metadata and materialize the link tree
 *
 * @throws NotFoundError when the metadata directory or image root is missing
 */
export async function materializeDataset(
  spec: MaterializeDatasetSpec,
  ctx: MaterializeDatasetContext
): Promise<MaterializeDatasetResult> {
  const validated = MaterializeDatasetSpecSchema.parse(spec);
  const outputDir = resolve(validated.outputDir);
  const linker = ctx.linker ?? createFileLinker(validated.linkMode);

  if (!(await sourceExists(validated.jsonDir))) {
    throw new NotFoundError('JSON directory', validated.jsonDir);
  }
  if (!(await sourceExists(validated.imageDir))) {
    throw new NotFoundError('Image directory', validated.imageDir);
  }

  const base = {
    outputDir,
    linkMode: linker.mode,
    timestamp: ctx.clock.nowISO(),
  };

  if ((await entryExists(outputDir)) && !validated.mergeExistingOutput) {
    ctx.logger.warn(`Output directory ${outputDir} already exists; pass merge to continue`, {
      outputDir,
    });
    return { ...base, ...emptyTally(), status: 'aborted' };
  }

  // Metadata errors surface before the output root is touched
  const datasets = await loadCategoryDatasets(validated.jsonDir, validated.imageDir, ctx);

  await mkdir(outputDir, { recursive: true });
  const tally = await materializeCategoryDatasets(datasets, outputDir, linker, ctx.logger);

  ctx.logger.info('Materialization summary', {
    categories: tally.categories.length,
    totalLinksCreated: tally.totalLinksCreated,
    missingFiles: tally.missingFilesCount,
    outputDir,
  });

  return { ...base, ...tally, status: 'completed' };
}
