/**
 * Metadata inspection workflow: per-category counts straight from the JSON,
 * without touching the output tree or checking source files.
 */

import { z } from 'zod';
import { NotFoundError } from '@adprep/utils';
import { loadCategoryDatasets, type LoadDatasetContext } from './loadCategoryDatasets.js';
import { groupTestSamples } from './materializeDataset.js';
import { sourceExists } from './linkers.js';
import { GOOD_BUCKET, type CategoryDataset } from './types.js';

export const InspectDatasetSpecSchema = z.object({
  jsonDir: z.string().min(1),
  imageDir: z.string().min(1),
});

export type InspectDatasetSpec = z.input<typeof InspectDatasetSpecSchema>;

export interface CategoryInspection {
  category: string;
  trainSamples: number;
  testSamples: number;
  testGood: number;
  testAnomalous: number;
  masks: number;
  anomalyTypes: string[];
}

export function summarizeCategoryDatasets(datasets: CategoryDataset): CategoryInspection[] {
  return [...datasets].map(([category, { train, test }]) => {
    const buckets = groupTestSamples(test);
    const testGood = buckets.get(GOOD_BUCKET)?.length ?? 0;
    return {
      category,
      trainSamples: train.length,
      testSamples: test.length,
      testGood,
      testAnomalous: test.length - testGood,
      masks: test.filter((sample) => sample.maskPath !== undefined).length,
      anomalyTypes: [...buckets.keys()].filter((bucket) => bucket !== GOOD_BUCKET),
    };
  });
}

export async function inspectDataset(
  spec: InspectDatasetSpec,
  ctx: LoadDatasetContext
): Promise<CategoryInspection[]> {
  const validated = InspectDatasetSpecSchema.parse(spec);
  if (!(await sourceExists(validated.jsonDir))) {
    throw new NotFoundError('JSON directory', validated.jsonDir);
  }
  const datasets = await loadCategoryDatasets(validated.jsonDir, validated.imageDir, ctx);
  return summarizeCategoryDatasets(datasets);
}
