/**
 * Dataset Registration Workflow
 *
 * Scans a materialized tree, renders the get_dataset_info() branch for it
 * and saves the snippet next to the caller as dataset_config_<name>.txt.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { z } from 'zod';
import { scanDatasetStructure, type ObjectStats } from './scanDatasetStructure.js';
import {
  datasetConfigFileName,
  renderDatasetConfig,
  renderDatasetConfigFile,
} from './renderDatasetConfig.js';
import type { WorkflowLogger } from './types.js';

export const RegisterDatasetSpecSchema = z.object({
  dataRoot: z.string().min(1),
  datasetName: z.string().min(1),
  preprocess: z.string().min(1).optional(),
  /** Directory for the generated file; defaults to the working directory */
  outputDir: z.string().min(1).optional(),
});

export type RegisterDatasetSpec = z.input<typeof RegisterDatasetSpecSchema>;

export type RegisterDatasetResult = {
  datasetName: string;
  dataRoot: string;
  preprocess?: string;
  objects: string[];
  objectCount: number;
  stats: ObjectStats[];
  configText: string;
  outputFile: string;
  nextSteps: string[];
};

export type RegisterDatasetContext = {
  logger: WorkflowLogger;
  cwd: () => string;
};

export async function registerDataset(
  spec: RegisterDatasetSpec,
  ctx: RegisterDatasetContext
): Promise<RegisterDatasetResult> {
  const validated = RegisterDatasetSpecSchema.parse(spec);

  ctx.logger.info(`Scanning dataset structure in: ${validated.dataRoot}`, {
    dataRoot: validated.dataRoot,
  });
  const structure = await scanDatasetStructure(validated.dataRoot, ctx);
  ctx.logger.info(`Found ${structure.objects.length} object categories`, {
    datasetName: validated.datasetName,
    objects: structure.objects.length,
  });

  const configText = renderDatasetConfig({
    datasetName: validated.datasetName,
    objects: structure.objects,
    objectAnomalies: structure.objectAnomalies,
    preprocess: validated.preprocess,
  });

  const outputDir = resolve(validated.outputDir ?? ctx.cwd());
  await mkdir(outputDir, { recursive: true });
  const outputFile = join(outputDir, datasetConfigFileName(validated.datasetName));
  await writeFile(outputFile, renderDatasetConfigFile(configText), 'utf-8');
  ctx.logger.info(`Configuration saved to: ${outputFile}`, { outputFile });

  return {
    datasetName: validated.datasetName,
    dataRoot: validated.dataRoot,
    preprocess: validated.preprocess,
    objects: structure.objects,
    objectCount: structure.objects.length,
    stats: structure.stats,
    configText,
    outputFile,
    nextSteps: [
      'Copy the generated branch into src/utils.py (get_dataset_info)',
      `python run_anomalydino.py --dataset ${validated.datasetName} --data_root ${validated.dataRoot}`,
    ],
  };
}
