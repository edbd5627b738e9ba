/**
 * Dataset Command Definitions
 */

import { z } from 'zod';
import { LINK_MODES } from '@adprep/utils';

export const datasetMaterializeSchema = z.object({
  jsonDir: z.string().min(1),
  imageDir: z.string().min(1),
  outputDir: z.string().min(1),
  // Both allow writing into an existing output directory
  overwrite: z.boolean().default(false),
  merge: z.boolean().default(false),
  // Falls back to ADPREP_LINK_MODE
  linkMode: z.enum(LINK_MODES).optional(),
  format: z.enum(['json', 'table']).default('table'),
});

export const datasetRegisterSchema = z.object({
  dataRoot: z.string().min(1),
  datasetName: z.string().min(1),
  preprocess: z.string().min(1).optional(),
  // Falls back to ADPREP_CONFIG_OUTPUT_DIR, then the working directory
  outDir: z.string().min(1).optional(),
  format: z.enum(['json', 'table']).default('table'),
});

export const datasetScanSchema = z.object({
  dataRoot: z.string().min(1),
  format: z.enum(['json', 'table', 'csv']).default('table'),
});

export const datasetInspectSchema = z.object({
  jsonDir: z.string().min(1),
  imageDir: z.string().min(1),
  format: z.enum(['json', 'table', 'csv']).default('table'),
});
