/**
 * Register Dataset Handler
 */

import type { z } from 'zod';
import { registerDataset, type RegisterDatasetResult } from '@adprep/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { datasetRegisterSchema } from '../../command-defs/dataset.js';

export type RegisterDatasetArgs = Omit<z.output<typeof datasetRegisterSchema>, 'format'>;

export async function registerDatasetHandler(
  args: RegisterDatasetArgs,
  ctx: CommandContext
): Promise<RegisterDatasetResult> {
  return registerDataset(
    {
      dataRoot: args.dataRoot,
      datasetName: args.datasetName,
      preprocess: args.preprocess,
      outputDir: args.outDir ?? ctx.config.configOutputDir,
    },
    ctx.services.datasetContext()
  );
}
