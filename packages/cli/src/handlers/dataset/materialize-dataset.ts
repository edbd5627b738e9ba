/**
 * Materialize Dataset Handler
 */

import type { z } from 'zod';
import { materializeDataset, type MaterializeDatasetResult } from '@adprep/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { datasetMaterializeSchema } from '../../command-defs/dataset.js';

export type MaterializeDatasetArgs = Omit<z.output<typeof datasetMaterializeSchema>, 'format'>;

export async function materializeDatasetHandler(
  args: MaterializeDatasetArgs,
  ctx: CommandContext
): Promise<MaterializeDatasetResult> {
  return materializeDataset(
    {
      jsonDir: args.jsonDir,
      imageDir: args.imageDir,
      outputDir: args.outputDir,
      mergeExistingOutput: args.overwrite || args.merge,
      linkMode: args.linkMode ?? ctx.config.linkMode,
    },
    ctx.services.datasetContext()
  );
}
