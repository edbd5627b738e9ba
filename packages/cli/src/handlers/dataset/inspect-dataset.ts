/**
 * Inspect Dataset Handler
 */

import type { z } from 'zod';
import { inspectDataset, type CategoryInspection } from '@adprep/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { datasetInspectSchema } from '../../command-defs/dataset.js';

export type InspectDatasetArgs = Omit<z.output<typeof datasetInspectSchema>, 'format'>;

export async function inspectDatasetHandler(
  args: InspectDatasetArgs,
  ctx: CommandContext
): Promise<CategoryInspection[]> {
  return inspectDataset(
    { jsonDir: args.jsonDir, imageDir: args.imageDir },
    ctx.services.datasetContext()
  );
}
