/**
 * Scan Dataset Handler
 *
 * Returns one row per object so the table and CSV formats work unchanged.
 */

import type { z } from 'zod';
import { scanDatasetStructure, type ObjectStats } from '@adprep/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { datasetScanSchema } from '../../command-defs/dataset.js';

export type ScanDatasetArgs = Omit<z.output<typeof datasetScanSchema>, 'format'>;

export async function scanDatasetHandler(
  args: ScanDatasetArgs,
  ctx: CommandContext
): Promise<ObjectStats[]> {
  const structure = await scanDatasetStructure(args.dataRoot, ctx.services.datasetContext());
  return structure.stats;
}
