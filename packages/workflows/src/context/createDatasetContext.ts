/**
 * Create Dataset Workflow Contexts
 *
 * Composition root for the dataset workflows: wires the shared logger, a
 * luxon clock and the process working directory. Tests pass their own.
 */

import { DateTime } from 'luxon';
import { createLogger } from '@adprep/utils';
import type { FileLinker } from '../dataset/linkers.js';
import type { MaterializeDatasetContext } from '../dataset/materializeDataset.js';
import type { RegisterDatasetContext } from '../dataset/registerDataset.js';
import type { WorkflowLogger } from '../dataset/types.js';

export interface DatasetContextConfig {
  logger?: WorkflowLogger;
  clock?: {
    nowISO: () => string;
  };
  cwd?: () => string;
  linker?: FileLinker;
}

export type DatasetWorkflowContext = MaterializeDatasetContext & RegisterDatasetContext;

export function createDatasetLogger(namespace: string = 'workflows'): WorkflowLogger {
  const utilsLogger = createLogger(namespace);
  return {
    info: (msg, ctx) => utilsLogger.info(msg, ctx),
    warn: (msg, ctx) => utilsLogger.warn(msg, ctx),
    error: (msg, ctx) => utilsLogger.error(msg, undefined, ctx),
    debug: (msg, ctx) => utilsLogger.debug(msg, ctx),
  };
}

export function createDatasetContext(config?: DatasetContextConfig): DatasetWorkflowContext {
  return {
    logger: config?.logger ?? createDatasetLogger(),
    clock: config?.clock ?? { nowISO: () => DateTime.utc().toISO()! },
    cwd: config?.cwd ?? (() => process.cwd()),
    linker: config?.linker,
  };
}
