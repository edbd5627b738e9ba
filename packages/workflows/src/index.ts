export type {
  MetaSample,
  Phase,
  CategoryPhases,
  CategoryDataset,
  WorkflowLogger,
} from './dataset/types.js';
export { GOOD_BUCKET, compareCodePoints } from './dataset/types.js';

export {
  loadCategoryDatasets,
  loadCategoryDocument,
  listMetadataFiles,
  normalizeCategoryMetadata,
  parseCategoryMetadata,
  resolveSamplePath,
} from './dataset/loadCategoryDatasets.js';
export type { LoadDatasetContext } from './dataset/loadCategoryDatasets.js';
export { CategoryMetadataSchema } from './dataset/metadata-schema.js';
export type { CategoryMetadata, TrainEntry, TestEntry } from './dataset/metadata-schema.js';

export {
  createFileLinker,
  symlinkLinker,
  hardlinkLinker,
  copyLinker,
  autoLinker,
  entryExists,
  sourceExists,
} from './dataset/linkers.js';
export type { FileLinker } from './dataset/linkers.js';

export {
  materializeDataset,
  materializeCategoryDatasets,
  groupTestSamples,
  MaterializeDatasetSpecSchema,
} from './dataset/materializeDataset.js';
export type {
  MaterializeDatasetSpec,
  MaterializeDatasetResult,
  MaterializeDatasetContext,
  MaterializeTally,
  MissingFile,
  FilenameCollision,
  CategoryMaterializeSummary,
} from './dataset/materializeDataset.js';

export { scanDatasetStructure, listSubdirectories } from './dataset/scanDatasetStructure.js';
export type {
  DatasetStructure,
  ObjectStats,
  ScanDatasetContext,
} from './dataset/scanDatasetStructure.js';

export {
  renderDatasetConfig,
  renderDatasetConfigFile,
  resolvePreprocessDefaults,
  datasetConfigFileName,
  PREPROCESS_DEFAULTS,
  CONFIG_FILE_HEADER,
} from './dataset/renderDatasetConfig.js';
export type { PreprocessDefaults, RenderDatasetConfigInput } from './dataset/renderDatasetConfig.js';

export { registerDataset, RegisterDatasetSpecSchema } from './dataset/registerDataset.js';
export type {
  RegisterDatasetSpec,
  RegisterDatasetResult,
  RegisterDatasetContext,
} from './dataset/registerDataset.js';

export {
  inspectDataset,
  summarizeCategoryDatasets,
  InspectDatasetSpecSchema,
} from './dataset/inspectDataset.js';
export type { InspectDatasetSpec, CategoryInspection } from './dataset/inspectDataset.js';

export { createDatasetContext, createDatasetLogger } from './context/createDatasetContext.js';
export type {
  DatasetContextConfig,
  DatasetWorkflowContext,
} from './context/createDatasetContext.js';
