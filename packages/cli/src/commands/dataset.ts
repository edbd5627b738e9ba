/**
 * Dataset Commands
 */

import type { Command } from 'commander';
import { LINK_MODES } from '@adprep/utils';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { commandRegistry, defineCommandDefinition } from '../core/command-registry.js';
import {
  datasetInspectSchema,
  datasetMaterializeSchema,
  datasetRegisterSchema,
  datasetScanSchema,
} from '../command-defs/dataset.js';
import { materializeDatasetHandler } from '../handlers/dataset/materialize-dataset.js';
import { registerDatasetHandler } from '../handlers/dataset/register-dataset.js';
import { scanDatasetHandler } from '../handlers/dataset/scan-dataset.js';
import { inspectDatasetHandler } from '../handlers/dataset/inspect-dataset.js';
import type { PackageCommandModule } from '../types/index.js';

/**
 * Register dataset commands
 */
export function registerDatasetCommands(program: Command): void {
  const datasetCmd = program
    .command('dataset')
    .description('Materialize anomaly-detection datasets and register them with AnomalyDINO');

  const materializeCmd = datasetCmd
    .command('materialize')
    .description('Build train/test/ground_truth link trees from per-category JSON metadata')
    .option('--json-dir <dir>', 'Directory of <category>.json metadata files')
    .option('--image-dir <dir>', 'Root directory the metadata paths are relative to')
    .option('--output-dir <dir>', 'Directory to create the dataset tree in')
    .option('--overwrite', 'Write into an existing output directory')
    .option('--merge', 'Write into an existing output directory (alias of --overwrite)')
    .option('--link-mode <mode>', `How files are referenced: ${LINK_MODES.join(', ')}`)
    .option('--config <file>', 'YAML or JSON file with any of the options above')
    .option('--format <format>', 'Output format (table, json)');

  defineCommand(materializeCmd, {
    name: 'materialize',
    packageName: 'dataset',
    onError: die,
  });

  const registerCmd = datasetCmd
    .command('register')
    .description('Scan a materialized tree and generate its get_dataset_info() branch')
    .option('--data-root <dir>', 'Root of the materialized dataset')
    .option('--dataset-name <name>', 'Name used in the generated branch and file name')
    .option('--preprocess <mode>', 'Resolve masking/rotation defaults for this preprocess mode')
    .option('--out-dir <dir>', 'Directory for dataset_config_<name>.txt')
    .option('--config <file>', 'YAML or JSON file with any of the options above')
    .option('--format <format>', 'Output format (table, json)');

  defineCommand(registerCmd, {
    name: 'register',
    packageName: 'dataset',
    onError: die,
  });

  const scanCmd = datasetCmd
    .command('scan')
    .description('List objects, sample counts and anomaly types of a materialized tree')
    .option('--data-root <dir>', 'Root of the materialized dataset')
    .option('--format <format>', 'Output format (table, json, csv)');

  defineCommand(scanCmd, {
    name: 'scan',
    packageName: 'dataset',
    onError: die,
  });

  const inspectCmd = datasetCmd
    .command('inspect')
    .description('Summarize JSON metadata per category without touching the filesystem tree')
    .option('--json-dir <dir>', 'Directory of <category>.json metadata files')
    .option('--image-dir <dir>', 'Root directory the metadata paths are relative to')
    .option('--format <format>', 'Output format (table, json, csv)');

  defineCommand(inspectCmd, {
    name: 'inspect',
    packageName: 'dataset',
    onError: die,
  });
}

/**
 * Register as package command module
 */
export const datasetModule: PackageCommandModule = {
  packageName: 'dataset',
  description: 'Materialize anomaly-detection datasets and register them with AnomalyDINO',
  commands: [
    defineCommandDefinition({
      name: 'materialize',
      description: 'Build train/test/ground_truth link trees from per-category JSON metadata',
      schema: datasetMaterializeSchema,
      handler: materializeDatasetHandler,
      examples: [
        'adprep dataset materialize --json-dir meta/ --image-dir images/ --output-dir data/mvtec_like',
        'adprep dataset materialize --config materialize.yaml --merge',
      ],
    }),
    defineCommandDefinition({
      name: 'register',
      description: 'Scan a materialized tree and generate its get_dataset_info() branch',
      schema: datasetRegisterSchema,
      handler: registerDatasetHandler,
      examples: [
        'adprep dataset register --data-root data/mvtec_like --dataset-name mvtec_like',
        'adprep dataset register --data-root data/mvtec_like --dataset-name mvtec_like --preprocess agnostic',
      ],
    }),
    defineCommandDefinition({
      name: 'scan',
      description: 'List objects, sample counts and anomaly types of a materialized tree',
      schema: datasetScanSchema,
      handler: scanDatasetHandler,
      examples: ['adprep dataset scan --data-root data/mvtec_like --format csv'],
    }),
    defineCommandDefinition({
      name: 'inspect',
      description: 'Summarize JSON metadata per category without touching the filesystem tree',
      schema: datasetInspectSchema,
      handler: inspectDatasetHandler,
      examples: ['adprep dataset inspect --json-dir meta/ --image-dir images/'],
    }),
  ],
};

commandRegistry.registerPackage(datasetModule);
