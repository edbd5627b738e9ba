/**
 * Commander program for the adprep CLI
 *
 * Command modules register themselves in commandRegistry when imported (side
 * effects). registerXCommands functions add Commander options and wire them
 * to the handlers from the registry.
 */

import { Command } from 'commander';
// Importing the module also registers its package in commandRegistry
import { registerDatasetCommands } from './commands/dataset.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('adprep')
    .description('Prepare anomaly-detection datasets for AnomalyDINO')
    .version('0.1.0');

  registerDatasetCommands(program);

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}
