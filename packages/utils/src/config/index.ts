/**
 * Configuration loading from environment variables
 *
 * Provides typed defaults for the dataset preparation commands. CLI flags
 * and command config files take precedence over these values.
 */

import { ConfigurationError } from '../errors.js';

/**
 * How a source file is referenced from the materialized tree
 */
export const LINK_MODES = ['symlink', 'hardlink', 'copy', 'auto'] as const;

export type LinkMode = (typeof LINK_MODES)[number];

export interface DatasetPrepConfig {
  /** Default link mode for `dataset materialize` */
  linkMode: LinkMode;
  /** Directory that receives `dataset_config_<name>.txt` */
  configOutputDir: string;
}

export function isLinkMode(value: string): value is LinkMode {
  return (LINK_MODES as readonly string[]).includes(value);
}

/**
 * Load dataset preparation defaults from environment variables
 */
export function getDatasetPrepConfig(env: NodeJS.ProcessEnv = process.env): DatasetPrepConfig {
  const { ADPREP_LINK_MODE, ADPREP_CONFIG_OUTPUT_DIR } = env;

  const linkMode = ADPREP_LINK_MODE?.trim() || 'symlink';
  if (!isLinkMode(linkMode)) {
    throw new ConfigurationError(
      `ADPREP_LINK_MODE must be one of ${LINK_MODES.join(', ')} (got '${linkMode}')`,
      'ADPREP_LINK_MODE',
      { value: linkMode }
    );
  }

  return {
    linkMode,
    configOutputDir: ADPREP_CONFIG_OUTPUT_DIR || process.cwd(),
  };
}
