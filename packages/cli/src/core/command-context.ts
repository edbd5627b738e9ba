/**
 * Command Context - Lazy service creation and initialization
 *
 * This is NOT a framework - just an object that knows how to build the
 * workflow context and read environment defaults. Keeps wiring out of the
 * command files.
 */

import { getDatasetPrepConfig, type DatasetPrepConfig } from '@adprep/utils';
import { createDatasetContext, type DatasetWorkflowContext } from '@adprep/workflows';

/**
 * Services available in command context
 */
export interface CommandServices {
  datasetContext(): DatasetWorkflowContext;
}

/**
 * Options for creating a CommandContext with overrides (mostly for tests)
 */
export interface CommandContextOptions {
  /**
   * Override the workflow context (logger, clock, cwd, linker)
   */
  datasetContextOverride?: DatasetWorkflowContext;
  /**
   * Environment used for defaults (defaults to process.env)
   */
  env?: NodeJS.ProcessEnv;
}

/**
 * Command context - provides services and initialization
 */
export class CommandContext {
  private _config: DatasetPrepConfig | null = null;
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  /**
   * Read and validate environment defaults once
   *
   * @throws ConfigurationError for an invalid ADPREP_LINK_MODE
   */
  async ensureInitialized(): Promise<void> {
    if (!this._config) {
      this._config = getDatasetPrepConfig(this._options.env);
    }
  }

  get config(): DatasetPrepConfig {
    if (!this._config) {
      this._config = getDatasetPrepConfig(this._options.env);
    }
    return this._config;
  }

  /**
   * Get services (lazy creation)
   */
  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  private _createServices(): CommandServices {
    let datasetContext: DatasetWorkflowContext | null = null;
    return {
      datasetContext: () => {
        if (!datasetContext) {
          datasetContext = this._options.datasetContextOverride ?? createDatasetContext();
        }
        return datasetContext;
      },
    };
  }
}
