/**
 * Config Loader - Load YAML/JSON configuration files with CLI override merging
 *
 * Provides config-first runner pattern:
 * - Auto-detect config format (YAML/JSON) by extension
 * - Load and parse config files
 * - Deep merge CLI overrides into config (validation happens downstream)
 *
 * Keys mirror the command's camelCase options (jsonDir, imageDir, linkMode, ...).
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import * as yaml from 'js-yaml';
import { ValidationError } from '@adprep/utils';

/**
 * Detect config format by file extension
 */
export function detectConfigFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  // Default to JSON for unknown extensions
  return 'json';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (CLI overrides win)
 *
 * Rules:
 * - Primitives: override value wins
 * - Arrays: override value replaces base value
 * - Objects: recursively merge (deep merge)
 * - undefined overrides are skipped
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }

    const baseValue = result[key];
    if (isPlainObject(value) && isPlainObject(baseValue)) {
      result[key] = deepMerge(baseValue, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Read a YAML or JSON config file into a plain object
 *
 * @throws ValidationError if the file cannot be read, parsed, or is not an object
 */
export async function loadConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const format = detectConfigFormat(configPath);
  let parsed: unknown;

  try {
    const fileContent = await readFile(configPath, 'utf-8');
    parsed = format === 'yaml' ? yaml.load(fileContent) : JSON.parse(fileContent);
  } catch (error) {
    throw new ValidationError(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { configPath, format }
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ValidationError(`${format === 'yaml' ? 'YAML' : 'JSON'} config must be an object`, {
      configPath,
      format,
    });
  }
  return parsed;
}
