/**
 * File Linker Port
 *
 * The materialized tree only promises that each output path resolves to the
 * same content as its source. How that reference is made is chosen here.
 */

import { copyFile, link, lstat, stat, symlink } from 'fs/promises';
import { resolve } from 'path';
import type { LinkMode } from '@adprep/utils';

export interface FileLinker {
  readonly mode: LinkMode;
  /**
   * Create `target` referring to `source`. The target must not exist.
   */
  link(source: string, target: string): Promise<void>;
}

const SYMLINK_UNSUPPORTED_CODES = new Set(['EPERM', 'EACCES', 'ENOTSUP', 'ENOSYS']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export const symlinkLinker: FileLinker = {
  mode: 'symlink',
  // links point at absolute source paths
  link: (source, target) => symlink(resolve(source), target),
};

export const hardlinkLinker: FileLinker = {
  mode: 'hardlink',
  link: (source, target) => link(resolve(source), target),
};

export const copyLinker: FileLinker = {
  mode: 'copy',
  link: (source, target) => copyFile(resolve(source), target),
};

/**
 * Symlink first, copy when the platform refuses symbolic links
 */
export const autoLinker: FileLinker = {
  mode: 'auto',
  async link(source, target) {
    try {
      await symlinkLinker.link(source, target);
    } catch (error) {
      const code = errorCode(error);
      if (code === undefined || !SYMLINK_UNSUPPORTED_CODES.has(code)) {
        throw error;
      }
      await copyLinker.link(source, target);
    }
  },
};

export function createFileLinker(mode: LinkMode): FileLinker {
  switch (mode) {
    case 'symlink':
      return symlinkLinker;
    case 'hardlink':
      return hardlinkLinker;
    case 'copy':
      return copyLinker;
    case 'auto':
      return autoLinker;
  }
}

/**
 * True if anything (including a dangling symlink) occupies the path
 */
export async function entryExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * True if the path resolves to an existing file or directory (follows links)
 */
export async function sourceExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}
