/**
 * Test Helper: temporary dataset trees
 *
 * Builds metadata documents and source images under a fresh temp directory
 * and hands out a deterministic workflow context with a spy logger.
 */

import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { vi } from 'vitest';
import type { DatasetWorkflowContext } from '../../src/context/createDatasetContext.js';

export const FIXED_NOW = '2026-01-15T09:30:00.000Z';

export interface DatasetFixture {
  root: string;
  jsonDir: string;
  imageDir: string;
  outputDir: string;
  cleanup: () => Promise<void>;
}

export async function createDatasetFixture(): Promise<DatasetFixture> {
  const root = await mkdtemp(join(tmpdir(), 'adprep-test-'));
  const jsonDir = join(root, 'meta');
  const imageDir = join(root, 'images');
  await mkdir(jsonDir, { recursive: true });
  await mkdir(imageDir, { recursive: true });
  return {
    root,
    jsonDir,
    imageDir,
    outputDir: join(root, 'out'),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

export async function writeMetadata(
  fixture: DatasetFixture,
  category: string,
  document: unknown
): Promise<string> {
  const file = join(fixture.jsonDir, `${category}.json`);
  await writeFile(file, JSON.stringify(document, null, 2), 'utf-8');
  return file;
}

/**
 * Create source files under the image root; content is the relative path
 */
export async function writeSourceFiles(
  fixture: DatasetFixture,
  relativePaths: readonly string[]
): Promise<void> {
  for (const relative of relativePaths) {
    const file = join(fixture.imageDir, relative);
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, relative, 'utf-8');
  }
}

/**
 * Create empty files at paths relative to `root`
 */
export async function touchFiles(root: string, relativePaths: readonly string[]): Promise<void> {
  for (const relative of relativePaths) {
    const file = join(root, relative);
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, '', 'utf-8');
  }
}

export function createTestDatasetContext(cwd?: string) {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
  const ctx: DatasetWorkflowContext = {
    logger,
    clock: { nowISO: () => FIXED_NOW },
    cwd: () => cwd ?? process.cwd(),
  };
  return { ctx, logger };
}

/**
 * The single-category document used across the materializer tests
 */
export function bottleMetadata() {
  return {
    meta: { normal_class: 'good', prefix: 'bottle' },
    train: [
      { image_path: 'train/001.png' },
      { image_path: 'train/002.png', anomaly_class: 'good' },
    ],
    test: [
      { image_path: 'test/ok_01.png', anomaly_class: 'good' },
      { image_path: 'test/crack_01.png', anomaly_class: 'crack', mask_path: 'gt/crack_01.png' },
    ],
  };
}

export const BOTTLE_SOURCES = [
  'bottle/train/001.png',
  'bottle/train/002.png',
  'bottle/test/ok_01.png',
  'bottle/test/crack_01.png',
  'bottle/gt/crack_01.png',
];
