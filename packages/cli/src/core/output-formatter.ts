/**
 * Output Formatter - JSON, table, CSV formats
 */

import { z } from 'zod';
import type { OutputFormat } from '../types/index.js';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value, (_key, val: unknown) =>
      val instanceof Date ? val.toISOString() : val
    );
  }
  return String(value);
}

function detectColumns(data: unknown[], columns?: string[]): string[] {
  if (columns) {
    return columns;
  }
  const first = data[0];
  return isRecord(first) ? Object.keys(first) : [];
}

function cell(row: unknown, column: string): unknown {
  return isRecord(row) ? row[column] : undefined;
}

/**
 * Format output as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const widths = new Map<string, number>();
  for (const col of detectedColumns) {
    widths.set(
      col,
      Math.max(col.length, ...data.map((row) => valueToString(cell(row, col)).length))
    );
  }
  const width = (col: string) => widths.get(col) ?? col.length;

  const lines: string[] = [];
  lines.push(detectedColumns.map((col) => col.padEnd(width(col))).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(width(col))).join('-|-'));

  for (const row of data) {
    lines.push(
      detectedColumns.map((col) => valueToString(cell(row, col)).padEnd(width(col))).join(' | ')
    );
  }

  return lines.join('\n');
}

/**
 * Format output as CSV
 */
export function formatCSV(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return '';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return '';
  }

  const lines: string[] = [];
  lines.push(detectedColumns.join(','));

  for (const row of data) {
    const values = detectedColumns.map((col) => {
      const value = cell(row, col);
      if (value === null || value === undefined) {
        return '';
      }
      const str = valueToString(value);
      if (str.includes(',') || str.includes('"') || str.includes('\n')) {
        return `"${str.replace(/"/g, '""')}"`;
      }
      return str;
    });
    lines.push(values.join(','));
  }

  return lines.join('\n');
}

const MaterializeSummaryShape = z.object({
  status: z.enum(['completed', 'aborted']),
  outputDir: z.string(),
  linkMode: z.string(),
  categories: z.array(
    z.object({
      category: z.string(),
      trainSamples: z.number(),
      testBuckets: z.array(z.object({ bucket: z.string(), samples: z.number() })),
    })
  ),
  totalLinksCreated: z.number(),
  existingLinksSkipped: z.number(),
  missingFilesCount: z.number(),
  filenameCollisions: z.array(z.unknown()),
});

const RegisterSummaryShape = z.object({
  datasetName: z.string(),
  configText: z.string(),
  outputFile: z.string(),
  objectCount: z.number(),
  nextSteps: z.array(z.string()),
});

/**
 * Console summary for `dataset materialize`
 */
function formatMaterializeSummary(data: z.infer<typeof MaterializeSummaryShape>): string {
  if (data.status === 'aborted') {
    return [
      `Output directory ${data.outputDir} already exists; nothing was written.`,
      'Re-run with --merge to add missing links to it.',
    ].join('\n');
  }

  const lines: string[] = [];
  lines.push('=== Materialization Summary ===');
  lines.push('');
  lines.push(`Categories processed: ${data.categories.length}`);
  for (const { category, trainSamples, testBuckets } of data.categories) {
    const buckets = testBuckets.map(({ bucket, samples }) => `${bucket}=${samples}`).join(' ');
    lines.push(`  ${category}: train ${trainSamples}${buckets ? `, test ${buckets}` : ''}`);
  }
  lines.push(`Total links created: ${data.totalLinksCreated}`);
  lines.push(`Existing links skipped: ${data.existingLinksSkipped}`);
  lines.push(`Missing files: ${data.missingFilesCount}`);
  if (data.filenameCollisions.length > 0) {
    lines.push(`Filename collisions: ${data.filenameCollisions.length}`);
  }
  lines.push(`Link mode: ${data.linkMode}`);
  lines.push(`Output directory: ${data.outputDir}`);
  return lines.join('\n');
}

/**
 * Generated branch followed by where it was saved and what to do next
 */
function formatRegisterSummary(data: z.infer<typeof RegisterSummaryShape>): string {
  const lines: string[] = [];
  lines.push(`=== Generated configuration for '${data.datasetName}' ===`);
  lines.push(data.configText);
  lines.push(`Objects: ${data.objectCount}`);
  lines.push(`Configuration saved to: ${data.outputFile}`);
  lines.push('');
  lines.push('Next steps:');
  data.nextSteps.forEach((step, index) => {
    lines.push(`  ${index + 1}. ${step}`);
  });
  return lines.join('\n');
}

/**
 * Dataset-specific table output; null means use the generic formatting
 */
function formatDatasetResults(data: unknown, format: OutputFormat): string | null {
  if (format !== 'table') {
    return null;
  }

  const materialize = MaterializeSummaryShape.safeParse(data);
  if (materialize.success) {
    return formatMaterializeSummary(materialize.data);
  }

  const register = RegisterSummaryShape.safeParse(data);
  if (register.success) {
    return formatRegisterSummary(register.data);
  }

  return null;
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  const datasetFormatted = formatDatasetResults(data, format);
  if (datasetFormatted !== null) {
    return datasetFormatted;
  }

  if (Array.isArray(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV(data);
      case 'table':
        return formatTable(data);
    }
  }

  if (typeof data === 'object' && data !== null) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV([data]);
      case 'table':
        return formatTable([data]);
    }
  }

  return String(data);
}
