/**
 * Dataset domain types shared by the loader, materializer and scanner.
 */

/**
 * One dataset entry after path resolution
 */
export interface MetaSample {
  imagePath: string;
  /** Only set for anomalous test samples that declare a mask */
  maskPath?: string;
  /** true = anomalous */
  label: boolean;
  anomalyClass: string;
}

export type Phase = 'train' | 'test';

export interface CategoryPhases {
  train: MetaSample[];
  test: MetaSample[];
}

/**
 * Category name (metadata file base name) -> samples per phase.
 * Map keeps load order even for numeric-looking category names.
 */
export type CategoryDataset = Map<string, CategoryPhases>;

/**
 * Bucket name used for non-defective samples in the output tree
 */
export const GOOD_BUCKET = 'good';

/**
 * Logger shape accepted by the workflow contexts
 */
export interface WorkflowLogger {
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, context?: Record<string, unknown>) => void;
  debug?: (message: string, context?: Record<string, unknown>) => void;
}

/**
 * Order names by Unicode code point (not UTF-16 code unit, which is what
 * `Array.prototype.sort` compares)
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}
