/**
 * Per-category metadata document schema
 *
 * Field names follow the on-disk JSON (snake_case). Unknown keys are ignored.
 */

import { z } from 'zod';

export const TrainEntrySchema = z.object({
  image_path: z.string(),
  // null is kept as a value: it never equals the normal class
  anomaly_class: z.string().nullable().optional(),
});

export const TestEntrySchema = z.object({
  image_path: z.string(),
  anomaly_class: z.string(),
  mask_path: z.string().nullish(),
});

export const CategoryMetadataSchema = z.object({
  meta: z.object({
    normal_class: z.string(),
    prefix: z.string(),
  }),
  train: z.array(TrainEntrySchema).default([]),
  test: z.array(TestEntrySchema).default([]),
});

export type TrainEntry = z.infer<typeof TrainEntrySchema>;
export type TestEntry = z.infer<typeof TestEntrySchema>;
export type CategoryMetadata = z.infer<typeof CategoryMetadataSchema>;
