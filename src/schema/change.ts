import { z } from "zod";
import {
  CapabilityNameSchema,
  ChangeIdSchema,
  ChangeStatusSchema,
  DateTimeSchema,
} from "./common.js";

/**
 * Lifecycle metadata stored beside a change as `.change.yaml`.
 *
 * Status is recorded here explicitly instead of being inferred from which
 * files happen to exist in the change directory.
 */
export const ChangeMetadataSchema = z.object({
  id: ChangeIdSchema,
  status: ChangeStatusSchema,
  author: z.string().min(1),
  created_at: DateTimeSchema,
  capabilities: z.array(CapabilityNameSchema).default([]),

  // Set by a passing validate
  validated_at: DateTimeSchema.optional(),
  validated_hashes: z.record(z.string(), z.string()).optional(),
  strict: z.boolean().optional(),

  applied_at: DateTimeSchema.optional(),

  // Set once the specs tree holds this change's deltas
  merged_at: DateTimeSchema.optional(),
  specs_skipped: z.boolean().optional(),

  archived_at: DateTimeSchema.optional(),
  archive_path: z.string().optional(),
});

export type ChangeMetadata = z.infer<typeof ChangeMetadataSchema>;
export type ChangeMetadataInput = z.input<typeof ChangeMetadataSchema>;
