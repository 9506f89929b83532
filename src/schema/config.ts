import { z } from "zod";

/**
 * Project configuration read from `openspec/config.yaml`.
 * Every field is optional; a missing file means all defaults.
 */
export const ProjectConfigSchema = z
  .object({
    /** Extra verbs accepted as the first token of a change id */
    verbs: z.array(z.string().regex(/^[a-z]+$/)).default([]),
    /** Treat warnings as errors when `validate` is run without --strict */
    strict: z.boolean().default(false),
    /** Author recorded on new proposals when none is given */
    author: z.string().min(1).optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
