/**
 * Zod schema for open() options
 * Provides runtime validation with readable issues for JavaScript callers
 */

import { z } from "zod";
import { InvalidOptionsError } from "./errors.js";
import { LifecycleRegistry } from "./registry.js";

export const OpenOptionsSchema = z
  .object({
    /** Spaces per indentation level when saving */
    indent: z.number().int().min(0).max(10).default(2),
    /** Emit mapping keys in code-point order instead of insertion order */
    sortKeys: z.boolean().default(false),
    /** Flush file data and directory entries to disk on save */
    fsync: z.boolean().default(true),
    /** Enroll the document in the lifecycle registry for flush on exit */
    register: z.boolean().default(true),
    /** Registry to enroll in (default: the process-wide registry) */
    registry: z.instanceof(LifecycleRegistry).optional(),
  })
  .strict();

/**
 * Options accepted by open()
 */
export type OpenOptions = z.input<typeof OpenOptionsSchema>;

/**
 * Options after defaults are applied
 */
export type ResolvedOpenOptions = z.output<typeof OpenOptionsSchema>;

/**
 * Validate options and fill in defaults
 * @throws InvalidOptionsError listing every failing field
 */
export function resolveOpenOptions(options: OpenOptions = {}): ResolvedOpenOptions {
  const result = OpenOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidOptionsError(issues);
  }
  return result.data;
}
