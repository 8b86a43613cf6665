/**
 * Database options, validated with zod
 */

import { z } from "zod";
import type { HostMerger } from "./types.js";
import { ConfigError } from "./errors.js";

const OptionsSchema = z
  .object({
    root: z.string().min(1, "root must be a non-empty directory path").optional(),
    storage: z.enum(["memory", "file"]).optional(),
    indent: z.number().int().min(0).max(8).default(2),
    validation: z.enum(["strict", "off"]).default("strict"),
    merger: z.function().optional(),
  })
  .strict()
  .superRefine((opts, ctx) => {
    if (opts.storage === "file" && opts.root === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["root"],
        message: "file storage needs a root directory",
      });
    }
  });

export interface DatabaseOptions {
  /** Directory of the collection files; absent means in-memory storage */
  root?: string;
  /** Storage collaborator (default: "file" when `root` is set, else "memory") */
  storage?: "memory" | "file";
  /** Indentation of collection files (default: 2) */
  indent?: number;
  /** Record validation mode (default: "strict") */
  validation?: "strict" | "off";
  /** Host merge collaborator used by `storeOrMergeHost` */
  merger?: HostMerger;
}

export interface ResolvedOptions {
  root?: string;
  storage: "memory" | "file";
  indent: number;
  validation: "strict" | "off";
  merger?: HostMerger;
}

/**
 * Validate options and fill in defaults
 * @throws {ConfigError} Listing every zod issue
 */
export function resolveOptions(options: DatabaseOptions = {}): ResolvedOptions {
  const parsed = OptionsSchema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid database options: ${detail}`, { cause: parsed.error });
  }
  const { root, storage, indent, validation } = parsed.data;
  return {
    root,
    storage: storage ?? (root === undefined ? "memory" : "file"),
    indent,
    validation,
    // zod re-wraps functions; keep the caller's own merger
    merger: options.merger,
  };
}
