import { z } from "zod";

export const DEFAULT_TIMEOUT_SECS = 600;

/** Largest deadline a Node.js timer can hold (2^31 - 1 ms), in whole seconds. */
export const MAX_TIMEOUT_SECS = 2147483;

const VerdictSchema = z.enum(["exit_code", "structured"]);

const CaseSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  path: z.string().min(1),
  args: z.array(z.string()).default([]),
  timeout_secs: z.number().optional(),
  allow_failure: z.boolean().default(false),
  dest_path: z.string().min(1).optional(),
  verdict: VerdictSchema.default("exit_code")
});

export const SuiteManifestSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  arch: z.string().optional(),
  default_timeout_secs: z.number().int().positive().max(MAX_TIMEOUT_SECS).default(DEFAULT_TIMEOUT_SECS),
  max_parallel: z.number().int().positive().default(1),
  cases: z.array(CaseSchema).default([])
});

export type SuiteManifest = z.infer<typeof SuiteManifestSchema>;
export type VerdictKind = z.infer<typeof VerdictSchema>;
