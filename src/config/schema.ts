// ─── Tool Config Schema ─────────────────────────────────────────────────────
//
// Optional JSON config for split and merge runs. Every field has a default,
// so `{}` (or no file at all) is a complete config.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { LOG_LEVELS } from "../logger.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const MarkerConfigSchema = z.object({
  radius: z.number().positive().default(4),
  rotationsPerMeasure: z.number().positive().default(0.5),
  handSwitchMeasures: z.number().int().min(1).default(2),
  centerX: z.number().default(0),
  centerY: z.number().default(0),
});

export const ToolConfigSchema = z.object({
  difficulty: z.string().min(1).default("Expert"),
  silenceSeconds: z.number().positive().default(2),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  markers: MarkerConfigSchema.default({}),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type ToolConfig = z.infer<typeof ToolConfigSchema>;
export type MarkerConfig = z.infer<typeof MarkerConfigSchema>;

export const DEFAULT_CONFIG: ToolConfig = ToolConfigSchema.parse({});

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigIssue {
  field: string;
  message: string;
}

/**
 * Validate a config object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateToolConfig(config: unknown): ConfigIssue[] {
  const result = ToolConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}
