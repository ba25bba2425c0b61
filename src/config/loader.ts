// ─── Tool Config Loader ─────────────────────────────────────────────────────
//
// Reads an optional .json config file and validates it with zod.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { ConfigError, describeError } from "../errors.js";
import { DEFAULT_CONFIG, ToolConfigSchema, type ToolConfig } from "./schema.js";

/**
 * Load and validate a config file. With no path, returns the defaults.
 */
export function loadToolConfig(filePath?: string): ToolConfig {
  if (!filePath) return DEFAULT_CONFIG;
  if (!existsSync(filePath)) {
    throw new ConfigError(`Config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Config ${filePath} is not valid JSON: ${describeError(err)}`, { cause: err });
  }

  const result = ToolConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config ${filePath}:\n${issues}`);
  }

  return result.data;
}
