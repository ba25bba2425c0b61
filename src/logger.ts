// ─── Logging ────────────────────────────────────────────────────────────────
//
// Core modules log through this interface and never touch the console.
//
// Implementations:
//   - ConsoleLogger: console output filtered by level (CLI)
//   - SilentLogger: no-op (library default)
//   - RecordingLogger: keeps entries in memory (tests)
// ─────────────────────────────────────────────────────────────────────────────

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  message: string;
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

// ─── Console Logger (CLI) ───────────────────────────────────────────────────

export function createConsoleLogger(minLevel: LogLevel = "info"): Logger {
  const enabled = (level: LogLevel) => rank(level) >= rank(minLevel);

  return {
    debug(message) {
      if (enabled("debug")) console.debug(`  · ${message}`);
    },
    info(message) {
      if (enabled("info")) console.log(`  ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`  ⚠ ${message}`);
    },
    error(message) {
      if (enabled("error")) console.error(`  ✗ ${message}`);
    },
  };
}

// ─── Silent Logger ──────────────────────────────────────────────────────────

export function createSilentLogger(): Logger {
  return {
    debug() {},
    info() {},
    warn() {},
    error() {},
  };
}

// ─── Recording Logger (testing) ─────────────────────────────────────────────

/**
 * Keeps every entry for later inspection.
 * Use: `const log = createRecordingLogger(); ... log.entries`
 */
export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  return {
    entries,
    debug(message) {
      entries.push({ level: "debug", message });
    },
    info(message) {
      entries.push({ level: "info", message });
    },
    warn(message) {
      entries.push({ level: "warn", message });
    },
    error(message) {
      entries.push({ level: "error", message });
    },
  };
}
