#!/usr/bin/env node
// ─── tempo-split: CLI Entry Point ───────────────────────────────────────────
//
// Usage:
//   tempo-split                                   # Show help
//   tempo-split split song.mid out/ --source map.synth [--config cfg.json] [--verbose]
//   tempo-split merge map.synth out/ merged.synth [--config cfg.json] [--verbose]
// ─────────────────────────────────────────────────────────────────────────────

import { loadToolConfig } from "./config/loader.js";
import type { ToolConfig } from "./config/schema.js";
import { describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { mergeSegmentsFromFolder } from "./merge/merge.js";
import { splitBeatmap, type SplitSummary } from "./split/run.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Print a progress bar. */
function printProgress(done: number, total: number): void {
  const barWidth = 30;
  const ratio = total > 0 ? done / total : 1;
  const filled = Math.round(ratio * barWidth);
  const bar = "█".repeat(filled) + "░".repeat(barWidth - filled);
  process.stdout.write(`\r  [${bar}] ${Math.round(ratio * 100)}% — segment ${done}/${total}`);
  if (done >= total) {
    process.stdout.write("\n");
  }
}

function printSummary(summary: SplitSummary): void {
  console.log(`\n${"═".repeat(60)}`);
  console.log("  SUMMARY");
  console.log(`${"═".repeat(60)}`);
  console.log(`  Total tempo changes found:   ${summary.changeCount}`);
  console.log(`  Segments attempted:          ${summary.attempted}`);
  console.log(`  Successful variants created: ${summary.succeeded}`);
  console.log(`  Failed variants:             ${summary.failed}`);
  console.log(`  Output directory:            ${summary.outputDir}`);

  if (summary.failed > 0) {
    console.error(`\n  ⚠ ${summary.failed} variant(s) failed:`);
    for (const r of summary.results) {
      if (!r.ok) console.error(`    • ${r.fileName}: ${r.error ?? "unknown error"}`);
    }
  } else {
    console.log("\n  ✓ All variants created successfully!");
  }
  console.log();
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/** Positional arguments, skipping flags and the values of value flags. */
function positionals(args: string[], valueFlags: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (valueFlags.includes(args[i])) {
      i++;
    } else if (!args[i].startsWith("--")) {
      out.push(args[i]);
    }
  }
  return out;
}

function setup(args: string[]): { config: ToolConfig; logger: Logger } {
  const config = loadToolConfig(getFlag(args, "--config") ?? undefined);
  const logger = createConsoleLogger(hasFlag(args, "--verbose") ? "debug" : config.logLevel);
  return { config, logger };
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdSplit(args: string[]): number {
  const [midiPath, outputDir] = positionals(args, ["--source", "--config"]);
  const sourcePath = getFlag(args, "--source");
  if (!midiPath || !outputDir || !sourcePath) {
    console.error("Usage: tempo-split split <song.mid> <output-dir> --source <base.synth> [--config <file.json>] [--verbose]");
    return 1;
  }

  const { config, logger } = setup(args);
  const summary = splitBeatmap({
    midiPath,
    sourcePath,
    outputDir,
    config,
    logger,
    onProgress: printProgress,
  });
  printSummary(summary);
  return summary.failed > 0 ? 1 : 0;
}

function cmdMerge(args: string[]): number {
  const [basePath, inputDir, outputPath] = positionals(args, ["--config"]);
  if (!basePath || !inputDir || !outputPath) {
    console.error("Usage: tempo-split merge <base.synth> <input-dir> <output.synth> [--config <file.json>] [--verbose]");
    return 1;
  }

  const { config, logger } = setup(args);
  mergeSegmentsFromFolder(basePath, inputDir, outputPath, { difficulty: config.difficulty, logger });
  console.log(`\n  ✓ Merged beatmap written to ${outputPath}\n`);
  return 0;
}

function cmdHelp(): number {
  console.log(`
tempo-split — split a beatmap at the tempo changes of a MIDI track, and merge it back

Commands:
  split <song.mid> <output-dir> --source <base.synth>
        One beatmap per constant-tempo region, with the audio cut to match
  merge <base.synth> <input-dir> <output.synth>
        Merge every *_Segment.synth in <input-dir> back onto <base.synth>
  help  Show this message

Options:
  --config <file.json>  Tool config (difficulty, silenceSeconds, logLevel, markers)
  --verbose             Debug logging
`);
  return 0;
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

function main(): number {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "split":
      return cmdSplit(args.slice(1));
    case "merge":
      return cmdMerge(args.slice(1));
    case "help":
    case "--help":
    case "-h":
      return cmdHelp();
    default:
      console.error(`Unknown command: "${command}". Run 'tempo-split help' for usage.`);
      return 1;
  }
}

try {
  process.exitCode = main();
} catch (err) {
  console.error(`\n  ✗ ${describeError(err)}`);
  process.exitCode = 1;
}
