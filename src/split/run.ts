// ─── Split Run ──────────────────────────────────────────────────────────────
//
// Split a beatmap into one beatmap per constant-tempo region of a MIDI
// reference track. A failing segment is logged and counted; the run goes on
// with the next one.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, mkdirSync } from "node:fs";
import { basename, join } from "node:path";
import { wavCodec, type AudioCodec } from "../audio/wav.js";
import { loadBeatmap, saveBeatmap, SYNTH_EXTENSION } from "../beatmap/container.js";
import { DEFAULT_CONFIG, type ToolConfig } from "../config/schema.js";
import { TempoSplitError, describeError } from "../errors.js";
import { createSilentLogger, type Logger } from "../logger.js";
import { readMidiFile } from "../midi/reader.js";
import { tryBuildTimeline } from "../timeline/builder.js";
import { buildSegments } from "../timeline/segments.js";
import type { Segment } from "../types.js";
import { segmentFilename } from "./filename.js";
import { materializeSegment } from "./materialize.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SplitOptions {
  midiPath: string;
  sourcePath: string;
  outputDir: string;
  audio?: AudioCodec;
  config?: ToolConfig;
  logger?: Logger;
  /** Called after each segment, in segment order. */
  onProgress?: (done: number, total: number) => void;
}

export interface SegmentResult {
  index: number;
  segment: Segment;
  fileName: string;
  ok: boolean;
  error?: string;
}

export interface SplitSummary {
  changeCount: number;
  attempted: number;
  succeeded: number;
  failed: number;
  outputDir: string;
  results: SegmentResult[];
}

// ─── Input Validation ────────────────────────────────────────────────────────

/**
 * Check the inputs of a split run and create the output directory.
 * Returns an empty array if everything is usable.
 */
export function validateSplitInputs(midiPath: string, sourcePath: string, outputDir: string): string[] {
  const errors: string[] = [];

  if (!existsSync(midiPath)) {
    errors.push(`MIDI file '${midiPath}' does not exist.`);
  } else if (!/\.midi?$/i.test(midiPath)) {
    errors.push(`File '${midiPath}' does not appear to be a MIDI file.`);
  }

  if (!existsSync(sourcePath)) {
    errors.push(`Source beatmap file '${sourcePath}' does not exist.`);
  } else if (!sourcePath.toLowerCase().endsWith(SYNTH_EXTENSION)) {
    errors.push(`Source file '${sourcePath}' does not appear to be a ${SYNTH_EXTENSION} file.`);
  }

  try {
    mkdirSync(outputDir, { recursive: true });
  } catch (err) {
    errors.push(`Cannot create output directory '${outputDir}': ${describeError(err)}`);
  }

  return errors;
}

// ─── Run ─────────────────────────────────────────────────────────────────────

/**
 * Run a whole split. Throws when the run cannot start (bad inputs, no tempo
 * information, no segments); per-segment failures only show in the summary.
 */
export function splitBeatmap(options: SplitOptions): SplitSummary {
  const {
    midiPath,
    sourcePath,
    outputDir,
    audio = wavCodec,
    config = DEFAULT_CONFIG,
    logger = createSilentLogger(),
    onProgress,
  } = options;

  const inputErrors = validateSplitInputs(midiPath, sourcePath, outputDir);
  if (inputErrors.length > 0) {
    throw new TempoSplitError(inputErrors.join("\n"));
  }

  const beatmap = loadBeatmap(sourcePath);
  logger.info(`Base beatmap loaded: '${beatmap.name}' by ${beatmap.artist}, mapped by ${beatmap.mapper}`);
  logger.info(`Original BPM: ${beatmap.bpm}, Offset: ${beatmap.offsetMs}`);

  logger.info("Extracting tempo changes from MIDI file...");
  const changes = tryBuildTimeline(readMidiFile(midiPath), beatmap.bpm, logger);
  if (changes.isEmpty) {
    throw new TempoSplitError(`No tempo changes found in MIDI file ${midiPath}`);
  }

  const audioDurationMs = audio.durationMs(beatmap.audio.data);
  logger.info(`Source audio duration: ${(audioDurationMs / 1000).toFixed(2)} seconds`);

  const segments = buildSegments(changes, audioDurationMs, beatmap.bpm, logger);
  if (segments.length === 0) {
    throw new TempoSplitError("No tempo segments could be created.");
  }

  logger.info(`Generating ${segments.length} beatmap variants with tempo-matched audio segments...`);
  const sourceName = basename(sourcePath);
  const results: SegmentResult[] = [];

  segments.forEach((segment, index) => {
    const fileName = segmentFilename(sourceName, index, segments.length, segment);
    logger.info(
      `Creating segment ${index + 1}/${segments.length}: ${fileName} ` +
        `(duration: ${(segment.durationMs / 1000).toFixed(2)}s)`,
    );

    try {
      const { beatmap: output } = materializeSegment(beatmap, segment, { audio, config, logger });
      saveBeatmap(output, join(outputDir, fileName));
      results.push({ index, segment, fileName, ok: true });
    } catch (err) {
      const message = describeError(err);
      logger.error(`Failed to create segment ${index + 1}: ${fileName}: ${message}`);
      results.push({ index, segment, fileName, ok: false, error: message });
    }

    onProgress?.(index + 1, segments.length);
  });

  const succeeded = results.filter((r) => r.ok).length;
  return {
    changeCount: changes.size,
    attempted: results.length,
    succeeded,
    failed: results.length - succeeded,
    outputDir,
    results,
  };
}
