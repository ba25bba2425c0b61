// ─── Segment Merger ─────────────────────────────────────────────────────────
//
// Reassembles segment beatmaps into one. Each segment's start time comes
// from its filename; segments are merged in start-time order, whatever
// order the files were listed in. Any failure aborts the whole merge.
// ─────────────────────────────────────────────────────────────────────────────

import { readdirSync } from "node:fs";
import { join } from "node:path";
import { DEFAULT_DIFFICULTY, type Beatmap } from "../beatmap/beatmap.js";
import { loadBeatmap, saveBeatmap, SYNTH_EXTENSION } from "../beatmap/container.js";
import { NoSegmentsError } from "../errors.js";
import { createSilentLogger, type Logger } from "../logger.js";
import { decodeSegmentFilename, SEGMENT_SUFFIX } from "../split/filename.js";
import type { SegmentMetadata } from "../types.js";

export interface MergeOptions {
  difficulty?: string;
  logger?: Logger;
  /** Reads one segment file. Defaults to loading a .synth container. */
  load?: (filePath: string) => Beatmap;
}

export interface SegmentBounds {
  first: number;
  last: number;
}

/** First and last note beat of a difficulty; undefined when it has no notes. */
export function noteBounds(beatmap: Beatmap, difficulty: string): SegmentBounds | undefined {
  const beats = beatmap.noteBeats(difficulty);
  if (beats.length === 0) return undefined;
  return { first: Math.min(...beats), last: Math.max(...beats) };
}

/**
 * Bookmark text for a segment, e.g. "170.0 BPM || Time Signature 4/4". The
 * BPM always carries a decimal point, as the editor's existing bookmarks do;
 * the denominator is always 4.
 */
export function segmentBookmarkLabel(bpm: number, meta: SegmentMetadata): string {
  const numerator = meta.timeSignature?.numerator ?? 4;
  return `${bookmarkBpm(bpm)} BPM || Time Signature ${numerator}/4`;
}

function bookmarkBpm(bpm: number): string {
  return Number.isInteger(bpm) ? bpm.toFixed(1) : String(bpm);
}

/**
 * Merge segment files onto a copy of `base`.
 *
 * Throws FilenameFormatError naming the first file whose name cannot be
 * decoded, and NoSegmentsError when `segmentFiles` is empty.
 */
export function mergeSegments(
  base: Beatmap,
  segmentFiles: readonly string[],
  options: MergeOptions = {},
): Beatmap {
  const { difficulty = DEFAULT_DIFFICULTY, logger = createSilentLogger(), load = loadBeatmap } = options;

  // Decode every name before loading anything: ordering needs all of them.
  const ordered = segmentFiles
    .map((filePath) => ({ filePath, meta: decodeSegmentFilename(filePath) }))
    .sort((a, b) => a.meta.startTimeS - b.meta.startTimeS);

  if (ordered.length === 0) {
    throw new NoSegmentsError("No segments provided");
  }

  const merged = base.clone();

  ordered.forEach(({ filePath, meta }, i) => {
    const segment = load(filePath).clone();
    segment.changeOffset(0);
    // Seconds → beats at the segment's own BPM
    segment.offsetEverything(meta.startTimeS);

    const bounds = noteBounds(segment, difficulty);
    if (!bounds) {
      logger.warn(`No notes found in segment ${i + 1} (${filePath})`);
    }
    const { first, last } = bounds ?? { first: 0, last: 0 };
    logger.debug(`first note after start time offset: ${first}, last: ${last}`);

    segment.bookmarks.set(first, segmentBookmarkLabel(segment.bpm, meta));
    merged.merge(segment, true);

    logger.info(
      `Merged segment ${i + 1}/${ordered.length}: ` +
        `${meta.startTimeS.toFixed(3)}s-${meta.endTimeS.toFixed(3)}s`,
    );
  });

  return merged;
}

/** Segment files (`*_Segment.synth`) in a folder, by name. */
export function findSegmentFiles(folder: string): string[] {
  return readdirSync(folder)
    .filter((f) => f.endsWith(`${SEGMENT_SUFFIX}${SYNTH_EXTENSION}`))
    .sort()
    .map((f) => join(folder, f));
}

/**
 * Merge every segment file in `folder` onto the beatmap at `basePath`, and
 * save the result when `outputPath` is given.
 */
export function mergeSegmentsFromFolder(
  basePath: string,
  folder: string,
  outputPath?: string,
  options: MergeOptions = {},
): Beatmap {
  const logger = options.logger ?? createSilentLogger();
  const segmentFiles = findSegmentFiles(folder);
  if (segmentFiles.length === 0) {
    throw new NoSegmentsError(`No segment files found in ${folder}`);
  }
  logger.info(`Found ${segmentFiles.length} segment files`);

  const merged = mergeSegments(loadBeatmap(basePath), segmentFiles, options);

  if (outputPath) {
    saveBeatmap(merged, outputPath);
    logger.info(`Saved merged file to ${outputPath}`);
  }
  return merged;
}
