// ─── Segment Filenames ──────────────────────────────────────────────────────
//
// Segment files carry their own timing in their names:
//
//   {base}_{nn}_BPM{bpm}[_TimeSignature{num}-{den}]_{start}s-{end}s_dur{dur}s_Segment.{ext}
//
// e.g. TheCrowing_01_BPM170_TimeSignature4-4_0s-228.706s_dur228.706s_Segment.synth
//
// The merge step sorts segments by the start time decoded from this name,
// so the format must round-trip exactly.
// ─────────────────────────────────────────────────────────────────────────────

import { basename, extname } from "node:path";
import { FilenameFormatError } from "../errors.js";
import type { Segment, SegmentMetadata } from "../types.js";

const SEGMENT_PATTERN =
  /^(.+?)_(\d+)_BPM(\d+(?:\.\d+)?)(?:_TimeSignature(\d+)-(\d+))?_(\d+(?:\.\d+)?)s-(\d+(?:\.\d+)?)s_dur(\d+(?:\.\d+)?)s_Segment\.(.+)$/;

export const SEGMENT_SUFFIX = "_Segment";

// ─── Number Formatting ──────────────────────────────────────────────────────

/** Shortest form of a BPM, to 6 significant digits: 170 → "170", 128.5 → "128.5". */
export function formatBpm(bpm: number): string {
  return String(Number(bpm.toPrecision(6)));
}

/**
 * Seconds to 3 decimals, trailing zeros and point stripped: 0 → "0", 2.5 → "2.5".
 * A value exactly halfway between two millisecond steps rounds to the even
 * one (0.0625 → "0.062"), as the segment files already on disk were named.
 */
export function formatSeconds(seconds: number): string {
  const fixed = toMillisHalfEven(seconds);
  return fixed.includes(".") ? fixed.replace(/0+$/, "").replace(/\.$/, "") : fixed;
}

/**
 * `toFixed(3)`, except that exact ties round to even instead of away from
 * zero. A double is an exact tie at 3 decimals only when it is an odd
 * multiple of 1/16.
 */
function toMillisHalfEven(value: number): string {
  const sixteenths = value * 16;
  if (!Number.isInteger(sixteenths) || sixteenths % 2 === 0) {
    return value.toFixed(3);
  }
  const lower = Math.floor(value * 1000);
  const even = lower % 2 === 0 ? lower : lower + 1;
  return (even / 1000).toFixed(3);
}

// ─── Encode / Decode ────────────────────────────────────────────────────────

/**
 * Build a segment filename. The segment number is zero-padded to as many
 * digits as `totalCount` has.
 */
export function encodeSegmentFilename(meta: SegmentMetadata, totalCount: number): string {
  const digits = String(totalCount).length;
  const sequence = String(meta.segmentNumber).padStart(digits, "0");
  const timeSig = meta.timeSignature
    ? `_TimeSignature${meta.timeSignature.numerator}-${meta.timeSignature.denominator}`
    : "";

  return (
    `${meta.baseName}_${sequence}_BPM${formatBpm(meta.bpm)}${timeSig}` +
    `_${formatSeconds(meta.startTimeS)}s-${formatSeconds(meta.endTimeS)}s` +
    `_dur${formatSeconds(meta.durationS)}s${SEGMENT_SUFFIX}.${meta.fileExtension}`
  );
}

/** Parse a segment filename (a bare name, or a path whose last part is one). */
export function decodeSegmentFilename(filename: string): SegmentMetadata {
  const match = SEGMENT_PATTERN.exec(basename(filename));
  if (!match) {
    throw new FilenameFormatError(filename);
  }

  const [, baseName, number, bpm, numerator, denominator, start, end, duration, extension] = match;

  return {
    baseName,
    segmentNumber: parseInt(number, 10),
    bpm: parseFloat(bpm),
    timeSignature:
      numerator !== undefined && denominator !== undefined
        ? { numerator: parseInt(numerator, 10), denominator: parseInt(denominator, 10) }
        : undefined,
    startTimeS: parseFloat(start),
    endTimeS: parseFloat(end),
    durationS: parseFloat(duration),
    fileExtension: extension,
  };
}

/** Metadata for the `index`-th (0-based) segment cut from `sourcePath`. */
export function segmentMetadata(sourcePath: string, index: number, segment: Segment): SegmentMetadata {
  const extension = extname(sourcePath);
  return {
    baseName: basename(sourcePath, extension),
    segmentNumber: index + 1,
    bpm: segment.bpm,
    timeSignature: { ...segment.timeSignature },
    startTimeS: segment.startMs / 1000,
    endTimeS: segment.endMs / 1000,
    durationS: segment.durationMs / 1000,
    fileExtension: extension.replace(/^\./, ""),
  };
}

/** The output filename for the `index`-th of `totalCount` segments. */
export function segmentFilename(
  sourcePath: string,
  index: number,
  totalCount: number,
  segment: Segment,
): string {
  return encodeSegmentFilename(segmentMetadata(sourcePath, index, segment), totalCount);
}
