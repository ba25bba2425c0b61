// ─── Segment Materializer ───────────────────────────────────────────────────
//
// Turns one segment of a source beatmap into a standalone beatmap: only the
// notes inside the segment, the segment's BPM, an audio offset that leaves
// the editor's required silence and lands on a measure line, the audio cut
// to the segment, and timing markers over the segment's measures.
// ─────────────────────────────────────────────────────────────────────────────

import type { AudioCodec } from "../audio/wav.js";
import type { Beatmap } from "../beatmap/beatmap.js";
import { DEFAULT_CONFIG, type ToolConfig } from "../config/schema.js";
import { AudioSegmentError, TempoSplitError, describeError } from "../errors.js";
import { createSilentLogger, type Logger } from "../logger.js";
import { beatsPerMeasure, computeBeatRange, computeLeadIn, noteValue } from "../timeline/meter.js";
import type { Segment } from "../types.js";
import { addTimingMarkers } from "./markers.js";

export interface MaterializeOptions {
  audio: AudioCodec;
  config?: ToolConfig;
  logger?: Logger;
}

export interface MaterializedSegment {
  beatmap: Beatmap;
  totalOffsetMs: number;
  startBeat: number;
  endBeat: number;
  markerCount: number;
}

/**
 * Build the beatmap for one segment. The source is not modified.
 *
 * Throws UnsupportedMeterError for meters without a whole number of beats
 * per measure, and AudioSegmentError when the audio cannot be cut.
 */
export function materializeSegment(
  source: Beatmap,
  segment: Segment,
  options: MaterializeOptions,
): MaterializedSegment {
  const { audio, config = DEFAULT_CONFIG, logger = createSilentLogger() } = options;
  const { startMs, endMs, bpm, timeSignature } = segment;
  const isFirstSegment = startMs === 0;

  const measureBeats = beatsPerMeasure(timeSignature);
  const leadIn = computeLeadIn(bpm, measureBeats, isFirstSegment, config.silenceSeconds);
  logger.debug(
    `beats_per_measure: ${measureBeats}, seconds_per_measure: ${leadIn.secondsPerMeasure}, ` +
      `padding: ${leadIn.extraPaddingSeconds}s`,
  );

  const beatmap = source.clone();
  beatmap.cropToAudio(startMs, endMs);
  beatmap.changeBpm(bpm);
  beatmap.changeOffset(leadIn.totalOffsetMs);

  logger.info(
    `Creating segment: BPM=${bpm}, Offset=${leadIn.totalOffsetMs}ms, ` +
      `${startMs.toFixed(2)}ms-${endMs.toFixed(2)}ms`,
  );

  beatmap.audio = {
    fileName: source.audio.fileName,
    data: sliceAudio(audio, source.audio.data, startMs, endMs),
  };

  const { startBeat, endBeat } = computeBeatRange(
    bpm,
    measureBeats,
    segment.durationMs,
    isFirstSegment,
    config.silenceSeconds,
  );
  logger.debug(`start_beat: ${startBeat}, end_beat: ${endBeat}`);

  const markerCount = addTimingMarkers(
    beatmap,
    {
      startBeat,
      endBeat,
      noteValue: noteValue(timeSignature),
      beatsPerMeasure: measureBeats,
      difficulty: config.difficulty,
      ...config.markers,
    },
    logger,
  );

  return { beatmap, totalOffsetMs: leadIn.totalOffsetMs, startBeat, endBeat, markerCount };
}

function sliceAudio(audio: AudioCodec, data: Uint8Array, startMs: number, endMs: number): Uint8Array {
  try {
    return audio.slice(data, startMs, endMs);
  } catch (err) {
    if (err instanceof TempoSplitError) throw err;
    throw new AudioSegmentError(
      `Failed to extract audio segment from ${startMs}ms to ${endMs}ms: ${describeError(err)}`,
      { cause: err },
    );
  }
}
