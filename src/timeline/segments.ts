// ─── Segmenter ──────────────────────────────────────────────────────────────
//
// Expands a sparse change map into contiguous segments covering
// [0, audioDurationMs). Entries that only change one of tempo or meter
// inherit the other from the entry before them.
// ─────────────────────────────────────────────────────────────────────────────

import { createSilentLogger, type Logger } from "../logger.js";
import { DEFAULT_TIME_SIGNATURE, type Segment, type Tempo, type TimeSignature } from "../types.js";
import type { ChangeMap } from "./change-map.js";
import { bpmToTempo } from "./meter.js";

/** Carry-forward state threaded from one segment to the next. */
interface SegmentState {
  tempo: Tempo;
  timeSignature: TimeSignature;
  segments: Segment[];
}

export function buildSegments(
  changes: ChangeMap,
  audioDurationMs: number,
  initialBpm: number,
  logger: Logger = createSilentLogger(),
): Segment[] {
  const entries = changes.entries();

  const initial: SegmentState = {
    tempo: { bpm: initialBpm, tempoMicros: bpmToTempo(initialBpm) },
    timeSignature: { ...DEFAULT_TIME_SIGNATURE },
    segments: [],
  };

  const { segments } = entries.reduce<SegmentState>((state, entry, i) => {
    const startMs = entry.timeMs;
    const endMs = i + 1 < entries.length ? entries[i + 1].timeMs : audioDurationMs;
    const tempo = entry.tempo ?? state.tempo;
    const timeSignature = entry.timeSignature ?? state.timeSignature;

    const segment: Segment = {
      startMs,
      endMs,
      durationMs: endMs - startMs,
      bpm: tempo.bpm,
      tempoMicros: tempo.tempoMicros,
      timeSignature: { ...timeSignature },
    };

    logger.info(
      `Segment ${i + 1}: ${segment.bpm.toFixed(2)} BPM Time Signature ` +
        `${timeSignature.numerator}/${timeSignature.denominator} from ${startMs.toFixed(2)}ms ` +
        `to ${endMs.toFixed(2)}ms (duration: ${segment.durationMs.toFixed(2)}ms)`,
    );
    if (segment.durationMs <= 0) {
      logger.warn(
        `Segment ${i + 1} has no duration (${startMs}ms → ${endMs}ms); ` +
          "the tempo map or audio length is inconsistent",
      );
    }

    return { tempo, timeSignature, segments: [...state.segments, segment] };
  }, initial);

  return segments;
}

/** Indexes of segments whose end does not come after their start. */
export function findDegenerateSegments(segments: readonly Segment[]): number[] {
  const indexes: number[] = [];
  segments.forEach((segment, i) => {
    if (segment.durationMs <= 0) indexes.push(i);
  });
  return indexes;
}
