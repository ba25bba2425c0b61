// ─── tempo-split ────────────────────────────────────────────────────────────
//
// Split a beatmap into constant-tempo segments following a MIDI tempo map,
// and merge such segments back into one beatmap.
//
// Usage:
//   import { splitBeatmap, mergeSegmentsFromFolder } from "tempo-split";
// ─────────────────────────────────────────────────────────────────────────────

export type {
  TimeSignature,
  Tempo,
  TempoEvent,
  TimeSignatureEvent,
  ChangeRecord,
  ChangeEntry,
  Segment,
  SegmentMetadata,
} from "./types.js";
export { DEFAULT_TIME_SIGNATURE } from "./types.js";

// Errors
export {
  TempoSplitError,
  MidiParseError,
  UnsupportedMeterError,
  AudioSegmentError,
  FilenameFormatError,
  NoSegmentsError,
  BeatmapFormatError,
  ConfigError,
} from "./errors.js";

// Logging
export { createConsoleLogger, createSilentLogger, createRecordingLogger, LOG_LEVELS } from "./logger.js";
export type { Logger, LogLevel, LogEntry } from "./logger.js";

// Config
export { ToolConfigSchema, DEFAULT_CONFIG, validateToolConfig } from "./config/schema.js";
export type { ToolConfig, MarkerConfig, ConfigIssue } from "./config/schema.js";
export { loadToolConfig } from "./config/loader.js";

// Timeline
export { ticksToMs, DEFAULT_TEMPO_MICROS } from "./timeline/ticks.js";
export { ChangeMap, quantizeMs } from "./timeline/change-map.js";
export { buildTimeline, tryBuildTimeline } from "./timeline/builder.js";
export { buildSegments, findDegenerateSegments } from "./timeline/segments.js";
export {
  beatsPerMeasure,
  noteValue,
  computeLeadIn,
  computeBeatRange,
  secondsToBeats,
  beatsToSeconds,
  tempoToBpm,
  bpmToTempo,
} from "./timeline/meter.js";
export type { LeadIn, BeatRange } from "./timeline/meter.js";

// MIDI
export { readMidi, readMidiFile } from "./midi/reader.js";
export type { MidiSource, MidiMessage } from "./midi/types.js";

// Beatmaps & audio
export { Beatmap, HANDS, DEFAULT_DIFFICULTY, createNoteContainer } from "./beatmap/beatmap.js";
export type { NoteNode, NoteContainer, Hand, AudioData, BeatmapInit } from "./beatmap/beatmap.js";
export { loadBeatmap, saveBeatmap, readBeatmap, writeBeatmap } from "./beatmap/container.js";
export { wavCodec } from "./audio/wav.js";
export type { AudioCodec } from "./audio/wav.js";
export { spiral } from "./geometry/spiral.js";

// Split
export {
  encodeSegmentFilename,
  decodeSegmentFilename,
  segmentFilename,
  segmentMetadata,
} from "./split/filename.js";
export { addTimingMarkers, markerPlacement } from "./split/markers.js";
export type { MarkerPlacement, TimingMarkerOptions } from "./split/markers.js";
export { materializeSegment } from "./split/materialize.js";
export type { MaterializeOptions, MaterializedSegment } from "./split/materialize.js";
export { splitBeatmap, validateSplitInputs } from "./split/run.js";
export type { SplitOptions, SplitSummary, SegmentResult } from "./split/run.js";

// Merge
export { mergeSegments, mergeSegmentsFromFolder, findSegmentFiles } from "./merge/merge.js";
export type { MergeOptions } from "./merge/merge.js";
