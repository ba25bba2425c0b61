// ─── tempo-split: Core Types ────────────────────────────────────────────────
//
// Timeline, segment and segment-file types shared by the split and merge
// pipelines. Three time bases meet here: MIDI ticks, milliseconds of audio,
// and beats of a beatmap at a given BPM.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Meter & Tempo ──────────────────────────────────────────────────────────

/** A time signature as written, e.g. 6/8 → { numerator: 6, denominator: 8 }. */
export interface TimeSignature {
  numerator: number;
  denominator: number;
}

/** A tempo value in both units it is carried in. */
export interface Tempo {
  /** Beats per minute, rounded to 2 decimals. */
  bpm: number;
  /** MIDI tempo in microseconds per quarter note. */
  tempoMicros: number;
}

export const DEFAULT_TIME_SIGNATURE: Readonly<TimeSignature> = { numerator: 4, denominator: 4 };

// ─── MIDI Events (absolute ticks) ───────────────────────────────────────────

/** A tempo change with an absolute tick position. */
export interface TempoEvent {
  timeTicks: number;
  tempoMicrosPerBeat: number;
  /** Index of the track the message came from. */
  track: number;
}

/** A time signature change with absolute tick and millisecond positions. */
export interface TimeSignatureEvent extends TimeSignature {
  timeTicks: number;
  timeMs: number;
  track: number;
}

// ─── Change Map ─────────────────────────────────────────────────────────────

/** What changes at one instant of the timeline. At least one field is set. */
export interface ChangeRecord {
  tempo?: Tempo;
  timeSignature?: TimeSignature;
}

/** One instant of the change map, at a quantized millisecond offset. */
export interface ChangeEntry extends ChangeRecord {
  timeMs: number;
}

// ─── Segments ───────────────────────────────────────────────────────────────

/** A contiguous constant-tempo, constant-meter slice of the audio. */
export interface Segment {
  startMs: number;
  endMs: number;
  durationMs: number;
  bpm: number;
  tempoMicros: number;
  timeSignature: TimeSignature;
}

/** Segment facts recoverable from a segment file's name. */
export interface SegmentMetadata {
  baseName: string;
  /** 1-based position of the segment in its split run. */
  segmentNumber: number;
  bpm: number;
  timeSignature?: TimeSignature;
  startTimeS: number;
  endTimeS: number;
  durationS: number;
  /** Extension without the leading dot, e.g. "synth". */
  fileExtension: string;
}
