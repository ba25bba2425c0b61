// ─── MIDI Input Types ───────────────────────────────────────────────────────
//
// The slice of a parsed MIDI file the timeline builder reads. midi-file's
// MidiData satisfies it structurally; tests can build it from literals.
// ─────────────────────────────────────────────────────────────────────────────

/** One track message with its tick delta and the fields we care about. */
export interface MidiMessage {
  deltaTime: number;
  type: string;
  /** Present on "setTempo". */
  microsecondsPerBeat?: number;
  /** Present on "timeSignature". */
  numerator?: number;
  /** Present on "timeSignature", as the written denominator (4, 8, ...). */
  denominator?: number;
}

export interface MidiSource {
  header: { ticksPerBeat?: number };
  tracks: ReadonlyArray<ReadonlyArray<MidiMessage>>;
}
