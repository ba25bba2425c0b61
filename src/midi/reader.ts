// ─── MIDI Reader ────────────────────────────────────────────────────────────
//
// Parses Standard MIDI File bytes with midi-file. Only the tempo map is used
// downstream; notes are ignored.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { parseMidi, type MidiData } from "midi-file";
import { MidiParseError, describeError } from "../errors.js";

/** Parse MIDI bytes. Throws MidiParseError on unreadable or SMPTE-timed files. */
export function readMidi(bytes: Uint8Array): MidiData {
  let midi: MidiData;
  try {
    midi = parseMidi(bytes);
  } catch (err) {
    throw new MidiParseError(`Cannot parse MIDI data: ${describeError(err)}`, { cause: err });
  }

  if (midi.header.ticksPerBeat === undefined) {
    throw new MidiParseError("MIDI file uses SMPTE timing; a ticks-per-beat resolution is required");
  }
  return midi;
}

export function readMidiFile(filePath: string): MidiData {
  return readMidi(readFileSync(filePath));
}
