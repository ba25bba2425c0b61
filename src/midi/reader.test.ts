import { describe, it, expect } from "vitest";
import { readMidi } from "./reader.js";
import { buildTimeline } from "../timeline/builder.js";
import { MidiParseError } from "../errors.js";

// Format 0, 480 ticks per beat: 120 BPM and 3/4 at tick 0, 60 BPM at tick 480.
const TEMPO_MAP = new Uint8Array([
  0x4d, 0x54, 0x68, 0x64, 0x00, 0x00, 0x00, 0x06, 0x00, 0x00, 0x00, 0x01, 0x01, 0xe0,
  0x4d, 0x54, 0x72, 0x6b, 0x00, 0x00, 0x00, 0x1b,
  0x00, 0xff, 0x51, 0x03, 0x07, 0xa1, 0x20,
  0x00, 0xff, 0x58, 0x04, 0x03, 0x02, 0x18, 0x08,
  0x83, 0x60, 0xff, 0x51, 0x03, 0x0f, 0x42, 0x40,
  0x00, 0xff, 0x2f, 0x00,
]);

describe("readMidi", () => {
  it("parses the header and tracks", () => {
    const midi = readMidi(TEMPO_MAP);
    expect(midi.header.ticksPerBeat).toBe(480);
    expect(midi.tracks).toHaveLength(1);
  });

  it("feeds the timeline builder directly", () => {
    const changes = buildTimeline(readMidi(TEMPO_MAP), 100);
    expect(changes.entries()).toEqual([
      {
        timeMs: 0,
        tempo: { bpm: 120, tempoMicros: 500_000 },
        timeSignature: { numerator: 3, denominator: 4 },
      },
      { timeMs: 500, tempo: { bpm: 60, tempoMicros: 1_000_000 } },
    ]);
  });

  it("rejects bytes that are not a MIDI file", () => {
    expect(() => readMidi(new Uint8Array([0x00, 0x01, 0x02, 0x03]))).toThrow(MidiParseError);
  });
});
