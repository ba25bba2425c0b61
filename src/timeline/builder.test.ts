import { describe, it, expect } from "vitest";
import { buildTimeline, tryBuildTimeline, extractTempoEvents, lastPerTick } from "./builder.js";
import { buildSegments } from "./segments.js";
import { MidiParseError } from "../errors.js";
import { createRecordingLogger } from "../logger.js";
import type { MidiMessage, MidiSource } from "../midi/types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

function setTempo(deltaTime: number, microsecondsPerBeat: number): MidiMessage {
  return { deltaTime, type: "setTempo", microsecondsPerBeat };
}

function timeSignature(deltaTime: number, numerator: number, denominator: number): MidiMessage {
  return { deltaTime, type: "timeSignature", numerator, denominator };
}

const endOfTrack: MidiMessage = { deltaTime: 0, type: "endOfTrack" };

function midi(tracks: MidiMessage[][], ticksPerBeat = 480): MidiSource {
  return { header: { ticksPerBeat }, tracks };
}

// ─── buildTimeline ──────────────────────────────────────────────────────────

describe("buildTimeline", () => {
  it("records the first tempo and each later change", () => {
    const source = midi([[
      setTempo(0, 500_000),
      timeSignature(0, 4, 4),
      setTempo(1920, 400_000),
      endOfTrack,
    ]]);

    expect(buildTimeline(source, 100).entries()).toEqual([
      {
        timeMs: 0,
        tempo: { bpm: 120, tempoMicros: 500_000 },
        timeSignature: { numerator: 4, denominator: 4 },
      },
      { timeMs: 2000, tempo: { bpm: 150, tempoMicros: 400_000 } },
    ]);
  });

  it("assumes the base BPM and 4/4 until the first messages", () => {
    const changes = buildTimeline(midi([[setTempo(960, 600_000), endOfTrack]]), 120);

    expect(changes.keys()).toEqual([0, 1000]);
    expect(changes.get(0)).toEqual({
      tempo: { bpm: 120, tempoMicros: 500_000 },
      timeSignature: { numerator: 4, denominator: 4 },
    });
    expect(changes.get(1000)?.tempo).toEqual({ bpm: 100, tempoMicros: 600_000 });
  });

  it("synthesizes the base tempo for a file without tempo messages", () => {
    const changes = buildTimeline(midi([[timeSignature(0, 3, 4), endOfTrack]]), 128);
    expect(changes.get(0)?.tempo).toEqual({ bpm: 128, tempoMicros: 468_750 });
  });

  it("ignores tempo messages that repeat the running tempo", () => {
    const changes = buildTimeline(
      midi([[setTempo(0, 500_000), setTempo(480, 500_000), setTempo(0, 500_000), endOfTrack]]),
      120,
    );
    expect(changes.size).toBe(1);
    expect(changes.keys()).toEqual([0]);
  });

  it("ignores repeated time signatures", () => {
    const changes = buildTimeline(
      midi([[setTempo(0, 500_000), timeSignature(0, 3, 4), timeSignature(960, 3, 4), endOfTrack]]),
      120,
    );
    expect(changes.keys()).toEqual([0]);
  });

  it("rounds BPM to 2 decimals but keeps the exact tempo", () => {
    const changes = buildTimeline(midi([[setTempo(0, 333_333), endOfTrack]]), 120);
    expect(changes.get(0)?.tempo).toEqual({ bpm: 180, tempoMicros: 333_333 });
  });

  it("lets the last tempo on a tick win", () => {
    const changes = buildTimeline(midi([[setTempo(0, 500_000), setTempo(0, 400_000), endOfTrack]]), 120);
    expect(changes.get(0)?.tempo?.bpm).toBe(150);
  });

  it("adds no key when the tempos on one tick end where they started", () => {
    const changes = buildTimeline(
      midi([[setTempo(0, 500_000), setTempo(960, 400_000), setTempo(0, 500_000), endOfTrack]]),
      120,
    );

    expect(changes.keys()).toEqual([0]);
    expect(buildSegments(changes, 5000, 120)).toEqual([
      { startMs: 0, endMs: 5000, durationMs: 5000, bpm: 120, tempoMicros: 500_000, timeSignature: { numerator: 4, denominator: 4 } },
    ]);
  });

  it("records a tick whose last tempo differs from the running one", () => {
    const changes = buildTimeline(
      midi([[setTempo(0, 500_000), setTempo(960, 500_000), setTempo(0, 400_000), endOfTrack]]),
      120,
    );
    expect(changes.keys()).toEqual([0, 1000]);
    expect(changes.get(1000)?.tempo).toEqual({ bpm: 150, tempoMicros: 400_000 });
  });

  it("places time signatures from other tracks on the full tempo map", () => {
    const source = midi([
      [setTempo(0, 500_000), setTempo(960, 1_000_000), endOfTrack],
      [timeSignature(0, 3, 4), timeSignature(1440, 6, 8), endOfTrack],
    ]);
    const changes = buildTimeline(source, 120);

    expect(changes.keys()).toEqual([0, 1000, 2000]);
    expect(changes.get(2000)).toEqual({ timeSignature: { numerator: 6, denominator: 8 } });

    const segments = buildSegments(changes, 5000, 120);
    expect(segments).toEqual([
      { startMs: 0, endMs: 1000, durationMs: 1000, bpm: 120, tempoMicros: 500_000, timeSignature: { numerator: 3, denominator: 4 } },
      { startMs: 1000, endMs: 2000, durationMs: 1000, bpm: 60, tempoMicros: 1_000_000, timeSignature: { numerator: 3, denominator: 4 } },
      { startMs: 2000, endMs: 5000, durationMs: 3000, bpm: 60, tempoMicros: 1_000_000, timeSignature: { numerator: 6, denominator: 8 } },
    ]);
  });

  it("rejects a file without ticks per beat", () => {
    expect(() => buildTimeline({ header: {}, tracks: [] }, 120)).toThrow(MidiParseError);
  });

  it("rejects a tempo message without a tempo", () => {
    const source = midi([[{ deltaTime: 0, type: "setTempo" }, endOfTrack]]);
    expect(() => buildTimeline(source, 120)).toThrow(MidiParseError);
  });

  it("rejects a negative delta time", () => {
    expect(() => buildTimeline(midi([[setTempo(-1, 500_000)]]), 120)).toThrow(/invalid delta time/);
  });

  it("rejects a denominator that is not a power of two", () => {
    expect(() => buildTimeline(midi([[timeSignature(0, 4, 3)]]), 120)).toThrow(/denominator 3/);
  });
});

// ─── tryBuildTimeline ───────────────────────────────────────────────────────

describe("tryBuildTimeline", () => {
  it("returns an empty map and logs when the MIDI is malformed", () => {
    const logger = createRecordingLogger();
    const changes = tryBuildTimeline(midi([[setTempo(-5, 500_000)]]), 120, logger);

    expect(changes.isEmpty).toBe(true);
    expect(logger.entries.filter((e) => e.level === "error")).toHaveLength(1);
  });

  it("returns the timeline when the MIDI is fine", () => {
    expect(tryBuildTimeline(midi([[setTempo(0, 500_000)]]), 120).size).toBe(1);
  });
});

// ─── extractTempoEvents ─────────────────────────────────────────────────────

describe("extractTempoEvents", () => {
  it("collects tempos from every track in tick order", () => {
    const source = midi([
      [setTempo(960, 400_000)],
      [setTempo(0, 500_000), setTempo(1920, 600_000)],
    ]);
    expect(extractTempoEvents(source)).toEqual([
      { timeTicks: 0, tempoMicrosPerBeat: 500_000, track: 1 },
      { timeTicks: 960, tempoMicrosPerBeat: 400_000, track: 0 },
      { timeTicks: 1920, tempoMicrosPerBeat: 600_000, track: 1 },
    ]);
  });
});

// ─── lastPerTick ────────────────────────────────────────────────────────────

describe("lastPerTick", () => {
  it("keeps only the last event of each tick", () => {
    const events = [
      { timeTicks: 0, tempoMicrosPerBeat: 500_000, track: 0 },
      { timeTicks: 960, tempoMicrosPerBeat: 400_000, track: 0 },
      { timeTicks: 960, tempoMicrosPerBeat: 500_000, track: 1 },
      { timeTicks: 1920, tempoMicrosPerBeat: 600_000, track: 0 },
    ];
    expect(lastPerTick(events)).toEqual([events[0], events[2], events[3]]);
  });

  it("returns nothing for no events", () => {
    expect(lastPerTick([])).toEqual([]);
  });
});
