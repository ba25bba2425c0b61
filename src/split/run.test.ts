import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { splitBeatmap, validateSplitInputs } from "./run.js";
import { encodeWav, wavCodec, type AudioCodec } from "../audio/wav.js";
import { Beatmap } from "../beatmap/beatmap.js";
import { loadBeatmap, saveBeatmap } from "../beatmap/container.js";
import { MidiParseError, TempoSplitError } from "../errors.js";
import { createRecordingLogger } from "../logger.js";
import { mergeSegmentsFromFolder } from "../merge/merge.js";

// ─── Fixtures ───────────────────────────────────────────────────────────────

// Format 0, 480 ticks per beat: 120 BPM in 4/4 at tick 0, 150 BPM at tick
// 9600 (10s in).
const TWO_TEMPO_MIDI = new Uint8Array([
  0x4d, 0x54, 0x68, 0x64, 0x00, 0x00, 0x00, 0x06, 0x00, 0x00, 0x00, 0x01, 0x01, 0xe0,
  0x4d, 0x54, 0x72, 0x6b, 0x00, 0x00, 0x00, 0x1b,
  0x00, 0xff, 0x51, 0x03, 0x07, 0xa1, 0x20,
  0x00, 0xff, 0x58, 0x04, 0x04, 0x02, 0x18, 0x08,
  0xcb, 0x00, 0xff, 0x51, 0x03, 0x06, 0x1a, 0x80,
  0x00, 0xff, 0x2f, 0x00,
]);

const FIRST = "Song_1_BPM120_TimeSignature4-4_0s-10s_dur10s_Segment.synth";
const SECOND = "Song_2_BPM150_TimeSignature4-4_10s-20s_dur10s_Segment.synth";

function silentWav(durationMs: number): Uint8Array {
  return encodeWav(
    { audioFormat: 1, numChannels: 1, sampleRate: 1000, bitsPerSample: 16, blockAlign: 2 },
    new Uint8Array(durationMs * 2),
  );
}

/** 120 BPM over 20s of audio, with right-hand notes at 4s and 15s. */
function sourceBeatmap(): Beatmap {
  const beatmap = new Beatmap({
    name: "Song",
    artist: "Artist",
    mapper: "Mapper",
    bpm: 120,
    audio: { fileName: "audio.wav", data: silentWav(20_000) },
  });
  beatmap.difficulty("Expert").right.set(8, [[1, 1, 8]]);
  beatmap.difficulty("Expert").right.set(30, [[2, 2, 30]]);
  return beatmap;
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("splitBeatmap", () => {
  let dir: string;
  let midiPath: string;
  let sourcePath: string;
  let outputDir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "split-run-"));
    midiPath = join(dir, "song.mid");
    sourcePath = join(dir, "Song.synth");
    outputDir = join(dir, "out");
    writeFileSync(midiPath, TWO_TEMPO_MIDI);
    saveBeatmap(sourceBeatmap(), sourcePath);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes one beatmap per tempo region", () => {
    const progress: Array<[number, number]> = [];
    const summary = splitBeatmap({
      midiPath,
      sourcePath,
      outputDir,
      onProgress: (done, total) => progress.push([done, total]),
    });

    expect(summary).toMatchObject({ changeCount: 2, attempted: 2, succeeded: 2, failed: 0, outputDir });
    expect(summary.results.map((r) => r.fileName)).toEqual([FIRST, SECOND]);
    expect(progress).toEqual([[1, 2], [2, 2]]);
    expect(readdirSync(outputDir).sort()).toEqual([FIRST, SECOND]);
  });

  it("gives each segment its tempo, lead-in and audio", () => {
    splitBeatmap({ midiPath, sourcePath, outputDir });

    const first = loadBeatmap(join(outputDir, FIRST));
    expect(first.bpm).toBe(120);
    expect(first.offsetMs).toBe(0);
    expect(first.difficulty("Expert").right.get(8)).toEqual([[1, 1, 8]]);
    expect(wavCodec.durationMs(first.audio.data)).toBe(10_000);

    const second = loadBeatmap(join(outputDir, SECOND));
    expect(second.bpm).toBe(150);
    expect(second.offsetMs).toBeCloseTo(3200, 6);
    // 15s is 5s into the segment: 12.5 beats at 150 BPM, plus 8 beats of lead-in
    expect(second.difficulty("Expert").right.get(20.5)).toEqual([[2, 2, 20.5]]);
    expect(wavCodec.durationMs(second.audio.data)).toBe(10_000);
  });

  it("keeps going after a segment fails", () => {
    const logger = createRecordingLogger();
    const flaky: AudioCodec = {
      durationMs: (bytes) => wavCodec.durationMs(bytes),
      slice(bytes, startMs, endMs) {
        if (startMs > 0) throw new Error("codec exploded");
        return wavCodec.slice(bytes, startMs, endMs);
      },
    };

    const summary = splitBeatmap({ midiPath, sourcePath, outputDir, audio: flaky, logger });

    expect(summary).toMatchObject({ attempted: 2, succeeded: 1, failed: 1 });
    expect(summary.results[1]).toMatchObject({
      ok: false,
      fileName: SECOND,
      error: "Failed to extract audio segment from 10000ms to 20000ms: codec exploded",
    });
    expect(readdirSync(outputDir)).toEqual([FIRST]);
    expect(logger.entries.filter((e) => e.level === "error")).toHaveLength(1);
  });

  it("refuses to start with missing inputs", () => {
    expect(() => splitBeatmap({ midiPath: join(dir, "nope.mid"), sourcePath, outputDir })).toThrow(
      TempoSplitError,
    );
  });

  it("refuses an unreadable MIDI file", () => {
    writeFileSync(midiPath, "not midi");
    expect(() => splitBeatmap({ midiPath, sourcePath, outputDir })).toThrow(MidiParseError);
  });

  it("splits and merges back to the original note times", () => {
    splitBeatmap({ midiPath, sourcePath, outputDir });

    const basePath = join(dir, "Empty.synth");
    const empty = sourceBeatmap();
    empty.difficulties.clear();
    saveBeatmap(empty, basePath);

    const merged = mergeSegmentsFromFolder(basePath, outputDir);
    const right = merged.difficulty("Expert").right;
    expect(right.get(8)).toEqual([[1, 1, 8]]);
    expect(right.get(30)).toEqual([[2, 2, 30]]);
  });
});

describe("validateSplitInputs", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "split-inputs-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("lists every problem and still creates the output directory", () => {
    const midiPath = join(dir, "song.txt");
    const sourcePath = join(dir, "missing.synth");
    writeFileSync(midiPath, "");

    expect(validateSplitInputs(midiPath, sourcePath, join(dir, "a", "b"))).toEqual([
      `File '${midiPath}' does not appear to be a MIDI file.`,
      `Source beatmap file '${sourcePath}' does not exist.`,
    ]);
    expect(readdirSync(join(dir, "a"))).toEqual(["b"]);
  });

  it("accepts usable inputs", () => {
    const midiPath = join(dir, "song.MID");
    const sourcePath = join(dir, "map.synth");
    writeFileSync(midiPath, "");
    writeFileSync(sourcePath, "");
    expect(validateSplitInputs(midiPath, sourcePath, join(dir, "out"))).toEqual([]);
  });
});
