// ─── Beatmap Model ──────────────────────────────────────────────────────────
//
// In-memory beatmap: one audio track, one BPM, notes and bookmarks keyed by
// beat. Beat 0 is the start of the editor timeline; the audio starts
// `offsetMs` into it.
// ─────────────────────────────────────────────────────────────────────────────

import { TempoSplitError } from "../errors.js";
import { secondsToBeats } from "../timeline/meter.js";

// ─── Types ──────────────────────────────────────────────────────────────────

/** One point of a note: grid x, grid y, and its beat. */
export type NoteNode = [x: number, y: number, beat: number];

export const HANDS = ["right", "left", "single", "both"] as const;
export type Hand = (typeof HANDS)[number];

/** Notes of one difficulty, per hand, keyed by the beat of their first node. */
export type NoteContainer = Record<Hand, Map<number, NoteNode[]>>;

export interface AudioData {
  fileName: string;
  data: Uint8Array;
}

export interface BeatmapInit {
  name: string;
  artist?: string;
  mapper?: string;
  bpm: number;
  offsetMs?: number;
  audio: AudioData;
  difficulties?: Map<string, NoteContainer>;
  bookmarks?: Map<number, string>;
}

export const DEFAULT_DIFFICULTY = "Expert";

/** Beat keys are kept to 6 decimals so re-timed notes land on one key. */
const BEAT_DECIMALS = 1e6;

export function roundBeat(beat: number): number {
  return Math.round(beat * BEAT_DECIMALS) / BEAT_DECIMALS + 0;
}

export function createNoteContainer(): NoteContainer {
  return { right: new Map(), left: new Map(), single: new Map(), both: new Map() };
}

function cloneNotes(notes: Map<number, NoteNode[]>): Map<number, NoteNode[]> {
  const copy = new Map<number, NoteNode[]>();
  for (const [beat, nodes] of notes) {
    copy.set(beat, nodes.map(([x, y, b]): NoteNode => [x, y, b]));
  }
  return copy;
}

function cloneContainer(container: NoteContainer): NoteContainer {
  return {
    right: cloneNotes(container.right),
    left: cloneNotes(container.left),
    single: cloneNotes(container.single),
    both: cloneNotes(container.both),
  };
}

// ─── Beatmap ────────────────────────────────────────────────────────────────

export class Beatmap {
  name: string;
  artist: string;
  mapper: string;
  bpm: number;
  offsetMs: number;
  audio: AudioData;
  readonly difficulties: Map<string, NoteContainer>;
  readonly bookmarks: Map<number, string>;

  constructor(init: BeatmapInit) {
    if (!(init.bpm > 0)) {
      throw new TempoSplitError(`BPM must be positive, got ${init.bpm}`);
    }
    this.name = init.name;
    this.artist = init.artist ?? "";
    this.mapper = init.mapper ?? "";
    this.bpm = init.bpm;
    this.offsetMs = init.offsetMs ?? 0;
    this.audio = init.audio;
    this.difficulties = init.difficulties ?? new Map();
    this.bookmarks = init.bookmarks ?? new Map();
  }

  /** Deep copy: notes, bookmarks and audio bytes are not shared. */
  clone(): Beatmap {
    const difficulties = new Map<string, NoteContainer>();
    for (const [name, container] of this.difficulties) {
      difficulties.set(name, cloneContainer(container));
    }
    return new Beatmap({
      name: this.name,
      artist: this.artist,
      mapper: this.mapper,
      bpm: this.bpm,
      offsetMs: this.offsetMs,
      audio: { fileName: this.audio.fileName, data: new Uint8Array(this.audio.data) },
      difficulties,
      bookmarks: new Map(this.bookmarks),
    });
  }

  /** The note container for a difficulty, created empty if missing. */
  difficulty(name: string): NoteContainer {
    let container = this.difficulties.get(name);
    if (!container) {
      container = createNoteContainer();
      this.difficulties.set(name, container);
    }
    return container;
  }

  /** Beats of every note of a difficulty, across all hands. */
  noteBeats(difficulty: string): number[] {
    const container = this.difficulties.get(difficulty);
    if (!container) return [];
    return HANDS.flatMap((hand) => [...container[hand].keys()]);
  }

  // ─── Timing ───────────────────────────────────────────────────────────────

  /** Change the BPM, re-beating everything so its wall-clock time is kept. */
  changeBpm(bpm: number): void {
    if (!(bpm > 0)) {
      throw new TempoSplitError(`BPM must be positive, got ${bpm}`);
    }
    if (bpm === this.bpm) return;
    const factor = bpm / this.bpm;
    this.retime((beat) => beat * factor);
    this.bpm = bpm;
  }

  /** Move the audio start, moving everything with it so it stays on the audio. */
  changeOffset(offsetMs: number): void {
    const deltaMs = offsetMs - this.offsetMs;
    if (deltaMs !== 0) this.offsetEverything(deltaMs / 1000);
    this.offsetMs = offsetMs;
  }

  /** Shift every note and bookmark by `deltaS` seconds. */
  offsetEverything(deltaS: number): void {
    if (deltaS === 0) return;
    const deltaBeats = secondsToBeats(deltaS, this.bpm);
    this.retime((beat) => beat + deltaBeats);
  }

  /**
   * Keep only what plays during [startMs, endMs) of the audio, re-timed so
   * it stays aligned once the audio itself is cut to that window.
   */
  cropToAudio(startMs: number, endMs: number): void {
    const from = secondsToBeats((startMs + this.offsetMs) / 1000, this.bpm);
    const to = secondsToBeats((endMs + this.offsetMs) / 1000, this.bpm);
    const inside = (beat: number) => beat >= from && beat < to;

    for (const container of this.difficulties.values()) {
      for (const hand of HANDS) {
        for (const beat of [...container[hand].keys()]) {
          if (!inside(beat)) container[hand].delete(beat);
        }
      }
    }
    for (const beat of [...this.bookmarks.keys()]) {
      if (!inside(beat)) this.bookmarks.delete(beat);
    }

    this.offsetEverything(-startMs / 1000);
  }

  // ─── Merging ──────────────────────────────────────────────────────────────

  /**
   * Copy another beatmap's notes and bookmarks into this one. The other map
   * is first brought to this map's offset and, when `adjustBpm` is set, to
   * this map's BPM. Entries on the same beat are replaced.
   */
  merge(other: Beatmap, adjustBpm = false): void {
    const incoming = other.clone();
    incoming.changeOffset(this.offsetMs);
    if (incoming.bpm !== this.bpm) {
      if (!adjustBpm) {
        throw new TempoSplitError(
          `Cannot merge a ${incoming.bpm} BPM beatmap into a ${this.bpm} BPM beatmap without adjusting BPM`,
        );
      }
      incoming.changeBpm(this.bpm);
    }

    for (const [name, source] of incoming.difficulties) {
      const target = this.difficulty(name);
      for (const hand of HANDS) {
        for (const [beat, nodes] of source[hand]) {
          target[hand].set(beat, nodes);
        }
      }
    }
    for (const [beat, label] of incoming.bookmarks) {
      this.bookmarks.set(beat, label);
    }
  }

  // ─── Internal ─────────────────────────────────────────────────────────────

  private retime(map: (beat: number) => number): void {
    for (const container of this.difficulties.values()) {
      for (const hand of HANDS) {
        const moved = new Map<number, NoteNode[]>();
        for (const [beat, nodes] of container[hand]) {
          moved.set(
            roundBeat(map(beat)),
            nodes.map(([x, y, b]): NoteNode => [x, y, roundBeat(map(b))]),
          );
        }
        container[hand] = moved;
      }
    }

    const bookmarks = [...this.bookmarks.entries()];
    this.bookmarks.clear();
    for (const [beat, label] of bookmarks) {
      this.bookmarks.set(roundBeat(map(beat)), label);
    }
  }
}
