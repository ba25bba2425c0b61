// ─── Change Map ─────────────────────────────────────────────────────────────
//
// Sparse, time-ordered record of the instants where tempo or meter changes.
// Times are quantized once, on insertion, to whole microseconds (3 decimals
// of a millisecond) and stored as integers, so a tempo change and a time
// signature change a few nanoseconds apart share one entry.
// ─────────────────────────────────────────────────────────────────────────────

import type { ChangeEntry, ChangeRecord, Tempo, TimeSignature } from "../types.js";

/** Quantize a millisecond offset to 3 decimals. */
export function quantizeMs(ms: number): number {
  return toMicros(ms) / 1000;
}

function toMicros(ms: number): number {
  // `+ 0` folds -0 into 0.
  return Math.round(ms * 1000) + 0;
}

export class ChangeMap {
  private readonly records = new Map<number, ChangeRecord>();

  get size(): number {
    return this.records.size;
  }

  get isEmpty(): boolean {
    return this.records.size === 0;
  }

  setTempo(timeMs: number, tempo: Tempo): this {
    this.recordAt(timeMs).tempo = { ...tempo };
    return this;
  }

  setTimeSignature(timeMs: number, timeSignature: TimeSignature): this {
    this.recordAt(timeMs).timeSignature = {
      numerator: timeSignature.numerator,
      denominator: timeSignature.denominator,
    };
    return this;
  }

  /** The record at a (quantized) time, if any. */
  get(timeMs: number): ChangeRecord | undefined {
    return this.records.get(toMicros(timeMs));
  }

  /** Quantized keys in ascending order. */
  keys(): number[] {
    return [...this.records.keys()].sort((a, b) => a - b).map((us) => us / 1000);
  }

  /** Entries in ascending time order. Iteration order of inserts never leaks. */
  entries(): ChangeEntry[] {
    return [...this.records.entries()]
      .sort(([a], [b]) => a - b)
      .map(([us, record]) => ({ timeMs: us / 1000, ...record }));
  }

  private recordAt(timeMs: number): ChangeRecord {
    const key = toMicros(timeMs);
    let record = this.records.get(key);
    if (!record) {
      record = {};
      this.records.set(key, record);
    }
    return record;
  }
}
