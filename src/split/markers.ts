// ─── Timing Markers ─────────────────────────────────────────────────────────
//
// Synthetic notes, one per beat step, that make the tempo grid visible in
// the editor. They circle on a spiral that turns half a rotation per
// measure, reverse direction every full rotation, and switch hands every
// two measures. Hand and direction depend only on the beat position.
// ─────────────────────────────────────────────────────────────────────────────

import { DEFAULT_DIFFICULTY, roundBeat, type Beatmap, type NoteNode } from "../beatmap/beatmap.js";
import { spiral } from "../geometry/spiral.js";
import { createSilentLogger, type Logger } from "../logger.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_ROTATIONS_PER_MEASURE = 0.5;
export const DEFAULT_HAND_SWITCH_MEASURES = 2;
export const DEFAULT_SPIRAL_RADIUS = 4;

// ─── Placement ───────────────────────────────────────────────────────────────

export interface MarkerPlacement {
  hand: "right" | "left";
  /** 1 while on an even rotation, -1 (mirrored about the center x) on odd ones. */
  direction: 1 | -1;
}

export interface MarkerRhythm {
  beatsPerMeasure: number;
  rotationsPerMeasure?: number;
  handSwitchMeasures?: number;
}

export function markerPlacement(
  beatTime: number,
  startBeat: number,
  rhythm: MarkerRhythm,
): MarkerPlacement {
  const {
    beatsPerMeasure,
    rotationsPerMeasure = DEFAULT_ROTATIONS_PER_MEASURE,
    handSwitchMeasures = DEFAULT_HAND_SWITCH_MEASURES,
  } = rhythm;
  const elapsed = beatTime - startBeat;

  const beatsPerRotation = beatsPerMeasure / rotationsPerMeasure;
  const rotation = Math.floor(elapsed / beatsPerRotation);

  const handSwitchInterval = beatsPerMeasure * handSwitchMeasures;
  const handBlock = Math.floor(elapsed / handSwitchInterval);

  return {
    hand: handBlock % 2 === 0 ? "right" : "left",
    direction: rotation % 2 === 0 ? 1 : -1,
  };
}

/** Beats from `startBeat` to `endBeat` inclusive, `step` apart. */
export function markerBeats(startBeat: number, endBeat: number, step: number): number[] {
  const beats: number[] = [];
  if (!(step > 0)) return beats;
  for (let i = 0; ; i++) {
    const beat = startBeat + i * step;
    if (beat > endBeat) break;
    beats.push(beat);
  }
  return beats;
}

// ─── Generation ──────────────────────────────────────────────────────────────

export interface TimingMarkerOptions extends MarkerRhythm {
  startBeat: number;
  endBeat: number;
  /** Beat step between markers. */
  noteValue: number;
  difficulty?: string;
  centerX?: number;
  centerY?: number;
  radius?: number;
}

/**
 * Add timing markers to a beatmap. Returns how many were added. A beat
 * where the marker's hand already has a note keeps that note; an empty beat
 * range adds nothing and logs a warning.
 */
export function addTimingMarkers(
  beatmap: Beatmap,
  options: TimingMarkerOptions,
  logger: Logger = createSilentLogger(),
): number {
  const {
    startBeat,
    endBeat,
    noteValue,
    beatsPerMeasure,
    rotationsPerMeasure = DEFAULT_ROTATIONS_PER_MEASURE,
    difficulty = DEFAULT_DIFFICULTY,
    centerX = 0,
    centerY = 0,
    radius = DEFAULT_SPIRAL_RADIUS,
  } = options;

  const beats = markerBeats(startBeat, endBeat, noteValue);
  if (beats.length === 0) {
    logger.warn(`No beats to add between ${startBeat} and ${endBeat}`);
    return 0;
  }
  logger.info(`Adding ${beats.length} beats from Start Beat: ${startBeat} || End Beat: ${endBeat} @ ${beatmap.bpm}`);

  // Notes per rotation of the spiral
  const totalMeasures = beats.length / beatsPerMeasure;
  const fidelity = rotationsPerMeasure > 0
    ? beats.length / (totalMeasures * rotationsPerMeasure)
    : beats.length;

  const base = beats.map((beat): NoteNode => [centerX, centerY, beat]);
  const coords = spiral(base, fidelity, radius, 0, 1);
  const container = beatmap.difficulty(difficulty);

  let added = 0;
  beats.forEach((beat, i) => {
    const { hand, direction } = markerPlacement(beat, startBeat, { ...options, rotationsPerMeasure });
    const key = roundBeat(beat);
    if (container[hand].has(key)) {
      logger.debug(`Keeping existing ${hand} note at beat ${key}`);
      return;
    }
    const [x, y] = coords[i];
    const node: NoteNode = [direction === 1 ? x : centerX - (x - centerX), y, key];
    container[hand].set(key, [node]);
    added++;
  });

  return added;
}
