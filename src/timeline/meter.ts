// ─── Tempo & Meter Arithmetic ───────────────────────────────────────────────
//
// Conversions between BPM, MIDI tempo, seconds and beats, and the measure
// grid the target editor expects at the start of every segment.
// ─────────────────────────────────────────────────────────────────────────────

import { UnsupportedMeterError } from "../errors.js";
import type { TimeSignature } from "../types.js";

// ─── Units ──────────────────────────────────────────────────────────────────

export function tempoToBpm(tempoMicros: number): number {
  return 60_000_000 / tempoMicros;
}

export function bpmToTempo(bpm: number): number {
  return 60_000_000 / bpm;
}

export function secondsToBeats(seconds: number, bpm: number): number {
  return (seconds * bpm) / 60;
}

export function beatsToSeconds(beats: number, bpm: number): number {
  return (beats * 60) / bpm;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

// ─── Meter ──────────────────────────────────────────────────────────────────

/**
 * Quarter-note beats in one measure: 4/4 → 4, 3/4 → 3, 6/8 → 3, 2/2 → 4.
 * Throws UnsupportedMeterError when the result is fractional (3/8, 7/8).
 */
export function beatsPerMeasure(timeSignature: TimeSignature): number {
  const { numerator, denominator } = timeSignature;
  const beats = numerator / (denominator / 4);
  if (!Number.isInteger(beats) || beats <= 0) {
    throw new UnsupportedMeterError(numerator, denominator);
  }
  return beats;
}

/** Beat step between timing markers: 1 for x/4, 2 for x/8, 0.5 for x/2. */
export function noteValue(timeSignature: TimeSignature): number {
  return timeSignature.denominator / 4;
}

// ─── Segment Grid ───────────────────────────────────────────────────────────

/** Silence the target editor requires before playable content. */
export const MIN_SILENCE_SECONDS = 2;

export interface LeadIn {
  secondsPerMeasure: number;
  /** Padding past the minimum silence that lands audio on a measure line. */
  extraPaddingSeconds: number;
  /** Offset for the segment's start-of-audio marker. 0 for the first segment. */
  totalOffsetMs: number;
}

export function computeLeadIn(
  bpm: number,
  measureBeats: number,
  isFirstSegment: boolean,
  silenceSeconds: number = MIN_SILENCE_SECONDS,
): LeadIn {
  const secondsPerMeasure = (60 / bpm) * measureBeats;
  const remainder = silenceSeconds % secondsPerMeasure;
  const extraPaddingSeconds = remainder === 0 ? 0 : secondsPerMeasure - remainder;
  return {
    secondsPerMeasure,
    extraPaddingSeconds,
    totalOffsetMs: isFirstSegment ? 0 : (silenceSeconds + extraPaddingSeconds) * 1000,
  };
}

export interface BeatRange {
  startBeat: number;
  endBeat: number;
}

/**
 * The beat range that timing markers cover for one segment.
 *
 * `startBeat` is the first measure line strictly after the minimum silence.
 * `endBeat` is the segment length rounded down to whole measures (at least
 * one), moved past `startBeat` for every segment but the first.
 */
export function computeBeatRange(
  bpm: number,
  measureBeats: number,
  durationMs: number,
  isFirstSegment: boolean,
  silenceSeconds: number = MIN_SILENCE_SECONDS,
): BeatRange {
  const minDelayBeats = secondsToBeats(silenceSeconds, bpm);
  const startBeat = measureBeats * (Math.floor(minDelayBeats / measureBeats) + 1);

  const wholeBeats = Math.floor(secondsToBeats(durationMs / 1000, bpm));
  const measures = Math.max(1, Math.floor(wholeBeats / measureBeats));
  let endBeat = measures * measureBeats;
  if (!isFirstSegment) endBeat += startBeat;

  return { startBeat, endBeat };
}
