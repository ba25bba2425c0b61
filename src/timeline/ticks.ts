// ─── Tick-to-Time Conversion ────────────────────────────────────────────────
//
// Maps an absolute tick position to elapsed milliseconds under a tempo map
// that changes instantaneously at each tempo event.
// ─────────────────────────────────────────────────────────────────────────────

import type { TempoEvent } from "../types.js";

/** 120 BPM. */
export const DEFAULT_TEMPO_MICROS = 500_000;

/** Milliseconds spanned by `ticks` at a constant tempo. */
export function spanToMs(ticks: number, ticksPerBeat: number, tempoMicros: number): number {
  return (ticks * tempoMicros) / ticksPerBeat / 1000;
}

/**
 * Convert a tick position to milliseconds, respecting tempo changes.
 *
 * @param tempoEvents Tempo events sorted by tick. Events sharing a tick are
 *   applied in order, so the last one governs the ticks after it.
 * @param initialTempoMicros Tempo in effect before the first event.
 */
export function ticksToMs(
  targetTicks: number,
  ticksPerBeat: number,
  tempoEvents: readonly TempoEvent[],
  initialTempoMicros: number = DEFAULT_TEMPO_MICROS,
): number {
  if (targetTicks === 0) return 0;

  let elapsedMs = 0;
  let tempoMicros = initialTempoMicros;
  let lastTick = 0;

  for (const event of tempoEvents) {
    if (event.timeTicks >= targetTicks) break;

    if (event.timeTicks > lastTick) {
      elapsedMs += spanToMs(event.timeTicks - lastTick, ticksPerBeat, tempoMicros);
      lastTick = event.timeTicks;
    }
    tempoMicros = event.tempoMicrosPerBeat;
  }

  if (targetTicks > lastTick) {
    elapsedMs += spanToMs(targetTicks - lastTick, ticksPerBeat, tempoMicros);
  }

  return elapsedMs;
}
