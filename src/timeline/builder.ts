// ─── Tempo Timeline Builder ─────────────────────────────────────────────────
//
// Collects every tempo and time signature message across all tracks, puts
// them on the millisecond axis, and records only the instants where the
// running tempo or meter actually changes.
// ─────────────────────────────────────────────────────────────────────────────

import { MidiParseError, describeError } from "../errors.js";
import { createSilentLogger, type Logger } from "../logger.js";
import type { MidiMessage, MidiSource } from "../midi/types.js";
import {
  DEFAULT_TIME_SIGNATURE,
  type TempoEvent,
  type TimeSignature,
  type TimeSignatureEvent,
} from "../types.js";
import { ChangeMap } from "./change-map.js";
import { bpmToTempo, roundTo, tempoToBpm } from "./meter.js";
import { ticksToMs } from "./ticks.js";

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Build the change map for a parsed MIDI file.
 *
 * Throws MidiParseError when a track carries malformed tempo or meter data.
 *
 * @param baseBpm Tempo assumed before the first tempo message when the file
 *   has none at tick 0.
 */
export function buildTimeline(
  midi: MidiSource,
  baseBpm: number,
  logger: Logger = createSilentLogger(),
): ChangeMap {
  const ticksPerBeat = midi.header.ticksPerBeat;
  if (ticksPerBeat === undefined || !Number.isInteger(ticksPerBeat) || ticksPerBeat <= 0) {
    throw new MidiParseError("MIDI file has no ticks-per-beat resolution (SMPTE timing is not supported)");
  }
  logger.info(`Ticks per beat: ${ticksPerBeat}`);

  const changes = new ChangeMap();

  // 1–2. Absolute tempo events, with the base tempo synthesized at tick 0
  const tempoEvents = extractTempoEvents(midi);
  if (tempoEvents.length === 0 || tempoEvents[0].timeTicks > 0) {
    tempoEvents.unshift({ timeTicks: 0, tempoMicrosPerBeat: bpmToTempo(baseBpm), track: -1 });
  }

  // 3. Replay tempo events, keeping only real changes. Only the last of
  // several events on one tick takes effect, so compare that one alone.
  const effective = lastPerTick(tempoEvents);
  let currentTempo: number | undefined;
  for (let i = 0; i < effective.length; i++) {
    const event = effective[i];
    if (event.tempoMicrosPerBeat === currentTempo) continue;

    const timeMs = ticksToMs(event.timeTicks, ticksPerBeat, effective.slice(0, i));
    currentTempo = event.tempoMicrosPerBeat;
    const bpm = roundTo(tempoToBpm(currentTempo), 2);
    changes.setTempo(timeMs, { bpm, tempoMicros: currentTempo });
    logger.info(`Found tempo change: ${bpm.toFixed(2)} BPM at ${timeMs.toFixed(2)}ms`);
  }

  // 4. Time signatures, placed with the complete tempo timeline
  const timeSigEvents = extractTimeSignatureEvents(midi, ticksPerBeat, tempoEvents);
  if (timeSigEvents.length === 0 || timeSigEvents[0].timeTicks > 0) {
    timeSigEvents.unshift({ ...DEFAULT_TIME_SIGNATURE, timeTicks: 0, timeMs: 0, track: -1 });
  }

  let currentMeter: TimeSignature | undefined;
  for (const event of timeSigEvents) {
    if (
      currentMeter &&
      currentMeter.numerator === event.numerator &&
      currentMeter.denominator === event.denominator
    ) {
      continue;
    }
    currentMeter = { numerator: event.numerator, denominator: event.denominator };
    changes.setTimeSignature(event.timeMs, currentMeter);
    logger.debug(
      `Found time signature ${event.numerator}/${event.denominator} at ${event.timeMs.toFixed(2)}ms`,
    );
  }

  logger.info(`Found ${changes.size} unique tempo/time signature changes`);
  return changes;
}

/**
 * Like buildTimeline, but a MidiParseError yields an empty change map.
 * Callers treat an empty map as "no usable tempo information".
 */
export function tryBuildTimeline(
  midi: MidiSource,
  baseBpm: number,
  logger: Logger = createSilentLogger(),
): ChangeMap {
  try {
    return buildTimeline(midi, baseBpm, logger);
  } catch (err) {
    if (!(err instanceof MidiParseError)) throw err;
    logger.error(`Error parsing MIDI file: ${describeError(err)}`);
    return new ChangeMap();
  }
}

// ─── Internal: Extract Events ───────────────────────────────────────────────

/** Tempo events from all tracks with absolute ticks, sorted by tick. */
export function extractTempoEvents(midi: MidiSource): TempoEvent[] {
  const events: TempoEvent[] = [];

  midi.tracks.forEach((track, trackIndex) => {
    walkTrack(track, trackIndex, (tick, message) => {
      if (message.type !== "setTempo") return;
      const tempo = message.microsecondsPerBeat;
      if (tempo === undefined || !Number.isInteger(tempo) || tempo <= 0) {
        throw new MidiParseError(`Track ${trackIndex}: invalid tempo ${String(tempo)} at tick ${tick}`);
      }
      events.push({ timeTicks: tick, tempoMicrosPerBeat: tempo, track: trackIndex });
    });
  });

  // Array.prototype.sort is stable: ties keep track order, last one wins.
  events.sort((a, b) => a.timeTicks - b.timeTicks);
  return events;
}

/** Time signature events from all tracks, sorted by their millisecond time. */
export function extractTimeSignatureEvents(
  midi: MidiSource,
  ticksPerBeat: number,
  tempoEvents: readonly TempoEvent[],
): TimeSignatureEvent[] {
  const events: TimeSignatureEvent[] = [];

  midi.tracks.forEach((track, trackIndex) => {
    walkTrack(track, trackIndex, (tick, message) => {
      if (message.type !== "timeSignature") return;
      const { numerator, denominator } = message;
      if (numerator === undefined || !Number.isInteger(numerator) || numerator <= 0) {
        throw new MidiParseError(
          `Track ${trackIndex}: invalid time signature numerator ${String(numerator)} at tick ${tick}`,
        );
      }
      if (denominator === undefined || !isPowerOfTwo(denominator)) {
        throw new MidiParseError(
          `Track ${trackIndex}: invalid time signature denominator ${String(denominator)} at tick ${tick}`,
        );
      }
      events.push({
        numerator,
        denominator,
        timeTicks: tick,
        timeMs: ticksToMs(tick, ticksPerBeat, tempoEvents),
        track: trackIndex,
      });
    });
  });

  events.sort((a, b) => a.timeMs - b.timeMs);
  return events;
}

/** The last event of each run sharing a tick. Input must be sorted by tick. */
export function lastPerTick(events: readonly TempoEvent[]): TempoEvent[] {
  return events.filter((event, i) => i + 1 === events.length || events[i + 1].timeTicks !== event.timeTicks);
}

function walkTrack(
  track: ReadonlyArray<MidiMessage>,
  trackIndex: number,
  visit: (tick: number, message: MidiMessage) => void,
): void {
  let tick = 0;
  for (const message of track) {
    if (!Number.isInteger(message.deltaTime) || message.deltaTime < 0) {
      throw new MidiParseError(
        `Track ${trackIndex}: invalid delta time ${String(message.deltaTime)} after tick ${tick}`,
      );
    }
    tick += message.deltaTime;
    visit(tick, message);
  }
}

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}
