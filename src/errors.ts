// ─── Errors ─────────────────────────────────────────────────────────────────
//
// Every failure the pipelines raise on purpose. Split runs isolate per-segment
// failures; merges abort on the first one.
// ─────────────────────────────────────────────────────────────────────────────

export class TempoSplitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Tempo or time signature track data that cannot be read. */
export class MidiParseError extends TempoSplitError {}

/** A meter whose beats per measure is not a whole number of quarter notes. */
export class UnsupportedMeterError extends TempoSplitError {
  constructor(
    public readonly numerator: number,
    public readonly denominator: number,
  ) {
    super(
      `Unsupported time signature ${numerator}/${denominator}: ` +
        `${numerator}/(${denominator}/4) is not a whole number of beats`,
    );
  }
}

/** Audio could not be measured or sliced for a segment. */
export class AudioSegmentError extends TempoSplitError {}

/** A segment file name that does not follow the segment naming grammar. */
export class FilenameFormatError extends TempoSplitError {
  constructor(public readonly filename: string) {
    super(`Filename doesn't match expected pattern: ${filename}`);
  }
}

/** A merge was asked to combine zero segments. */
export class NoSegmentsError extends TempoSplitError {}

/** A beatmap container that cannot be opened or fails validation. */
export class BeatmapFormatError extends TempoSplitError {}

/** A tool configuration file that fails validation. */
export class ConfigError extends TempoSplitError {}

/** Render any thrown value as a single line. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
