// ─── Audio Codecs ───────────────────────────────────────────────────────────
//
// The split pipeline needs two things from audio: its length, and a cut of
// it between two times. AudioCodec is that seam; wavCodec implements it for
// RIFF/WAVE by copying whole frames of the data chunk.
// ─────────────────────────────────────────────────────────────────────────────

import { AudioSegmentError } from "../errors.js";

export interface AudioCodec {
  /** Duration of the encoded audio in milliseconds. */
  durationMs(bytes: Uint8Array): number;
  /** Encoded audio covering [startMs, endMs) of the input. */
  slice(bytes: Uint8Array, startMs: number, endMs: number): Uint8Array;
}

// ─── WAV Layout ─────────────────────────────────────────────────────────────

export interface WavLayout {
  audioFormat: number;
  numChannels: number;
  sampleRate: number;
  bitsPerSample: number;
  /** Bytes per frame (all channels of one sample). */
  blockAlign: number;
  dataOffset: number;
  dataSize: number;
  numFrames: number;
}

function chunkId(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset), view.getUint8(offset + 1),
    view.getUint8(offset + 2), view.getUint8(offset + 3),
  );
}

/** Locate the fmt and data chunks of a WAV file. */
export function readWavLayout(bytes: Uint8Array): WavLayout {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (view.byteLength < 12 || chunkId(view, 0) !== "RIFF" || chunkId(view, 8) !== "WAVE") {
    throw new AudioSegmentError("Audio is not a RIFF/WAVE file");
  }

  let offset = 12;
  let fmtOffset = -1, dataOffset = -1, dataSize = 0;

  while (offset + 8 <= view.byteLength) {
    const id = chunkId(view, offset);
    const size = view.getUint32(offset + 4, true);
    if (id === "fmt ") fmtOffset = offset + 8;
    else if (id === "data") { dataOffset = offset + 8; dataSize = size; }
    if (fmtOffset >= 0 && dataOffset >= 0) break;
    offset += 8 + size + (size % 2);
  }

  if (fmtOffset < 0 || fmtOffset + 16 > view.byteLength) {
    throw new AudioSegmentError("WAV file has no fmt chunk");
  }
  if (dataOffset < 0) {
    throw new AudioSegmentError("WAV file has no data chunk");
  }

  const audioFormat = view.getUint16(fmtOffset, true);
  const numChannels = view.getUint16(fmtOffset + 2, true);
  const sampleRate = view.getUint32(fmtOffset + 4, true);
  const blockAlign = view.getUint16(fmtOffset + 12, true);
  const bitsPerSample = view.getUint16(fmtOffset + 14, true);
  if (numChannels === 0 || sampleRate === 0 || blockAlign === 0) {
    throw new AudioSegmentError("WAV fmt chunk is malformed");
  }

  // Tolerate a data chunk header that claims more than the file holds.
  dataSize = Math.min(dataSize, view.byteLength - dataOffset);

  return {
    audioFormat,
    numChannels,
    sampleRate,
    bitsPerSample,
    blockAlign,
    dataOffset,
    dataSize,
    numFrames: Math.floor(dataSize / blockAlign),
  };
}

/** Write a canonical 44-byte-header WAV around raw frame data. */
export function encodeWav(layout: Omit<WavLayout, "dataOffset" | "dataSize" | "numFrames">, frames: Uint8Array): Uint8Array {
  const dataSize = frames.byteLength;
  const buffer = Buffer.alloc(44 + dataSize);

  buffer.write("RIFF", 0);
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write("WAVE", 8);
  buffer.write("fmt ", 12);
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(layout.audioFormat, 20);
  buffer.writeUInt16LE(layout.numChannels, 22);
  buffer.writeUInt32LE(layout.sampleRate, 24);
  buffer.writeUInt32LE(layout.sampleRate * layout.blockAlign, 28);
  buffer.writeUInt16LE(layout.blockAlign, 32);
  buffer.writeUInt16LE(layout.bitsPerSample, 34);
  buffer.write("data", 36);
  buffer.writeUInt32LE(dataSize, 40);
  buffer.set(frames, 44);

  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

// ─── Codec ──────────────────────────────────────────────────────────────────

export const wavCodec: AudioCodec = {
  durationMs(bytes) {
    const layout = readWavLayout(bytes);
    return (layout.numFrames / layout.sampleRate) * 1000;
  },

  slice(bytes, startMs, endMs) {
    const layout = readWavLayout(bytes);
    const startFrame = Math.max(0, Math.round((startMs * layout.sampleRate) / 1000));
    const endFrame = Math.min(layout.numFrames, Math.round((endMs * layout.sampleRate) / 1000));
    if (endFrame <= startFrame) {
      throw new AudioSegmentError(
        `Cannot slice audio from ${startMs}ms to ${endMs}ms: ` +
          `the audio is ${((layout.numFrames / layout.sampleRate) * 1000).toFixed(2)}ms long`,
      );
    }

    const from = layout.dataOffset + startFrame * layout.blockAlign;
    const to = layout.dataOffset + endFrame * layout.blockAlign;
    return encodeWav(layout, bytes.subarray(from, to));
  },
};
