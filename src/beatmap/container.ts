// ─── .synth Container ───────────────────────────────────────────────────────
//
// A .synth file is a zip archive holding `beatmap.json` and the audio file
// it names. Reading validates the document with zod before building a
// Beatmap; writing always produces a fresh archive.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, writeFileSync } from "node:fs";
import AdmZip from "adm-zip";
import { BeatmapFormatError, describeError } from "../errors.js";
import {
  Beatmap,
  HANDS,
  createNoteContainer,
  roundBeat,
  type NoteContainer,
  type NoteNode,
} from "./beatmap.js";
import { BeatmapDocumentSchema, type BeatmapDocument, type NoteContainerDocument } from "./schema.js";

export const DOCUMENT_ENTRY = "beatmap.json";
export const SYNTH_EXTENSION = ".synth";

// ─── Document <-> Beatmap ───────────────────────────────────────────────────

export function toDocument(beatmap: Beatmap): BeatmapDocument {
  const difficulties: Record<string, NoteContainerDocument> = {};
  for (const [name, container] of beatmap.difficulties) {
    difficulties[name] = {
      right: sortedNotes(container.right),
      left: sortedNotes(container.left),
      single: sortedNotes(container.single),
      both: sortedNotes(container.both),
    };
  }

  return {
    version: 1,
    name: beatmap.name,
    artist: beatmap.artist,
    mapper: beatmap.mapper,
    bpm: beatmap.bpm,
    offsetMs: beatmap.offsetMs,
    audioFile: beatmap.audio.fileName,
    difficulties,
    bookmarks: [...beatmap.bookmarks.entries()]
      .sort(([a], [b]) => a - b)
      .map(([beat, label]) => ({ beat, label })),
  };
}

export function fromDocument(doc: BeatmapDocument, audioData: Uint8Array): Beatmap {
  const difficulties = new Map<string, NoteContainer>();
  for (const [name, notes] of Object.entries(doc.difficulties)) {
    const container = createNoteContainer();
    for (const hand of HANDS) {
      for (const nodes of notes[hand]) {
        container[hand].set(roundBeat(nodes[0][2]), nodes.map(([x, y, b]): NoteNode => [x, y, b]));
      }
    }
    difficulties.set(name, container);
  }

  return new Beatmap({
    name: doc.name,
    artist: doc.artist,
    mapper: doc.mapper,
    bpm: doc.bpm,
    offsetMs: doc.offsetMs,
    audio: { fileName: doc.audioFile, data: audioData },
    difficulties,
    bookmarks: new Map(doc.bookmarks.map((b): [number, string] => [roundBeat(b.beat), b.label])),
  });
}

function sortedNotes(notes: Map<number, NoteNode[]>): NoteNode[][] {
  return [...notes.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, nodes]) => nodes.map(([x, y, b]): NoteNode => [x, y, b]));
}

// ─── File I/O ───────────────────────────────────────────────────────────────

/** Read a beatmap from .synth bytes. `source` names it in errors. */
export function readBeatmap(bytes: Uint8Array, source = "beatmap"): Beatmap {
  let zip: AdmZip;
  try {
    zip = new AdmZip(Buffer.from(bytes));
  } catch (err) {
    throw new BeatmapFormatError(`${source} is not a readable .synth archive: ${describeError(err)}`, {
      cause: err,
    });
  }

  const entry = zip.getEntry(DOCUMENT_ENTRY);
  if (!entry) {
    throw new BeatmapFormatError(`${source} has no ${DOCUMENT_ENTRY}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(entry.getData().toString("utf8"));
  } catch (err) {
    throw new BeatmapFormatError(`${source}: ${DOCUMENT_ENTRY} is not valid JSON`, { cause: err });
  }

  const result = BeatmapDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new BeatmapFormatError(`Invalid beatmap in ${source}:\n${issues}`);
  }

  const audioEntry = zip.getEntry(result.data.audioFile);
  if (!audioEntry) {
    throw new BeatmapFormatError(`${source} is missing its audio file "${result.data.audioFile}"`);
  }

  return fromDocument(result.data, new Uint8Array(audioEntry.getData()));
}

/** Encode a beatmap as .synth bytes. */
export function writeBeatmap(beatmap: Beatmap): Buffer {
  const zip = new AdmZip();
  const doc = toDocument(beatmap);
  zip.addFile(DOCUMENT_ENTRY, Buffer.from(JSON.stringify(doc, null, 2) + "\n", "utf8"));
  zip.addFile(beatmap.audio.fileName, Buffer.from(beatmap.audio.data));
  return zip.toBuffer();
}

export function loadBeatmap(filePath: string): Beatmap {
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (err) {
    throw new BeatmapFormatError(`Cannot read ${filePath}: ${describeError(err)}`, { cause: err });
  }
  return readBeatmap(bytes, filePath);
}

export function saveBeatmap(beatmap: Beatmap, filePath: string): void {
  writeFileSync(filePath, writeBeatmap(beatmap));
}
