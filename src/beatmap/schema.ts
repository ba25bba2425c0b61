// ─── Beatmap Document Schema ────────────────────────────────────────────────
//
// The JSON document stored as `beatmap.json` inside a .synth container.
// Notes are stored as node lists; a note's beat is its first node's beat.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const NoteNodeSchema = z.tuple([z.number(), z.number(), z.number()]);

export const NoteSchema = z.array(NoteNodeSchema).min(1);

export const NoteContainerSchema = z.object({
  right: z.array(NoteSchema).default([]),
  left: z.array(NoteSchema).default([]),
  single: z.array(NoteSchema).default([]),
  both: z.array(NoteSchema).default([]),
});

export const BookmarkSchema = z.object({
  beat: z.number(),
  label: z.string(),
});

export const BeatmapDocumentSchema = z.object({
  version: z.literal(1),
  name: z.string().min(1),
  artist: z.string().default(""),
  mapper: z.string().default(""),
  bpm: z.number().positive(),
  offsetMs: z.number().default(0),
  audioFile: z.string().min(1),
  difficulties: z.record(z.string(), NoteContainerSchema).default({}),
  bookmarks: z.array(BookmarkSchema).default([]),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type BeatmapDocument = z.infer<typeof BeatmapDocumentSchema>;
export type NoteContainerDocument = z.infer<typeof NoteContainerSchema>;
