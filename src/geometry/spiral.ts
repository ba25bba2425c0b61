// ─── Spiral Pattern ─────────────────────────────────────────────────────────
//
// Places a run of notes on a circle around their own positions, advancing
// a fixed angle per note, so a steady beat reads as a rotating pattern.
// ─────────────────────────────────────────────────────────────────────────────

import type { NoteNode } from "../beatmap/beatmap.js";

/**
 * @param fidelity Notes per full rotation.
 * @param startAngle Angle of the first note, in degrees.
 * @param direction 1 for counter-clockwise, -1 for clockwise.
 */
export function spiral(
  nodes: readonly NoteNode[],
  fidelity: number,
  radius: number,
  startAngle = 0,
  direction: 1 | -1 = 1,
): NoteNode[] {
  const step = fidelity > 0 ? 360 / fidelity : 0;

  return nodes.map(([x, y, beat], i): NoteNode => {
    const radians = ((startAngle + direction * step * i) * Math.PI) / 180;
    return [x + radius * Math.cos(radians), y + radius * Math.sin(radians), beat];
  });
}
