/**
 * Memory layout rules.
 *
 * Records (tuples, structs, class instances) are laid out sequentially:
 * each member goes at the next offset aligned to its own alignment, the
 * record is aligned to its strictest member and its size is rounded up to
 * that alignment. Packed records drop all padding and align to 1.
 */

import { alignUp } from "../memory/arena.ts";
import type { Type } from "./definitions.ts";

export interface RecordLayout {
  offsets: number[];
  size: number;
  alignment: number;
}

export function layoutRecord(members: readonly Type[], packed = false): RecordLayout {
  const offsets: number[] = [];
  let offset = 0;
  let alignment = 1;
  for (const member of members) {
    const memberAlign = packed ? 1 : member.alignment;
    offset = alignUp(offset, memberAlign);
    offsets.push(offset);
    offset += member.size;
    alignment = Math.max(alignment, memberAlign);
  }
  return { offsets, size: alignUp(offset, alignment), alignment };
}

/** Structs with no fields still occupy one byte. */
export function layoutStruct(fields: readonly Type[], packed: boolean): RecordLayout {
  if (fields.length === 0) return { offsets: [], size: 1, alignment: 1 };
  return layoutRecord(fields, packed);
}

/** Union payload envelope: the largest size and strictest alignment of its variants. */
export function layoutUnion(variants: readonly Type[]): { size: number; alignment: number } {
  let size = 0;
  let alignment = 1;
  for (const variant of variants) {
    size = Math.max(size, variant.size);
    alignment = Math.max(alignment, variant.alignment);
  }
  return { size, alignment };
}

/** Fixed arrays hold their elements inline; dynamic arrays are a pointer. */
export function layoutArray(
  element: Type,
  length: number,
  pointerSize: number,
): { size: number; alignment: number } {
  if (length === 0) return { size: pointerSize, alignment: pointerSize };
  return { size: element.size * length, alignment: element.alignment };
}
