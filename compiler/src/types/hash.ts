import { fnv1a } from "../strings/interner.ts";

const GOLDEN_RATIO = 0x9e3779b9;
const encoder = new TextEncoder();

/** Mix `value` into `seed` (32-bit variant of the usual hash_combine). */
export function hashCombine(seed: number, value: number): number {
  return (seed ^ ((value + GOLDEN_RATIO + (seed << 6) + (seed >>> 2)) >>> 0)) >>> 0;
}

export function hashText(text: string): number {
  return fnv1a(encoder.encode(text));
}

export function hashAll(seed: number, values: readonly number[]): number {
  return values.reduce((h, v) => hashCombine(h, v), seed);
}
