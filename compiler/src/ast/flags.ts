// ─── Node Flags ─────────────────────────────────────────────────────────────

/**
 * Bit flags accumulated on nodes and composite types as passes run.
 * Stored as a plain number; at most 31 bits are used so bitwise operators stay exact.
 */
export const NodeFlags = {
  None: 0,
  Const: 1 << 0,
  Public: 1 << 1,
  Extern: 1 << 2,
  Static: 1 << 3,
  Packed: 1 << 4,
  Virtual: 1 << 5,
  Abstract: 1 << 6,
  Override: 1 << 7,
  Variadic: 1 << 8,
  Async: 1 << 9,
  Inline: 1 << 10,
  Mutable: 1 << 11,
  Optional: 1 << 12,
  Builtin: 1 << 13,
  Generated: 1 << 14,
  Visited: 1 << 15,
  TypeChecked: 1 << 16,
  Used: 1 << 17,
} as const;

export type NodeFlagName = keyof typeof NodeFlags;

/** A combination of `NodeFlags` bits. */
export type Flags = number;

const FLAG_ENTRIES = Object.entries(NodeFlags).filter(([, bit]) => bit !== 0);

const KNOWN_BITS = FLAG_ENTRIES.reduce((acc, [, bit]) => acc | bit, 0);

export function hasFlag(flags: Flags, flag: Flags): boolean {
  return flag !== 0 && (flags & flag) === flag;
}

export function hasAnyFlag(flags: Flags, mask: Flags): boolean {
  return (flags & mask) !== 0;
}

export function hasAllFlags(flags: Flags, mask: Flags): boolean {
  return (flags & mask) === mask;
}

/** Readable form: set flag names joined with `|`, or `None`. */
export function flagsToString(flags: Flags): string {
  if (flags === 0) return "None";
  const names: string[] = [];
  for (const [name, bit] of FLAG_ENTRIES) {
    if ((flags & bit) === bit) names.push(name);
  }
  const unknown = flags & ~KNOWN_BITS;
  if (unknown !== 0) names.push(`0x${(unknown >>> 0).toString(16)}`);
  return names.join("|");
}

export function parseFlag(name: string): Flags | undefined {
  for (const [flagName, bit] of Object.entries(NodeFlags)) {
    if (flagName === name) return bit;
  }
  return undefined;
}
