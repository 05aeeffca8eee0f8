/**
 * String interning.
 *
 * Every identifier and literal text is canonicalized once, so later passes
 * compare names with `===` instead of comparing characters. The bytes are
 * copied into arena storage; the returned handle stays valid for the
 * interner's lifetime.
 */

import type { Arena, ArenaAllocation } from "../memory/arena.ts";
import { BUILTIN_KEYWORDS, type BuiltinStrings, internBuiltins } from "./builtins.ts";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const encoder = new TextEncoder();

export function fnv1a(bytes: Uint8Array): number {
  let hash = FNV_OFFSET;
  for (const byte of bytes) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

/** Canonical string handle. Two handles are equal only if they are the same object. */
export class InternedString {
  /** @internal instances are created by `StringInterner` only */
  constructor(
    readonly id: number,
    readonly text: string,
    readonly hash: number,
    /** UTF-8 bytes in arena storage, without the terminating zero. */
    readonly bytes: Uint8Array,
  ) {}

  /** Length in UTF-8 bytes. */
  get length(): number {
    return this.bytes.length;
  }

  get isEmpty(): boolean {
    return this.bytes.length === 0;
  }

  equals(other: InternedString | null | undefined): boolean {
    return this === other;
  }

  compare(other: InternedString): number {
    if (this === other) return 0;
    return this.text < other.text ? -1 : this.text > other.text ? 1 : 0;
  }

  toString(): string {
    return this.text;
  }
}

export class StringInterner {
  private readonly table = new Map<string, InternedString>();
  private readonly builtinSet = new Set<InternedString>();
  private readonly keywordSet = new Set<InternedString>();
  private memoryUsed = 0;
  private emptyString: InternedString;
  private builtinTable: BuiltinStrings;

  constructor(private readonly arena: Arena) {
    this.emptyString = this.intern("");
    this.builtinTable = this.seedBuiltins();
  }

  /** The canonical empty string. */
  get empty(): InternedString {
    return this.emptyString;
  }

  intern(text: string): InternedString {
    const existing = this.table.get(text);
    if (existing) return existing;

    const encoded = encoder.encode(text);
    const bytes = this.store(encoded);
    const interned = new InternedString(this.table.size, text, fnv1a(encoded), bytes);
    this.table.set(text, interned);
    this.memoryUsed += encoded.length + 1;
    return interned;
  }

  /** Existing handle for `text`, without interning it. */
  lookup(text: string): InternedString | undefined {
    return this.table.get(text);
  }

  /** Pre-interned keywords and builtin identifiers, keyed by name. */
  get builtins(): BuiltinStrings {
    return this.builtinTable;
  }

  /** Pre-interned builtin by name. */
  builtin(name: string): InternedString | undefined {
    const s = this.table.get(name);
    return s && this.builtinSet.has(s) ? s : undefined;
  }

  isBuiltin(s: InternedString): boolean {
    return this.builtinSet.has(s);
  }

  isKeyword(s: InternedString): boolean {
    return this.keywordSet.has(s);
  }

  get stringCount(): number {
    return this.table.size;
  }

  /** Bytes copied into the arena, counting one terminator per string. */
  get totalMemoryUsed(): number {
    return this.memoryUsed;
  }

  /**
   * Forget every string and intern the builtins again. Call after the
   * backing arena has been reset, since the old bytes are reused.
   */
  reset(): void {
    this.table.clear();
    this.builtinSet.clear();
    this.keywordSet.clear();
    this.memoryUsed = 0;
    this.emptyString = this.intern("");
    this.builtinTable = this.seedBuiltins();
  }

  private seedBuiltins(): BuiltinStrings {
    const table = internBuiltins((name) => this.intern(name));
    for (const s of Object.values(table)) {
      this.builtinSet.add(s);
    }
    for (const name of BUILTIN_KEYWORDS) {
      this.keywordSet.add(this.intern(name));
    }
    return table;
  }

  private store(encoded: Uint8Array): Uint8Array {
    const allocation: ArenaAllocation | null = this.arena.allocate(encoded.length + 1, 1);
    if (!allocation) return new Uint8Array(0);
    allocation.bytes.set(encoded);
    allocation.bytes[encoded.length] = 0;
    return allocation.bytes.subarray(0, encoded.length);
  }
}
