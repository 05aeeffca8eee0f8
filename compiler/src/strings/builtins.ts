import builtinNames from "./builtin-names.json";
import type { InternedString } from "./interner.ts";

const NAMES = builtinNames.names;

/** Every pre-interned keyword and builtin identifier. */
export type BuiltinName = keyof typeof NAMES;

/** Pre-interned handles, one per builtin name. */
export type BuiltinStrings = Readonly<Record<BuiltinName, InternedString>>;

export function isBuiltinName(name: string): name is BuiltinName {
  return Object.hasOwn(NAMES, name);
}

function namesOfCategory(category: string): string[] {
  return Object.entries(NAMES)
    .filter(([, kind]) => kind === category)
    .map(([name]) => name);
}

/** Keywords and builtin identifiers pre-interned by every `StringInterner`. */
export const BUILTIN_KEYWORDS: readonly string[] = namesOfCategory("keyword");
export const BUILTIN_IDENTIFIERS: readonly string[] = namesOfCategory("identifier");

export function allBuiltinNames(): string[] {
  return Object.keys(NAMES);
}

function isComplete(
  table: Partial<Record<BuiltinName, InternedString>>,
): table is Record<BuiltinName, InternedString> {
  return allBuiltinNames().every((name) => isBuiltinName(name) && table[name] !== undefined);
}

/** Intern every builtin name and key the handles by name. */
export function internBuiltins(intern: (text: string) => InternedString): BuiltinStrings {
  const table: Partial<Record<BuiltinName, InternedString>> = {};
  for (const name of allBuiltinNames()) {
    if (isBuiltinName(name)) table[name] = intern(name);
  }
  if (!isComplete(table)) {
    throw new Error("builtin name table is incomplete");
  }
  return Object.freeze(table);
}
