import type { NodeId } from "../ast/nodes.ts";
import type { InternedString } from "../strings/interner.ts";

/** A name bound in one scope. */
export interface SymbolEntry {
  /** Definition order within the owning scope, starting at 0. */
  readonly index: number;
  readonly name: InternedString;
  readonly declaration: NodeId | null;
  /** Most recent resolved use; `null` until the symbol is referenced. */
  lastReference: NodeId | null;
}

export function isReferenced(symbol: SymbolEntry): boolean {
  return symbol.lastReference !== null;
}
