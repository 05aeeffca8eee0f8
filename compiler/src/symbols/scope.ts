/**
 * Lexical scope.
 *
 * Each scope holds the symbols defined in it and owns the scopes nested
 * inside it, forming a tree rooted at the global scope. Lookup walks from
 * a scope up to the root, so inner definitions shadow outer ones.
 */

import type { NodeId } from "../ast/nodes.ts";
import type { InternedString } from "../strings/interner.ts";
import type { SymbolEntry } from "./symbol.ts";

export class Scope {
  /** Syntax node that opened this scope (`null` for the global scope). */
  readonly node: NodeId | null;

  /** Parent scope, or `null` for the global scope. */
  readonly parent: Scope | null;

  /** Nesting depth; the global scope is level 0. */
  readonly level: number;

  private readonly table = new Map<InternedString, SymbolEntry>();
  private readonly nested: Scope[] = [];

  constructor(node: NodeId | null = null, parent: Scope | null = null) {
    this.node = node;
    this.parent = parent;
    this.level = parent ? parent.level + 1 : 0;
  }

  get isGlobal(): boolean {
    return this.parent === null;
  }

  /** Scopes created inside this one, in creation order. */
  get children(): readonly Scope[] {
    return this.nested;
  }

  get symbolCount(): number {
    return this.table.size;
  }

  /**
   * Define `name` in this scope. Returns the new entry, or `null` when the
   * name is already bound here; the existing binding is left untouched.
   */
  defineSymbol(name: InternedString, declaration: NodeId | null): SymbolEntry | null {
    if (this.table.has(name)) return null;
    const entry: SymbolEntry = {
      index: this.table.size,
      name,
      declaration,
      lastReference: null,
    };
    this.table.set(name, entry);
    return entry;
  }

  /** Look up a symbol in *this* scope only. */
  lookupLocal(name: InternedString): SymbolEntry | null {
    return this.table.get(name) ?? null;
  }

  /** Innermost binding of `name`, walking outward to the global scope. */
  lookup(name: InternedString): SymbolEntry | null {
    return this.lookupLocal(name) ?? this.parent?.lookup(name) ?? null;
  }

  hasSymbol(name: InternedString): boolean {
    return this.table.has(name);
  }

  /** Symbols of this scope. Callers that need a stable order sort by `index`. */
  symbols(): IterableIterator<SymbolEntry> {
    return this.table.values();
  }

  /** Create a scope nested in (and owned by) this one. */
  createChild(node: NodeId | null): Scope {
    const child = new Scope(node, this);
    this.nested.push(child);
    return child;
  }
}
