/**
 * Scope-chain symbol table.
 *
 * One global scope lives for the whole table; `pushScope` / `popScope` move
 * a cursor through nested scopes as a pass walks the tree. Redefinitions,
 * unresolved names and unused symbols are reported to the logger and never
 * abort the pass.
 */

import { type SourceLocation, UNKNOWN_LOCATION } from "../errors/diagnostic.ts";
import type { DiagnosticLogger } from "../errors/logger.ts";
import type { NodeId } from "../ast/nodes.ts";
import type { SyntaxTree } from "../ast/tree.ts";
import type { InternedString } from "../strings/interner.ts";
import { Scope } from "./scope.ts";
import { isReferenced, type SymbolEntry } from "./symbol.ts";

export type SymbolCallback = (declaration: NodeId | null, symbol: SymbolEntry) => void;

export class SymbolTable {
  readonly globalScope: Scope;
  private current: Scope;

  constructor(
    private readonly tree: SyntaxTree,
    private readonly logger: DiagnosticLogger,
  ) {
    this.globalScope = new Scope();
    this.current = this.globalScope;
  }

  get currentScope(): Scope {
    return this.current;
  }

  get currentScopeLevel(): number {
    return this.current.level;
  }

  // ─── Definitions ──────────────────────────────────────────────────────────

  /**
   * Bind `name` in the current scope. On a redefinition the error points at
   * `location` with a note at the previous declaration, and the earlier
   * binding stays in effect.
   */
  defineSymbol(name: InternedString, declaration: NodeId | null, location: SourceLocation): boolean {
    if (this.current.defineSymbol(name, declaration)) return true;

    const previous = this.current.lookupLocal(name);
    this.logger.error(`Redefinition of symbol '${name.text}'`, location, [
      {
        message: "Previous definition was here",
        location: this.locationOf(previous?.declaration ?? null),
      },
    ]);
    return false;
  }

  // ─── Resolution ───────────────────────────────────────────────────────────

  /**
   * Resolve `name` from the current scope outward and return its declaration.
   * When `reference` is given it is recorded as the symbol's latest use.
   */
  lookupSymbol(
    name: InternedString,
    location: SourceLocation,
    reference: NodeId | null = null,
  ): NodeId | null {
    const symbol = this.current.lookup(name);
    if (!symbol) {
      this.logger.error(`Use of undeclared identifier '${name.text}'`, location);
      return null;
    }
    if (reference !== null) symbol.lastReference = reference;
    return symbol.declaration;
  }

  /** Resolve without reporting anything. */
  findSymbol(name: InternedString): SymbolEntry | null {
    return this.current.lookup(name);
  }

  /** Record `reference` as the latest use of `name`; `false` when it does not resolve. */
  updateSymbolReference(
    name: InternedString,
    reference: NodeId,
    _location: SourceLocation,
  ): boolean {
    const symbol = this.current.lookup(name);
    if (!symbol) return false;
    symbol.lastReference = reference;
    return true;
  }

  // ─── Scopes ───────────────────────────────────────────────────────────────

  /** Enter a new scope nested in the current one. */
  pushScope(node: NodeId | null, _location: SourceLocation = UNKNOWN_LOCATION): Scope {
    this.current = this.current.createChild(node);
    return this.current;
  }

  /**
   * Leave the current scope, warning about each symbol it defined that was
   * never referenced. Popping the global scope only warns.
   */
  popScope(location: SourceLocation = UNKNOWN_LOCATION): void {
    const parent = this.current.parent;
    if (!parent) {
      this.logger.warning("Attempted to pop global scope", location);
      return;
    }
    this.reportUnused(this.current);
    this.current = parent;
  }

  /**
   * Call `callback` for every symbol in the current scope, or with
   * `currentOnly` false for every scope up to the global one (innermost first).
   */
  iterateSymbols(callback: SymbolCallback, currentOnly = true): void {
    let scope: Scope | null = this.current;
    while (scope) {
      for (const symbol of scope.symbols()) {
        callback(symbol.declaration, symbol);
      }
      if (currentOnly) return;
      scope = scope.parent;
    }
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  private reportUnused(scope: Scope): void {
    const unused = [...scope.symbols()]
      .filter((symbol) => !isReferenced(symbol))
      .sort((a, b) => a.index - b.index);
    for (const symbol of unused) {
      this.logger.warning(
        `Unused symbol '${symbol.name.text}'`,
        this.locationOf(symbol.declaration),
      );
    }
  }

  private locationOf(declaration: NodeId | null): SourceLocation {
    if (declaration === null) return UNKNOWN_LOCATION;
    return this.tree.tryNode(declaration)?.location ?? UNKNOWN_LOCATION;
  }
}
