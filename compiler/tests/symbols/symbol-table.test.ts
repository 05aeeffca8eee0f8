import { describe, expect, test } from "vitest";
import { Severity, UNKNOWN_LOCATION } from "../../src/errors/diagnostic.ts";
import type { NodeId } from "../../src/ast/nodes.ts";
import { makeContext, messages } from "../helpers.ts";

describe("SymbolTable", () => {
  describe("defineSymbol", () => {
    test("defines in the current scope", () => {
      const ctx = makeContext();
      const decl = ctx.builder.variableDecl(ctx.intern("x"));
      expect(ctx.symbols.defineSymbol(ctx.intern("x"), decl.id, ctx.at(1, 1))).toBe(true);
      expect(ctx.symbols.globalScope.symbolCount).toBe(1);
      expect(ctx.logger.diagnostics).toEqual([]);
    });

    test("redefinition reports both locations and keeps the first", () => {
      const ctx = makeContext();
      const first = ctx.builder.variableDecl(ctx.intern("x"), null, null, 0, ctx.at(1, 5, 4));
      const second = ctx.builder.variableDecl(ctx.intern("x"), null, null, 0, ctx.at(2, 5, 20));
      expect(ctx.symbols.defineSymbol(ctx.intern("x"), first.id, first.location)).toBe(true);
      expect(ctx.symbols.defineSymbol(ctx.intern("x"), second.id, second.location)).toBe(false);

      expect(ctx.logger.errorCount).toBe(1);
      expect(ctx.logger.diagnostics[0]).toEqual({
        severity: Severity.Error,
        message: "Redefinition of symbol 'x'",
        location: { file: "test.src", line: 2, column: 5, offset: 20 },
        notes: [
          {
            message: "Previous definition was here",
            location: { file: "test.src", line: 1, column: 5, offset: 4 },
          },
        ],
      });
      expect(ctx.symbols.globalScope.symbolCount).toBe(1);
      expect(ctx.symbols.findSymbol(ctx.intern("x"))?.declaration).toBe(first.id);
    });

    test("the same name in different scopes is not a redefinition", () => {
      const ctx = makeContext();
      ctx.symbols.defineSymbol(ctx.intern("x"), null, ctx.at(1, 1));
      ctx.symbols.pushScope(null, ctx.at(2, 1));
      expect(ctx.symbols.defineSymbol(ctx.intern("x"), null, ctx.at(3, 1))).toBe(true);
      expect(ctx.logger.errorCount).toBe(0);
    });
  });

  describe("lookupSymbol", () => {
    test("returns the declaration of the nearest binding", () => {
      const ctx = makeContext();
      const outer = ctx.builder.variableDecl(ctx.intern("x"));
      const inner = ctx.builder.variableDecl(ctx.intern("x"));
      ctx.symbols.defineSymbol(ctx.intern("x"), outer.id, ctx.at(1, 1));
      ctx.symbols.pushScope(null);
      ctx.symbols.defineSymbol(ctx.intern("x"), inner.id, ctx.at(2, 1));
      expect(ctx.symbols.lookupSymbol(ctx.intern("x"), ctx.at(3, 1))).toBe(inner.id);
    });

    test("an unresolved name logs an error and returns null", () => {
      const ctx = makeContext();
      expect(ctx.symbols.lookupSymbol(ctx.intern("ghost"), ctx.at(4, 2))).toBeNull();
      expect(ctx.logger.diagnostics[0]).toEqual({
        severity: Severity.Error,
        message: "Use of undeclared identifier 'ghost'",
        location: { file: "test.src", line: 4, column: 2, offset: 0 },
        notes: [],
      });
    });

    test("a reference node is recorded as the last use", () => {
      const ctx = makeContext();
      const use = ctx.builder.identifier(ctx.intern("x"));
      ctx.symbols.defineSymbol(ctx.intern("x"), null, ctx.at(1, 1));
      ctx.symbols.lookupSymbol(ctx.intern("x"), ctx.at(2, 1), use.id);
      expect(ctx.symbols.findSymbol(ctx.intern("x"))?.lastReference).toBe(use.id);
    });

    test("lookup without a reference leaves the symbol unreferenced", () => {
      const ctx = makeContext();
      ctx.symbols.defineSymbol(ctx.intern("x"), null, ctx.at(1, 1));
      ctx.symbols.lookupSymbol(ctx.intern("x"), ctx.at(2, 1));
      expect(ctx.symbols.findSymbol(ctx.intern("x"))?.lastReference).toBeNull();
    });
  });

  describe("findSymbol", () => {
    test("reports nothing on a miss", () => {
      const ctx = makeContext();
      expect(ctx.symbols.findSymbol(ctx.intern("nothing"))).toBeNull();
      expect(ctx.logger.diagnostics).toEqual([]);
    });
  });

  describe("updateSymbolReference", () => {
    test("records the reference on the resolved symbol", () => {
      const ctx = makeContext();
      const use = ctx.builder.identifier(ctx.intern("v"));
      ctx.symbols.defineSymbol(ctx.intern("v"), null, ctx.at(1, 1));
      ctx.symbols.pushScope(null);
      expect(ctx.symbols.updateSymbolReference(ctx.intern("v"), use.id, ctx.at(2, 1))).toBe(true);
      expect(ctx.symbols.globalScope.lookupLocal(ctx.intern("v"))?.lastReference).toBe(use.id);
    });

    test("returns false for an unknown name without reporting", () => {
      const ctx = makeContext();
      const use = ctx.builder.identifier(ctx.intern("v"));
      expect(ctx.symbols.updateSymbolReference(ctx.intern("v"), use.id, ctx.at(1, 1))).toBe(false);
      expect(ctx.logger.diagnostics).toEqual([]);
    });
  });

  describe("scopes", () => {
    test("push and pop move the cursor", () => {
      const ctx = makeContext();
      const block = ctx.builder.block([]);
      const scope = ctx.symbols.pushScope(block.id);
      expect(ctx.symbols.currentScope).toBe(scope);
      expect(ctx.symbols.currentScopeLevel).toBe(1);
      expect(scope.node).toBe(block.id);
      expect(ctx.symbols.globalScope.children).toEqual([scope]);
      ctx.symbols.popScope();
      expect(ctx.symbols.currentScope).toBe(ctx.symbols.globalScope);
      expect(ctx.symbols.currentScopeLevel).toBe(0);
    });

    test("popping the global scope only warns", () => {
      const ctx = makeContext();
      ctx.symbols.popScope(ctx.at(9, 1));
      expect(ctx.symbols.currentScope).toBe(ctx.symbols.globalScope);
      expect(ctx.logger.warningCount).toBe(1);
      expect(ctx.logger.errorCount).toBe(0);
      expect(ctx.logger.diagnostics[0]?.message).toBe("Attempted to pop global scope");
      expect(ctx.logger.diagnostics[0]?.location.line).toBe(9);
    });

    test("popping reports unused symbols in definition order", () => {
      const ctx = makeContext();
      const a = ctx.builder.variableDecl(ctx.intern("a"), null, null, 0, ctx.at(2, 3));
      const b = ctx.builder.variableDecl(ctx.intern("b"), null, null, 0, ctx.at(3, 3));
      const c = ctx.builder.variableDecl(ctx.intern("c"), null, null, 0, ctx.at(4, 3));
      const use = ctx.builder.identifier(ctx.intern("b"));
      ctx.symbols.pushScope(null);
      ctx.symbols.defineSymbol(ctx.intern("c"), c.id, c.location);
      ctx.symbols.defineSymbol(ctx.intern("a"), a.id, a.location);
      ctx.symbols.defineSymbol(ctx.intern("b"), b.id, b.location);
      ctx.symbols.lookupSymbol(ctx.intern("b"), ctx.at(5, 3), use.id);
      ctx.symbols.popScope(ctx.at(6, 1));

      expect(messages(ctx)).toEqual(["Unused symbol 'c'", "Unused symbol 'a'"]);
      expect(ctx.logger.diagnostics.map((d) => d.location.line)).toEqual([4, 2]);
      expect(ctx.logger.diagnostics.every((d) => d.severity === Severity.Warning)).toBe(true);
    });

    test("an unused symbol without a declaration is reported at an unknown location", () => {
      const ctx = makeContext();
      ctx.symbols.pushScope(null);
      ctx.symbols.defineSymbol(ctx.intern("tmp"), null, ctx.at(1, 1));
      ctx.symbols.popScope();
      expect(ctx.logger.diagnostics[0]?.location).toEqual(UNKNOWN_LOCATION);
    });

    test("global symbols are never reported as unused", () => {
      const ctx = makeContext();
      ctx.symbols.defineSymbol(ctx.intern("g"), null, ctx.at(1, 1));
      ctx.symbols.popScope();
      expect(messages(ctx)).toEqual(["Attempted to pop global scope"]);
    });
  });

  describe("iterateSymbols", () => {
    test("current scope only, or every scope up to the global one", () => {
      const ctx = makeContext();
      const g = ctx.builder.variableDecl(ctx.intern("g"));
      const l = ctx.builder.variableDecl(ctx.intern("l"));
      ctx.symbols.defineSymbol(ctx.intern("g"), g.id, ctx.at(1, 1));
      ctx.symbols.pushScope(null);
      ctx.symbols.defineSymbol(ctx.intern("l"), l.id, ctx.at(2, 1));

      const local: (NodeId | null)[] = [];
      ctx.symbols.iterateSymbols((decl) => local.push(decl));
      expect(local).toEqual([l.id]);

      const all: string[] = [];
      ctx.symbols.iterateSymbols((_decl, symbol) => all.push(symbol.name.text), false);
      expect(all.sort()).toEqual(["g", "l"]);
    });
  });
});
