import { describe, expect, test } from "vitest";
import { NodeFlags } from "../../src/ast/flags.ts";
import { printTree } from "../../src/ast/printer.ts";
import { I32_TYPE } from "../../src/types/primitives.ts";
import { makeContext } from "../helpers.ts";

describe("printTree", () => {
  test("prints nested nodes with type and flags", () => {
    const ctx = makeContext();
    const b = ctx.builder;
    const decl = b.variableDecl(
      ctx.intern("x"),
      b.primitiveType(ctx.intern("i32")),
      b.intLiteral(42),
      NodeFlags.Const,
    );
    ctx.tree.setType(decl.id, I32_TYPE);
    const program = b.program([decl]);

    expect(printTree(ctx.tree, program.id)).toBe(
      [
        "(Program",
        "  (VariableDeclaration x : i32 [Const]",
        "    (PrimitiveType i32)",
        "    (IntLiteral 42)))",
      ].join("\n"),
    );
  });

  test("tolerates nodes without type or flags", () => {
    const ctx = makeContext();
    expect(printTree(ctx.tree, ctx.builder.nullLiteral().id)).toBe("(NullLiteral)");
  });

  test("prints literal payloads", () => {
    const ctx = makeContext();
    const b = ctx.builder;
    const tuple = b.tupleExpr([
      b.boolLiteral(true),
      b.floatLiteral(1.5),
      b.stringLiteral(ctx.intern("hi")),
      b.charLiteral("a"),
    ]);
    expect(printTree(ctx.tree, tuple.id)).toBe(
      [
        "(TupleExpr",
        "  (BoolLiteral true)",
        "  (FloatLiteral 1.5)",
        '  (StringLiteral "hi")',
        "  (CharLiteral 'a'))",
      ].join("\n"),
    );
  });

  test("prints operators, ranges and array sizes", () => {
    const ctx = makeContext();
    const b = ctx.builder;
    const n = b.identifier(ctx.intern("n"));
    expect(printTree(ctx.tree, b.unary("++", n, false).id)).toBe(
      "(UnaryExpr ++ postfix\n  (Identifier n))",
    );
    const range = b.range(b.intLiteral(0), b.intLiteral(9), true);
    expect(printTree(ctx.tree, range.id)).toBe(
      "(RangeExpr ..=\n  (IntLiteral 0)\n  (IntLiteral 9))",
    );
    const array = b.arrayType(b.primitiveType(ctx.intern("u8")), 4);
    expect(printTree(ctx.tree, array.id)).toBe("(ArrayType 4\n  (PrimitiveType u8))");
  });

  test("prints imports with aliases", () => {
    const ctx = makeContext();
    const b = ctx.builder;
    const item = b.importItem(ctx.intern("print"), ctx.intern("p"));
    const decl = b.importDecl(ctx.intern("std/io"), ctx.intern("io"), [item]);
    expect(printTree(ctx.tree, decl.id)).toBe(
      '(ImportDeclaration "std/io" as io\n  (ImportItem print as p))',
    );
  });

  test("prints attributes inline without visiting them", () => {
    const ctx = makeContext();
    const b = ctx.builder;
    const fn = b.funcDecl(ctx.intern("f"), [], null, b.block([]));
    ctx.tree.addAttribute(fn.id, b.attribute(ctx.intern("inline"), [b.intLiteral(1)]).id);
    expect(printTree(ctx.tree, fn.id)).toBe(
      "(FuncDeclaration f @inline\n  (Noop)\n  (BlockStmt))",
    );
  });

  test("does not modify the tree", () => {
    const ctx = makeContext();
    const b = ctx.builder;
    const block = b.block([b.noop(), b.breakStmt()]);
    const before = JSON.stringify(block);
    printTree(ctx.tree, block.id);
    expect(JSON.stringify(block)).toBe(before);
  });
});
