import { describe, expect, test } from "vitest";
import { NodeFlags } from "../../src/ast/flags.ts";
import { typeToString } from "../../src/types/format.ts";
import {
  asType,
  fieldIndex,
  fieldOffset,
  fieldType,
  findMethod,
  flattenedFieldIndex,
  flattenedFieldOffset,
  hasField,
  hasMethod,
  isAnonymousRecord,
  isDerivedFrom,
  isPackedStruct,
  isRecordType,
  isValueType,
} from "../../src/types/guards.ts";
import { TypeKind } from "../../src/types/kinds.ts";
import { BOOL_TYPE, F64_TYPE, I32_TYPE, U8_TYPE, VOID_TYPE } from "../../src/types/primitives.ts";
import { fields, makeContext } from "../helpers.ts";

function shapes() {
  const ctx = makeContext();
  const draw = ctx.types.getFunctionType([], VOID_TYPE);
  const base = ctx.types.getClassType(ctx.intern("Shape"), fields(ctx, ["id", I32_TYPE]), null, {
    methods: [{ name: ctx.intern("draw"), signature: draw }],
  });
  const circle = ctx.types.getClassType(
    ctx.intern("Circle"),
    fields(ctx, ["radius", F64_TYPE]),
    base,
  );
  const unit = ctx.types.getClassType(ctx.intern("Unit"), [], circle);
  return { ctx, draw, base, circle, unit };
}

describe("structs", () => {
  test("are canonical by name, fields and flags", () => {
    const ctx = makeContext();
    const point = () =>
      ctx.types.getStructType(ctx.intern("Point"), fields(ctx, ["x", I32_TYPE], ["y", I32_TYPE]));
    expect(point()).toBe(point());
    const renamed = ctx.types.getStructType(
      ctx.intern("Vec"),
      fields(ctx, ["x", I32_TYPE], ["y", I32_TYPE]),
    );
    expect(renamed).not.toBe(point());
    const packed = ctx.types.getStructType(
      ctx.intern("Point"),
      fields(ctx, ["x", I32_TYPE], ["y", I32_TYPE]),
      { flags: NodeFlags.Packed },
    );
    expect(packed).not.toBe(point());
    expect(isPackedStruct(packed)).toBe(true);
  });

  test("field lookup by name", () => {
    const ctx = makeContext();
    const s = ctx.types.getStructType(
      ctx.intern("Pixel"),
      fields(ctx, ["r", U8_TYPE], ["weight", F64_TYPE]),
    );
    expect(fieldIndex(s, ctx.intern("weight"))).toBe(1);
    expect(fieldIndex(s, ctx.intern("g"))).toBe(-1);
    expect(fieldType(s, ctx.intern("r"))).toBe(U8_TYPE);
    expect(fieldType(s, ctx.intern("g"))).toBeNull();
    expect(hasField(s, ctx.intern("r"))).toBe(true);
    expect(fieldOffset(s, ctx.intern("weight"))).toBe(8);
    expect(fieldOffset(s, 0)).toBe(0);
    expect(fieldOffset(s, 5)).toBe(-1);
    expect(fieldOffset(s, ctx.intern("g"))).toBe(-1);
  });

  test("the first declaration is kept", () => {
    const ctx = makeContext();
    const first = ctx.builder.structDecl(ctx.intern("Tag"), []);
    const second = ctx.builder.structDecl(ctx.intern("Tag"), []);
    const a = ctx.types.getStructType(ctx.intern("Tag"), [], { declaration: first.id });
    const b = ctx.types.getStructType(ctx.intern("Tag"), [], { declaration: second.id });
    expect(b).toBe(a);
    expect(b.declaration).toBe(first.id);
  });

  test("anonymous structs have an empty name", () => {
    const ctx = makeContext();
    const s = ctx.types.getStructType(ctx.strings.empty, fields(ctx, ["a", BOOL_TYPE]));
    expect(isAnonymousRecord(s)).toBe(true);
    expect(typeToString(s)).toBe("struct { a: bool }");
  });

  test("structs are value types", () => {
    const ctx = makeContext();
    expect(isValueType(ctx.types.getStructType(ctx.intern("S"), []))).toBe(true);
  });
});

describe("classes", () => {
  test("instances flatten base fields first", () => {
    const { ctx, circle } = shapes();
    expect(circle.flattenedFields.map((f) => f.name.text)).toEqual(["id", "radius"]);
    expect(circle.flattenedOffsets).toEqual([0, 8]);
    expect(circle.instanceSize).toBe(16);
    expect(circle.instanceAlignment).toBe(8);
    expect(flattenedFieldIndex(circle, ctx.intern("radius"))).toBe(1);
    expect(flattenedFieldOffset(circle, ctx.intern("radius"))).toBe(8);
    expect(flattenedFieldOffset(circle, ctx.intern("area"))).toBe(-1);
  });

  test("the class value itself is pointer-sized", () => {
    const { circle } = shapes();
    expect(circle.size).toBe(8);
    expect(circle.alignment).toBe(8);
    expect(isValueType(circle)).toBe(false);
  });

  test("field lookup sees inherited fields", () => {
    const { ctx, circle } = shapes();
    expect(fieldIndex(circle, ctx.intern("id"))).toBe(-1);
    expect(fieldType(circle, ctx.intern("id"))).toBe(I32_TYPE);
    expect(hasField(circle, ctx.intern("radius"))).toBe(true);
  });

  test("inheritance is transitive and proper", () => {
    const { base, circle, unit } = shapes();
    expect(isDerivedFrom(circle, base)).toBe(true);
    expect(isDerivedFrom(unit, base)).toBe(true);
    expect(isDerivedFrom(base, circle)).toBe(false);
    expect(isDerivedFrom(base, base)).toBe(false);
  });

  test("methods are found through the base chain", () => {
    const { ctx, draw, base, unit } = shapes();
    const found = findMethod(unit, ctx.intern("draw"));
    expect(found?.signature).toBe(draw);
    expect(found?.declaration).toBeNull();
    expect(found).toBe(findMethod(base, ctx.intern("draw")));
    expect(hasMethod(unit, ctx.intern("erase"))).toBe(false);
  });

  test("methods can be matched by signature", () => {
    const { ctx, base } = shapes();
    const other = ctx.types.getFunctionType([I32_TYPE], VOID_TYPE);
    expect(findMethod(base, ctx.intern("draw"), other)).toBeNull();
  });

  test("classes with different bases are distinct", () => {
    const { ctx, base } = shapes();
    const a = ctx.types.getClassType(ctx.intern("Leaf"), [], base);
    const b = ctx.types.getClassType(ctx.intern("Leaf"), [], null);
    expect(a).not.toBe(b);
    expect(ctx.types.getClassType(ctx.intern("Leaf"), [], base)).toBe(a);
  });
});

describe("downcasts", () => {
  test("asType narrows or returns null", () => {
    const { circle } = shapes();
    expect(asType(circle, TypeKind.Class)?.name.text).toBe("Circle");
    expect(asType(circle, TypeKind.Struct)).toBeNull();
    expect(asType(null, TypeKind.Class)).toBeNull();
    expect(isRecordType(circle)).toBe(true);
    expect(isRecordType(I32_TYPE)).toBe(false);
  });
});

describe("typeToString", () => {
  test("spells composite types", () => {
    const { ctx, circle } = shapes();
    const types = ctx.types;
    expect(typeToString(types.getArrayType(I32_TYPE, 3))).toBe("[3]i32");
    expect(typeToString(types.getArrayType(I32_TYPE))).toBe("[]i32");
    expect(typeToString(types.getTupleType([I32_TYPE, BOOL_TYPE]) ?? VOID_TYPE)).toBe("(i32, bool)");
    expect(typeToString(types.getUnionType([I32_TYPE, F64_TYPE]) ?? VOID_TYPE)).toBe("i32 | f64");
    expect(typeToString(types.getPointerType(I32_TYPE) ?? VOID_TYPE)).toBe("*i32");
    expect(typeToString(types.getReferenceType(U8_TYPE) ?? VOID_TYPE)).toBe("&u8");
    const pred = types.getFunctionType([I32_TYPE], BOOL_TYPE);
    expect(typeToString(pred)).toBe("(i32) -> bool");
    expect(typeToString(types.getFunctionType([], pred))).toBe("() -> ((i32) -> bool)");
    expect(typeToString(circle)).toBe("class Circle : Shape { radius: f64 }");
  });

  test("named records nested in fields print by name", () => {
    const ctx = makeContext();
    const inner = ctx.types.getStructType(ctx.intern("Inner"), fields(ctx, ["v", I32_TYPE]));
    const outer = ctx.types.getStructType(ctx.intern("Outer"), fields(ctx, ["inner", inner]));
    expect(typeToString(outer)).toBe("Outer { inner: Inner }");
    expect(typeToString(ctx.types.getStructType(ctx.intern("Empty"), []))).toBe("Empty {}");
  });
});
