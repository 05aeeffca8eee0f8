import { describe, expect, test } from "vitest";
import { NodeFlags } from "../../src/ast/flags.ts";
import { FloatKind, IntegerKind, TypeKind } from "../../src/types/kinds.ts";
import {
  BOOL_TYPE,
  F32_TYPE,
  F64_TYPE,
  FIRST_COMPOSITE_ID,
  I32_TYPE,
  I64_TYPE,
  U8_TYPE,
} from "../../src/types/primitives.ts";
import { TypeRegistry } from "../../src/types/registry.ts";
import { typesEqual } from "../../src/types/relations.ts";

describe("TypeRegistry", () => {
  describe("primitives", () => {
    test("accessors return the shared singletons", () => {
      const types = new TypeRegistry();
      expect(types.integerType(IntegerKind.I32)).toBe(I32_TYPE);
      expect(types.integerType()).toBe(I32_TYPE);
      expect(types.floatType(FloatKind.F32)).toBe(F32_TYPE);
      expect(types.floatType()).toBe(F64_TYPE);
      expect(types.boolType()).toBe(BOOL_TYPE);
      expect(types.charType().kind).toBe(TypeKind.Char);
      expect(types.voidType().kind).toBe(TypeKind.Void);
      expect(types.autoType().kind).toBe(TypeKind.Auto);
      expect(types.typeCount).toBe(0);
    });

    test("are shared across registries", () => {
      expect(new TypeRegistry().boolType()).toBe(new TypeRegistry().boolType());
    });
  });

  describe("canonicalization", () => {
    test("the same tuple shape returns the same object", () => {
      const types = new TypeRegistry();
      const a = types.getTupleType([I32_TYPE, F64_TYPE]);
      const b = types.getTupleType([I32_TYPE, F64_TYPE]);
      expect(a).toBe(b);
      expect(a?.hash).toBe(b?.hash);
      expect(types.typeCount).toBe(1);
    });

    test("reordered components give a distinct type", () => {
      const types = new TypeRegistry();
      const a = types.getTupleType([I32_TYPE, F64_TYPE]);
      const b = types.getTupleType([F64_TYPE, I32_TYPE]);
      expect(a).not.toBe(b);
      expect(a && b && typesEqual(a, b)).toBe(false);
    });

    test("union variant order is significant", () => {
      const types = new TypeRegistry();
      const a = types.getUnionType([I32_TYPE, BOOL_TYPE]);
      const b = types.getUnionType([BOOL_TYPE, I32_TYPE]);
      expect(a).not.toBe(b);
      expect(types.getUnionType([I32_TYPE, BOOL_TYPE])).toBe(a);
    });

    test("arrays are keyed by element and length", () => {
      const types = new TypeRegistry();
      expect(types.getArrayType(I32_TYPE, 4)).toBe(types.getArrayType(I32_TYPE, 4));
      expect(types.getArrayType(I32_TYPE, 4)).not.toBe(types.getArrayType(I32_TYPE, 5));
      expect(types.getArrayType(I32_TYPE)).toBe(types.getArrayType(I32_TYPE, 0));
    });

    test("functions are keyed by parameters, return type and flags", () => {
      const types = new TypeRegistry();
      const f = types.getFunctionType([I32_TYPE], BOOL_TYPE);
      expect(types.getFunctionType([I32_TYPE], BOOL_TYPE)).toBe(f);
      expect(types.getFunctionType([I32_TYPE], I32_TYPE)).not.toBe(f);
      const variadic = types.getFunctionType([I32_TYPE], BOOL_TYPE, NodeFlags.Variadic);
      expect(variadic).not.toBe(f);
      expect(variadic.flags).toBe(NodeFlags.Variadic);
    });

    test("nested composites canonicalize through their components", () => {
      const types = new TypeRegistry();
      const inner = types.getArrayType(U8_TYPE, 16);
      const a = types.getTupleType([inner, I64_TYPE]);
      const b = types.getTupleType([types.getArrayType(U8_TYPE, 16), I64_TYPE]);
      expect(a).toBe(b);
    });

    test("composite ids start after the primitive range and are unique", () => {
      const types = new TypeRegistry();
      const a = types.getArrayType(I32_TYPE, 2);
      const b = types.getArrayType(I32_TYPE, 3);
      expect(a.id).toBe(FIRST_COMPOSITE_ID);
      expect(b.id).toBe(FIRST_COMPOSITE_ID + 1);
    });

    test("types are frozen", () => {
      const types = new TypeRegistry();
      const t = types.getTupleType([I32_TYPE]);
      expect(Object.isFrozen(t)).toBe(true);
      expect(Object.isFrozen(t?.elements)).toBe(true);
    });

    test("structurally equal types from two registries compare equal", () => {
      const a = new TypeRegistry().getTupleType([I32_TYPE, BOOL_TYPE]);
      const b = new TypeRegistry().getTupleType([I32_TYPE, BOOL_TYPE]);
      expect(a).not.toBe(b);
      expect(a && b && typesEqual(a, b)).toBe(true);
    });

    test("clear forgets cached composites", () => {
      const types = new TypeRegistry();
      const before = types.getTupleType([I32_TYPE]);
      types.clear();
      expect(types.typeCount).toBe(0);
      expect(types.getTupleType([I32_TYPE])).not.toBe(before);
    });
  });

  describe("empty and invalid requests", () => {
    test("empty tuples and unions are null", () => {
      const types = new TypeRegistry();
      expect(types.getTupleType([])).toBeNull();
      expect(types.getUnionType([])).toBeNull();
    });

    test("invalid array lengths throw", () => {
      const types = new TypeRegistry();
      expect(() => types.getArrayType(I32_TYPE, -1)).toThrow("invalid array length: -1");
      expect(() => types.getArrayType(I32_TYPE, 1.5)).toThrow("invalid array length: 1.5");
    });

    test("unsupported pointer sizes throw", () => {
      expect(() => new TypeRegistry({ pointerSize: 2 })).toThrow("unsupported pointer size: 2");
    });
  });

  describe("pointers and references", () => {
    test("pointers are canonical and pointer-sized", () => {
      const types = new TypeRegistry();
      const p = types.getPointerType(I32_TYPE);
      expect(types.getPointerType(I32_TYPE)).toBe(p);
      expect(p?.size).toBe(8);
      expect(p?.pointee).toBe(I32_TYPE);
    });

    test("a pointer to a reference points at the referent", () => {
      const types = new TypeRegistry();
      const ref = types.getReferenceType(I32_TYPE);
      const refRef = types.getReferenceType(ref);
      expect(types.getPointerType(ref)).toBe(types.getPointerType(I32_TYPE));
      expect(types.getPointerType(refRef)?.pointee).toBe(I32_TYPE);
    });

    test("references to pointers are rejected", () => {
      const types = new TypeRegistry();
      expect(types.getReferenceType(types.getPointerType(I32_TYPE))).toBeNull();
      expect(types.getReferenceType(null)).toBeNull();
      expect(types.getPointerType(null)).toBeNull();
    });

    test("references may nest", () => {
      const types = new TypeRegistry();
      const ref = types.getReferenceType(I32_TYPE);
      const refRef = types.getReferenceType(ref);
      expect(refRef?.referent).toBe(ref);
    });
  });
});
