import { describe, expect, test } from "vitest";
import {
  isCallableType,
  isCompositeType,
  isFloatType,
  isIntegerType,
  isNumericType,
  isPrimitiveType,
} from "../../src/types/guards.ts";
import { hashAll, hashCombine, hashText } from "../../src/types/hash.ts";
import { FloatKind, IntegerKind } from "../../src/types/kinds.ts";
import {
  ALL_INTEGER_TYPES,
  AUTO_TYPE,
  BOOL_TYPE,
  CHAR_TYPE,
  F32_TYPE,
  F64_TYPE,
  FIRST_COMPOSITE_ID,
  floatTypeOf,
  I128_TYPE,
  I32_TYPE,
  integerTypeOf,
  U16_TYPE,
  VOID_TYPE,
} from "../../src/types/primitives.ts";
import { TypeRegistry } from "../../src/types/registry.ts";

describe("primitive types", () => {
  test("integer sizes follow their width", () => {
    expect([I32_TYPE.size, I32_TYPE.alignment, I32_TYPE.bits]).toEqual([4, 4, 32]);
    expect([I128_TYPE.size, I128_TYPE.alignment]).toEqual([16, 16]);
    expect(U16_TYPE.signed).toBe(false);
    expect(I32_TYPE.signed).toBe(true);
  });

  test("other primitive sizes", () => {
    expect([F32_TYPE.size, F64_TYPE.size]).toEqual([4, 8]);
    expect([BOOL_TYPE.size, BOOL_TYPE.alignment]).toEqual([1, 1]);
    expect([CHAR_TYPE.size, CHAR_TYPE.alignment]).toEqual([4, 4]);
    expect([VOID_TYPE.size, AUTO_TYPE.size]).toEqual([0, 0]);
  });

  test("lookup by kind returns the singleton", () => {
    expect(integerTypeOf(IntegerKind.I32)).toBe(I32_TYPE);
    expect(floatTypeOf(FloatKind.F64)).toBe(F64_TYPE);
    expect(ALL_INTEGER_TYPES.length).toBe(10);
  });

  test("ids are unique and below the composite range", () => {
    const all = [...ALL_INTEGER_TYPES, F32_TYPE, F64_TYPE, BOOL_TYPE, CHAR_TYPE, VOID_TYPE, AUTO_TYPE];
    const ids = new Set(all.map((t) => t.id));
    expect(ids.size).toBe(all.length);
    expect(Math.max(...ids)).toBeLessThan(FIRST_COMPOSITE_ID);
  });

  test("are frozen", () => {
    expect(Object.isFrozen(I32_TYPE)).toBe(true);
    expect(Object.isFrozen(BOOL_TYPE)).toBe(true);
  });

  test("category guards", () => {
    const fn = new TypeRegistry().getFunctionType([], VOID_TYPE);
    expect(isIntegerType(I32_TYPE)).toBe(true);
    expect(isFloatType(I32_TYPE)).toBe(false);
    expect(isNumericType(F32_TYPE)).toBe(true);
    expect(isNumericType(BOOL_TYPE)).toBe(false);
    expect(isPrimitiveType(CHAR_TYPE)).toBe(true);
    expect(isCompositeType(CHAR_TYPE)).toBe(false);
    expect(isCompositeType(fn)).toBe(true);
    expect(isCallableType(fn)).toBe(true);
  });
});

describe("hashing", () => {
  test("hashText is stable and distinguishes names", () => {
    expect(hashText("i32")).toBe(I32_TYPE.hash);
    expect(hashText("i32")).not.toBe(hashText("i64"));
  });

  test("hashCombine is order-sensitive", () => {
    const seed = hashText("tuple");
    expect(hashAll(seed, [1, 2])).not.toBe(hashAll(seed, [2, 1]));
    expect(hashAll(seed, [1, 2])).toBe(hashCombine(hashCombine(seed, 1), 2));
    expect(hashAll(seed, [])).toBe(seed);
  });
});
