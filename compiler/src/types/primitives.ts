// ─── Primitive Types ────────────────────────────────────────────────────────
//
// Primitives are immutable singletons shared by every registry. Ids below
// `FIRST_COMPOSITE_ID` are reserved for them.

import { NodeFlags } from "../ast/flags.ts";
import type {
  AutoType,
  BoolType,
  CharType,
  FloatType,
  IntegerType,
  VoidType,
} from "./definitions.ts";
import { hashText } from "./hash.ts";
import {
  FloatKind,
  type FloatKindValue,
  type IntegerBits,
  IntegerKind,
  type IntegerKindValue,
  TypeKind,
} from "./kinds.ts";

export const FIRST_COMPOSITE_ID = 64;

let nextPrimitiveId = 0;

function intType(integerKind: IntegerKindValue, bits: IntegerBits, signed: boolean): IntegerType {
  const size = bits / 8;
  return Object.freeze({
    kind: TypeKind.Integer,
    id: nextPrimitiveId++,
    hash: hashText(integerKind),
    flags: NodeFlags.None,
    size,
    alignment: size,
    integerKind,
    bits,
    signed,
  });
}

function floatType(floatKind: FloatKindValue, bits: 32 | 64): FloatType {
  return Object.freeze({
    kind: TypeKind.Float,
    id: nextPrimitiveId++,
    hash: hashText(floatKind),
    flags: NodeFlags.None,
    size: bits / 8,
    alignment: bits / 8,
    floatKind,
    bits,
  });
}

export const I8_TYPE = intType(IntegerKind.I8, 8, true);
export const I16_TYPE = intType(IntegerKind.I16, 16, true);
export const I32_TYPE = intType(IntegerKind.I32, 32, true);
export const I64_TYPE = intType(IntegerKind.I64, 64, true);
export const I128_TYPE = intType(IntegerKind.I128, 128, true);
export const U8_TYPE = intType(IntegerKind.U8, 8, false);
export const U16_TYPE = intType(IntegerKind.U16, 16, false);
export const U32_TYPE = intType(IntegerKind.U32, 32, false);
export const U64_TYPE = intType(IntegerKind.U64, 64, false);
export const U128_TYPE = intType(IntegerKind.U128, 128, false);

export const F32_TYPE = floatType(FloatKind.F32, 32);
export const F64_TYPE = floatType(FloatKind.F64, 64);

export const BOOL_TYPE: BoolType = Object.freeze({
  kind: TypeKind.Bool,
  id: nextPrimitiveId++,
  hash: hashText(TypeKind.Bool),
  flags: NodeFlags.None,
  size: 1,
  alignment: 1,
});

export const CHAR_TYPE: CharType = Object.freeze({
  kind: TypeKind.Char,
  id: nextPrimitiveId++,
  hash: hashText(TypeKind.Char),
  flags: NodeFlags.None,
  size: 4,
  alignment: 4,
});

export const VOID_TYPE: VoidType = Object.freeze({
  kind: TypeKind.Void,
  id: nextPrimitiveId++,
  hash: hashText(TypeKind.Void),
  flags: NodeFlags.None,
  size: 0,
  alignment: 1,
});

export const AUTO_TYPE: AutoType = Object.freeze({
  kind: TypeKind.Auto,
  id: nextPrimitiveId++,
  hash: hashText(TypeKind.Auto),
  flags: NodeFlags.None,
  size: 0,
  alignment: 1,
});

const INTEGER_TYPES: Readonly<Record<IntegerKindValue, IntegerType>> = {
  [IntegerKind.I8]: I8_TYPE,
  [IntegerKind.I16]: I16_TYPE,
  [IntegerKind.I32]: I32_TYPE,
  [IntegerKind.I64]: I64_TYPE,
  [IntegerKind.I128]: I128_TYPE,
  [IntegerKind.U8]: U8_TYPE,
  [IntegerKind.U16]: U16_TYPE,
  [IntegerKind.U32]: U32_TYPE,
  [IntegerKind.U64]: U64_TYPE,
  [IntegerKind.U128]: U128_TYPE,
};

const FLOAT_TYPES: Readonly<Record<FloatKindValue, FloatType>> = {
  [FloatKind.F32]: F32_TYPE,
  [FloatKind.F64]: F64_TYPE,
};

export function integerTypeOf(kind: IntegerKindValue): IntegerType {
  return INTEGER_TYPES[kind];
}

export function floatTypeOf(kind: FloatKindValue): FloatType {
  return FLOAT_TYPES[kind];
}

/** Every integer type, signed before unsigned, narrowest first. */
export const ALL_INTEGER_TYPES: readonly IntegerType[] = Object.values(INTEGER_TYPES);
