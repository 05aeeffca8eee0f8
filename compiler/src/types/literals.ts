// ─── Literal Typing ─────────────────────────────────────────────────────────

import type { FloatType, IntegerType, Type } from "./definitions.ts";
import { TypeKind } from "./kinds.ts";
import {
  F32_TYPE,
  F64_TYPE,
  I128_TYPE,
  I16_TYPE,
  I32_TYPE,
  I64_TYPE,
  I8_TYPE,
  U128_TYPE,
  U16_TYPE,
  U32_TYPE,
  U64_TYPE,
  U8_TYPE,
} from "./primitives.ts";

const SIGNED_LADDER: readonly IntegerType[] = [I8_TYPE, I16_TYPE, I32_TYPE, I64_TYPE, I128_TYPE];
const UNSIGNED_LADDER: readonly IntegerType[] = [U8_TYPE, U16_TYPE, U32_TYPE, U64_TYPE, U128_TYPE];

export interface IntegerRange {
  min: bigint;
  max: bigint;
}

export function integerRange(t: IntegerType): IntegerRange {
  const bits = BigInt(t.bits);
  if (t.signed) {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
}

export function integerFitsIn(value: bigint, t: IntegerType): boolean {
  const { min, max } = integerRange(t);
  return value >= min && value <= max;
}

/**
 * Narrowest integer type holding `value`. Values past the widest type of the
 * requested signedness still get the widest type.
 */
export function findBestIntegerType(value: bigint, signed: boolean): IntegerType {
  const ladder = signed ? SIGNED_LADDER : UNSIGNED_LADDER;
  return ladder.find((t) => integerFitsIn(value, t)) ?? (signed ? I128_TYPE : U128_TYPE);
}

/** `true` when `value` survives a round trip through single precision. */
export function floatFitsInF32(value: number): boolean {
  return Math.fround(value) === value;
}

export function findBestFloatType(value: number): FloatType {
  return floatFitsInF32(value) ? F32_TYPE : F64_TYPE;
}

/**
 * Common operand type for an arithmetic binary operation, or `null` when the
 * operands are not both numeric. Wider wins; at equal width signed wins; an
 * integer meeting a float becomes the float.
 */
export function promoteForBinaryOperation(left: Type, right: Type): Type | null {
  if (left.kind === TypeKind.Integer && right.kind === TypeKind.Integer) {
    if (left.bits !== right.bits) return left.bits > right.bits ? left : right;
    if (left.signed !== right.signed) return left.signed ? left : right;
    return left;
  }
  if (left.kind === TypeKind.Float && right.kind === TypeKind.Float) {
    return left.bits > right.bits ? left : right;
  }
  if (left.kind === TypeKind.Integer && right.kind === TypeKind.Float) return right;
  if (left.kind === TypeKind.Float && right.kind === TypeKind.Integer) return left;
  return null;
}
