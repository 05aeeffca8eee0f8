/**
 * Semantic type representations.
 *
 * Types are immutable once built. Size and alignment are computed when a
 * type is created and stored on it. Composite types are only ever created
 * by a `TypeRegistry`, which hands out one object per distinct shape.
 */

import type { Flags } from "../ast/flags.ts";
import type { NodeId } from "../ast/nodes.ts";
import type { InternedString } from "../strings/interner.ts";
import type {
  FloatKindValue,
  IntegerBits,
  IntegerKindValue,
  TypeKind,
} from "./kinds.ts";

// ─── Type Definitions ───────────────────────────────────────────────────────

interface TypeBase {
  /** Unique within a registry; primitives share fixed ids. */
  readonly id: number;
  readonly hash: number;
  readonly flags: Flags;
  /** Size in bytes (pointer size for reference-semantics types). */
  readonly size: number;
  readonly alignment: number;
}

/** Fixed-width integer (signed or unsigned, 8 to 128 bits). */
export interface IntegerType extends TypeBase {
  readonly kind: typeof TypeKind.Integer;
  readonly integerKind: IntegerKindValue;
  readonly bits: IntegerBits;
  readonly signed: boolean;
}

/** IEEE 754 floating-point type. */
export interface FloatType extends TypeBase {
  readonly kind: typeof TypeKind.Float;
  readonly floatKind: FloatKindValue;
  readonly bits: 32 | 64;
}

export interface BoolType extends TypeBase {
  readonly kind: typeof TypeKind.Bool;
}

/** Unicode scalar value (32-bit). */
export interface CharType extends TypeBase {
  readonly kind: typeof TypeKind.Char;
}

export interface VoidType extends TypeBase {
  readonly kind: typeof TypeKind.Void;
}

/** Placeholder for a type still to be inferred. */
export interface AutoType extends TypeBase {
  readonly kind: typeof TypeKind.Auto;
}

/** `[N]T`; `length` 0 means a dynamic array. */
export interface ArrayType extends TypeBase {
  readonly kind: typeof TypeKind.Array;
  readonly element: Type;
  readonly length: number;
}

export interface TupleType extends TypeBase {
  readonly kind: typeof TypeKind.Tuple;
  readonly elements: readonly Type[];
  readonly offsets: readonly number[];
}

/** Untagged union; variant order is significant. */
export interface UnionType extends TypeBase {
  readonly kind: typeof TypeKind.Union;
  readonly variants: readonly Type[];
}

export interface FunctionType extends TypeBase {
  readonly kind: typeof TypeKind.Function;
  readonly params: readonly Type[];
  readonly returnType: Type;
}

export interface PointerType extends TypeBase {
  readonly kind: typeof TypeKind.Pointer;
  readonly pointee: Type;
}

export interface ReferenceType extends TypeBase {
  readonly kind: typeof TypeKind.Reference;
  readonly referent: Type;
}

export interface StructField {
  readonly name: InternedString;
  readonly type: Type;
}

export interface MethodInfo {
  readonly name: InternedString;
  readonly signature: FunctionType;
  readonly declaration: NodeId | null;
}

/** Value-semantics record type. An empty name marks an anonymous struct. */
export interface StructType extends TypeBase {
  readonly kind: typeof TypeKind.Struct;
  readonly name: InternedString;
  readonly fields: readonly StructField[];
  readonly offsets: readonly number[];
  readonly methods: readonly MethodInfo[];
  readonly declaration: NodeId | null;
}

/**
 * Reference-semantics record type with single inheritance.
 * `size`/`alignment` describe the reference; the instance layout flattens
 * base-class fields ahead of the class's own.
 */
export interface ClassType extends TypeBase {
  readonly kind: typeof TypeKind.Class;
  readonly name: InternedString;
  readonly fields: readonly StructField[];
  readonly methods: readonly MethodInfo[];
  readonly base: ClassType | null;
  readonly flattenedFields: readonly StructField[];
  readonly flattenedOffsets: readonly number[];
  readonly instanceSize: number;
  readonly instanceAlignment: number;
  readonly declaration: NodeId | null;
}

export type PrimitiveType = IntegerType | FloatType | BoolType | CharType | VoidType | AutoType;

export type CompositeType =
  | ArrayType
  | TupleType
  | UnionType
  | FunctionType
  | PointerType
  | ReferenceType
  | StructType
  | ClassType;

export type Type = PrimitiveType | CompositeType;

/** Record types share field and method lookup. */
export type RecordType = StructType | ClassType;
