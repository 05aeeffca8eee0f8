// ─── Type Guards ─────────────────────────────────────────────────────────────

import { NodeFlags } from "../ast/flags.ts";
import type { InternedString } from "../strings/interner.ts";
import type {
  ArrayType,
  ClassType,
  CompositeType,
  FloatType,
  FunctionType,
  IntegerType,
  MethodInfo,
  PointerType,
  PrimitiveType,
  RecordType,
  ReferenceType,
  StructType,
  TupleType,
  Type,
  UnionType,
} from "./definitions.ts";
import { TypeKind, type TypeKindValue } from "./kinds.ts";

export type TypeOf<K extends TypeKindValue> = Extract<Type, { kind: K }>;

export function isTypeKind<K extends TypeKindValue>(t: Type, kind: K): t is TypeOf<K> {
  return t.kind === kind;
}

/** Narrow `t` to `kind`, or `null` when it is some other kind. */
export function asType<K extends TypeKindValue>(t: Type | null, kind: K): TypeOf<K> | null {
  return t && isTypeKind(t, kind) ? t : null;
}

export function isIntegerType(t: Type): t is IntegerType {
  return t.kind === TypeKind.Integer;
}

export function isFloatType(t: Type): t is FloatType {
  return t.kind === TypeKind.Float;
}

export function isNumericType(t: Type): t is IntegerType | FloatType {
  return t.kind === TypeKind.Integer || t.kind === TypeKind.Float;
}

export function isArrayType(t: Type): t is ArrayType {
  return t.kind === TypeKind.Array;
}

export function isTupleType(t: Type): t is TupleType {
  return t.kind === TypeKind.Tuple;
}

export function isUnionType(t: Type): t is UnionType {
  return t.kind === TypeKind.Union;
}

export function isFunctionType(t: Type): t is FunctionType {
  return t.kind === TypeKind.Function;
}

export function isPointerType(t: Type): t is PointerType {
  return t.kind === TypeKind.Pointer;
}

export function isReferenceType(t: Type): t is ReferenceType {
  return t.kind === TypeKind.Reference;
}

export function isStructType(t: Type): t is StructType {
  return t.kind === TypeKind.Struct;
}

export function isClassType(t: Type): t is ClassType {
  return t.kind === TypeKind.Class;
}

export function isRecordType(t: Type): t is RecordType {
  return t.kind === TypeKind.Struct || t.kind === TypeKind.Class;
}

export function isPrimitiveType(t: Type): t is PrimitiveType {
  switch (t.kind) {
    case TypeKind.Integer:
    case TypeKind.Float:
    case TypeKind.Bool:
    case TypeKind.Char:
    case TypeKind.Void:
    case TypeKind.Auto:
      return true;
    default:
      return false;
  }
}

export function isCompositeType(t: Type): t is CompositeType {
  return !isPrimitiveType(t);
}

export function isCallableType(t: Type): t is FunctionType {
  return t.kind === TypeKind.Function;
}

/** Classes are the only reference-semantics types. */
export function isValueType(t: Type): boolean {
  return t.kind !== TypeKind.Class;
}

export function isDynamicArray(t: ArrayType): boolean {
  return t.length === 0;
}

export function isPackedStruct(t: StructType): boolean {
  return (t.flags & NodeFlags.Packed) !== 0;
}

export function isAnonymousRecord(t: RecordType): boolean {
  return t.name.isEmpty;
}

/** `true` when `derived` inherits from `base`, directly or transitively. */
export function isDerivedFrom(derived: ClassType, base: ClassType): boolean {
  for (let current = derived.base; current; current = current.base) {
    if (current === base) return true;
  }
  return false;
}

// ─── Record Lookup ──────────────────────────────────────────────────────────

/** Local field index, or -1. For classes this ignores inherited fields. */
export function fieldIndex(t: RecordType, name: InternedString): number {
  return t.fields.findIndex((f) => f.name === name);
}

export function flattenedFieldIndex(t: ClassType, name: InternedString): number {
  return t.flattenedFields.findIndex((f) => f.name === name);
}

/** Field type by name; classes also search their base chain. */
export function fieldType(t: RecordType, name: InternedString): Type | null {
  const fields = t.kind === TypeKind.Class ? t.flattenedFields : t.fields;
  return fields.find((f) => f.name === name)?.type ?? null;
}

export function hasField(t: RecordType, name: InternedString): boolean {
  return fieldType(t, name) !== null;
}

/** Byte offset of a struct field by index or name, or -1 when absent. */
export function fieldOffset(t: StructType, field: number | InternedString): number {
  const index = typeof field === "number" ? field : fieldIndex(t, field);
  return t.offsets[index] ?? -1;
}

/** Byte offset in the flattened instance layout of a class, or -1. */
export function flattenedFieldOffset(t: ClassType, field: number | InternedString): number {
  const index = typeof field === "number" ? field : flattenedFieldIndex(t, field);
  return t.flattenedOffsets[index] ?? -1;
}

export function hasMethod(t: RecordType, name: InternedString): boolean {
  return findMethod(t, name) !== null;
}

/**
 * Method by name, optionally matching an exact signature (overloads share a name).
 * Classes search their base chain when the class itself has no match.
 */
export function findMethod(
  t: RecordType,
  name: InternedString,
  signature?: FunctionType,
): MethodInfo | null {
  const match = t.methods.find(
    (m) => m.name === name && (signature === undefined || m.signature === signature),
  );
  if (match) return match;
  if (t.kind === TypeKind.Class && t.base) return findMethod(t.base, name, signature);
  return null;
}
