/**
 * Type relations.
 *
 * All relations are switch-over-kind functions on the target (or source)
 * type. Canonical types make `===` a valid fast path for equality; the
 * structural comparison keeps `typesEqual` meaningful across registries.
 */

import type { ClassType, StructField, Type } from "./definitions.ts";
import { isDerivedFrom } from "./guards.ts";
import { TypeKind } from "./kinds.ts";

// ─── Equality ───────────────────────────────────────────────────────────────

export function typesEqual(a: Type, b: Type): boolean {
  if (a === b) return true;
  if (a.hash !== b.hash) return false;

  switch (a.kind) {
    case TypeKind.Integer:
      return b.kind === TypeKind.Integer && a.integerKind === b.integerKind;
    case TypeKind.Float:
      return b.kind === TypeKind.Float && a.floatKind === b.floatKind;
    case TypeKind.Bool:
    case TypeKind.Char:
    case TypeKind.Void:
    case TypeKind.Auto:
      return a.kind === b.kind;
    case TypeKind.Array:
      return b.kind === TypeKind.Array && a.length === b.length && typesEqual(a.element, b.element);
    case TypeKind.Tuple:
      return b.kind === TypeKind.Tuple && sequencesEqual(a.elements, b.elements);
    case TypeKind.Union:
      return b.kind === TypeKind.Union && sequencesEqual(a.variants, b.variants);
    case TypeKind.Function:
      return (
        b.kind === TypeKind.Function &&
        a.flags === b.flags &&
        sequencesEqual(a.params, b.params) &&
        typesEqual(a.returnType, b.returnType)
      );
    case TypeKind.Pointer:
      return b.kind === TypeKind.Pointer && typesEqual(a.pointee, b.pointee);
    case TypeKind.Reference:
      return b.kind === TypeKind.Reference && typesEqual(a.referent, b.referent);
    case TypeKind.Struct:
      return (
        b.kind === TypeKind.Struct &&
        a.name === b.name &&
        a.flags === b.flags &&
        fieldsEqual(a.fields, b.fields)
      );
    case TypeKind.Class:
      return (
        b.kind === TypeKind.Class &&
        a.name === b.name &&
        a.flags === b.flags &&
        fieldsEqual(a.fields, b.fields) &&
        (a.base === null ? b.base === null : b.base !== null && typesEqual(a.base, b.base))
      );
    default:
      return false;
  }
}

/** Structural hash; equal types hash equal. */
export function typeHash(t: Type): number {
  return t.hash;
}

/** Order-sensitive element-wise equality. */
export function sequencesEqual(a: readonly Type[], b: readonly Type[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((t, i) => {
    const other = b[i];
    return other !== undefined && typesEqual(t, other);
  });
}

function fieldsEqual(a: readonly StructField[], b: readonly StructField[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((f, i) => {
    const other = b[i];
    return other !== undefined && f.name === other.name && typesEqual(f.type, other.type);
  });
}

function elementwise(
  a: readonly Type[],
  b: readonly Type[],
  relation: (x: Type, y: Type) => boolean,
): boolean {
  if (a.length !== b.length) return false;
  return a.every((t, i) => {
    const other = b[i];
    return other !== undefined && relation(t, other);
  });
}

/** `derived` is a class that inherits, directly or not, from the class `base`. Irreflexive. */
export function isSubclassOf(derived: Type, base: Type): boolean {
  return (
    derived.kind === TypeKind.Class && base.kind === TypeKind.Class && isDerivedFrom(derived, base)
  );
}

function classesRelated(a: ClassType, b: ClassType): boolean {
  return a === b || isDerivedFrom(a, b) || isDerivedFrom(b, a);
}

// ─── Assignment ─────────────────────────────────────────────────────────────

/** Whether a value of type `source` may be stored in a location of type `target`. */
export function isAssignableFrom(target: Type, source: Type): boolean {
  switch (target.kind) {
    case TypeKind.Integer:
    case TypeKind.Float:
    case TypeKind.Bool:
    case TypeKind.Char:
    case TypeKind.Function:
    case TypeKind.Struct:
      return typesEqual(target, source);
    case TypeKind.Void:
    case TypeKind.Auto:
      return false;
    case TypeKind.Array:
      return (
        source.kind === TypeKind.Array &&
        target.length === source.length &&
        isAssignableFrom(target.element, source.element)
      );
    case TypeKind.Tuple:
      return (
        source.kind === TypeKind.Tuple &&
        elementwise(target.elements, source.elements, isAssignableFrom)
      );
    case TypeKind.Union:
      // Exact variants only; no conversion into a variant.
      return typesEqual(target, source) || target.variants.some((v) => typesEqual(v, source));
    case TypeKind.Pointer:
      return (
        source.kind === TypeKind.Pointer &&
        (typesEqual(target.pointee, source.pointee) || isSubclassOf(source.pointee, target.pointee))
      );
    case TypeKind.Reference:
      return (
        source.kind === TypeKind.Reference &&
        (typesEqual(target.referent, source.referent) || isSubclassOf(source.referent, target.referent))
      );
    case TypeKind.Class:
      return typesEqual(target, source) || isSubclassOf(source, target);
    default:
      return false;
  }
}

// ─── Conversions ────────────────────────────────────────────────────────────

/** Conversions applied without a cast. Identity counts, except for `void` and `auto`. */
export function isImplicitlyConvertibleTo(from: Type, to: Type): boolean {
  if (from.kind === TypeKind.Void || from.kind === TypeKind.Auto) return false;
  if (typesEqual(from, to)) return true;

  switch (from.kind) {
    case TypeKind.Integer:
      if (to.kind === TypeKind.Integer) return from.bits < to.bits;
      return to.kind === TypeKind.Float;
    case TypeKind.Float:
      return to.kind === TypeKind.Float && from.bits < to.bits;
    case TypeKind.Bool:
      return false;
    case TypeKind.Char:
      return to.kind === TypeKind.Integer;
    case TypeKind.Array:
      return (
        to.kind === TypeKind.Array &&
        from.length !== 0 &&
        to.length === 0 &&
        typesEqual(from.element, to.element)
      );
    case TypeKind.Tuple:
      return (
        to.kind === TypeKind.Tuple &&
        elementwise(from.elements, to.elements, isImplicitlyConvertibleTo)
      );
    case TypeKind.Union:
      return (
        to.kind === TypeKind.Union &&
        from.variants.every((v) => to.variants.some((w) => isImplicitlyConvertibleTo(v, w)))
      );
    case TypeKind.Pointer:
      return to.kind === TypeKind.Pointer && isSubclassOf(from.pointee, to.pointee);
    case TypeKind.Reference:
      return to.kind === TypeKind.Reference && isSubclassOf(from.referent, to.referent);
    case TypeKind.Class:
      return isSubclassOf(from, to);
    default:
      return false;
  }
}

/** Conversions allowed with an explicit cast; includes every implicit conversion. */
export function isExplicitlyConvertibleTo(from: Type, to: Type): boolean {
  if (isImplicitlyConvertibleTo(from, to)) return true;

  switch (from.kind) {
    case TypeKind.Integer:
    case TypeKind.Float:
      return to.kind === TypeKind.Integer || to.kind === TypeKind.Float;
    case TypeKind.Bool:
    case TypeKind.Char:
      return to.kind === TypeKind.Integer;
    case TypeKind.Array:
      return to.kind === TypeKind.Array && isExplicitlyConvertibleTo(from.element, to.element);
    case TypeKind.Tuple:
      return (
        to.kind === TypeKind.Tuple &&
        elementwise(from.elements, to.elements, isExplicitlyConvertibleTo)
      );
    case TypeKind.Union:
      return (
        to.kind === TypeKind.Union &&
        from.variants.every((v) => to.variants.some((w) => isExplicitlyConvertibleTo(v, w)))
      );
    case TypeKind.Pointer:
      if (to.kind !== TypeKind.Pointer) return false;
      return pointeesConvertible(from.pointee, to.pointee);
    case TypeKind.Reference:
      if (to.kind !== TypeKind.Reference) return false;
      return pointeesConvertible(from.referent, to.referent);
    case TypeKind.Class:
      return to.kind === TypeKind.Class && classesRelated(from, to);
    default:
      return false;
  }
}

function pointeesConvertible(from: Type, to: Type): boolean {
  if (from.kind === TypeKind.Class && to.kind === TypeKind.Class) return classesRelated(from, to);
  return isExplicitlyConvertibleTo(from, to);
}

/** Loose relation: the two types can meet through some conversion. */
export function isCompatibleWith(a: Type, b: Type): boolean {
  switch (a.kind) {
    case TypeKind.Integer:
    case TypeKind.Float:
      return isImplicitlyConvertibleTo(a, b) || isExplicitlyConvertibleTo(a, b);
    case TypeKind.Char:
      return isImplicitlyConvertibleTo(a, b);
    case TypeKind.Bool:
    case TypeKind.Void:
    case TypeKind.Auto:
    case TypeKind.Function:
    case TypeKind.Struct:
      return typesEqual(a, b);
    case TypeKind.Array:
      return b.kind === TypeKind.Array && isCompatibleWith(a.element, b.element);
    case TypeKind.Tuple:
      return b.kind === TypeKind.Tuple && elementwise(a.elements, b.elements, isCompatibleWith);
    case TypeKind.Union:
      if (b.kind !== TypeKind.Union) return a.variants.some((v) => isCompatibleWith(v, b));
      return a.variants.some((v) => b.variants.some((w) => isCompatibleWith(v, w)));
    case TypeKind.Pointer:
    case TypeKind.Reference:
      return isImplicitlyConvertibleTo(a, b) || isImplicitlyConvertibleTo(b, a);
    case TypeKind.Class:
      return b.kind === TypeKind.Class && classesRelated(a, b);
    default:
      return false;
  }
}

/**
 * Argument passing rule for calls. Integers may be passed to any integer or
 * float parameter (narrowing included); everything else follows implicit conversion.
 */
export function canBeImplicitlyPassedTo(argument: Type, parameter: Type): boolean {
  if (argument.kind === TypeKind.Integer) {
    return parameter.kind === TypeKind.Integer || parameter.kind === TypeKind.Float;
  }
  return isImplicitlyConvertibleTo(argument, parameter);
}
