/**
 * Canonicalizing type constructor.
 *
 * The registry is the only place composite types are built. Each request
 * is keyed by its kind and the ids of its components, in order, so asking
 * twice for the same shape returns the same object and `===` is type
 * identity. Primitive types are shared singletons and never cached here.
 */

import { type Flags, NodeFlags } from "../ast/flags.ts";
import type { NodeId } from "../ast/nodes.ts";
import type { InternedString } from "../strings/interner.ts";
import type {
  ArrayType,
  AutoType,
  BoolType,
  CharType,
  ClassType,
  FloatType,
  FunctionType,
  IntegerType,
  MethodInfo,
  PointerType,
  ReferenceType,
  StructField,
  StructType,
  TupleType,
  Type,
  UnionType,
  VoidType,
} from "./definitions.ts";
import { hashAll, hashText } from "./hash.ts";
import { FloatKind, type FloatKindValue, IntegerKind, type IntegerKindValue, TypeKind } from "./kinds.ts";
import { layoutArray, layoutRecord, layoutStruct, layoutUnion } from "./layout.ts";
import {
  AUTO_TYPE,
  BOOL_TYPE,
  CHAR_TYPE,
  FIRST_COMPOSITE_ID,
  floatTypeOf,
  integerTypeOf,
  VOID_TYPE,
} from "./primitives.ts";

export const DEFAULT_POINTER_SIZE = 8;

export interface TypeRegistryOptions {
  pointerSize?: number;
}

export interface MethodSpec {
  name: InternedString;
  signature: FunctionType;
  declaration?: NodeId | null;
}

export interface RecordOptions {
  methods?: readonly MethodSpec[];
  flags?: Flags;
  /** Declaring node; kept from the first request for a given shape. */
  declaration?: NodeId | null;
}

const SEED = {
  array: hashText(TypeKind.Array),
  tuple: hashText(TypeKind.Tuple),
  union: hashText(TypeKind.Union),
  function: hashText(TypeKind.Function),
  pointer: hashText(TypeKind.Pointer),
  reference: hashText(TypeKind.Reference),
  struct: hashText(TypeKind.Struct),
  class: hashText(TypeKind.Class),
};

function ids(types: readonly Type[]): string {
  return types.map((t) => t.id).join(",");
}

function fieldKey(fields: readonly StructField[]): string {
  return fields.map((f) => `${f.name.id}=${f.type.id}`).join(",");
}

function fieldHashes(fields: readonly StructField[]): number[] {
  return fields.flatMap((f) => [f.name.hash, f.type.hash]);
}

function toMethods(specs: readonly MethodSpec[] | undefined): readonly MethodInfo[] {
  return Object.freeze(
    (specs ?? []).map((m) => ({
      name: m.name,
      signature: m.signature,
      declaration: m.declaration ?? null,
    })),
  );
}

export class TypeRegistry {
  readonly pointerSize: number;
  private nextId = FIRST_COMPOSITE_ID;
  private readonly arrays = new Map<string, ArrayType>();
  private readonly tuples = new Map<string, TupleType>();
  private readonly unions = new Map<string, UnionType>();
  private readonly functions = new Map<string, FunctionType>();
  private readonly pointers = new Map<number, PointerType>();
  private readonly references = new Map<number, ReferenceType>();
  private readonly structs = new Map<string, StructType>();
  private readonly classes = new Map<string, ClassType>();

  constructor(options: TypeRegistryOptions = {}) {
    const pointerSize = options.pointerSize ?? DEFAULT_POINTER_SIZE;
    if (pointerSize !== 4 && pointerSize !== 8) {
      throw new Error(`unsupported pointer size: ${pointerSize}`);
    }
    this.pointerSize = pointerSize;
  }

  // ─── Primitives ───────────────────────────────────────────────────────────

  integerType(kind: IntegerKindValue = IntegerKind.I32): IntegerType {
    return integerTypeOf(kind);
  }

  floatType(kind: FloatKindValue = FloatKind.F64): FloatType {
    return floatTypeOf(kind);
  }

  boolType(): BoolType {
    return BOOL_TYPE;
  }

  charType(): CharType {
    return CHAR_TYPE;
  }

  voidType(): VoidType {
    return VOID_TYPE;
  }

  autoType(): AutoType {
    return AUTO_TYPE;
  }

  // ─── Composites ───────────────────────────────────────────────────────────

  /** `[length]element`, or `[]element` when `length` is 0. */
  getArrayType(element: Type, length = 0): ArrayType {
    if (!Number.isInteger(length) || length < 0) {
      throw new Error(`invalid array length: ${length}`);
    }
    const key = `${element.id}:${length}`;
    const cached = this.arrays.get(key);
    if (cached) return cached;

    const { size, alignment } = layoutArray(element, length, this.pointerSize);
    const type: ArrayType = Object.freeze({
      kind: TypeKind.Array,
      id: this.nextId++,
      hash: hashAll(SEED.array, [element.hash, length]),
      flags: NodeFlags.None,
      size,
      alignment,
      element,
      length,
    });
    this.arrays.set(key, type);
    return type;
  }

  /** Tuple of at least one element; `null` for an empty list. */
  getTupleType(elements: readonly Type[]): TupleType | null {
    if (elements.length === 0) return null;
    const key = ids(elements);
    const cached = this.tuples.get(key);
    if (cached) return cached;

    const layout = layoutRecord(elements);
    const type: TupleType = Object.freeze({
      kind: TypeKind.Tuple,
      id: this.nextId++,
      hash: hashAll(SEED.tuple, elements.map((t) => t.hash)),
      flags: NodeFlags.None,
      size: layout.size,
      alignment: layout.alignment,
      elements: Object.freeze([...elements]),
      offsets: Object.freeze(layout.offsets),
    });
    this.tuples.set(key, type);
    return type;
  }

  /** Union of at least one variant, in the given order; `null` for an empty list. */
  getUnionType(variants: readonly Type[]): UnionType | null {
    if (variants.length === 0) return null;
    const key = ids(variants);
    const cached = this.unions.get(key);
    if (cached) return cached;

    const { size, alignment } = layoutUnion(variants);
    const type: UnionType = Object.freeze({
      kind: TypeKind.Union,
      id: this.nextId++,
      hash: hashAll(SEED.union, variants.map((t) => t.hash)),
      flags: NodeFlags.None,
      size,
      alignment,
      variants: Object.freeze([...variants]),
    });
    this.unions.set(key, type);
    return type;
  }

  getFunctionType(
    params: readonly Type[],
    returnType: Type,
    flags: Flags = NodeFlags.None,
  ): FunctionType {
    const key = `${flags}|${ids(params)}|${returnType.id}`;
    const cached = this.functions.get(key);
    if (cached) return cached;

    const type: FunctionType = Object.freeze({
      kind: TypeKind.Function,
      id: this.nextId++,
      hash: hashAll(SEED.function, [...params.map((t) => t.hash), returnType.hash, flags]),
      flags,
      size: this.pointerSize,
      alignment: this.pointerSize,
      params: Object.freeze([...params]),
      returnType,
    });
    this.functions.set(key, type);
    return type;
  }

  /**
   * `*pointee`. A pointer to a reference points at the referent instead
   * (`*&T` is `*T`). Returns `null` without a pointee.
   */
  getPointerType(pointee: Type | null): PointerType | null {
    if (!pointee) return null;
    let target = pointee;
    while (target.kind === TypeKind.Reference) {
      target = target.referent;
    }
    const cached = this.pointers.get(target.id);
    if (cached) return cached;

    const type: PointerType = Object.freeze({
      kind: TypeKind.Pointer,
      id: this.nextId++,
      hash: hashAll(SEED.pointer, [target.hash]),
      flags: NodeFlags.None,
      size: this.pointerSize,
      alignment: this.pointerSize,
      pointee: target,
    });
    this.pointers.set(target.id, type);
    return type;
  }

  /** `&referent`. References to pointers are not allowed and yield `null`. */
  getReferenceType(referent: Type | null): ReferenceType | null {
    if (!referent || referent.kind === TypeKind.Pointer) return null;
    const cached = this.references.get(referent.id);
    if (cached) return cached;

    const type: ReferenceType = Object.freeze({
      kind: TypeKind.Reference,
      id: this.nextId++,
      hash: hashAll(SEED.reference, [referent.hash]),
      flags: NodeFlags.None,
      size: this.pointerSize,
      alignment: this.pointerSize,
      referent,
    });
    this.references.set(referent.id, type);
    return type;
  }

  /** Struct keyed by name, fields and flags. An empty name makes it anonymous. */
  getStructType(
    name: InternedString,
    fields: readonly StructField[],
    options: RecordOptions = {},
  ): StructType {
    const flags = options.flags ?? NodeFlags.None;
    const key = `${name.id}|${flags}|${fieldKey(fields)}`;
    const cached = this.structs.get(key);
    if (cached) return cached;

    const packed = (flags & NodeFlags.Packed) !== 0;
    const layout = layoutStruct(
      fields.map((f) => f.type),
      packed,
    );
    const type: StructType = Object.freeze({
      kind: TypeKind.Struct,
      id: this.nextId++,
      hash: hashAll(SEED.struct, [name.hash, flags, ...fieldHashes(fields)]),
      flags,
      size: layout.size,
      alignment: layout.alignment,
      name,
      fields: Object.freeze(fields.map((f) => Object.freeze({ name: f.name, type: f.type }))),
      offsets: Object.freeze(layout.offsets),
      methods: toMethods(options.methods),
      declaration: options.declaration ?? null,
    });
    this.structs.set(key, type);
    return type;
  }

  /** Class keyed by name, own fields, base class and flags. */
  getClassType(
    name: InternedString,
    fields: readonly StructField[],
    base: ClassType | null,
    options: RecordOptions = {},
  ): ClassType {
    const flags = options.flags ?? NodeFlags.None;
    const key = `${name.id}|${flags}|${base?.id ?? "-"}|${fieldKey(fields)}`;
    const cached = this.classes.get(key);
    if (cached) return cached;

    const own = fields.map((f) => Object.freeze({ name: f.name, type: f.type }));
    const flattened = [...(base?.flattenedFields ?? []), ...own];
    const instance = layoutStruct(
      flattened.map((f) => f.type),
      (flags & NodeFlags.Packed) !== 0,
    );
    const type: ClassType = Object.freeze({
      kind: TypeKind.Class,
      id: this.nextId++,
      hash: hashAll(SEED.class, [name.hash, flags, base?.hash ?? 0, ...fieldHashes(fields)]),
      flags,
      size: this.pointerSize,
      alignment: this.pointerSize,
      name,
      fields: Object.freeze(own),
      methods: toMethods(options.methods),
      base,
      flattenedFields: Object.freeze(flattened),
      flattenedOffsets: Object.freeze(instance.offsets),
      instanceSize: instance.size,
      instanceAlignment: instance.alignment,
      declaration: options.declaration ?? null,
    });
    this.classes.set(key, type);
    return type;
  }

  /** Number of composite types created so far. */
  get typeCount(): number {
    return (
      this.arrays.size +
      this.tuples.size +
      this.unions.size +
      this.functions.size +
      this.pointers.size +
      this.references.size +
      this.structs.size +
      this.classes.size
    );
  }

  /** Drop every cached composite. Types handed out earlier stay valid but are no longer canonical. */
  clear(): void {
    this.arrays.clear();
    this.tuples.clear();
    this.unions.clear();
    this.functions.clear();
    this.pointers.clear();
    this.references.clear();
    this.structs.clear();
    this.classes.clear();
  }
}
