// ─── Type Kind Constants ────────────────────────────────────────────────────

export const TypeKind = {
  Auto: "auto",
  Integer: "integer",
  Float: "float",
  Bool: "bool",
  Char: "char",
  Void: "void",
  Array: "array",
  Tuple: "tuple",
  Union: "union",
  Function: "function",
  Pointer: "pointer",
  Reference: "reference",
  Struct: "struct",
  Class: "class",
} as const;

export type TypeKindValue = (typeof TypeKind)[keyof typeof TypeKind];

// ─── Integer Kinds ──────────────────────────────────────────────────────────

export const IntegerKind = {
  I8: "i8",
  I16: "i16",
  I32: "i32",
  I64: "i64",
  I128: "i128",
  U8: "u8",
  U16: "u16",
  U32: "u32",
  U64: "u64",
  U128: "u128",
} as const;

export type IntegerKindValue = (typeof IntegerKind)[keyof typeof IntegerKind];

export type IntegerBits = 8 | 16 | 32 | 64 | 128;

// ─── Float Kinds ────────────────────────────────────────────────────────────

export const FloatKind = {
  F32: "f32",
  F64: "f64",
} as const;

export type FloatKindValue = (typeof FloatKind)[keyof typeof FloatKind];
