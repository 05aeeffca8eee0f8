import type { RecordType, StructField, Type } from "./definitions.ts";
import { isPackedStruct } from "./guards.ts";
import { TypeKind } from "./kinds.ts";

/** Source-like spelling of a type. */
export function typeToString(t: Type): string {
  switch (t.kind) {
    case TypeKind.Integer:
      return t.integerKind;
    case TypeKind.Float:
      return t.floatKind;
    case TypeKind.Bool:
    case TypeKind.Char:
    case TypeKind.Void:
    case TypeKind.Auto:
      return t.kind;
    case TypeKind.Array:
      return t.length === 0
        ? `[]${typeToString(t.element)}`
        : `[${t.length}]${typeToString(t.element)}`;
    case TypeKind.Tuple:
      return `(${t.elements.map(typeToString).join(", ")})`;
    case TypeKind.Union:
      return t.variants.map(typeToString).join(" | ");
    case TypeKind.Function: {
      const ret = typeToString(t.returnType);
      const wrapped = t.returnType.kind === TypeKind.Function ? `(${ret})` : ret;
      return `(${t.params.map(typeToString).join(", ")}) -> ${wrapped}`;
    }
    case TypeKind.Pointer:
      return `*${typeToString(t.pointee)}`;
    case TypeKind.Reference:
      return `&${typeToString(t.referent)}`;
    case TypeKind.Struct: {
      const head = t.name.isEmpty ? "struct" : t.name.text;
      const prefix = isPackedStruct(t) ? "packed " : "";
      return `${prefix}${head} ${formatFields(t.fields)}`;
    }
    case TypeKind.Class: {
      const name = t.name.isEmpty ? "class" : `class ${t.name.text}`;
      const base = t.base ? ` : ${recordName(t.base)}` : "";
      return `${name}${base} ${formatFields(t.fields)}`;
    }
    default:
      return "<unknown>";
  }
}

/** Named records print as their name when nested in another type. */
function recordName(t: RecordType): string {
  return t.name.isEmpty ? typeToString(t) : t.name.text;
}

function formatFields(fields: readonly StructField[]): string {
  if (fields.length === 0) return "{}";
  const body = fields
    .map((f) => {
      const ft = f.type;
      const spelled = ft.kind === TypeKind.Struct || ft.kind === TypeKind.Class ? recordName(ft) : typeToString(ft);
      return `${f.name.text}: ${spelled}`;
    })
    .join(", ");
  return `{ ${body} }`;
}
