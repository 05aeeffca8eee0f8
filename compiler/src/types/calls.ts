/**
 * Call compatibility and overload ranking.
 *
 * `getConversionDistance` scores how far an argument list is from a
 * signature; lower is better and 0 means every argument matches exactly.
 * `rankOverloads` picks the unique lowest score and reports ties as
 * ambiguous rather than choosing one.
 */

import type { FunctionType, Type } from "./definitions.ts";
import { TypeKind } from "./kinds.ts";
import { canBeImplicitlyPassedTo, typesEqual } from "./relations.ts";

export const NOT_CALLABLE = -1;

export function canBeCalledWith(fn: FunctionType, args: readonly Type[]): boolean {
  if (args.length !== fn.params.length) return false;
  return args.every((arg, i) => {
    const param = fn.params[i];
    return param !== undefined && (typesEqual(arg, param) || canBeImplicitlyPassedTo(arg, param));
  });
}

/** Cost of passing `arg` to `param`; assumes the pass is allowed. */
export function argumentDistance(arg: Type, param: Type): number {
  if (typesEqual(arg, param)) return 0;

  if (arg.kind === TypeKind.Integer && param.kind === TypeKind.Integer) {
    if (arg.bits < param.bits) return 1;
    if (arg.bits > param.bits) return 3;
    return 2;
  }
  if (arg.kind === TypeKind.Float && param.kind === TypeKind.Float) {
    return arg.bits < param.bits ? 1 : 3;
  }
  if (arg.kind === TypeKind.Integer && param.kind === TypeKind.Float) return 2;
  if (arg.kind === TypeKind.Float && param.kind === TypeKind.Integer) return 4;
  return 1;
}

/** Total distance for an argument list, or `NOT_CALLABLE`. */
export function getConversionDistance(fn: FunctionType, args: readonly Type[]): number {
  if (args.length !== fn.params.length) return NOT_CALLABLE;

  let total = 0;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const param = fn.params[i];
    if (!arg || !param) return NOT_CALLABLE;
    if (typesEqual(arg, param)) continue;
    if (!canBeImplicitlyPassedTo(arg, param)) return NOT_CALLABLE;
    total += argumentDistance(arg, param);
  }
  return total;
}

export type OverloadResolution =
  | { kind: "resolved"; index: number; distance: number }
  | { kind: "ambiguous"; indices: number[]; distance: number }
  | { kind: "none" };

/** Choose the candidate with the lowest conversion distance. */
export function rankOverloads(
  candidates: readonly FunctionType[],
  args: readonly Type[],
): OverloadResolution {
  let best = Number.POSITIVE_INFINITY;
  let indices: number[] = [];

  candidates.forEach((candidate, index) => {
    const distance = getConversionDistance(candidate, args);
    if (distance === NOT_CALLABLE) return;
    if (distance < best) {
      best = distance;
      indices = [index];
    } else if (distance === best) {
      indices.push(index);
    }
  });

  const [first] = indices;
  if (first === undefined) return { kind: "none" };
  if (indices.length > 1) return { kind: "ambiguous", indices, distance: best };
  return { kind: "resolved", index: first, distance: best };
}
