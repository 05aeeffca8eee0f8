import { type CompilationContext, createCompilationContext } from "../src/context.ts";
import type { Diagnostic } from "../src/errors/diagnostic.ts";
import type { StructField, Type } from "../src/types/definitions.ts";

export const TEST_FILE = "test.src";

/** Fresh context for one test. */
export function makeContext(): CompilationContext {
  return createCompilationContext({ file: TEST_FILE });
}

/** Messages of every reported diagnostic, in order. */
export function messages(ctx: CompilationContext): string[] {
  return ctx.logger.diagnostics.map((d: Diagnostic) => d.message);
}

/** Struct/class fields from `[name, type]` pairs. */
export function fields(ctx: CompilationContext, ...entries: [string, Type][]): StructField[] {
  return entries.map(([name, type]) => ({ name: ctx.intern(name), type }));
}
