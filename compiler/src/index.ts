export * from "./ast/builders.ts";
export * from "./ast/flags.ts";
export * from "./ast/kinds.ts";
export * from "./ast/nodes.ts";
export * from "./ast/printer.ts";
export * from "./ast/side-table.ts";
export * from "./ast/tree.ts";
export * from "./ast/visitor.ts";
export * from "./ast/walk.ts";
export * from "./context.ts";
export * from "./errors/diagnostic.ts";
export * from "./errors/format.ts";
export * from "./errors/logger.ts";
export * from "./memory/arena.ts";
export * from "./strings/builtins.ts";
export * from "./strings/interner.ts";
export * from "./symbols/scope.ts";
export * from "./symbols/symbol.ts";
export * from "./symbols/symbol-table.ts";
export * from "./types/calls.ts";
export * from "./types/definitions.ts";
export * from "./types/format.ts";
export * from "./types/guards.ts";
export * from "./types/hash.ts";
export * from "./types/kinds.ts";
export * from "./types/layout.ts";
export * from "./types/literals.ts";
export * from "./types/primitives.ts";
export * from "./types/registry.ts";
export * from "./types/relations.ts";
export * from "./utils/source.ts";
