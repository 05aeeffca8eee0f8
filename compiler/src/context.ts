/**
 * Compilation-unit context.
 *
 * Owns the one arena, interner, syntax tree, logger, symbol table and type
 * registry used for a single translation unit. Passes receive the context
 * instead of reaching for globals.
 */

import { AstBuilder } from "./ast/builders.ts";
import { SyntaxTree } from "./ast/tree.ts";
import { location, type SourceLocation } from "./errors/diagnostic.ts";
import { DiagnosticLogger, type DiagnosticSink } from "./errors/logger.ts";
import { Arena, DEFAULT_BLOCK_SIZE } from "./memory/arena.ts";
import { type InternedString, StringInterner } from "./strings/interner.ts";
import { SymbolTable } from "./symbols/symbol-table.ts";
import { DEFAULT_POINTER_SIZE, TypeRegistry } from "./types/registry.ts";

export interface ContextOptions {
  /** File name used for locations created through the context. */
  file?: string;
  /** Arena block size in bytes. */
  blockSize?: number;
  /** Target pointer width in bytes (4 or 8). */
  pointerSize?: number;
  /** Extra sinks receiving every diagnostic. */
  sinks?: DiagnosticSink[];
}

export const DEFAULT_FILE = "<input>";

export class CompilationContext {
  readonly file: string;
  readonly arena: Arena;
  readonly strings: StringInterner;
  readonly tree: SyntaxTree;
  readonly builder: AstBuilder;
  readonly logger: DiagnosticLogger;
  readonly types: TypeRegistry;
  private symbolTable: SymbolTable;

  constructor(options: ContextOptions = {}) {
    this.file = options.file ?? DEFAULT_FILE;
    this.arena = new Arena({ blockSize: options.blockSize ?? DEFAULT_BLOCK_SIZE });
    this.strings = new StringInterner(this.arena);
    this.tree = new SyntaxTree(this.arena);
    this.builder = new AstBuilder(this.tree, this.at(0, 0));
    this.logger = new DiagnosticLogger(options.sinks ?? []);
    this.types = new TypeRegistry({ pointerSize: options.pointerSize ?? DEFAULT_POINTER_SIZE });
    this.symbolTable = new SymbolTable(this.tree, this.logger);
  }

  get symbols(): SymbolTable {
    return this.symbolTable;
  }

  /** Location in this unit's file. */
  at(line: number, column: number, offset = 0): SourceLocation {
    return location(this.file, line, column, offset);
  }

  /** Shorthand for `strings.intern`. */
  intern(text: string): InternedString {
    return this.strings.intern(text);
  }

  /**
   * Start over for a new unit: every node, string, symbol, cached composite
   * type and diagnostic is dropped. Ids handed out before are stale.
   */
  reset(): void {
    this.arena.reset();
    this.strings.reset();
    this.types.clear();
    this.logger.clear();
    this.symbolTable = new SymbolTable(this.tree, this.logger);
  }
}

export function createCompilationContext(options: ContextOptions = {}): CompilationContext {
  return new CompilationContext(options);
}
