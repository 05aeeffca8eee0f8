/**
 * Diagnostic logger shared by every semantic pass.
 *
 * Passes report through the logger instead of writing output themselves. The
 * logger keeps per-severity counts so the driver can decide whether to stop,
 * and forwards every diagnostic to its sinks in report order.
 */

import {
  type Diagnostic,
  type DiagnosticNote,
  Severity,
  type SourceLocation,
} from "./diagnostic.ts";

export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

/** Sink that keeps every diagnostic in memory. */
export class CollectingSink implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  clear(): void {
    this.diagnostics.length = 0;
  }
}

export class DiagnosticLogger {
  private readonly collected = new CollectingSink();
  private readonly sinks: DiagnosticSink[];
  private counts: Record<Severity, number> = emptyCounts();

  constructor(sinks: DiagnosticSink[] = []) {
    this.sinks = [this.collected, ...sinks];
  }

  /** Every diagnostic reported so far, in order. */
  get diagnostics(): readonly Diagnostic[] {
    return this.collected.diagnostics;
  }

  get errorCount(): number {
    return this.counts[Severity.Error];
  }

  get warningCount(): number {
    return this.counts[Severity.Warning];
  }

  get infoCount(): number {
    return this.counts[Severity.Info];
  }

  get fatalCount(): number {
    return this.counts[Severity.Fatal];
  }

  hasErrors(): boolean {
    return this.errorCount > 0 || this.fatalCount > 0;
  }

  addSink(sink: DiagnosticSink): void {
    this.sinks.push(sink);
  }

  report(diagnostic: Diagnostic): void {
    this.counts[diagnostic.severity]++;
    for (const sink of this.sinks) {
      sink.report(diagnostic);
    }
  }

  error(message: string, location: SourceLocation, notes: DiagnosticNote[] = []): void {
    this.report({ severity: Severity.Error, message, location, notes });
  }

  warning(message: string, location: SourceLocation, notes: DiagnosticNote[] = []): void {
    this.report({ severity: Severity.Warning, message, location, notes });
  }

  info(message: string, location: SourceLocation, notes: DiagnosticNote[] = []): void {
    this.report({ severity: Severity.Info, message, location, notes });
  }

  /** Reports an unrecoverable problem. Whether to stop is left to the driver. */
  fatal(message: string, location: SourceLocation, notes: DiagnosticNote[] = []): void {
    this.report({ severity: Severity.Fatal, message, location, notes });
  }

  clear(): void {
    this.collected.clear();
    this.counts = emptyCounts();
  }
}

function emptyCounts(): Record<Severity, number> {
  return {
    [Severity.Error]: 0,
    [Severity.Warning]: 0,
    [Severity.Info]: 0,
    [Severity.Note]: 0,
    [Severity.Fatal]: 0,
  };
}
