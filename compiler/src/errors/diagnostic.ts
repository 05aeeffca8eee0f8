export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
  Note = "note",
  Fatal = "fatal",
}

export interface SourceLocation {
  file: string;
  line: number;
  column: number;
  offset: number;
}

/** Secondary location attached to a diagnostic (e.g. the previous definition). */
export interface DiagnosticNote {
  message: string;
  location: SourceLocation;
}

export interface Diagnostic {
  severity: Severity;
  message: string;
  location: SourceLocation;
  notes: DiagnosticNote[];
}

/** Location used when a diagnostic has no real source position. */
export const UNKNOWN_LOCATION: Readonly<SourceLocation> = Object.freeze({
  file: "<unknown>",
  line: 0,
  column: 0,
  offset: 0,
});

export function location(file: string, line: number, column: number, offset = 0): SourceLocation {
  return { file, line, column, offset };
}

export function isUnknownLocation(loc: SourceLocation): boolean {
  return loc.line === 0 && loc.column === 0 && loc.file === UNKNOWN_LOCATION.file;
}
