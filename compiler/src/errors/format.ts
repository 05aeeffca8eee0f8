import type { Diagnostic } from "./diagnostic.ts";
import type { SourceFile } from "../utils/source.ts";

/** Render one diagnostic as plain text, with the source line and a caret when available. */
export function formatDiagnostic(diag: Diagnostic, source?: SourceFile): string {
  const loc = diag.location;
  const file = loc.file || "<unknown>";
  let text = `${file}:${loc.line}:${loc.column}: ${diag.severity}: ${diag.message}`;

  const srcLine = source?.lineText(loc.line);
  if (srcLine !== undefined && loc.column > 0) {
    const caret = `${" ".repeat(loc.column - 1)}^`;
    text += `\n  ${srcLine}\n  ${caret}`;
  }

  for (const note of diag.notes) {
    const n = note.location;
    text += `\n${n.file}:${n.line}:${n.column}: note: ${note.message}`;
  }
  return text;
}

export function formatDiagnostics(diagnostics: readonly Diagnostic[], source?: SourceFile): string {
  return diagnostics.map((d) => formatDiagnostic(d, source)).join("\n");
}
