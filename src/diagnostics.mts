import { SOURCE_LINE_INDENT } from "./constants.mjs";
import { normalizeNewlines } from "./core.mjs";
import type { AnalyzerFamily, Diagnostic, MappedDiagnostic, ToolFailure } from "./types.mjs";

export function parseAnalyzerOutput(rawOutput: string, family: AnalyzerFamily): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const line of normalizeNewlines(rawOutput).split("\n")) {
    if (!line.trim()) {
      continue;
    }
    const diagnostic = family.extract(line);
    if (diagnostic) {
      diagnostics.push(diagnostic);
    }
  }
  return diagnostics;
}

function compareDiagnostics(left: MappedDiagnostic, right: MappedDiagnostic): number {
  return left.line - right.line || left.column - right.column || left.message.localeCompare(right.message);
}

export function mapDiagnostics(
  diagnostics: Diagnostic[],
  document: { path: string; lines: string[] }
): MappedDiagnostic[] {
  const mapped: MappedDiagnostic[] = [];
  const seen = new Set<string>();

  for (const diagnostic of diagnostics) {
    if (diagnostic.line < 1 || diagnostic.line > document.lines.length) {
      continue;
    }

    const key = `${diagnostic.line}:${diagnostic.column}:${diagnostic.message}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    mapped.push({
      ...diagnostic,
      path: document.path,
      source: document.lines[diagnostic.line - 1] ?? ""
    });
  }

  return mapped.sort(compareDiagnostics);
}

export function formatMappedDiagnostic(diagnostic: MappedDiagnostic): string {
  return [
    `${diagnostic.path}:${diagnostic.line}:${diagnostic.column}: ${diagnostic.message}`,
    `${SOURCE_LINE_INDENT}${diagnostic.source}`
  ].join("\n");
}

export function formatToolFailure(failure: ToolFailure): string {
  return `${failure.path}: ${failure.message}`;
}
