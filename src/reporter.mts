import { formatMappedDiagnostic, formatToolFailure } from "./diagnostics.mjs";
import type { DocumentResult, Reporter, RunResult } from "./types.mjs";

export interface TextSink {
  write(chunk: string): unknown;
}

export interface StreamReporterOptions {
  verbose?: boolean;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function summarizeRun(run: RunResult): string {
  const skipped = run.results.filter((result) => result.status === "skipped").length;
  const failedDocuments = run.results.filter((result) => result.status === "failed");

  if (failedDocuments.length === 0) {
    return `checked ${plural(run.results.length, "document")} (${skipped} skipped): no problems found`;
  }

  const problems = failedDocuments.reduce(
    (total, result) => total + result.diagnostics.length + (result.toolFailure ? 1 : 0),
    0
  );
  return `found ${plural(problems, "problem")} in ${plural(failedDocuments.length, "document")}`;
}

export class StreamReporter implements Reporter {
  private readonly verbose: boolean;

  constructor(
    private readonly out: TextSink,
    private readonly err: TextSink,
    options: StreamReporterOptions = {}
  ) {
    this.verbose = options.verbose === true;
  }

  documentFinished(result: DocumentResult): void {
    for (const issue of result.fenceIssues) {
      this.err.write(`${result.path}:${issue.lineNumber}: notice: ${issue.detail}\n`);
    }

    if (result.toolFailure) {
      this.out.write(`${formatToolFailure(result.toolFailure)}\n`);
    }

    for (const diagnostic of result.diagnostics) {
      this.out.write(`${formatMappedDiagnostic(diagnostic)}\n`);
    }

    if (!this.verbose) {
      return;
    }

    if (result.status === "clean") {
      this.out.write(`ok ${result.path}\n`);
    } else if (result.status === "skipped") {
      this.out.write(`skip ${result.path}\n`);
    }
  }

  runFinished(run: RunResult): void {
    this.err.write(`${summarizeRun(run)}\n`);
  }
}
