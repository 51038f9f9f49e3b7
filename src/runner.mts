import os from "node:os";
import { ProcessAnalyzer } from "./analyzer.mjs";
import { DEFAULT_TIMEOUT_MS } from "./constants.mjs";
import { reconstructBuffer, scanMarkdownDocument } from "./core.mjs";
import { mapDiagnostics, parseAnalyzerOutput } from "./diagnostics.mjs";
import { describeError } from "./errors.mjs";
import type {
  Analyzer,
  AnalyzerOutput,
  DocumentResult,
  LanguageProfile,
  LintRequest,
  MarkdownDocument,
  Reporter,
  RunResult
} from "./types.mjs";

export interface LintOptions {
  profile: LanguageProfile;
  analyzer?: Analyzer;
  analyzerConfigPath?: string | null;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface RunOptions extends LintOptions {
  concurrency?: number;
  reporter?: Reporter;
}

export function isFailedResult(result: DocumentResult): boolean {
  return result.status === "failed";
}

async function invokeAnalyzer(analyzer: Analyzer, request: LintRequest): Promise<AnalyzerOutput> {
  try {
    return await analyzer.lint(request);
  } catch (error) {
    return {
      text: "",
      exitCode: null,
      signal: null,
      failure: describeError(error)
    };
  }
}

export async function lintDocument(document: MarkdownDocument, options: LintOptions): Promise<DocumentResult> {
  if (document.readError !== undefined) {
    return {
      path: document.path,
      status: "failed",
      diagnostics: [],
      toolFailure: { path: document.path, message: `cannot read document: ${document.readError}` },
      fenceIssues: []
    };
  }

  const scan = scanMarkdownDocument(document.text);
  const reconstructed = reconstructBuffer(scan, options.profile);

  if (reconstructed.kind === "skip") {
    return {
      path: document.path,
      status: "skipped",
      diagnostics: [],
      fenceIssues: scan.issues
    };
  }

  const analyzer = options.analyzer ?? new ProcessAnalyzer();
  const request: LintRequest = {
    profile: options.profile,
    buffer: reconstructed.buffer,
    documentPath: document.path,
    configPath: options.analyzerConfigPath ?? null,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  };
  if (options.signal) {
    request.signal = options.signal;
  }

  const output = await invokeAnalyzer(analyzer, request);
  if (output.failure) {
    return {
      path: document.path,
      status: "failed",
      diagnostics: [],
      toolFailure: { path: document.path, message: output.failure },
      fenceIssues: scan.issues
    };
  }

  const diagnostics = mapDiagnostics(parseAnalyzerOutput(output.text, options.profile.analyzer), {
    path: document.path,
    lines: scan.lines
  });

  return {
    path: document.path,
    status: diagnostics.length > 0 ? "failed" : "clean",
    diagnostics,
    fenceIssues: scan.issues
  };
}

export async function lintDocuments(documents: MarkdownDocument[], options: RunOptions): Promise<RunResult> {
  const requested = options.concurrency ?? os.cpus().length;
  const concurrency = Math.max(1, Math.min(requested, documents.length));
  const analyzer = options.analyzer ?? new ProcessAnalyzer();
  const completed = new Array<DocumentResult | undefined>(documents.length);

  let nextIndex = 0;
  let reportedCount = 0;

  // Results reach the reporter in input order, each as soon as its predecessors are done.
  const flush = (): void => {
    for (let result = completed[reportedCount]; result; result = completed[reportedCount]) {
      options.reporter?.documentFinished(result);
      reportedCount += 1;
    }
  };

  const worker = async (): Promise<void> => {
    while (nextIndex < documents.length) {
      const index = nextIndex;
      nextIndex += 1;

      const document = documents[index];
      if (!document) {
        continue;
      }
      completed[index] = await lintDocument(document, { ...options, analyzer });
      flush();
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  const results = completed.filter((result): result is DocumentResult => result !== undefined);
  const run: RunResult = {
    failed: results.some(isFailedResult),
    results
  };
  options.reporter?.runFinished(run);
  return run;
}
