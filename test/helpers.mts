import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Analyzer, AnalyzerOutput, LintRequest } from "../src/types.mts";

export function createTempDir(prefix = "markdownlint-codeblocks-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeText(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
}

export function cleanupTempDir(dirPath: string): void {
  fs.rmSync(dirPath, { recursive: true, force: true });
}

export class MemorySink {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  text(): string {
    return this.chunks.join("");
  }
}

export class FakeAnalyzer implements Analyzer {
  readonly requests: LintRequest[] = [];

  constructor(private readonly respond: (request: LintRequest) => string | AnalyzerOutput = () => "") {}

  async lint(request: LintRequest): Promise<AnalyzerOutput> {
    this.requests.push(request);
    const response = this.respond(request);
    if (typeof response === "string") {
      return { text: response, exitCode: response ? 1 : 0, signal: null };
    }
    return response;
  }
}

/** Reports every buffer line whose text matches `pattern`, flake8 style. */
export function flagLines(pattern: RegExp, code = "E225", text = "missing whitespace around operator") {
  return (request: LintRequest): string =>
    request.buffer.lines
      .map((line, index) => (pattern.test(line) ? `stdin:${index + 1}:2: ${code} ${text}` : null))
      .filter((line): line is string => line !== null)
      .join("\n");
}
