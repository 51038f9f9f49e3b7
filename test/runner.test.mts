import { expect, test } from "vitest";
import { resolveLanguageProfile } from "../src/languages.mts";
import { lintDocument, lintDocuments } from "../src/runner.mts";
import type { Analyzer, AnalyzerOutput, DocumentResult, LintRequest, RunResult } from "../src/types.mts";
import { FakeAnalyzer, flagLines } from "./helpers.mts";

const python = resolveLanguageProfile("python");
const cpp = resolveLanguageProfile("cpp");

const guide = {
  path: "docs/guide.md",
  text: ["Intro", "```python", "import os", "x=1", "```", "More"].join("\n")
};

test("maps analyzer findings back to the document line", async () => {
  const analyzer = new FakeAnalyzer(flagLines(/^x=1$/));
  const result = await lintDocument(guide, { profile: python, analyzer });

  expect(analyzer.requests).toHaveLength(1);
  expect(analyzer.requests[0]?.buffer.lines).toEqual(["# Intro", "#", "import os", "x=1", "#", "# More"]);
  expect(result).toEqual({
    path: "docs/guide.md",
    status: "failed",
    diagnostics: [
      {
        line: 4,
        column: 2,
        message: "E225 missing whitespace around operator",
        severity: "error",
        code: "E225",
        path: "docs/guide.md",
        source: "x=1"
      }
    ],
    fenceIssues: []
  });
});

test("passes analyzer configuration and timeout through to the analyzer", async () => {
  const analyzer = new FakeAnalyzer();
  const result = await lintDocument(guide, {
    profile: python,
    analyzer,
    analyzerConfigPath: "/work/.flake8",
    timeoutMs: 1500
  });

  expect(result.status).toBe("clean");
  expect(analyzer.requests[0]?.configPath).toBe("/work/.flake8");
  expect(analyzer.requests[0]?.timeoutMs).toBe(1500);
  expect(analyzer.requests[0]?.documentPath).toBe("docs/guide.md");
});

test("skips documents without code for the target language", async () => {
  const analyzer = new FakeAnalyzer(flagLines(/x=1/));
  const result = await lintDocument(guide, { profile: cpp, analyzer });

  expect(result.status).toBe("skipped");
  expect(result.diagnostics).toEqual([]);
  expect(analyzer.requests).toHaveLength(0);
});

test("skips documents whose only matching blocks are nolint", async () => {
  const analyzer = new FakeAnalyzer(flagLines(/x=1/));
  const document = { path: "a.md", text: "```python nolint\nx=1\n```\n" };

  expect((await lintDocument(document, { profile: python, analyzer })).status).toBe("skipped");
  expect(analyzer.requests).toHaveLength(0);
});

test("reports analyzer failures against the whole document", async () => {
  const analyzer = new FakeAnalyzer(() => ({
    text: "",
    exitCode: null,
    signal: null,
    failure: "failed to run flake8: spawn flake8 ENOENT"
  }));
  const result = await lintDocument(guide, { profile: python, analyzer });

  expect(result.status).toBe("failed");
  expect(result.diagnostics).toEqual([]);
  expect(result.toolFailure).toEqual({
    path: "docs/guide.md",
    message: "failed to run flake8: spawn flake8 ENOENT"
  });
});

test("turns a throwing analyzer into a tool failure", async () => {
  const analyzer: Analyzer = {
    lint: async () => {
      throw new Error("analyzer crashed");
    }
  };
  const result = await lintDocument(guide, { profile: python, analyzer });

  expect(result.toolFailure?.message).toBe("analyzer crashed");
});

test("fails an unreadable document without running the analyzer", async () => {
  const analyzer = new FakeAnalyzer();
  const document = { path: "gone.md", text: "", readError: "ENOENT: no such file or directory" };
  const result = await lintDocument(document, { profile: python, analyzer });

  expect(analyzer.requests).toHaveLength(0);
  expect(result).toEqual({
    path: "gone.md",
    status: "failed",
    diagnostics: [],
    toolFailure: { path: "gone.md", message: "cannot read document: ENOENT: no such file or directory" },
    fenceIssues: []
  });
});

test("carries fence issues on the result", async () => {
  const document = { path: "b.md", text: "```python\nx = 1\n```\n```python\ny=2\n" };
  const result = await lintDocument(document, { profile: python, analyzer: new FakeAnalyzer() });

  expect(result.status).toBe("clean");
  expect(result.fenceIssues).toEqual([{ lineNumber: 4, detail: "unterminated fenced code block" }]);
});

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

class SlowFirstAnalyzer implements Analyzer {
  active = 0;
  peak = 0;

  async lint(request: LintRequest): Promise<AnalyzerOutput> {
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    await delay(request.documentPath === "one.md" ? 40 : 5);
    this.active -= 1;
    return { text: flagLines(/=1$/)(request), exitCode: 0, signal: null };
  }
}

test("lints documents concurrently and reports them in input order", async () => {
  const documents = [
    { path: "one.md", text: "```python\nx=1\n```" },
    { path: "two.md", text: "```python\nx = 2\n```" },
    { path: "three.md", text: "no code here" },
    { path: "four.md", text: "```python\ny=1\n```" }
  ];
  const analyzer = new SlowFirstAnalyzer();
  const reported: string[] = [];
  let finished: RunResult | null = null;

  const run = await lintDocuments(documents, {
    profile: python,
    analyzer,
    concurrency: 3,
    reporter: {
      documentFinished: (result: DocumentResult) => reported.push(`${result.status} ${result.path}`),
      runFinished: (result: RunResult) => {
        finished = result;
      }
    }
  });

  expect(analyzer.peak).toBeGreaterThan(1);
  expect(reported).toEqual(["failed one.md", "clean two.md", "skipped three.md", "failed four.md"]);
  expect(run.failed).toBe(true);
  expect(run.results.map((result) => result.path)).toEqual(["one.md", "two.md", "three.md", "four.md"]);
  expect(finished).toBe(run);
});

test("a run with only clean and skipped documents passes", async () => {
  const run = await lintDocuments(
    [
      { path: "a.md", text: "```python\nx = 1\n```" },
      { path: "b.md", text: "prose only" }
    ],
    { profile: python, analyzer: new FakeAnalyzer(), concurrency: 2 }
  );

  expect(run.failed).toBe(false);
  expect(run.results.map((result) => result.status)).toEqual(["clean", "skipped"]);
});

test("an empty document set passes", async () => {
  const run = await lintDocuments([], { profile: python, analyzer: new FakeAnalyzer() });
  expect(run).toEqual({ failed: false, results: [] });
});

test("repeated runs yield identical diagnostics", async () => {
  const documents = [guide, { path: "c.md", text: "```python\na=1\nb=1\n```" }];
  const options = { profile: python, analyzer: new FakeAnalyzer(flagLines(/=1$/)), concurrency: 2 };

  const first = await lintDocuments(documents, options);
  const second = await lintDocuments(documents, options);

  expect(second.results).toEqual(first.results);
  expect(first.results[1]?.diagnostics.map((diagnostic) => diagnostic.line)).toEqual([2, 3]);
});
