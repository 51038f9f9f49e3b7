import fs from "node:fs";
import path from "node:path";
import { expect, test } from "vitest";
import { ProcessAnalyzer } from "../src/analyzer.mts";
import { renderSyntheticBuffer, scanMarkdownDocument } from "../src/core.mts";
import { parseAnalyzerOutput } from "../src/diagnostics.mts";
import { cppcheckAnalyzer, flake8Analyzer, resolveLanguageProfile } from "../src/languages.mts";
import type { AnalyzerFamily, LanguageProfile, LintRequest } from "../src/types.mts";

const python = resolveLanguageProfile("python");

const ECHO_FLAGGED_STDIN = [
  'let data = "";',
  'process.stdin.on("data", (chunk) => { data += chunk; });',
  'process.stdin.on("end", () => {',
  '  data.split("\\n").forEach((line, index) => {',
  '    if (line === "x=1") console.log("stdin:" + (index + 1) + ":2: E225 missing whitespace around operator");',
  "  });",
  "  process.exitCode = 1;",
  "});"
].join("\n");

const REPORT_STAGED_FILE = [
  'const fs = require("fs");',
  'const path = require("path");',
  "const staged = process.argv[1];",
  'const lines = fs.readFileSync(staged, "utf8").split("\\n").length;',
  'process.stderr.write(staged + ":1:1: style: staged " + path.basename(staged) + " [lines" + lines + "]\\n");'
].join("\n");

function standIn(script: string, overrides: Partial<AnalyzerFamily> = {}): LanguageProfile {
  const family: AnalyzerFamily = {
    id: "node-stand-in",
    command: process.execPath,
    input: "stdin",
    stream: "stdout",
    okExitCodes: [0, 1],
    buildArgs: (stagedPath) => ["-e", script, ...(stagedPath ? [stagedPath] : [])],
    extract: flake8Analyzer.extract,
    ...overrides
  };
  return { ...python, analyzer: family };
}

function request(profile: LanguageProfile, extra: Partial<LintRequest> = {}): LintRequest {
  const text = ["Intro", "```python", "import os", "x=1", "```", "More"].join("\n");
  return {
    profile,
    buffer: renderSyntheticBuffer(scanMarkdownDocument(text), profile),
    documentPath: "docs/guide.md",
    configPath: null,
    timeoutMs: 10_000,
    ...extra
  };
}

test("pipes the buffer to a stdin analyzer and collects its output", async () => {
  const output = await new ProcessAnalyzer().lint(request(standIn(ECHO_FLAGGED_STDIN)));

  expect(output.failure).toBeUndefined();
  expect(output.exitCode).toBe(1);
  expect(output.text).toBe("stdin:4:2: E225 missing whitespace around operator\n");
});

test("stages the buffer in a unique temporary file for file analyzers", async () => {
  const profile = standIn(REPORT_STAGED_FILE, {
    input: "file",
    stream: "stderr",
    okExitCodes: [0],
    extract: cppcheckAnalyzer.extract
  });
  const analyzer = new ProcessAnalyzer();

  const outputs = await Promise.all([analyzer.lint(request(profile)), analyzer.lint(request(profile))]);
  const stagedPaths = outputs.map((output) => output.text.slice(0, output.text.indexOf(":1:1:")));

  for (const output of outputs) {
    expect(output.failure).toBeUndefined();
    expect(parseAnalyzerOutput(output.text, profile.analyzer)).toEqual([
      { line: 1, column: 1, message: "style: staged guide.py [lines7]", severity: "warning", code: "lines7" }
    ]);
  }
  expect(new Set(stagedPaths).size).toBe(2);
  for (const stagedPath of stagedPaths) {
    expect(path.basename(stagedPath)).toBe("guide.py");
    expect(fs.existsSync(path.dirname(stagedPath))).toBe(false);
  }
});

test("kills an analyzer that exceeds the timeout", async () => {
  const profile = standIn("setTimeout(() => {}, 10000);");
  const output = await new ProcessAnalyzer().lint(request(profile, { timeoutMs: 200 }));

  expect(output.failure).toBe("timed out after 200 ms");
});

test("stops an analyzer when the run is aborted", async () => {
  const controller = new AbortController();
  controller.abort();
  const profile = standIn("setTimeout(() => {}, 10000);");
  const output = await new ProcessAnalyzer().lint(request(profile, { signal: controller.signal }));

  expect(output.failure).toBe("aborted");
});

test("reports a missing analyzer binary as a failure", async () => {
  const profile = standIn("", { command: "markdownlint-codeblocks-missing-tool" });
  const output = await new ProcessAnalyzer().lint(request(profile));

  expect(output.failure).toMatch(/^failed to run markdownlint-codeblocks-missing-tool: /);
});

test("reports an unexpected exit status with the tool's stderr", async () => {
  const profile = standIn('process.stderr.write("boom"); process.exitCode = 3;');
  const output = await new ProcessAnalyzer().lint(request(profile));

  expect(output.exitCode).toBe(3);
  expect(output.failure).toBe(`${process.execPath} exited with status 3: boom`);
});
