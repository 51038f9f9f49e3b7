export interface MarkdownlintRuleError {
  lineNumber: number;
  detail?: string;
  context?: string;
  range?: [number, number];
}

export type MarkdownlintOnError = (errorInfo: MarkdownlintRuleError) => void;

export interface MarkdownlintRuleParams {
  name?: string;
  config?: Record<string, unknown>;
  lines?: string[];
}

export interface MarkdownlintRule {
  names: string[];
  description: string;
  tags: string[];
  parser: "none" | "markdownit" | "micromark";
  asynchronous?: boolean;
  function: (params: MarkdownlintRuleParams, onError: MarkdownlintOnError) => void | Promise<void>;
}

export interface RuleConfig {
  language?: string;
  analyzer_config?: string;
  timeout_ms?: number;
}

export interface MarkdownDocument {
  path: string;
  text: string;
  readError?: string;
}

export type FenceMarker = "`" | "~";

export interface FenceDelimiter {
  marker: FenceMarker;
  length: number;
  indent: string;
  infoText: string;
}

export interface ProseSegment {
  kind: "prose";
  startLineNumber: number;
  lines: string[];
}

export interface CodeSegment {
  kind: "code";
  startLineNumber: number;
  openingFence: string;
  body: string[];
  code: string[];
  closingFence: string;
  fence: FenceDelimiter;
  infoText: string;
  language: string;
  exempt: boolean;
}

export type Segment = ProseSegment | CodeSegment;

export interface FenceIssue {
  lineNumber: number;
  detail: string;
}

export interface ScanResult {
  lines: string[];
  lineSeparator: string;
  segments: Segment[];
  issues: FenceIssue[];
}

export interface SyntheticBuffer {
  language: string;
  text: string;
  lines: string[];
  lineSeparator: string;
  lintedLineCount: number;
}

export type ReconstructResult =
  | { kind: "buffer"; buffer: SyntheticBuffer }
  | { kind: "skip"; reason: "no-applicable-content" };

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  line: number;
  column: number;
  message: string;
  severity: Severity;
  code?: string;
}

export interface MappedDiagnostic extends Diagnostic {
  path: string;
  source: string;
}

export interface ToolFailure {
  path: string;
  message: string;
}

export interface AnalyzerFamily {
  id: string;
  command: string;
  input: "stdin" | "file";
  stream: "stdout" | "stderr";
  okExitCodes: number[];
  buildArgs: (stagedPath: string | null, configPath: string | null) => string[];
  extract: (line: string) => Diagnostic | null;
  /** Rewrites prose copied into the buffer so it cannot act as an analyzer directive. */
  neutralize?: (text: string) => string;
}

export interface LanguageProfile {
  id: string;
  aliases: string[];
  commentPrefix: string;
  fileExtension: string;
  analyzer: AnalyzerFamily;
}

export interface LintRequest {
  profile: LanguageProfile;
  buffer: SyntheticBuffer;
  documentPath: string;
  configPath: string | null;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface AnalyzerOutput {
  text: string;
  exitCode: number | null;
  signal: string | null;
  failure?: string;
}

export interface Analyzer {
  lint(request: LintRequest): Promise<AnalyzerOutput>;
}

export type DocumentStatus = "skipped" | "clean" | "failed";

export interface DocumentResult {
  path: string;
  status: DocumentStatus;
  diagnostics: MappedDiagnostic[];
  toolFailure?: ToolFailure;
  fenceIssues: FenceIssue[];
}

export interface RunResult {
  failed: boolean;
  results: DocumentResult[];
}

export interface Reporter {
  documentFinished(result: DocumentResult): void;
  runFinished(result: RunResult): void;
}

export interface FileConfig {
  language?: string;
  analyzer_config?: string;
  exclude?: string[];
  extensions?: string[];
  timeout_ms?: number;
  concurrency?: number;
}

export interface RunConfig {
  baseDir: string;
  profile: LanguageProfile;
  analyzerConfigPath: string | null;
  exclude: string[];
  extensions: string[];
  timeoutMs: number;
  concurrency: number;
}
