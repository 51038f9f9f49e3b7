import { ProcessAnalyzer } from "./analyzer.mjs";
import { resolveRunConfig } from "./config.mjs";
import { reconstructBuffer, renderSyntheticBuffer, scanMarkdownDocument } from "./core.mjs";
import { formatMappedDiagnostic, mapDiagnostics, parseAnalyzerOutput } from "./diagnostics.mjs";
import { ConfigurationError } from "./errors.mjs";
import { collectMarkdownFiles, readDocuments } from "./files.mjs";
import { LANGUAGE_PROFILES, resolveLanguageProfile } from "./languages.mjs";
import { StreamReporter } from "./reporter.mjs";
import { codeBlockFenceRule } from "./rules/code-block-fence.mjs";
import { codeBlockLintRule, createCodeBlockLintRule } from "./rules/code-block-lint.mjs";
import { lintDocument, lintDocuments } from "./runner.mjs";

const rules = [codeBlockLintRule, codeBlockFenceRule];

export default rules;

export {
  rules,
  codeBlockLintRule,
  codeBlockFenceRule,
  createCodeBlockLintRule,
  scanMarkdownDocument,
  renderSyntheticBuffer,
  reconstructBuffer,
  parseAnalyzerOutput,
  mapDiagnostics,
  formatMappedDiagnostic,
  lintDocument,
  lintDocuments,
  collectMarkdownFiles,
  readDocuments,
  resolveRunConfig,
  resolveLanguageProfile,
  LANGUAGE_PROFILES,
  ProcessAnalyzer,
  StreamReporter,
  ConfigurationError
};

export type * from "./types.mjs";
