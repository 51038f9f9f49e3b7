import { resolveAnalyzerConfigPath } from "../config.mjs";
import { DEFAULT_LANGUAGE } from "../constants.mjs";
import { resolveLanguageProfile } from "../languages.mjs";
import { lintDocument } from "../runner.mjs";
import type {
  Analyzer,
  MarkdownlintRule,
  MarkdownlintRuleError,
  MarkdownlintRuleParams,
  RuleConfig
} from "../types.mjs";

function toConfig(params: MarkdownlintRuleParams): RuleConfig {
  const { language, analyzer_config: analyzerConfig, timeout_ms: timeoutMs } = params.config || {};
  const config: RuleConfig = {};
  if (typeof language === "string" && language.trim()) {
    config.language = language.trim();
  }
  if (typeof analyzerConfig === "string" && analyzerConfig.trim()) {
    config.analyzer_config = analyzerConfig.trim();
  }
  if (typeof timeoutMs === "number" && Number.isInteger(timeoutMs) && timeoutMs > 0) {
    config.timeout_ms = timeoutMs;
  }
  return config;
}

export function createCodeBlockLintRule(analyzer?: Analyzer): MarkdownlintRule {
  return {
    names: ["CB001", "code-block-lint"],
    description: "Fenced code blocks must pass the configured static analyzer",
    tags: ["code", "fences", "analyzer"],
    parser: "none",
    asynchronous: true,
    function: async (params, onError) => {
      const lines = params.lines || [];
      if (!lines.length) {
        return;
      }

      const config = toConfig(params);
      const profile = resolveLanguageProfile(config.language ?? DEFAULT_LANGUAGE);
      const analyzerConfigPath = config.analyzer_config
        ? resolveAnalyzerConfigPath(config.analyzer_config, process.cwd())
        : null;

      const result = await lintDocument(
        { path: params.name || "<stdin>", text: lines.join("\n") },
        { profile, analyzer, analyzerConfigPath, timeoutMs: config.timeout_ms }
      );

      if (result.toolFailure) {
        onError({
          lineNumber: 1,
          detail: result.toolFailure.message
        });
      }

      for (const diagnostic of result.diagnostics) {
        const error: MarkdownlintRuleError = {
          lineNumber: diagnostic.line,
          detail: diagnostic.message
        };
        const context = diagnostic.source.trim();
        if (context) {
          error.context = context;
        }
        if (diagnostic.column <= diagnostic.source.length) {
          error.range = [diagnostic.column, 1];
        }
        onError(error);
      }
    }
  };
}

export const codeBlockLintRule = createCodeBlockLintRule();
