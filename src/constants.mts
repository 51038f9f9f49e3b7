export const NOLINT_KEYWORD = "nolint";

export const DEFAULT_LANGUAGE = "python";

export const DEFAULT_EXCLUDED_SEGMENTS = ["slides"];

export const DEFAULT_MARKDOWN_EXTENSIONS = [".md"];

export const IGNORED_DIRECTORIES = new Set([".git", "node_modules"]);

export const DEFAULT_TIMEOUT_MS = 60_000;

export const SOURCE_LINE_INDENT = "    ";

export const DISCOVERABLE_CONFIG_FILES = [
  ".codeblock-lint.yaml",
  ".codeblock-lint.yml"
];
