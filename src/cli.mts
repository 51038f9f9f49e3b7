import { resolveRunConfig } from "./config.mjs";
import type { ConfigOverrides } from "./config.mjs";
import { ConfigurationError } from "./errors.mjs";
import { collectMarkdownFiles, normalizeExtension, readDocuments } from "./files.mjs";
import { supportedLanguageIds } from "./languages.mjs";
import { StreamReporter } from "./reporter.mjs";
import type { TextSink } from "./reporter.mjs";
import { lintDocuments } from "./runner.mjs";
import type { Analyzer, RunConfig } from "./types.mjs";

export interface CliArgs {
  overrides: ConfigOverrides;
  help: boolean;
  verbose: boolean;
}

export interface CliEnvironment {
  stdout: TextSink;
  stderr: TextSink;
  cwd: string;
  analyzer?: Analyzer;
}

function splitFlag(arg: string): [string, string | null] {
  if (!arg.startsWith("--")) {
    return [arg, null];
  }
  const equalsIndex = arg.indexOf("=");
  if (equalsIndex < 0) {
    return [arg, null];
  }
  return [arg.slice(0, equalsIndex), arg.slice(equalsIndex + 1)];
}

function parsePositiveInteger(raw: string, flag: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${flag} expects a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseCliArgs(args: string[]): CliArgs {
  const overrides: ConfigOverrides = {};
  const positional: string[] = [];
  const exclude: string[] = [];
  const extensions: string[] = [];
  let help = false;
  let verbose = false;

  let index = 0;
  while (index < args.length) {
    const arg = args[index] ?? "";
    const [flag, inlineValue] = splitFlag(arg);
    index += 1;

    const takeValue = (): string => {
      if (inlineValue !== null) {
        return inlineValue;
      }
      const value = args[index];
      if (value === undefined || (value.startsWith("-") && value !== "-")) {
        throw new ConfigurationError(`missing value for ${flag}`);
      }
      index += 1;
      return value;
    };

    switch (flag) {
      case "--help":
      case "-h":
        help = true;
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--language":
      case "-l":
        overrides.language = takeValue();
        break;
      case "--analyzer-config":
      case "-a":
        overrides.analyzerConfig = takeValue();
        break;
      case "--config":
      case "-c":
        overrides.configFile = takeValue();
        break;
      case "--exclude":
      case "-x":
        exclude.push(takeValue());
        break;
      case "--ext":
        extensions.push(normalizeExtension(takeValue()));
        break;
      case "--timeout":
        overrides.timeoutMs = parsePositiveInteger(takeValue(), flag);
        break;
      case "--concurrency":
      case "-j":
        overrides.concurrency = parsePositiveInteger(takeValue(), flag);
        break;
      default:
        if (arg.startsWith("-") && arg !== "-") {
          throw new ConfigurationError(`unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length > 3) {
    throw new ConfigurationError(`unexpected argument: ${positional[3] ?? ""}`);
  }

  const [directory, analyzerConfig, language] = positional;
  if (directory) {
    overrides.baseDir = directory;
  }
  if (analyzerConfig && !overrides.analyzerConfig) {
    overrides.analyzerConfig = analyzerConfig;
  }
  if (language && !overrides.language) {
    overrides.language = language;
  }
  if (exclude.length > 0) {
    overrides.exclude = exclude;
  }
  if (extensions.length > 0) {
    overrides.extensions = extensions;
  }

  return { overrides, help, verbose };
}

export function getHelpText(): string {
  return [
    "Usage: markdownlint-codeblocks [directory] [analyzer-config] [language] [options]",
    "",
    "Lints fenced code blocks embedded in Markdown documents.",
    "",
    "Options:",
    `  -l, --language <id>          content language (${supportedLanguageIds().join(", ")})`,
    "  -a, --analyzer-config <file> configuration file passed to the analyzer",
    "  -c, --config <file>          YAML config (default: nearest .codeblock-lint.yaml)",
    "  -x, --exclude <segment>      skip paths containing this segment (repeatable)",
    "      --ext <extension>        document extension to scan (repeatable)",
    "      --timeout <ms>           analyzer timeout per document",
    "  -j, --concurrency <n>        documents linted in parallel",
    "  -v, --verbose                report clean and skipped documents",
    "  -h, --help                   show this help",
    ""
  ].join("\n");
}

export async function main(
  argv: string[] = process.argv.slice(2),
  env: CliEnvironment = { stdout: process.stdout, stderr: process.stderr, cwd: process.cwd() }
): Promise<number> {
  let parsed: CliArgs;
  let config: RunConfig;

  try {
    parsed = parseCliArgs(argv);
    if (parsed.help) {
      env.stdout.write(getHelpText());
      return 0;
    }
    config = resolveRunConfig(parsed.overrides, env.cwd);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      env.stderr.write(`error: ${error.message}\n`);
      return 2;
    }
    throw error;
  }

  const files = collectMarkdownFiles(config.baseDir, {
    extensions: config.extensions,
    exclude: config.exclude
  });
  const documents = readDocuments(files, env.cwd);

  const run = await lintDocuments(documents, {
    profile: config.profile,
    analyzer: env.analyzer,
    analyzerConfigPath: config.analyzerConfigPath,
    timeoutMs: config.timeoutMs,
    concurrency: config.concurrency,
    reporter: new StreamReporter(env.stdout, env.stderr, { verbose: parsed.verbose })
  });

  return run.failed ? 1 : 0;
}
