import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import {
  DEFAULT_EXCLUDED_SEGMENTS,
  DEFAULT_LANGUAGE,
  DEFAULT_MARKDOWN_EXTENSIONS,
  DEFAULT_TIMEOUT_MS,
  DISCOVERABLE_CONFIG_FILES
} from "./constants.mjs";
import { toPosix } from "./core.mjs";
import { ConfigurationError, describeError } from "./errors.mjs";
import { normalizeExtension } from "./files.mjs";
import { resolveLanguageProfile } from "./languages.mjs";
import type { FileConfig, RunConfig } from "./types.mjs";

export interface ConfigOverrides {
  baseDir?: string;
  language?: string;
  analyzerConfig?: string;
  configFile?: string;
  exclude?: string[];
  extensions?: string[];
  timeoutMs?: number;
  concurrency?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, key: string, configPath: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigurationError(`invalid config at ${configPath}: "${key}" must be a non-empty string`);
  }
  return value.trim();
}

function expectStringList(value: unknown, key: string, configPath: string): string[] {
  const entries = typeof value === "string" ? [value] : value;
  if (!Array.isArray(entries) || !entries.every((entry): entry is string => typeof entry === "string")) {
    throw new ConfigurationError(`invalid config at ${configPath}: "${key}" must be a list of strings`);
  }
  return entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

function expectPositiveInteger(value: unknown, key: string, configPath: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`invalid config at ${configPath}: "${key}" must be a positive integer`);
  }
  return value;
}

export function parseFileConfig(content: string, configPath: string): FileConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(content) as unknown;
  } catch (error) {
    throw new ConfigurationError(`invalid YAML at ${configPath}: ${describeError(error)}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`invalid config at ${configPath}: expected a mapping`);
  }

  const config: FileConfig = {};
  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case "language":
      case "analyzer_config":
        config[key] = expectString(value, key, configPath);
        break;
      case "exclude":
        config[key] = expectStringList(value, key, configPath);
        break;
      case "extensions":
        config[key] = expectStringList(value, key, configPath).map(normalizeExtension);
        break;
      case "timeout_ms":
      case "concurrency":
        config[key] = expectPositiveInteger(value, key, configPath);
        break;
      default:
        throw new ConfigurationError(`invalid config at ${configPath}: unknown key "${key}"`);
    }
  }

  return config;
}

export function discoverConfigPath(startDir: string): string | null {
  let current = path.resolve(startDir);
  for (;;) {
    for (const filename of DISCOVERABLE_CONFIG_FILES) {
      const candidate = path.join(current, filename);
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
        return candidate;
      }
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

export function loadFileConfig(configPath: string): FileConfig {
  const relativeConfigPath = toPosix(path.relative(process.cwd(), configPath)) || configPath;
  const content = fs.readFileSync(configPath, "utf8");
  return parseFileConfig(content, relativeConfigPath);
}

function requireFile(filePath: string, label: string): string {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new ConfigurationError(`${label} not found: ${filePath}`);
  }
  return filePath;
}

export function resolveAnalyzerConfigPath(rawPath: string, baseDir: string): string {
  return requireFile(path.resolve(baseDir, rawPath), "analyzer configuration");
}

export function resolveRunConfig(overrides: ConfigOverrides, cwd: string = process.cwd()): RunConfig {
  const baseDir = path.resolve(cwd, overrides.baseDir ?? ".");
  if (!fs.existsSync(baseDir) || !fs.statSync(baseDir).isDirectory()) {
    throw new ConfigurationError(`base directory not found: ${baseDir}`);
  }

  const configPath = overrides.configFile
    ? requireFile(path.resolve(cwd, overrides.configFile), "config file")
    : discoverConfigPath(baseDir);
  const fileConfig: FileConfig = configPath ? loadFileConfig(configPath) : {};

  const profile = resolveLanguageProfile(overrides.language ?? fileConfig.language ?? DEFAULT_LANGUAGE);

  let analyzerConfigPath: string | null = null;
  if (overrides.analyzerConfig) {
    analyzerConfigPath = resolveAnalyzerConfigPath(overrides.analyzerConfig, cwd);
  } else if (fileConfig.analyzer_config && configPath) {
    analyzerConfigPath = resolveAnalyzerConfigPath(fileConfig.analyzer_config, path.dirname(configPath));
  }

  return {
    baseDir,
    profile,
    analyzerConfigPath,
    exclude: overrides.exclude?.length ? overrides.exclude : fileConfig.exclude ?? DEFAULT_EXCLUDED_SEGMENTS,
    extensions: overrides.extensions?.length
      ? overrides.extensions
      : fileConfig.extensions ?? DEFAULT_MARKDOWN_EXTENSIONS,
    timeoutMs: overrides.timeoutMs ?? fileConfig.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    concurrency: overrides.concurrency ?? fileConfig.concurrency ?? Math.max(1, os.cpus().length)
  };
}
