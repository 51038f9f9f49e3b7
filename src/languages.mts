import { ConfigurationError } from "./errors.mjs";
import type { AnalyzerFamily, Diagnostic, LanguageProfile, Severity } from "./types.mjs";

const LOCATION_PATTERN = /^(.*?):(\d+):(\d+): (.*)$/;
const SEVERITY_BODY_PATTERN = /^([a-z]+): (.*?)(?: \[([^\]]+)\])?$/;
const FLAKE8_CODE_PATTERN = /^([A-Z]+\d+)\b/;
const FLAKE8_FILE_DIRECTIVE_PATTERN = /(flake8)(?=[:=])/gi;

interface LocatedLine {
  line: number;
  column: number;
  body: string;
}

function splitLocation(rawLine: string): LocatedLine | null {
  const match = rawLine.trimEnd().match(LOCATION_PATTERN);
  if (!match) {
    return null;
  }

  const body = (match[4] ?? "").trim();
  if (!body) {
    return null;
  }

  return {
    line: Number(match[2]),
    column: Math.max(1, Number(match[3])),
    body
  };
}

function extractSeverityTagged(rawLine: string, severities: Record<string, Severity>): Diagnostic | null {
  const located = splitLocation(rawLine);
  if (!located) {
    return null;
  }

  const tagged = located.body.match(SEVERITY_BODY_PATTERN);
  const severityWord = tagged?.[1] ?? "";
  const diagnostic: Diagnostic = {
    line: located.line,
    column: located.column,
    message: located.body,
    severity: severities[severityWord] ?? "warning"
  };

  const code = tagged?.[3];
  if (code) {
    diagnostic.code = code;
  }
  return diagnostic;
}

export const flake8Analyzer: AnalyzerFamily = {
  id: "flake8",
  command: "flake8",
  input: "stdin",
  stream: "stdout",
  okExitCodes: [0, 1],
  buildArgs: (_stagedPath, configPath) => [
    ...(configPath ? ["--config", configPath] : []),
    "--stdin-display-name",
    "snippet.py",
    "-"
  ],
  extract: (rawLine) => {
    const located = splitLocation(rawLine);
    if (!located) {
      return null;
    }

    const code = located.body.match(FLAKE8_CODE_PATTERN)?.[1];
    const diagnostic: Diagnostic = {
      line: located.line,
      column: located.column,
      message: located.body,
      severity: code && /^[EF]/.test(code) ? "error" : "warning"
    };
    if (code) {
      diagnostic.code = code;
    }
    return diagnostic;
  },
  // `# flake8: noqa` anywhere in the buffer would disable every check.
  neutralize: (text) => text.replace(FLAKE8_FILE_DIRECTIVE_PATTERN, "$1 ")
};

export const cppcheckAnalyzer: AnalyzerFamily = {
  id: "cppcheck",
  command: "cppcheck",
  input: "file",
  stream: "stderr",
  okExitCodes: [0],
  buildArgs: (stagedPath, configPath) => [
    "--quiet",
    "--language=c++",
    "--enable=warning,style,performance,portability",
    "--suppress=missingIncludeSystem",
    "--template={file}:{line}:{column}: {severity}: {message} [{id}]",
    ...(configPath ? [`--suppressions-list=${configPath}`] : []),
    ...(stagedPath ? [stagedPath] : [])
  ],
  extract: (rawLine) =>
    extractSeverityTagged(rawLine, {
      error: "error",
      warning: "warning",
      style: "warning",
      performance: "warning",
      portability: "warning",
      information: "info"
    })
};

export const shellcheckAnalyzer: AnalyzerFamily = {
  id: "shellcheck",
  command: "shellcheck",
  input: "stdin",
  stream: "stdout",
  okExitCodes: [0, 1],
  buildArgs: (_stagedPath, configPath) => [
    "--format=gcc",
    "--shell=bash",
    ...(configPath ? ["--rcfile", configPath] : []),
    "-"
  ],
  extract: (rawLine) =>
    extractSeverityTagged(rawLine, {
      error: "error",
      warning: "warning",
      note: "info",
      style: "info"
    })
};

export const LANGUAGE_PROFILES: readonly LanguageProfile[] = [
  {
    id: "python",
    aliases: ["python", "py", "python3"],
    commentPrefix: "#",
    fileExtension: ".py",
    analyzer: flake8Analyzer
  },
  {
    id: "cpp",
    aliases: ["cpp", "c++", "cxx", "cc", "c"],
    commentPrefix: "//",
    fileExtension: ".cpp",
    analyzer: cppcheckAnalyzer
  },
  {
    id: "shell",
    aliases: ["shell", "sh", "bash"],
    commentPrefix: "#",
    fileExtension: ".sh",
    analyzer: shellcheckAnalyzer
  }
];

export function supportedLanguageIds(): string[] {
  return LANGUAGE_PROFILES.map((profile) => profile.id);
}

export function findLanguageProfile(tag: string): LanguageProfile | null {
  const normalized = tag.trim().toLowerCase();
  if (!normalized) {
    return null;
  }
  return LANGUAGE_PROFILES.find((profile) => profile.aliases.includes(normalized)) ?? null;
}

export function resolveLanguageProfile(language: string): LanguageProfile {
  const profile = findLanguageProfile(language);
  if (!profile) {
    throw new ConfigurationError(
      `unsupported language "${language}" (expected one of: ${supportedLanguageIds().join(", ")})`
    );
  }
  return profile;
}

export function matchesProfile(tag: string, profile: LanguageProfile): boolean {
  return profile.aliases.includes(tag.trim().toLowerCase());
}
