import { NOLINT_KEYWORD } from "./constants.mjs";
import { matchesProfile } from "./languages.mjs";
import type {
  CodeSegment,
  FenceDelimiter,
  FenceIssue,
  FenceMarker,
  LanguageProfile,
  ReconstructResult,
  ScanResult,
  Segment,
  SyntheticBuffer
} from "./types.mjs";

const FENCE_PATTERN = /^([ \t]*)(`{3,}|~{3,})(.*)$/;

export function normalizeNewlines(value: string): string {
  return value.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

export function toPosix(value: string): string {
  return value.replace(/\\/g, "/");
}

export function detectLineSeparator(value: string): string {
  return value.includes("\r\n") ? "\r\n" : "\n";
}

export function splitLines(value: string): string[] {
  return normalizeNewlines(value).split("\n");
}

export function lineCount(value: string): number {
  return splitLines(value).length;
}

export function parseFenceLine(line: string): FenceDelimiter | null {
  const match = line.match(FENCE_PATTERN);
  if (!match) {
    return null;
  }

  const sequence = match[2] ?? "";
  const marker: FenceMarker = sequence.startsWith("`") ? "`" : "~";
  const infoText = (match[3] ?? "").trim();

  // A backtick in a backtick fence's info string makes the line inline code.
  if (marker === "`" && infoText.includes("`")) {
    return null;
  }

  return {
    marker,
    length: sequence.length,
    indent: match[1] ?? "",
    infoText
  };
}

function isClosingFence(line: string, opener: FenceDelimiter): boolean {
  const candidate = parseFenceLine(line);
  return (
    candidate !== null &&
    candidate.marker === opener.marker &&
    candidate.length >= opener.length &&
    candidate.indent.length === opener.indent.length &&
    candidate.infoText === ""
  );
}

export function parseInfoText(infoText: string): { language: string; exempt: boolean } {
  const words = infoText
    .split(/\s+/)
    .map((word) => word.toLowerCase())
    .filter((word) => word.length > 0);

  const language = words[0] ?? "";
  if (language === NOLINT_KEYWORD) {
    return { language: "", exempt: true };
  }

  return {
    language,
    exempt: words.slice(1).includes(NOLINT_KEYWORD)
  };
}

function stripIndent(line: string, indent: string): string {
  return indent && line.startsWith(indent) ? line.slice(indent.length) : line;
}

export function scanMarkdownDocument(content: string): ScanResult {
  const lineSeparator = detectLineSeparator(content);
  const lines = splitLines(content);
  const segments: Segment[] = [];
  const issues: FenceIssue[] = [];

  let prose: string[] = [];
  let proseStart = 1;

  const appendProse = (entries: string[], lineNumber: number): void => {
    if (prose.length === 0) {
      proseStart = lineNumber;
    }
    prose.push(...entries);
  };

  const flushProse = (): void => {
    if (prose.length > 0) {
      segments.push({ kind: "prose", startLineNumber: proseStart, lines: prose });
      prose = [];
    }
  };

  let index = 0;
  while (index < lines.length) {
    const line = lines[index] ?? "";
    const opener = parseFenceLine(line);
    if (!opener) {
      appendProse([line], index + 1);
      index += 1;
      continue;
    }

    let closeIndex = -1;
    for (let candidate = index + 1; candidate < lines.length; candidate += 1) {
      if (isClosingFence(lines[candidate] ?? "", opener)) {
        closeIndex = candidate;
        break;
      }
    }

    if (closeIndex < 0) {
      issues.push({
        lineNumber: index + 1,
        detail: "unterminated fenced code block"
      });
      appendProse(lines.slice(index), index + 1);
      break;
    }

    flushProse();

    const body = lines.slice(index + 1, closeIndex);
    const info = parseInfoText(opener.infoText);
    const segment: CodeSegment = {
      kind: "code",
      startLineNumber: index + 1,
      openingFence: line,
      body,
      code: body.map((bodyLine) => stripIndent(bodyLine, opener.indent)),
      closingFence: lines[closeIndex] ?? "",
      fence: opener,
      infoText: opener.infoText,
      language: info.language,
      exempt: info.exempt
    };
    segments.push(segment);

    index = closeIndex + 1;
  }

  flushProse();

  return { lines, lineSeparator, segments, issues };
}

export function segmentLines(segment: Segment): string[] {
  if (segment.kind === "prose") {
    return segment.lines;
  }
  return [segment.openingFence, ...segment.body, segment.closingFence];
}

export function commentLine(prefix: string, line: string, neutralize?: (text: string) => string): string {
  const trimmed = line.trimEnd();
  if (!trimmed) {
    return prefix;
  }
  return `${prefix} ${neutralize ? neutralize(trimmed) : trimmed}`;
}

export function isLintedSegment(segment: Segment, profile: LanguageProfile): boolean {
  return segment.kind === "code" && !segment.exempt && matchesProfile(segment.language, profile);
}

export function renderSyntheticBuffer(scan: ScanResult, profile: LanguageProfile): SyntheticBuffer {
  const prefix = profile.commentPrefix;
  const neutralize = profile.analyzer.neutralize;
  const output: string[] = [];
  let lintedLineCount = 0;

  for (const segment of scan.segments) {
    if (segment.kind === "prose") {
      output.push(...segment.lines.map((line) => commentLine(prefix, line, neutralize)));
      continue;
    }

    const linted = isLintedSegment(segment, profile);
    output.push(prefix);
    for (const codeLine of segment.code) {
      if (linted) {
        output.push(codeLine);
        if (codeLine.trim()) {
          lintedLineCount += 1;
        }
      } else {
        output.push(commentLine(prefix, codeLine, neutralize));
      }
    }
    output.push(prefix);
  }

  // The buffer always ends in exactly one separator. A document that already does
  // has an empty last line, which stays empty instead of becoming a comment.
  const endsWithSeparator = scan.lines.length > 1 && scan.lines[scan.lines.length - 1] === "";
  if (endsWithSeparator) {
    output[output.length - 1] = "";
  }
  const joined = output.join(scan.lineSeparator);

  return {
    language: profile.id,
    text: endsWithSeparator ? joined : `${joined}${scan.lineSeparator}`,
    lines: output,
    lineSeparator: scan.lineSeparator,
    lintedLineCount
  };
}

export function reconstructBuffer(scan: ScanResult, profile: LanguageProfile): ReconstructResult {
  const buffer = renderSyntheticBuffer(scan, profile);
  if (buffer.lintedLineCount === 0) {
    return { kind: "skip", reason: "no-applicable-content" };
  }
  return { kind: "buffer", buffer };
}
