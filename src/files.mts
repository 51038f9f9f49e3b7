import fs from "node:fs";
import path from "node:path";
import { DEFAULT_EXCLUDED_SEGMENTS, DEFAULT_MARKDOWN_EXTENSIONS, IGNORED_DIRECTORIES } from "./constants.mjs";
import { toPosix } from "./core.mjs";
import { describeError } from "./errors.mjs";
import type { MarkdownDocument } from "./types.mjs";

export interface CollectOptions {
  extensions?: string[];
  exclude?: string[];
}

export function normalizeExtension(raw: string): string {
  const trimmed = raw.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export function isExcludedPath(relativePath: string, exclude: string[]): boolean {
  const segments = toPosix(relativePath).split("/");
  return segments.some((segment) => exclude.includes(segment));
}

function hasMarkdownExtension(fileName: string, extensions: string[]): boolean {
  const extension = path.extname(fileName).toLowerCase();
  return extensions.some((candidate) => candidate.toLowerCase() === extension);
}

export function collectMarkdownFiles(baseDir: string, options: CollectOptions = {}): string[] {
  const extensions = options.extensions ?? DEFAULT_MARKDOWN_EXTENSIONS;
  const exclude = options.exclude ?? DEFAULT_EXCLUDED_SEGMENTS;
  const root = path.resolve(baseDir);
  const found: string[] = [];
  const pending: string[] = [root];

  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const absolutePath = path.join(current, entry.name);
      const relativePath = path.relative(root, absolutePath);

      if (isExcludedPath(relativePath, exclude)) {
        continue;
      }

      if (entry.isDirectory()) {
        if (!IGNORED_DIRECTORIES.has(entry.name)) {
          pending.push(absolutePath);
        }
        continue;
      }

      if (entry.isFile() && hasMarkdownExtension(entry.name, extensions)) {
        found.push(absolutePath);
      }
    }
  }

  return found.sort((left, right) => left.localeCompare(right));
}

export function displayPath(absolutePath: string, cwd: string = process.cwd()): string {
  const relativePath = path.relative(cwd, absolutePath);
  if (!relativePath || relativePath.startsWith("..") || path.isAbsolute(relativePath)) {
    return toPosix(absolutePath);
  }
  return toPosix(relativePath);
}

export function readDocuments(filePaths: string[], cwd: string = process.cwd()): MarkdownDocument[] {
  return filePaths.map((filePath) => {
    const documentPath = displayPath(filePath, cwd);
    try {
      return { path: documentPath, text: fs.readFileSync(filePath, "utf8") };
    } catch (error) {
      return { path: documentPath, text: "", readError: describeError(error) };
    }
  });
}
