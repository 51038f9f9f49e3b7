import { scanMarkdownDocument } from "../core.mjs";
import type { MarkdownlintRule } from "../types.mjs";

export const codeBlockFenceRule: MarkdownlintRule = {
  names: ["CB002", "code-block-fence"],
  description: "Fenced code blocks must be closed",
  tags: ["code", "fences"],
  parser: "none",
  function: (params, onError) => {
    const lines = params.lines || [];
    if (!lines.length) {
      return;
    }

    const scan = scanMarkdownDocument(lines.join("\n"));
    for (const issue of scan.issues) {
      onError({
        lineNumber: issue.lineNumber,
        detail: issue.detail,
        context: (lines[issue.lineNumber - 1] ?? "").trim()
      });
    }
  }
};
