import childProcess from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Analyzer, AnalyzerOutput, LintRequest } from "./types.mjs";

function stagedBaseName(documentPath: string): string {
  const baseName = path.basename(documentPath, path.extname(documentPath));
  return baseName.replace(/[^A-Za-z0-9_.-]/g, "_") || "snippet";
}

export function runAnalyzerProcess(
  command: string,
  args: string[],
  request: LintRequest,
  input: string
): Promise<AnalyzerOutput> {
  const family = request.profile.analyzer;

  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let failure: string | undefined;
    let settled = false;

    const child = childProcess.spawn(command, args);

    const kill = (reason: string): void => {
      failure ??= reason;
      child.kill("SIGKILL");
    };
    const onAbort = (): void => kill("aborted");
    const timer = setTimeout(() => kill(`timed out after ${request.timeoutMs} ms`), request.timeoutMs);

    const finish = (output: AnalyzerOutput): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onAbort);
      resolve(output);
    };

    if (request.signal?.aborted) {
      onAbort();
    } else {
      request.signal?.addEventListener("abort", onAbort, { once: true });
    }

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      finish({
        text: "",
        exitCode: null,
        signal: null,
        failure: `failed to run ${command}: ${error.message}`
      });
    });

    child.on("close", (exitCode, signal) => {
      if (!failure && exitCode !== null && !family.okExitCodes.includes(exitCode)) {
        const detail = (stderr || stdout).trim() || "no output";
        failure = `${command} exited with status ${exitCode}: ${detail}`;
      }
      if (!failure && exitCode === null && signal) {
        failure = `${command} terminated by ${signal}`;
      }

      const output: AnalyzerOutput = {
        text: family.stream === "stdout" ? stdout : stderr,
        exitCode,
        signal
      };
      if (failure) {
        output.failure = failure;
      }
      finish(output);
    });

    // The tool may exit before reading its input; its exit status is reported instead.
    child.stdin.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code !== "EPIPE") {
        failure ??= `failed to write to ${command}: ${error.message}`;
      }
    });
    child.stdin.end(input, "utf8");
  });
}

export class ProcessAnalyzer implements Analyzer {
  async lint(request: LintRequest): Promise<AnalyzerOutput> {
    const family = request.profile.analyzer;

    if (family.input === "stdin") {
      return runAnalyzerProcess(
        family.command,
        family.buildArgs(null, request.configPath),
        request,
        request.buffer.text
      );
    }

    const stagingDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "markdownlint-codeblocks-"));
    const stagedPath = path.join(
      stagingDir,
      `${stagedBaseName(request.documentPath)}${request.profile.fileExtension}`
    );

    try {
      await fs.promises.writeFile(stagedPath, request.buffer.text, "utf8");
      return await runAnalyzerProcess(
        family.command,
        family.buildArgs(stagedPath, request.configPath),
        request,
        ""
      );
    } finally {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
    }
  }
}
