#!/usr/bin/env node
import { main } from "./cli.mjs";
import { describeError } from "./errors.mjs";

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    process.stderr.write(`error: ${describeError(error)}\n`);
    process.exitCode = 2;
  }
);
