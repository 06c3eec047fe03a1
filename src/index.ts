#!/usr/bin/env node
import { runCli } from "./cli";
import { errorMessage } from "./core/errors";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`mail-media-archiver: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  },
);
