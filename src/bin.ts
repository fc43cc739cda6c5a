#!/usr/bin/env node
import { runCli } from "./cli.js";
import { errorMessage } from "./errors.js";

runCli(process.argv.slice(2))
  .then(({ exitCode, output }) => {
    if (output) (exitCode === 0 ? process.stdout : process.stderr).write(`${output}\n`);
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    console.error(`[vuln-risk] ${errorMessage(err)}`);
    process.exitCode = 1;
  });
