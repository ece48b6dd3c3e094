#!/usr/bin/env node
import { runCli } from "./run";

runCli(process.argv.slice(2), { stdin: process.stdin, stdout: process.stdout }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
