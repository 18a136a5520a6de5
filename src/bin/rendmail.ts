#!/usr/bin/env node
import { runCli } from '../cli.js';

runCli(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
})
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    console.error('rendmail:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
