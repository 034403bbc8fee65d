#!/usr/bin/env node
import { main, EXIT_FAILURE } from './cli.js';

main(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[MAIN] Fatal error:', err);
    process.exitCode = EXIT_FAILURE;
  });
