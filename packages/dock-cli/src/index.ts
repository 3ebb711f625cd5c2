#!/usr/bin/env node
import { runDockCli } from './dockCli';

runDockCli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Unexpected error: ${message}\n`);
    process.exitCode = 1;
  });
