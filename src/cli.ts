#!/usr/bin/env node

import { runCli } from './cli/run.js';

runCli(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(err instanceof Error && err.stack ? err.stack : String(err));
    process.exit(1);
  });
