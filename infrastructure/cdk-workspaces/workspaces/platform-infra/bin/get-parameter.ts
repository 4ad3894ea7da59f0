#!/usr/bin/env node
import { runGetParameter } from 'lib/cli/get-parameter-command';

runGetParameter(process.argv.slice(2)).catch((error: unknown) => {
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
  process.exitCode = 1;
});
