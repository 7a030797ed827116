#!/usr/bin/env node
import { runCli } from './cli.js';
import { printError } from './utils/logger.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err: unknown) => {
  printError(
    `Unexpected error: ${err instanceof Error ? err.message : String(err)}`,
  );
  process.exit(1);
});
