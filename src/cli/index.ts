#!/usr/bin/env node
/**
 * schema-ledger CLI entry point
 */

import { runCli } from './commands.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch(error => {
  console.error(`  [ERROR] Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  if (process.env.DEBUG === 'true') {
    console.error(error);
  }
  process.exit(1);
});
