#!/usr/bin/env node

import { runCLI } from './cli.js';

async function main(): Promise<void> {
  process.exitCode = await runCLI(process.argv.slice(2));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
