#!/usr/bin/env node
/**
 * skillroute CLI entry point
 */

import 'dotenv/config';
import { runCli } from './commands.js';
import { consoleOutput } from './ui.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    cwd: process.cwd(),
    env: process.env,
    output: consoleOutput,
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
