#!/usr/bin/env node
import { docCommand } from '../src/cli/commands/docCommand';
import { createLogger, serializeError } from '../src/core/log';

const VERSION = 'odindoc 0.1.0';

async function main(): Promise<void> {
  const program = docCommand.version(VERSION, '-v, --version', 'Print the version');
  await program.parseAsync(process.argv);
}

main().catch((e: unknown) => {
  createLogger({ component: 'bin' }).error('fatal', { err: serializeError(e) });
  process.stderr.write(`odindoc: ${e instanceof Error ? e.message : String(e)}\n`);
  process.exitCode = 1;
});
