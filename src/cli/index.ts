#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { listCommand } from './commands/list.js';
import { hostCommand } from './commands/host.js';
import { validateCommand } from './commands/validate.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('one-inventory')
  .description('Ansible-style dynamic inventory for OpenNebula virtual machines')
  .version(packageJson.version)
  .option('-v, --verbose', 'Increase diagnostic output (repeat up to -vvvv)', increaseVerbosity, 0);

const VERBOSE_DESC = 'Increase diagnostic output (repeat up to -vvvv)';

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Merge the global -v count into command-level options.
 * Supports both positions:
 *   one-inventory -vv list file    (parent parses -v)
 *   one-inventory list file -vv    (subcommand parses -v)
 */
function withGlobalOpts<T extends { verbose?: number }>(opts: T): T & { verbose: number } {
  const globalOpts = program.opts<{ verbose?: number }>();
  return { ...opts, verbose: (opts.verbose ?? 0) + (globalOpts.verbose ?? 0) };
}

program
  .command('list <file>')
  .description('Query OpenNebula and print the inventory')
  .option('--json', 'Print the Ansible inventory document')
  .option('--refresh-cache', 'Ignore cached results and query OpenNebula')
  .option('-v, --verbose', VERBOSE_DESC, increaseVerbosity, 0)
  .action((file: string, opts: { json?: boolean; refreshCache?: boolean; verbose?: number }) =>
    listCommand(file, withGlobalOpts(opts))
  );

program
  .command('host <file> <hostname>')
  .description('Print the variables of one host')
  .option('--json', 'Output as JSON')
  .option('-v, --verbose', VERBOSE_DESC, increaseVerbosity, 0)
  .action((file: string, hostname: string, opts: { json?: boolean; verbose?: number }) =>
    hostCommand(file, hostname, withGlobalOpts(opts))
  );

program
  .command('validate <file>')
  .description('Validate an inventory file without contacting OpenNebula')
  .option('--json', 'Output as JSON')
  .action(validateCommand);

await program.parseAsync();
