#!/usr/bin/env node

/**
 * secret-router CLI
 * Resolve secret references across secret managers
 */

import { Command } from 'commander';
import { getCommand } from './commands/get';
import { describeCommand } from './commands/describe';
import { validateCommand } from './commands/validate';
import { providersCommand } from './commands/providers';
import { initCommand } from './commands/init';
import type { GlobalOptions } from './config';
import { readFileSync } from 'fs';
import { join } from 'path';

// Read version from package.json
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

const program = new Command();

program
  .name('secret-router')
  .description('Resolve secret references across cloud secret managers, password managers and CLI vaults')
  .version(version)
  .option('-c, --config <path>', 'Configuration file (default: ./secret-router.yaml or $SECRET_ROUTER_CONFIG)')
  .option('--debug', 'Print debug output to stderr');

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

program
  .command('get <reference>')
  .description('Print a secret value (reference: <provider>://<key>, or a key of the default provider)')
  .option('-p, --provider <name>', 'Read the whole reference as a key of this provider')
  .option('--json', 'Output as JSON')
  .action((reference: string, options: { provider?: string; json?: boolean }) =>
    getCommand(reference, { ...globals(), ...options })
  );

program
  .command('describe <reference>')
  .description('Show metadata for a secret without printing its value')
  .option('-p, --provider <name>', 'Read the whole reference as a key of this provider')
  .option('--json', 'Output as JSON')
  .action((reference: string, options: { provider?: string; json?: boolean }) =>
    describeCommand(reference, { ...globals(), ...options })
  );

program
  .command('validate [provider]')
  .description('Check credentials and connectivity of one or all providers')
  .option('--json', 'Output as JSON')
  .action((provider: string | undefined, options: { json?: boolean }) =>
    validateCommand(provider, { ...globals(), ...options })
  );

program
  .command('providers')
  .description('List configured providers')
  .option('--types', 'List supported provider types instead')
  .option('--json', 'Output as JSON')
  .action((options: { types?: boolean; json?: boolean }) => providersCommand({ ...globals(), ...options }));

program
  .command('init')
  .description('Create a configuration file with an example provider')
  .option('-t, --type <type>', 'Provider type (interactive if omitted)')
  .option('-n, --name <name>', 'Provider name')
  .option('-f, --force', 'Overwrite an existing configuration')
  .option('--json', 'Output as JSON')
  .action((options: { type?: string; name?: string; force?: boolean; json?: boolean }) =>
    initCommand({ config: globals().config, ...options })
  );

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
