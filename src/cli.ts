#!/usr/bin/env node

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_STARTER_FILE } from './config/starter.js';
import { consoleMode } from './modes/console.js';
import { listMode } from './modes/list.js';
import type { SessionOptions } from './modes/bootstrap.js';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_TASK_TIMEOUT_MS } from './vsphere/task.js';

interface CommandOptions {
  config: string;
  host?: string;
  user?: string;
  verifyTls?: boolean;
  taskTimeout: number;
  pollInterval: number;
  verbose?: boolean;
}

function positiveInt(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
}

function withSessionOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Starter file with host= and user= lines', process.env.VCONSOLE_CONFIG || DEFAULT_STARTER_FILE)
    .option('--host <host>', 'vCenter host (overrides VCENTER_HOST and the starter file)')
    .option('--user <user>', 'vCenter user (overrides VCENTER_USER and the starter file)')
    .option('--verify-tls', 'Verify the vCenter TLS certificate (off by default)')
    .option('--task-timeout <seconds>', 'How long to wait for a vCenter task', positiveInt, DEFAULT_TASK_TIMEOUT_MS / 1000)
    .option('--poll-interval <ms>', 'Delay between task status checks', positiveInt, DEFAULT_POLL_INTERVAL_MS)
    .option('--verbose', 'Log every SOAP call');
}

function toSessionOptions(options: CommandOptions): SessionOptions {
  return {
    configPath: options.config,
    host: options.host,
    user: options.user,
    // Only an explicit flag overrides the environment and file.
    verifyTls: options.verifyTls ? true : undefined,
    pollIntervalMs: options.pollInterval,
    verbose: options.verbose ?? false,
  };
}

const program = new Command();

program
  .name('vconsole')
  .description('Interactive console for administering virtual machines on a vCenter server')
  .version('1.0.0');

withSessionOptions(
  program.command('console', { isDefault: true }).description('Menu-driven VM administration (default)')
).action(async (options: CommandOptions) => {
  await consoleMode({ ...toSessionOptions(options), taskTimeoutSeconds: options.taskTimeout });
});

withSessionOptions(
  program.command('list').description('Print the VM inventory table and exit').argument('[filter]', 'Case-insensitive name filter')
).action(async (filter: string | undefined, options: CommandOptions) => {
  await listMode(filter, toSessionOptions(options));
});

await program.parseAsync();
