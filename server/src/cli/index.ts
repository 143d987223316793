#!/usr/bin/env node

import { Command } from 'commander';
import { registerSyncCommands } from './commands/sync.js';
import { registerDbCommands } from './commands/db.js';
import { destroyKysely } from '../db/index.js';
import { isCustomError } from '../utils/errors.js';
import { error } from './format.js';

const program = new Command();

program
  .name('shipsync')
  .description('Shipment spreadsheet sync — pull, write-back, archive')
  .version('1.0.0');

registerSyncCommands(program);
registerDbCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');

try {
  await program.parseAsync(args);
} catch (err: unknown) {
  const label = isCustomError(err) ? err.name : 'Error';
  error(`${label}: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
} finally {
  await destroyKysely();
}
