import { Command } from 'commander';
import { createKysely } from '../../db/index.js';
import { migrateDown, migrateToLatest } from '../../db/migrate.js';
import { success } from '../format.js';

export function registerDbCommands(program: Command): void {
  const db = program
    .command('db')
    .description('Database schema');

  db
    .command('migrate')
    .description('Apply pending migrations')
    .action(async () => {
      await migrateToLatest(createKysely());
      success('Database is up to date');
    });

  db
    .command('rollback')
    .description('Revert the latest migration')
    .action(async () => {
      await migrateDown(createKysely());
      success('Reverted one migration');
    });
}
