import { Command } from 'commander';
import { DEFAULT_ARCHIVE_THRESHOLD_DAYS, PLAN_PROFILE, SHIPMENTS_PROFILE } from '../../config/sync/sheets.js';
import {
  archiveSweep,
  assignPmLocation,
  createSheetSyncContext,
  pullSync,
  writeBackShipment,
  type WriteBackResult,
} from '../../services/sheetSync/index.js';
import { heading, field, success, warn, error, json, writeStatusColor } from '../format.js';
import { collectFieldAssignment, parseNonNegativeInt } from '../options.js';

function printWriteBack(result: WriteBackResult): void {
  heading(`Shipment ${result.shipmentNo}`);
  field('Created', result.created);
  field('Updated records', result.updatedCount);
  field('Sheet', result.sheetTitle);
  field('Row', result.sheetRow);
  field('Cell', result.sheetCell);
  field('Position fixed', result.correctedPosition);
  if (result.remoteSkipped) warn('Spreadsheet not touched (--skip-remote)');

  for (const write of result.fieldResults) {
    const label = write.derived ? `${write.field} (auto)` : write.field;
    console.log(`  ${label.padEnd(24)} ${writeStatusColor(write.status)}  ${write.value ?? ''}`);
  }
  for (const message of result.errors) error(message);
}

export function registerSyncCommands(program: Command): void {
  const sync = program
    .command('sync')
    .description('Spreadsheet ↔ database sync operations');

  sync
    .command('pull')
    .description('Mirror the spreadsheet into the shipments table')
    .option('--plan', 'Read "Plan MOS" tabs instead of shipment tabs')
    .option('--json', 'Print the raw result')
    .action(async (opts: { plan?: boolean; json?: boolean }) => {
      const result = await pullSync(createSheetSyncContext(), opts.plan ? PLAN_PROFILE : SHIPMENTS_PROFILE);
      if (opts.json) return json(result);

      heading('Pull sync');
      field('Rows read', result.total);
      field('Created', result.created);
      field('Updated', result.updated);
      field('Soft-deleted', result.softDeleted);
      success('Done');
    });

  sync
    .command('archive')
    .description('Dim delivered plan rows older than the threshold')
    .option('-d, --days <n>', 'Threshold in days', parseNonNegativeInt, DEFAULT_ARCHIVE_THRESHOLD_DAYS)
    .option('--json', 'Print the raw result')
    .action(async (opts: { days: number; json?: boolean }) => {
      const result = await archiveSweep(createSheetSyncContext(), { thresholdDays: opts.days });
      if (opts.json) return json(result);

      heading(`Archive sweep (before ${result.thresholdDate})`);
      field('Sheets', result.sheetsProcessed.join(', ') || null);
      field('Matched rows', result.matchedRows);
      field('Formatted rows', result.formattedRows);
      for (const message of result.errors) error(message);
    });

  sync
    .command('write-back <shipmentNo>')
    .description('Write field values for one shipment to the database and sheet')
    .option('-f, --field <key=value>', 'Field to set (repeatable)', collectFieldAssignment, {})
    .option('--skip-remote', 'Update the database only')
    .option('--json', 'Print the raw result')
    .action(async (shipmentNo: string, opts: { field: Record<string, string>; skipRemote?: boolean; json?: boolean }) => {
      const result = await writeBackShipment(createSheetSyncContext(), {
        shipmentNo,
        fields: opts.field,
        options: { skipRemote: opts.skipRemote ?? false },
      });
      if (opts.json) return json(result);
      printWriteBack(result);
    });

  sync
    .command('assign-pm <orderName> <pmLocation>')
    .description('Set the PM location of every shipment of an order')
    .option('--skip-remote', 'Update the database only')
    .option('--json', 'Print the raw result')
    .action(async (orderName: string, pmLocation: string, opts: { skipRemote?: boolean; json?: boolean }) => {
      const result = await assignPmLocation(createSheetSyncContext(), {
        orderName,
        pmLocation,
        options: { skipRemote: opts.skipRemote ?? false },
      });
      if (opts.json) return json(result);
      printWriteBack(result);
      field('Shipments', result.shipmentNos.join(', '));
    });
}
