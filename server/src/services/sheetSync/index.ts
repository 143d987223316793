/**
 * Shipment sheet sync — barrel file
 */

import { pullSync } from './pullSync.js';
import { writeBackShipment, assignPmLocation } from './writeBack.js';
import { archiveSweep } from './archiveSweep.js';
import { createSheetSyncContext } from './context.js';

export { pullSync, extractIncomingRows, SKIP_UNREADABLE_SHEETS } from './pullSync.js';
export { writeBackShipment, assignPmLocation } from './writeBack.js';
export { archiveSweep } from './archiveSweep.js';
export { createSheetSyncContext, createSyncRunStore } from './context.js';
export { getWorksheetRegistry } from './worksheetRegistry.js';

export type {
    SheetSyncDeps,
    SheetSource,
    SheetDocument,
    Worksheet,
    WorksheetInfo,
    RepeatCellRequest,
    TextStyle,
    PullSyncResult,
    WriteBackResult,
    AssignPmLocationResult,
    FieldWriteResult,
    ArchiveSweepResult,
    ArchivedRow,
} from './types.js';

export default {
    pullSync,
    writeBackShipment,
    assignPmLocation,
    archiveSweep,
    createSheetSyncContext,
};
