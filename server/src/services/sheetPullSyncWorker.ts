/**
 * Scheduled Sheet Pull Sync
 *
 * Mirrors the shipment spreadsheet into the database on a fixed interval.
 * Each run is recorded in sheet_sync_runs; a run already in progress makes
 * new triggers return null. Disabled unless ENABLE_SHEET_PULL_SYNC=true.
 */

import {
    ENABLE_SHEET_PULL_SYNC,
    SHEET_PULL_SYNC_INTERVAL_MS,
} from '../config/sync/sheets.js';
import type { SyncRunStore } from '../db/queries/syncRuns.js';
import type { SyncRunTrigger } from '../db/schema.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { syncLogger } from '../utils/logger.js';
import { cleanupStaleRuns, trackSyncRun } from '../utils/syncRunTracker.js';
import { createSheetSyncContext, createSyncRunStore } from './sheetSync/context.js';
import { pullSync } from './sheetSync/pullSync.js';
import { getWorksheetRegistry } from './sheetSync/worksheetRegistry.js';
import type { PullSyncResult } from './sheetSync/types.js';

const log = syncLogger.child({ worker: 'sheetPullSync' });

// ============================================
// TYPES & INTERFACES
// ============================================

interface RunSummary {
    startedAt: string;
    durationMs: number;
    result: PullSyncResult | null;
    /** Configuration missing: nothing was attempted */
    skipped: boolean;
    error: string | null;
}

interface PullSyncStatus {
    isRunning: boolean;
    schedulerActive: boolean;
    intervalMinutes: number;
    lastSyncAt: Date | null;
    recentRuns: RunSummary[];
    worksheets: ReturnType<typeof getWorksheetRegistry>;
}

// ============================================
// STATE MANAGEMENT
// ============================================

const JOB_NAME = 'sheet_pull_sync';
const MAX_RECENT_RUNS = 10;

let syncInterval: NodeJS.Timeout | null = null;
let isRunning = false;
let lastSyncAt: Date | null = null;
const recentRuns: RunSummary[] = [];

function pushRecentRun(summary: RunSummary): void {
    recentRuns.unshift(summary);
    if (recentRuns.length > MAX_RECENT_RUNS) recentRuns.length = MAX_RECENT_RUNS;
}

function runStoreOrNull(): SyncRunStore | null {
    try {
        return createSyncRunStore();
    } catch (error: unknown) {
        log.warn({ error: errorMessage(error) }, 'Sync run log unavailable, running untracked');
        return null;
    }
}

// ============================================
// CORE SYNC LOGIC
// ============================================

async function runPullSync(trigger: SyncRunTrigger): Promise<RunSummary | null> {
    if (isRunning) {
        log.debug('Pull sync already in progress, skipping');
        return null;
    }

    isRunning = true;
    const startTime = Date.now();
    const summary: RunSummary = {
        startedAt: new Date(startTime).toISOString(),
        durationMs: 0,
        result: null,
        skipped: false,
        error: null,
    };

    try {
        summary.result = await trackSyncRun(
            runStoreOrNull(),
            JOB_NAME,
            () => pullSync(createSheetSyncContext()),
            trigger
        );
        lastSyncAt = new Date();
    } catch (error: unknown) {
        summary.error = errorMessage(error);
        if (error instanceof ConfigurationError) {
            summary.skipped = true;
            log.warn({ error: summary.error }, 'Pull sync skipped: not configured');
        } else {
            log.error({ error: summary.error }, 'Pull sync failed');
        }
    } finally {
        isRunning = false;
    }

    summary.durationMs = Date.now() - startTime;
    pushRecentRun(summary);
    return summary;
}

// ============================================
// SCHEDULER CONTROL
// ============================================

function start(): void {
    if (!ENABLE_SHEET_PULL_SYNC) {
        log.info('Sheet pull sync disabled (ENABLE_SHEET_PULL_SYNC != true)');
        return;
    }
    if (syncInterval) {
        log.debug('Scheduler already running');
        return;
    }

    log.info({ intervalMinutes: SHEET_PULL_SYNC_INTERVAL_MS / (60 * 1000) }, 'Starting scheduler');

    const store = runStoreOrNull();
    const startup = store ? cleanupStaleRuns(store) : Promise.resolve();
    startup
        .then(() => runPullSync('startup'))
        .catch(error => log.error({ error: errorMessage(error) }, 'Startup pull sync failed'));

    syncInterval = setInterval(() => {
        runPullSync('scheduled')
            .catch(error => log.error({ error: errorMessage(error) }, 'Scheduled pull sync failed'));
    }, SHEET_PULL_SYNC_INTERVAL_MS);
}

function stop(): void {
    if (syncInterval) {
        clearInterval(syncInterval);
        syncInterval = null;
        log.info('Scheduler stopped');
    }
}

function getStatus(): PullSyncStatus {
    return {
        isRunning,
        schedulerActive: !!syncInterval,
        intervalMinutes: SHEET_PULL_SYNC_INTERVAL_MS / (60 * 1000),
        lastSyncAt,
        recentRuns: [...recentRuns],
        worksheets: getWorksheetRegistry(),
    };
}

/**
 * Manually trigger a pull sync
 */
async function triggerSync(): Promise<RunSummary | null> {
    return runPullSync('manual');
}

// ============================================
// EXPORTS
// ============================================

export default {
    start,
    stop,
    getStatus,
    triggerSync,
};

export type {
    RunSummary,
    PullSyncStatus,
};
