/**
 * Domain Layer
 *
 * Pure spreadsheet and shipment logic shared by the sync engine, scripts and tests.
 */

export * from './sheets/index.js';
export * from './shipments/index.js';
