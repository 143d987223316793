export * from './a1.js';
export * from './headers.js';
export * from './sheetDates.js';
