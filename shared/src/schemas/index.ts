/**
 * Shared Zod schemas for shipment sync inputs
 */

export * from './shipments.js';
