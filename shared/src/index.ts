/**
 * @shipsync/shared - domain logic and schemas for the shipment sheet sync
 *
 * Nothing in this package touches the network or the database.
 */

export * from './domain/index.js';
export * from './schemas/index.js';
