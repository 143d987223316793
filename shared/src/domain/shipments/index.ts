export * from './fields.js';
export * from './identity.js';
