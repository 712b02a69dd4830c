// Core package - shared types and the position ledger
// This is the single source of truth for how trades become positions

export * from './types.js';
export * from './decimal.js';
export * from './validation.js';
export * from './settings.js';
export * from './positions.js';
export * from './repository.js';
