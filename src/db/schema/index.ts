// ============================================
// VOTESHIELD - Schema Barrel Export
// ============================================

export * from './polls.js';
export * from './votes.js';
export * from './fraud.js';
export * from './notifications.js';
