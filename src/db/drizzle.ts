// ============================================
// VOTESHIELD - Drizzle Instance
// ============================================

import { openDatabase, getDbPath } from '../config/database.js';
import type { DrizzleDb, DatabaseHandle } from '../config/database.js';

export { openDatabase, getDbPath };
export type { DrizzleDb, DatabaseHandle };

// Re-export schema for convenience
export * as schema from './schema/index.js';
