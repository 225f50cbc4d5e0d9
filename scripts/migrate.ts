#!/usr/bin/env tsx
/**
 * Database Migration Script
 * Run with: npm run db:migrate
 */

import 'dotenv/config';
import { getDbPath, openDatabase } from '../src/config/database.js';
import { createLogger } from '../src/utils/logger.js';

const logger = createLogger('migrate');
const dbPath = getDbPath();

logger.info({ dbPath }, '[Migration] Opening database');
const { sqlite } = openDatabase(dbPath);

const tables = sqlite
  .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`)
  .pluck()
  .all();

logger.info({ tables }, '[Migration] Schema applied');
sqlite.close();
logger.info('[Migration] Complete!');
