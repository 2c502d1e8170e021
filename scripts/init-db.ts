#!/usr/bin/env tsx
import { DATABASE_CONFIG } from '../config';
import { createDatabase } from '../lib/db';

const dbPath = DATABASE_CONFIG.url.replace('file:', '');

console.log('Initializing database at:', dbPath);

// createDatabase runs CREATE TABLE IF NOT EXISTS for every table
const { sqlite } = createDatabase(dbPath);

const tables = sqlite
  .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
  .all();

console.log('Tables:', tables);
sqlite.close();

console.log('Database initialized successfully!');
