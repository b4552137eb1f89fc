// ──────────────────────────────────────────
// Knex configuration
// ──────────────────────────────────────────

import dotenv from 'dotenv';
import path from 'path';
import { Knex } from 'knex';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export const MIGRATIONS_DIR = path.resolve(__dirname, 'migrations');

const config: Knex.Config = {
  client: 'pg',
  connection: process.env.DATABASE_URL,
  migrations: {
    directory: MIGRATIONS_DIR,
    extension: 'ts',
  },
};

export default config;
