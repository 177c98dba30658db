// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as userSchema from './schema/users.js';
import * as permissionSchema from './schema/permissions.js';
import * as migrationSchema from './schema/migrations.js';

export const schema = {
  ...userSchema,
  ...permissionSchema,
  ...migrationSchema,
};

export type Schema = typeof schema;

/**
 * Driver-neutral handle: postgres.js in production, any other drizzle
 * PostgreSQL driver (such as an in-process one) elsewhere.
 */
export type Database = PgDatabase<PgQueryResultHKT, Schema>;

/** Anything statements can be issued on: the database or an open transaction. */
export type SqlExecutor = Pick<Database, 'execute'>;

let _client: ReturnType<typeof postgres> | null = null;
let _db: Database | null = null;

// postgres.js opens connections on demand and closes idle ones, so only the ceiling is configurable.
export function createDatabaseClient(url: string, poolMax = 5): Database {
  _client = postgres(url, {
    max: poolMax,
    idle_timeout: 20,
    max_lifetime: 60 * 30,
    connect_timeout: 10,
    prepare: true,
    // IF NOT EXISTS statements raise "already exists, skipping" notices on every run
    onnotice: () => undefined,
    connection: {
      application_name: 'credentials-store',
    },
  });

  _db = drizzle(_client, { schema });
  return _db;
}

export function getDb(): Database {
  if (!_db) {
    throw new Error('Database not initialized. Call createDatabaseClient() first.');
  }
  return _db;
}

export async function closeDatabaseClient(): Promise<void> {
  if (_client) {
    await _client.end();
    _client = null;
    _db = null;
  }
}
