import { sql } from 'drizzle-orm';
import type { SqlExecutor } from '../client.js';
import { CREDENTIALS_NAMESPACE } from '../schema/namespace.js';
import type { Migration } from './types.js';

const users = `"${CREDENTIALS_NAMESPACE}"."users"`;

/**
 * Migration 001: users table with its lookup and active-user indexes.
 */
const upStatements = [
  `CREATE TABLE IF NOT EXISTS ${users} (
    id          BIGINT GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
    username    VARCHAR(50) NOT NULL,
    email       VARCHAR(100) NOT NULL,
    password    VARCHAR(255) NOT NULL,
    full_name   VARCHAR(100),
    created_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
    last_login  TIMESTAMPTZ,
    is_active   BOOLEAN NOT NULL DEFAULT TRUE,
    role        VARCHAR(20) NOT NULL DEFAULT 'user',
    CONSTRAINT users_username_unique UNIQUE (username),
    CONSTRAINT users_email_unique UNIQUE (email)
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS users_username_lower_key ON ${users} (lower(username))`,
  `CREATE UNIQUE INDEX IF NOT EXISTS users_email_lower_key ON ${users} (lower(email))`,
  `CREATE INDEX IF NOT EXISTS idx_username ON ${users} (username)`,
  `CREATE INDEX IF NOT EXISTS idx_email ON ${users} (email)`,
  `CREATE INDEX IF NOT EXISTS idx_is_active ON ${users} (is_active)`,
  `CREATE INDEX IF NOT EXISTS idx_users_active ON ${users} (is_active, username)`,
];

const downStatements = [
  `DROP INDEX IF EXISTS "${CREDENTIALS_NAMESPACE}".idx_users_active`,
  `DROP INDEX IF EXISTS "${CREDENTIALS_NAMESPACE}".idx_is_active`,
  `DROP INDEX IF EXISTS "${CREDENTIALS_NAMESPACE}".idx_email`,
  `DROP INDEX IF EXISTS "${CREDENTIALS_NAMESPACE}".idx_username`,
  `DROP TABLE IF EXISTS ${users}`,
];

async function run(db: SqlExecutor, statements: readonly string[]): Promise<void> {
  for (const statement of statements) {
    await db.execute(sql.raw(statement));
  }
}

export const createUsers: Migration = {
  version: 1,
  name: 'create_users',
  up: (db) => run(db, upStatements),
  down: (db) => run(db, downStatements),
};
