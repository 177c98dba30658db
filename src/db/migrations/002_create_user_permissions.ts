import { sql } from 'drizzle-orm';
import type { SqlExecutor } from '../client.js';
import { CREDENTIALS_NAMESPACE } from '../schema/namespace.js';
import type { Migration } from './types.js';

const permissions = `"${CREDENTIALS_NAMESPACE}"."user_permissions"`;

/**
 * Migration 002: per-database grants. Rows follow renames and deletions of
 * the user they belong to.
 */
const upStatements = [
  `CREATE TABLE IF NOT EXISTS ${permissions} (
    id               BIGINT GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
    username         VARCHAR(50) NOT NULL,
    database_name    VARCHAR(63) NOT NULL,
    permission_type  VARCHAR(10) NOT NULL,
    granted_at       TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT user_permissions_username_fk FOREIGN KEY (username)
      REFERENCES "${CREDENTIALS_NAMESPACE}"."users" (username) ON DELETE CASCADE ON UPDATE CASCADE,
    CONSTRAINT user_permissions_type_check CHECK (permission_type IN ('INSERT', 'DELETE', 'UPDATE', 'CREATE')),
    CONSTRAINT user_permissions_grant_unique UNIQUE (username, database_name, permission_type)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_user_permissions_user_db ON ${permissions} (username, database_name)`,
];

const downStatements = [
  `DROP INDEX IF EXISTS "${CREDENTIALS_NAMESPACE}".idx_user_permissions_user_db`,
  `DROP TABLE IF EXISTS ${permissions}`,
];

async function run(db: SqlExecutor, statements: readonly string[]): Promise<void> {
  for (const statement of statements) {
    await db.execute(sql.raw(statement));
  }
}

export const createUserPermissions: Migration = {
  version: 2,
  name: 'create_user_permissions',
  up: (db) => run(db, upStatements),
  down: (db) => run(db, downStatements),
};
