import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { sql } from 'drizzle-orm';
import { getTableConfig, type PgTable } from 'drizzle-orm/pg-core';
import { Migrator, migrations, validateRegistry, type Migration } from '../index.js';
import { userPermissions } from '../../schema/permissions.js';
import { users } from '../../schema/users.js';
import { MigrationError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/logger.js';
import { createTestDatabase, type TestDatabase } from '../../../../tests/helpers/database.js';

const logger = createLogger('silent');

function noopMigration(version: number, name = `m${version}`): Migration {
  return { version, name, up: async () => undefined, down: async () => undefined };
}

async function tableExists(db: TestDatabase['db'], name: string): Promise<boolean> {
  const rows = await db
    .select({ name: sql<string>`table_name` })
    .from(sql`information_schema.tables`)
    .where(sql`table_schema = 'backmeup_system' and table_name = ${name}`);
  return rows.length === 1;
}

// Indexes that do not back a primary key or unique constraint.
async function plainIndexes(db: TestDatabase['db'], table: string): Promise<string[]> {
  const rows = await db
    .select({ name: sql<string>`c.relname`, unique: sql<boolean>`i.indisunique` })
    .from(
      sql`pg_catalog.pg_index i
        join pg_catalog.pg_class c on c.oid = i.indexrelid
        join pg_catalog.pg_class t on t.oid = i.indrelid
        join pg_catalog.pg_namespace n on n.oid = t.relnamespace`,
    )
    .where(
      sql`n.nspname = 'backmeup_system' and t.relname = ${table} and not exists (
        select 1 from pg_catalog.pg_constraint k where k.conindid = i.indexrelid and k.conrelid = i.indrelid
      )`,
    );
  return rows.map((r) => `${r.name}:${r.unique}`).sort();
}

async function uniqueConstraints(db: TestDatabase['db'], table: string): Promise<string[]> {
  const rows = await db
    .select({ name: sql<string>`k.conname` })
    .from(
      sql`pg_catalog.pg_constraint k
        join pg_catalog.pg_class t on t.oid = k.conrelid
        join pg_catalog.pg_namespace n on n.oid = t.relnamespace`,
    )
    .where(sql`n.nspname = 'backmeup_system' and t.relname = ${table} and k.contype = 'u'`);
  return rows.map((r) => r.name).sort();
}

async function columnNames(db: TestDatabase['db'], table: string): Promise<string[]> {
  const rows = await db
    .select({ name: sql<string>`column_name` })
    .from(sql`information_schema.columns`)
    .where(sql`table_schema = 'backmeup_system' and table_name = ${table}`);
  return rows.map((r) => r.name).sort();
}

function declared(table: PgTable) {
  const config = getTableConfig(table);
  return {
    name: config.name,
    columns: config.columns.map((c) => c.name).sort(),
    indexes: config.indexes.map((i) => `${i.config.name}:${i.config.unique}`).sort(),
    uniques: [
      ...config.columns.flatMap((c) => (c.isUnique && c.uniqueName ? [c.uniqueName] : [])),
      ...config.uniqueConstraints.map((u) => u.getName()),
    ].sort(),
  };
}

describe('validateRegistry', () => {
  it('accepts the shipped registry', () => {
    expect(() => validateRegistry(migrations)).not.toThrow();
  });

  it('rejects duplicate versions', () => {
    expect(() => validateRegistry([noopMigration(1), noopMigration(1, 'again')])).toThrow(
      'Duplicate migration version 1',
    );
  });

  it('rejects versions out of order', () => {
    expect(() => validateRegistry([noopMigration(2), noopMigration(1)])).toThrow(MigrationError);
  });

  it('rejects non-positive versions', () => {
    expect(() => validateRegistry([noopMigration(0)])).toThrow('Invalid migration version 0 (m0)');
  });
});

describe('Migrator', () => {
  let testDb: TestDatabase;
  let migrator: Migrator;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    migrator = new Migrator(testDb.db, logger);
  });

  afterEach(async () => {
    await testDb.close();
  });

  it('reports every migration as pending on an empty database', async () => {
    expect(await migrator.status()).toEqual([
      { version: 1, name: 'create_users', appliedAt: null },
      { version: 2, name: 'create_user_permissions', appliedAt: null },
    ]);
  });

  it('reads status without creating the namespace', async () => {
    await migrator.status();
    await migrator.down();

    const rows = await testDb.db
      .select({ name: sql<string>`nspname` })
      .from(sql`pg_catalog.pg_namespace`)
      .where(sql`nspname = 'backmeup_system'`);
    expect(rows).toEqual([]);
  });

  it('creates the namespace, the users table and the permissions table', async () => {
    expect(await migrator.up()).toEqual([1, 2]);
    expect(await tableExists(testDb.db, 'users')).toBe(true);
    expect(await tableExists(testDb.db, 'user_permissions')).toBe(true);
    expect(await tableExists(testDb.db, 'schema_migrations')).toBe(true);

    const statuses = await migrator.status();
    expect(statuses.map((s) => s.appliedAt instanceof Date)).toEqual([true, true]);
  });

  it('creates the lookup and active-user indexes', async () => {
    await migrator.up();

    const rows = await testDb.db
      .select({ name: sql<string>`indexname` })
      .from(sql`pg_indexes`)
      .where(sql`schemaname = 'backmeup_system' and tablename = 'users'`);

    expect(rows.map((r) => r.name).sort()).toEqual([
      'idx_email',
      'idx_is_active',
      'idx_username',
      'idx_users_active',
      'users_email_lower_key',
      'users_email_unique',
      'users_pkey',
      'users_username_lower_key',
      'users_username_unique',
    ]);
  });

  it('creates exactly the columns, indexes and unique constraints the table definitions declare', async () => {
    await migrator.up();

    for (const table of [users, userPermissions]) {
      const expected = declared(table);
      expect(await columnNames(testDb.db, expected.name)).toEqual(expected.columns);
      expect(await plainIndexes(testDb.db, expected.name)).toEqual(expected.indexes);
      expect(await uniqueConstraints(testDb.db, expected.name)).toEqual(expected.uniques);
    }
  });

  it('applies nothing on a second run', async () => {
    await migrator.up();
    expect(await migrator.up()).toEqual([]);
  });

  it('reverts the latest migration and drops its table', async () => {
    await migrator.up();
    expect(await migrator.down()).toEqual([2]);
    expect(await tableExists(testDb.db, 'user_permissions')).toBe(false);
    expect(await tableExists(testDb.db, 'users')).toBe(true);

    expect(await migrator.down()).toEqual([1]);
    expect(await tableExists(testDb.db, 'users')).toBe(false);
    expect(await migrator.status()).toEqual([
      { version: 1, name: 'create_users', appliedAt: null },
      { version: 2, name: 'create_user_permissions', appliedAt: null },
    ]);
  });

  it('reverts nothing when nothing is applied', async () => {
    expect(await migrator.down()).toEqual([]);
    await migrator.ensureNamespace();
    expect(await migrator.down()).toEqual([]);
  });

  it('stops at the target version', async () => {
    const applied: number[] = [];
    const tracked: Migration[] = [1, 2, 3].map((version) => ({
      ...noopMigration(version),
      up: async () => {
        applied.push(version);
      },
    }));
    const partial = new Migrator(testDb.db, logger, tracked);

    expect(await partial.up(2)).toEqual([1, 2]);
    expect(await partial.up()).toEqual([3]);
    expect(applied).toEqual([1, 2, 3]);
  });

  it('reverts several steps newest first', async () => {
    const reverted: number[] = [];
    const tracked: Migration[] = [1, 2, 3].map((version) => ({
      ...noopMigration(version),
      down: async () => {
        reverted.push(version);
      },
    }));
    const partial = new Migrator(testDb.db, logger, tracked);
    await partial.up();

    expect(await partial.down(2)).toEqual([3, 2]);
    expect(reverted).toEqual([3, 2]);
    expect((await partial.status()).map((s) => s.appliedAt === null)).toEqual([false, true, true]);
  });

  it('rejects an unknown target version', async () => {
    await expect(migrator.up(7)).rejects.toThrow('Unknown target version 7');
  });

  it('rejects an invalid step count', async () => {
    await expect(migrator.down(0)).rejects.toThrow('Invalid step count 0');
  });

  it('refuses to run when the database records an unregistered version', async () => {
    await new Migrator(testDb.db, logger, [noopMigration(1), noopMigration(2)]).up();
    const older = new Migrator(testDb.db, logger, [noopMigration(1)]);

    await expect(older.up()).rejects.toThrow('Database records migration 2, which is not registered');
  });

  it('rolls back a failing migration together with its tracking row', async () => {
    const failing: Migration = {
      version: 1,
      name: 'broken',
      up: async (db) => {
        await db.execute(sql.raw('CREATE TABLE "backmeup_system"."half_done" (id int)'));
        await db.execute(sql.raw('SELECT * FROM "backmeup_system"."missing_table"'));
      },
      down: async () => undefined,
    };
    const broken = new Migrator(testDb.db, logger, [failing]);

    await expect(broken.up()).rejects.toThrow('missing_table');
    expect(await tableExists(testDb.db, 'half_done')).toBe(false);
    expect(await broken.status()).toEqual([{ version: 1, name: 'broken', appliedAt: null }]);
  });

  it('leaves existing rows alone when applied migrations are re-run', async () => {
    await migrator.up();
    await testDb.db.insert(users).values({ username: 'carol', email: 'carol@example.test', passwordHash: 'x' });
    await migrator.up();

    const rows = await testDb.db.select({ username: users.username }).from(users);
    expect(rows).toEqual([{ username: 'carol' }]);
  });
});
