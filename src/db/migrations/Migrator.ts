// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { desc, eq, sql } from 'drizzle-orm';
import type { Database } from '../client.js';
import { schemaMigrations } from '../schema/migrations.js';
import { CREDENTIALS_NAMESPACE } from '../schema/namespace.js';
import type { MigrationStatus } from '../../types/user.types.js';
import { MigrationError, toStoreError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { migrations, validateRegistry } from './registry.js';
import type { Migration } from './types.js';

const TRACKING_TABLE = `"${CREDENTIALS_NAMESPACE}"."schema_migrations"`;

const TRACKING_TABLE_DDL = `CREATE TABLE IF NOT EXISTS ${TRACKING_TABLE} (
  version     INTEGER PRIMARY KEY,
  name        VARCHAR(255) NOT NULL,
  applied_at  TIMESTAMPTZ NOT NULL DEFAULT now()
)`;

/**
 * Applies and reverts the versioned migrations of the credentials namespace,
 * recording each applied version in `schema_migrations`. Every migration runs
 * in its own transaction together with its tracking row.
 */
export class Migrator {
  private readonly db: Database;
  private readonly logger: Logger;
  private readonly registry: readonly Migration[];

  constructor(db: Database, logger: Logger, registry: readonly Migration[] = migrations) {
    validateRegistry(registry);
    this.db = db;
    this.logger = logger.child({ component: 'migrator' });
    this.registry = registry;
  }

  async ensureNamespace(): Promise<void> {
    try {
      await this.db.execute(sql.raw(`CREATE SCHEMA IF NOT EXISTS "${CREDENTIALS_NAMESPACE}"`));
      await this.db.execute(sql.raw(TRACKING_TABLE_DDL));
    } catch (err) {
      throw toStoreError(err);
    }
  }

  /** Read-only: a database that was never migrated reports every version as pending. */
  async status(): Promise<MigrationStatus[]> {
    const applied = (await this.isTracked()) ? await this.appliedVersions() : new Map<number, Date>();

    return this.registry.map((migration) => ({
      version: migration.version,
      name: migration.name,
      appliedAt: applied.get(migration.version) ?? null,
    }));
  }

  /**
   * Applies pending migrations in ascending order, up to and including
   * `targetVersion` when given. Returns the versions applied by this call.
   */
  async up(targetVersion?: number): Promise<number[]> {
    if (targetVersion !== undefined && !this.registry.some((m) => m.version === targetVersion)) {
      throw new MigrationError(`Unknown target version ${targetVersion}`, targetVersion);
    }

    await this.ensureNamespace();
    const applied = await this.appliedVersions();

    const pending = this.registry.filter(
      (m) => !applied.has(m.version) && (targetVersion === undefined || m.version <= targetVersion),
    );

    if (pending.length === 0) {
      this.logger.info('Schema is up to date');
      return [];
    }

    const done: number[] = [];
    for (const migration of pending) {
      this.logger.info({ version: migration.version, name: migration.name }, 'Applying migration');
      try {
        await this.db.transaction(async (tx) => {
          await migration.up(tx);
          await tx.insert(schemaMigrations).values({ version: migration.version, name: migration.name });
        });
      } catch (err) {
        this.logger.error({ err, version: migration.version }, 'Migration failed');
        throw toStoreError(err);
      }
      done.push(migration.version);
    }

    this.logger.info({ applied: done }, 'Migrations applied');
    return done;
  }

  /**
   * Reverts the `steps` most recently applied migrations, newest first.
   * Returns the versions reverted by this call.
   */
  async down(steps = 1): Promise<number[]> {
    if (!Number.isInteger(steps) || steps < 1) {
      throw new MigrationError(`Invalid step count ${steps}`);
    }

    if (!(await this.isTracked())) {
      this.logger.info('No applied migrations to revert');
      return [];
    }
    await this.appliedVersions();

    const latest = await this.db
      .select({ version: schemaMigrations.version })
      .from(schemaMigrations)
      .orderBy(desc(schemaMigrations.version))
      .limit(steps);

    const reverted: number[] = [];
    for (const { version } of latest) {
      const migration = this.find(version);
      this.logger.info({ version, name: migration.name }, 'Reverting migration');
      try {
        await this.db.transaction(async (tx) => {
          await migration.down(tx);
          await tx.delete(schemaMigrations).where(eq(schemaMigrations.version, version));
        });
      } catch (err) {
        this.logger.error({ err, version }, 'Revert failed');
        throw toStoreError(err);
      }
      reverted.push(version);
    }

    if (reverted.length === 0) {
      this.logger.info('No applied migrations to revert');
    }
    return reverted;
  }

  private find(version: number): Migration {
    const migration = this.registry.find((m) => m.version === version);
    if (!migration) {
      throw new MigrationError(`Database records migration ${version}, which is not registered`, version);
    }
    return migration;
  }

  private async isTracked(): Promise<boolean> {
    try {
      const [row] = await this.db
        .select({ table: sql<string | null>`to_regclass(${TRACKING_TABLE}::text)::text` })
        .from(sql`(select 1) as tracking`);
      return Boolean(row?.table);
    } catch (err) {
      throw toStoreError(err);
    }
  }

  // Loads applied versions and checks each one is known to the registry.
  private async appliedVersions(): Promise<Map<number, Date>> {
    let rows: { version: number; appliedAt: Date }[];
    try {
      rows = await this.db
        .select({ version: schemaMigrations.version, appliedAt: schemaMigrations.appliedAt })
        .from(schemaMigrations);
    } catch (err) {
      throw toStoreError(err);
    }

    const applied = new Map<number, Date>();
    for (const row of rows) {
      this.find(row.version);
      applied.set(row.version, row.appliedAt);
    }
    return applied;
  }
}
