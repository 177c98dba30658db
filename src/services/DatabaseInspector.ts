// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { sql } from 'drizzle-orm';
import type { Database } from '../db/client.js';
import type { ConnectionCheck, NamespaceInfo } from '../types/user.types.js';
import { toStoreError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const SYSTEM_DATABASES: ReadonlySet<string> = new Set(['postgres', 'template0', 'template1']);

/**
 * Read-only views of the server the store is connected to.
 */
export class DatabaseInspector {
  private readonly db: Database;
  private readonly logger: Logger;

  constructor(db: Database, logger: Logger) {
    this.db = db;
    this.logger = logger.child({ component: 'inspector' });
  }

  async testConnection(): Promise<ConnectionCheck> {
    try {
      const [row] = await this.db.select({ version: sql<string>`version()` }).from(sql`(select 1) as ping`);
      return { ok: true, version: row?.version ?? 'unknown' };
    } catch (err) {
      const error = toStoreError(err);
      this.logger.warn({ err: error }, 'Connection test failed');
      return { ok: false, error: error.message };
    }
  }

  /** User databases on the server, sorted by name. */
  async listDatabases(): Promise<string[]> {
    try {
      const rows = await this.db
        .select({ name: sql<string>`datname` })
        .from(sql`pg_catalog.pg_database`)
        .where(sql`datistemplate = false`)
        .orderBy(sql`datname`);
      return rows.map((row) => row.name).filter((name) => !SYSTEM_DATABASES.has(name));
    } catch (err) {
      throw toStoreError(err);
    }
  }

  async getNamespaceInfo(name: string): Promise<NamespaceInfo> {
    try {
      const [namespace] = await this.db
        .select({ name: sql<string>`nspname` })
        .from(sql`pg_catalog.pg_namespace`)
        .where(sql`nspname = ${name}`)
        .limit(1);

      if (!namespace) {
        return { name, exists: false, tables: 0, sizeBytes: 0 };
      }

      const [stats] = await this.db
        .select({
          tables: sql<number>`count(*)::int`,
          sizeBytes: sql<string>`coalesce(sum(pg_total_relation_size(c.oid)), 0)::text`,
        })
        .from(sql`pg_catalog.pg_class c join pg_catalog.pg_namespace n on n.oid = c.relnamespace`)
        .where(sql`n.nspname = ${name} and c.relkind in ('r', 'p')`);

      return {
        name,
        exists: true,
        tables: stats?.tables ?? 0,
        sizeBytes: Number(stats?.sizeBytes ?? 0),
      };
    } catch (err) {
      throw toStoreError(err);
    }
  }
}
