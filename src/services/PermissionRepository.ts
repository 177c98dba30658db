// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { and, asc, eq, sql, type SQL } from 'drizzle-orm';
import type { Database } from '../db/client.js';
import { userPermissions } from '../db/schema/permissions.js';
import { users } from '../db/schema/users.js';
import type { PermissionGrants, PermissionType } from '../types/permission.types.js';
import { NotFoundError, toStoreError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import {
  databaseNameSchema,
  GrantSchema,
  parseOrThrow,
  PermissionSetSchema,
  usernameSchema,
} from '../utils/validators.js';
import { sameUsername } from './UserRepository.js';

type Executor = Pick<Database, 'select'>;

function grantee(username: string): SQL {
  return sql`lower(${userPermissions.username}) = lower(${username})`;
}

/**
 * Per-database grants in `user_permissions`. Grants are stored under the
 * username as written in the users table and looked up case-insensitively.
 */
export class PermissionRepository {
  private readonly db: Database;
  private readonly logger: Logger;

  constructor(db: Database, logger: Logger) {
    this.db = db;
    this.logger = logger.child({ component: 'permissions' });
  }

  /** Returns false when the grant already existed. */
  async grant(input: unknown): Promise<boolean> {
    const data = parseOrThrow(GrantSchema, input, 'grant');

    try {
      const username = await this.resolveUsername(this.db, data.username);
      const inserted = await this.db
        .insert(userPermissions)
        .values({ username, databaseName: data.databaseName, permissionType: data.permissionType })
        .onConflictDoNothing()
        .returning({ id: userPermissions.id });

      if (inserted.length > 0) {
        this.logger.info(
          { username, databaseName: data.databaseName, permission: data.permissionType },
          'Permission granted',
        );
      }
      return inserted.length > 0;
    } catch (err) {
      throw toStoreError(err);
    }
  }

  /** Returns false when there was nothing to revoke. */
  async revoke(input: unknown): Promise<boolean> {
    const data = parseOrThrow(GrantSchema, input, 'grant');

    try {
      const removed = await this.db
        .delete(userPermissions)
        .where(
          and(
            grantee(data.username),
            eq(userPermissions.databaseName, data.databaseName),
            eq(userPermissions.permissionType, data.permissionType),
          ),
        )
        .returning({ id: userPermissions.id });

      if (removed.length > 0) {
        this.logger.info(
          { username: data.username, databaseName: data.databaseName, permission: data.permissionType },
          'Permission revoked',
        );
      }
      return removed.length > 0;
    } catch (err) {
      throw toStoreError(err);
    }
  }

  /**
   * Replaces the user's grants on one database with `permissionTypes`, in one
   * transaction. Returns the resulting set, sorted.
   */
  async setPermissions(input: unknown): Promise<PermissionType[]> {
    const data = parseOrThrow(PermissionSetSchema, input, 'permission set');
    const wanted = [...new Set(data.permissionTypes)].sort();

    try {
      await this.db.transaction(async (tx) => {
        const username = await this.resolveUsername(tx, data.username);
        await tx
          .delete(userPermissions)
          .where(and(eq(userPermissions.username, username), eq(userPermissions.databaseName, data.databaseName)));

        if (wanted.length > 0) {
          await tx
            .insert(userPermissions)
            .values(wanted.map((permissionType) => ({ username, databaseName: data.databaseName, permissionType })));
        }
      });
    } catch (err) {
      throw toStoreError(err);
    }

    this.logger.info(
      { username: data.username, databaseName: data.databaseName, permissions: wanted },
      'Permissions replaced',
    );
    return wanted;
  }

  async hasPermission(username: string, databaseName: string, permissionType: PermissionType): Promise<boolean> {
    try {
      const [row] = await this.db
        .select({ id: userPermissions.id })
        .from(userPermissions)
        .where(
          and(
            grantee(username),
            eq(userPermissions.databaseName, databaseName),
            eq(userPermissions.permissionType, permissionType),
          ),
        )
        .limit(1);
      return row !== undefined;
    } catch (err) {
      throw toStoreError(err);
    }
  }

  /** Grants of `username`, optionally narrowed to one database. */
  async listForUser(username: string, databaseName?: string): Promise<PermissionGrants> {
    const name = parseOrThrow(usernameSchema, username, 'username');
    const filter =
      databaseName === undefined
        ? grantee(name)
        : and(
            grantee(name),
            eq(userPermissions.databaseName, parseOrThrow(databaseNameSchema, databaseName, 'database name')),
          );

    let rows: { databaseName: string; permissionType: PermissionType }[];
    try {
      rows = await this.db
        .select({ databaseName: userPermissions.databaseName, permissionType: userPermissions.permissionType })
        .from(userPermissions)
        .where(filter)
        .orderBy(asc(userPermissions.databaseName), asc(userPermissions.permissionType));
    } catch (err) {
      throw toStoreError(err);
    }

    const grants: PermissionGrants = {};
    for (const row of rows) {
      const granted = grants[row.databaseName];
      if (granted) {
        granted.push(row.permissionType);
      } else {
        grants[row.databaseName] = [row.permissionType];
      }
    }
    return grants;
  }

  private async resolveUsername(db: Executor, username: string): Promise<string> {
    const [user] = await db.select({ username: users.username }).from(users).where(sameUsername(username)).limit(1);
    if (!user) {
      throw new NotFoundError('User');
    }
    return user.username;
  }
}
