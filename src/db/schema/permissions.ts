// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { sql } from 'drizzle-orm';
import { bigint, check, foreignKey, index, timestamp, unique, varchar } from 'drizzle-orm/pg-core';
import { credentialsNamespace } from './namespace.js';
import { users } from './users.js';
import { DATABASE_NAME_MAX_LENGTH, USERNAME_MAX_LENGTH } from '../../utils/validators.js';
import type { PermissionType } from '../../types/permission.types.js';

export const userPermissions = credentialsNamespace.table(
  'user_permissions',
  {
    id: bigint('id', { mode: 'number' }).primaryKey().generatedAlwaysAsIdentity(),
    username: varchar('username', { length: USERNAME_MAX_LENGTH }).notNull(),
    databaseName: varchar('database_name', { length: DATABASE_NAME_MAX_LENGTH }).notNull(),
    permissionType: varchar('permission_type', { length: 10 }).$type<PermissionType>().notNull(),
    grantedAt: timestamp('granted_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userFk: foreignKey({
      name: 'user_permissions_username_fk',
      columns: [table.username],
      foreignColumns: [users.username],
    })
      .onDelete('cascade')
      .onUpdate('cascade'),
    typeCheck: check(
      'user_permissions_type_check',
      sql`${table.permissionType} IN ('INSERT', 'DELETE', 'UPDATE', 'CREATE')`,
    ),
    grantUnique: unique('user_permissions_grant_unique').on(table.username, table.databaseName, table.permissionType),
    userDatabaseIdx: index('idx_user_permissions_user_db').on(table.username, table.databaseName),
  }),
);

export type UserPermissionRow = typeof userPermissions.$inferSelect;
