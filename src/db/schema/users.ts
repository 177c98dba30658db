// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { sql } from 'drizzle-orm';
import { bigint, boolean, index, timestamp, uniqueIndex, varchar } from 'drizzle-orm/pg-core';
import { credentialsNamespace } from './namespace.js';
import {
  EMAIL_MAX_LENGTH,
  FULL_NAME_MAX_LENGTH,
  PASSWORD_COLUMN_LENGTH,
  USERNAME_MAX_LENGTH,
} from '../../utils/validators.js';
import type { UserRole } from '../../types/user.types.js';

export const users = credentialsNamespace.table(
  'users',
  {
    id: bigint('id', { mode: 'number' }).primaryKey().generatedAlwaysAsIdentity(),
    username: varchar('username', { length: USERNAME_MAX_LENGTH }).notNull().unique(),
    email: varchar('email', { length: EMAIL_MAX_LENGTH }).notNull().unique(),
    passwordHash: varchar('password', { length: PASSWORD_COLUMN_LENGTH }).notNull(),
    fullName: varchar('full_name', { length: FULL_NAME_MAX_LENGTH }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    lastLogin: timestamp('last_login', { withTimezone: true }),
    isActive: boolean('is_active').notNull().default(true),
    role: varchar('role', { length: 20 }).$type<UserRole>().notNull().default('user'),
  },
  (table) => ({
    usernameIdx: index('idx_username').on(table.username),
    emailIdx: index('idx_email').on(table.email),
    isActiveIdx: index('idx_is_active').on(table.isActive),
    activeUsernameIdx: index('idx_users_active').on(table.isActive, table.username),
    usernameLowerIdx: uniqueIndex('users_username_lower_key').on(sql`lower(${table.username})`),
    emailLowerIdx: uniqueIndex('users_email_lower_key').on(sql`lower(${table.email})`),
  }),
);

export type UserRow = typeof users.$inferSelect;
export type NewUserRow = typeof users.$inferInsert;
