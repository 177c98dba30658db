// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { integer, timestamp, varchar } from 'drizzle-orm/pg-core';
import { credentialsNamespace } from './namespace.js';

export const schemaMigrations = credentialsNamespace.table('schema_migrations', {
  version: integer('version').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  appliedAt: timestamp('applied_at', { withTimezone: true }).notNull().defaultNow(),
});
