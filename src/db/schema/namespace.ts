// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { pgSchema } from 'drizzle-orm/pg-core';

export const CREDENTIALS_NAMESPACE = 'backmeup_system';

export const credentialsNamespace = pgSchema(CREDENTIALS_NAMESPACE);
