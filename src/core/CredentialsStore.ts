// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { Database } from '../db/client.js';
import { Migrator } from '../db/migrations/index.js';
import { CREDENTIALS_NAMESPACE } from '../db/schema/namespace.js';
import { seedAdmin } from '../db/seeds/index.js';
import type { InitializeReport, SeedResult } from '../types/user.types.js';
import type { Logger } from '../utils/logger.js';
import type { SeedUser } from '../utils/validators.js';

/**
 * Brings the credentials namespace to its current shape: namespace, users
 * table and indexes through the migrator, then the seed user. Safe to run any
 * number of times; later runs apply nothing and leave the seed row untouched.
 */
export class CredentialsStore {
  private readonly db: Database;
  private readonly logger: Logger;
  private readonly seedSource: () => SeedUser;
  readonly migrator: Migrator;

  /**
   * `seed` may be a function; it is then called only when the seed user is
   * written, so migrating never reads or warns about seed settings.
   */
  constructor(db: Database, logger: Logger, seed: SeedUser | (() => SeedUser), migrator?: Migrator) {
    this.db = db;
    this.logger = logger;
    this.seedSource = typeof seed === 'function' ? seed : () => seed;
    this.migrator = migrator ?? new Migrator(db, logger);
  }

  async initialize(): Promise<InitializeReport> {
    this.logger.info({ namespace: CREDENTIALS_NAMESPACE }, 'Initializing credentials store');

    const appliedMigrations = await this.migrator.up();
    const seed = await this.seedUser();

    this.logger.info(
      { namespace: CREDENTIALS_NAMESPACE, appliedMigrations, seedCreated: seed.created },
      'Credentials store initialized',
    );

    return { namespace: CREDENTIALS_NAMESPACE, appliedMigrations, seed };
  }

  async seedUser(): Promise<SeedResult> {
    return seedAdmin(this.db, this.seedSource(), this.logger);
  }
}
