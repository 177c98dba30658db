import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { CredentialsStore } from '../../src/core/CredentialsStore.js';
import { users } from '../../src/db/schema/users.js';
import { UserRepository } from '../../src/services/UserRepository.js';
import { ConflictError, SeedConflictError } from '../../src/utils/errors.js';
import { createLogger } from '../../src/utils/logger.js';
import { createTestDatabase, type TestDatabase } from '../helpers/database.js';
import { adminSeed, alice } from '../fixtures/users.js';

const logger = createLogger('silent');

describe('CredentialsStore.initialize', () => {
  let testDb: TestDatabase;
  let store: CredentialsStore;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    store = new CredentialsStore(testDb.db, logger, adminSeed);
  });

  afterEach(async () => {
    await testDb.close();
  });

  it('creates the schema and the seed user on first run', async () => {
    const report = await store.initialize();

    expect(report.namespace).toBe('backmeup_system');
    expect(report.appliedMigrations).toEqual([1, 2]);
    expect(report.seed.created).toBe(true);
  });

  it('converges to one admin row however often it runs', async () => {
    const first = await store.initialize();
    const second = await store.initialize();
    const third = await new CredentialsStore(testDb.db, logger, adminSeed).initialize();

    expect(second).toEqual({
      namespace: 'backmeup_system',
      appliedMigrations: [],
      seed: { created: false, userId: first.seed.userId },
    });
    expect(third.seed.userId).toBe(first.seed.userId);

    const admins = await testDb.db.select().from(users).where(eq(users.username, 'admin'));
    expect(admins).toHaveLength(1);
    expect(admins[0]?.role).toBe('admin');
  });

  it('returns the seed row from an active-user query until it is deactivated', async () => {
    const { seed } = await store.initialize();
    const repo = new UserRepository(testDb.db, logger);

    expect((await repo.listActive()).map((u) => u.id)).toEqual([seed.userId]);

    await repo.setActive(seed.userId, false);
    expect(await repo.listActive()).toEqual([]);
  });

  it('lets the seed user sign in with the seeded password', async () => {
    await store.initialize();
    const repo = new UserRepository(testDb.db, logger);

    const user = await repo.verifyCredentials('admin', 'admin123');
    expect(user).toMatchObject({ username: 'admin', role: 'admin', fullName: 'System Administrator' });
    expect(await repo.verifyCredentials('ADMIN', 'admin123')).toEqual(user);
  });

  it('gives registered users the user role next to the admin seed', async () => {
    await store.initialize();
    const repo = new UserRepository(testDb.db, logger);

    expect((await repo.register(alice)).role).toBe('user');
    await expect(repo.register({ ...alice, email: 'admin@backmeup.com', username: 'alice2' })).rejects.toBeInstanceOf(
      ConflictError,
    );
  });

  it('fails with SeedConflictError when the seed email is taken by another user', async () => {
    await store.migrator.up();
    await new UserRepository(testDb.db, logger).register({ ...alice, email: 'admin@backmeup.com' });

    await expect(store.initialize()).rejects.toBeInstanceOf(SeedConflictError);
    expect(await testDb.db.select().from(users).where(eq(users.username, 'admin'))).toEqual([]);
  });
});
