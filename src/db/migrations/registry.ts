import { MigrationError } from '../../utils/errors.js';
import { createUsers } from './001_create_users.js';
import { createUserPermissions } from './002_create_user_permissions.js';
import type { Migration } from './types.js';

export const migrations: readonly Migration[] = [createUsers, createUserPermissions];

/**
 * Rejects registries whose versions are not positive integers in strictly
 * ascending order.
 */
export function validateRegistry(registry: readonly Migration[]): void {
  let previous = 0;
  for (const migration of registry) {
    if (!Number.isInteger(migration.version) || migration.version <= 0) {
      throw new MigrationError(`Invalid migration version ${migration.version} (${migration.name})`, migration.version);
    }
    if (migration.version === previous) {
      throw new MigrationError(`Duplicate migration version ${migration.version}`, migration.version);
    }
    if (migration.version < previous) {
      throw new MigrationError(
        `Migration ${migration.version} (${migration.name}) is registered after version ${previous}`,
        migration.version,
      );
    }
    previous = migration.version;
  }
}
