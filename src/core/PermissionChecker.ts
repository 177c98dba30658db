// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { PermissionRepository } from '../services/PermissionRepository.js';
import type { PermissionType, UserPermissions } from '../types/permission.types.js';
import type { PublicUser } from '../types/user.types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Answers what one signed-in user may do to a database. Grants are read on
 * every check, so a grant or revoke applies to the next call. Admins pass
 * every check without a lookup.
 */
export class PermissionChecker {
  private readonly permissions: PermissionRepository;
  private readonly logger: Logger;
  readonly username: string;
  readonly isAdmin: boolean;

  constructor(permissions: PermissionRepository, user: Pick<PublicUser, 'username' | 'role'>, logger: Logger) {
    this.permissions = permissions;
    this.username = user.username;
    this.isAdmin = user.role === 'admin';
    this.logger = logger.child({ component: 'permission-checker', username: user.username });
  }

  /** Only admins create databases. */
  canCreateDatabase(): boolean {
    return this.isAdmin;
  }

  canDropDatabase(databaseName: string): Promise<boolean> {
    return this.check(databaseName, 'DELETE');
  }

  canCreateTable(databaseName: string): Promise<boolean> {
    return this.check(databaseName, 'CREATE');
  }

  canDropTable(databaseName: string): Promise<boolean> {
    return this.check(databaseName, 'DELETE');
  }

  canInsert(databaseName: string): Promise<boolean> {
    return this.check(databaseName, 'INSERT');
  }

  canUpdate(databaseName: string): Promise<boolean> {
    return this.check(databaseName, 'UPDATE');
  }

  canDelete(databaseName: string): Promise<boolean> {
    return this.check(databaseName, 'DELETE');
  }

  // Backups only read.
  canBackup(_databaseName: string): boolean {
    return true;
  }

  // A restore overwrites data, so it needs CREATE.
  canRestore(databaseName: string): Promise<boolean> {
    return this.check(databaseName, 'CREATE');
  }

  async getUserPermissions(databaseName?: string): Promise<UserPermissions> {
    if (this.isAdmin) {
      return { admin: true, allPermissions: true };
    }
    return { admin: false, databases: await this.permissions.listForUser(this.username, databaseName) };
  }

  // A failed lookup denies.
  private async check(databaseName: string, permissionType: PermissionType): Promise<boolean> {
    if (this.isAdmin) {
      return true;
    }

    try {
      const allowed = await this.permissions.hasPermission(this.username, databaseName, permissionType);
      this.logger.debug({ databaseName, permission: permissionType, allowed }, 'Permission checked');
      return allowed;
    } catch (err) {
      this.logger.error({ err, databaseName, permission: permissionType }, 'Permission check failed; denying');
      return false;
    }
  }
}
