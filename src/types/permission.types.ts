import { z } from 'zod';

export const PermissionType = z.enum(['INSERT', 'DELETE', 'UPDATE', 'CREATE']);
export type PermissionType = z.infer<typeof PermissionType>;

/** Granted permission types keyed by database name. */
export type PermissionGrants = Record<string, PermissionType[]>;

export type UserPermissions =
  | { admin: true; allPermissions: true }
  | { admin: false; databases: PermissionGrants };
