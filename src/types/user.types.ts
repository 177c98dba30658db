import { z } from 'zod';

export const UserRole = z.enum(['user', 'admin']);
export type UserRole = z.infer<typeof UserRole>;

export interface PublicUser {
  id: number;
  username: string;
  email: string;
  fullName: string | null;
  role: UserRole;
  isActive: boolean;
  createdAt: Date;
  lastLogin: Date | null;
}

export interface SeedResult {
  created: boolean;
  userId: number;
}

export interface MigrationStatus {
  version: number;
  name: string;
  appliedAt: Date | null;
}

export interface InitializeReport {
  namespace: string;
  appliedMigrations: number[];
  seed: SeedResult;
}

export interface NamespaceInfo {
  name: string;
  exists: boolean;
  tables: number;
  sizeBytes: number;
}

export type ConnectionCheck =
  | { ok: true; version: string }
  | { ok: false; error: string };
