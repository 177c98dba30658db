// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { and, asc, eq, or, sql, type SQL } from 'drizzle-orm';
import type { Database } from '../db/client.js';
import { users } from '../db/schema/users.js';
import { hashPassword, verifyPassword } from '../core/crypto/password.js';
import type { PublicUser } from '../types/user.types.js';
import { ConflictError, NotFoundError, isUniqueViolation, toStoreError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { parseOrThrow, RegisterUserSchema, userIdSchema, usernameSchema } from '../utils/validators.js';

// Usernames and emails compare case-insensitively, matching the lower() unique indexes.
export function sameUsername(username: string): SQL {
  return sql`lower(${users.username}) = lower(${username})`;
}

function sameEmail(email: string): SQL {
  return sql`lower(${users.email}) = lower(${email})`;
}

const publicColumns = {
  id: users.id,
  username: users.username,
  email: users.email,
  fullName: users.fullName,
  role: users.role,
  isActive: users.isActive,
  createdAt: users.createdAt,
  lastLogin: users.lastLogin,
};

/**
 * Reads and writes rows of the users table. Passwords are stored as argon2id
 * hashes and never leave this class.
 */
export class UserRepository {
  private readonly db: Database;
  private readonly logger: Logger;

  constructor(db: Database, logger: Logger) {
    this.db = db;
    this.logger = logger.child({ component: 'users' });
  }

  async register(input: unknown): Promise<PublicUser> {
    const data = parseOrThrow(RegisterUserSchema, input, 'user');

    try {
      const [taken] = await this.db
        .select({ username: users.username, email: users.email })
        .from(users)
        .where(or(sameUsername(data.username), sameEmail(data.email)))
        .limit(1);

      if (taken) {
        const field = taken.username.toLowerCase() === data.username.toLowerCase() ? 'username' : 'email';
        throw new ConflictError(`A user with this ${field} already exists`, field);
      }

      const [user] = await this.db
        .insert(users)
        .values({
          username: data.username,
          email: data.email,
          passwordHash: await hashPassword(data.password),
          fullName: data.fullName ?? null,
        })
        .returning(publicColumns);

      if (!user) {
        throw new Error('Failed to create user');
      }

      this.logger.info({ userId: user.id, username: user.username }, 'User registered');
      return user;
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError('Username or email already exists', undefined, { cause: err });
      }
      throw toStoreError(err);
    }
  }

  async findById(id: number): Promise<PublicUser | null> {
    return this.findOne(eq(users.id, parseOrThrow(userIdSchema, id, 'user id')));
  }

  async findByUsername(username: string): Promise<PublicUser | null> {
    return this.findOne(sameUsername(username));
  }

  async findByEmail(email: string): Promise<PublicUser | null> {
    return this.findOne(sameEmail(email));
  }

  async listActive(): Promise<PublicUser[]> {
    try {
      return await this.db
        .select(publicColumns)
        .from(users)
        .where(eq(users.isActive, true))
        .orderBy(asc(users.username));
    } catch (err) {
      throw toStoreError(err);
    }
  }

  /** Deactivated users keep their row but no longer pass `verifyCredentials`. */
  async setActive(id: number, active: boolean): Promise<PublicUser> {
    return this.updateOne(id, { isActive: active });
  }

  async recordLogin(id: number, at: Date = new Date()): Promise<PublicUser> {
    return this.updateOne(id, { lastLogin: at });
  }

  /**
   * Returns the active user whose stored hash matches `password`, or null.
   * Unknown, inactive and mismatching users are indistinguishable to callers.
   */
  async verifyCredentials(username: string, password: string): Promise<PublicUser | null> {
    if (!usernameSchema.safeParse(username).success) {
      return null;
    }

    let row: (PublicUser & { passwordHash: string }) | undefined;
    try {
      [row] = await this.db
        .select({ ...publicColumns, passwordHash: users.passwordHash })
        .from(users)
        .where(and(sameUsername(username), eq(users.isActive, true)))
        .limit(1);
    } catch (err) {
      throw toStoreError(err);
    }

    if (!row || !(await verifyPassword(row.passwordHash, password))) {
      return null;
    }

    const { passwordHash: _omit, ...user } = row;
    return user;
  }

  private async findOne(where: SQL): Promise<PublicUser | null> {
    try {
      const [user] = await this.db.select(publicColumns).from(users).where(where).limit(1);
      return user ?? null;
    } catch (err) {
      throw toStoreError(err);
    }
  }

  private async updateOne(
    id: number,
    changes: Partial<Pick<typeof users.$inferInsert, 'isActive' | 'lastLogin'>>,
  ): Promise<PublicUser> {
    const userId = parseOrThrow(userIdSchema, id, 'user id');

    let user: PublicUser | undefined;
    try {
      [user] = await this.db.update(users).set(changes).where(eq(users.id, userId)).returning(publicColumns);
    } catch (err) {
      throw toStoreError(err);
    }

    if (!user) {
      throw new NotFoundError('User');
    }
    return user;
  }
}
