import { and, eq, ne, sql } from 'drizzle-orm';
import type { Database } from '../client.js';
import { users } from '../schema/users.js';
import { hashPassword } from '../../core/crypto/password.js';
import type { SeedResult } from '../../types/user.types.js';
import { DEFAULT_ADMIN_PASSWORD, type Config } from '../../utils/config.js';
import { DatabaseError, SeedConflictError, toStoreError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { parseOrThrow, SeedUserSchema, type SeedUser } from '../../utils/validators.js';

export function seedUserFromConfig(config: Config, logger: Logger): SeedUser {
  if (config.SEED_ADMIN_PASSWORD === DEFAULT_ADMIN_PASSWORD) {
    logger.warn(
      { username: config.SEED_ADMIN_USERNAME },
      'Seeding with the default admin password; set SEED_ADMIN_PASSWORD and change it after first login',
    );
  }

  return {
    username: config.SEED_ADMIN_USERNAME,
    email: config.SEED_ADMIN_EMAIL,
    password: config.SEED_ADMIN_PASSWORD,
    fullName: config.SEED_ADMIN_FULL_NAME,
    role: 'admin',
    isActive: true,
  };
}

async function findIdByUsername(db: Database, username: string): Promise<number | undefined> {
  const [row] = await db
    .select({ id: users.id })
    .from(users)
    .where(sql`lower(${users.username}) = lower(${username})`)
    .limit(1);
  return row?.id;
}

/**
 * Inserts the seed user unless a row with its username already exists, in
 * which case nothing is written. An existing row is never reset.
 *
 * Throws `SeedConflictError` when the seed email already belongs to another
 * username.
 */
export async function seedAdmin(db: Database, seed: SeedUser, logger: Logger): Promise<SeedResult> {
  const user = parseOrThrow(SeedUserSchema, seed, 'seed user');

  try {
    const existingId = await findIdByUsername(db, user.username);
    if (existingId !== undefined) {
      logger.info({ username: user.username, userId: existingId }, 'Seed user already present');
      return { created: false, userId: existingId };
    }

    const [emailOwner] = await db
      .select({ username: users.username })
      .from(users)
      .where(
        and(
          sql`lower(${users.email}) = lower(${user.email})`,
          ne(users.username, user.username),
        ),
      )
      .limit(1);

    if (emailOwner) {
      throw new SeedConflictError(user.username, user.email, emailOwner.username);
    }

    const [inserted] = await db
      .insert(users)
      .values({
        username: user.username,
        email: user.email,
        passwordHash: await hashPassword(user.password),
        fullName: user.fullName,
        role: user.role,
        isActive: user.isActive,
      })
      .onConflictDoNothing({ target: users.username })
      .returning({ id: users.id });

    if (inserted) {
      logger.info({ username: user.username, userId: inserted.id }, 'Seed user created');
      return { created: true, userId: inserted.id };
    }

    // Another initializer inserted the row between the lookup and the insert.
    const [raced] = await db.select({ id: users.id }).from(users).where(eq(users.username, user.username)).limit(1);
    if (!raced) {
      throw new DatabaseError(`Seed user "${user.username}" was neither inserted nor found`);
    }
    return { created: false, userId: raced.id };
  } catch (err) {
    throw toStoreError(err);
  }
}
