// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { PermissionType } from '../types/permission.types.js';
import { UserRole } from '../types/user.types.js';

export const USERNAME_MAX_LENGTH = 50;
export const EMAIL_MAX_LENGTH = 100;
export const PASSWORD_COLUMN_LENGTH = 255;
export const FULL_NAME_MAX_LENGTH = 100;
// PostgreSQL truncates identifiers past 63 bytes.
export const DATABASE_NAME_MAX_LENGTH = 63;

export const usernameSchema = z.string().min(1).max(USERNAME_MAX_LENGTH);

export const emailSchema = z.string().max(EMAIL_MAX_LENGTH).email();

// argon2 hashes of any password fit the column; this bounds hashing work.
export const passwordSchema = z.string().min(1).max(256);

export const PASSWORD_MIN_LENGTH = 6;

export const newPasswordSchema = passwordSchema.min(PASSWORD_MIN_LENGTH, {
  message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters`,
});

export const fullNameSchema = z.string().max(FULL_NAME_MAX_LENGTH);

export const userIdSchema = z.number().int().positive();

export const databaseNameSchema = z.string().min(1).max(DATABASE_NAME_MAX_LENGTH);

export const GrantSchema = z
  .object({
    username: usernameSchema,
    databaseName: databaseNameSchema,
    permissionType: PermissionType,
  })
  .strict();

export type GrantInput = z.infer<typeof GrantSchema>;

export const PermissionSetSchema = z
  .object({
    username: usernameSchema,
    databaseName: databaseNameSchema,
    permissionTypes: z.array(PermissionType),
  })
  .strict();

export type PermissionSetInput = z.infer<typeof PermissionSetSchema>;

export const RegisterUserSchema = z
  .object({
    username: usernameSchema,
    email: emailSchema,
    password: newPasswordSchema,
    fullName: fullNameSchema.optional(),
  })
  .strict();

export type RegisterUserInput = z.infer<typeof RegisterUserSchema>;

export const SeedUserSchema = z
  .object({
    username: usernameSchema,
    email: emailSchema,
    password: passwordSchema,
    fullName: fullNameSchema,
    role: UserRole,
    isActive: z.boolean(),
  })
  .strict();

export type SeedUser = z.infer<typeof SeedUserSchema>;

/**
 * Parses `value` with `schema`, raising a `ValidationError` that carries the
 * flattened field errors on failure.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, result.error.flatten().fieldErrors);
  }
  return result.data;
}
