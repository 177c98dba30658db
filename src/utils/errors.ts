// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code = 'INTERNAL_ERROR', isOperational = true, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown, options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', true, options);
    this.details = details;
  }
}

export class ConflictError extends AppError {
  public readonly field?: string;

  constructor(message = 'Resource already exists', field?: string, options?: ErrorOptions) {
    super(message, 'CONFLICT', true, options);
    this.field = field;
  }
}

export class NotFoundError extends AppError {
  constructor(resource = 'Resource') {
    super(`${resource} not found`, 'NOT_FOUND');
  }
}

/**
 * The seed email is held by a row whose username differs from the seed
 * username, so the seed cannot be inserted without breaking email uniqueness.
 */
export class SeedConflictError extends AppError {
  public readonly username: string;
  public readonly email: string;
  public readonly existingUsername: string;

  constructor(username: string, email: string, existingUsername: string) {
    super(
      `Seed user "${username}" cannot be created: email ${email} already belongs to "${existingUsername}"`,
      'SEED_CONFLICT',
    );
    this.username = username;
    this.email = email;
    this.existingUsername = existingUsername;
  }
}

export class MigrationError extends AppError {
  public readonly version?: number;

  constructor(message: string, version?: number, options?: ErrorOptions) {
    super(message, 'MIGRATION_ERROR', true, options);
    this.version = version;
  }
}

export class DatabaseError extends AppError {
  public readonly sqlState?: string;
  public readonly constraint?: string;

  constructor(message: string, code = 'DATABASE_ERROR', sqlState?: string, constraint?: string, options?: ErrorOptions) {
    super(message, code, true, options);
    this.sqlState = sqlState;
    this.constraint = constraint;
  }
}

export class ConnectionError extends DatabaseError {
  constructor(message = 'Database connection failed', sqlState?: string, options?: ErrorOptions) {
    super(message, 'CONNECTION_ERROR', sqlState, undefined, options);
  }
}

export class PrivilegeError extends DatabaseError {
  constructor(message = 'Insufficient privilege', sqlState?: string, options?: ErrorOptions) {
    super(message, 'INSUFFICIENT_PRIVILEGE', sqlState, undefined, options);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

interface DriverErrorDetails {
  sqlState?: string;
  constraint?: string;
  message: string;
}

const CONNECTION_ERRNOS = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'CONNECT_TIMEOUT']);

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

// postgres.js names the constraint `constraint_name`, PGlite names it `constraint`.
// Query builders may wrap the driver error, so the cause chain is walked.
function driverDetails(err: unknown): DriverErrorDetails | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    const sqlState = stringField(current, 'code');
    if (sqlState) {
      return {
        sqlState,
        constraint: stringField(current, 'constraint_name') ?? stringField(current, 'constraint'),
        message: current instanceof Error ? current.message : String(current),
      };
    }
    current = Reflect.get(current, 'cause');
  }
  return undefined;
}

export function isUniqueViolation(err: unknown): boolean {
  return driverDetails(err)?.sqlState === '23505';
}

/**
 * Translates a driver error into the store's error taxonomy. Errors that
 * are already `AppError`s pass through unchanged.
 */
export function toStoreError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }

  const details = driverDetails(err);
  const message = details?.message ?? (err instanceof Error ? err.message : String(err));
  const sqlState = details?.sqlState;

  if (sqlState === undefined) {
    return new DatabaseError(message, 'DATABASE_ERROR', undefined, undefined, { cause: err });
  }
  if (sqlState === '23505') {
    return new ConflictError(message, details?.constraint, { cause: err });
  }
  if (sqlState === '22001') {
    return new ValidationError(message, { sqlState }, { cause: err });
  }
  if (sqlState === '42501') {
    return new PrivilegeError(message, sqlState, { cause: err });
  }
  if (sqlState.startsWith('08') || sqlState === '28P01' || CONNECTION_ERRNOS.has(sqlState)) {
    return new ConnectionError(message, sqlState, { cause: err });
  }
  return new DatabaseError(message, 'DATABASE_ERROR', sqlState, details?.constraint, { cause: err });
}
