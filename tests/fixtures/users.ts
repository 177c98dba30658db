import type { SeedUser } from '../../src/utils/validators.js';

export const adminSeed: SeedUser = {
  username: 'admin',
  email: 'admin@backmeup.com',
  password: 'admin123',
  fullName: 'System Administrator',
  role: 'admin',
  isActive: true,
};

export const alice = {
  username: 'alice',
  email: 'alice@example.test',
  password: 'test-password-1',
  fullName: 'Alice Example',
};

export const bob = {
  username: 'bob',
  email: 'bob@example.test',
  password: 'test-password-2',
};
