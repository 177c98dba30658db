export type { Migration } from './types.js';
export { migrations, validateRegistry } from './registry.js';
export { Migrator } from './Migrator.js';
