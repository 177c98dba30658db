import type { SqlExecutor } from '../client.js';

export interface Migration {
  /** Positive, strictly ascending across the registry, never reused. */
  version: number;
  name: string;
  up(db: SqlExecutor): Promise<void>;
  down(db: SqlExecutor): Promise<void>;
}
