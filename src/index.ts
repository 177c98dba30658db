#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, type Config } from './utils/config.js';
import { createLogger, type Logger } from './utils/logger.js';
import { createDatabaseClient, closeDatabaseClient, type Database } from './db/client.js';
import { Migrator } from './db/migrations/index.js';
import { CREDENTIALS_NAMESPACE } from './db/schema/namespace.js';
import { seedUserFromConfig } from './db/seeds/index.js';
import { CredentialsStore } from './core/CredentialsStore.js';
import { DatabaseInspector } from './services/DatabaseInspector.js';

interface Context {
  config: Config;
  db: Database;
  logger: Logger;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

async function withContext(task: (ctx: Context) => Promise<void>): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL, config.NODE_ENV === 'development');

  const db = createDatabaseClient(config.DATABASE_URL, config.DATABASE_POOL_MAX);

  try {
    await task({ config, db, logger });
  } catch (err) {
    logger.error({ err }, 'Command failed');
    process.exitCode = 1;
  } finally {
    await closeDatabaseClient();
  }
}

// Seed settings are read only by the commands that write the seed user.
function createStore({ config, db, logger }: Context): CredentialsStore {
  return new CredentialsStore(db, logger, () => seedUserFromConfig(config, logger));
}

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

const program = new Command();

program
  .name('credentials-store')
  .description(`Creates and seeds the ${CREDENTIALS_NAMESPACE}.users table`)
  .version('1.0.0');

program
  .command('init', { isDefault: true })
  .description('Create the namespace, apply pending migrations and upsert the seed user')
  .action(() =>
    withContext(async (ctx) => {
      print(await createStore(ctx).initialize());
    }),
  );

const migrate = program.command('migrate').description('Manage schema migrations');

migrate
  .command('up')
  .description('Apply pending migrations')
  .option('--to <version>', 'stop after this version', positiveInt)
  .action((options: { to?: number }) =>
    withContext(async ({ db, logger }) => {
      print({ applied: await new Migrator(db, logger).up(options.to) });
    }),
  );

migrate
  .command('down')
  .description('Revert the most recently applied migrations')
  .option('--steps <n>', 'number of migrations to revert', positiveInt, 1)
  .action((options: { steps: number }) =>
    withContext(async ({ db, logger }) => {
      print({ reverted: await new Migrator(db, logger).down(options.steps) });
    }),
  );

migrate
  .command('status')
  .description('List registered migrations and when each was applied')
  .action(() =>
    withContext(async ({ db, logger }) => {
      print(await new Migrator(db, logger).status());
    }),
  );

program
  .command('seed')
  .description('Upsert the seed user without touching the schema')
  .action(() =>
    withContext(async (ctx) => {
      print(await createStore(ctx).seedUser());
    }),
  );

program
  .command('inspect')
  .description('Test the connection and describe the server and namespace')
  .action(() =>
    withContext(async ({ db, logger }) => {
      const inspector = new DatabaseInspector(db, logger);
      const connection = await inspector.testConnection();
      if (!connection.ok) {
        print({ connection });
        process.exitCode = 1;
        return;
      }
      print({
        connection,
        databases: await inspector.listDatabases(),
        namespace: await inspector.getNamespaceInfo(CREDENTIALS_NAMESPACE),
      });
    }),
  );

program.parseAsync(process.argv).catch((err) => {
  process.stderr.write(`Fatal: ${String(err)}\n`);
  process.exit(1);
});
