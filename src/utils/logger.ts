// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import pino from 'pino';

export function createLogger(level = 'info', isDev = false): pino.Logger {
  return pino({
    level,
    base: { service: 'credentials-store' },
    redact: {
      paths: [
        'password',
        'passwordHash',
        'secret',
        'databaseUrl',
        '*.password',
        '*.passwordHash',
        '*.secret',
        '*.databaseUrl',
      ],
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    ...(isDev && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname,service',
        },
      },
    }),
  });
}

export type Logger = pino.Logger;
