// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@objmutex/config-service';
import pino, { type Logger } from 'pino';

/**
 * Creates the root logger for a process using the mutex.
 *
 * Level comes from `LOG_LEVEL`. With `PRETTY_LOGS_ENABLED` the output goes through
 * pino-pretty, otherwise it is plain JSON lines.
 *
 * @param name - Logger name, usually the application's.
 */
export function createLogger(name: string = 'objmutex'): Logger {
  const prettyLogsEnabled = ConfigService.get('PRETTY_LOGS_ENABLED');

  return pino({
    name,
    level: ConfigService.get('LOG_LEVEL'),
    ...(prettyLogsEnabled && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: true,
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}
