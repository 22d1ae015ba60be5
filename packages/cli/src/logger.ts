/**
 * @file packages/cli/src/logger.ts
 * @description pino-backed logger. Everything goes to stderr; stdout carries the table.
 */

import pino from 'pino';
import { singleton } from 'tsyringe';

const isDev = process.env.NODE_ENV !== 'production';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

@singleton()
export class Logger {
  private pino: pino.Logger;

  constructor() {
    const level = process.env.LOG_LEVEL || 'warn';
    this.pino = isDev
      ? pino({
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              destination: 2,
              ignore: 'pid,hostname',
              translateTime: 'SYS:standard',
            },
          },
        })
      : pino({ level }, pino.destination(2));
  }

  debug(msgOrObj: string | object, msg?: string): void {
    this.write('debug', msgOrObj, msg);
  }

  info(msgOrObj: string | object, msg?: string): void {
    this.write('info', msgOrObj, msg);
  }

  warn(msgOrObj: string | object, msg?: string): void {
    this.write('warn', msgOrObj, msg);
  }

  error(msgOrObj: string | object, msg?: string): void {
    this.write('error', msgOrObj, msg);
  }

  fatal(msgOrObj: string | object, msg?: string): void {
    this.write('fatal', msgOrObj, msg);
  }

  private write(level: LogLevel, msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === 'string') {
      this.pino[level](msgOrObj);
    } else {
      this.pino[level](msgOrObj, msg);
    }
  }
}

/**
 * The subset of {@link Logger} that collaborators depend on, so tests can
 * hand in plain mocks.
 */
export type LoggerLike = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;
