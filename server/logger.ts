import pino, { Logger } from 'pino';

import { LogLevel } from './config';

export type { Logger };

export type LoggerOptions = {
  readonly name?: string;
  readonly level?: LogLevel;
};

export function buildLogger({ name = 'hcert', level = 'info' }: LoggerOptions = {}): Logger {
  return pino({ name, level });
}
