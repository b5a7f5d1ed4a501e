import * as t from 'io-ts';
import { isLeft } from 'fp-ts/Either';
import { BaseConfig } from '@navch/common';

export type LogLevel = t.TypeOf<typeof LogLevel>;
export const LogLevel = t.union([
  t.literal('fatal'),
  t.literal('error'),
  t.literal('warn'),
  t.literal('info'),
  t.literal('debug'),
  t.literal('trace'),
  t.literal('silent'),
]);

export class AppConfig extends BaseConfig {
  /**
   * HCERT QR code content is prefixed by the Context Identifier string "HC1:".
   */
  readonly prefix: string = this.read('HCERT_PREFIX', 'HC1:') ?? 'HC1:';

  /**
   * Inputs longer than this are rejected before Base45 decoding. The default is the
   * alphanumeric capacity of a version 40 QR code, `0` disables the guard.
   */
  readonly maxInputLength: number = this.readLimit('HCERT_MAX_INPUT_LENGTH', 4296);

  readonly logLevel: LogLevel = this.readLogLevel('LOG_LEVEL', 'info');

  protected readLimit(key: string, defaultValue: number): number {
    const value = this.readNumber(key, defaultValue) ?? defaultValue;
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`Invalid config [${key}]: expected a non-negative integer, got ${value}`);
    }
    return value;
  }

  protected readLogLevel(key: string, defaultValue: LogLevel): LogLevel {
    const value = this.read(key, defaultValue) ?? defaultValue;
    const result = LogLevel.decode(value);
    if (isLeft(result)) {
      throw new Error(`Invalid config [${key}]: expected one of ${LogLevel.name}, got "${value}"`);
    }
    return result.right;
  }
}
