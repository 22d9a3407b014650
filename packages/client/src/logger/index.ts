/**
 * ロガー
 * 結果出力（stdout）と混ざらないよう、ログはすべて stderr に出す
 */
import type { LogLevel } from '@tenki/shared';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const LEVEL_PREFIX: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: '🔍',
  info: '📋',
  warn: '⚠️ ',
  error: '❌'
};

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly scope?: string
  ) {}

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  debug(message: string, ...details: unknown[]): void {
    this.write('debug', message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write('info', message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write('warn', message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.write('error', message, details);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const scope = this.scope ? ` [${this.scope}]` : '';
    console.error(`${LEVEL_PREFIX[level]}${scope} ${message}`, ...details);
  }
}

export function createLogger(level: LogLevel = 'info', scope?: string): ConsoleLogger {
  return new ConsoleLogger(level, scope);
}

/**
 * 何も出力しないロガー（テスト・埋め込み用途）
 */
export const silentLogger: Logger = createLogger('silent');
