import type { Logger } from '../../src/logger/index.js';

export type LoggedLine = [level: 'debug' | 'info' | 'warn' | 'error', message: string];

export function recordingLogger(): { logger: Logger; lines: LoggedLine[] } {
  const lines: LoggedLine[] = [];
  const logger: Logger = {
    debug: message => lines.push(['debug', message]),
    info: message => lines.push(['info', message]),
    warn: message => lines.push(['warn', message]),
    error: message => lines.push(['error', message])
  };
  return { logger, lines };
}
