/**
 * エラーハンドリング
 * ブリッジ固有のエラー階層と、エラーの分類・記録を行う ErrorReporter
 */
import { BridgeError, toError, type JsonRpcId } from '@tenki/shared';
import type { Logger } from '../logger/index.js';

// ワーカープロセスを起動できなかった
export class SpawnError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super(message, 'SPAWN_ERROR', details);
    this.name = 'SpawnError';
  }
}

export class AlreadyStartedError extends BridgeError {
  constructor(message = 'Already started') {
    super(message, 'ALREADY_STARTED');
    this.name = 'AlreadyStartedError';
  }
}

// initialize が失敗、タイムアウト、または不正な応答を返した
export class HandshakeError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super(message, 'HANDSHAKE_ERROR', details);
    this.name = 'HandshakeError';
  }
}

/**
 * ワーカーがエラー応答を返した
 */
export class RemoteError extends BridgeError {
  constructor(
    public readonly remoteCode: number,
    message: string,
    public readonly data?: unknown
  ) {
    super(message, 'REMOTE_ERROR', { code: remoteCode, data });
    this.name = 'RemoteError';
  }
}

// プロセス終了または停止により呼び出しが完了しなかった
export class TransportClosedError extends BridgeError {
  constructor(message = 'Transport closed') {
    super(message, 'TRANSPORT_CLOSED');
    this.name = 'TransportClosedError';
  }
}

/**
 * 受信行がJSON-RPCエンベロープとして解釈できなかった
 * id が読み取れた場合はその呼び出しだけを失敗させる
 */
export class DecodeError extends BridgeError {
  constructor(
    message: string,
    public readonly id?: JsonRpcId
  ) {
    super(message, 'DECODE_ERROR', id === undefined ? undefined : { id });
    this.name = 'DecodeError';
  }
}

export class MalformedResultError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super(message, 'MALFORMED_RESULT', details);
    this.name = 'MalformedResultError';
  }
}

export class NotConnectedError extends BridgeError {
  constructor(message = 'Session is not connected') {
    super(message, 'NOT_CONNECTED');
    this.name = 'NotConnectedError';
  }
}

export class RequestTimeoutError extends BridgeError {
  constructor(
    public readonly method: string,
    public readonly timeout: number
  ) {
    super(`Request "${method}" timed out after ${timeout}ms`, 'REQUEST_TIMEOUT', { method, timeout });
    this.name = 'RequestTimeoutError';
  }
}

export class RequestCancelledError extends BridgeError {
  constructor(public readonly method: string) {
    super(`Request "${method}" was cancelled`, 'REQUEST_CANCELLED', { method });
    this.name = 'RequestCancelledError';
  }
}

export class InvalidArgumentError extends BridgeError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export interface ErrorContext {
  operation: string;
  tool?: string;
  location?: string;
  timestamp?: Date;
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export interface ErrorLog {
  id: string;
  error: Error;
  context: ErrorContext;
  severity: ErrorSeverity;
  timestamp: Date;
}

export class ErrorReporter {
  private errorLog: ErrorLog[] = [];
  private sequence = 0;

  constructor(
    private readonly logger: Logger,
    private readonly maxLogSize = 1000
  ) {}

  /**
   * エラーを正規化・分類して記録し、正規化後のエラーを返す
   */
  report(error: unknown, context: ErrorContext): Error {
    const normalizedError = toError(error);
    const severity = this.classifyError(normalizedError);

    this.logError(normalizedError, context, severity);

    return normalizedError;
  }

  classifyError(error: Error): ErrorSeverity {
    if (error instanceof BridgeError) {
      switch (error.code) {
        case 'SPAWN_ERROR':
        case 'HANDSHAKE_ERROR':
        case 'CONFIG_ERROR':
          return ErrorSeverity.HIGH;
        case 'TRANSPORT_CLOSED':
        case 'REMOTE_ERROR':
        case 'REQUEST_TIMEOUT':
        case 'DECODE_ERROR':
        case 'MALFORMED_RESULT':
          return ErrorSeverity.MEDIUM;
        default:
          return ErrorSeverity.LOW;
      }
    }

    // 一般的なエラーの分類
    const message = error.message.toLowerCase();

    if (message.includes('out of memory') || message.includes('maximum call stack')) {
      return ErrorSeverity.CRITICAL;
    }

    if (message.includes('permission denied') || message.includes('enoent')) {
      return ErrorSeverity.HIGH;
    }

    if (message.includes('timeout') || message.includes('epipe')) {
      return ErrorSeverity.MEDIUM;
    }

    return ErrorSeverity.LOW;
  }

  private logError(error: Error, context: ErrorContext, severity: ErrorSeverity): void {
    const timestamp = new Date();
    const logEntry: ErrorLog = {
      id: `error-${++this.sequence}`,
      error,
      context: {
        ...context,
        timestamp: context.timestamp ?? timestamp
      },
      severity,
      timestamp
    };

    this.errorLog.push(logEntry);

    // ログサイズ制限
    if (this.errorLog.length > this.maxLogSize) {
      this.errorLog = this.errorLog.slice(-this.maxLogSize);
    }

    const prefix = this.getSeverityPrefix(severity);
    const target = context.tool ? `${context.operation}(${context.tool})` : context.operation;
    const line = `${prefix} ${target}: ${error.message}`;

    if (severity === ErrorSeverity.HIGH || severity === ErrorSeverity.CRITICAL) {
      this.logger.error(line);
      if (error.stack) {
        this.logger.debug(error.stack);
      }
    } else {
      this.logger.warn(line);
    }
  }

  private getSeverityPrefix(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.LOW:
        return '[low]';
      case ErrorSeverity.MEDIUM:
        return '[medium]';
      case ErrorSeverity.HIGH:
        return '[high]';
      case ErrorSeverity.CRITICAL:
        return '[critical]';
    }
  }

  // Public API
  getRecentErrors(limit = 50): ErrorLog[] {
    return this.errorLog.slice(-limit);
  }

  getErrorStats(): {
    total: number;
    bySeverity: Record<ErrorSeverity, number>;
    recentCount: number;
  } {
    const recentThreshold = Date.now() - 300000; // 5分前

    const bySeverity: Record<ErrorSeverity, number> = {
      [ErrorSeverity.LOW]: 0,
      [ErrorSeverity.MEDIUM]: 0,
      [ErrorSeverity.HIGH]: 0,
      [ErrorSeverity.CRITICAL]: 0
    };

    let recentCount = 0;

    for (const log of this.errorLog) {
      bySeverity[log.severity]++;

      if (log.timestamp.getTime() > recentThreshold) {
        recentCount++;
      }
    }

    return {
      total: this.errorLog.length,
      bySeverity,
      recentCount
    };
  }

  clearErrorLog(): void {
    this.errorLog = [];
  }
}
