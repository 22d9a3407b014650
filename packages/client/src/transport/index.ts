/**
 * プロセストランスポート
 * ワーカープロセスを1つ所有し、stdin/stdout 上の改行区切りJSON-RPCで
 * リクエストと応答を id で対応付ける
 */
import { spawn, type SpawnOptionsWithoutStdio } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import {
  ERROR_CODES,
  MCP_METHODS,
  toError,
  type IncomingMessage,
  type JsonObject,
  type JsonRpcId
} from '@tenki/shared';
import { LineFramer } from '../framing/index.js';
import { MessageCodec } from '../codec/index.js';
import {
  AlreadyStartedError,
  DecodeError,
  RemoteError,
  RequestCancelledError,
  RequestTimeoutError,
  SpawnError,
  TransportClosedError
} from '../error/index.js';
import { silentLogger, type Logger } from '../logger/index.js';

/**
 * トランスポートが必要とする子プロセスの最小インターフェース
 * child_process の ChildProcessWithoutNullStreams はこれを満たす
 */
export interface WorkerProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly pid?: number;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type Spawner = (
  command: string,
  args: string[],
  options: SpawnOptionsWithoutStdio
) => WorkerProcess;

export const defaultSpawner: Spawner = (command, args, options) => spawn(command, args, options);

export interface ProcessTransportOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** 0 は無期限に待つ */
  requestTimeout?: number;
  shutdownTimeout?: number;
  /** stdin を閉じてから SIGTERM を送るまで待つ時間（既定は shutdownTimeout と 200ms の小さい方） */
  exitGracePeriod?: number;
  spawner?: Spawner;
  logger?: Logger;
}

export interface RequestOptions {
  timeout?: number;
  signal?: AbortSignal;
}

export type TransportState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

interface PendingCall {
  id: number;
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
  detach?: () => void;
}

export class ProcessTransport {
  private readonly command: string;
  private readonly args: string[];
  private readonly cwd?: string;
  private readonly env: Record<string, string>;
  private readonly requestTimeout: number;
  private readonly shutdownTimeout: number;
  private readonly exitGracePeriod: number;
  private readonly spawner: Spawner;
  private readonly logger: Logger;

  private readonly framer = new LineFramer();
  private readonly stderrFramer = new LineFramer();
  private readonly codec = new MessageCodec();
  private readonly pending = new Map<number, PendingCall>();

  private child?: WorkerProcess;
  private closed?: Promise<void>;
  private stopping?: Promise<void>;
  private startup?: Promise<void>;
  private stopRequested = false;
  private state: TransportState = 'idle';
  private lastId = 0;

  public onNotification?: (method: string, params: unknown) => void;
  public onExit?: (code: number | null, signal: NodeJS.Signals | null) => void;
  public onError?: (error: Error) => void;

  constructor(options: ProcessTransportOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.cwd = options.cwd;
    this.env = options.env ?? {};
    this.requestTimeout = options.requestTimeout ?? 0;
    this.shutdownTimeout = options.shutdownTimeout ?? 5000;
    this.exitGracePeriod = options.exitGracePeriod ?? Math.min(200, this.shutdownTimeout);
    this.spawner = options.spawner ?? defaultSpawner;
    this.logger = options.logger ?? silentLogger;
  }

  async start(): Promise<void> {
    if (this.state === 'starting' || this.state === 'running' || this.state === 'stopping') {
      throw new AlreadyStartedError(`Worker process is already ${this.state}`);
    }

    this.state = 'starting';
    this.stopRequested = false;
    this.framer.reset();
    this.stderrFramer.reset();

    const startup = this.boot();
    // 起動中の stop() はこれを待つ
    this.startup = startup.catch(() => undefined);

    try {
      await startup;
    } finally {
      this.startup = undefined;
    }
  }

  private async boot(): Promise<void> {
    const commandLine = [this.command, ...this.args].join(' ');
    let child: WorkerProcess;

    try {
      child = await this.launch();
    } catch (error) {
      this.state = 'stopped';
      const cause = toError(error);
      throw new SpawnError(`Failed to launch worker "${commandLine}": ${cause.message}`, {
        command: this.command,
        args: this.args,
        cause
      });
    }

    this.child = child;
    this.attach(child);
    this.state = 'running';

    this.logger.info(`🚀 Started worker: ${commandLine} (pid ${child.pid ?? 'unknown'})`);

    if (this.stopRequested) {
      this.stopRequested = false;
      await this.stop();
      throw new TransportClosedError('Transport stopped while the worker was starting');
    }
  }

  private async launch(): Promise<WorkerProcess> {
    const child = this.spawner(this.command, this.args, {
      cwd: this.cwd,
      env: { ...process.env, ...this.env }
    });

    try {
      await waitForSpawn(child);
    } catch (error) {
      child.on('error', (lateError: Error) => {
        this.logger.debug(`Worker failed after launch error: ${lateError.message}`);
      });
      throw error;
    }

    return child;
  }

  /**
   * リクエストを送信し、同じ id の応答を待つ
   */
  request(method: string, params?: JsonObject, options: RequestOptions = {}): Promise<unknown> {
    if (this.state !== 'running' || !this.child) {
      return Promise.reject(
        new TransportClosedError(`Cannot send "${method}": worker process is not running`)
      );
    }

    if (options.signal?.aborted) {
      return Promise.reject(new RequestCancelledError(method));
    }

    // id の採番と登録は await を挟まずに行う
    const id = ++this.lastId;
    const frame = this.framer.frame(this.codec.encodeRequest(id, method, params));
    const timeout = options.timeout ?? this.requestTimeout;
    const signal = options.signal;

    return new Promise<unknown>((resolve, reject) => {
      const call: PendingCall = { id, method, resolve, reject };
      this.pending.set(id, call);

      if (timeout > 0) {
        call.timer = setTimeout(() => {
          this.abandon(id, new RequestTimeoutError(method, timeout));
        }, timeout);
      }

      if (signal) {
        const onAbort = (): void => {
          this.abandon(id, new RequestCancelledError(method));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        call.detach = () => signal.removeEventListener('abort', onAbort);
      }

      this.logger.debug(`→ ${method} #${id}`);

      this.write(frame).catch((error: unknown) => {
        this.rejectPending(id, toError(error));
      });
    });
  }

  async notify(method: string, params?: JsonObject): Promise<void> {
    if (this.state !== 'running' || !this.child) {
      throw new TransportClosedError(`Cannot send "${method}": worker process is not running`);
    }

    this.logger.debug(`→ ${method} (notification)`);
    await this.write(this.framer.frame(this.codec.encodeNotification(method, params)));
  }

  /**
   * ワーカーを終了させ、未完了の呼び出しをすべて TransportClosedError で失敗させる
   * 複数回呼んでも安全。起動中なら起動を待ってから停止する
   */
  stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }

    if (this.state === 'starting' && this.startup) {
      this.stopRequested = true;
      return this.startup;
    }

    const child = this.child;
    if (!child) {
      return Promise.resolve();
    }

    this.stopping = this.shutdown(child).finally(() => {
      this.stopping = undefined;
    });

    return this.stopping;
  }

  getState(): TransportState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  getPid(): number | undefined {
    return this.child?.pid;
  }

  private attach(child: WorkerProcess): void {
    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      for (const line of this.framer.push(chunk)) {
        this.handleLine(line);
      }
    });
    child.stdout.on('end', () => {
      const rest = this.framer.flush();
      if (rest !== undefined) {
        this.handleLine(rest);
      }
    });

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      for (const line of this.stderrFramer.push(chunk)) {
        this.logStderr(line);
      }
    });
    child.stderr.on('end', () => {
      const rest = this.stderrFramer.flush();
      if (rest !== undefined) {
        this.logStderr(rest);
      }
    });

    // ワーカー終了後の書き込みは EPIPE になる。失敗は write() のコールバックで扱う
    child.stdin.on('error', (error: Error) => {
      this.logger.debug(`Worker stdin error: ${error.message}`);
    });

    child.on('error', (error: Error) => {
      this.logger.error(`Worker process error: ${error.message}`);
      this.notifyError(error);
    });

    this.closed = new Promise<void>(resolve => {
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        this.handleClose(child, code, signal);
        resolve();
      });
    });
  }

  private logStderr(line: string): void {
    this.logger.debug(`[worker stderr] ${line.trimEnd()}`);
  }

  private handleLine(line: string): void {
    let message: IncomingMessage;

    try {
      message = this.codec.decode(line);
    } catch (error) {
      const decodeError = error instanceof DecodeError ? error : new DecodeError(toError(error).message);

      if (decodeError.id !== undefined && this.rejectPending(decodeError.id, decodeError)) {
        return;
      }

      this.logger.warn(`Protocol anomaly: ${decodeError.message}`);
      this.notifyError(decodeError);
      return;
    }

    switch (message.kind) {
      case 'result':
        this.logger.debug(`← result #${message.id}`);
        if (!this.resolvePending(message.id, message.result)) {
          this.logger.warn(`Protocol anomaly: dropping response for unknown request id ${message.id}`);
        }
        break;

      case 'error': {
        const { code, message: text, data } = message.error;
        this.logger.debug(`← error #${message.id}: ${code} ${text}`);
        if (!this.rejectPending(message.id, new RemoteError(code, text, data))) {
          this.logger.warn(`Protocol anomaly: dropping error for unknown request id ${message.id}`);
        }
        break;
      }

      case 'notification':
        this.logger.debug(`← ${message.method} (notification)`);
        try {
          this.onNotification?.(message.method, message.params);
        } catch (error) {
          this.logger.error(`Notification handler failed: ${toError(error).message}`);
        }
        break;

      case 'request':
        this.answerWorkerRequest(message.id, message.method);
        break;
    }
  }

  // ワーカー発のリクエストには ping のみ応答する
  private answerWorkerRequest(id: JsonRpcId, method: string): void {
    const payload =
      method === MCP_METHODS.PING
        ? this.codec.encodeResult(id, {})
        : this.codec.encodeError(id, {
            code: ERROR_CODES.METHOD_NOT_FOUND,
            message: `Method not found: ${method}`
          });

    this.write(this.framer.frame(payload)).catch((error: unknown) => {
      this.logger.debug(`Failed to answer worker request ${id}: ${toError(error).message}`);
    });
  }

  private handleClose(child: WorkerProcess, code: number | null, signal: NodeJS.Signals | null): void {
    if (this.child !== child) {
      return;
    }

    const expected = this.state === 'stopping';
    const reason = `Worker process exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`;

    if (expected) {
      this.logger.info(`✅ ${reason}`);
    } else {
      this.logger.warn(reason);
    }

    this.release(child, reason);

    try {
      this.onExit?.(code, signal);
    } catch (error) {
      this.logger.error(`Exit handler failed: ${toError(error).message}`);
    }
  }

  private async shutdown(child: WorkerProcess): Promise<void> {
    this.state = 'stopping';
    this.logger.info('🛑 Stopping worker process...');

    const closed = this.closed ?? Promise.resolve();

    // stdin を閉じれば自分で終了するワーカーにはシグナルを送らない
    child.stdin.end();
    if (await settlesWithin(closed, this.exitGracePeriod)) {
      this.release(child, 'Transport stopped');
      return;
    }

    child.kill('SIGTERM');

    if (!(await settlesWithin(closed, this.shutdownTimeout))) {
      this.logger.warn(`Worker did not exit within ${this.shutdownTimeout}ms, sending SIGKILL`);
      child.kill('SIGKILL');

      if (!(await settlesWithin(closed, this.shutdownTimeout))) {
        this.logger.warn('Worker did not report exit after SIGKILL, releasing handle');
      }
    }

    this.release(child, 'Transport stopped');
  }

  private release(child: WorkerProcess, reason: string): void {
    if (this.child !== child) {
      return;
    }

    for (const id of Array.from(this.pending.keys())) {
      this.rejectPending(id, new TransportClosedError(reason));
    }

    this.child = undefined;
    this.closed = undefined;
    this.framer.reset();
    this.stderrFramer.reset();
    this.state = 'stopped';
  }

  private write(frame: string): Promise<void> {
    const stdin = this.child?.stdin;
    if (!stdin || !stdin.writable) {
      return Promise.reject(new TransportClosedError('Worker stdin is not writable'));
    }

    return new Promise<void>((resolve, reject) => {
      stdin.write(frame, 'utf8', (error?: Error | null) => {
        if (error) {
          reject(new TransportClosedError(`Write to worker failed: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  // タイムアウト・中断時はワーカーにもキャンセルを通知する
  private abandon(id: number, error: Error): void {
    if (!this.rejectPending(id, error)) {
      return;
    }

    this.logger.warn(error.message);

    if (this.state === 'running') {
      this.notify(MCP_METHODS.CANCELLED, { requestId: id, reason: error.message }).catch(
        (notifyError: unknown) => {
          this.logger.debug(`Failed to send cancellation for #${id}: ${toError(notifyError).message}`);
        }
      );
    }
  }

  private takePending(id: JsonRpcId): PendingCall | undefined {
    if (typeof id !== 'number') {
      return undefined;
    }

    const call = this.pending.get(id);
    if (!call) {
      return undefined;
    }

    this.pending.delete(id);
    if (call.timer) {
      clearTimeout(call.timer);
    }
    call.detach?.();

    return call;
  }

  private resolvePending(id: JsonRpcId, result: unknown): boolean {
    const call = this.takePending(id);
    if (!call) {
      return false;
    }
    call.resolve(result);
    return true;
  }

  private rejectPending(id: JsonRpcId, error: Error): boolean {
    const call = this.takePending(id);
    if (!call) {
      return false;
    }
    call.reject(error);
    return true;
  }

  private notifyError(error: Error): void {
    try {
      this.onError?.(error);
    } catch (handlerError) {
      this.logger.error(`Error handler failed: ${toError(handlerError).message}`);
    }
  }
}

function waitForSpawn(child: WorkerProcess): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      reject(error);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  return new Promise<boolean>(resolve => {
    const timer = setTimeout(() => resolve(false), ms);
    void promise.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}
