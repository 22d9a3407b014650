/**
 * テスト用の疑似ワーカープロセス
 * stdin に届いた行をパースしてハンドラに渡し、stdout へ応答を書き込む
 */
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { isRecord } from '@tenki/shared';
import type { Spawner, WorkerProcess } from '../../src/transport/index.js';

export interface FakeMessage {
  id?: number | string;
  method?: string;
  params?: Record<string, unknown>;
  result?: unknown;
  error?: unknown;
}

export type FakeHandler = (message: FakeMessage, worker: FakeWorker) => void;

export interface FakeWorkerOptions {
  handler?: FakeHandler;
  /** spawn の代わりに error を発火させる */
  failSpawn?: Error;
  /** SIGTERM を無視する（SIGKILL のみで終了） */
  ignoreSigterm?: boolean;
  /** stdin が閉じられたら自分で終了する */
  exitOnStdinEnd?: boolean;
}

function toMessage(value: unknown): FakeMessage {
  if (!isRecord(value)) {
    return {};
  }

  const message: FakeMessage = {};
  if (typeof value.id === 'number' || typeof value.id === 'string') {
    message.id = value.id;
  }
  if (typeof value.method === 'string') {
    message.method = value.method;
  }
  if (isRecord(value.params)) {
    message.params = value.params;
  }
  if ('result' in value) {
    message.result = value.result;
  }
  if ('error' in value) {
    message.error = value.error;
  }
  return message;
}

export class FakeWorker extends EventEmitter implements WorkerProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;

  readonly received: FakeMessage[] = [];
  readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  private exited = false;
  private buffer = '';

  constructor(private readonly options: FakeWorkerOptions = {}) {
    super();

    this.stdin.setEncoding('utf8');
    this.stdin.on('data', (chunk: string) => {
      this.buffer += chunk;
      const lines = this.buffer.split('\n');
      this.buffer = lines.pop() ?? '';

      for (const line of lines) {
        if (!line.trim()) {
          continue;
        }
        const message = toMessage(JSON.parse(line));
        this.received.push(message);
        this.options.handler?.(message, this);
      }
    });

    this.stdin.on('end', () => {
      if (this.options.exitOnStdinEnd) {
        this.exit(0);
      }
    });

    setImmediate(() => {
      if (this.options.failSpawn) {
        this.emit('error', this.options.failSpawn);
      } else {
        this.emit('spawn');
      }
    });
  }

  send(message: Record<string, unknown>): void {
    this.sendRaw(`${JSON.stringify({ jsonrpc: '2.0', ...message })}\n`);
  }

  sendRaw(text: string): void {
    if (!this.exited) {
      this.stdout.write(text);
    }
  }

  reply(id: number | string | undefined, result: unknown): void {
    this.send({ id, result });
  }

  replyError(id: number | string | undefined, code: number, message: string): void {
    this.send({ id, error: { code, message } });
  }

  methods(): string[] {
    return this.received.flatMap(message => (message.method === undefined ? [] : [message.method]));
  }

  exit(code: number | null = 0, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.stdout.end();
    this.stderr.end();

    setImmediate(() => {
      this.emit('exit', code, signal);
      this.emit('close', code, signal);
    });
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    if (signal === 'SIGTERM' && this.options.ignoreSigterm) {
      return true;
    }
    this.exit(null, typeof signal === 'string' ? signal : 'SIGTERM');
    return true;
  }
}

export interface SpawnCall {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * 呼び出しを記録し、毎回新しい FakeWorker を返す Spawner
 */
export function fakeSpawner(options: FakeWorkerOptions = {}): {
  spawner: Spawner;
  calls: SpawnCall[];
  workers: FakeWorker[];
} {
  const calls: SpawnCall[] = [];
  const workers: FakeWorker[] = [];

  const spawner: Spawner = (command, args, spawnOptions) => {
    calls.push({ command, args, cwd: spawnOptions.cwd?.toString(), env: spawnOptions.env });
    const worker = new FakeWorker(options);
    workers.push(worker);
    return worker;
  };

  return { spawner, calls, workers };
}

export const INITIALIZE_RESULT = {
  protocolVersion: '2024-11-05',
  capabilities: { tools: {} },
  serverInfo: { name: 'weather', version: '1.0.0' }
};

/**
 * initialize / tools/list / tools/call に応答する天気ワーカー
 * tools/call は toolTexts[name] を1つのテキストブロックとして返す
 */
export function weatherHandler(toolTexts: Record<string, string>): FakeHandler {
  return (message, worker) => {
    switch (message.method) {
      case 'initialize':
        worker.reply(message.id, INITIALIZE_RESULT);
        break;
      case 'tools/list':
        worker.reply(message.id, {
          tools: Object.keys(toolTexts).map(name => ({ name, description: `${name} tool` }))
        });
        break;
      case 'tools/call': {
        const name = message.params?.name;
        const text = typeof name === 'string' ? toolTexts[name] : undefined;
        if (text === undefined) {
          worker.replyError(message.id, -32602, `Unknown tool: ${String(name)}`);
        } else {
          worker.reply(message.id, { content: [{ type: 'text', text }] });
        }
        break;
      }
      case 'ping':
        worker.reply(message.id, {});
        break;
    }
  };
}

/**
 * Promise の拒否理由を返す。解決した場合は失敗させる
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}
