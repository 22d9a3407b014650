/**
 * MCPセッション
 * initialize / notifications/initialized のハンドシェイクと、
 * ツール呼び出しなどの型付きリモート呼び出しを提供する
 */
import {
  InitializeResultSchema,
  MCP_METHODS,
  MCP_PROTOCOL_VERSION,
  ToolCallResultSchema,
  ToolsListResultSchema,
  toError,
  type ClientCapabilities,
  type ClientInfo,
  type JsonObject,
  type ServerInfo,
  type ToolCallResult,
  type ToolDescriptor
} from '@tenki/shared';
import {
  AlreadyStartedError,
  HandshakeError,
  MalformedResultError,
  NotConnectedError,
  SpawnError,
  TransportClosedError
} from '../error/index.js';
import { silentLogger, type Logger } from '../logger/index.js';
import type { ProcessTransport, RequestOptions } from '../transport/index.js';

export type SessionState = 'unstarted' | 'handshaking' | 'ready' | 'closed';

export interface SessionOptions {
  protocolVersion?: string;
  capabilities?: ClientCapabilities;
  clientInfo?: ClientInfo;
  handshakeTimeout?: number;
  /** 未指定ならトランスポートの既定値を使う */
  requestTimeout?: number;
  logger?: Logger;
}

const DEFAULT_CLIENT_INFO: ClientInfo = {
  name: 'tenki-client',
  version: '0.1.0'
};

export class Session {
  private state: SessionState = 'unstarted';
  private serverInfo?: ServerInfo;
  private serverCapabilities: Record<string, unknown> = {};
  private serverProtocolVersion?: string;

  private readonly protocolVersion: string;
  private readonly capabilities: ClientCapabilities;
  private readonly clientInfo: ClientInfo;
  private readonly handshakeTimeout: number;
  private readonly requestTimeout?: number;
  private readonly logger: Logger;

  constructor(
    private readonly transport: ProcessTransport,
    options: SessionOptions = {}
  ) {
    this.protocolVersion = options.protocolVersion ?? MCP_PROTOCOL_VERSION;
    this.capabilities = options.capabilities ?? { tools: {} };
    this.clientInfo = options.clientInfo ?? DEFAULT_CLIENT_INFO;
    this.handshakeTimeout = options.handshakeTimeout ?? 10000;
    this.requestTimeout = options.requestTimeout;
    this.logger = options.logger ?? silentLogger;

    this.transport.onExit = (code, signal) => {
      if (this.state !== 'closed') {
        this.logger.warn(`Session closed: worker exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`);
        this.state = 'closed';
      }
    };
  }

  /**
   * ワーカーを起動してハンドシェイクを行う
   * 起動失敗、ハンドシェイク中のプロセス終了、起動中の close() は false を返す
   */
  async start(): Promise<boolean> {
    if (this.state !== 'unstarted') {
      throw new AlreadyStartedError(`Session cannot be started from state "${this.state}"`);
    }

    try {
      await this.transport.start();
    } catch (error) {
      this.state = 'closed';
      if (error instanceof SpawnError) {
        this.logger.error(`Failed to start worker: ${error.message}`);
        return false;
      }
      if (error instanceof TransportClosedError) {
        this.logger.info(`Session closed while starting: ${error.message}`);
        return false;
      }
      throw error;
    }

    if (this.isClosed()) {
      await this.transport.stop();
      return false;
    }

    this.state = 'handshaking';

    try {
      await this.handshake();
    } catch (error) {
      await this.transport.stop();
      this.state = 'closed';

      if (error instanceof TransportClosedError) {
        this.logger.error(`Worker went away during handshake: ${error.message}`);
        return false;
      }
      if (error instanceof HandshakeError) {
        throw error;
      }

      const cause = toError(error);
      throw new HandshakeError(`Handshake failed: ${cause.message}`, { cause });
    }

    // ハンドシェイク中にワーカーが終了するか close() されていないか
    if (this.state !== 'handshaking') {
      await this.transport.stop();
      return false;
    }

    this.state = 'ready';
    const server = this.serverInfo ? `${this.serverInfo.name} ${this.serverInfo.version}` : 'unknown server';
    this.logger.info(`✅ Session ready (${server}, protocol ${this.serverProtocolVersion ?? this.protocolVersion})`);

    return true;
  }

  private async handshake(): Promise<void> {
    const params: JsonObject = {
      protocolVersion: this.protocolVersion,
      capabilities: this.capabilities,
      clientInfo: { ...this.clientInfo }
    };

    const result = await this.transport.request(MCP_METHODS.INITIALIZE, params, {
      timeout: this.handshakeTimeout
    });

    const parsed = InitializeResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new HandshakeError('Malformed initialize result', { issues: parsed.error.issues });
    }

    this.serverInfo = parsed.data.serverInfo;
    this.serverCapabilities = parsed.data.capabilities;
    this.serverProtocolVersion = parsed.data.protocolVersion;

    if (this.serverProtocolVersion && this.serverProtocolVersion !== this.protocolVersion) {
      this.logger.warn(
        `Worker negotiated protocol ${this.serverProtocolVersion} (requested ${this.protocolVersion})`
      );
    }

    await this.transport.notify(MCP_METHODS.INITIALIZED, {});
  }

  /**
   * ツールを呼び出し、先頭コンテンツブロックのテキストを返す
   */
  async invoke(toolName: string, args: JsonObject = {}): Promise<string> {
    const result = await this.callTool(toolName, args);
    const first = result.content[0];

    if (!first) {
      throw new MalformedResultError(`Tool "${toolName}" returned no content`);
    }
    if (first.type !== 'text' || typeof first.text !== 'string') {
      throw new MalformedResultError(
        `Tool "${toolName}" returned a "${first.type}" block where text was expected`
      );
    }

    return first.text;
  }

  async callTool(toolName: string, args: JsonObject = {}, options?: RequestOptions): Promise<ToolCallResult> {
    const result = await this.request(
      MCP_METHODS.TOOLS_CALL,
      { name: toolName, arguments: args },
      options
    );

    const parsed = ToolCallResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new MalformedResultError(`Tool "${toolName}" returned a malformed result`, {
        issues: parsed.error.issues
      });
    }

    return parsed.data;
  }

  async listTools(options?: RequestOptions): Promise<ToolDescriptor[]> {
    const result = await this.request(MCP_METHODS.TOOLS_LIST, {}, options);

    const parsed = ToolsListResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new MalformedResultError('tools/list returned a malformed result', {
        issues: parsed.error.issues
      });
    }

    return parsed.data.tools;
  }

  async ping(options?: RequestOptions): Promise<void> {
    await this.request(MCP_METHODS.PING, undefined, options);
  }

  async close(): Promise<void> {
    this.state = 'closed';
    await this.transport.stop();
  }

  getState(): SessionState {
    return this.state;
  }

  private isClosed(): boolean {
    return this.state === 'closed';
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  getServerInfo(): ServerInfo | undefined {
    return this.serverInfo;
  }

  getServerCapabilities(): Record<string, unknown> {
    return { ...this.serverCapabilities };
  }

  private request(method: string, params?: JsonObject, options: RequestOptions = {}): Promise<unknown> {
    if (this.state !== 'ready') {
      return Promise.reject(new NotConnectedError(`Cannot call "${method}": session is ${this.state}`));
    }

    return this.transport.request(method, params, {
      timeout: options.timeout ?? this.requestTimeout,
      signal: options.signal
    });
  }
}
