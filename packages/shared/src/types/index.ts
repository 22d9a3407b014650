/**
 * 共通型定義
 */

// JSON値
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// JSON-RPC / MCPプロトコル関連型
export type JsonRpcId = number | string;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: JsonObject;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: JsonObject;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/**
 * デコード済みの受信メッセージ
 * ワーカーからの応答・通知・リクエストを判別可能な形で表す
 */
export type IncomingMessage =
  | { kind: 'result'; id: JsonRpcId; result: unknown }
  | { kind: 'error'; id: JsonRpcId; error: JsonRpcErrorObject }
  | { kind: 'notification'; method: string; params: unknown }
  | { kind: 'request'; id: JsonRpcId; method: string; params: unknown };

// ハンドシェイク関連型
export type ClientInfo = {
  name: string;
  version: string;
};

export type ClientCapabilities = JsonObject;

// 天気ドメインレコード
export interface WeatherSnapshot {
  readonly location: string;
  readonly temperature: string;
  readonly feelsLike: string;
  readonly humidity: string;
  readonly wind: string;
  readonly pressure: string;
  readonly cloudCover: string;
  readonly precipitation: string;
  readonly timeOfDay: string;
  readonly rawText: string;
}

/**
 * 1日分の予報
 * date以外は上流フォーマットで任意項目のため、未記載なら省略される
 */
export interface DailyEntry {
  readonly date: string;
  readonly temperature?: string;
  readonly high?: string;
  readonly low?: string;
  readonly precipitation?: string;
  readonly wind?: string;
}

export interface ForecastSeries {
  readonly location: string;
  readonly days: number;
  readonly entries: readonly DailyEntry[];
  readonly rawText: string;
}

export interface LocationMatch {
  readonly name: string;
  readonly country: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly rawText: string;
}

// エラー型
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'BridgeError';
  }
}
