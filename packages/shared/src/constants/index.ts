/**
 * 共通定数定義
 */

// MCPプロトコル関連
export const MCP_PROTOCOL_VERSION = '2024-11-05';

export const MCP_METHODS = {
  INITIALIZE: 'initialize',
  INITIALIZED: 'notifications/initialized',
  CANCELLED: 'notifications/cancelled',
  TOOLS_LIST: 'tools/list',
  TOOLS_CALL: 'tools/call',
  PING: 'ping',
} as const;

// エラーコード（JSON-RPC 2.0 標準）
export const ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

// 天気ワーカーが公開するツール
export const WEATHER_TOOLS = {
  CURRENT: 'get_current_weather',
  FORECAST: 'get_weather_forecast',
  SEARCH_LOCATION: 'search_location',
} as const;

// 予報日数の範囲
export const FORECAST_DAYS = {
  MIN: 1,
  MAX: 16,
  DEFAULT: 7,
} as const;

/**
 * 取得できなかった項目を表すマーカー
 */
export const UNAVAILABLE = 'N/A';
