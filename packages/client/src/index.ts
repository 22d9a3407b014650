/**
 * @tenki/client - 天気ワーカーのMCPクライアント
 *
 * 子プロセスの stdin/stdout 上でJSON-RPCを話すトランスポート、
 * MCPセッション、応答テキストのデコーダ、設定・ログ・エラー処理を提供
 */

export * from './framing/index.js';
export * from './codec/index.js';
export * from './transport/index.js';
export * from './session/index.js';
export * from './decoders/index.js';
export * from './error/index.js';
export * from './logger/index.js';
export * from './config/index.js';

export { WeatherClient, type WeatherClientOptions } from './weather/index.js';
