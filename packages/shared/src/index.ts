/**
 * @tenki/shared - 共通型定義・ユーティリティ
 *
 * ワイヤーフォーマット（JSON-RPC）と天気ドメインレコードの型、
 * バリデーションスキーマ、定数、ユーティリティ関数を提供
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './utils/index.js';
export * from './constants/index.js';
