/**
 * @tenki/cli - コマンドラインインターフェース
 *
 * 現在の天気・予報・地名検索と設定管理を提供
 */

export * from './utils/index.js';

export { TenkiCli, type TenkiCliOptions } from './cli.js';
