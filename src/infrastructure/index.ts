/**
 * インフラストラクチャ層のエクスポート
 *
 * DDDのインフラストラクチャ層を構成する
 * リポジトリ実装、設定、ロガー、ノード定義の読み込み、アダプターをエクスポートします。
 */

// リポジトリ実装
export * from './repositories/InMemoryGraphRepository';

// 設定・ログ
export * from './config/EditorConfig';
export * from './logging/Logger';

// ノード定義
export * from './node-definitions/schemas';
export * from './node-definitions/loader/NodeDefinitionLoader';

// アダプター
export * from './adapters/NodeAdapter';
export * from './adapters/ConnectionAdapter';
