/**
 * アプリケーション層のエクスポート
 *
 * DDDのアプリケーション層を構成する
 * ユースケースとアプリケーションサービスをエクスポートします。
 */

// エラー
export * from './errors/NodeEditorError';

// ユースケース
export * from './use-cases/AddNodeUseCase';
export * from './use-cases/CreateConnectionUseCase';
export * from './use-cases/DeleteNodeUseCase';
export * from './use-cases/DeleteConnectionUseCase';

// アプリケーションサービス
export * from './services/NodeEditorService';
