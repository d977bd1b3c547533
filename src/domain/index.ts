/**
 * ドメイン層のエクスポート
 *
 * DDD（Domain-Driven Design）のドメイン層を構成する
 * エンティティ、値オブジェクト、リポジトリインターフェース、ドメインサービスをエクスポートします。
 */

// 値オブジェクト
export * from './value-objects/PortType';
export * from './value-objects/Id';
export * from './value-objects/DataType';
export * from './value-objects/Result';
export * from './value-objects/Position';

// エラー
export * from './errors/GraphErrors';

// アリーナ
export * from './arena/SlotMap';

// エンティティ
export * from './entities/Port';
export * from './entities/Node';
export * from './entities/NodeGraph';

// リポジトリインターフェース
export * from './repositories/IGraphRepository';

// ドメインサービス
export * from './services/DataTypeCatalog';
export * from './services/NodeFactory';
export * from './services/GraphSerializer';
export * from './services/EditorDocument';
