import type { EditorDocument } from '../services/EditorDocument';

/**
 * グラフリポジトリのインターフェース
 *
 * シリアライズ済みのグラフと配置を1つの文書として名前で保存、取得します。
 */
export interface IGraphRepository {
  save(name: string, document: EditorDocument): void;
  findByName(name: string): EditorDocument | undefined;
  findAllNames(): string[];
  delete(name: string): void;
  exists(name: string): boolean;
}
