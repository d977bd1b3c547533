import type { IGraphRepository } from '../../domain/repositories/IGraphRepository';
import type { EditorDocument } from '../../domain/services/EditorDocument';

/**
 * インメモリグラフリポジトリの実装
 *
 * 保存時と取得時に複製するため、呼び出し側の変更は保存内容に影響しません。
 */
export class InMemoryGraphRepository implements IGraphRepository {
  private graphs: Map<string, EditorDocument> = new Map();

  save(name: string, document: EditorDocument): void {
    this.graphs.set(name, structuredClone(document));
  }

  findByName(name: string): EditorDocument | undefined {
    const document = this.graphs.get(name);
    return document ? structuredClone(document) : undefined;
  }

  findAllNames(): string[] {
    return Array.from(this.graphs.keys());
  }

  delete(name: string): void {
    this.graphs.delete(name);
  }

  exists(name: string): boolean {
    return this.graphs.has(name);
  }
}
