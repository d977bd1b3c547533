import { readFileSync } from 'node:fs';
import { NamedDataType } from '../../../domain/value-objects/DataType';
import { DataTypeCatalog } from '../../../domain/services/DataTypeCatalog';
import type { NodeDefinition, NodeDefinitionLibrary } from '../../../types';
import { NodeDefinitionLibrarySchema } from '../schemas';

/**
 * ノード定義ローダー
 *
 * JSON のノード定義ライブラリを検証して読み込み、データ型カタログを組み立てます。
 * ノードが参照するデータ型はすべてカタログに登録済みでなければなりません。
 */
export class NodeDefinitionLoader {
  private definitions: Map<string, NodeDefinition> = new Map();
  private categories: Map<string, NodeDefinition[]> = new Map();
  private readonly catalog = new DataTypeCatalog();

  constructor(libraries: unknown[] = []) {
    for (const library of libraries) {
      this.loadLibrary(library);
    }
  }

  /**
   * ライブラリを検証して読み込む
   *
   * 不正な文書は ZodError、未知のデータ型や重複したIDは Error として投げられます。
   */
  loadLibrary(input: unknown): NodeDefinitionLibrary {
    const library: NodeDefinitionLibrary = NodeDefinitionLibrarySchema.parse(input);

    // 検証がすべて通るまでカタログと定義には何も登録しない
    const newTypes = new Set<string>();
    for (const dataType of library.dataTypes) {
      if (this.catalog.has(dataType.name) || newTypes.has(dataType.name)) {
        throw new Error(`Data type "${dataType.name}" is already registered`);
      }
      newTypes.add(dataType.name);
    }

    const newIds = new Set<string>();
    for (const def of library.nodes) {
      if (this.definitions.has(def.id) || newIds.has(def.id)) {
        throw new Error(`Node definition "${def.id}" is already loaded`);
      }
      newIds.add(def.id);
      for (const port of [...def.inputs, ...def.outputs]) {
        if (!this.catalog.has(port.type) && !newTypes.has(port.type)) {
          throw new Error(`Node "${def.id}" uses unknown data type "${port.type}"`);
        }
      }
    }

    for (const dataType of library.dataTypes) {
      this.catalog.register(new NamedDataType(dataType.name, dataType.compatibleWith));
    }
    for (const def of library.nodes) {
      this.definitions.set(def.id, def);

      const categoryList = this.categories.get(def.category) || [];
      categoryList.push(def);
      this.categories.set(def.category, categoryList);
    }
    return library;
  }

  /**
   * JSON ファイルからライブラリを読み込む
   */
  loadLibraryFile(path: string | URL): NodeDefinitionLibrary {
    const text = readFileSync(path, 'utf8');
    return this.loadLibrary(JSON.parse(text));
  }

  getCatalog(): DataTypeCatalog {
    return this.catalog;
  }

  getDefinition(id: string): NodeDefinition | undefined {
    return this.definitions.get(id);
  }

  getAllDefinitions(): NodeDefinition[] {
    return Array.from(this.definitions.values());
  }

  getCategories(): string[] {
    return Array.from(this.categories.keys());
  }

  getDefinitionsByCategory(category: string): NodeDefinition[] {
    return this.categories.get(category) || [];
  }

  searchDefinitions(query: string): NodeDefinition[] {
    const lowerQuery = query.toLowerCase();
    return this.getAllDefinitions().filter(def =>
      def.name.toLowerCase().includes(lowerQuery) ||
      def.description.toLowerCase().includes(lowerQuery) ||
      def.category.toLowerCase().includes(lowerQuery)
    );
  }
}
