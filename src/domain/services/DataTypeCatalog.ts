import type { DataType } from '../value-objects/DataType';

/**
 * データ型カタログ
 *
 * 名前からデータ型を引きます。ノード定義の読み込みとグラフの復元で使います。
 */
export class DataTypeCatalog {
  private types: Map<string, DataType> = new Map();

  constructor(dataTypes: readonly DataType[] = []) {
    for (const dataType of dataTypes) {
      this.register(dataType);
    }
  }

  /**
   * データ型を登録
   */
  register(dataType: DataType): void {
    if (this.types.has(dataType.name)) {
      throw new Error(`Data type "${dataType.name}" is already registered`);
    }
    this.types.set(dataType.name, dataType);
  }

  resolve(name: string): DataType | undefined {
    return this.types.get(name);
  }

  /**
   * 登録済みのデータ型を取得。未登録ならエラー
   */
  require(name: string): DataType {
    const dataType = this.types.get(name);
    if (!dataType) {
      throw new Error(`Unknown data type "${name}"`);
    }
    return dataType;
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  names(): string[] {
    return Array.from(this.types.keys());
  }
}
