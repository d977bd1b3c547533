/**
 * ポートのデータ型
 *
 * ノードカタログ側が実装します。グラフは名前と互換性判定だけを使います。
 */
export interface DataType {
  readonly name: string;
  isCompatibleWith(other: DataType): boolean;
}

/**
 * 名前で識別されるデータ型
 *
 * 同名の型、または互換として列挙された名前の型と接続できます。
 */
export class NamedDataType implements DataType {
  private readonly compatible: ReadonlySet<string>;

  constructor(
    public readonly name: string,
    compatibleWith: readonly string[] = []
  ) {
    if (!name || name.trim() === '') {
      throw new Error('DataType name cannot be empty');
    }
    this.compatible = new Set(compatibleWith);
  }

  isCompatibleWith(other: DataType): boolean {
    return other.name === this.name || this.compatible.has(other.name);
  }

  equals(other: DataType): boolean {
    return this.name === other.name;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * どちらか一方が相手を受け入れれば接続可能とみなす
 */
export function areCompatible(a: DataType, b: DataType): boolean {
  return a.isCompatibleWith(b) || b.isCompatibleWith(a);
}
