/**
 * 2D座標を表す値オブジェクト
 *
 * ノードの描画位置に使います。グラフの接続には関係しません。
 */
export class Position {
  static readonly ORIGIN = new Position(0, 0);

  constructor(
    public readonly x: number,
    public readonly y: number
  ) {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new Error('Position coordinates must be finite numbers');
    }
  }

  equals(other: Position): boolean {
    return this.x === other.x && this.y === other.y;
  }

  toString(): string {
    return `(${this.x}, ${this.y})`;
  }
}
