import type { PortDirection } from './PortType';

const KEY_PATTERN = /^(\d+)v(\d+)$/;

/**
 * アリーナのスロットを指す世代付きキー
 *
 * 同じスロットが再利用されると世代が進むため、削除済みの要素を指す古いキーは
 * 二度と解決されません。
 */
export abstract class ArenaKey {
  abstract readonly kind: string;

  constructor(
    public readonly index: number,
    public readonly generation: number
  ) {
    if (!Number.isInteger(index) || index < 0) {
      throw new Error(`Arena index must be a non-negative integer: ${index}`);
    }
    if (!Number.isInteger(generation) || generation < 1) {
      throw new Error(`Arena generation must be a positive integer: ${generation}`);
    }
  }

  equals(other: ArenaKey): boolean {
    return (
      this.kind === other.kind &&
      this.index === other.index &&
      this.generation === other.generation
    );
  }

  toString(): string {
    return `${this.index}v${this.generation}`;
  }
}

/**
 * `"<index>v<generation>"` 形式の文字列をキーの構成要素に分解
 */
export function parseKeyParts(text: string): { index: number; generation: number } | undefined {
  const match = KEY_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const index = Number(match[1]);
  const generation = Number(match[2]);
  if (generation < 1) {
    return undefined;
  }
  return { index, generation };
}

/**
 * ノードのID
 */
export class NodeId extends ArenaKey {
  readonly kind = 'node';

  static parse(text: string): NodeId | undefined {
    const parts = parseKeyParts(text);
    return parts ? new NodeId(parts.index, parts.generation) : undefined;
  }
}

/**
 * ノード内のポートを指すキー（入力と出力で別々のアリーナを持ちます）
 */
export class PortKey extends ArenaKey {
  readonly kind = 'port';

  static parse(text: string): PortKey | undefined {
    const parts = parseKeyParts(text);
    return parts ? new PortKey(parts.index, parts.generation) : undefined;
  }
}

/**
 * ポート内の接続スロット（フック）のID
 */
export class HookId extends ArenaKey {
  readonly kind = 'hook';

  static parse(text: string): HookId | undefined {
    const parts = parseKeyParts(text);
    return parts ? new HookId(parts.index, parts.generation) : undefined;
  }
}

/**
 * ポートのID
 *
 * 方向を型パラメータに持つため、入力と出力を取り違えるとコンパイルエラーになります。
 */
export class PortId<D extends PortDirection = PortDirection> {
  private constructor(
    public readonly direction: D,
    public readonly key: PortKey
  ) {}

  static input(key: PortKey): PortId<'input'> {
    return new PortId('input', key);
  }

  static output(key: PortKey): PortId<'output'> {
    return new PortId('output', key);
  }

  static of<D extends PortDirection>(direction: D, key: PortKey): PortId<D> {
    return new PortId(direction, key);
  }

  isInput(): this is PortId<'input'> {
    return this.direction === 'input';
  }

  isOutput(): this is PortId<'output'> {
    return this.direction === 'output';
  }

  equals(other: PortId): boolean {
    return this.direction === other.direction && this.key.equals(other.key);
  }

  toString(): string {
    return `${this.direction}:${this.key.toString()}`;
  }
}

/**
 * ノード上のポートの位置
 */
export interface PortAddress<D extends PortDirection = PortDirection> {
  readonly nodeId: NodeId;
  readonly portId: PortId<D>;
}

/**
 * 接続の片側の端点 (NodeId, PortId, HookId)
 *
 * 1本の接続は2つの ConnectionId の組として表され、それぞれが自分の側の
 * ポートにだけ記録されます。
 */
export class ConnectionId<D extends PortDirection = PortDirection> implements PortAddress<D> {
  constructor(
    public readonly nodeId: NodeId,
    public readonly portId: PortId<D>,
    public readonly hookId: HookId
  ) {}

  get direction(): D {
    return this.portId.direction;
  }

  isInput(): this is ConnectionId<'input'> {
    return this.portId.direction === 'input';
  }

  isOutput(): this is ConnectionId<'output'> {
    return this.portId.direction === 'output';
  }

  assumeInput(): ConnectionId<'input'> {
    if (this.isInput()) {
      return this;
    }
    throw new Error(`${this.toString()} is not an input endpoint`);
  }

  assumeOutput(): ConnectionId<'output'> {
    if (this.isOutput()) {
      return this;
    }
    throw new Error(`${this.toString()} is not an output endpoint`);
  }

  /**
   * 同じポート上にあるかどうか（フックは問わない）
   */
  isOnPort(address: PortAddress): boolean {
    return this.nodeId.equals(address.nodeId) && this.portId.equals(address.portId);
  }

  equals(other: ConnectionId): boolean {
    return (
      this.nodeId.equals(other.nodeId) &&
      this.portId.equals(other.portId) &&
      this.hookId.equals(other.hookId)
    );
  }

  toString(): string {
    return `${this.nodeId.toString()}/${this.portId.toString()}/${this.hookId.toString()}`;
  }
}

export function portAddressKey(address: PortAddress): string {
  return `${address.nodeId.toString()}/${address.portId.toString()}`;
}
