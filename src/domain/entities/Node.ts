import { SlotMap } from '../arena/SlotMap';
import { PortId, PortKey } from '../value-objects/Id';
import type { ConnectionId, HookId, NodeId } from '../value-objects/Id';
import type { DataType } from '../value-objects/DataType';
import type { InputPortKind, PortDirection, PortSide } from '../value-objects/PortType';
import type { NodeAddConnectionError, NodeDropConnectionError } from '../errors/GraphErrors';
import { err, ok } from '../value-objects/Result';
import type { Result } from '../value-objects/Result';
import { Port } from './Port';
import type { PortOptions } from './Port';
import type { ConnectionToken } from './ConnectionToken';

export interface InputPortOptions extends PortOptions {
  kind?: InputPortKind;
}

interface PortEntry {
  readonly name: string;
  readonly port: Port;
  /** 出力ポートでは undefined */
  readonly kind: InputPortKind | undefined;
}

/**
 * UI向けのポート情報
 */
export interface PortInfo {
  readonly id: PortId;
  readonly name: string;
  readonly direction: PortDirection;
  readonly dataType: DataType;
  readonly kind: InputPortKind | undefined;
  readonly maxConnections: number | null;
  readonly side: PortSide;
  readonly connectionCount: number;
  readonly availableHook: HookId | undefined;
}

export interface PortHookBinding {
  readonly portId: PortId;
  readonly hookId: HookId;
  readonly remote: ConnectionId;
}

export interface PortSnapshot {
  readonly key: PortKey;
  readonly name: string;
  readonly dataType: DataType;
  readonly kind: InputPortKind | undefined;
  readonly maxConnections: number | null;
  readonly side: PortSide;
  readonly bindings: ReadonlyArray<{ readonly hookId: HookId; readonly remote: ConnectionId }>;
  /** 接続待ちの空きフック（定数専用ポートにも内部的にはあります） */
  readonly availableHook: HookId | undefined;
  readonly hookSlots: readonly number[];
}

export interface NodeSnapshot<TContent> {
  readonly id: NodeId;
  readonly label: string;
  readonly content: TContent;
  readonly inputs: readonly PortSnapshot[];
  readonly outputs: readonly PortSnapshot[];
  readonly inputSlots: readonly number[];
  readonly outputSlots: readonly number[];
}

/**
 * グラフ外に公開するノードの読み取り専用ビュー
 */
export interface NodeView<TContent> {
  readonly id: NodeId;
  readonly label: string;
  readonly content: TContent;
  portDataType(portId: PortId): DataType | undefined;
  availableHook(portId: PortId): HookId | undefined;
  hooks(portId: PortId): Array<[HookId, ConnectionId | undefined]>;
  bindingAt(portId: PortId, hookId: HookId): ConnectionId | undefined;
  inputIds(): PortId<'input'>[];
  outputIds(): PortId<'output'>[];
  findInput(name: string): PortId<'input'> | undefined;
  findOutput(name: string): PortId<'output'> | undefined;
  portName(portId: PortId): string | undefined;
  portInfo(portId: PortId): PortInfo | undefined;
  ports(): PortInfo[];
  connections(): PortHookBinding[];
}

/**
 * nodeMut に渡される可変ハンドル
 *
 * 接続を作る操作は含みません。フックの消費はグラフの addConnection だけが行います。
 */
export interface NodeHandle<TContent> extends NodeView<TContent> {
  label: string;
  content: TContent;
  addInputPort(name: string, dataType: DataType, options?: InputPortOptions): PortId<'input'>;
  addOutputPort(name: string, dataType: DataType, options?: PortOptions): PortId<'output'>;
  removePort(portId: PortId): Result<PortHookBinding[], { kind: 'BadPort'; portId: PortId }>;
  dropConnection(portId: PortId, hookId: HookId): Result<ConnectionId, NodeDropConnectionError>;
  dropAllConnections(): PortHookBinding[];
}

const makePortKey = (index: number, generation: number): PortKey => new PortKey(index, generation);

/**
 * ノードエンティティ
 *
 * 入力ポートと出力ポートを持ち、ポートへの操作はすべてノードを経由します。
 * ポート単位のエラーは PortId を付けてノード単位のエラーに変換されます。
 */
export class Node<TContent> implements NodeHandle<TContent> {
  private readonly inputs = new SlotMap<PortKey, PortEntry>(makePortKey);
  private readonly outputs = new SlotMap<PortKey, PortEntry>(makePortKey);
  private inputOrder: PortKey[] = [];
  private outputOrder: PortKey[] = [];

  constructor(
    public readonly id: NodeId,
    public label: string,
    public content: TContent
  ) {
    if (!label || label.trim() === '') {
      throw new Error('Node label cannot be empty');
    }
  }

  /**
   * 入力ポートを追加（既定では接続は1本まで）
   */
  addInputPort(name: string, dataType: DataType, options: InputPortOptions = {}): PortId<'input'> {
    this.assertUniqueName(this.inputs, name);
    const port = new Port(dataType, {
      maxConnections: options.maxConnections === undefined ? 1 : options.maxConnections,
      side: options.side ?? 'left',
    });
    const key = this.inputs.insert({ name, port, kind: options.kind ?? 'connectionOrConstant' });
    this.inputOrder.push(key);
    return PortId.input(key);
  }

  /**
   * 出力ポートを追加（既定では接続数は無制限）
   */
  addOutputPort(name: string, dataType: DataType, options: PortOptions = {}): PortId<'output'> {
    this.assertUniqueName(this.outputs, name);
    const port = new Port(dataType, {
      maxConnections: options.maxConnections ?? null,
      side: options.side ?? 'right',
    });
    const key = this.outputs.insert({ name, port, kind: undefined });
    this.outputOrder.push(key);
    return PortId.output(key);
  }

  /**
   * ポートを削除
   *
   * ポート上の接続はすべて切断され、相手側は台帳経由でグラフが修復します。
   */
  removePort(portId: PortId): Result<PortHookBinding[], { kind: 'BadPort'; portId: PortId }> {
    const entry = this.entry(portId);
    if (!entry) {
      return err({ kind: 'BadPort', portId });
    }
    const dropped = entry.port
      .dropAllConnections()
      .map(({ hookId, remote }): PortHookBinding => ({ portId, hookId, remote }));

    if (portId.isInput()) {
      this.inputs.remove(portId.key);
      this.inputOrder = this.inputOrder.filter(key => !key.equals(portId.key));
    } else {
      this.outputs.remove(portId.key);
      this.outputOrder = this.outputOrder.filter(key => !key.equals(portId.key));
    }
    return ok(dropped);
  }

  /**
   * 指定したポートのフックに接続
   */
  connect(
    portId: PortId,
    hookId: HookId,
    token: ConnectionToken
  ): Result<void, NodeAddConnectionError> {
    const entry = this.entry(portId);
    if (!entry) {
      return err({ kind: 'BadPort', portId });
    }
    if (entry.kind === 'constantOnly') {
      return err({ kind: 'ConstantOnlyPort', portId });
    }
    const result = entry.port.connect(hookId, token);
    if (!result.ok) {
      return err({ kind: 'PortError', portId, error: result.error });
    }
    return ok(undefined);
  }

  /**
   * 指定したフックの接続を切断し、相手側の端点を返す
   */
  dropConnection(portId: PortId, hookId: HookId): Result<ConnectionId, NodeDropConnectionError> {
    const entry = this.entry(portId);
    if (!entry) {
      return err({ kind: 'BadPort', portId });
    }
    const result = entry.port.dropConnection(hookId);
    if (!result.ok) {
      return err({ kind: 'PortError', portId, error: result.error });
    }
    return ok(result.value);
  }

  /**
   * すべてのポートの接続を切断
   */
  dropAllConnections(): PortHookBinding[] {
    const dropped: PortHookBinding[] = [];
    for (const portId of this.portIds()) {
      const entry = this.entry(portId);
      if (!entry) {
        continue;
      }
      for (const { hookId, remote } of entry.port.dropAllConnections()) {
        dropped.push({ portId, hookId, remote });
      }
    }
    return dropped;
  }

  /**
   * 直前の connect を相手側に伝えずに取り消す
   */
  revokeConnection(portId: PortId, hookId: HookId): boolean {
    return this.entry(portId)?.port.revokeConnection(hookId) ?? false;
  }

  portDataType(portId: PortId): DataType | undefined {
    return this.entry(portId)?.port.dataType;
  }

  /**
   * 次の接続に使えるフック。定数専用ポートは常に undefined
   */
  availableHook(portId: PortId): HookId | undefined {
    const entry = this.entry(portId);
    if (!entry || entry.kind === 'constantOnly') {
      return undefined;
    }
    return entry.port.availableHook();
  }

  hooks(portId: PortId): Array<[HookId, ConnectionId | undefined]> {
    return this.entry(portId)?.port.hooks() ?? [];
  }

  bindingAt(portId: PortId, hookId: HookId): ConnectionId | undefined {
    return this.entry(portId)?.port.bindingAt(hookId);
  }

  inputIds(): PortId<'input'>[] {
    return this.inputOrder.map(key => PortId.input(key));
  }

  outputIds(): PortId<'output'>[] {
    return this.outputOrder.map(key => PortId.output(key));
  }

  findInput(name: string): PortId<'input'> | undefined {
    return this.inputIds().find(id => this.inputs.get(id.key)?.name === name);
  }

  findOutput(name: string): PortId<'output'> | undefined {
    return this.outputIds().find(id => this.outputs.get(id.key)?.name === name);
  }

  portName(portId: PortId): string | undefined {
    return this.entry(portId)?.name;
  }

  portInfo(portId: PortId): PortInfo | undefined {
    const entry = this.entry(portId);
    if (!entry) {
      return undefined;
    }
    return {
      id: portId,
      name: entry.name,
      direction: portId.direction,
      dataType: entry.port.dataType,
      kind: entry.kind,
      maxConnections: entry.port.maxConnections,
      side: entry.port.side,
      connectionCount: entry.port.connectionCount(),
      availableHook: this.availableHook(portId),
    };
  }

  /**
   * 入力、出力の順にすべてのポート情報を取得
   */
  ports(): PortInfo[] {
    const result: PortInfo[] = [];
    for (const portId of this.portIds()) {
      const info = this.portInfo(portId);
      if (info) {
        result.push(info);
      }
    }
    return result;
  }

  /**
   * このノード側から見たすべての接続
   */
  connections(): PortHookBinding[] {
    const result: PortHookBinding[] = [];
    for (const portId of this.portIds()) {
      for (const { hookId, remote } of this.entry(portId)?.port.connections() ?? []) {
        result.push({ portId, hookId, remote });
      }
    }
    return result;
  }

  toSnapshot(): NodeSnapshot<TContent> {
    const snapshotPorts = (
      order: PortKey[],
      slots: SlotMap<PortKey, PortEntry>
    ): PortSnapshot[] =>
      order.map(key => {
        const { name, port, kind } = slots.getOrThrow(key);
        return {
          key,
          name,
          dataType: port.dataType,
          kind,
          maxConnections: port.maxConnections,
          side: port.side,
          bindings: port.connections(),
          availableHook: port.availableHook(),
          hookSlots: port.hookGenerations(),
        };
      });

    return {
      id: this.id,
      label: this.label,
      content: this.content,
      inputs: snapshotPorts(this.inputOrder, this.inputs),
      outputs: snapshotPorts(this.outputOrder, this.outputs),
      inputSlots: this.inputs.generations(),
      outputSlots: this.outputs.generations(),
    };
  }

  /**
   * スナップショットからノードを復元
   *
   * 接続ごとのトークンは呼び出し側（グラフ）が発行します。
   */
  static restore<TContent>(
    snapshot: NodeSnapshot<TContent>,
    issueToken: (remote: ConnectionId) => ConnectionToken
  ): Node<TContent> {
    const node = new Node(snapshot.id, snapshot.label, snapshot.content);
    const restorePorts = (ports: readonly PortSnapshot[]): Array<[PortKey, PortEntry]> =>
      ports.map((portSnapshot): [PortKey, PortEntry] => {
        const port = Port.restore(
          portSnapshot.dataType,
          { maxConnections: portSnapshot.maxConnections, side: portSnapshot.side },
          {
            bindings: portSnapshot.bindings.map(({ hookId, remote }): [HookId, ConnectionToken] => [
              hookId,
              issueToken(remote),
            ]),
            availableHook: portSnapshot.availableHook,
            hookSlots: portSnapshot.hookSlots,
          }
        );
        return [portSnapshot.key, { name: portSnapshot.name, port, kind: portSnapshot.kind }];
      });

    const inputs = restorePorts(snapshot.inputs);
    const outputs = restorePorts(snapshot.outputs);
    node.inputs.load(inputs, snapshot.inputSlots);
    node.outputs.load(outputs, snapshot.outputSlots);
    node.inputOrder = inputs.map(([key]) => key);
    node.outputOrder = outputs.map(([key]) => key);
    return node;
  }

  private portIds(): PortId[] {
    return [...this.inputIds(), ...this.outputIds()];
  }

  private entry(portId: PortId): PortEntry | undefined {
    return portId.isInput() ? this.inputs.get(portId.key) : this.outputs.get(portId.key);
  }

  private assertUniqueName(slots: SlotMap<PortKey, PortEntry>, name: string): void {
    if (!name || name.trim() === '') {
      throw new Error('Port name cannot be empty');
    }
    if (slots.values().some(entry => entry.name === name)) {
      throw new Error(`Port "${name}" already exists on node ${this.id.toString()}`);
    }
  }
}
