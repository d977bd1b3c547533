import { SlotMap } from '../arena/SlotMap';
import { ConnectionId, NodeId, PortId, portAddressKey } from '../value-objects/Id';
import type { PortAddress } from '../value-objects/Id';
import type { DataType } from '../value-objects/DataType';
import { areCompatible } from '../value-objects/DataType';
import {
  GraphInvariantError,
  GraphSerializationError,
  describeGraphError,
} from '../errors/GraphErrors';
import type {
  BadNodeError,
  GraphAddConnectionError,
  GraphDropConnectionError,
} from '../errors/GraphErrors';
import { err, ok } from '../value-objects/Result';
import type { Result } from '../value-objects/Result';
import { Node } from './Node';
import type { NodeHandle, NodeSnapshot, NodeView } from './Node';
import { DroppedConnections } from './ConnectionToken';

export interface GraphOptions {
  /** 同じノードの出力と入力をつなぐことを許可する */
  allowSelfConnections?: boolean;
}

/**
 * 1本の接続を出力側と入力側の端点の組で表したもの
 */
export interface ConnectionPair {
  readonly output: ConnectionId<'output'>;
  readonly input: ConnectionId<'input'>;
}

/**
 * 向きの分からない2つの端点を (出力, 入力) の組に並べ直す
 */
export function orientConnection(a: ConnectionId, b: ConnectionId): ConnectionPair {
  if (a.isOutput()) {
    return { output: a, input: b.assumeInput() };
  }
  return { output: b.assumeOutput(), input: a.assumeInput() };
}

/**
 * ノード削除で切断された接続（削除されたノード側と、相手側）
 */
export interface SeveredConnection {
  readonly nodeSide: ConnectionId;
  readonly remote: ConnectionId;
}

export interface RemovedNode<TContent> {
  readonly node: NodeView<TContent>;
  readonly severed: SeveredConnection[];
}

export interface NodeConnection {
  readonly local: ConnectionId;
  readonly remote: ConnectionId;
}

export interface GraphSnapshot<TContent> {
  readonly nodes: ReadonlyArray<NodeSnapshot<TContent>>;
  /** ノードのアリーナの世代表（空きスロットを含む） */
  readonly nodeSlots: readonly number[];
}

/**
 * ノードグラフ集約ルートエンティティ
 *
 * ノードを世代付きアリーナで所有します。接続そのものは各ポートのフックに
 * 端点ごとに記録されており、グラフは2つのノードにまたがる操作と、
 * 片側だけ残った接続の修復を受け持ちます。
 */
export class NodeGraph<TContent> {
  private readonly nodes = new SlotMap<NodeId, Node<TContent>>(
    (index, generation) => new NodeId(index, generation)
  );
  private readonly ledger = new DroppedConnections();
  private readonly allowSelf: boolean;

  constructor(options: GraphOptions = {}) {
    this.allowSelf = options.allowSelfConnections ?? false;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get allowsSelfConnections(): boolean {
    return this.allowSelf;
  }

  /**
   * ノードを追加
   *
   * build にはIDが確定したノードが渡されるので、ここでポートを定義します。
   */
  addNode(
    label: string,
    content: TContent,
    build?: (node: NodeHandle<TContent>) => void
  ): NodeId {
    return this.nodes.insertWithKey(id => {
      const node = new Node(id, label, content);
      build?.(node);
      return node;
    });
  }

  node(id: NodeId): NodeView<TContent> | undefined {
    return this.nodes.get(id);
  }

  hasNode(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  /**
   * ノードを変更する
   *
   * f の中でポートが接続を切断した場合も、戻る前に相手側を必ず修復します。
   */
  nodeMut<T>(id: NodeId, f: (node: NodeHandle<TContent>) => T): Result<T, BadNodeError> {
    const node = this.nodes.get(id);
    if (!node) {
      return err({ kind: 'BadNode', nodeId: id });
    }
    try {
      return ok(f(node));
    } finally {
      this.processDroppedConnections();
    }
  }

  /**
   * ノードを削除し、切断された接続を返す
   */
  removeNode(id: NodeId): RemovedNode<TContent> | undefined {
    const node = this.nodes.get(id);
    if (!node) {
      return undefined;
    }
    try {
      const severed = node.dropAllConnections().map(
        ({ portId, hookId, remote }): SeveredConnection => ({
          nodeSide: new ConnectionId(id, portId, hookId),
          remote,
        })
      );
      this.nodes.remove(id);
      return { node, severed };
    } finally {
      this.processDroppedConnections();
    }
  }

  /**
   * スロット順にすべてのノードを取得
   */
  iterNodes(): NodeView<TContent>[] {
    return this.nodes.values();
  }

  nodeIds(): NodeId[] {
    return this.nodes.keys();
  }

  /**
   * 出力側と入力側のフックをつなぐ
   *
   * 出力側を先に結び、入力側が拒否した場合は出力側の結合を明示的に取り消します。
   * 失敗したときはどちらのノードも呼び出し前の状態のままです。
   */
  addConnection(
    output: ConnectionId<'output'>,
    input: ConnectionId<'input'>
  ): Result<void, GraphAddConnectionError> {
    try {
      return this.bindConnection(output, input);
    } finally {
      this.processDroppedConnections();
    }
  }

  /**
   * 接続の片側を指定して切断し、相手側の端点を返す
   */
  dropConnection(id: ConnectionId): Result<ConnectionId, GraphDropConnectionError> {
    const node = this.nodes.get(id.nodeId);
    if (!node) {
      return err({ kind: 'BadNode', nodeId: id.nodeId });
    }
    try {
      const result = node.dropConnection(id.portId, id.hookId);
      if (!result.ok) {
        return err({ kind: 'NodeError', nodeId: id.nodeId, error: result.error });
      }
      return ok(result.value);
    } finally {
      this.processDroppedConnections();
    }
  }

  /**
   * グラフ内のすべての接続（出力側から読み取ります）
   */
  connections(): ConnectionPair[] {
    const pairs: ConnectionPair[] = [];
    for (const [nodeId, node] of this.nodes.entries()) {
      for (const portId of node.outputIds()) {
        for (const [hookId, remote] of node.hooks(portId)) {
          if (remote) {
            pairs.push({
              output: new ConnectionId(nodeId, portId, hookId),
              input: remote.assumeInput(),
            });
          }
        }
      }
    }
    return pairs;
  }

  /**
   * 指定したノードに関係する接続
   */
  connectionsOf(nodeId: NodeId): NodeConnection[] {
    const node = this.nodes.get(nodeId);
    if (!node) {
      return [];
    }
    return node.connections().map(({ portId, hookId, remote }) => ({
      local: new ConnectionId(nodeId, portId, hookId),
      remote,
    }));
  }

  /**
   * 相手側が自分を指し返していない接続の一覧（正常なら常に空）
   */
  asymmetricConnections(): NodeConnection[] {
    const broken: NodeConnection[] = [];
    for (const nodeId of this.nodes.keys()) {
      for (const connection of this.connectionsOf(nodeId)) {
        const back = this.nodes
          .get(connection.remote.nodeId)
          ?.bindingAt(connection.remote.portId, connection.remote.hookId);
        if (!back || !back.equals(connection.local)) {
          broken.push(connection);
        }
      }
    }
    return broken;
  }

  snapshot(): GraphSnapshot<TContent> {
    return {
      nodes: this.nodes.values().map(node => node.toSnapshot()),
      nodeSlots: this.nodes.generations(),
    };
  }

  /**
   * スナップショットからグラフを作り直す
   *
   * ノード、ポート、フックのIDと各アリーナの世代はすべて保存時のまま復元されます。
   * 接続は両端に記録されていて、addConnection が受け付ける組み合わせでなければなりません。
   */
  static restore<TContent>(
    snapshot: GraphSnapshot<TContent>,
    options: GraphOptions = {}
  ): NodeGraph<TContent> {
    const graph = new NodeGraph<TContent>(options);
    const portTypes = new Map<string, DataType>();
    const seen = new Set<number>();

    for (const nodeSnapshot of snapshot.nodes) {
      if (seen.has(nodeSnapshot.id.index)) {
        throw new GraphSerializationError(
          `Duplicate node slot ${nodeSnapshot.id.index} in snapshot`
        );
      }
      seen.add(nodeSnapshot.id.index);
      for (const port of nodeSnapshot.inputs) {
        portTypes.set(
          portAddressKey({ nodeId: nodeSnapshot.id, portId: PortId.input(port.key) }),
          port.dataType
        );
      }
      for (const port of nodeSnapshot.outputs) {
        portTypes.set(
          portAddressKey({ nodeId: nodeSnapshot.id, portId: PortId.output(port.key) }),
          port.dataType
        );
      }
    }

    const issueToken = (remote: ConnectionId) => {
      const dataType = portTypes.get(portAddressKey(remote));
      if (!dataType) {
        throw new GraphSerializationError(
          `Connection to ${remote.toString()} points at a missing port`
        );
      }
      return graph.ledger.issue(remote, dataType);
    };

    graph.nodes.load(
      snapshot.nodes.map((nodeSnapshot): [NodeId, Node<TContent>] => [
        nodeSnapshot.id,
        Node.restore(nodeSnapshot, issueToken),
      ]),
      snapshot.nodeSlots
    );

    const broken = graph.asymmetricConnections();
    if (broken.length > 0) {
      const first = broken[0];
      throw new GraphSerializationError(
        `Connection ${first.local.toString()} -> ${first.remote.toString()} is not recorded on both ends`
      );
    }
    for (const nodeId of graph.nodes.keys()) {
      for (const { local, remote } of graph.connectionsOf(nodeId)) {
        if (local.direction === remote.direction) {
          throw new GraphSerializationError(
            `Connection ${local.toString()} -> ${remote.toString()} joins two ${local.direction}s`
          );
        }
      }
    }
    for (const { output, input } of graph.connections()) {
      const check = graph.checkPorts(output, input);
      if (!check.ok) {
        throw new GraphSerializationError(
          `Connection ${output.toString()} -> ${input.toString()} cannot be restored: ${describeGraphError(check.error)}`
        );
      }
    }
    return graph;
  }

  /**
   * フックを使わずに、2つのポートを接続できるかどうかを判定
   *
   * addConnection と同じ順序で検査し、同じエラーを返します。
   * ドラッグ中のプレビューや、既存の接続を置き換える前の確認に使います。
   */
  canConnect(
    output: PortAddress<'output'>,
    input: PortAddress<'input'>
  ): Result<void, GraphAddConnectionError> {
    const check = this.checkPorts(output, input);
    if (!check.ok) {
      return check;
    }
    const outputNode = this.nodes.getOrThrow(output.nodeId);
    for (const [hookId, remote] of outputNode.hooks(output.portId)) {
      if (remote && remote.isOnPort(input)) {
        return err({
          kind: 'AlreadyConnected',
          output: new ConnectionId(output.nodeId, output.portId, hookId),
          input: remote.assumeInput(),
        });
      }
    }
    return ok(undefined);
  }

  /**
   * フックに依存しない検査（ノード、自己接続、ポート、定数専用、データ型）
   */
  private checkPorts(
    output: PortAddress<'output'>,
    input: PortAddress<'input'>
  ): Result<void, GraphAddConnectionError> {
    const outputNode = this.nodes.get(output.nodeId);
    if (!outputNode) {
      return err({ kind: 'BadOutputNode', nodeId: output.nodeId });
    }
    const inputNode = this.nodes.get(input.nodeId);
    if (!inputNode) {
      return err({ kind: 'BadInputNode', nodeId: input.nodeId });
    }
    if (!this.allowSelf && output.nodeId.equals(input.nodeId)) {
      return err({ kind: 'SameNode', nodeId: output.nodeId });
    }

    const outputType = outputNode.portDataType(output.portId);
    if (!outputType) {
      return err({
        kind: 'OutputNodeError',
        nodeId: output.nodeId,
        error: { kind: 'BadPort', portId: output.portId },
      });
    }
    const inputInfo = inputNode.portInfo(input.portId);
    if (!inputInfo) {
      return err({
        kind: 'InputNodeError',
        nodeId: input.nodeId,
        error: { kind: 'BadPort', portId: input.portId },
      });
    }
    if (inputInfo.kind === 'constantOnly') {
      return err({
        kind: 'InputNodeError',
        nodeId: input.nodeId,
        error: { kind: 'ConstantOnlyPort', portId: input.portId },
      });
    }
    if (!areCompatible(outputType, inputInfo.dataType)) {
      return err({
        kind: 'OutputNodeError',
        nodeId: output.nodeId,
        error: {
          kind: 'PortError',
          portId: output.portId,
          error: {
            kind: 'IncompatibleDataType',
            expected: outputType.name,
            actual: inputInfo.dataType.name,
          },
        },
      });
    }
    return ok(undefined);
  }

  private bindConnection(
    output: ConnectionId<'output'>,
    input: ConnectionId<'input'>
  ): Result<void, GraphAddConnectionError> {
    const check = this.canConnect(output, input);
    if (!check.ok) {
      return check;
    }
    const outputNode = this.nodes.getOrThrow(output.nodeId);
    const inputNode = this.nodes.getOrThrow(input.nodeId);
    const outputType = this.requireDataType(outputNode, output.portId);
    const inputType = this.requireDataType(inputNode, input.portId);

    const outputResult = outputNode.connect(
      output.portId,
      output.hookId,
      this.ledger.issue(input, inputType)
    );
    if (!outputResult.ok) {
      return err({ kind: 'OutputNodeError', nodeId: output.nodeId, error: outputResult.error });
    }

    const inputResult = inputNode.connect(
      input.portId,
      input.hookId,
      this.ledger.issue(output, outputType)
    );
    if (!inputResult.ok) {
      if (!outputNode.revokeConnection(output.portId, output.hookId)) {
        throw new GraphInvariantError(
          'ROLLBACK_FAILED',
          `Could not roll back ${output.toString()} after ${input.toString()} was rejected`
        );
      }
      return err({ kind: 'InputNodeError', nodeId: input.nodeId, error: inputResult.error });
    }

    return ok(undefined);
  }

  private requireDataType(node: Node<TContent>, portId: PortId): DataType {
    const dataType = node.portDataType(portId);
    if (!dataType) {
      throw new GraphInvariantError(
        'STALE_KEY',
        `port ${portId.toString()} was expected to exist on node ${node.id.toString()}`
      );
    }
    return dataType;
  }

  /**
   * 台帳に記録された相手側の端点をすべて切断する
   *
   * 相手側を切断すると台帳に自分側が記録し直されますが、それは結果であって
   * 新たな入力ではないため、最後に捨てます。
   */
  private processDroppedConnections(): void {
    const pending = this.ledger.drain();
    for (const remote of pending) {
      // 既に消えているノードやフックは無視してよい
      this.nodes.get(remote.nodeId)?.dropConnection(remote.portId, remote.hookId);
    }
    this.ledger.clear();
  }
}
