import type { NodeEditorService } from '../application/services/NodeEditorService';
import type { CreateConnectionResult } from '../application/use-cases/CreateConnectionUseCase';
import { NodeEditorError } from '../application/errors/NodeEditorError';
import type { ConnectionPair } from '../domain/entities/NodeGraph';
import type { ConnectionId, NodeId, PortAddress } from '../domain/value-objects/Id';
import { Position } from '../domain/value-objects/Position';
import { err, ok } from '../domain/value-objects/Result';
import type { Result } from '../domain/value-objects/Result';
import type { Logger } from '../infrastructure/logging/Logger';
import type { NodeDefinition, PortValue } from '../types';
import type { EditorStateManager } from './EditorStateManager';
import { EditorEventBus, EditorEventType } from './EditorEventBus';

/**
 * コマンド実行を管理するクラス
 *
 * アプリケーションサービスを呼び出し、成功したらイベントを発行します。
 * 操作の失敗（NodeEditorError）はログに残して握りつぶし、UI 側ではジェスチャーを
 * 取り消すだけにします。グラフの破損を示すエラーはそのまま投げます。
 */
export class CommandExecutor {
  constructor(
    private nodeEditorService: NodeEditorService,
    private stateManager: EditorStateManager,
    private eventBus: EditorEventBus,
    private logger: Logger
  ) {}

  /**
   * ノードを追加
   */
  addNode(definition: NodeDefinition, x = 0, y = 0): NodeId | null {
    const nodeId = this.attempt('add node', () => this.nodeEditorService.addNode(definition));
    if (!nodeId.ok) {
      return null;
    }
    const id = nodeId.value.toString();
    this.stateManager.registerNode(id, new Position(x, y));
    this.eventBus.emit(EditorEventType.NODE_ADDED, { nodeId: id, definitionId: definition.id });
    return nodeId.value;
  }

  /**
   * ノードを移動
   */
  moveNode(nodeId: NodeId, x: number, y: number): void {
    const id = nodeId.toString();
    const current = this.stateManager.getPosition(id);
    if (!current) {
      this.logger.warn(`Failed to move node: ${id} is not registered`);
      return;
    }
    const next = new Position(x, y);
    if (!current.equals(next)) {
      this.stateManager.setPosition(id, next);
      this.eventBus.emit(EditorEventType.NODE_MOVED, { nodeId: id, x, y });
    }
  }

  /**
   * ノードを選択（null で選択解除）
   */
  selectNode(nodeId: NodeId | null): void {
    const id = nodeId ? nodeId.toString() : null;
    if (id !== null && this.stateManager.getPosition(id) === undefined) {
      this.logger.warn(`Failed to select node: ${id} is not registered`);
      return;
    }
    this.stateManager.selectNode(id);
    this.eventBus.emit(EditorEventType.NODE_SELECTED, { nodeId: id });
  }

  /**
   * ノードを最前面に移動
   */
  raiseNode(nodeId: NodeId): void {
    const id = nodeId.toString();
    if (this.stateManager.raiseNode(id)) {
      this.eventBus.emit(EditorEventType.NODE_RAISED, { nodeId: id });
    }
  }

  /**
   * 接続を作成
   */
  createConnection(
    from: PortAddress,
    to: PortAddress
  ): Result<CreateConnectionResult, NodeEditorError> {
    const result = this.attempt('create connection', () =>
      this.nodeEditorService.createConnection(from, to)
    );
    if (result.ok) {
      result.value.replacedConnections.forEach(connection => this.emitDeleted(connection));
      this.eventBus.emit(EditorEventType.CONNECTION_CREATED, {
        output: result.value.connection.output.toString(),
        input: result.value.connection.input.toString(),
      });
    }
    return result;
  }

  /**
   * 接続を削除
   */
  deleteConnection(endpoint: ConnectionId): ConnectionPair | null {
    const result = this.attempt('delete connection', () =>
      this.nodeEditorService.deleteConnection(endpoint)
    );
    if (!result.ok) {
      return null;
    }
    this.emitDeleted(result.value);
    return result.value;
  }

  /**
   * ポートを切断
   */
  disconnectPort(address: PortAddress): ConnectionPair[] {
    const result = this.attempt('disconnect port', () =>
      this.nodeEditorService.disconnectPort(address)
    );
    if (!result.ok) {
      return [];
    }
    result.value.forEach(connection => this.emitDeleted(connection));
    return result.value;
  }

  /**
   * ノードを削除
   *
   * 切断された接続ごとに CONNECTION_DELETED を発行してから NODE_DELETED を発行します。
   */
  deleteNode(nodeId: NodeId): boolean {
    const result = this.attempt('delete node', () => this.nodeEditorService.deleteNode(nodeId));
    if (!result.ok) {
      return false;
    }
    const id = nodeId.toString();
    result.value.severedConnections.forEach(connection => this.emitDeleted(connection));
    this.stateManager.unregisterNode(id);
    this.eventBus.emit(EditorEventType.NODE_DELETED, { nodeId: id });
    return true;
  }

  /**
   * ノードの値を更新
   */
  updateInputValue(nodeId: NodeId, name: string, value: PortValue): boolean {
    const result = this.attempt('update node value', () =>
      this.nodeEditorService.updateInputValue(nodeId, name, value)
    );
    if (result.ok) {
      this.eventBus.emit(EditorEventType.NODE_VALUE_CHANGED, {
        nodeId: nodeId.toString(),
        name,
        value,
      });
    }
    return result.ok;
  }

  /**
   * グラフをノードの位置と描画順と一緒に保存
   */
  saveGraph(name: string): boolean {
    return this.attempt('save graph', () =>
      this.nodeEditorService.saveGraph(name, this.stateManager.getLayout())
    ).ok;
  }

  /**
   * 保存したグラフを読み込む
   */
  loadGraph(name: string): boolean {
    const result = this.attempt('load graph', () => this.nodeEditorService.loadGraph(name));
    if (!result.ok) {
      return false;
    }
    const { graph, layout } = result.value;
    this.stateManager.reset(
      graph.nodeIds().map(id => id.toString()),
      layout
    );
    this.eventBus.emit(EditorEventType.GRAPH_LOADED, {
      name,
      nodeCount: graph.nodeCount,
    });
    return true;
  }

  private emitDeleted(connection: ConnectionPair): void {
    this.logger.debug(
      `Connection dropped: ${connection.output.toString()} -> ${connection.input.toString()}`
    );
    this.eventBus.emit(EditorEventType.CONNECTION_DELETED, {
      output: connection.output.toString(),
      input: connection.input.toString(),
    });
  }

  private attempt<T>(action: string, run: () => T): Result<T, NodeEditorError> {
    try {
      return ok(run());
    } catch (error) {
      if (!(error instanceof NodeEditorError)) {
        throw error;
      }
      this.logger.warn(`Failed to ${action}:`, error.message);
      return err(error);
    }
  }
}
