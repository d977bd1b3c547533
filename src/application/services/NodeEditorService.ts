import type { ConnectionPair, NodeConnection, NodeGraph } from '../../domain/entities/NodeGraph';
import { orientConnection } from '../../domain/entities/NodeGraph';
import type { NodeView } from '../../domain/entities/Node';
import { ConnectionId } from '../../domain/value-objects/Id';
import type { NodeId, PortAddress } from '../../domain/value-objects/Id';
import { GraphSerializationError } from '../../domain/errors/GraphErrors';
import type { IGraphRepository } from '../../domain/repositories/IGraphRepository';
import type { NodeFactory } from '../../domain/services/NodeFactory';
import type { GraphSerializer } from '../../domain/services/GraphSerializer';
import { EMPTY_LAYOUT, SerializedLayoutSchema } from '../../domain/services/EditorDocument';
import type { SerializedLayout } from '../../domain/services/EditorDocument';
import { DEFAULT_EDITOR_CONFIG } from '../../infrastructure/config/EditorConfig';
import type { EditorConfig } from '../../infrastructure/config/EditorConfig';
import { AddNodeUseCase } from '../use-cases/AddNodeUseCase';
import { CreateConnectionUseCase } from '../use-cases/CreateConnectionUseCase';
import type { CreateConnectionResult } from '../use-cases/CreateConnectionUseCase';
import { DeleteNodeUseCase } from '../use-cases/DeleteNodeUseCase';
import { DeleteConnectionUseCase } from '../use-cases/DeleteConnectionUseCase';
import { NodeEditorError } from '../errors/NodeEditorError';
import type { EditorNodeContent, NodeDefinition, PortValue } from '../../types';

export interface LoadedGraph {
  graph: NodeGraph<EditorNodeContent>;
  layout: SerializedLayout;
}

/**
 * ノードエディターアプリケーションサービス
 *
 * ノードエディターの主要な操作を統合的に管理します。
 * ユースケースを呼び出し、失敗は NodeEditorError として投げます。
 */
export class NodeEditorService {
  private addNodeUseCase: AddNodeUseCase;
  private createConnectionUseCase: CreateConnectionUseCase;
  private deleteNodeUseCase: DeleteNodeUseCase;
  private deleteConnectionUseCase: DeleteConnectionUseCase;

  constructor(
    private nodeGraph: NodeGraph<EditorNodeContent>,
    nodeFactory: NodeFactory,
    private graphRepository: IGraphRepository,
    private serializer: GraphSerializer<EditorNodeContent>,
    private config: EditorConfig = DEFAULT_EDITOR_CONFIG
  ) {
    this.addNodeUseCase = new AddNodeUseCase(nodeFactory);
    this.createConnectionUseCase = new CreateConnectionUseCase();
    this.deleteNodeUseCase = new DeleteNodeUseCase();
    this.deleteConnectionUseCase = new DeleteConnectionUseCase();
  }

  /**
   * ノードを追加
   */
  addNode(definition: NodeDefinition): NodeId {
    return this.addNodeUseCase.execute(this.nodeGraph, definition);
  }

  /**
   * 接続を作成
   *
   * 入力が埋まっている場合の扱いは設定の occupiedInputPolicy に従います。
   */
  createConnection(from: PortAddress, to: PortAddress): CreateConnectionResult {
    return this.createConnectionUseCase.execute(
      this.nodeGraph,
      from,
      to,
      this.config.occupiedInputPolicy
    );
  }

  /**
   * 接続を削除（どちらの端点を指定しても構いません）
   */
  deleteConnection(endpoint: ConnectionId): ConnectionPair {
    return this.deleteConnectionUseCase.execute(this.nodeGraph, endpoint);
  }

  /**
   * ノードを削除
   */
  deleteNode(nodeId: NodeId): {
    deletedNode: NodeView<EditorNodeContent>;
    severedConnections: ConnectionPair[];
  } {
    return this.deleteNodeUseCase.execute(this.nodeGraph, nodeId);
  }

  /**
   * ポートの接続をすべて切断
   *
   * ノードの変更として実行するので、相手側はグラフが修復します。
   */
  disconnectPort(address: PortAddress): ConnectionPair[] {
    const result = this.nodeGraph.nodeMut(address.nodeId, node => {
      const dropped: ConnectionPair[] = [];
      for (const [hookId, remote] of node.hooks(address.portId)) {
        if (!remote) {
          continue;
        }
        const local = new ConnectionId(address.nodeId, address.portId, hookId);
        if (node.dropConnection(address.portId, hookId).ok) {
          dropped.push(orientConnection(local, remote));
        }
      }
      return dropped;
    });
    if (!result.ok) {
      throw new NodeEditorError('NODE_NOT_FOUND', `Node ${address.nodeId.toString()} not found`);
    }
    return result.value;
  }

  /**
   * 入力ポートの定数値を更新
   */
  updateInputValue(nodeId: NodeId, name: string, value: PortValue): void {
    const result = this.nodeGraph.nodeMut(nodeId, node => {
      const portId = node.findInput(name);
      const info = portId ? node.portInfo(portId) : undefined;
      if (!info) {
        throw new NodeEditorError('PORT_NOT_FOUND', `Input "${name}" not found on node ${nodeId.toString()}`);
      }
      if (info.kind === 'connectionOnly') {
        throw new NodeEditorError(
          'CONNECTION_REJECTED',
          `Input "${name}" only accepts a connection`
        );
      }
      node.content = {
        ...node.content,
        values: { ...node.content.values, [name]: Array.isArray(value) ? [...value] : value },
      };
    });
    if (!result.ok) {
      throw new NodeEditorError('NODE_NOT_FOUND', `Node ${nodeId.toString()} not found`);
    }
  }

  /**
   * グラフを配置と一緒に名前を付けて保存
   */
  saveGraph(name: string, layout: SerializedLayout = EMPTY_LAYOUT): void {
    this.graphRepository.save(name, {
      graph: this.serializer.serialize(this.nodeGraph),
      layout,
    });
  }

  /**
   * 保存したグラフを読み込み、現在のグラフと置き換える
   *
   * 保存時の配置も返します。グラフか配置のどちらかが壊れていれば何も置き換えません。
   */
  loadGraph(name: string): LoadedGraph {
    const document = this.graphRepository.findByName(name);
    if (!document) {
      throw new NodeEditorError('GRAPH_NOT_FOUND', `Graph "${name}" not found`);
    }
    const layout = SerializedLayoutSchema.safeParse(document.layout);
    if (!layout.success) {
      const details = layout.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new NodeEditorError('INVALID_GRAPH', `Graph "${name}" cannot be loaded: Invalid layout: ${details}`);
    }
    try {
      this.nodeGraph = this.serializer.deserialize(document.graph);
    } catch (error) {
      if (error instanceof GraphSerializationError) {
        throw new NodeEditorError('INVALID_GRAPH', `Graph "${name}" cannot be loaded: ${error.message}`);
      }
      throw error;
    }
    return { graph: this.nodeGraph, layout: layout.data };
  }

  getGraph(): NodeGraph<EditorNodeContent> {
    return this.nodeGraph;
  }

  getConfig(): EditorConfig {
    return this.config;
  }

  /**
   * すべてのノードを取得
   */
  getAllNodes(): NodeView<EditorNodeContent>[] {
    return this.nodeGraph.iterNodes();
  }

  /**
   * すべての接続を取得
   */
  getAllConnections(): ConnectionPair[] {
    return this.nodeGraph.connections();
  }

  /**
   * ノードを取得
   */
  getNode(nodeId: NodeId): NodeView<EditorNodeContent> | undefined {
    return this.nodeGraph.node(nodeId);
  }

  /**
   * ノードに関係する接続を取得
   */
  getConnectionsOf(nodeId: NodeId): NodeConnection[] {
    return this.nodeGraph.connectionsOf(nodeId);
  }
}
