import { NodeEditorService } from '../application/services/NodeEditorService';
import { NodeGraph } from '../domain/entities/NodeGraph';
import type { NodeView } from '../domain/entities/Node';
import type { NodeId } from '../domain/value-objects/Id';
import type { IGraphRepository } from '../domain/repositories/IGraphRepository';
import { NodeFactory } from '../domain/services/NodeFactory';
import { GraphSerializer } from '../domain/services/GraphSerializer';
import { loadEditorConfig } from '../infrastructure/config/EditorConfig';
import type { EditorConfig } from '../infrastructure/config/EditorConfig';
import { createConsoleLogger } from '../infrastructure/logging/Logger';
import type { Logger } from '../infrastructure/logging/Logger';
import type { NodeDefinitionLoader } from '../infrastructure/node-definitions/loader/NodeDefinitionLoader';
import { EditorNodeContentSchema } from '../infrastructure/node-definitions/schemas';
import { InMemoryGraphRepository } from '../infrastructure/repositories/InMemoryGraphRepository';
import { NodeAdapter } from '../infrastructure/adapters/NodeAdapter';
import { ConnectionAdapter } from '../infrastructure/adapters/ConnectionAdapter';
import { Position } from '../domain/value-objects/Position';
import type { EditorNodeContent, RenderConnection, RenderNode } from '../types';
import { EditorStateManager } from './EditorStateManager';
import { CommandExecutor } from './CommandExecutor';
import { EditorEventBus } from './EditorEventBus';
import { ConnectionInteractionHandler } from './interactions/ConnectionInteractionHandler';

export interface NodeEditorOptions {
  definitions: NodeDefinitionLoader;
  /** 検証前の設定。省略した項目はデフォルト値になります */
  config?: unknown;
  graphRepository?: IGraphRepository;
  logger?: Logger;
}

export interface RenderModel {
  /** 描画順（後ろほど手前） */
  nodes: RenderNode[];
  connections: RenderConnection[];
}

/**
 * ノードエディターのメインクラス（Facade）
 *
 * 各責務を持つクラス（EditorStateManager、CommandExecutor、ConnectionInteractionHandler）を
 * 統合し、外部へのインターフェースを提供します。描画は行わず、描画層には
 * getRenderModel() で読み取り専用のモデルを渡します。
 */
export class NodeEditor {
  readonly config: EditorConfig;
  readonly logger: Logger;
  readonly events: EditorEventBus;
  readonly commands: CommandExecutor;
  readonly connections: ConnectionInteractionHandler;

  private definitions: NodeDefinitionLoader;
  private nodeEditorService: NodeEditorService;
  private stateManager: EditorStateManager;

  constructor(options: NodeEditorOptions) {
    this.config = loadEditorConfig(options.config);
    this.logger = options.logger ?? createConsoleLogger(this.config.logLevel);
    this.definitions = options.definitions;

    const graphOptions = { allowSelfConnections: this.config.allowSelfConnections };
    const catalog = this.definitions.getCatalog();
    this.nodeEditorService = new NodeEditorService(
      new NodeGraph<EditorNodeContent>(graphOptions),
      new NodeFactory(catalog),
      options.graphRepository ?? new InMemoryGraphRepository(),
      new GraphSerializer<EditorNodeContent>({
        catalog,
        contentSchema: EditorNodeContentSchema,
        graphOptions,
      }),
      this.config
    );

    this.events = new EditorEventBus();
    this.stateManager = new EditorStateManager();
    this.commands = new CommandExecutor(
      this.nodeEditorService,
      this.stateManager,
      this.events,
      this.logger
    );
    this.connections = new ConnectionInteractionHandler(
      this.nodeEditorService,
      this.stateManager,
      this.commands,
      this.logger
    );
  }

  /**
   * 定義 ID を指定してノードを追加
   */
  addNode(definitionId: string, x = 0, y = 0): NodeId | null {
    const definition = this.definitions.getDefinition(definitionId);
    if (!definition) {
      this.logger.warn(`Failed to add node: unknown definition "${definitionId}"`);
      return null;
    }
    return this.commands.addNode(definition, x, y);
  }

  getGraph(): NodeGraph<EditorNodeContent> {
    return this.nodeEditorService.getGraph();
  }

  getNode(nodeId: NodeId): NodeView<EditorNodeContent> | undefined {
    return this.nodeEditorService.getNode(nodeId);
  }

  getSelectedNodeId(): string | null {
    return this.stateManager.getSelectedNodeId();
  }

  getPosition(nodeId: NodeId): Position | undefined {
    return this.stateManager.getPosition(nodeId.toString());
  }

  /**
   * 描画用モデルを取得
   */
  getRenderModel(): RenderModel {
    const graph = this.nodeEditorService.getGraph();
    const nodesById = new Map(graph.iterNodes().map(node => [node.id.toString(), node]));
    const selected = this.stateManager.getSelectedNodeId();

    const nodes: RenderNode[] = [];
    for (const id of this.stateManager.getNodeOrder()) {
      const node = nodesById.get(id);
      if (!node) {
        continue;
      }
      const position = this.stateManager.getPosition(id) ?? Position.ORIGIN;
      nodes.push(NodeAdapter.toRenderNode(node, position, id === selected));
    }
    return { nodes, connections: ConnectionAdapter.toRenderConnections(graph) };
  }
}
