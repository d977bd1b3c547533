import type { ConnectionPair, NodeGraph } from '../../domain/entities/NodeGraph';
import type { RenderConnection } from '../../types';

/**
 * 接続アダプター
 *
 * 端点の組を、ベジェ曲線の描画に必要な情報に変換します。
 */
export class ConnectionAdapter {
  static toRenderConnection<TContent>(
    graph: NodeGraph<TContent>,
    connection: ConnectionPair
  ): RenderConnection {
    const dataType = graph.node(connection.output.nodeId)?.portDataType(connection.output.portId);
    return {
      id: `${connection.output.toString()}->${connection.input.toString()}`,
      output: connection.output.toString(),
      input: connection.input.toString(),
      outputNodeId: connection.output.nodeId.toString(),
      inputNodeId: connection.input.nodeId.toString(),
      dataType: dataType?.name ?? 'unknown',
    };
  }

  /**
   * グラフ内のすべての接続を変換
   */
  static toRenderConnections<TContent>(graph: NodeGraph<TContent>): RenderConnection[] {
    return graph.connections().map(connection => this.toRenderConnection(graph, connection));
  }
}
