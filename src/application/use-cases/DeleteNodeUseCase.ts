import { orientConnection } from '../../domain/entities/NodeGraph';
import type { ConnectionPair, NodeGraph } from '../../domain/entities/NodeGraph';
import type { NodeView } from '../../domain/entities/Node';
import type { NodeId } from '../../domain/value-objects/Id';
import { NodeEditorError } from '../errors/NodeEditorError';

/**
 * ノード削除ユースケース
 *
 * ノードを削除し、切断された接続を返します。
 * 自己ループは両端が同じノードにあるため、1本として数えます。
 */
export class DeleteNodeUseCase {
  execute<TContent>(
    nodeGraph: NodeGraph<TContent>,
    nodeId: NodeId
  ): { deletedNode: NodeView<TContent>; severedConnections: ConnectionPair[] } {
    const removed = nodeGraph.removeNode(nodeId);
    if (!removed) {
      throw new NodeEditorError('NODE_NOT_FOUND', `Node ${nodeId.toString()} not found`);
    }

    const severed = new Map<string, ConnectionPair>();
    for (const { nodeSide, remote } of removed.severed) {
      const pair = orientConnection(nodeSide, remote);
      severed.set(pair.output.toString(), pair);
    }

    return {
      deletedNode: removed.node,
      severedConnections: Array.from(severed.values()),
    };
  }
}
