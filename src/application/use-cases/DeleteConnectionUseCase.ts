import { orientConnection } from '../../domain/entities/NodeGraph';
import type { ConnectionPair, NodeGraph } from '../../domain/entities/NodeGraph';
import type { ConnectionId } from '../../domain/value-objects/Id';
import { describeGraphError } from '../../domain/errors/GraphErrors';
import { NodeEditorError } from '../errors/NodeEditorError';

/**
 * 接続削除ユースケース
 *
 * 接続のどちらか一方の端点を指定して切断します。相手側はグラフが修復します。
 */
export class DeleteConnectionUseCase {
  execute<TContent>(nodeGraph: NodeGraph<TContent>, endpoint: ConnectionId): ConnectionPair {
    const result = nodeGraph.dropConnection(endpoint);
    if (!result.ok) {
      throw new NodeEditorError(
        result.error.kind === 'BadNode' ? 'NODE_NOT_FOUND' : 'CONNECTION_NOT_FOUND',
        `Failed to drop ${endpoint.toString()}: ${describeGraphError(result.error)}`,
        result.error
      );
    }
    return orientConnection(endpoint, result.value);
  }
}
