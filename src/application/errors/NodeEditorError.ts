import type { GraphError } from '../../domain/errors/GraphErrors';

export type NodeEditorErrorCode =
  | 'NODE_NOT_FOUND'
  | 'PORT_NOT_FOUND'
  | 'PORT_FULL'
  | 'INVALID_DIRECTION'
  | 'CONNECTION_REJECTED'
  | 'CONNECTION_NOT_FOUND'
  | 'INVALID_DEFINITION'
  | 'GRAPH_NOT_FOUND'
  | 'INVALID_GRAPH';

/**
 * エディター操作の失敗
 *
 * グラフが構造化エラーを返した場合は graphError に保持します。
 */
export class NodeEditorError extends Error {
  constructor(
    public readonly code: NodeEditorErrorCode,
    message: string,
    public readonly graphError?: GraphError
  ) {
    super(message);
    this.name = 'NodeEditorError';
  }
}
