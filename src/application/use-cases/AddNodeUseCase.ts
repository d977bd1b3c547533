import type { NodeGraph } from '../../domain/entities/NodeGraph';
import type { NodeFactory } from '../../domain/services/NodeFactory';
import type { NodeId } from '../../domain/value-objects/Id';
import { GraphInvariantError } from '../../domain/errors/GraphErrors';
import { NodeEditorError } from '../errors/NodeEditorError';
import type { EditorNodeContent, NodeDefinition } from '../../types';

/**
 * ノード追加ユースケース
 *
 * ノード定義からノードを作成してグラフに追加します。
 * 定義が不正（未知のデータ型、重複したポート名など）な場合はノードを追加しません。
 */
export class AddNodeUseCase {
  constructor(private readonly nodeFactory: NodeFactory) {}

  execute(nodeGraph: NodeGraph<EditorNodeContent>, definition: NodeDefinition): NodeId {
    try {
      return this.nodeFactory.create(nodeGraph, definition);
    } catch (error) {
      if (error instanceof GraphInvariantError || !(error instanceof Error)) {
        throw error;
      }
      throw new NodeEditorError(
        'INVALID_DEFINITION',
        `Cannot create node "${definition.id}": ${error.message}`
      );
    }
  }
}
