import type { NodeGraph } from '../entities/NodeGraph';
import type { NodeId } from '../value-objects/Id';
import type { DataType } from '../value-objects/DataType';
import type { DataTypeCatalog } from './DataTypeCatalog';
import type { EditorNodeContent, NodeDefinition, PortDefinition, PortValue } from '../../types';

/**
 * ノードファクトリサービス
 *
 * ノード定義からポートを組み立て、グラフにノードを追加します。
 */
export class NodeFactory {
  constructor(private readonly catalog: DataTypeCatalog) {}

  /**
   * ノード定義からノードを作成してグラフに追加
   */
  create(graph: NodeGraph<EditorNodeContent>, definition: NodeDefinition): NodeId {
    // ポートの型を先にすべて解決し、未知の型があればノードを追加しない
    const inputs = this.resolvePorts(definition.inputs);
    const outputs = this.resolvePorts(definition.outputs);

    const content: EditorNodeContent = {
      definitionId: definition.id,
      values: NodeFactory.initialValues(definition),
    };

    return graph.addNode(definition.name, content, node => {
      for (const { port, dataType } of inputs) {
        node.addInputPort(port.name, dataType, {
          maxConnections: port.maxConnections,
          kind: port.kind,
        });
      }
      for (const { port, dataType } of outputs) {
        node.addOutputPort(port.name, dataType, {
          maxConnections: port.maxConnections ?? null,
        });
      }
    });
  }

  /**
   * 入力ポートのデフォルト値を初期化
   */
  static initialValues(definition: NodeDefinition): Record<string, PortValue> {
    const values: Record<string, PortValue> = {};
    for (const input of definition.inputs) {
      if (input.default !== undefined) {
        values[input.name] = Array.isArray(input.default) ? [...input.default] : input.default;
      }
    }
    return values;
  }

  private resolvePorts(ports: PortDefinition[]): Array<{ port: PortDefinition; dataType: DataType }> {
    return ports.map(port => ({ port, dataType: this.catalog.require(port.type) }));
  }
}
