import type { NodeView, PortInfo } from '../../domain/entities/Node';
import { Position } from '../../domain/value-objects/Position';
import type { EditorNodeContent, RenderNode, RenderPort } from '../../types';

/**
 * ノードアダプター
 *
 * ドメインのノードを描画層向けの読み取り専用モデルに変換します。
 * 描画層はこのモデルだけを読み、状態の変更はエディター経由で行います。
 */
export class NodeAdapter {
  /**
   * ノードを描画用モデルに変換
   */
  static toRenderNode(
    node: NodeView<EditorNodeContent>,
    position: Position = Position.ORIGIN,
    selected = false
  ): RenderNode {
    const ports = node.ports();
    return {
      id: node.id.toString(),
      label: node.label,
      definitionId: node.content.definitionId,
      x: position.x,
      y: position.y,
      selected,
      inputs: ports
        .filter(port => port.direction === 'input')
        .map(port => this.toRenderPort(node, port)),
      outputs: ports
        .filter(port => port.direction === 'output')
        .map(port => this.toRenderPort(node, port)),
    };
  }

  /**
   * ポートを描画用モデルに変換
   */
  static toRenderPort(node: NodeView<EditorNodeContent>, port: PortInfo): RenderPort {
    const renderPort: RenderPort = {
      id: port.id.toString(),
      name: port.name,
      direction: port.direction,
      dataType: port.dataType.name,
      side: port.side,
      availableHook: port.availableHook?.toString() ?? null,
      hooks: node.hooks(port.id).map(([hookId, remote]) => ({
        id: hookId.toString(),
        connectedTo: remote?.toString() ?? null,
      })),
    };
    if (port.kind !== undefined) {
      renderPort.kind = port.kind;
    }
    const value = node.content.values[port.name];
    if (port.direction === 'input' && value !== undefined) {
      renderPort.value = value;
    }
    return renderPort;
  }
}
