import { Position } from '../domain/value-objects/Position';
import { EMPTY_LAYOUT } from '../domain/services/EditorDocument';
import type { SerializedLayout } from '../domain/services/EditorDocument';
import type { ConnectionDragState } from './types';

/**
 * エディターの状態を管理するクラス
 *
 * 描画順、選択中のノード、ノードの位置、接続ドラッグの状態を管理します。
 * どれもグラフの接続には影響しない、エディター側だけの状態です。
 */
export class EditorStateManager {
  // 後ろにあるノードほど手前に描画される
  private nodeOrder: string[] = [];
  private positions: Map<string, Position> = new Map();
  private selectedNodeId: string | null = null;
  private connectionDrag: ConnectionDragState = { status: 'idle' };

  /**
   * ノードを最前面に登録
   */
  registerNode(nodeId: string, position: Position = Position.ORIGIN): void {
    if (!this.nodeOrder.includes(nodeId)) {
      this.nodeOrder.push(nodeId);
    }
    this.positions.set(nodeId, position);
  }

  /**
   * 削除されたノードの状態を片付ける
   */
  unregisterNode(nodeId: string): void {
    this.nodeOrder = this.nodeOrder.filter(id => id !== nodeId);
    this.positions.delete(nodeId);
    if (this.selectedNodeId === nodeId) {
      this.selectedNodeId = null;
    }
  }

  /**
   * ノードを最前面に移動。未登録なら false
   */
  raiseNode(nodeId: string): boolean {
    const index = this.nodeOrder.indexOf(nodeId);
    if (index === -1) {
      return false;
    }
    this.nodeOrder.splice(index, 1);
    this.nodeOrder.push(nodeId);
    return true;
  }

  getNodeOrder(): string[] {
    return [...this.nodeOrder];
  }

  getPosition(nodeId: string): Position | undefined {
    return this.positions.get(nodeId);
  }

  setPosition(nodeId: string, position: Position): void {
    if (this.positions.has(nodeId)) {
      this.positions.set(nodeId, position);
    }
  }

  selectNode(nodeId: string | null): void {
    this.selectedNodeId = nodeId;
  }

  getSelectedNodeId(): string | null {
    return this.selectedNodeId;
  }

  getConnectionDrag(): ConnectionDragState {
    return this.connectionDrag;
  }

  setConnectionDrag(state: ConnectionDragState): void {
    this.connectionDrag = state;
  }

  /**
   * 保存用の配置を取得
   */
  getLayout(): SerializedLayout {
    const positions: SerializedLayout['positions'] = {};
    for (const [nodeId, position] of this.positions) {
      positions[nodeId] = { x: position.x, y: position.y };
    }
    return { positions, order: [...this.nodeOrder] };
  }

  /**
   * 読み込んだグラフと保存時の配置から状態を作り直す
   *
   * 配置に無いノードは原点に置き、描画順の最後に加えます。
   * グラフに無いノードの配置は捨てます。
   */
  reset(nodeIds: string[], layout: SerializedLayout = EMPTY_LAYOUT): void {
    const known = new Set(nodeIds);
    const order = layout.order.filter(id => known.delete(id));
    order.push(...nodeIds.filter(id => known.has(id)));

    const positions = new Map<string, Position>();
    for (const nodeId of order) {
      const saved = layout.positions[nodeId];
      positions.set(nodeId, saved ? new Position(saved.x, saved.y) : Position.ORIGIN);
    }
    this.nodeOrder = order;
    this.positions = positions;
    this.selectedNodeId = null;
    this.connectionDrag = { status: 'idle' };
  }
}
