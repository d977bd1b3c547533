import type { PortValue } from '../types';

/**
 * エディターイベントのタイプ
 */
export enum EditorEventType {
  NODE_ADDED = 'node_added',
  NODE_MOVED = 'node_moved',
  NODE_DELETED = 'node_deleted',
  NODE_SELECTED = 'node_selected',
  NODE_RAISED = 'node_raised',
  CONNECTION_CREATED = 'connection_created',
  CONNECTION_DELETED = 'connection_deleted',
  NODE_VALUE_CHANGED = 'node_value_changed',
  GRAPH_LOADED = 'graph_loaded',
}

/**
 * イベントデータの型定義
 */
export interface EditorEventData {
  [EditorEventType.NODE_ADDED]: { nodeId: string; definitionId: string };
  [EditorEventType.NODE_MOVED]: { nodeId: string; x: number; y: number };
  [EditorEventType.NODE_DELETED]: { nodeId: string };
  [EditorEventType.NODE_SELECTED]: { nodeId: string | null };
  [EditorEventType.NODE_RAISED]: { nodeId: string };
  [EditorEventType.CONNECTION_CREATED]: { output: string; input: string };
  [EditorEventType.CONNECTION_DELETED]: { output: string; input: string };
  [EditorEventType.NODE_VALUE_CHANGED]: { nodeId: string; name: string; value: PortValue };
  [EditorEventType.GRAPH_LOADED]: { name: string; nodeCount: number };
}

/**
 * イベントリスナーの型定義
 */
export type EventListener<T extends EditorEventType> = (data: EditorEventData[T]) => void;

type ListenerTable = { [T in EditorEventType]?: Array<EventListener<T>> };

/**
 * エディターイベントバス
 *
 * Observerパターンを実装し、イベントの発行と購読を管理します。
 */
export class EditorEventBus {
  private listeners: ListenerTable = {};

  /**
   * イベントを購読
   */
  subscribe<T extends EditorEventType>(
    eventType: T,
    listener: EventListener<T>
  ): () => void {
    const listeners: NonNullable<ListenerTable[T]> = this.listeners[eventType] ?? [];
    this.listeners[eventType] = listeners;
    listeners.push(listener);

    // 購読解除関数を返す
    return () => {
      const index = listeners.indexOf(listener);
      if (index > -1) {
        listeners.splice(index, 1);
      }
    };
  }

  /**
   * イベントを発行
   */
  emit<T extends EditorEventType>(
    eventType: T,
    data: EditorEventData[T]
  ): void {
    const listeners: Array<EventListener<T>> | undefined = this.listeners[eventType];
    if (listeners) {
      [...listeners].forEach(listener => listener(data));
    }
  }

  /**
   * すべてのリスナーをクリア
   */
  clear(): void {
    this.listeners = {};
  }

  /**
   * 特定のイベントタイプのリスナーをクリア
   */
  clearEvent(eventType: EditorEventType): void {
    delete this.listeners[eventType];
  }
}
