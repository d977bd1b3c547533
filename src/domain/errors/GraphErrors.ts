import type { ConnectionId, HookId, NodeId, PortId } from '../value-objects/Id';

/**
 * ポートへの接続に失敗した理由
 */
export type PortAddConnectionError =
  | { readonly kind: 'BadHook'; readonly hookId: HookId }
  | { readonly kind: 'HookOccupied'; readonly hookId: HookId }
  | { readonly kind: 'IncompatibleDataType'; readonly expected: string; readonly actual: string };

/**
 * ポートからの切断に失敗した理由
 */
export type PortDropConnectionError =
  | { readonly kind: 'BadHook'; readonly hookId: HookId }
  | { readonly kind: 'NoConnection'; readonly hookId: HookId };

/**
 * ノードへの接続に失敗した理由。ポートが拒否した場合は PortId 付きで包みます。
 */
export type NodeAddConnectionError =
  | { readonly kind: 'BadPort'; readonly portId: PortId }
  | { readonly kind: 'ConstantOnlyPort'; readonly portId: PortId }
  | { readonly kind: 'PortError'; readonly portId: PortId; readonly error: PortAddConnectionError };

export type NodeDropConnectionError =
  | { readonly kind: 'BadPort'; readonly portId: PortId }
  | { readonly kind: 'PortError'; readonly portId: PortId; readonly error: PortDropConnectionError };

/**
 * グラフ上で接続を作れなかった理由
 */
export type GraphAddConnectionError =
  | { readonly kind: 'BadOutputNode'; readonly nodeId: NodeId }
  | { readonly kind: 'BadInputNode'; readonly nodeId: NodeId }
  | { readonly kind: 'OutputNodeError'; readonly nodeId: NodeId; readonly error: NodeAddConnectionError }
  | { readonly kind: 'InputNodeError'; readonly nodeId: NodeId; readonly error: NodeAddConnectionError }
  | { readonly kind: 'SameNode'; readonly nodeId: NodeId }
  | {
      readonly kind: 'AlreadyConnected';
      readonly output: ConnectionId<'output'>;
      readonly input: ConnectionId<'input'>;
    };

export interface BadNodeError {
  readonly kind: 'BadNode';
  readonly nodeId: NodeId;
}

export type GraphDropConnectionError =
  | BadNodeError
  | { readonly kind: 'NodeError'; readonly nodeId: NodeId; readonly error: NodeDropConnectionError };

export type GraphError =
  | PortAddConnectionError
  | PortDropConnectionError
  | NodeAddConnectionError
  | NodeDropConnectionError
  | GraphAddConnectionError
  | GraphDropConnectionError;

/**
 * 構造化エラーを診断用の1行メッセージに変換
 */
export function describeGraphError(error: GraphError): string {
  switch (error.kind) {
    case 'BadHook':
      return `hook ${error.hookId.toString()} does not exist`;
    case 'HookOccupied':
      return `hook ${error.hookId.toString()} is not available`;
    case 'IncompatibleDataType':
      return `data type "${error.actual}" cannot connect to "${error.expected}"`;
    case 'NoConnection':
      return `hook ${error.hookId.toString()} has no connection`;
    case 'BadPort':
      return `port ${error.portId.toString()} does not exist`;
    case 'ConstantOnlyPort':
      return `port ${error.portId.toString()} only accepts a constant value`;
    case 'PortError':
      return `port ${error.portId.toString()}: ${describeGraphError(error.error)}`;
    case 'BadOutputNode':
      return `output node ${error.nodeId.toString()} does not exist`;
    case 'BadInputNode':
      return `input node ${error.nodeId.toString()} does not exist`;
    case 'OutputNodeError':
      return `output node ${error.nodeId.toString()}: ${describeGraphError(error.error)}`;
    case 'InputNodeError':
      return `input node ${error.nodeId.toString()}: ${describeGraphError(error.error)}`;
    case 'SameNode':
      return `node ${error.nodeId.toString()} cannot connect to itself`;
    case 'AlreadyConnected':
      return `${error.output.toString()} is already connected to the port of ${error.input.toString()}`;
    case 'BadNode':
      return `node ${error.nodeId.toString()} does not exist`;
    case 'NodeError':
      return `node ${error.nodeId.toString()}: ${describeGraphError(error.error)}`;
  }
}

export type GraphInvariantCode = 'STALE_KEY' | 'ROLLBACK_FAILED';

/**
 * アリーナが壊れていることを示す致命的なエラー
 *
 * 検証済みの内部処理でのみ投げられ、外部入力からは到達しません。
 */
export class GraphInvariantError extends Error {
  constructor(
    public readonly code: GraphInvariantCode,
    message: string
  ) {
    super(message);
    this.name = 'GraphInvariantError';
  }
}

/**
 * シリアライズされたグラフを復元できない
 */
export class GraphSerializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphSerializationError';
  }
}
