import { orientConnection } from '../../domain/entities/NodeGraph';
import type { ConnectionPair, NodeGraph } from '../../domain/entities/NodeGraph';
import { ConnectionId } from '../../domain/value-objects/Id';
import type { PortAddress } from '../../domain/value-objects/Id';
import { describeGraphError } from '../../domain/errors/GraphErrors';
import type { GraphAddConnectionError, GraphDropConnectionError } from '../../domain/errors/GraphErrors';
import type { OccupiedInputPolicy } from '../../infrastructure/config/EditorConfig';
import { NodeEditorError } from '../errors/NodeEditorError';

export interface CreateConnectionResult {
  connection: ConnectionPair;
  /** 置き換えのために切断された接続 */
  replacedConnections: ConnectionPair[];
}

/**
 * 接続作成ユースケース
 *
 * 2つのポートの利用可能なフック同士をつなぎます。ポートはどちらの順で渡しても構いません。
 * 入力ポートが1本しか受け付けず既に埋まっている場合、policy が replace なら
 * 既存の接続を切断してから接続します。切断の前に canConnect で確認するため、
 * 置き換えた後の接続は失敗しません。
 */
export class CreateConnectionUseCase {
  execute<TContent>(
    nodeGraph: NodeGraph<TContent>,
    from: PortAddress,
    to: PortAddress,
    policy: OccupiedInputPolicy = 'replace'
  ): CreateConnectionResult {
    const { output, input } = orientPorts(from, to);

    const outputNode = nodeGraph.node(output.nodeId);
    if (!outputNode) {
      throw new NodeEditorError('NODE_NOT_FOUND', `Node ${output.nodeId.toString()} not found`);
    }
    const inputNode = nodeGraph.node(input.nodeId);
    if (!inputNode) {
      throw new NodeEditorError('NODE_NOT_FOUND', `Node ${input.nodeId.toString()} not found`);
    }

    // 既存の接続を切断する前に、置き換え後の接続が成立するかを確認する
    const check = nodeGraph.canConnect(output, input);
    if (!check.ok) {
      throw rejected(check.error);
    }

    const outputHook = outputNode.availableHook(output.portId);
    if (!outputHook) {
      throw new NodeEditorError('PORT_FULL', `Port ${output.portId.toString()} has no free hook`);
    }

    const replacedConnections: ConnectionPair[] = [];
    let inputHook = inputNode.availableHook(input.portId);
    if (!inputHook) {
      const maxConnections = inputNode.portInfo(input.portId)?.maxConnections;
      if (policy !== 'replace' || maxConnections !== 1) {
        throw new NodeEditorError('PORT_FULL', `Port ${input.portId.toString()} has no free hook`);
      }
      for (const [hookId, remote] of inputNode.hooks(input.portId)) {
        if (!remote) {
          continue;
        }
        const endpoint = new ConnectionId(input.nodeId, input.portId, hookId);
        const dropped = nodeGraph.dropConnection(endpoint);
        if (!dropped.ok) {
          throw rejected(dropped.error);
        }
        replacedConnections.push(orientConnection(endpoint, dropped.value));
      }
      inputHook = inputNode.availableHook(input.portId);
      if (!inputHook) {
        throw new NodeEditorError('PORT_FULL', `Port ${input.portId.toString()} has no free hook`);
      }
    }

    const connection: ConnectionPair = {
      output: new ConnectionId(output.nodeId, output.portId, outputHook),
      input: new ConnectionId(input.nodeId, input.portId, inputHook),
    };
    const result = nodeGraph.addConnection(connection.output, connection.input);
    if (!result.ok) {
      throw rejected(result.error);
    }

    return { connection, replacedConnections };
  }
}

function orientPorts(
  from: PortAddress,
  to: PortAddress
): { output: PortAddress<'output'>; input: PortAddress<'input'> } {
  const fromPort = from.portId;
  const toPort = to.portId;
  if (fromPort.isOutput() && toPort.isInput()) {
    return {
      output: { nodeId: from.nodeId, portId: fromPort },
      input: { nodeId: to.nodeId, portId: toPort },
    };
  }
  if (fromPort.isInput() && toPort.isOutput()) {
    return {
      output: { nodeId: to.nodeId, portId: toPort },
      input: { nodeId: from.nodeId, portId: fromPort },
    };
  }
  throw new NodeEditorError(
    'INVALID_DIRECTION',
    `Cannot connect ${fromPort.toString()} to ${toPort.toString()}: one output and one input are required`
  );
}

function rejected(error: GraphAddConnectionError | GraphDropConnectionError): NodeEditorError {
  const message = describeGraphError(error);
  switch (error.kind) {
    case 'BadOutputNode':
    case 'BadInputNode':
    case 'BadNode':
      return new NodeEditorError('NODE_NOT_FOUND', message, error);
    case 'OutputNodeError':
    case 'InputNodeError':
      if (error.error.kind === 'BadPort') {
        return new NodeEditorError('PORT_NOT_FOUND', message, error);
      }
      return new NodeEditorError('CONNECTION_REJECTED', message, error);
    default:
      return new NodeEditorError('CONNECTION_REJECTED', message, error);
  }
}

