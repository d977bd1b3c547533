import type { NodeEditorService } from '../../application/services/NodeEditorService';
import { areCompatible } from '../../domain/value-objects/DataType';
import { ConnectionId } from '../../domain/value-objects/Id';
import type { HookId, NodeId, PortAddress, PortId } from '../../domain/value-objects/Id';
import type { Logger } from '../../infrastructure/logging/Logger';
import type { EditorStateManager } from '../EditorStateManager';
import type { CommandExecutor } from '../CommandExecutor';
import type { DragOutcome, DragRejectReason } from '../types';

/**
 * 接続操作を担当するクラス
 *
 * ポートからのドラッグで接続を作る操作の状態機械です。
 * idle → dragging → idle と遷移し、離した位置のポートが条件を満たせば接続します。
 * 接続済みのフックからドラッグを始めると、その接続を外して相手側からのドラッグに
 * 切り替わります（つなぎ替え）。
 */
export class ConnectionInteractionHandler {
  constructor(
    private nodeEditorService: NodeEditorService,
    private stateManager: EditorStateManager,
    private commandExecutor: CommandExecutor,
    private logger: Logger
  ) {}

  isDragging(): boolean {
    return this.stateManager.getConnectionDrag().status === 'dragging';
  }

  /**
   * ドラッグ中の起点ポート
   */
  getOrigin(): PortAddress | undefined {
    const drag = this.stateManager.getConnectionDrag();
    return drag.status === 'dragging' ? drag.origin : undefined;
  }

  /**
   * 接続ドラッグを開始
   *
   * hookId に接続済みのフックを渡すと、その接続を外して相手側のポートから
   * ドラッグを続けます。開始できなかった場合は false を返します。
   */
  startDrag(nodeId: NodeId, portId: PortId, hookId?: HookId): boolean {
    if (this.isDragging()) {
      this.cancelDrag();
    }

    const node = this.nodeEditorService.getNode(nodeId);
    const info = node?.portInfo(portId);
    if (!node || !info) {
      this.logger.debug(`Cannot start drag: port ${portId.toString()} not found`);
      return false;
    }

    const remote = hookId ? node.bindingAt(portId, hookId) : undefined;
    if (hookId && remote) {
      if (!this.commandExecutor.deleteConnection(new ConnectionId(nodeId, portId, hookId))) {
        return false;
      }
      this.stateManager.setConnectionDrag({
        status: 'dragging',
        origin: { nodeId: remote.nodeId, portId: remote.portId },
      });
      return true;
    }

    // 定数専用の入力は接続操作の対象外
    if (info.kind === 'constantOnly') {
      return false;
    }
    this.stateManager.setConnectionDrag({
      status: 'dragging',
      origin: { nodeId, portId },
    });
    return true;
  }

  /**
   * 接続ドラッグを終了
   *
   * target が無い、または条件を満たさない場合は何もせずに idle に戻ります。
   */
  endDrag(target?: PortAddress): DragOutcome {
    const drag = this.stateManager.getConnectionDrag();
    if (drag.status !== 'dragging') {
      return reject('not-dragging', 'No connection drag in progress');
    }
    this.stateManager.setConnectionDrag({ status: 'idle' });

    if (!target) {
      return reject('no-target', 'Released outside of a port');
    }
    const guard = this.checkTarget(drag.origin, target);
    if (guard) {
      this.logger.debug(`Connection drag rejected (${guard.reason}): ${guard.message}`);
      return guard;
    }

    const result = this.commandExecutor.createConnection(drag.origin, target);
    if (!result.ok) {
      return reject('rejected', result.error.message);
    }
    return {
      status: 'connected',
      connection: result.value.connection,
      replaced: result.value.replacedConnections,
    };
  }

  /**
   * 接続ドラッグを中止
   */
  cancelDrag(): void {
    this.stateManager.setConnectionDrag({ status: 'idle' });
  }

  private checkTarget(
    origin: PortAddress,
    target: PortAddress
  ): Extract<DragOutcome, { status: 'rejected' }> | undefined {
    const graph = this.nodeEditorService.getGraph();
    const originNode = graph.node(origin.nodeId);
    const targetNode = graph.node(target.nodeId);
    const originInfo = originNode?.portInfo(origin.portId);
    const targetInfo = targetNode?.portInfo(target.portId);
    if (!originNode || !targetNode || !originInfo || !targetInfo) {
      return reject('no-target', 'The port no longer exists');
    }

    if (origin.nodeId.equals(target.nodeId) && !graph.allowsSelfConnections) {
      return reject('same-node', 'A node cannot connect to itself');
    }
    if (origin.portId.direction === target.portId.direction) {
      return reject('same-direction', `Both ports are ${target.portId.direction}s`);
    }
    if (!areCompatible(originInfo.dataType, targetInfo.dataType)) {
      return reject(
        'incompatible-types',
        `${originInfo.dataType.name} cannot connect to ${targetInfo.dataType.name}`
      );
    }

    const policy = this.nodeEditorService.getConfig().occupiedInputPolicy;
    for (const [node, info] of [
      [originNode, originInfo],
      [targetNode, targetInfo],
    ] as const) {
      if (info.availableHook) {
        continue;
      }
      const replaceable =
        info.direction === 'input' &&
        info.kind !== 'constantOnly' &&
        info.maxConnections === 1 &&
        policy === 'replace';
      if (!replaceable) {
        return reject(
          'no-available-hook',
          `Port "${info.name}" on ${node.label} has no free hook`
        );
      }
    }
    return undefined;
  }
}

function reject(
  reason: DragRejectReason,
  message: string
): Extract<DragOutcome, { status: 'rejected' }> {
  return { status: 'rejected', reason, message };
}
