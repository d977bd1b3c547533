import type { ConnectionId } from '../value-objects/Id';
import type { DataType } from '../value-objects/DataType';

// トークンの発行権。モジュール外には公開しない
const ISSUER: unique symbol = Symbol('ConnectionTokenIssuer');

/**
 * 切断された接続の反対側を記録する台帳
 *
 * グラフが1つだけ所有し、ポートが接続を手放すたびに相手側の ConnectionId が
 * 積まれます。グラフは操作の最後にこれを取り出して相手側も切断します。
 */
export class DroppedConnections {
  private entries: ConnectionId[] = [];

  /**
   * フックを消費するためのトークンを発行
   */
  issue(remote: ConnectionId, remoteDataType: DataType): ConnectionToken {
    return new ConnectionToken(ISSUER, remote, remoteDataType, this);
  }

  record(remote: ConnectionId): void {
    this.entries.push(remote);
  }

  /**
   * 記録をすべて取り出して台帳を空にする
   */
  drain(): ConnectionId[] {
    const drained = this.entries;
    this.entries = [];
    return drained;
  }

  clear(): void {
    this.entries = [];
  }

  get pendingCount(): number {
    return this.entries.length;
  }
}

/**
 * フックに保存される接続の証票
 *
 * 反対側の端点を記録しており、手放されたときに一度だけ台帳へ報告します。
 * グラフの台帳からしか発行できないため、空きフックはグラフ経由でしか消費できません。
 */
export class ConnectionToken {
  private released = false;

  constructor(
    issuer: typeof ISSUER,
    public readonly remote: ConnectionId,
    public readonly remoteDataType: DataType,
    private readonly ledger: DroppedConnections
  ) {
    if (issuer !== ISSUER) {
      throw new Error('ConnectionToken can only be issued by a graph');
    }
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * 接続を手放し、反対側の端点を台帳に報告
   */
  release(): ConnectionId {
    if (!this.released) {
      this.released = true;
      this.ledger.record(this.remote);
    }
    return this.remote;
  }
}
