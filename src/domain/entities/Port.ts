import { SlotMap } from '../arena/SlotMap';
import { HookId } from '../value-objects/Id';
import type { ConnectionId } from '../value-objects/Id';
import type { DataType } from '../value-objects/DataType';
import { areCompatible } from '../value-objects/DataType';
import type { PortSide } from '../value-objects/PortType';
import type { PortAddConnectionError, PortDropConnectionError } from '../errors/GraphErrors';
import { err, ok } from '../value-objects/Result';
import type { Result } from '../value-objects/Result';
import type { ConnectionToken } from './ConnectionToken';

export interface PortOptions {
  /** 同時に接続できる数。null は無制限 */
  maxConnections?: number | null;
  side?: PortSide;
}

export interface HookBinding {
  readonly hookId: HookId;
  readonly remote: ConnectionId;
}

export interface SavedHooks {
  readonly bindings: ReadonlyArray<readonly [HookId, ConnectionToken]>;
  readonly availableHook: HookId | undefined;
  readonly hookSlots: readonly number[];
}

interface Hook {
  token: ConnectionToken | undefined;
}

/**
 * ノード上の接続点
 *
 * フック（接続スロット）を持ち、各フックは空か、相手側の端点を記録した
 * トークンを1つ保持します。空のフックは常に高々1つで、それが次の接続に使われる
 * 「利用可能なフック」です。フック集合が変わるたびに即座に再計算されます。
 */
export class Port {
  private readonly hookSlots = new SlotMap<HookId, Hook>(
    (index, generation) => new HookId(index, generation)
  );
  private available: HookId | undefined;
  public readonly maxConnections: number | null;
  public readonly side: PortSide;

  constructor(
    public readonly dataType: DataType,
    options: PortOptions = {}
  ) {
    const max = options.maxConnections ?? null;
    if (max !== null && (!Number.isInteger(max) || max < 1)) {
      throw new Error(`maxConnections must be a positive integer: ${max}`);
    }
    this.maxConnections = max;
    this.side = options.side ?? 'left';
    this.refreshAvailableHook();
  }

  /**
   * 保存済みの接続をフックIDごと復元したポートを作成
   *
   * 空きフックも保存時のIDのまま戻します。保存されていなければ新しく割り当てます。
   */
  static restore(dataType: DataType, options: PortOptions, saved: SavedHooks): Port {
    const port = new Port(dataType, options);
    const { bindings, availableHook, hookSlots } = saved;
    if (port.maxConnections !== null && bindings.length > port.maxConnections) {
      throw new Error(
        `Port holds ${bindings.length} connections but allows ${port.maxConnections}`
      );
    }
    if (availableHook && port.maxConnections !== null && bindings.length >= port.maxConnections) {
      throw new Error(
        `Port holds ${bindings.length} connections and a free hook but allows ${port.maxConnections}`
      );
    }

    const hooks = bindings.map(([hookId, token]): [HookId, Hook] => [hookId, { token }]);
    if (availableHook) {
      hooks.push([availableHook, { token: undefined }]);
    }
    port.hookSlots.load(hooks, hookSlots);
    port.available = undefined;
    port.refreshAvailableHook();
    return port;
  }

  /**
   * フックのアリーナの世代表（保存用）
   */
  hookGenerations(): number[] {
    return this.hookSlots.generations();
  }

  /**
   * 次の接続を受け付けるフック。満杯なら undefined
   */
  availableHook(): HookId | undefined {
    return this.available;
  }

  /**
   * すべてのフックと、その接続先（空なら undefined）をスロット順に取得
   */
  hooks(): Array<[HookId, ConnectionId | undefined]> {
    return this.hookSlots
      .entries()
      .map(([hookId, hook]): [HookId, ConnectionId | undefined] => [hookId, hook.token?.remote]);
  }

  bindingAt(hookId: HookId): ConnectionId | undefined {
    return this.hookSlots.get(hookId)?.token?.remote;
  }

  connections(): HookBinding[] {
    const result: HookBinding[] = [];
    for (const [hookId, hook] of this.hookSlots.entries()) {
      if (hook.token) {
        result.push({ hookId, remote: hook.token.remote });
      }
    }
    return result;
  }

  connectionCount(): number {
    return this.connections().length;
  }

  isFull(): boolean {
    return this.available === undefined;
  }

  /**
   * 空のフックにトークンを格納して接続
   */
  connect(hookId: HookId, token: ConnectionToken): Result<void, PortAddConnectionError> {
    const hook = this.hookSlots.get(hookId);
    if (!hook) {
      return err({ kind: 'BadHook', hookId });
    }
    if (hook.token) {
      return err({ kind: 'HookOccupied', hookId });
    }
    if (!areCompatible(this.dataType, token.remoteDataType)) {
      return err({
        kind: 'IncompatibleDataType',
        expected: this.dataType.name,
        actual: token.remoteDataType.name,
      });
    }

    hook.token = token;
    this.refreshAvailableHook();
    return ok(undefined);
  }

  /**
   * 接続を切断して相手側の端点を返す
   *
   * トークンは解放され、相手側の端点がグラフの台帳に記録されます。
   */
  dropConnection(hookId: HookId): Result<ConnectionId, PortDropConnectionError> {
    const hook = this.hookSlots.get(hookId);
    if (!hook) {
      return err({ kind: 'BadHook', hookId });
    }
    if (!hook.token) {
      return err({ kind: 'NoConnection', hookId });
    }

    const token = hook.token;
    this.hookSlots.remove(hookId);
    this.refreshAvailableHook();
    return ok(token.release());
  }

  /**
   * すべての接続を切断
   */
  dropAllConnections(): HookBinding[] {
    const dropped: HookBinding[] = [];
    for (const { hookId } of this.connections()) {
      const result = this.dropConnection(hookId);
      if (result.ok) {
        dropped.push({ hookId, remote: result.value });
      }
    }
    return dropped;
  }

  /**
   * 直前の connect を取り消す
   *
   * トークンは解放せず台帳にも記録しないため、相手側には何も伝わりません。
   * 取り消したフックが再び利用可能なフックになります。
   */
  revokeConnection(hookId: HookId): boolean {
    const hook = this.hookSlots.get(hookId);
    if (!hook || !hook.token) {
      return false;
    }
    hook.token = undefined;
    if (this.available !== undefined && !this.available.equals(hookId)) {
      this.hookSlots.remove(this.available);
    }
    this.available = hookId;
    return true;
  }

  private refreshAvailableHook(): void {
    for (const [hookId, hook] of this.hookSlots.entries()) {
      if (!hook.token) {
        this.available = hookId;
        return;
      }
    }
    if (this.maxConnections === null || this.hookSlots.size < this.maxConnections) {
      this.available = this.hookSlots.insert({ token: undefined });
      return;
    }
    this.available = undefined;
  }
}
