import type { ArenaKey } from '../value-objects/Id';
import { GraphInvariantError } from '../errors/GraphErrors';

type Slot<V> =
  | { readonly generation: number; readonly occupied: true; readonly value: V }
  | { readonly generation: number; readonly occupied: false };

export type KeyFactory<K extends ArenaKey> = (index: number, generation: number) => K;

/**
 * 世代付きキーで要素を保持するアリーナ
 *
 * 削除したスロットは再利用されますが、そのたびに世代が進むため
 * 古いキーで新しい要素を参照してしまうことはありません。
 */
export class SlotMap<K extends ArenaKey, V> {
  private slots: Slot<V>[] = [];
  private freeList: number[] = [];
  private count = 0;

  constructor(private readonly makeKey: KeyFactory<K>) {}

  get size(): number {
    return this.count;
  }

  insert(value: V): K {
    return this.insertWithKey(() => value);
  }

  /**
   * 要素がまだ存在しない時点でキーを受け取り、そのキーを使って要素を作成
   */
  insertWithKey(build: (key: K) => V): K {
    // build が失敗しても空きスロットは残す
    const reused = this.freeList.at(-1);
    const index = reused ?? this.slots.length;
    const generation = reused === undefined ? 1 : this.slots[index].generation + 1;
    const key = this.makeKey(index, generation);
    const value = build(key);

    if (reused === undefined) {
      this.slots.push({ generation, occupied: true, value });
    } else {
      this.freeList.pop();
      this.slots[index] = { generation, occupied: true, value };
    }
    this.count++;
    return key;
  }

  get(key: K): V | undefined {
    const slot = this.slots[key.index];
    if (slot === undefined || !slot.occupied || slot.generation !== key.generation) {
      return undefined;
    }
    return slot.value;
  }

  /**
   * 存在が検証済みのキーで要素を取得。見つからない場合はアリーナの破損とみなします。
   */
  getOrThrow(key: K): V {
    const slot = this.slots[key.index];
    if (slot === undefined || !slot.occupied || slot.generation !== key.generation) {
      throw new GraphInvariantError(
        'STALE_KEY',
        `${key.kind} ${key.toString()} was expected to exist. Has it been removed?`
      );
    }
    return slot.value;
  }

  has(key: K): boolean {
    const slot = this.slots[key.index];
    return slot !== undefined && slot.occupied && slot.generation === key.generation;
  }

  remove(key: K): V | undefined {
    const slot = this.slots[key.index];
    if (slot === undefined || !slot.occupied || slot.generation !== key.generation) {
      return undefined;
    }
    this.slots[key.index] = { generation: slot.generation, occupied: false };
    this.freeList.push(key.index);
    this.count--;
    return slot.value;
  }

  keys(): K[] {
    return this.entries().map(([key]) => key);
  }

  values(): V[] {
    return this.entries().map(([, value]) => value);
  }

  /**
   * スロット順に (キー, 要素) を列挙
   */
  entries(): Array<[K, V]> {
    const result: Array<[K, V]> = [];
    this.slots.forEach((slot, index) => {
      if (slot.occupied) {
        result.push([this.makeKey(index, slot.generation), slot.value]);
      }
    });
    return result;
  }

  /**
   * スロットごとの世代（空きスロットを含む）
   */
  generations(): number[] {
    return this.slots.map(slot => slot.generation);
  }

  /**
   * 保存済みのキーと世代表をそのまま使って中身を作り直す
   *
   * スロット数は世代表の長さで決まり、キーはすべてその範囲内で世代も一致している
   * 必要があります。空きスロットは保存時の世代を引き継ぐので、削除済みのキーが
   * 読み込み後に再発行されることはありません。
   */
  load(entries: ReadonlyArray<readonly [K, V]>, generations: readonly number[]): void {
    for (const generation of generations) {
      if (!Number.isInteger(generation) || generation < 1) {
        throw new Error(`Arena generation must be a positive integer: ${generation}`);
      }
    }

    const slots = generations.map((generation): Slot<V> => ({ generation, occupied: false }));
    for (const [key, value] of entries) {
      if (key.index >= slots.length) {
        throw new Error(`Arena index ${key.index} is outside the slot table of ${slots.length}`);
      }
      const slot = slots[key.index];
      if (slot.occupied) {
        throw new Error(`Duplicate arena index ${key.index}`);
      }
      if (key.generation !== slot.generation) {
        throw new Error(
          `Key ${key.toString()} does not match slot generation ${slot.generation}`
        );
      }
      slots[key.index] = { generation: key.generation, occupied: true, value };
    }

    const freeList: number[] = [];
    for (let index = slots.length - 1; index >= 0; index--) {
      if (!slots[index].occupied) {
        freeList.push(index);
      }
    }

    this.slots = slots;
    this.freeList = freeList;
    this.count = entries.length;
  }
}
