import { z } from 'zod';
import type { SerializedGraph } from './GraphSerializer';

const SavedPositionSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

/**
 * エディター上の配置（ノードIDごとの位置と描画順）
 */
export const SerializedLayoutSchema = z.object({
  positions: z.record(z.string(), SavedPositionSchema).default({}),
  order: z.array(z.string()).default([]),
});

export type SerializedLayout = z.infer<typeof SerializedLayoutSchema>;

export const EMPTY_LAYOUT: SerializedLayout = { positions: {}, order: [] };

/**
 * リポジトリに保存する文書。グラフ本体は GraphSerializer が検証します
 */
export interface EditorDocument {
  graph: SerializedGraph;
  layout: SerializedLayout;
}
