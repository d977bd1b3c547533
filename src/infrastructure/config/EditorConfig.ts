import { z } from 'zod';

/**
 * エディター設定のスキーマ
 *
 * occupiedInputPolicy:
 * - replace: 埋まっている単一接続の入力に新しい接続をつなぐと、既存の接続と置き換える
 * - reject: 既存の接続を残して新しい接続を拒否する
 */
export const EditorConfigSchema = z.object({
  occupiedInputPolicy: z.enum(['replace', 'reject']).default('replace'),
  allowSelfConnections: z.boolean().default(false),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export type EditorConfig = z.infer<typeof EditorConfigSchema>;
export type OccupiedInputPolicy = EditorConfig['occupiedInputPolicy'];

export const DEFAULT_EDITOR_CONFIG: EditorConfig = EditorConfigSchema.parse({});

/**
 * 設定を検証し、省略された項目をデフォルト値で埋める
 *
 * 不正な値は ZodError として投げられます。
 */
export function loadEditorConfig(input: unknown = {}): EditorConfig {
  return EditorConfigSchema.parse(input ?? {});
}
