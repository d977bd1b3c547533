import { z } from 'zod';

export const PortValueSchema = z.union([z.number(), z.array(z.number()), z.string(), z.boolean()]);

export const DataTypeDefinitionSchema = z.object({
  name: z.string().min(1),
  compatibleWith: z.array(z.string().min(1)).default([]),
  color: z.string().optional(),
});

export const PortDefinitionSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  default: PortValueSchema.optional(),
  maxConnections: z.number().int().positive().nullable().optional(),
  kind: z.enum(['connectionOnly', 'constantOnly', 'connectionOrConstant']).optional(),
  description: z.string().optional(),
});

export const NodeDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.string().min(1),
  description: z.string().default(''),
  inputs: z.array(PortDefinitionSchema).default([]),
  outputs: z.array(PortDefinitionSchema).default([]),
});

export const NodeDefinitionLibrarySchema = z.object({
  dataTypes: z.array(DataTypeDefinitionSchema).default([]),
  nodes: z.array(NodeDefinitionSchema).default([]),
});

/**
 * エディターが作成したノードの中身（保存されたグラフの読み込みで使います）
 */
export const EditorNodeContentSchema = z.object({
  definitionId: z.string().min(1),
  values: z.record(PortValueSchema).default({}),
});
