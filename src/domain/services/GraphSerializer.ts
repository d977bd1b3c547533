import { z } from 'zod';
import { NodeGraph } from '../entities/NodeGraph';
import type { GraphOptions, GraphSnapshot } from '../entities/NodeGraph';
import type { NodeSnapshot, PortSnapshot } from '../entities/Node';
import { ConnectionId, HookId, NodeId, PortId, PortKey } from '../value-objects/Id';
import type { ArenaKey } from '../value-objects/Id';
import type { PortDirection } from '../value-objects/PortType';
import { GraphSerializationError } from '../errors/GraphErrors';
import type { DataTypeCatalog } from './DataTypeCatalog';

export const GRAPH_FORMAT_VERSION = 2;

const ArenaKeySchema = z.string().regex(/^\d+v[1-9]\d*$/, 'Expected a key like "0v1"');
const DirectionSchema = z.enum(['input', 'output']);
// アリーナの世代表。空きスロットを含むスロット数だけ並びます
const SlotTableSchema = z.array(z.number().int().positive());

export const SerializedHookSchema = z.object({
  id: ArenaKeySchema,
  remote: z.object({
    node: ArenaKeySchema,
    direction: DirectionSchema,
    port: ArenaKeySchema,
    hook: ArenaKeySchema,
  }),
});

export const SerializedPortSchema = z.object({
  key: ArenaKeySchema,
  name: z.string().min(1),
  dataType: z.string().min(1),
  kind: z.enum(['connectionOnly', 'constantOnly', 'connectionOrConstant']).optional(),
  maxConnections: z.number().int().positive().nullable(),
  side: z.enum(['left', 'right']).default('left'),
  hooks: z.array(SerializedHookSchema).default([]),
  availableHook: ArenaKeySchema.nullable(),
  hookSlots: SlotTableSchema,
});

export const SerializedNodeSchema = z.object({
  id: ArenaKeySchema,
  label: z.string().min(1),
  content: z.unknown(),
  inputs: z.array(SerializedPortSchema).default([]),
  outputs: z.array(SerializedPortSchema).default([]),
  inputSlots: SlotTableSchema,
  outputSlots: SlotTableSchema,
});

export const SerializedGraphSchema = z.object({
  version: z.literal(GRAPH_FORMAT_VERSION),
  nodes: z.array(SerializedNodeSchema),
  nodeSlots: SlotTableSchema,
});

export type SerializedHook = z.infer<typeof SerializedHookSchema>;
export type SerializedPort = z.infer<typeof SerializedPortSchema>;
export type SerializedNode = z.infer<typeof SerializedNodeSchema>;
export type SerializedGraph = z.infer<typeof SerializedGraphSchema>;

export interface GraphSerializerOptions<TContent> {
  catalog: DataTypeCatalog;
  contentSchema: z.ZodType<TContent, z.ZodTypeDef, unknown>;
  graphOptions?: GraphOptions;
}

/**
 * グラフのシリアライズ/デシリアライズを行うサービス
 *
 * ノード表、ポート表、フックの接続表をそのままの形で書き出します。
 * 接続は両端のフックに記録されるので、読み込み時に両端が一致しない文書は拒否します。
 */
export class GraphSerializer<TContent> {
  constructor(private readonly options: GraphSerializerOptions<TContent>) {}

  /**
   * グラフをシリアライズ形式に変換
   */
  serialize(graph: NodeGraph<TContent>): SerializedGraph {
    const snapshot = graph.snapshot();
    return {
      version: GRAPH_FORMAT_VERSION,
      nodes: snapshot.nodes.map(node => ({
        id: node.id.toString(),
        label: node.label,
        content: node.content,
        inputs: node.inputs.map(port => this.serializePort(port)),
        outputs: node.outputs.map(port => this.serializePort(port)),
        inputSlots: [...node.inputSlots],
        outputSlots: [...node.outputSlots],
      })),
      nodeSlots: [...snapshot.nodeSlots],
    };
  }

  /**
   * シリアライズ形式からグラフを復元（同じIDで作成）
   */
  deserialize(document: unknown): NodeGraph<TContent> {
    const parsed = SerializedGraphSchema.safeParse(document);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new GraphSerializationError(`Invalid graph document: ${details}`);
    }

    const snapshot: GraphSnapshot<TContent> = {
      nodes: parsed.data.nodes.map(node => this.restoreNode(node)),
      nodeSlots: parsed.data.nodeSlots,
    };

    try {
      return NodeGraph.restore(snapshot, this.options.graphOptions);
    } catch (error) {
      if (error instanceof GraphSerializationError || !(error instanceof Error)) {
        throw error;
      }
      throw new GraphSerializationError(`Invalid graph document: ${error.message}`);
    }
  }

  toJSON(graph: NodeGraph<TContent>): string {
    return JSON.stringify(this.serialize(graph));
  }

  fromJSON(text: string): NodeGraph<TContent> {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new GraphSerializationError(`Graph document is not valid JSON: ${reason}`);
    }
    return this.deserialize(document);
  }

  private serializePort(port: PortSnapshot): SerializedPort {
    return {
      key: port.key.toString(),
      name: port.name,
      dataType: port.dataType.name,
      kind: port.kind,
      maxConnections: port.maxConnections,
      side: port.side,
      hooks: port.bindings.map(({ hookId, remote }) => ({
        id: hookId.toString(),
        remote: {
          node: remote.nodeId.toString(),
          direction: remote.direction,
          port: remote.portId.key.toString(),
          hook: remote.hookId.toString(),
        },
      })),
      availableHook: port.availableHook ? port.availableHook.toString() : null,
      hookSlots: [...port.hookSlots],
    };
  }

  private restoreNode(node: SerializedNode): NodeSnapshot<TContent> {
    const content = this.options.contentSchema.safeParse(node.content);
    if (!content.success) {
      throw new GraphSerializationError(
        `Invalid content on node ${node.id}: ${content.error.issues.map(issue => issue.message).join('; ')}`
      );
    }
    return {
      id: parseKey(node.id, NodeId.parse),
      label: node.label,
      content: content.data,
      inputs: node.inputs.map(port => this.restorePort(port, 'input')),
      outputs: node.outputs.map(port => this.restorePort(port, 'output')),
      inputSlots: node.inputSlots,
      outputSlots: node.outputSlots,
    };
  }

  private restorePort(port: SerializedPort, direction: PortDirection): PortSnapshot {
    const dataType = this.options.catalog.resolve(port.dataType);
    if (!dataType) {
      throw new GraphSerializationError(`Unknown data type "${port.dataType}" on port "${port.name}"`);
    }
    return {
      key: parseKey(port.key, PortKey.parse),
      name: port.name,
      dataType,
      kind: direction === 'input' ? port.kind ?? 'connectionOrConstant' : undefined,
      maxConnections: port.maxConnections,
      side: port.side,
      availableHook: port.availableHook === null ? undefined : parseKey(port.availableHook, HookId.parse),
      hookSlots: port.hookSlots,
      bindings: port.hooks.map(hook => {
        if (hook.remote.direction === direction) {
          throw new GraphSerializationError(
            `Hook ${hook.id} on ${direction} port "${port.name}" points at another ${direction}`
          );
        }
        return {
          hookId: parseKey(hook.id, HookId.parse),
          remote: new ConnectionId(
            parseKey(hook.remote.node, NodeId.parse),
            PortId.of(hook.remote.direction, parseKey(hook.remote.port, PortKey.parse)),
            parseKey(hook.remote.hook, HookId.parse)
          ),
        };
      }),
    };
  }
}

function parseKey<K extends ArenaKey>(text: string, parse: (text: string) => K | undefined): K {
  const key = parse(text);
  if (!key) {
    throw new GraphSerializationError(`Invalid key "${text}"`);
  }
  return key;
}
