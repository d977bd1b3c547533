import { vi } from 'vitest';
import { NodeGraph } from '../src/domain/entities/NodeGraph';
import type { ConnectionPair } from '../src/domain/entities/NodeGraph';
import type { InputPortOptions } from '../src/domain/entities/Node';
import type { PortOptions } from '../src/domain/entities/Port';
import { NamedDataType } from '../src/domain/value-objects/DataType';
import type { DataType } from '../src/domain/value-objects/DataType';
import { ConnectionId } from '../src/domain/value-objects/Id';
import type { NodeId, PortAddress, PortId } from '../src/domain/value-objects/Id';
import type { Result } from '../src/domain/value-objects/Result';
import { NodeFactory } from '../src/domain/services/NodeFactory';
import { GraphSerializer } from '../src/domain/services/GraphSerializer';
import { NodeEditorService } from '../src/application/services/NodeEditorService';
import { loadEditorConfig } from '../src/infrastructure/config/EditorConfig';
import { NodeDefinitionLoader } from '../src/infrastructure/node-definitions/loader/NodeDefinitionLoader';
import { EditorNodeContentSchema } from '../src/infrastructure/node-definitions/schemas';
import { InMemoryGraphRepository } from '../src/infrastructure/repositories/InMemoryGraphRepository';
import type { EditorNodeContent, NodeDefinition } from '../src/types';
import type { Logger } from '../src/infrastructure/logging/Logger';
import { EditorEventType } from '../src/editor/EditorEventBus';
import type { EditorEventBus } from '../src/editor/EditorEventBus';

export const float = new NamedDataType('float', ['int']);
export const int = new NamedDataType('int');
export const color = new NamedDataType('color');

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`Unexpected error result: ${String(result.error)}`);
  }
  return result.value;
}

export function defined<T>(value: T | undefined, what = 'value'): T {
  if (value === undefined) {
    throw new Error(`Expected ${what} to be defined`);
  }
  return value;
}

export interface Source {
  id: NodeId;
  out: PortId<'output'>;
}

export interface Sink {
  id: NodeId;
  input: PortId<'input'>;
}

export function addSource(
  graph: NodeGraph<string>,
  label = 'Source',
  dataType: DataType = float,
  options: PortOptions = {}
): Source {
  const id = graph.addNode(label, label.toLowerCase());
  const out = unwrap(graph.nodeMut(id, node => node.addOutputPort('out', dataType, options)));
  return { id, out };
}

export function addSink(
  graph: NodeGraph<string>,
  label = 'Sink',
  dataType: DataType = float,
  options: InputPortOptions = {}
): Sink {
  const id = graph.addNode(label, label.toLowerCase());
  const input = unwrap(graph.nodeMut(id, node => node.addInputPort('in', dataType, options)));
  return { id, input };
}

/**
 * 両端の利用可能なフック同士をつなぐ
 */
export function connect(graph: NodeGraph<string>, source: Source, sink: Sink): ConnectionPair {
  const outputHook = defined(graph.node(source.id)?.availableHook(source.out), 'output hook');
  const inputHook = defined(graph.node(sink.id)?.availableHook(sink.input), 'input hook');
  const pair: ConnectionPair = {
    output: new ConnectionId(source.id, source.out, outputHook),
    input: new ConnectionId(sink.id, sink.input, inputHook),
  };
  unwrap(graph.addConnection(pair.output, pair.input));
  return pair;
}

export function connectionStrings<TContent>(graph: NodeGraph<TContent>): string[] {
  return graph.connections().map(pairString);
}

export function newGraph(allowSelfConnections = false): NodeGraph<string> {
  return new NodeGraph<string>({ allowSelfConnections });
}

export const FIXTURE_DEFINITIONS = new URL('./fixtures/node-definitions.json', import.meta.url);

export interface EditorFixture {
  loader: NodeDefinitionLoader;
  repository: InMemoryGraphRepository;
  service: NodeEditorService;
}

/**
 * テスト用のノード定義を読み込んだアプリケーションサービスを作成
 */
export function createEditorFixture(config: unknown = {}): EditorFixture {
  const loader = new NodeDefinitionLoader();
  loader.loadLibraryFile(FIXTURE_DEFINITIONS);
  const editorConfig = loadEditorConfig(config);
  const graphOptions = { allowSelfConnections: editorConfig.allowSelfConnections };
  const repository = new InMemoryGraphRepository();
  const service = new NodeEditorService(
    new NodeGraph<EditorNodeContent>(graphOptions),
    new NodeFactory(loader.getCatalog()),
    repository,
    new GraphSerializer<EditorNodeContent>({
      catalog: loader.getCatalog(),
      contentSchema: EditorNodeContentSchema,
      graphOptions,
    }),
    editorConfig
  );
  return { loader, repository, service };
}

export function definition(loader: NodeDefinitionLoader, id: string): NodeDefinition {
  return defined(loader.getDefinition(id), `definition ${id}`);
}

export function inputOf(
  graph: NodeGraph<EditorNodeContent>,
  nodeId: NodeId,
  name: string
): PortAddress<'input'> {
  return { nodeId, portId: defined(graph.node(nodeId)?.findInput(name), `input ${name}`) };
}

export function outputOf(
  graph: NodeGraph<EditorNodeContent>,
  nodeId: NodeId,
  name: string
): PortAddress<'output'> {
  return { nodeId, portId: defined(graph.node(nodeId)?.findOutput(name), `output ${name}`) };
}

export function pairString({ output, input }: ConnectionPair): string {
  return `${output.toString()} -> ${input.toString()}`;
}

export function createTestLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

/**
 * エディターが発行したイベントを順に記録する
 */
export function recordEvents(bus: EditorEventBus): string[] {
  const events: string[] = [];
  for (const type of Object.values(EditorEventType)) {
    bus.subscribe(type, data => events.push(`${type} ${JSON.stringify(data)}`));
  }
  return events;
}
