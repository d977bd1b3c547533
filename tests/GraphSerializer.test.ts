import { describe, it, expect, beforeEach } from 'vitest';
import { GraphSerializer } from '../src/domain/services/GraphSerializer';
import type { SerializedGraph } from '../src/domain/services/GraphSerializer';
import { NodeFactory } from '../src/domain/services/NodeFactory';
import { NodeGraph } from '../src/domain/entities/NodeGraph';
import { ConnectionId } from '../src/domain/value-objects/Id';
import type { NodeId } from '../src/domain/value-objects/Id';
import { GraphSerializationError } from '../src/domain/errors/GraphErrors';
import { NodeDefinitionLoader } from '../src/infrastructure/node-definitions/loader/NodeDefinitionLoader';
import { EditorNodeContentSchema } from '../src/infrastructure/node-definitions/schemas';
import type { EditorNodeContent } from '../src/types';
import { FIXTURE_DEFINITIONS, defined, unwrap } from './helpers';

describe('GraphSerializer', () => {
  let loader: NodeDefinitionLoader;
  let serializer: GraphSerializer<EditorNodeContent>;
  let graph: NodeGraph<EditorNodeContent>;
  let constant: NodeId;
  let add: NodeId;

  const create = (definitionId: string): NodeId =>
    new NodeFactory(loader.getCatalog()).create(graph, defined(loader.getDefinition(definitionId)));

  const connectionStrings = (target: NodeGraph<EditorNodeContent>): string[] =>
    target.connections().map(({ output, input }) => `${output.toString()} -> ${input.toString()}`);

  const link = (from: NodeId, output: string, to: NodeId, input: string): void => {
    const source = defined(graph.node(from));
    const target = defined(graph.node(to));
    const out = defined(source.findOutput(output));
    const into = defined(target.findInput(input));
    unwrap(
      graph.addConnection(
        new ConnectionId(from, out, defined(source.availableHook(out))),
        new ConnectionId(to, into, defined(target.availableHook(into)))
      )
    );
  };

  beforeEach(() => {
    loader = new NodeDefinitionLoader();
    loader.loadLibraryFile(FIXTURE_DEFINITIONS);
    serializer = new GraphSerializer({
      catalog: loader.getCatalog(),
      contentSchema: EditorNodeContentSchema,
    });
    graph = new NodeGraph<EditorNodeContent>();
    constant = create('constant');
    add = create('add');

    const constantNode = defined(graph.node(constant));
    const addNode = defined(graph.node(add));
    const out = defined(constantNode.findOutput('value'));
    const a = defined(addNode.findInput('a'));
    unwrap(
      graph.addConnection(
        new ConnectionId(constant, out, defined(constantNode.availableHook(out))),
        new ConnectionId(add, a, defined(addNode.availableHook(a)))
      )
    );
  });

  it('should write node, port and hook tables', () => {
    const document = serializer.serialize(graph);

    expect(document.version).toBe(2);
    expect(document.nodeSlots).toEqual([1, 1]);
    expect(document.nodes[0]).toEqual({
      id: '0v1',
      label: 'Constant',
      content: { definitionId: 'constant', values: { value: 1 } },
      inputs: [
        {
          key: '0v1',
          name: 'value',
          dataType: 'float',
          kind: 'constantOnly',
          maxConnections: 1,
          side: 'left',
          hooks: [],
          availableHook: '0v1',
          hookSlots: [1],
        },
      ],
      outputs: [
        {
          key: '0v1',
          name: 'value',
          dataType: 'float',
          maxConnections: null,
          side: 'right',
          hooks: [
            { id: '0v1', remote: { node: '1v1', direction: 'input', port: '0v1', hook: '0v1' } },
          ],
          availableHook: '1v1',
          hookSlots: [1, 1],
        },
      ],
      inputSlots: [1],
      outputSlots: [1],
    });
    expect(document.nodes[1]?.inputs.map(port => port.hooks)).toEqual([
      [{ id: '0v1', remote: { node: '0v1', direction: 'output', port: '0v1', hook: '0v1' } }],
      [],
    ]);
  });

  it('should restore the same ids and connections', () => {
    const restored = serializer.deserialize(serializer.serialize(graph));

    expect(restored.nodeIds().map(id => id.toString())).toEqual(['0v1', '1v1']);
    expect(connectionStrings(restored)).toEqual(['0v1/output:0v1/0v1 -> 1v1/input:0v1/0v1']);
    expect(restored.node(add)?.content).toEqual({ definitionId: 'add', values: { a: 0, b: 0 } });
    expect(restored.node(constant)?.portInfo(defined(restored.node(constant)?.findInput('value')))?.kind).toBe(
      'constantOnly'
    );
  });

  it('should round-trip through JSON text', () => {
    const restored = serializer.fromJSON(serializer.toJSON(graph));

    expect(connectionStrings(restored)).toEqual(connectionStrings(graph));
    expect(serializer.serialize(restored)).toEqual(serializer.serialize(graph));
  });

  it('should reject an unsupported version', () => {
    expect(() => serializer.deserialize({ version: 1, nodes: [], nodeSlots: [] })).toThrow(
      'Invalid graph document: version: Invalid literal value, expected 2'
    );
  });

  it('should reject malformed keys', () => {
    const document = serializer.serialize(graph);
    const broken: SerializedGraph = { ...document, nodes: [{ ...defined(document.nodes[0]), id: '0v0' }] };

    expect(() => serializer.deserialize(broken)).toThrow(
      'Invalid graph document: nodes.0.id: Expected a key like "0v1"'
    );
  });

  it('should reject an unknown data type', () => {
    const document = structuredClone(serializer.serialize(graph));
    defined(document.nodes[0]?.outputs[0]).dataType = 'matrix';

    expect(() => serializer.deserialize(document)).toThrow('Unknown data type "matrix" on port "value"');
  });

  it('should reject node content that does not match the schema', () => {
    const document = structuredClone(serializer.serialize(graph));
    defined(document.nodes[0]).content = {};

    expect(() => serializer.deserialize(document)).toThrow('Invalid content on node 0v1: Required');
  });

  it('should reject a hook that points at a port of the same direction', () => {
    const document = structuredClone(serializer.serialize(graph));
    const hook = defined(document.nodes[0]?.outputs[0]?.hooks[0]);
    hook.remote.direction = 'output';

    expect(() => serializer.deserialize(document)).toThrow(
      'Hook 0v1 on output port "value" points at another output'
    );
  });

  it('should wrap a port that holds more connections than it allows', () => {
    const document = structuredClone(serializer.serialize(graph));
    const input = defined(document.nodes[1]?.inputs[0]);
    const hook = defined(input.hooks[0]);
    input.hooks = [hook, { ...hook, id: '1v1' }];

    expect(() => serializer.deserialize(document)).toThrow(GraphSerializationError);
    expect(() => serializer.deserialize(document)).toThrow(
      'Invalid graph document: Port holds 2 connections but allows 1'
    );
  });

  it('should reject a connection into a constant-only input', () => {
    const document = structuredClone(serializer.serialize(graph));
    defined(document.nodes[1]?.inputs[0]).kind = 'constantOnly';

    expect(() => serializer.deserialize(document)).toThrow(GraphSerializationError);
    expect(() => serializer.deserialize(document)).toThrow(
      'Connection 0v1/output:0v1/0v1 -> 1v1/input:0v1/0v1 cannot be restored: input node 1v1: port input:0v1 only accepts a constant value'
    );
  });

  it('should reject a node index outside the slot table', () => {
    const document = structuredClone(serializer.serialize(graph));
    const node = defined(document.nodes[0]);
    defined(node.outputs[0]).hooks = [];
    document.nodes = [{ ...node, id: '30000000v1' }];

    expect(() => serializer.deserialize(document)).toThrow(
      'Invalid graph document: Arena index 30000000 is outside the slot table of 2'
    );
  });

  it('should round-trip fan-out and fan-in after a node is removed', () => {
    const sum = create('sum');
    const second = create('constant');
    const third = create('constant');
    link(constant, 'value', add, 'b');
    link(constant, 'value', sum, 'values');
    link(second, 'value', sum, 'values');
    link(third, 'value', sum, 'values');
    link(add, 'result', sum, 'values');
    defined(graph.removeNode(second));

    const restored = serializer.fromJSON(serializer.toJSON(graph));

    expect(connectionStrings(restored)).toHaveLength(5);
    expect([...connectionStrings(restored)].sort()).toEqual([...connectionStrings(graph)].sort());
    expect(restored.asymmetricConnections()).toEqual([]);
    const values = defined(restored.node(sum)?.findInput('values'));
    expect(restored.node(sum)?.hooks(values).filter(([, remote]) => remote !== undefined)).toHaveLength(3);
    expect(restored.node(sum)?.availableHook(values)?.toString()).toBe(
      graph.node(sum)?.availableHook(values)?.toString()
    );
    expect(create('add').toString()).toBe('3v2');
    graph = restored;
    expect(create('add').toString()).toBe('3v2');
  });

  it('should reject text that is not JSON', () => {
    expect(() => serializer.fromJSON('{')).toThrow(/^Graph document is not valid JSON: /);
  });
});
