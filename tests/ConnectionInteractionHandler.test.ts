import { describe, it, expect, beforeEach } from 'vitest';
import { NodeEditor } from '../src/editor/NodeEditor';
import type { DragOutcome } from '../src/editor/types';
import { NodeDefinitionLoader } from '../src/infrastructure/node-definitions/loader/NodeDefinitionLoader';
import { HookId, PortId, PortKey } from '../src/domain/value-objects/Id';
import type { NodeId, PortAddress } from '../src/domain/value-objects/Id';
import {
  FIXTURE_DEFINITIONS,
  createTestLogger,
  defined,
  inputOf,
  outputOf,
  pairString,
  recordEvents,
} from './helpers';

describe('ConnectionInteractionHandler', () => {
  let loader: NodeDefinitionLoader;
  let logger: ReturnType<typeof createTestLogger>;
  let editor: NodeEditor;

  const add = (definitionId: string): NodeId =>
    defined(editor.addNode(definitionId) ?? undefined, definitionId);
  const input = (nodeId: NodeId, name: string): PortAddress<'input'> =>
    inputOf(editor.getGraph(), nodeId, name);
  const output = (nodeId: NodeId, name: string): PortAddress<'output'> =>
    outputOf(editor.getGraph(), nodeId, name);

  const drag = (from: PortAddress, to?: PortAddress): DragOutcome => {
    expect(editor.connections.startDrag(from.nodeId, from.portId)).toBe(true);
    return editor.connections.endDrag(to);
  };

  const connectedPair = (outcome: DragOutcome): string => {
    if (outcome.status !== 'connected') {
      throw new Error(`expected a connection, got ${outcome.reason}: ${outcome.message}`);
    }
    return pairString(outcome.connection);
  };

  beforeEach(() => {
    loader = new NodeDefinitionLoader();
    loader.loadLibraryFile(FIXTURE_DEFINITIONS);
    logger = createTestLogger();
    editor = new NodeEditor({ definitions: loader, logger });
  });

  it('should connect an output dropped on an input', () => {
    const constant = add('constant');
    const target = add('add');

    expect(editor.connections.startDrag(constant, output(constant, 'value').portId)).toBe(true);
    expect(editor.connections.isDragging()).toBe(true);
    expect(editor.connections.getOrigin()?.portId.toString()).toBe('output:0v1');

    const outcome = editor.connections.endDrag(input(target, 'a'));

    expect(connectedPair(outcome)).toBe('0v1/output:0v1/0v1 -> 1v1/input:0v1/0v1');
    expect(editor.connections.isDragging()).toBe(false);
  });

  it('should connect an input dropped on an output', () => {
    const constant = add('constant');
    const target = add('add');

    const outcome = drag(input(target, 'a'), output(constant, 'value'));

    expect(connectedPair(outcome)).toBe('0v1/output:0v1/0v1 -> 1v1/input:0v1/0v1');
  });

  it('should return to idle when released outside of a port', () => {
    const constant = add('constant');

    expect(drag(output(constant, 'value'))).toEqual({
      status: 'rejected',
      reason: 'no-target',
      message: 'Released outside of a port',
    });
    expect(editor.connections.isDragging()).toBe(false);
  });

  it('should report that no drag is in progress', () => {
    expect(editor.connections.endDrag()).toEqual({
      status: 'rejected',
      reason: 'not-dragging',
      message: 'No connection drag in progress',
    });
  });

  it('should reject a drop on the same node', () => {
    const target = add('add');

    expect(drag(output(target, 'result'), input(target, 'a'))).toEqual({
      status: 'rejected',
      reason: 'same-node',
      message: 'A node cannot connect to itself',
    });
    expect(logger.debug).toHaveBeenCalledWith(
      'Connection drag rejected (same-node): A node cannot connect to itself'
    );
  });

  it('should reject a drop on a port of the same direction', () => {
    const constant = add('constant');
    const target = add('add');

    expect(drag(output(constant, 'value'), output(target, 'result'))).toEqual({
      status: 'rejected',
      reason: 'same-direction',
      message: 'Both ports are outputs',
    });
  });

  it('should reject incompatible data types', () => {
    const label = add('label');
    const target = add('add');

    expect(drag(output(label, 'text'), input(target, 'a'))).toEqual({
      status: 'rejected',
      reason: 'incompatible-types',
      message: 'string cannot connect to float',
    });
    expect(editor.getGraph().connections()).toEqual([]);
  });

  it('should not start a drag from a constant-only input or an unknown port', () => {
    const constant = add('constant');

    expect(editor.connections.startDrag(constant, input(constant, 'value').portId)).toBe(false);
    expect(editor.connections.startDrag(constant, PortId.input(new PortKey(5, 1)))).toBe(false);
    expect(editor.connections.isDragging()).toBe(false);
    expect(logger.debug).toHaveBeenCalledWith('Cannot start drag: port input:5v1 not found');
  });

  it('should reject a drop on a constant-only input', () => {
    const target = add('add');
    const constant = add('constant');

    expect(drag(output(target, 'result'), input(constant, 'value'))).toEqual({
      status: 'rejected',
      reason: 'no-available-hook',
      message: 'Port "value" on Constant has no free hook',
    });
  });

  it('should reject a drag from a full output', () => {
    const sum = add('sum');
    const first = add('add');
    const second = add('add');
    drag(output(sum, 'total'), input(first, 'a'));

    expect(drag(output(sum, 'total'), input(second, 'a'))).toEqual({
      status: 'rejected',
      reason: 'no-available-hook',
      message: 'Port "total" on Sum has no free hook',
    });
  });

  it('should replace the connection of an occupied input', () => {
    const first = add('constant');
    const second = add('constant');
    const target = add('add');
    drag(output(first, 'value'), input(target, 'a'));

    const outcome = drag(output(second, 'value'), input(target, 'a'));

    expect(outcome.status === 'connected' && outcome.replaced.map(pairString)).toEqual([
      '0v1/output:0v1/0v1 -> 2v1/input:0v1/0v1',
    ]);
    expect(connectedPair(outcome)).toBe('1v1/output:0v1/0v1 -> 2v1/input:0v1/0v2');
  });

  it('should keep an occupied input when the policy rejects replacement', () => {
    editor = new NodeEditor({
      definitions: loader,
      config: { occupiedInputPolicy: 'reject' },
      logger,
    });
    const first = add('constant');
    const second = add('constant');
    const target = add('add');
    drag(output(first, 'value'), input(target, 'a'));

    expect(drag(output(second, 'value'), input(target, 'a'))).toEqual({
      status: 'rejected',
      reason: 'no-available-hook',
      message: 'Port "a" on Add has no free hook',
    });
    expect(editor.getGraph().connections().map(pairString)).toEqual([
      '0v1/output:0v1/0v1 -> 2v1/input:0v1/0v1',
    ]);
  });

  it('should pick up a connected hook and move its connection', () => {
    const constant = add('constant');
    const target = add('add');
    drag(output(constant, 'value'), input(target, 'a'));
    const events = recordEvents(editor.events);

    expect(editor.connections.startDrag(target, input(target, 'a').portId, new HookId(0, 1))).toBe(true);

    expect(editor.getGraph().connections()).toEqual([]);
    expect(editor.connections.getOrigin()?.nodeId.toString()).toBe('0v1');
    expect(editor.connections.getOrigin()?.portId.toString()).toBe('output:0v1');

    const outcome = editor.connections.endDrag(input(target, 'b'));

    expect(connectedPair(outcome)).toBe('0v1/output:0v1/1v1 -> 1v1/input:1v1/0v1');
    expect(events).toEqual([
      'connection_deleted {"output":"0v1/output:0v1/0v1","input":"1v1/input:0v1/0v1"}',
      'connection_created {"output":"0v1/output:0v1/1v1","input":"1v1/input:1v1/0v1"}',
    ]);
  });

  it('should leave a moved connection dropped when released outside of a port', () => {
    const constant = add('constant');
    const target = add('add');
    drag(output(constant, 'value'), input(target, 'a'));

    editor.connections.startDrag(target, input(target, 'a').portId, new HookId(0, 1));
    const outcome = editor.connections.endDrag();

    expect(outcome.status).toBe('rejected');
    expect(editor.getGraph().connections()).toEqual([]);
  });

  it('should start a plain drag from an empty hook', () => {
    const target = add('add');

    expect(editor.connections.startDrag(target, input(target, 'a').portId, new HookId(0, 1))).toBe(true);
    expect(editor.connections.getOrigin()?.portId.toString()).toBe('input:0v1');
  });

  it('should replace a drag that is already in progress', () => {
    const constant = add('constant');
    const target = add('add');

    editor.connections.startDrag(constant, output(constant, 'value').portId);
    editor.connections.startDrag(target, input(target, 'b').portId);

    expect(editor.connections.getOrigin()?.nodeId.toString()).toBe('1v1');
    editor.connections.cancelDrag();
    expect(editor.connections.isDragging()).toBe(false);
    expect(editor.connections.getOrigin()).toBeUndefined();
  });
});
