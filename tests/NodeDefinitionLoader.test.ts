import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { NodeDefinitionLoader } from '../src/infrastructure/node-definitions/loader/NodeDefinitionLoader';
import { FIXTURE_DEFINITIONS } from './helpers';

describe('NodeDefinitionLoader', () => {
  let loader: NodeDefinitionLoader;

  beforeEach(() => {
    loader = new NodeDefinitionLoader();
    loader.loadLibraryFile(FIXTURE_DEFINITIONS);
  });

  it('should load definitions and data types from a file', () => {
    expect(loader.getAllDefinitions().map(def => def.id)).toEqual([
      'constant',
      'add',
      'sum',
      'mix',
      'output',
      'label',
    ]);
    expect(loader.getCatalog().names()).toEqual(['float', 'int', 'vec3', 'color', 'string']);
    expect(loader.getCatalog().require('color').isCompatibleWith(loader.getCatalog().require('vec3'))).toBe(true);
  });

  it('should fill in omitted fields', () => {
    const output = loader.getDefinition('output');

    expect(output?.description).toBe('');
    expect(output?.outputs).toEqual([]);
  });

  it('should group definitions by category', () => {
    expect(loader.getCategories()).toEqual(['Input', 'Math', 'Color', 'Output', 'Text']);
    expect(loader.getDefinitionsByCategory('Math').map(def => def.id)).toEqual(['add', 'sum']);
    expect(loader.getDefinitionsByCategory('Missing')).toEqual([]);
  });

  it('should search names, descriptions and categories', () => {
    expect(loader.searchDefinitions('blend').map(def => def.id)).toEqual(['mix']);
    expect(loader.searchDefinitions('MATH').map(def => def.id)).toEqual(['add', 'sum']);
  });

  it('should reject a data type that is already registered', () => {
    expect(() => loader.loadLibrary({ dataTypes: [{ name: 'float' }] })).toThrow(
      'Data type "float" is already registered'
    );
  });

  it('should reject a node definition that is already loaded', () => {
    expect(() =>
      loader.loadLibrary({ nodes: [{ id: 'add', name: 'Add', category: 'Math' }] })
    ).toThrow('Node definition "add" is already loaded');
  });

  it('should reject a node that uses an unknown data type without loading anything', () => {
    const library = {
      dataTypes: [{ name: 'matrix' }],
      nodes: [
        {
          id: 'transform',
          name: 'Transform',
          category: 'Math',
          inputs: [{ name: 'in', type: 'quaternion' }],
        },
      ],
    };

    expect(() => loader.loadLibrary(library)).toThrow(
      'Node "transform" uses unknown data type "quaternion"'
    );
    expect(loader.getCatalog().has('matrix')).toBe(false);
    expect(loader.getDefinition('transform')).toBeUndefined();
  });

  it('should accept nodes that use data types from the same library', () => {
    loader.loadLibrary({
      dataTypes: [{ name: 'matrix' }],
      nodes: [{ id: 'identity', name: 'Identity', category: 'Math', outputs: [{ name: 'm', type: 'matrix' }] }],
    });

    expect(loader.getDefinition('identity')?.outputs[0]?.type).toBe('matrix');
  });

  it('should throw a validation error for a malformed library', () => {
    expect(() => loader.loadLibrary({ nodes: [{ id: 'broken' }] })).toThrow(ZodError);
  });
});
