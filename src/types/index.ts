import type { InputPortKind } from '../domain/value-objects/PortType';

// Constant value held by an input port (used in JSON definitions)
export type PortValue = number | number[] | string | boolean;

// Data type entry from JSON
export interface DataTypeDefinition {
  name: string;
  compatibleWith: string[];
  color?: string;
}

// Port definition from JSON
export interface PortDefinition {
  name: string;
  type: string;
  default?: PortValue;
  maxConnections?: number | null;
  kind?: InputPortKind;
  description?: string;
}

// Node definition loaded from JSON
export interface NodeDefinition {
  id: string;
  name: string;
  category: string;
  description: string;
  inputs: PortDefinition[];
  outputs: PortDefinition[];
}

// A whole definitions file: data types plus the nodes built from them
export interface NodeDefinitionLibrary {
  dataTypes: DataTypeDefinition[];
  nodes: NodeDefinition[];
}

// Content stored on every node created by the editor
export interface EditorNodeContent {
  definitionId: string;
  values: Record<string, PortValue>;
}

// Read-only render model handed to the drawing layer
export interface RenderHook {
  id: string;
  connectedTo: string | null;
}

export interface RenderPort {
  id: string;
  name: string;
  direction: 'input' | 'output';
  dataType: string;
  side: 'left' | 'right';
  kind?: InputPortKind;
  availableHook: string | null;
  hooks: RenderHook[];
  value?: PortValue;
}

export interface RenderNode {
  id: string;
  label: string;
  definitionId: string;
  x: number;
  y: number;
  selected: boolean;
  inputs: RenderPort[];
  outputs: RenderPort[];
}

export interface RenderConnection {
  id: string;
  output: string;
  input: string;
  outputNodeId: string;
  inputNodeId: string;
  dataType: string;
}
