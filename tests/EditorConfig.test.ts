import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { DEFAULT_EDITOR_CONFIG, loadEditorConfig } from '../src/infrastructure/config/EditorConfig';

describe('EditorConfig', () => {
  it('should use defaults for omitted settings', () => {
    expect(loadEditorConfig()).toEqual({
      occupiedInputPolicy: 'replace',
      allowSelfConnections: false,
      logLevel: 'warn',
    });
    expect(loadEditorConfig(null)).toEqual(DEFAULT_EDITOR_CONFIG);
  });

  it('should keep the settings that are given', () => {
    expect(loadEditorConfig({ occupiedInputPolicy: 'reject', logLevel: 'debug' })).toEqual({
      occupiedInputPolicy: 'reject',
      allowSelfConnections: false,
      logLevel: 'debug',
    });
  });

  it('should reject an unknown policy', () => {
    expect(() => loadEditorConfig({ occupiedInputPolicy: 'overwrite' })).toThrow(ZodError);
  });
});
