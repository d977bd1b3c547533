/**
 * エディター層のエクスポート
 */

export * from './types';
export * from './EditorEventBus';
export * from './EditorStateManager';
export * from './CommandExecutor';
export * from './interactions/ConnectionInteractionHandler';
export * from './NodeEditor';
