export * from './types';
export * from './domain';
export * from './application';
export * from './infrastructure';
export * from './editor';
