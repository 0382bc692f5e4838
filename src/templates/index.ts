export * from './types';
export * from './parameters';
export * from './template-engine';
