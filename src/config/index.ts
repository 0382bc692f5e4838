export * from './types';
export * from './validator';
export * from './naming';
export * from './loader';
