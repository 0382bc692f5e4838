export * from './types';
export * from './stack-status';
export * from './cloudformation-manager';
export * from './acm-manager';
export * from './network-manager';
export * from './identity-manager';
export * from './resource-probe';
