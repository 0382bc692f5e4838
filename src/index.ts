// Main entry point for the Elastic Beanstalk authentication provisioner
export * from './types';
export * from './errors';
export * from './logging/logger';
export * from './config';
export * from './templates';
export * from './provisioning';
export * from './certificates';
export * from './orchestration';
export * from './validation';

// Main deployment function
export { deploy } from './orchestration/deployment-orchestrator';
