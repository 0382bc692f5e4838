// Error taxonomy shared by every command

export type ErrorCode =
  | 'USAGE_ERROR'
  | 'PRECONDITION_ERROR'
  | 'VALIDATION_ERROR'
  | 'TEMPLATE_ERROR'
  | 'TOPOLOGY_ERROR'
  | 'REGISTRATION_ERROR'
  | 'DEPLOYMENT_ERROR'
  | 'GENERATION_ERROR';

export interface ProvisionerErrorOptions {
  remediation?: string;
  cause?: unknown;
}

/**
 * Base class for every fatal condition. Each subclass maps to a stable
 * process exit code so that CI jobs can tell the categories apart.
 */
export abstract class ProvisionerError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly exitCode: number;
  /** True when re-running the same invocation unchanged may succeed. */
  readonly retryable: boolean = false;
  readonly remediation?: string;

  constructor(message: string, options: ProvisionerErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.remediation = options.remediation;
  }
}

export class UsageError extends ProvisionerError {
  readonly code = 'USAGE_ERROR';
  readonly exitCode = 2;
}

export class PreconditionError extends ProvisionerError {
  readonly code = 'PRECONDITION_ERROR';
  readonly exitCode = 3;
}

export class ValidationError extends ProvisionerError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 4;
}

export class TemplateError extends ProvisionerError {
  readonly code = 'TEMPLATE_ERROR';
  readonly exitCode = 5;
}

export class TopologyError extends ProvisionerError {
  readonly code = 'TOPOLOGY_ERROR';
  readonly exitCode = 6;
}

export class RegistrationError extends ProvisionerError {
  readonly code = 'REGISTRATION_ERROR';
  readonly exitCode = 7;
}

export class DeploymentError extends ProvisionerError {
  readonly code = 'DEPLOYMENT_ERROR';
  readonly exitCode = 8;
  readonly retryable = true;
}

export class GenerationError extends ProvisionerError {
  readonly code = 'GENERATION_ERROR';
  readonly exitCode = 9;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
