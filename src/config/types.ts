// Configuration-specific types
import { CertificateMode } from '../types';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

/** Flags accepted by the resolver. Anything else is a usage error. */
export interface ResolverFlags {
  project?: string;
  environment?: string;
  region?: string;
  usePrivateCertificate?: boolean;
}

/** Per-environment defaults read from the environment file. */
export interface EnvironmentDefaults {
  projectName?: string;
  region?: string;
  certificateMode?: CertificateMode;
  /** Extra routing-stack parameters applied after every other fragment. */
  parameterOverrides?: Record<string, string>;
}

export interface EnvironmentFile {
  defaults?: EnvironmentDefaults;
  environments?: Record<string, EnvironmentDefaults>;
}

export interface ConfigLoader {
  load(path: string): Promise<EnvironmentFile>;
  validate(config: unknown): ConfigValidationResult;
}
