// Configuration loading and resolution
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { UsageError, errorMessage } from '../errors';
import { CertificateMode, DeploymentContext } from '../types';
import { ConfigLoader, ConfigValidationResult, EnvironmentDefaults, EnvironmentFile, ResolverFlags } from './types';
import { assertResolverFlags, validateAndNormalizeEnvironmentFile, validateEnvironmentFile } from './validator';
import { createNamingService } from './naming';

export const BUILT_IN_DEFAULTS = {
  projectName: 'eb-auth-demo',
  environment: 'dev',
  region: 'us-east-1',
  certificateMode: 'managed'
} as const satisfies {
  projectName: string;
  environment: string;
  region: string;
  certificateMode: CertificateMode;
};

/**
 * Loads the optional environment file (YAML or JSON) with environment
 * variable substitution
 */
export class EnvironmentConfigLoader implements ConfigLoader {

  /**
   * Load and parse an environment file
   * @param path - Path to the file (.yml, .yaml or .json)
   */
  async load(path: string): Promise<EnvironmentFile> {
    if (!existsSync(path)) {
      throw new UsageError(`Configuration file not found: ${path}`);
    }

    let rawConfig: unknown;
    try {
      const content = await readFile(path, 'utf-8');
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }
    } catch (error) {
      throw new UsageError(`Failed to load configuration from ${path}: ${errorMessage(error)}`, { cause: error });
    }

    return validateAndNormalizeEnvironmentFile(this.resolveEnvironmentVariables(rawConfig));
  }

  /**
   * Like load, but a missing file yields an empty configuration
   */
  async loadOptional(path: string): Promise<EnvironmentFile> {
    if (!existsSync(path)) {
      return {};
    }
    return this.load(path);
  }

  validate(config: unknown): ConfigValidationResult {
    return validateEnvironmentFile(config);
  }

  /**
   * Recursively resolve environment variables in a parsed document.
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (value && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset and no default: keep the placeholder
      return match;
    });
  }
}

export function createConfigLoader(): EnvironmentConfigLoader {
  return new EnvironmentConfigLoader();
}

/**
 * Shared defaults overlaid by the block for one environment
 */
export function environmentDefaultsFor(file: EnvironmentFile, environment: string): EnvironmentDefaults {
  const shared = file.defaults ?? {};
  const specific = file.environments?.[environment] ?? {};
  return {
    ...shared,
    ...specific,
    parameterOverrides: { ...shared.parameterOverrides, ...specific.parameterOverrides }
  };
}

/**
 * Resolve flags and environment defaults into a deployment context.
 * Precedence: built-in defaults < file defaults < environment block < flags.
 *
 * @throws UsageError when a flag is unknown or malformed
 */
export function resolve(flags: unknown, environmentDefaults: EnvironmentFile = {}): DeploymentContext {
  const parsed: ResolverFlags = assertResolverFlags(flags ?? {});
  const environment = parsed.environment ?? BUILT_IN_DEFAULTS.environment;
  const defaults = environmentDefaultsFor(environmentDefaults, environment);

  const projectName = parsed.project ?? defaults.projectName ?? BUILT_IN_DEFAULTS.projectName;
  const region = parsed.region ?? defaults.region ?? BUILT_IN_DEFAULTS.region;

  let certificateMode: CertificateMode = defaults.certificateMode ?? BUILT_IN_DEFAULTS.certificateMode;
  if (parsed.usePrivateCertificate !== undefined) {
    certificateMode = parsed.usePrivateCertificate ? 'private' : 'managed';
  }

  return Object.freeze({
    projectName,
    environment,
    region,
    stackPrefix: createNamingService().stackPrefix(projectName, environment),
    certificateMode
  });
}
