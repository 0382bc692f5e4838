import { join } from 'path';
import { DeploymentContext, StackKind } from '../types';

/**
 * Generated names for the resources of one environment
 */
export interface ResourceNames {
  /** Cognito user pool stack */
  directoryStackName: string;
  /** Load balancer stack */
  routingStackName: string;
  /** Elastic Beanstalk environment fronted by the load balancer */
  applicationEnvironmentName: string;
}

export interface ArtifactPaths {
  /** Directory-stack parameter file for the environment */
  environmentParameters: string;
  /** Hand-off file written by the certificate command */
  certificateParameters: string;
}

const STACK_SUFFIXES: Record<StackKind, string> = {
  directory: 'cognito',
  routing: 'alb'
};

const PARAMETERS_DIR = join('cloudformation', 'parameters');

/**
 * Resource naming utility class
 */
export class ResourceNamingService {
  private readonly maxStackNameLength = 128;

  constructor(private readonly baseDir: string = process.cwd()) {}

  stackPrefix(projectName: string, environment: string): string {
    return this.sanitizeName(`${projectName}-${environment}`);
  }

  stackName(context: DeploymentContext, kind: StackKind): string {
    return this.validateAndTruncate(`${context.stackPrefix}-${STACK_SUFFIXES[kind]}`, this.maxStackNameLength);
  }

  generateResourceNames(context: DeploymentContext): ResourceNames {
    return {
      directoryStackName: this.stackName(context, 'directory'),
      routingStackName: this.stackName(context, 'routing'),
      applicationEnvironmentName: `${context.stackPrefix}-env`
    };
  }

  artifactPaths(environment: string): ArtifactPaths {
    return {
      environmentParameters: join(this.baseDir, PARAMETERS_DIR, `${environment}-parameters.json`),
      certificateParameters: join(this.baseDir, PARAMETERS_DIR, `${environment}-private-cert-parameters.json`)
    };
  }

  /**
   * Tags applied to every stack and imported certificate
   */
  createTags(context: DeploymentContext): Array<{ Key: string; Value: string }> {
    return [
      { Key: 'Project', Value: context.projectName },
      { Key: 'Environment', Value: context.environment },
      { Key: 'ManagedBy', Value: 'eb-auth-provisioner' }
    ];
  }

  /**
   * Sanitize name to be CloudFormation-compliant
   * - Replace invalid characters with hyphens
   * - Collapse consecutive hyphens
   * - Ensure it starts with a letter
   */
  private sanitizeName(name: string): string {
    let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');
    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (sanitized && !/^[a-zA-Z]/.test(sanitized)) {
      sanitized = 'app-' + sanitized;
    }

    return sanitized || 'app';
  }

  /**
   * Truncate name to fit the CloudFormation limit, keeping a hash suffix
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1;
    return name.substring(0, truncatedLength) + '-' + hash;
  }

  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      const char = input.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash).toString(36).substring(0, 6);
  }
}

/**
 * Convenience function to create a new resource naming service
 */
export function createNamingService(baseDir?: string): ResourceNamingService {
  return new ResourceNamingService(baseDir);
}
