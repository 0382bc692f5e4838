import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { errorMessage } from '../errors';
import { Logger } from '../logging/logger';
import { ResourceNamingService } from '../config/naming';
import { classifyStackStatus } from '../provisioning/stack-status';
import { IdentityProvider, ProvisioningService, ResourceProbe, StackDescription } from '../provisioning/types';
import { parseParameterFile } from '../templates/parameters';
import { TemplateEngine } from '../templates/template-engine';
import { DeploymentContext, StackKind, ValidationFinding } from '../types';

export const ENVIRONMENT_CONFIG_FILES = [
  join('.ebextensions', '01-cognito-config.config'),
  join('.ebextensions', '02-alb-listener-rules.config')
];

export interface EnvironmentValidatorDependencies {
  identity: IdentityProvider;
  provisioning: ProvisioningService;
  probe: ResourceProbe;
  templates: TemplateEngine;
  naming: ResourceNamingService;
  baseDir?: string;
  logger?: Logger;
}

export interface StackObservation {
  kind: StackKind;
  stackName: string;
  /** Live status, or NOT_FOUND */
  status: string;
}

export interface ValidationRun {
  context: DeploymentContext;
  findings: ValidationFinding[];
  stacks: StackObservation[];
  passed: boolean;
  checkedAt: Date;
}

const PRIMARY_OUTPUTS: Record<StackKind, string> = {
  directory: 'UserPoolId',
  routing: 'LoadBalancerArn'
};

/**
 * Read-only checks of the local artifacts and the live environment.
 * Every check runs; a failing one never prevents the rest from reporting.
 */
export class EnvironmentValidator {
  private deps: EnvironmentValidatorDependencies;
  private baseDir: string;
  private logger: Logger;

  constructor(dependencies: EnvironmentValidatorDependencies) {
    this.deps = dependencies;
    this.baseDir = dependencies.baseDir ?? process.cwd();
    this.logger = dependencies.logger ?? new Logger('validate');
  }

  async validate(context: DeploymentContext): Promise<ValidationRun> {
    const findings: ValidationFinding[] = [];
    const record = (finding: ValidationFinding): void => {
      findings.push(finding);
      const line = `${finding.check}: ${finding.detail}`;
      if (finding.status === 'Pass') this.logger.info(`✓ ${line}`);
      else if (finding.status === 'Warn') this.logger.warn(line);
      else this.logger.error(`✗ ${line}`);
    };

    record(await this.checkCredentials());

    for (const finding of await this.checkTemplates()) {
      record(finding);
    }
    for (const finding of await this.checkParameterFiles(context)) {
      record(finding);
    }
    for (const finding of this.checkConfigurationFiles()) {
      record(finding);
    }

    const stacks: StackObservation[] = [];
    for (const kind of ['directory', 'routing'] as const) {
      const stackName = this.deps.naming.stackName(context, kind);
      const { finding, description } = await this.checkStack(stackName);
      record(finding);
      stacks.push({ kind, stackName, status: description?.status ?? (finding.status === 'Warn' ? 'NOT_FOUND' : 'UNKNOWN') });
      record(await this.checkPrimaryResource(kind, stackName, description));
    }

    return {
      context,
      findings,
      stacks,
      passed: findings.every(finding => finding.status !== 'Fail'),
      checkedAt: new Date()
    };
  }

  private async checkCredentials(): Promise<ValidationFinding> {
    try {
      const identity = await this.deps.identity.getCallerIdentity();
      return { check: 'credentials', status: 'Pass', detail: `AWS credentials configured (Account: ${identity.account})` };
    } catch (error) {
      return { check: 'credentials', status: 'Fail', detail: `AWS credentials not configured or invalid: ${errorMessage(error)}` };
    }
  }

  private async checkTemplates(): Promise<ValidationFinding[]> {
    const findings: ValidationFinding[] = [];

    for (const { kind, path } of this.deps.templates.listTemplates()) {
      const check = `template:${kind}`;
      try {
        const source = await this.deps.templates.load(kind);
        const result = await this.deps.provisioning.validateTemplate(source.body);
        findings.push(result.valid
          ? { check, status: 'Pass', detail: `Template valid: ${path}` }
          : { check, status: 'Fail', detail: `Template invalid: ${path}: ${result.errors.join('; ')}` });
      } catch (error) {
        findings.push({ check, status: 'Fail', detail: errorMessage(error) });
      }
    }

    return findings;
  }

  private async checkParameterFiles(context: DeploymentContext): Promise<ValidationFinding[]> {
    const paths = this.deps.naming.artifactPaths(context.environment);
    const findings: ValidationFinding[] = [];

    const inspect = async (check: string, path: string, optional: boolean): Promise<void> => {
      if (!existsSync(path)) {
        if (!optional) {
          findings.push({ check, status: 'Warn', detail: `Parameter file not found: ${path}` });
        }
        return;
      }
      try {
        const parameters = parseParameterFile(await readFile(path, 'utf-8'), path);
        findings.push({ check, status: 'Pass', detail: `Parameter file valid: ${path} (${parameters.size} parameters)` });
      } catch (error) {
        findings.push({ check, status: 'Fail', detail: errorMessage(error) });
      }
    };

    await inspect('parameters:environment', paths.environmentParameters, false);
    await inspect('parameters:certificate', paths.certificateParameters, true);
    return findings;
  }

  private checkConfigurationFiles(): ValidationFinding[] {
    return ENVIRONMENT_CONFIG_FILES.map((file): ValidationFinding => {
      const path = join(this.baseDir, file);
      return existsSync(path)
        ? { check: `config:${file}`, status: 'Pass', detail: `Configuration file found: ${file}` }
        : { check: `config:${file}`, status: 'Warn', detail: `Configuration file not found: ${file}` };
    });
  }

  private async checkStack(stackName: string): Promise<{ finding: ValidationFinding; description: StackDescription | null }> {
    const check = `stack:${stackName}`;
    let description: StackDescription | null;
    try {
      description = await this.deps.provisioning.describe(stackName);
    } catch (error) {
      return {
        finding: { check, status: 'Fail', detail: `Cannot describe stack ${stackName}: ${errorMessage(error)}` },
        description: null
      };
    }

    if (!description) {
      return {
        finding: { check, status: 'Warn', detail: `Stack not found: ${stackName} (not deployed yet)` },
        description: null
      };
    }

    const healthy = classifyStackStatus(description.status) === 'healthy';
    return {
      finding: healthy
        ? { check, status: 'Pass', detail: `Stack healthy: ${stackName} (${description.status})` }
        : { check, status: 'Fail', detail: `Stack in bad state: ${stackName} (${description.status})` },
      description
    };
  }

  private async checkPrimaryResource(
    kind: StackKind,
    stackName: string,
    description: StackDescription | null
  ): Promise<ValidationFinding> {
    const check = kind === 'directory' ? 'resource:user-pool' : 'resource:load-balancer';

    if (!description) {
      return { check, status: 'Warn', detail: `Skipped: stack ${stackName} is not deployed` };
    }

    const outputKey = PRIMARY_OUTPUTS[kind];
    const identifier = description.outputs[outputKey];
    if (!identifier) {
      return { check, status: 'Fail', detail: `Cannot retrieve ${outputKey} from stack outputs of ${stackName}` };
    }

    try {
      if (kind === 'directory') {
        const pool = await this.deps.probe.describeUserPool(identifier);
        return { check, status: 'Pass', detail: `Cognito User Pool accessible: ${pool.id}` };
      }
      const loadBalancer = await this.deps.probe.describeLoadBalancer(identifier);
      return {
        check,
        status: 'Pass',
        detail: `ALB accessible: ${loadBalancer.arn} (DNS: ${loadBalancer.dnsName ?? 'unknown'})`
      };
    } catch (error) {
      return { check, status: 'Fail', detail: `Cannot access ${identifier}: ${errorMessage(error)}` };
    }
  }
}
