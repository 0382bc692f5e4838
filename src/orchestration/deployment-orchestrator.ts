import { v4 as uuidv4 } from 'uuid';
import {
  CertificateHandle,
  DeploymentContext,
  DeploymentOutputs,
  DeploymentSummary,
  NetworkTopology,
  OrchestratorState,
  StackDeploymentResult,
  StackKind,
  ValidationFinding
} from '../types';
import { DeploymentError, PreconditionError, TemplateError, TopologyError } from '../errors';
import { Logger } from '../logging/logger';
import { ResourceNamingService, createNamingService } from '../config/naming';
import { certificateFragment } from '../certificates/parameter-artifact';
import { CloudFormationManager, CloudFormationManagerOptions } from '../provisioning/cloudformation-manager';
import { NetworkManager } from '../provisioning/network-manager';
import { NetworkTopologyProvider, ProvisioningService } from '../provisioning/types';
import { ParameterSet, readOptionalParameterFile } from '../templates/parameters';
import { TemplateEngine } from '../templates/template-engine';
import { TemplateSource } from '../templates/types';
import { EXPECTED_OUTPUTS, OrchestrationRequest, OrchestratorDependencies } from './types';

interface PreparedTemplate {
  source: TemplateSource;
  declaredParameters: string[];
}

type PreparedTemplates = Record<StackKind, PreparedTemplate>;

const NEXT_STATE: Record<OrchestratorState, OrchestratorState | undefined> = {
  Idle: 'TemplatesValidated',
  TemplatesValidated: 'DirectoryStackDeployed',
  DirectoryStackDeployed: 'NetworkDiscovered',
  NetworkDiscovered: 'RoutingStackDeployed',
  RoutingStackDeployed: 'Done',
  Done: undefined
};

/**
 * Deploys the directory stack, discovers the default network and deploys the
 * routing stack on top of both, strictly in that order. Every step is
 * idempotent per stack name, so a failed run is recovered by re-running.
 */
export class DeploymentOrchestrator {
  private provisioning: ProvisioningService;
  private network: NetworkTopologyProvider;
  private templates: TemplateEngine;
  private naming: ResourceNamingService;
  private logger: Logger;
  private onStateChange?: (state: OrchestratorState) => void;
  private state: OrchestratorState = 'Idle';
  private transitions: OrchestratorState[] = ['Idle'];

  constructor(dependencies: OrchestratorDependencies) {
    this.provisioning = dependencies.provisioning;
    this.network = dependencies.network;
    this.templates = dependencies.templates;
    this.naming = dependencies.naming;
    this.logger = dependencies.logger ?? new Logger('orchestrator');
    this.onStateChange = dependencies.onStateChange;
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  async deploy(request: OrchestrationRequest): Promise<DeploymentSummary> {
    const deploymentId = uuidv4();
    const startedAt = new Date();
    const { context } = request;

    this.state = 'Idle';
    this.transitions = ['Idle'];

    this.logger.info('Starting deployment', {
      deploymentId,
      stackPrefix: context.stackPrefix,
      region: context.region,
      certificateMode: context.certificateMode
    });

    const certificate = this.resolveCertificate(request);

    const templates = await this.validateTemplates();
    const directoryParameters = await this.buildDirectoryParameters(context);
    this.advance('TemplatesValidated');

    const directory = await this.deployStack(context, 'directory', templates.directory, directoryParameters);
    this.advance('DirectoryStackDeployed');

    const network = await this.discoverNetwork();
    this.advance('NetworkDiscovered');

    const routingParameters = this.buildRoutingParameters(context, network, certificate, request.parameterOverrides);
    const routing = await this.deployStack(context, 'routing', templates.routing, routingParameters);
    this.advance('RoutingStackDeployed');

    const { outputs, findings } = this.aggregateOutputs(directory, routing);
    this.advance('Done');

    return {
      deploymentId,
      context,
      directory,
      routing,
      network,
      outputs,
      findings,
      transitions: [...this.transitions],
      startedAt,
      durationMs: Date.now() - startedAt.getTime()
    };
  }

  private advance(next: OrchestratorState): void {
    if (NEXT_STATE[this.state] !== next) {
      throw new Error(`Invalid orchestrator transition: ${this.state} -> ${next}`);
    }
    this.state = next;
    this.transitions.push(next);
    this.logger.debug(`State: ${next}`);
    this.onStateChange?.(next);
  }

  private resolveCertificate(request: OrchestrationRequest): CertificateHandle | undefined {
    if (request.context.certificateMode === 'managed') {
      if (request.certificate) {
        this.logger.warn('Ignoring private certificate: certificate mode is managed');
      }
      return undefined;
    }

    if (!request.certificate) {
      throw new PreconditionError('Private certificate mode requires a registered certificate', {
        remediation: `Run: eb-auth certificate --generate-self-signed -e ${request.context.environment}`
      });
    }
    return request.certificate;
  }

  /**
   * Local structure check, then the provisioning service's dry run, for
   * every template before any stack is touched
   */
  private async validateTemplates(): Promise<PreparedTemplates> {
    this.logger.info('Validating CloudFormation templates...');

    const prepare = async (kind: StackKind): Promise<PreparedTemplate> => {
      const source = await this.templates.load(kind);
      const result = await this.provisioning.validateTemplate(source.body);
      if (!result.valid) {
        throw new TemplateError(`Template invalid: ${source.path}: ${result.errors.join('; ')}`, {
          remediation: 'Fix the template and re-run; no stack has been modified'
        });
      }
      return { source, declaredParameters: result.parameters };
    };

    const directory = await prepare('directory');
    const routing = await prepare('routing');

    this.logger.info('Template validation completed');
    return { directory, routing };
  }

  private async buildDirectoryParameters(context: DeploymentContext): Promise<ParameterSet> {
    const identity = contextIdentity(context);
    const parameterFile = this.naming.artifactPaths(context.environment).environmentParameters;
    const fromFile = await readOptionalParameterFile(parameterFile);
    if (fromFile) {
      this.logger.debug(`Using parameter file ${parameterFile}`);
    }
    // The resolved context names the stacks; a file cannot rename them
    return ParameterSet.fromRecord(identity).merge(fromFile, identity);
  }

  private buildRoutingParameters(
    context: DeploymentContext,
    network: NetworkTopology,
    certificate: CertificateHandle | undefined,
    overrides: Record<string, string> | undefined
  ): ParameterSet {
    const names = this.naming.generateResourceNames(context);
    const identity = contextIdentity(context);
    const defaults = ParameterSet.fromRecord({
      ...identity,
      ElasticBeanstalkEnvironmentName: names.applicationEnvironmentName
    });

    return defaults.merge(
      certificateFragment(certificate),
      {
        VpcId: network.networkId,
        SubnetIds: network.subnetIds.join(',')
      },
      overrides,
      identity
    );
  }

  private async deployStack(
    context: DeploymentContext,
    kind: StackKind,
    template: PreparedTemplate,
    parameters: ParameterSet
  ): Promise<StackDeploymentResult> {
    const stackName = this.naming.stackName(context, kind);
    this.logger.info(`Deploying ${kind} stack ${stackName}...`);

    const result = await this.provisioning.deploy({
      stackName,
      templateBody: template.source.body,
      parameters: this.declaredOnly(parameters, template.declaredParameters, stackName),
      capabilities: ['CAPABILITY_IAM'],
      tags: this.naming.createTags(context)
    });

    if (result.terminalStatus === 'Failed') {
      const reason = result.statusReason ? `: ${result.statusReason}` : '';
      throw new DeploymentError(`Failed to deploy stack ${stackName} (${result.stackStatus ?? 'unknown status'})${reason}`, {
        remediation: 'Inspect the stack events, then re-run; completed steps are left in place'
      });
    }

    this.logger.info(
      result.terminalStatus === 'NoChangesNeeded'
        ? `Stack ${stackName} is already up to date`
        : `Stack ${stackName} deployed successfully`
    );
    return result;
  }

  /**
   * Drops parameters the template does not declare; CloudFormation rejects
   * undeclared keys. An empty declaration list leaves the set untouched.
   */
  private declaredOnly(parameters: ParameterSet, declared: string[], stackName: string): ParameterSet {
    if (declared.length === 0) {
      return parameters;
    }
    const kept = new ParameterSet();
    for (const entry of parameters.toEntries()) {
      if (declared.includes(entry.ParameterKey)) {
        kept.set(entry.ParameterKey, entry.ParameterValue);
      } else {
        this.logger.warn(`Skipping parameter ${entry.ParameterKey}: not declared by the template of ${stackName}`);
      }
    }
    return kept;
  }

  private async discoverNetwork(): Promise<NetworkTopology> {
    this.logger.info('Getting VPC and subnet information...');

    const networkId = await this.network.describeDefaultNetwork();
    if (!networkId || networkId === 'None') {
      throw new TopologyError('No default VPC found', {
        remediation: 'Create a default VPC in the target region or deploy into a region that has one'
      });
    }

    const subnetIds = await this.network.listSubnets(networkId);
    if (subnetIds.length === 0) {
      throw new TopologyError(`No subnets found in VPC ${networkId}`);
    }

    const selected = subnetIds.slice(0, 2);
    if (selected.length < 2) {
      this.logger.warn(`Only one subnet found in VPC ${networkId}; the load balancer needs two availability zones`);
    }

    this.logger.info(`Using VPC: ${networkId}`);
    this.logger.info(`Using Subnets: ${selected.join(',')}`);
    return { networkId, subnetIds: selected };
  }

  private aggregateOutputs(
    directory: StackDeploymentResult,
    routing: StackDeploymentResult
  ): { outputs: DeploymentOutputs; findings: ValidationFinding[] } {
    const findings: ValidationFinding[] = [];

    const read = (result: StackDeploymentResult, key: string): string | undefined => {
      const value = result.outputs[key];
      findings.push(value
        ? { check: `output:${key}`, status: 'Pass', detail: `${result.stackName}: ${value}` }
        : { check: `output:${key}`, status: 'Fail', detail: `Output ${key} missing from stack ${result.stackName}` });
      return value;
    };

    const [userPoolId, userPoolDomain] = EXPECTED_OUTPUTS.directory.map(key => read(directory, key));
    const [loadBalancerDnsName] = EXPECTED_OUTPUTS.routing.map(key => read(routing, key));

    for (const finding of findings.filter(item => item.status === 'Fail')) {
      this.logger.warn(finding.detail);
    }

    return { outputs: { userPoolId, userPoolDomain, loadBalancerDnsName }, findings };
  }
}

function contextIdentity(context: DeploymentContext): Record<string, string> {
  return { ProjectName: context.projectName, Environment: context.environment };
}

export interface OrchestratorFactoryOptions extends Omit<CloudFormationManagerOptions, 'client'> {
  baseDir?: string;
  onStateChange?: (state: OrchestratorState) => void;
}

/**
 * Builds an orchestrator wired to the AWS services of the context's region
 */
export function createDeploymentOrchestrator(
  context: DeploymentContext,
  options: OrchestratorFactoryOptions = {}
): DeploymentOrchestrator {
  const { baseDir, onStateChange, ...cloudFormationOptions } = options;
  const logger = options.logger ?? new Logger('orchestrator');
  return new DeploymentOrchestrator({
    provisioning: new CloudFormationManager(context.region, { ...cloudFormationOptions, logger: logger.child('cloudformation') }),
    network: new NetworkManager(context.region),
    templates: new TemplateEngine(baseDir),
    naming: createNamingService(baseDir),
    logger,
    onStateChange
  });
}

/**
 * Convenience function: wire and run in one call
 */
export async function deploy(request: OrchestrationRequest): Promise<DeploymentSummary> {
  return createDeploymentOrchestrator(request.context).deploy(request);
}
