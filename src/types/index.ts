// Core type definitions shared by the resolver, certificate manager,
// orchestrator and validator

export type CertificateMode = 'managed' | 'private';

export interface DeploymentContext {
  readonly projectName: string;
  readonly environment: string;
  readonly region: string;
  readonly stackPrefix: string;
  readonly certificateMode: CertificateMode;
}

export interface CertificateBundle {
  certificatePem: string;
  privateKeyPem: string;
  /** Empty string when the certificate has no chain. */
  chainPem: string;
}

export interface CertificateHandle {
  arn: string;
  isPrivate: true;
}

export interface CertificateMetadata {
  arn: string;
  domainName?: string;
  status?: string;
  type?: string;
  notAfter?: Date;
  subjectAlternativeNames: string[];
}

export interface NetworkTopology {
  networkId: string;
  subnetIds: string[];
}

export type StackKind = 'directory' | 'routing';

export type TerminalStatus = 'CreatedOrUpdated' | 'NoChangesNeeded' | 'Failed';

export interface StackDeploymentResult {
  stackName: string;
  terminalStatus: TerminalStatus;
  /** Raw CloudFormation status the stack settled in. */
  stackStatus?: string;
  statusReason?: string;
  outputs: Record<string, string>;
}

export type FindingStatus = 'Pass' | 'Warn' | 'Fail';

export interface ValidationFinding {
  check: string;
  status: FindingStatus;
  detail: string;
}

export interface DeploymentOutputs {
  userPoolId?: string;
  userPoolDomain?: string;
  loadBalancerDnsName?: string;
}

export type OrchestratorState =
  | 'Idle'
  | 'TemplatesValidated'
  | 'DirectoryStackDeployed'
  | 'NetworkDiscovered'
  | 'RoutingStackDeployed'
  | 'Done';

export interface DeploymentSummary {
  deploymentId: string;
  context: DeploymentContext;
  directory: StackDeploymentResult;
  routing: StackDeploymentResult;
  network: NetworkTopology;
  outputs: DeploymentOutputs;
  findings: ValidationFinding[];
  transitions: OrchestratorState[];
  startedAt: Date;
  durationMs: number;
}
