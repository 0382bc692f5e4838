// Provisioning-specific types: the narrow interfaces the orchestrator,
// certificate manager and validator need from AWS
import { Capability } from '@aws-sdk/client-cloudformation';
import { CertificateBundle, CertificateMetadata, StackDeploymentResult } from '../types';
import { ParameterSet } from '../templates/parameters';

export interface Tag {
  Key: string;
  Value: string;
}

export interface TemplateValidationResult {
  valid: boolean;
  errors: string[];
  /** Parameter keys the service reports for the template */
  parameters: string[];
}

export interface StackDeploymentRequest {
  stackName: string;
  templateBody: string;
  parameters: ParameterSet;
  capabilities?: Capability[];
  tags?: Tag[];
}

export interface StackDescription {
  stackName: string;
  status: string;
  statusReason?: string;
  outputs: Record<string, string>;
}

export interface ProvisioningService {
  validateTemplate(templateBody: string): Promise<TemplateValidationResult>;
  deploy(request: StackDeploymentRequest): Promise<StackDeploymentResult>;
  /** Resolves to null when the stack does not exist */
  describe(stackName: string): Promise<StackDescription | null>;
}

export interface CertificateStore {
  /** Resolves to the ARN of the imported certificate */
  importCertificate(bundle: CertificateBundle, tags?: Tag[]): Promise<string>;
  describeCertificate(arn: string): Promise<CertificateMetadata>;
}

export interface NetworkTopologyProvider {
  /** Resolves to undefined when the region has no default VPC */
  describeDefaultNetwork(): Promise<string | undefined>;
  /** Subnet ids in the order the service returns them */
  listSubnets(networkId: string): Promise<string[]>;
}

export interface CallerIdentity {
  account: string;
  arn: string;
}

export interface IdentityProvider {
  getCallerIdentity(): Promise<CallerIdentity>;
}

export interface UserPoolSummary {
  id: string;
  name?: string;
}

export interface LoadBalancerSummary {
  arn: string;
  dnsName?: string;
  state?: string;
}

export interface ResourceProbe {
  describeUserPool(userPoolId: string): Promise<UserPoolSummary>;
  describeLoadBalancer(loadBalancerArn: string): Promise<LoadBalancerSummary>;
}
