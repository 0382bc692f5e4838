// Orchestration-specific types
import { Logger } from '../logging/logger';
import { ResourceNamingService } from '../config/naming';
import { NetworkTopologyProvider, ProvisioningService } from '../provisioning/types';
import { TemplateEngine } from '../templates/template-engine';
import { CertificateHandle, DeploymentContext, OrchestratorState } from '../types';

export interface OrchestratorDependencies {
  provisioning: ProvisioningService;
  network: NetworkTopologyProvider;
  templates: TemplateEngine;
  naming: ResourceNamingService;
  logger?: Logger;
  /** Called after every state transition */
  onStateChange?: (state: OrchestratorState) => void;
}

export interface OrchestrationRequest {
  context: DeploymentContext;
  /** Required when the context selects private-certificate mode */
  certificate?: CertificateHandle;
  /** Routing-stack parameters applied after every other fragment */
  parameterOverrides?: Record<string, string>;
}

/** Output keys read back from the deployed stacks */
export const EXPECTED_OUTPUTS = {
  directory: ['UserPoolId', 'UserPoolDomain'],
  routing: ['LoadBalancerDNSName']
} as const;
