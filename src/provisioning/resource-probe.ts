import {
  CognitoIdentityProviderClient,
  DescribeUserPoolCommand
} from '@aws-sdk/client-cognito-identity-provider';
import {
  ElasticLoadBalancingV2Client,
  DescribeLoadBalancersCommand
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { LoadBalancerSummary, ResourceProbe, UserPoolSummary } from './types';

export interface ResourceProbeClients {
  cognito?: CognitoIdentityProviderClient;
  elb?: ElasticLoadBalancingV2Client;
}

/**
 * Read-only lookups of the primary resource each stack publishes
 */
export class AwsResourceProbe implements ResourceProbe {
  private cognito: CognitoIdentityProviderClient;
  private elb: ElasticLoadBalancingV2Client;

  constructor(region: string = 'us-east-1', clients: ResourceProbeClients = {}) {
    this.cognito = clients.cognito ?? new CognitoIdentityProviderClient({ region });
    this.elb = clients.elb ?? new ElasticLoadBalancingV2Client({ region });
  }

  async describeUserPool(userPoolId: string): Promise<UserPoolSummary> {
    const result = await this.cognito.send(new DescribeUserPoolCommand({ UserPoolId: userPoolId }));
    return {
      id: result.UserPool?.Id ?? userPoolId,
      name: result.UserPool?.Name
    };
  }

  async describeLoadBalancer(loadBalancerArn: string): Promise<LoadBalancerSummary> {
    const result = await this.elb.send(new DescribeLoadBalancersCommand({ LoadBalancerArns: [loadBalancerArn] }));
    const loadBalancer = result.LoadBalancers?.[0];
    if (!loadBalancer) {
      throw new Error(`Load balancer not found: ${loadBalancerArn}`);
    }
    return {
      arn: loadBalancer.LoadBalancerArn ?? loadBalancerArn,
      dnsName: loadBalancer.DNSName,
      state: loadBalancer.State?.Code
    };
  }
}
