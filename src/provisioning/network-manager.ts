import { EC2Client, DescribeVpcsCommand, DescribeSubnetsCommand } from '@aws-sdk/client-ec2';
import { NetworkTopologyProvider } from './types';

/**
 * Reads the default VPC and its subnets
 */
export class NetworkManager implements NetworkTopologyProvider {
  private client: EC2Client;

  constructor(region: string = 'us-east-1', client?: EC2Client) {
    this.client = client ?? new EC2Client({ region });
  }

  async describeDefaultNetwork(): Promise<string | undefined> {
    const result = await this.client.send(new DescribeVpcsCommand({
      Filters: [{ Name: 'is-default', Values: ['true'] }]
    }));
    return result.Vpcs?.[0]?.VpcId;
  }

  async listSubnets(networkId: string): Promise<string[]> {
    const result = await this.client.send(new DescribeSubnetsCommand({
      Filters: [{ Name: 'vpc-id', Values: [networkId] }]
    }));

    return (result.Subnets ?? [])
      .map(subnet => subnet.SubnetId)
      .filter((id): id is string => id !== undefined);
  }
}
