import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { CallerIdentity, IdentityProvider } from './types';

export class IdentityManager implements IdentityProvider {
  private client: STSClient;

  constructor(region: string = 'us-east-1', client?: STSClient) {
    this.client = client ?? new STSClient({ region });
  }

  async getCallerIdentity(): Promise<CallerIdentity> {
    const result = await this.client.send(new GetCallerIdentityCommand({}));
    return {
      account: result.Account ?? 'unknown',
      arn: result.Arn ?? 'unknown'
    };
  }
}
