import {
  Capability,
  CloudFormationClient,
  CreateStackCommand,
  UpdateStackCommand,
  DescribeStacksCommand,
  ValidateTemplateCommand,
  Stack
} from '@aws-sdk/client-cloudformation';
import { DeploymentError, PreconditionError, errorMessage } from '../errors';
import { Logger } from '../logging/logger';
import { StackDeploymentResult } from '../types';
import { classifyStackStatus } from './stack-status';
import {
  ProvisioningService,
  StackDeploymentRequest,
  StackDescription,
  TemplateValidationResult
} from './types';

export interface CloudFormationManagerOptions {
  client?: CloudFormationClient;
  logger?: Logger;
  /** Delay between status polls while waiting for a terminal status */
  pollIntervalMs?: number;
  /** Upper bound on a single wait for a terminal status */
  maxWaitMs?: number;
}

const NO_UPDATES_MESSAGE = 'No updates are to be performed';

export class CloudFormationManager implements ProvisioningService {
  private client: CloudFormationClient;
  private logger: Logger;
  private pollIntervalMs: number;
  private maxWaitMs: number;

  constructor(region: string = 'us-east-1', options: CloudFormationManagerOptions = {}) {
    this.client = options.client ?? new CloudFormationClient({ region });
    this.logger = options.logger ?? new Logger('cloudformation');
    this.pollIntervalMs = options.pollIntervalMs ?? 10000;
    this.maxWaitMs = options.maxWaitMs ?? 1800000;
  }

  async validateTemplate(templateBody: string): Promise<TemplateValidationResult> {
    try {
      const result = await this.client.send(new ValidateTemplateCommand({ TemplateBody: templateBody }));
      const parameters = (result.Parameters ?? [])
        .map(parameter => parameter.ParameterKey)
        .filter((key): key is string => key !== undefined);
      return { valid: true, errors: [], parameters };
    } catch (error) {
      if (error instanceof Error && error.name === 'ValidationError') {
        return { valid: false, errors: [error.message], parameters: [] };
      }
      throw error;
    }
  }

  async deploy(request: StackDeploymentRequest): Promise<StackDeploymentResult> {
    const { stackName } = request;
    let existing = await this.describe(stackName);

    if (existing && classifyStackStatus(existing.status) === 'in-progress') {
      this.logger.info(`Stack ${stackName} is busy (${existing.status}), waiting before deploying`);
      existing = await this.waitForTerminalStatus(stackName);
    }

    if (existing?.status === 'ROLLBACK_COMPLETE') {
      throw new PreconditionError(`Stack ${stackName} is in ROLLBACK_COMPLETE and cannot be updated`, {
        remediation: `Delete the stack (aws cloudformation delete-stack --stack-name ${stackName}) and re-run`
      });
    }

    const parameters = request.parameters.toEntries();
    const capabilities: Capability[] = request.capabilities ?? ['CAPABILITY_IAM'];

    try {
      if (existing) {
        this.logger.info(`Updating CloudFormation stack: ${stackName}`);
        await this.client.send(new UpdateStackCommand({
          StackName: stackName,
          TemplateBody: request.templateBody,
          Parameters: parameters,
          Capabilities: capabilities,
          Tags: request.tags
        }));
      } else {
        this.logger.info(`Creating CloudFormation stack: ${stackName}`);
        await this.client.send(new CreateStackCommand({
          StackName: stackName,
          TemplateBody: request.templateBody,
          Parameters: parameters,
          Capabilities: capabilities,
          Tags: request.tags
        }));
      }
    } catch (error) {
      if (existing && error instanceof Error && error.message.includes(NO_UPDATES_MESSAGE)) {
        this.logger.info(`No changes detected in CloudFormation stack ${stackName}`);
        return {
          stackName,
          terminalStatus: 'NoChangesNeeded',
          stackStatus: existing.status,
          outputs: existing.outputs
        };
      }
      throw new DeploymentError(`Failed to submit stack ${stackName}: ${errorMessage(error)}`, { cause: error });
    }

    const settled = await this.waitForTerminalStatus(stackName);
    const succeeded = classifyStackStatus(settled.status) === 'healthy';

    return {
      stackName,
      terminalStatus: succeeded ? 'CreatedOrUpdated' : 'Failed',
      stackStatus: settled.status,
      statusReason: settled.statusReason,
      outputs: settled.outputs
    };
  }

  async describe(stackName: string): Promise<StackDescription | null> {
    let stack: Stack | undefined;
    try {
      const result = await this.client.send(new DescribeStacksCommand({ StackName: stackName }));
      stack = result.Stacks?.[0];
    } catch (error) {
      if (error instanceof Error && error.name === 'ValidationError' && error.message.includes('does not exist')) {
        return null;
      }
      throw error;
    }

    if (!stack?.StackStatus || stack.StackStatus === 'DELETE_COMPLETE') {
      return null;
    }

    const outputs: Record<string, string> = {};
    for (const output of stack.Outputs ?? []) {
      if (output.OutputKey !== undefined && output.OutputValue !== undefined) {
        outputs[output.OutputKey] = output.OutputValue;
      }
    }

    return {
      stackName: stack.StackName ?? stackName,
      status: stack.StackStatus,
      statusReason: stack.StackStatusReason,
      outputs
    };
  }

  /**
   * Polls until the stack leaves every *_IN_PROGRESS status. A describe right
   * after a create/update may lag, so a missing stack is polled again too.
   */
  async waitForTerminalStatus(stackName: string): Promise<StackDescription> {
    const startTime = Date.now();

    while (Date.now() - startTime <= this.maxWaitMs) {
      const stack = await this.describe(stackName);

      if (stack && classifyStackStatus(stack.status) !== 'in-progress') {
        return stack;
      }

      this.logger.debug(`Waiting for stack ${stackName}`, { status: stack?.status ?? 'NOT_FOUND' });
      await new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
    }

    throw new DeploymentError(`Stack ${stackName} did not reach a terminal status within ${this.maxWaitMs / 1000} seconds`, {
      remediation: 'Check the CloudFormation console and re-run once the stack has settled'
    });
  }
}
