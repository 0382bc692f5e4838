import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CloudFormationClient,
  CreateStackCommand,
  DescribeStacksCommand,
  UpdateStackCommand,
  ValidateTemplateCommand
} from '@aws-sdk/client-cloudformation';
import { CloudFormationManager } from '../cloudformation-manager';
import { ParameterSet } from '../../templates/parameters';
import { DeploymentError, PreconditionError } from '../../errors';
import { Logger } from '../../logging/logger';

function awsError(name: string, message: string): Error {
  return Object.assign(new Error(message), { name });
}

function stack(status: string, outputs: Record<string, string> = {}) {
  return {
    Stacks: [{
      StackName: 'shop-prod-cognito',
      StackStatus: status,
      Outputs: Object.entries(outputs).map(([OutputKey, OutputValue]) => ({ OutputKey, OutputValue }))
    }]
  };
}

const notFound = awsError('ValidationError', 'Stack with id shop-prod-cognito does not exist');

describe('CloudFormationManager', () => {
  let send: ReturnType<typeof vi.fn>;
  let manager: CloudFormationManager;

  const request = {
    stackName: 'shop-prod-cognito',
    templateBody: 'Resources: {}',
    parameters: ParameterSet.fromRecord({ Environment: 'prod' }),
    tags: [{ Key: 'Project', Value: 'shop' }]
  };

  beforeEach(() => {
    send = vi.fn();
    manager = new CloudFormationManager('eu-west-1', {
      client: { send } as unknown as CloudFormationClient,
      logger: new Logger('test', 'silent'),
      pollIntervalMs: 0,
      maxWaitMs: 1000
    });
  });

  describe('validateTemplate', () => {
    it('should report the declared parameters of a valid template', async () => {
      send.mockResolvedValueOnce({ Parameters: [{ ParameterKey: 'Environment' }, { ParameterKey: 'VpcId' }] });

      const result = await manager.validateTemplate('Resources: {}');

      expect(result).toEqual({ valid: true, errors: [], parameters: ['Environment', 'VpcId'] });
      expect(send.mock.calls[0][0]).toBeInstanceOf(ValidateTemplateCommand);
      expect(send.mock.calls[0][0].input).toEqual({ TemplateBody: 'Resources: {}' });
    });

    it('should turn a service validation error into an invalid result', async () => {
      send.mockRejectedValueOnce(awsError('ValidationError', 'Template format error: unresolved resource'));

      const result = await manager.validateTemplate('Resources: {}');

      expect(result).toEqual({
        valid: false,
        errors: ['Template format error: unresolved resource'],
        parameters: []
      });
    });

    it('should rethrow other errors', async () => {
      send.mockRejectedValueOnce(awsError('AccessDenied', 'not authorized'));
      await expect(manager.validateTemplate('Resources: {}')).rejects.toThrow('not authorized');
    });
  });

  describe('describe', () => {
    it('should return null for a stack that does not exist', async () => {
      send.mockRejectedValueOnce(notFound);
      expect(await manager.describe('shop-prod-cognito')).toBeNull();
    });

    it('should return null for a deleted stack', async () => {
      send.mockResolvedValueOnce(stack('DELETE_COMPLETE'));
      expect(await manager.describe('shop-prod-cognito')).toBeNull();
    });

    it('should map outputs to a record', async () => {
      send.mockResolvedValueOnce(stack('UPDATE_COMPLETE', { UserPoolId: 'pool-1' }));

      expect(await manager.describe('shop-prod-cognito')).toEqual({
        stackName: 'shop-prod-cognito',
        status: 'UPDATE_COMPLETE',
        statusReason: undefined,
        outputs: { UserPoolId: 'pool-1' }
      });
    });
  });

  describe('deploy', () => {
    it('should create a missing stack and wait for completion', async () => {
      send
        .mockRejectedValueOnce(notFound)
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(stack('CREATE_COMPLETE', { UserPoolId: 'pool-1' }));

      const result = await manager.deploy(request);

      expect(result).toEqual({
        stackName: 'shop-prod-cognito',
        terminalStatus: 'CreatedOrUpdated',
        stackStatus: 'CREATE_COMPLETE',
        statusReason: undefined,
        outputs: { UserPoolId: 'pool-1' }
      });

      const create = send.mock.calls[1][0];
      expect(create).toBeInstanceOf(CreateStackCommand);
      expect(create.input).toEqual({
        StackName: 'shop-prod-cognito',
        TemplateBody: 'Resources: {}',
        Parameters: [{ ParameterKey: 'Environment', ParameterValue: 'prod' }],
        Capabilities: ['CAPABILITY_IAM'],
        Tags: [{ Key: 'Project', Value: 'shop' }]
      });
      expect(send.mock.calls[2][0]).toBeInstanceOf(DescribeStacksCommand);
    });

    it('should update an existing stack', async () => {
      send
        .mockResolvedValueOnce(stack('CREATE_COMPLETE'))
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(stack('UPDATE_COMPLETE'));

      const result = await manager.deploy(request);

      expect(result.terminalStatus).toBe('CreatedOrUpdated');
      expect(send.mock.calls[1][0]).toBeInstanceOf(UpdateStackCommand);
    });

    it('should treat "No updates are to be performed" as no change needed', async () => {
      send
        .mockResolvedValueOnce(stack('UPDATE_COMPLETE', { UserPoolId: 'pool-1' }))
        .mockRejectedValueOnce(awsError('ValidationError', 'No updates are to be performed.'));

      const result = await manager.deploy(request);

      expect(result).toEqual({
        stackName: 'shop-prod-cognito',
        terminalStatus: 'NoChangesNeeded',
        stackStatus: 'UPDATE_COMPLETE',
        outputs: { UserPoolId: 'pool-1' }
      });
      expect(send).toHaveBeenCalledTimes(2);
    });

    it('should report a rolled back creation as failed', async () => {
      send
        .mockRejectedValueOnce(notFound)
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(stack('ROLLBACK_COMPLETE'));

      const result = await manager.deploy(request);

      expect(result.terminalStatus).toBe('Failed');
      expect(result.stackStatus).toBe('ROLLBACK_COMPLETE');
    });

    it('should refuse to update a stack stuck in ROLLBACK_COMPLETE', async () => {
      send.mockResolvedValueOnce(stack('ROLLBACK_COMPLETE'));

      await expect(manager.deploy(request)).rejects.toBeInstanceOf(PreconditionError);
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('should wait for an in-progress stack before updating it', async () => {
      send
        .mockResolvedValueOnce(stack('UPDATE_IN_PROGRESS'))
        .mockResolvedValueOnce(stack('UPDATE_COMPLETE'))
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(stack('UPDATE_COMPLETE'));

      const result = await manager.deploy(request);

      expect(result.terminalStatus).toBe('CreatedOrUpdated');
      expect(send.mock.calls[2][0]).toBeInstanceOf(UpdateStackCommand);
    });

    it('should wrap submission failures in a retryable DeploymentError', async () => {
      send
        .mockRejectedValueOnce(notFound)
        .mockRejectedValueOnce(awsError('AccessDenied', 'not authorized to create stacks'));

      const error = await manager.deploy(request).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DeploymentError);
      if (error instanceof DeploymentError) {
        expect(error.retryable).toBe(true);
        expect(error.message).toBe('Failed to submit stack shop-prod-cognito: not authorized to create stacks');
      }
    });
  });

  describe('waitForTerminalStatus', () => {
    it('should give up after the configured wait', async () => {
      const impatient = new CloudFormationManager('eu-west-1', {
        client: { send } as unknown as CloudFormationClient,
        logger: new Logger('test', 'silent'),
        pollIntervalMs: 5,
        maxWaitMs: 0
      });
      send.mockResolvedValue(stack('CREATE_IN_PROGRESS'));

      await expect(impatient.waitForTerminalStatus('shop-prod-cognito')).rejects.toThrow(
        'Stack shop-prod-cognito did not reach a terminal status within 0 seconds'
      );
    });

    it('should keep polling while the stack is not yet visible', async () => {
      send
        .mockRejectedValueOnce(notFound)
        .mockResolvedValueOnce(stack('CREATE_COMPLETE'));

      const result = await manager.waitForTerminalStatus('shop-prod-cognito');
      expect(result.status).toBe('CREATE_COMPLETE');
    });
  });
});
