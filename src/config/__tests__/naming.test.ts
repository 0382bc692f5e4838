import { describe, it, expect, beforeEach } from 'vitest';
import { join } from 'path';
import { ResourceNamingService, createNamingService } from '../naming';
import { DeploymentContext } from '../../types';

describe('Resource Naming Service', () => {
  let namingService: ResourceNamingService;

  const context: DeploymentContext = {
    projectName: 'shop',
    environment: 'prod',
    region: 'eu-west-1',
    stackPrefix: 'shop-prod',
    certificateMode: 'managed'
  };

  beforeEach(() => {
    namingService = new ResourceNamingService('/srv/app');
  });

  describe('stackPrefix', () => {
    it('should join project and environment', () => {
      expect(namingService.stackPrefix('shop', 'prod')).toBe('shop-prod');
    });

    it('should sanitize characters CloudFormation rejects', () => {
      expect(namingService.stackPrefix('my_shop', 'prod')).toBe('my-shop-prod');
    });
  });

  describe('stackName', () => {
    it('should suffix the directory and routing stacks', () => {
      expect(namingService.stackName(context, 'directory')).toBe('shop-prod-cognito');
      expect(namingService.stackName(context, 'routing')).toBe('shop-prod-alb');
    });

    it('should truncate names over the stack name limit with a hash suffix', () => {
      const long = { ...context, stackPrefix: 'a'.repeat(130) };
      const name = namingService.stackName(long, 'directory');

      expect(name.length).toBeLessThanOrEqual(128);
      expect(name).toMatch(/^a+-[a-z0-9]+$/);
    });
  });

  describe('generateResourceNames', () => {
    it('should derive every resource name from the prefix', () => {
      expect(namingService.generateResourceNames(context)).toEqual({
        directoryStackName: 'shop-prod-cognito',
        routingStackName: 'shop-prod-alb',
        applicationEnvironmentName: 'shop-prod-env'
      });
    });
  });

  describe('artifactPaths', () => {
    it('should place parameter files under cloudformation/parameters', () => {
      expect(namingService.artifactPaths('prod')).toEqual({
        environmentParameters: join('/srv/app', 'cloudformation', 'parameters', 'prod-parameters.json'),
        certificateParameters: join('/srv/app', 'cloudformation', 'parameters', 'prod-private-cert-parameters.json')
      });
    });
  });

  describe('createTags', () => {
    it('should tag with project, environment and owner', () => {
      expect(namingService.createTags(context)).toEqual([
        { Key: 'Project', Value: 'shop' },
        { Key: 'Environment', Value: 'prod' },
        { Key: 'ManagedBy', Value: 'eb-auth-provisioner' }
      ]);
    });
  });

  describe('createNamingService', () => {
    it('should default to the working directory', () => {
      const service = createNamingService();
      expect(service.artifactPaths('dev').environmentParameters).toBe(
        join(process.cwd(), 'cloudformation', 'parameters', 'dev-parameters.json')
      );
    });
  });
});
