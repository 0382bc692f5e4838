import { createNamingService } from '../config/naming';
import { Logger } from '../logging/logger';
import { CloudFormationManager } from '../provisioning/cloudformation-manager';
import { IdentityManager } from '../provisioning/identity-manager';
import { AwsResourceProbe } from '../provisioning/resource-probe';
import { TemplateEngine } from '../templates/template-engine';
import { DeploymentContext } from '../types';
import { EnvironmentValidator } from './environment-validator';

export * from './environment-validator';
export * from './report';

export function createEnvironmentValidator(
  context: DeploymentContext,
  baseDir: string = process.cwd(),
  logger: Logger = new Logger('validate')
): EnvironmentValidator {
  return new EnvironmentValidator({
    identity: new IdentityManager(context.region),
    provisioning: new CloudFormationManager(context.region, { logger: logger.child('cloudformation') }),
    probe: new AwsResourceProbe(context.region),
    templates: new TemplateEngine(baseDir),
    naming: createNamingService(baseDir),
    baseDir,
    logger
  });
}
