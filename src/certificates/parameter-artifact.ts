import { existsSync } from 'fs';
import { PreconditionError, errorMessage } from '../errors';
import { CertificateHandle, DeploymentContext } from '../types';
import { ParameterSet, readParameterFile, writeParameterFile } from '../templates/parameters';
import { createNamingService } from '../config/naming';

const REQUIRED_KEYS = ['CertificateArn', 'UsePrivateCertificate'];

/**
 * The routing-stack parameters contributed by a registered certificate
 */
export function certificateFragment(handle: CertificateHandle | undefined): ParameterSet {
  return ParameterSet.fromRecord({
    CertificateArn: handle?.arn ?? '',
    UsePrivateCertificate: handle ? 'true' : 'false'
  });
}

/**
 * Full hand-off file content: the context identifiers plus the certificate
 */
export function buildCertificateParameters(context: DeploymentContext, handle: CertificateHandle): ParameterSet {
  return ParameterSet.fromRecord({
    ProjectName: context.projectName,
    Environment: context.environment,
    ElasticBeanstalkEnvironmentName: createNamingService().generateResourceNames(context).applicationEnvironmentName
  }).merge(certificateFragment(handle));
}

export async function writeCertificateParameters(
  path: string,
  context: DeploymentContext,
  handle: CertificateHandle
): Promise<ParameterSet> {
  const parameters = buildCertificateParameters(context, handle);
  await writeParameterFile(path, parameters);
  return parameters;
}

/**
 * Reads the hand-off file the certificate command writes
 * @throws PreconditionError when it is missing, malformed or incomplete
 */
export async function loadCertificateParameters(path: string, environment: string): Promise<CertificateHandle> {
  const remediation = `Run: eb-auth certificate --generate-self-signed -e ${environment}`;

  if (!existsSync(path)) {
    throw new PreconditionError(`Private certificate parameter file not found: ${path}`, { remediation });
  }

  let parameters: ParameterSet;
  try {
    parameters = await readParameterFile(path);
  } catch (error) {
    throw new PreconditionError(`Invalid private certificate parameter file: ${errorMessage(error)}`, {
      remediation,
      cause: error
    });
  }

  for (const key of REQUIRED_KEYS) {
    if (!parameters.has(key)) {
      throw new PreconditionError(`Missing required parameter '${key}' in ${path}`, { remediation });
    }
  }

  const arn = parameters.get('CertificateArn');
  if (!arn || parameters.get('UsePrivateCertificate') !== 'true') {
    throw new PreconditionError(`${path} does not reference a registered private certificate`, { remediation });
  }

  return { arn, isPrivate: true };
}
