import * as forge from 'node-forge';
import { existsSync } from 'fs';
import { chmod, mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { GenerationError, RegistrationError, ValidationError, errorMessage } from '../errors';
import { Logger } from '../logging/logger';
import { ResourceNamingService, createNamingService } from '../config/naming';
import { CertificateStore } from '../provisioning/types';
import { CertificateBundle, CertificateHandle, CertificateMetadata, DeploymentContext } from '../types';
import { ParameterSet } from '../templates/parameters';
import { assertKeyMatchesCertificate, inspectChain, parseCertificate, parsePrivateKey } from './pem';
import { writeCertificateParameters } from './parameter-artifact';

export const KEY_SIZE_BITS = 2048;
export const VALIDITY_DAYS = 365;

export const CERTIFICATE_FILES = {
  certificate: 'certificate.pem',
  privateKey: 'private-key.pem',
  chain: 'certificate-chain.pem',
  handle: 'certificate-arn.txt'
} as const;

export interface CertificateManagerOptions {
  store: CertificateStore;
  naming?: ResourceNamingService;
  logger?: Logger;
}

export interface RegistrationTarget {
  context: DeploymentContext;
  /** Directory that receives certificate-arn.txt */
  outputDirectory: string;
}

export interface RegistrationResult {
  handle: CertificateHandle;
  parameters: ParameterSet;
  parameterFile: string;
  handleFile: string;
}

export interface CertificateFiles {
  certificate: string;
  privateKey: string;
  chain: string;
}

export class CertificateManager {
  private store: CertificateStore;
  private naming: ResourceNamingService;
  private logger: Logger;

  constructor(options: CertificateManagerOptions) {
    this.store = options.store;
    this.naming = options.naming ?? createNamingService();
    this.logger = options.logger ?? new Logger('certificates');
  }

  /**
   * Generates a self-signed certificate for the domain and its wildcard.
   * The chain of a self-signed bundle is the certificate itself.
   */
  generateSelfSigned(domain: string, projectName: string, environment: string): CertificateBundle {
    this.logger.info(`Generating self-signed certificate for domain: ${domain}`);

    try {
      const keys = forge.pki.rsa.generateKeyPair({ bits: KEY_SIZE_BITS, e: 0x10001 });
      const certificate = forge.pki.createCertificate();

      certificate.publicKey = keys.publicKey;
      certificate.serialNumber = '01' + forge.util.bytesToHex(forge.random.getBytesSync(15));

      const notBefore = new Date();
      const notAfter = new Date(notBefore.getTime());
      notAfter.setUTCDate(notAfter.getUTCDate() + VALIDITY_DAYS);
      certificate.validity.notBefore = notBefore;
      certificate.validity.notAfter = notAfter;

      const attributes = [
        { name: 'commonName', value: domain },
        { name: 'organizationName', value: projectName },
        { shortName: 'OU', value: environment }
      ];
      certificate.setSubject(attributes);
      certificate.setIssuer(attributes);
      certificate.setExtensions([
        { name: 'basicConstraints', cA: false },
        { name: 'keyUsage', digitalSignature: true, keyEncipherment: true, dataEncipherment: true },
        { name: 'extKeyUsage', serverAuth: true },
        {
          name: 'subjectAltName',
          altNames: [
            { type: 2, value: domain },
            { type: 2, value: `*.${domain}` }
          ]
        }
      ]);
      certificate.sign(keys.privateKey, forge.md.sha256.create());

      const certificatePem = forge.pki.certificateToPem(certificate);
      return {
        certificatePem,
        privateKeyPem: forge.pki.privateKeyToPem(keys.privateKey),
        chainPem: certificatePem
      };
    } catch (error) {
      throw new GenerationError(`Failed to generate self-signed certificate: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Reads certificate.pem, private-key.pem and the optional
   * certificate-chain.pem from a directory
   * @throws ValidationError for missing, unparseable or mismatched material
   */
  async importExisting(directory: string): Promise<CertificateBundle> {
    this.logger.info(`Importing existing certificate files from ${directory}`);

    const certificatePath = join(directory, CERTIFICATE_FILES.certificate);
    const privateKeyPath = join(directory, CERTIFICATE_FILES.privateKey);
    const chainPath = join(directory, CERTIFICATE_FILES.chain);

    for (const path of [certificatePath, privateKeyPath]) {
      if (!existsSync(path)) {
        throw new ValidationError(`Required certificate file not found: ${path}`);
      }
    }

    const certificatePem = await readFile(certificatePath, 'utf-8');
    const privateKeyPem = await readFile(privateKeyPath, 'utf-8');

    parsePrivateKey(privateKeyPem, privateKeyPath);
    parseCertificate(certificatePem, certificatePath);

    let chainPem = '';
    if (existsSync(chainPath)) {
      chainPem = await readFile(chainPath, 'utf-8');
      const chain = inspectChain(chainPem);
      if (!chain.valid) {
        this.logger.warn(`Invalid certificate chain file: ${chainPath}`, { reason: chain.error });
      }
    } else {
      this.logger.warn('Certificate chain file not found. Using an empty chain.');
    }

    assertKeyMatchesCertificate(certificatePem, privateKeyPem);

    this.logger.info('Certificate files imported and validated successfully');
    return { certificatePem, privateKeyPem, chainPem };
  }

  /**
   * Writes the bundle as PEM files; the private key is readable by the owner only
   */
  async writeBundle(bundle: CertificateBundle, directory: string): Promise<CertificateFiles> {
    await mkdir(directory, { recursive: true });

    const files: CertificateFiles = {
      certificate: join(directory, CERTIFICATE_FILES.certificate),
      privateKey: join(directory, CERTIFICATE_FILES.privateKey),
      chain: join(directory, CERTIFICATE_FILES.chain)
    };

    await writeFile(files.privateKey, bundle.privateKeyPem, { mode: 0o600 });
    await chmod(files.privateKey, 0o600);
    await writeFile(files.certificate, bundle.certificatePem, { mode: 0o644 });
    await writeFile(files.chain, bundle.chainPem, { mode: 0o644 });

    return files;
  }

  /**
   * Imports the bundle into the certificate store and writes the hand-off
   * parameter file plus the raw ARN. Store rejections are not retried.
   */
  async registerCertificate(bundle: CertificateBundle, target: RegistrationTarget): Promise<RegistrationResult> {
    assertKeyMatchesCertificate(bundle.certificatePem, bundle.privateKeyPem);

    const { context, outputDirectory } = target;
    this.logger.info('Importing certificate to AWS Certificate Manager...');

    let arn: string;
    try {
      arn = await this.store.importCertificate(bundle, this.naming.createTags(context));
    } catch (error) {
      throw new RegistrationError(`Failed to import certificate to ACM: ${errorMessage(error)}`, {
        remediation: 'Check your AWS credentials and the certificate chain',
        cause: error
      });
    }
    this.logger.info('Certificate imported successfully to ACM', { arn });

    const handle: CertificateHandle = { arn, isPrivate: true };
    const parameterFile = this.naming.artifactPaths(context.environment).certificateParameters;
    const parameters = await writeCertificateParameters(parameterFile, context, handle);
    this.logger.info(`Parameter file created: ${parameterFile}`);

    await mkdir(outputDirectory, { recursive: true });
    const handleFile = join(outputDirectory, CERTIFICATE_FILES.handle);
    await writeFile(handleFile, `${arn}\n`);
    this.logger.info(`Certificate ARN saved to: ${handleFile}`);

    return { handle, parameters, parameterFile, handleFile };
  }

  async describeCertificate(arn: string): Promise<CertificateMetadata> {
    return this.store.describeCertificate(arn);
  }
}
