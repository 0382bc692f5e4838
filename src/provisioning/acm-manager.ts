import {
  ACMClient,
  ImportCertificateCommand,
  DescribeCertificateCommand
} from '@aws-sdk/client-acm';
import { CertificateBundle, CertificateMetadata } from '../types';
import { CertificateStore, Tag } from './types';

export class ACMManager implements CertificateStore {
  private client: ACMClient;

  constructor(region: string = 'us-east-1', client?: ACMClient) {
    this.client = client ?? new ACMClient({ region });
  }

  async importCertificate(bundle: CertificateBundle, tags?: Tag[]): Promise<string> {
    const result = await this.client.send(new ImportCertificateCommand({
      Certificate: Buffer.from(bundle.certificatePem),
      PrivateKey: Buffer.from(bundle.privateKeyPem),
      // Chain omitted when empty
      CertificateChain: bundle.chainPem.trim() ? Buffer.from(bundle.chainPem) : undefined,
      Tags: tags
    }));

    if (!result.CertificateArn) {
      throw new Error('Certificate Manager did not return a certificate ARN');
    }
    return result.CertificateArn;
  }

  async describeCertificate(arn: string): Promise<CertificateMetadata> {
    const result = await this.client.send(new DescribeCertificateCommand({ CertificateArn: arn }));
    const certificate = result.Certificate;

    return {
      arn: certificate?.CertificateArn ?? arn,
      domainName: certificate?.DomainName,
      status: certificate?.Status,
      type: certificate?.Type,
      notAfter: certificate?.NotAfter,
      subjectAlternativeNames: certificate?.SubjectAlternativeNames ?? []
    };
  }
}
