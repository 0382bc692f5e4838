import { describe, it, expect, beforeAll } from 'vitest';
import * as forge from 'node-forge';
import {
  assertKeyMatchesCertificate,
  inspectChain,
  modulusMatches,
  parseCertificate,
  parsePrivateKey,
  summarizeCertificate
} from '../pem';
import { CertificateManager } from '../certificate-manager';
import { ValidationError } from '../../errors';
import { CertificateBundle } from '../../types';

const unusedStore = {
  importCertificate: async (): Promise<string> => 'arn:unused',
  describeCertificate: async (arn: string) => ({ arn, subjectAlternativeNames: [] })
};

describe('PEM helpers', () => {
  let bundle: CertificateBundle;
  let foreignKeyPem: string;

  beforeAll(() => {
    bundle = new CertificateManager({ store: unusedStore }).generateSelfSigned('example.com', 'shop', 'prod');
    foreignKeyPem = forge.pki.privateKeyToPem(forge.pki.rsa.generateKeyPair({ bits: 1024 }).privateKey);
  });

  describe('modulusMatches', () => {
    it('should accept a certificate with its own key', () => {
      expect(modulusMatches(bundle.certificatePem, bundle.privateKeyPem)).toBe(true);
    });

    it('should reject a certificate with a foreign key', () => {
      expect(modulusMatches(bundle.certificatePem, foreignKeyPem)).toBe(false);
    });
  });

  describe('assertKeyMatchesCertificate', () => {
    it('should throw a ValidationError for a mismatched pair', () => {
      expect(() => assertKeyMatchesCertificate(bundle.certificatePem, foreignKeyPem)).toThrow(ValidationError);
      expect(() => assertKeyMatchesCertificate(bundle.certificatePem, foreignKeyPem)).toThrow(
        'Certificate and private key do not match!'
      );
    });
  });

  describe('parseCertificate', () => {
    it('should reject a private key passed as a certificate', () => {
      expect(() => parseCertificate(bundle.privateKeyPem, 'certificate.pem')).toThrow(
        'Invalid certificate file: certificate.pem does not contain a PEM certificate'
      );
    });
  });

  describe('parsePrivateKey', () => {
    it('should return the RSA modulus', () => {
      expect(parsePrivateKey(bundle.privateKeyPem).n.bitLength()).toBe(2048);
    });

    it('should reject an encrypted key', () => {
      const key = forge.pki.privateKeyFromPem(foreignKeyPem);
      const encrypted = forge.pki.encryptRsaPrivateKey(key, 'test-secret');

      expect(() => parsePrivateKey(encrypted, 'private-key.pem')).toThrow(
        'Invalid private key file: private-key.pem is encrypted'
      );
    });

    it('should reject text that is not PEM', () => {
      expect(() => parsePrivateKey('not a key')).toThrow(ValidationError);
    });
  });

  describe('inspectChain', () => {
    it('should accept an empty chain', () => {
      expect(inspectChain('')).toEqual({ valid: true, count: 0 });
    });

    it('should count the certificates of a chain', () => {
      expect(inspectChain(bundle.certificatePem + bundle.certificatePem)).toEqual({ valid: true, count: 2 });
    });

    it('should flag blocks that are not certificates', () => {
      const result = inspectChain(bundle.certificatePem + bundle.privateKeyPem);
      expect(result.valid).toBe(false);
      expect(result.count).toBe(2);
    });

    it('should flag text without PEM blocks', () => {
      expect(inspectChain('garbage').valid).toBe(false);
    });
  });

  describe('summarizeCertificate', () => {
    it('should report subject, issuer and DNS names', () => {
      const summary = summarizeCertificate(bundle.certificatePem);

      expect(summary.subject).toBe('CN=example.com, O=shop, OU=prod');
      expect(summary.issuer).toBe(summary.subject);
      expect(summary.dnsNames).toEqual(['example.com', '*.example.com']);
    });
  });
});
