import * as forge from 'node-forge';
import { ValidationError, errorMessage } from '../errors';

const PRIVATE_KEY_TYPES = ['RSA PRIVATE KEY', 'PRIVATE KEY'];

export interface RsaKey {
  n: forge.jsbn.BigInteger;
  e: forge.jsbn.BigInteger;
}

function isRsaKey(key: unknown): key is RsaKey {
  return typeof key === 'object' && key !== null && 'n' in key && 'e' in key;
}

function pemTypes(pem: string): string[] {
  try {
    return forge.pem.decode(pem).map(block => block.type);
  } catch {
    return [];
  }
}

/**
 * @throws ValidationError when the text is not a single RSA certificate
 */
export function parseCertificate(pem: string, source = 'certificate'): forge.pki.Certificate {
  const types = pemTypes(pem);
  if (types[0] !== 'CERTIFICATE') {
    throw new ValidationError(`Invalid certificate file: ${source} does not contain a PEM certificate`);
  }

  try {
    return forge.pki.certificateFromPem(pem);
  } catch (error) {
    throw new ValidationError(`Invalid certificate file: ${source}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * @throws ValidationError when the text is not an unencrypted RSA private key
 */
export function parsePrivateKey(pem: string, source = 'private key'): RsaKey {
  const types = pemTypes(pem);
  if (types[0] === 'ENCRYPTED PRIVATE KEY') {
    throw new ValidationError(`Invalid private key file: ${source} is encrypted`, {
      remediation: 'Certificate Manager only accepts unencrypted private keys; decrypt it first'
    });
  }
  if (!types[0] || !PRIVATE_KEY_TYPES.includes(types[0])) {
    throw new ValidationError(`Invalid private key file: ${source} does not contain a PEM private key`);
  }

  let key: unknown;
  try {
    key = forge.pki.privateKeyFromPem(pem);
  } catch (error) {
    throw new ValidationError(`Invalid private key file: ${source}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isRsaKey(key)) {
    throw new ValidationError(`Invalid private key file: ${source} is not an RSA key`);
  }
  return key;
}

/**
 * Checks that a chain is a sequence of parseable certificates.
 * An empty chain is valid.
 */
export function inspectChain(pem: string): { valid: boolean; count: number; error?: string } {
  if (!pem.trim()) {
    return { valid: true, count: 0 };
  }

  const types = pemTypes(pem);
  if (types.length === 0 || types.some(type => type !== 'CERTIFICATE')) {
    return { valid: false, count: types.length, error: 'chain contains blocks that are not certificates' };
  }

  try {
    for (const block of forge.pem.decode(pem)) {
      forge.pki.certificateFromAsn1(forge.asn1.fromDer(block.body));
    }
  } catch (error) {
    return { valid: false, count: types.length, error: errorMessage(error) };
  }
  return { valid: true, count: types.length };
}

/**
 * True when the certificate's public key modulus equals the private key's
 */
export function modulusMatches(certificatePem: string, privateKeyPem: string): boolean {
  const certificate = parseCertificate(certificatePem);
  const privateKey = parsePrivateKey(privateKeyPem);
  const publicKey: unknown = certificate.publicKey;

  if (!isRsaKey(publicKey)) {
    return false;
  }
  return publicKey.n.toString(16) === privateKey.n.toString(16);
}

/**
 * @throws ValidationError when the pair is not cryptographically bound
 */
export function assertKeyMatchesCertificate(certificatePem: string, privateKeyPem: string): void {
  if (!modulusMatches(certificatePem, privateKeyPem)) {
    throw new ValidationError('Certificate and private key do not match!', {
      remediation: 'Make sure private-key.pem is the key the certificate was issued for'
    });
  }
}

export interface CertificateSummary {
  subject: string;
  issuer: string;
  notBefore: Date;
  notAfter: Date;
  dnsNames: string[];
}

function formatName(attributes: forge.pki.CertificateField[]): string {
  return attributes
    .map(attribute => `${attribute.shortName ?? attribute.name}=${String(attribute.value)}`)
    .join(', ');
}

/**
 * Subject, issuer, validity and DNS names of a certificate, for display
 */
export function summarizeCertificate(pem: string): CertificateSummary {
  const certificate = parseCertificate(pem);
  const extension: unknown = certificate.getExtension('subjectAltName');
  const dnsNames: string[] = [];

  if (typeof extension === 'object' && extension !== null && 'altNames' in extension && Array.isArray(extension.altNames)) {
    for (const altName of extension.altNames) {
      if (typeof altName === 'object' && altName !== null && altName.type === 2 && typeof altName.value === 'string') {
        dnsNames.push(altName.value);
      }
    }
  }

  return {
    subject: formatName(certificate.subject.attributes),
    issuer: formatName(certificate.issuer.attributes),
    notBefore: certificate.validity.notBefore,
    notAfter: certificate.validity.notAfter,
    dnsNames
  };
}
