import { randomBytes } from 'node:crypto';
import forge from 'node-forge';
import type { IssuerCredential } from '../control-plane/types.js';

export interface IdentityRequest {
  trustDomain: string;
  issuerName: string;
  clockSkewAllowanceMs: number;
  certificateLifetimeMs: number;
  now: Date;
}

export interface GeneratedIdentity {
  trustAnchorsPem: string;
  issuer: IssuerCredential;
}

export type IdentityGenerator = (request: IdentityRequest) => Promise<GeneratedIdentity>;

const KEY_BITS = 2048;

function serialNumber(): string {
  // Leading 01 keeps the DER integer positive.
  return `01${randomBytes(15).toString('hex')}`;
}

/**
 * Generates a self-signed CA that serves as both trust anchor and issuer.
 *
 * The certificate is valid from `now - clockSkewAllowanceMs` to
 * `now + certificateLifetimeMs`. That lifetime comes from
 * `--identity-issuer-certificate-lifetime` (one year by default), not from
 * the issuance lifetime, which bounds the leaf certificates this issuer
 * signs later.
 */
export const generateIdentity: IdentityGenerator = async (request) => {
  const keys = forge.pki.rsa.generateKeyPair({ bits: KEY_BITS });
  const certificate = forge.pki.createCertificate();

  const notBefore = new Date(request.now.getTime() - request.clockSkewAllowanceMs);
  const notAfter = new Date(request.now.getTime() + request.certificateLifetimeMs);

  certificate.publicKey = keys.publicKey;
  certificate.serialNumber = serialNumber();
  certificate.validity.notBefore = notBefore;
  certificate.validity.notAfter = notAfter;

  const subject = [{ name: 'commonName', value: request.issuerName }];
  certificate.setSubject(subject);
  certificate.setIssuer(subject);
  certificate.setExtensions([
    { name: 'basicConstraints', cA: true, critical: true },
    { name: 'keyUsage', keyCertSign: true, cRLSign: true, digitalSignature: true, critical: true },
    { name: 'subjectKeyIdentifier' },
  ]);
  certificate.sign(keys.privateKey, forge.md.sha256.create());

  const crtPem = forge.pki.certificateToPem(certificate);
  return {
    trustAnchorsPem: crtPem,
    issuer: {
      keyPem: forge.pki.privateKeyToPem(keys.privateKey),
      crtPem,
      // X.509 validity has second precision.
      notAfter: new Date(Math.floor(notAfter.getTime() / 1_000) * 1_000),
    },
  };
};
