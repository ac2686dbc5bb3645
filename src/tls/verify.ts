import type { KeyObject, X509Certificate } from 'node:crypto';
import { certificateNotAfter, certificateNotBefore } from './pem.js';

export interface Credential {
  privateKey: KeyObject;
  certificate: X509Certificate;
}

export class CredentialVerificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialVerificationError';
  }
}

function withinValidity(certificate: X509Certificate, now: Date): boolean {
  const time = now.getTime();
  return (
    certificateNotBefore(certificate).getTime() <= time &&
    time <= certificateNotAfter(certificate).getTime()
  );
}

function issuedBy(certificate: X509Certificate, anchor: X509Certificate): boolean {
  return certificate.checkIssued(anchor) && certificate.verify(anchor.publicKey);
}

/**
 * Verifies a credential against a pool of trust anchors. Service identities
 * carry no hostname, so only the chain, the validity window and the key
 * pairing are checked.
 */
export function verifyCredential(credential: Credential, roots: X509Certificate[], now: Date): void {
  const { certificate, privateKey } = credential;

  if (!withinValidity(certificate, now)) {
    throw new CredentialVerificationError(
      `certificate has expired or is not yet valid: current time ${now.toISOString()} ` +
      `is outside ${certificateNotBefore(certificate).toISOString()} - ` +
      `${certificateNotAfter(certificate).toISOString()}`
    );
  }

  if (!certificate.checkPrivateKey(privateKey)) {
    throw new CredentialVerificationError('private key does not match the certificate');
  }

  const trusted = roots.some(
    (anchor) => anchor.ca && withinValidity(anchor, now) && issuedBy(certificate, anchor)
  );
  if (!trusted) {
    throw new CredentialVerificationError(
      `certificate signed by unknown authority (issuer "${certificate.issuer.replace(/\n/g, ', ')}")`
    );
  }
}
