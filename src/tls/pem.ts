import { X509Certificate, createPrivateKey, type KeyObject } from 'node:crypto';

const CERTIFICATE_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

function certificateBlocks(pem: string): string[] {
  return pem.match(CERTIFICATE_BLOCK) ?? [];
}

function parseCertificate(block: string, index: number): X509Certificate {
  try {
    return new X509Certificate(block);
  } catch (err) {
    throw new Error(`certificate ${index + 1} could not be parsed`, { cause: err });
  }
}

/** Decodes every certificate in a PEM bundle. At least one is required. */
export function decodeCertPool(pem: string): X509Certificate[] {
  const blocks = certificateBlocks(pem);
  if (blocks.length === 0) {
    throw new Error('no PEM certificate blocks found');
  }
  return blocks.map(parseCertificate);
}

export function decodeCertificate(pem: string): X509Certificate {
  const [first] = certificateBlocks(pem);
  if (first === undefined) {
    throw new Error('no PEM certificate block found');
  }
  return parseCertificate(first, 0);
}

export function decodePrivateKey(pem: string): KeyObject {
  if (!pem.includes('-----BEGIN') || !pem.includes('PRIVATE KEY-----')) {
    throw new Error('no PEM private key block found');
  }
  try {
    return createPrivateKey(pem);
  } catch (err) {
    throw new Error('private key could not be parsed', { cause: err });
  }
}

export function certificateNotAfter(certificate: X509Certificate): Date {
  return new Date(certificate.validTo);
}

export function certificateNotBefore(certificate: X509Certificate): Date {
  return new Date(certificate.validFrom);
}
