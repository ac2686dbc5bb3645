import type { KeyObject, X509Certificate } from 'node:crypto';
import { ISSUER_CRT_NAME, ISSUER_KEY_NAME, ISSUER_SECRET_NAME, type ClusterReader } from '../store/cluster.js';
import { certificateNotAfter, decodeCertPool, decodeCertificate, decodePrivateKey } from '../tls/pem.js';
import { verifyCredential } from '../tls/verify.js';
import type { GeneratedIdentity, IdentityGenerator } from '../tls/generate.js';
import {
  GenerationError,
  InvalidIssuerCredentialError,
  MalformedIssuerCredentialError,
  MalformedTrustAnchorsError,
  describeError,
} from './errors.js';
import type { Identity, IdentityContext, ResolvedIdentity, UpgradeOptions } from '../control-plane/types.js';

export interface IdentityCollaborators {
  reader: ClusterReader;
  generateIdentity: IdentityGenerator;
  now: () => Date;
}

export function issuerName(namespace: string, trustDomain: string): string {
  return `identity.${namespace}.${trustDomain}`;
}

/**
 * Resolves the identity for the upgraded control plane.
 *
 * An absent identity (first install, or an upgrade from a release without
 * identity) is generated anew. A present one is read back and verified
 * against its trust anchors; any failure is fatal and the existing identity
 * is never replaced or rotated here.
 */
export async function resolveIdentity(
  identity: Identity,
  options: UpgradeOptions,
  deps: IdentityCollaborators
): Promise<ResolvedIdentity> {
  if (identity.kind === 'absent') {
    return generateNewIdentity(options, deps);
  }
  return fetchExistingIdentity(identity.context, options, deps);
}

async function generateNewIdentity(
  options: UpgradeOptions,
  deps: IdentityCollaborators
): Promise<ResolvedIdentity> {
  const { trustDomain, clockSkewAllowanceMs, issuanceLifetimeMs, issuerCertificateLifetimeMs } =
    options.identity;

  let generated: GeneratedIdentity;
  try {
    generated = await deps.generateIdentity({
      trustDomain,
      issuerName: issuerName(options.namespace, trustDomain),
      clockSkewAllowanceMs,
      certificateLifetimeMs: issuerCertificateLifetimeMs,
      now: deps.now(),
    });
  } catch (err) {
    throw new GenerationError(`unable to generate issuer credentials: ${describeError(err)}`, {
      cause: err,
    });
  }

  return {
    outcome: 'generated',
    context: {
      trustDomain,
      trustAnchorsPem: generated.trustAnchorsPem,
      clockSkewAllowanceMs,
      issuanceLifetimeMs,
    },
    issuer: generated.issuer,
    replicas: options.controllerReplicas,
  };
}

async function fetchExistingIdentity(
  context: IdentityContext,
  options: UpgradeOptions,
  deps: IdentityCollaborators
): Promise<ResolvedIdentity> {
  let roots: X509Certificate[];
  try {
    roots = decodeCertPool(context.trustAnchorsPem);
  } catch (err) {
    throw new MalformedTrustAnchorsError(`trust anchors could not be decoded: ${describeError(err)}`, {
      cause: err,
    });
  }

  const secret = await deps.reader.getSecret(options.namespace, ISSUER_SECRET_NAME);
  const keyPem = secret[ISSUER_KEY_NAME] ?? '';
  const crtPem = secret[ISSUER_CRT_NAME] ?? '';

  let privateKey: KeyObject;
  let certificate: X509Certificate;
  try {
    privateKey = decodePrivateKey(keyPem);
  } catch (err) {
    throw new MalformedIssuerCredentialError(`issuer key could not be decoded: ${describeError(err)}`, {
      cause: err,
    });
  }
  try {
    certificate = decodeCertificate(crtPem);
  } catch (err) {
    throw new MalformedIssuerCredentialError(
      `issuer certificate could not be decoded: ${describeError(err)}`,
      { cause: err }
    );
  }

  try {
    verifyCredential({ privateKey, certificate }, roots, deps.now());
  } catch (err) {
    throw new InvalidIssuerCredentialError(`invalid issuer credentials: ${describeError(err)}`, {
      cause: err,
    });
  }

  return {
    outcome: 'reused',
    context,
    issuer: { keyPem, crtPem, notAfter: certificateNotAfter(certificate) },
    replicas: options.controllerReplicas,
  };
}
