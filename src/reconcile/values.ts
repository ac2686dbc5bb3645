import { ISSUER_EXPIRY_ANNOTATION } from '../store/cluster.js';
import { formatDuration } from '../utils/duration.js';
import type {
  GlobalConfig,
  InstallRecord,
  ReconciledValues,
  ResolvedIdentity,
  UpgradeOptions,
} from '../control-plane/types.js';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Assembles the value tree handed to the renderer. The resolved identity is
 * embedded into the global section as well, so the rendered config map and
 * the issuer secret always agree. Inputs are copied, never shared.
 */
export function buildValues(
  global: GlobalConfig,
  install: InstallRecord,
  identity: ResolvedIdentity,
  options: UpgradeOptions
): ReconciledValues {
  const tree = structuredClone({
    namespace: options.namespace,
    cliVersion: install.cliVersion,
    controllerReplicas: options.controllerReplicas,
    controllerLogLevel: options.controllerLogLevel,
    install,
    global: {
      ...global,
      identity: { kind: 'present' as const, context: identity.context },
    },
    identity: {
      replicas: identity.replicas,
      trustDomain: identity.context.trustDomain,
      trustAnchorsPem: identity.context.trustAnchorsPem,
      issuer: {
        clockSkewAllowance: formatDuration(identity.context.clockSkewAllowanceMs),
        issuanceLifetime: formatDuration(identity.context.issuanceLifetimeMs),
        crtExpiryAnnotation: ISSUER_EXPIRY_ANNOTATION,
        keyPem: identity.issuer.keyPem,
        crtPem: identity.issuer.crtPem,
        crtExpiry: identity.issuer.notAfter.toISOString(),
      },
    },
  });
  return deepFreeze(tree);
}
