import { FLAG_DEFINITIONS } from '../reconcile/flag-schema.js';
import { InMemoryClusterReader, CONFIG_MAP_NAME, ISSUER_SECRET_NAME, type StoredObject } from '../store/cluster.js';
import { generateIdentity, type GeneratedIdentity } from '../tls/generate.js';
import type { FlagEntry, FlagSet, FlagSource, ReconcileDeps, UpgradeRequest } from '../control-plane/types.js';

export const NAMESPACE = 'mesh-system';
export const TEST_CLI_VERSION = 'test-1.2.3';
export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export function makeFlagSet(
  overrides: Record<string, { value: string; source: FlagSource }> = {}
): FlagSet {
  const flags = new Map<string, FlagEntry>();
  for (const definition of FLAG_DEFINITIONS) {
    const override = overrides[definition.name];
    flags.set(definition.name, {
      name: definition.name,
      value: override?.value ?? definition.defaultValue,
      source: override?.source ?? 'default',
    });
  }
  return flags;
}

export function configMap(data: Record<string, unknown>, namespace = NAMESPACE): StoredObject {
  const encoded: Record<string, string> = {};
  for (const [key, value] of Object.entries(data)) {
    encoded[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return { kind: 'ConfigMap', namespace, name: CONFIG_MAP_NAME, data: encoded };
}

export function issuerSecret(keyPem: string, crtPem: string, namespace = NAMESPACE): StoredObject {
  return {
    kind: 'Secret',
    namespace,
    name: ISSUER_SECRET_NAME,
    data: { 'key.pem': keyPem, 'crt.pem': crtPem },
  };
}

export async function makeIdentity(
  trustDomain = 'cluster.local',
  now = FIXED_NOW,
  lifetimeMs = 365 * 24 * 3_600_000
): Promise<GeneratedIdentity> {
  return generateIdentity({
    trustDomain,
    issuerName: `identity.${NAMESPACE}.${trustDomain}`,
    clockSkewAllowanceMs: 20_000,
    certificateLifetimeMs: lifetimeMs,
    now,
  });
}

/** A config map carrying a present identity whose issuer lives in the secret. */
export function clusterWithIdentity(
  anchorsPem: string,
  issuer: { keyPem: string; crtPem: string },
  install: Record<string, unknown> = { uuid: 'existing-uuid', cliVersion: 'old', flags: [] }
): InMemoryClusterReader {
  return new InMemoryClusterReader([
    configMap({
      global: {
        namespace: NAMESPACE,
        version: 'old',
        identityContext: {
          trustDomain: 'cluster.local',
          trustAnchorsPem: anchorsPem,
          issuanceLifetime: '86400s',
          clockSkewAllowance: '20s',
        },
      },
      install,
    }),
    issuerSecret(issuer.keyPem, issuer.crtPem),
  ]);
}

export function makeDeps(
  reader: ReconcileDeps['reader'],
  overrides: Partial<ReconcileDeps> = {}
): ReconcileDeps {
  let counter = 0;
  return {
    reader,
    generateUuid: () => `uuid-${++counter}`,
    generateIdentity,
    now: () => FIXED_NOW,
    cliVersion: TEST_CLI_VERSION,
    ...overrides,
  };
}

export function makeRequest(overrides: Partial<UpgradeRequest> = {}): UpgradeRequest {
  return {
    invocationId: 'inv_test_01',
    namespace: NAMESPACE,
    flags: makeFlagSet(),
    ignoreCluster: false,
    ...overrides,
  };
}

export class Collector {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}
