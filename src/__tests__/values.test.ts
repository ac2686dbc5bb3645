import { describe, it, expect } from 'vitest';
import { applyOptions } from '../reconcile/overlay.js';
import { buildValues } from '../reconcile/values.js';
import { resolveUpgradeOptions } from '../reconcile/options.js';
import { renderManifest } from '../render/manifest.js';
import { parseManifests } from '../store/manifests.js';
import { parseConfigData } from '../store/documents.js';
import type { GlobalConfig, ResolvedIdentity } from '../control-plane/types.js';
import { NAMESPACE, makeFlagSet } from './helpers.js';

function storedGlobal(): GlobalConfig {
  return parseConfigData({}).global;
}

const identity: ResolvedIdentity = {
  outcome: 'reused',
  context: {
    trustDomain: 'cluster.local',
    trustAnchorsPem: 'anchors-pem',
    clockSkewAllowanceMs: 20_000,
    issuanceLifetimeMs: 86_400_000,
  },
  issuer: { keyPem: 'key-pem', crtPem: 'crt-pem', notAfter: new Date('2027-01-01T00:00:00.000Z') },
  replicas: 3,
};

describe('applyOptions', () => {
  it('overlays proxy settings and stamps the CLI version', () => {
    const options = resolveUpgradeOptions(
      makeFlagSet({
        'proxy-log-level': { value: 'debug', source: 'explicit' },
        'skip-inbound-ports': { value: '25,587', source: 'recorded' },
        'proxy-memory-request': { value: '64Mi', source: 'recorded' },
      }),
      NAMESPACE
    );
    const global = applyOptions(storedGlobal(), options, 'stable-2.0.0');

    expect(global.version).toBe('stable-2.0.0');
    expect(global.namespace).toBe(NAMESPACE);
    expect(global.proxy).toEqual({
      image: 'mesh/proxy',
      version: 'stable-2.0.0',
      logLevel: 'debug',
      inboundPort: 4143,
      outboundPort: 4140,
      adminPort: 4191,
      ignoreInboundPorts: [25, 587],
      ignoreOutboundPorts: [],
      resources: { cpuRequest: '', memoryRequest: '64Mi' },
      disableExternalProfiles: false,
    });
  });

  it('enables auto-injection but never turns it off', () => {
    const on = resolveUpgradeOptions(makeFlagSet({ 'proxy-auto-inject': { value: 'true', source: 'explicit' } }), NAMESPACE);
    const off = resolveUpgradeOptions(makeFlagSet(), NAMESPACE);

    expect(applyOptions(storedGlobal(), on, 'v').autoInject).toBe(true);
    expect(applyOptions({ ...storedGlobal(), autoInject: true }, off, 'v').autoInject).toBe(true);
    expect(applyOptions(storedGlobal(), off, 'v').autoInject).toBe(false);
  });
});

describe('buildValues', () => {
  const options = resolveUpgradeOptions(makeFlagSet({ ha: { value: 'true', source: 'recorded' } }), NAMESPACE);
  const install = { uuid: 'u-1', cliVersion: 'stable-2.0.0', flags: [{ name: 'ha', value: 'true' }] };

  it('embeds the resolved identity', () => {
    const values = buildValues(applyOptions(storedGlobal(), options, 'stable-2.0.0'), install, identity, options);

    expect(values.global.identity).toEqual({ kind: 'present', context: identity.context });
    expect(values.identity).toEqual({
      replicas: 3,
      trustDomain: 'cluster.local',
      trustAnchorsPem: 'anchors-pem',
      issuer: {
        clockSkewAllowance: '20s',
        issuanceLifetime: '24h0m0s',
        crtExpiryAnnotation: 'mesh.io/identity-issuer-expiry',
        keyPem: 'key-pem',
        crtPem: 'crt-pem',
        crtExpiry: '2027-01-01T00:00:00.000Z',
      },
    });
    expect(values.controllerReplicas).toBe(3);
    expect(values.cliVersion).toBe('stable-2.0.0');
  });

  it('is frozen and detached from its inputs', () => {
    const values = buildValues(storedGlobal(), install, identity, options);

    expect(Object.isFrozen(values)).toBe(true);
    expect(Object.isFrozen(values.install.flags)).toBe(true);
    expect(Object.isFrozen(values.global.proxy)).toBe(true);

    install.flags.push({ name: 'late', value: 'x' });
    expect(values.install.flags).toEqual([{ name: 'ha', value: 'true' }]);
    install.flags.pop();
  });
});

describe('renderManifest', () => {
  it('renders objects that read back into the same stored config', () => {
    const options = resolveUpgradeOptions(makeFlagSet(), NAMESPACE);
    const values = buildValues(applyOptions(storedGlobal(), options, 'stable-2.0.0'), { uuid: 'u-1', cliVersion: 'stable-2.0.0', flags: [] }, identity, options);
    const objects = parseManifests(renderManifest(values));

    const configMap = objects.find((object) => object.kind === 'ConfigMap');
    const secret = objects.find((object) => object.kind === 'Secret');
    expect(configMap?.name).toBe('mesh-config');
    expect(secret?.data).toEqual({ 'crt.pem': 'crt-pem', 'key.pem': 'key-pem' });

    const stored = parseConfigData(configMap?.data ?? {});
    expect(stored.install).toEqual({ uuid: 'u-1', cliVersion: 'stable-2.0.0', flags: [] });
    expect(stored.global.identity).toEqual({ kind: 'present', context: identity.context });
    expect(stored.global.proxy.version).toBe('stable-2.0.0');
  });

  it('renders the identity deployment with the resolved replicas', () => {
    const options = resolveUpgradeOptions(makeFlagSet(), NAMESPACE);
    const values = buildValues(storedGlobal(), { uuid: 'u', cliVersion: 'v', flags: [] }, identity, options);
    const manifest = renderManifest(values);

    expect(manifest.startsWith('---\napiVersion: v1\nkind: ConfigMap\n')).toBe(true);
    expect(manifest).toContain('kind: Deployment\n');
    expect(manifest).toContain('  replicas: 3\n');
    expect(manifest).toContain('mesh.io/identity-issuer-expiry: 2027-01-01T00:00:00.000Z\n');
  });
});
