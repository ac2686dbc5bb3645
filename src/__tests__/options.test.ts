import { describe, it, expect } from 'vitest';
import { resolveUpgradeOptions } from '../reconcile/options.js';
import { FLAG_DEFINITIONS, normalizeFlagValue, FlagValueError } from '../reconcile/flag-schema.js';
import { MalformedConfigError, PreconditionViolation } from '../reconcile/errors.js';
import { NAMESPACE, makeFlagSet } from './helpers.js';

describe('resolveUpgradeOptions', () => {
  it('resolves defaults', () => {
    const options = resolveUpgradeOptions(makeFlagSet(), NAMESPACE);
    expect(options.namespace).toBe(NAMESPACE);
    expect(options.controllerReplicas).toBe(1);
    expect(options.ha).toBe(false);
    expect(options.proxy.inboundPort).toBe(4143);
    expect(options.proxy.skipInboundPorts).toEqual([]);
    expect(options.identity).toEqual({
      trustDomain: 'cluster.local',
      issuanceLifetimeMs: 86_400_000,
      clockSkewAllowanceMs: 20_000,
      issuerCertificateLifetimeMs: 8760 * 3_600_000,
    });
  });

  it('raises the replica default under ha', () => {
    const flags = makeFlagSet({ ha: { value: 'true', source: 'recorded' } });
    expect(resolveUpgradeOptions(flags, NAMESPACE).controllerReplicas).toBe(3);
  });

  it('keeps a replica count that was set, even under ha', () => {
    const flags = makeFlagSet({
      ha: { value: 'true', source: 'explicit' },
      'controller-replicas': { value: '5', source: 'recorded' },
    });
    expect(resolveUpgradeOptions(flags, NAMESPACE).controllerReplicas).toBe(5);
  });

  it('parses port lists', () => {
    const flags = makeFlagSet({ 'skip-outbound-ports': { value: '25, 3306', source: 'recorded' } });
    expect(resolveUpgradeOptions(flags, NAMESPACE).proxy.skipOutboundPorts).toEqual([25, 3306]);
  });

  it('reports an invalid recorded value as malformed config', () => {
    const flags = makeFlagSet({ 'inbound-port': { value: 'http', source: 'recorded' } });
    expect(() => resolveUpgradeOptions(flags, NAMESPACE)).toThrow(MalformedConfigError);
    expect(() => resolveUpgradeOptions(flags, NAMESPACE)).toThrow(
      'recorded value for flag --inbound-port is invalid: "http" is not a port number'
    );
  });

  it('treats a missing registered flag as a caller bug', () => {
    const flags = new Map(makeFlagSet());
    flags.delete('ha');
    expect(() => resolveUpgradeOptions(flags, NAMESPACE)).toThrow(PreconditionViolation);
  });
});

describe('normalizeFlagValue', () => {
  const definition = (name: string) => {
    const found = FLAG_DEFINITIONS.find((candidate) => candidate.name === name);
    if (!found) throw new Error(`unknown flag ${name}`);
    return found;
  };

  it('canonicalizes values', () => {
    expect(normalizeFlagValue(definition('ha'), 'T')).toBe('true');
    expect(normalizeFlagValue(definition('identity-issuance-lifetime'), '90m')).toBe('1h30m0s');
    expect(normalizeFlagValue(definition('skip-inbound-ports'), '80, 443')).toBe('80,443');
    expect(normalizeFlagValue(definition('controller-replicas'), '2')).toBe('2');
  });

  it('rejects invalid values', () => {
    expect(() => normalizeFlagValue(definition('ha'), 'yes')).toThrow(FlagValueError);
    expect(() => normalizeFlagValue(definition('controller-replicas'), '0')).toThrow(FlagValueError);
    expect(() => normalizeFlagValue(definition('admin-port'), '70000')).toThrow(FlagValueError);
    expect(() => normalizeFlagValue(definition('identity-clock-skew-allowance'), '0s')).toThrow(FlagValueError);
    expect(() => normalizeFlagValue(definition('identity-trust-domain'), '  ')).toThrow(FlagValueError);
  });

  it('accepts every default', () => {
    for (const flag of FLAG_DEFINITIONS) {
      expect(() => normalizeFlagValue(flag, flag.defaultValue)).not.toThrow();
    }
  });
});
