import {
  FlagValueError,
  parseBoolean,
  parseCount,
  parseName,
  parsePort,
  parsePortList,
  parsePositiveDuration,
} from './flag-schema.js';
import { MalformedConfigError, assertPrecondition } from './errors.js';
import type { FlagSet, UpgradeOptions } from '../control-plane/types.js';

const HA_CONTROLLER_REPLICAS = 3;

/**
 * Builds the typed options for one invocation from the reconciled flag set.
 * Explicit values were validated at parse time, so a value that fails here
 * came from the stored install record.
 */
export function resolveUpgradeOptions(flags: FlagSet, namespace: string): UpgradeOptions {
  const read = <T>(name: string, parse: (raw: string) => T): T => {
    const entry = flags.get(name);
    assertPrecondition(entry !== undefined, `flag "${name}" is not registered`);
    try {
      return parse(entry.value);
    } catch (err) {
      if (err instanceof FlagValueError) {
        throw new MalformedConfigError(
          `${entry.source} value for flag --${name} is invalid: ${err.message}`,
          { cause: err }
        );
      }
      throw err;
    }
  };
  const text = (name: string): string => read(name, (raw) => raw);

  const ha = read('ha', parseBoolean);
  const replicasEntry = flags.get('controller-replicas');
  const controllerReplicas =
    ha && replicasEntry?.source === 'default'
      ? HA_CONTROLLER_REPLICAS
      : read('controller-replicas', parseCount);

  return {
    namespace,
    controllerReplicas,
    controllerLogLevel: text('controller-log-level'),
    ha,
    proxyAutoInject: read('proxy-auto-inject', parseBoolean),
    proxy: {
      image: text('proxy-image'),
      version: text('proxy-version'),
      logLevel: text('proxy-log-level'),
      cpuRequest: text('proxy-cpu-request'),
      memoryRequest: text('proxy-memory-request'),
      inboundPort: read('inbound-port', parsePort),
      outboundPort: read('outbound-port', parsePort),
      adminPort: read('admin-port', parsePort),
      skipInboundPorts: read('skip-inbound-ports', parsePortList),
      skipOutboundPorts: read('skip-outbound-ports', parsePortList),
      disableExternalProfiles: read('disable-external-profiles', parseBoolean),
    },
    identity: {
      trustDomain: read('identity-trust-domain', parseName),
      issuanceLifetimeMs: read('identity-issuance-lifetime', parsePositiveDuration),
      clockSkewAllowanceMs: read('identity-clock-skew-allowance', parsePositiveDuration),
      issuerCertificateLifetimeMs: read('identity-issuer-certificate-lifetime', parsePositiveDuration),
    },
  };
}
