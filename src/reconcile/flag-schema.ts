import { formatDuration, parseDuration } from '../utils/duration.js';

export type FlagKind = 'string' | 'name' | 'boolean' | 'count' | 'port' | 'portList' | 'duration';

export interface FlagDefinition {
  name: string;
  kind: FlagKind;
  defaultValue: string;
  description: string;
}

/**
 * Flags whose values are recorded into the install record. Order here is
 * the order they are registered, merged and recorded in.
 */
export const FLAG_DEFINITIONS: readonly FlagDefinition[] = [
  { name: 'controller-replicas', kind: 'count', defaultValue: '1', description: 'Replicas of the identity controller' },
  { name: 'controller-log-level', kind: 'string', defaultValue: 'info', description: 'Log level for the controller' },
  { name: 'ha', kind: 'boolean', defaultValue: 'false', description: 'Enable high-availability defaults (3 controller replicas)' },
  { name: 'proxy-auto-inject', kind: 'boolean', defaultValue: 'false', description: 'Enable proxy auto-injection' },
  { name: 'proxy-image', kind: 'string', defaultValue: 'mesh/proxy', description: 'Proxy container image name' },
  { name: 'proxy-version', kind: 'string', defaultValue: '', description: 'Proxy image tag (defaults to the CLI version)' },
  { name: 'proxy-log-level', kind: 'string', defaultValue: 'warn,mesh=info', description: 'Log level for the proxy' },
  { name: 'proxy-cpu-request', kind: 'string', defaultValue: '', description: 'CPU request for the proxy container' },
  { name: 'proxy-memory-request', kind: 'string', defaultValue: '', description: 'Memory request for the proxy container' },
  { name: 'inbound-port', kind: 'port', defaultValue: '4143', description: 'Proxy port for inbound traffic' },
  { name: 'outbound-port', kind: 'port', defaultValue: '4140', description: 'Proxy port for outbound traffic' },
  { name: 'admin-port', kind: 'port', defaultValue: '4191', description: 'Proxy port serving metrics and health' },
  { name: 'skip-inbound-ports', kind: 'portList', defaultValue: '', description: 'Ports that bypass the proxy for inbound traffic (comma-separated)' },
  { name: 'skip-outbound-ports', kind: 'portList', defaultValue: '', description: 'Ports that bypass the proxy for outbound traffic (comma-separated)' },
  { name: 'disable-external-profiles', kind: 'boolean', defaultValue: 'false', description: 'Disable service profiles for non-mesh services' },
  { name: 'identity-trust-domain', kind: 'name', defaultValue: 'cluster.local', description: 'Trust domain used for a newly generated identity' },
  { name: 'identity-issuance-lifetime', kind: 'duration', defaultValue: '24h0m0s', description: 'Lifetime of certificates the issuer mints' },
  { name: 'identity-clock-skew-allowance', kind: 'duration', defaultValue: '20s', description: 'Clock skew tolerated by issued certificates' },
  { name: 'identity-issuer-certificate-lifetime', kind: 'duration', defaultValue: '8760h0m0s', description: 'Validity of a newly generated issuer certificate' },
];

export class FlagValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FlagValueError';
  }
}

const TRUE_VALUES = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'false', 'FALSE', 'False']);

export function parseBoolean(raw: string): boolean {
  if (TRUE_VALUES.has(raw)) return true;
  if (FALSE_VALUES.has(raw)) return false;
  throw new FlagValueError(`"${raw}" is not a boolean`);
}

export function parseCount(raw: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new FlagValueError(`"${raw}" is not a positive integer`);
  }
  return Number(raw);
}

export function parsePort(raw: string): number {
  const port = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!(port >= 1 && port <= 65_535)) {
    throw new FlagValueError(`"${raw}" is not a port number`);
  }
  return port;
}

export function parsePortList(raw: string): number[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(parsePort);
}

export function parsePositiveDuration(raw: string): number {
  const ms = parseDuration(raw);
  if (ms === undefined || ms <= 0) {
    throw new FlagValueError(`"${raw}" is not a positive duration (e.g. 24h, 90m, 20s)`);
  }
  return ms;
}

export function parseName(raw: string): string {
  const value = raw.trim();
  if (value.length === 0) {
    throw new FlagValueError('value must not be empty');
  }
  return value;
}

/** Validates a value for a flag and returns its canonical spelling. */
export function normalizeFlagValue(definition: FlagDefinition, raw: string): string {
  switch (definition.kind) {
    case 'string':
      return raw;
    case 'name':
      return parseName(raw);
    case 'boolean':
      return String(parseBoolean(raw));
    case 'count':
      return String(parseCount(raw));
    case 'port':
      return String(parsePort(raw));
    case 'portList':
      return parsePortList(raw).join(',');
    case 'duration':
      return formatDuration(parsePositiveDuration(raw));
  }
}
