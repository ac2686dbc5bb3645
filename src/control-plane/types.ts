import type { ClusterReader } from '../store/cluster.js';
import type { IdentityGenerator } from '../tls/generate.js';

export interface RecordedFlag {
  name: string;
  value: string;
}

export interface InstallRecord {
  uuid: string;
  cliVersion: string;
  flags: RecordedFlag[];
}

export interface IdentityContext {
  trustDomain: string;
  trustAnchorsPem: string;
  clockSkewAllowanceMs: number;
  issuanceLifetimeMs: number;
}

/**
 * A stored identity section is either fully present or treated as absent.
 * Use `identityFromContext` to build one; a context with an empty trust
 * domain or empty anchors never becomes `present`.
 */
export type Identity =
  | { kind: 'absent' }
  | { kind: 'present'; context: IdentityContext };

export interface ProxyResources {
  cpuRequest: string;
  memoryRequest: string;
}

export interface ProxyConfig {
  image: string;
  version: string;
  logLevel: string;
  inboundPort: number;
  outboundPort: number;
  adminPort: number;
  ignoreInboundPorts: number[];
  ignoreOutboundPorts: number[];
  resources: ProxyResources;
  disableExternalProfiles: boolean;
}

export interface GlobalConfig {
  namespace: string;
  version: string;
  cniEnabled: boolean;
  autoInject: boolean;
  identity: Identity;
  proxy: ProxyConfig;
}

export interface StoredConfig {
  install: InstallRecord;
  global: GlobalConfig;
}

export interface IssuerCredential {
  keyPem: string;
  crtPem: string;
  notAfter: Date;
}

export type IdentityOutcome = 'reused' | 'generated';

export interface ResolvedIdentity {
  outcome: IdentityOutcome;
  context: IdentityContext;
  issuer: IssuerCredential;
  replicas: number;
}

export type FlagSource = 'default' | 'recorded' | 'explicit';

export interface FlagEntry {
  name: string;
  value: string;
  source: FlagSource;
}

/** Ordered by flag registration; a map is never shared between invocations. */
export type FlagSet = ReadonlyMap<string, FlagEntry>;

export interface UpgradeOptions {
  namespace: string;
  controllerReplicas: number;
  controllerLogLevel: string;
  ha: boolean;
  proxyAutoInject: boolean;
  proxy: {
    image: string;
    version: string;
    logLevel: string;
    cpuRequest: string;
    memoryRequest: string;
    inboundPort: number;
    outboundPort: number;
    adminPort: number;
    skipInboundPorts: number[];
    skipOutboundPorts: number[];
    disableExternalProfiles: boolean;
  };
  identity: {
    trustDomain: string;
    issuanceLifetimeMs: number;
    clockSkewAllowanceMs: number;
    issuerCertificateLifetimeMs: number;
  };
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export interface IssuerValues {
  clockSkewAllowance: string;
  issuanceLifetime: string;
  crtExpiryAnnotation: string;
  keyPem: string;
  crtPem: string;
  crtExpiry: string;
}

export interface IdentityValues {
  replicas: number;
  trustDomain: string;
  trustAnchorsPem: string;
  issuer: IssuerValues;
}

export type ReconciledValues = DeepReadonly<{
  namespace: string;
  cliVersion: string;
  controllerReplicas: number;
  controllerLogLevel: string;
  install: InstallRecord;
  global: GlobalConfig;
  identity: IdentityValues;
}>;

export type StepName =
  | 'fetch'
  | 'repair'
  | 'merge_flags'
  | 'resolve_identity'
  | 'build_values';

export type StepStatus = 'passed' | 'failed';

export interface StepResult {
  name: StepName;
  status: StepStatus;
  durationMs: number;
  error?: string;
}

export type ConfigSource = 'cluster' | 'manifests';

export interface UpgradeRequest {
  invocationId: string;
  namespace: string;
  flags: FlagSet;
  /** Upgrades always read the cluster; a caller that sets this has a bug. */
  ignoreCluster: boolean;
}

export interface ReconcileDeps {
  reader: ClusterReader;
  generateUuid: () => string;
  generateIdentity: IdentityGenerator;
  now: () => Date;
  cliVersion: string;
}

export interface WorkflowStep {
  name: StepName;
  execute: (ctx: UpgradeContext) => Promise<void>;
}

export interface UpgradeContext {
  request: UpgradeRequest;
  deps: ReconcileDeps;
  stored?: StoredConfig;
  install?: InstallRecord;
  flags?: FlagSet;
  options?: UpgradeOptions;
  global?: GlobalConfig;
  identity?: ResolvedIdentity;
  values?: ReconciledValues;
  appliedRecordedFlags: string[];
  ignoredRecordedFlags: string[];
  stepResults: StepResult[];
}

export interface WorkflowPlan {
  steps: WorkflowStep[];
}
