import { z } from 'zod';
import { formatSeconds, parseDuration } from '../utils/duration.js';
import type {
  DeepReadonly,
  GlobalConfig,
  Identity,
  IdentityContext,
  InstallRecord,
  ProxyConfig,
} from '../control-plane/types.js';

export const DEFAULT_ISSUANCE_LIFETIME_MS = 24 * 3_600_000;
export const DEFAULT_CLOCK_SKEW_ALLOWANCE_MS = 20_000;

const duration = z.string().transform((value, ctx) => {
  const ms = parseDuration(value);
  if (ms === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${value}"` });
    return z.NEVER;
  }
  return ms;
});

const identityContextDocument = z.object({
  trustDomain: z.string().default(''),
  trustAnchorsPem: z.string().default(''),
  issuanceLifetime: duration.optional(),
  clockSkewAllowance: duration.optional(),
});

const globalDocument = z.object({
  namespace: z.string().default(''),
  version: z.string().default(''),
  cniEnabled: z.boolean().default(false),
  identityContext: identityContextDocument.nullish(),
  autoInjectContext: z.object({}).passthrough().nullish(),
});

const port = z.number().int().min(0).max(65_535);

const proxyDocument = z.object({
  image: z.string().default(''),
  version: z.string().default(''),
  logLevel: z.string().default(''),
  inboundPort: port.default(0),
  outboundPort: port.default(0),
  adminPort: port.default(0),
  ignoreInboundPorts: z.array(port).default([]),
  ignoreOutboundPorts: z.array(port).default([]),
  resources: z
    .object({
      cpuRequest: z.string().default(''),
      memoryRequest: z.string().default(''),
    })
    .default({}),
  disableExternalProfiles: z.boolean().default(false),
});

const installDocument = z.object({
  uuid: z.string().default(''),
  cliVersion: z.string().default(''),
  flags: z.array(z.object({ name: z.string(), value: z.string() })).default([]),
});

export class DocumentError extends Error {
  constructor(readonly key: string, message: string, options?: ErrorOptions) {
    super(`${key}: ${message}`, options);
    this.name = 'DocumentError';
  }
}

function parseDocument<S extends z.ZodTypeAny>(key: string, schema: S, raw: string | undefined): z.output<S> {
  let json: unknown = {};
  if (raw !== undefined && raw.trim().length > 0) {
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new DocumentError(key, 'not valid JSON', { cause: err });
    }
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
      .join('; ');
    throw new DocumentError(key, issues);
  }
  return parsed.data;
}

export function identityFromContext(context: IdentityContext): Identity {
  if (context.trustDomain === '' || context.trustAnchorsPem === '') {
    return { kind: 'absent' };
  }
  return { kind: 'present', context };
}

/** Parses the `global`, `proxy` and `install` documents of the config map. */
export function parseConfigData(data: Record<string, string>): { global: GlobalConfig; install: InstallRecord } {
  const global = parseDocument('global', globalDocument, data.global);
  const proxy: ProxyConfig = parseDocument('proxy', proxyDocument, data.proxy);
  const install: InstallRecord = parseDocument('install', installDocument, data.install);

  const idctx = global.identityContext;
  const identity: Identity = idctx
    ? identityFromContext({
        trustDomain: idctx.trustDomain,
        trustAnchorsPem: idctx.trustAnchorsPem,
        issuanceLifetimeMs: idctx.issuanceLifetime ?? DEFAULT_ISSUANCE_LIFETIME_MS,
        clockSkewAllowanceMs: idctx.clockSkewAllowance ?? DEFAULT_CLOCK_SKEW_ALLOWANCE_MS,
      })
    : { kind: 'absent' };

  return {
    global: {
      namespace: global.namespace,
      version: global.version,
      cniEnabled: global.cniEnabled,
      autoInject: global.autoInjectContext != null,
      identity,
      proxy,
    },
    install,
  };
}

export function serializeGlobal(global: DeepReadonly<GlobalConfig>): string {
  const identityContext =
    global.identity.kind === 'present'
      ? {
          trustDomain: global.identity.context.trustDomain,
          trustAnchorsPem: global.identity.context.trustAnchorsPem,
          issuanceLifetime: formatSeconds(global.identity.context.issuanceLifetimeMs),
          clockSkewAllowance: formatSeconds(global.identity.context.clockSkewAllowanceMs),
        }
      : null;
  return JSON.stringify({
    namespace: global.namespace,
    version: global.version,
    cniEnabled: global.cniEnabled,
    identityContext,
    autoInjectContext: global.autoInject ? {} : null,
  });
}

export function serializeProxy(proxy: DeepReadonly<ProxyConfig>): string {
  return JSON.stringify(proxy);
}

export function serializeInstall(install: DeepReadonly<InstallRecord>): string {
  return JSON.stringify({ uuid: install.uuid, cliVersion: install.cliVersion, flags: install.flags });
}
