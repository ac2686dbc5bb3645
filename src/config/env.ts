import { homedir } from 'node:os';
import { delimiter, join } from 'node:path';

export const DEFAULT_NAMESPACE = 'mesh-system';
export const DEFAULT_DOCS_URL = 'https://docs.example.com/mesh/upgrade';

export interface RuntimeConfig {
  namespace: string;
  docsUrl: string;
  kubeconfigPath: string;
}

const NAMESPACE_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

function resolveNamespace(raw?: string): string {
  const namespace = raw?.trim() || DEFAULT_NAMESPACE;
  if (namespace.length > 63 || !NAMESPACE_PATTERN.test(namespace)) {
    throw new Error(
      `Invalid namespace "${namespace}". Use lowercase letters, digits and '-', at most 63 characters.`
    );
  }
  return namespace;
}

function resolveDocsUrl(raw?: string): string {
  if (!raw?.trim()) return DEFAULT_DOCS_URL;
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    throw new Error(`Invalid MESHCTL_DOCS_URL: ${raw}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error('Invalid MESHCTL_DOCS_URL. It must use http or https.');
  }
  return parsed.toString().replace(/\/$/, '');
}

/** The docs URL for a fatal report; falls back to the default when the configured one is itself invalid. */
export function docsUrlOrDefault(env: NodeJS.ProcessEnv = process.env): string {
  try {
    return resolveDocsUrl(env.MESHCTL_DOCS_URL);
  } catch {
    return DEFAULT_DOCS_URL;
  }
}

function resolveKubeconfigPath(raw?: string): string {
  const first = raw?.split(delimiter).find((entry) => entry.trim().length > 0);
  return first?.trim() ?? join(homedir(), '.kube', 'config');
}

export function resolveRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: { namespace?: string; kubeconfig?: string } = {}
): RuntimeConfig {
  return {
    namespace: resolveNamespace(overrides.namespace ?? env.MESHCTL_NAMESPACE),
    docsUrl: resolveDocsUrl(env.MESHCTL_DOCS_URL),
    kubeconfigPath: resolveKubeconfigPath(overrides.kubeconfig ?? env.KUBECONFIG),
  };
}
