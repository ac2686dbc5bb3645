import { Agent, request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { loadKubeconfig, type KubeConnectionSettings } from './kubeconfig.js';
import type { ClusterReader } from './cluster.js';
import { FetchError, describeError } from '../reconcile/errors.js';
import { logger } from '../utils/logger.js';

const objectData = z.object({
  data: z.record(z.string()).nullish(),
});

function readData(body: unknown, resource: string): Record<string, string> {
  const parsed = objectData.safeParse(body);
  if (!parsed.success) {
    throw new FetchError(`${resource}: unexpected response shape`);
  }
  return parsed.data.data ?? {};
}

interface KubeConnection {
  settings: KubeConnectionSettings;
  dispatcher: Dispatcher;
}

export interface KubeReaderSettings {
  kubeconfigPath: string;
  context?: string;
}

export function joinApiPath(server: string, pathname: string): string {
  const base = server.endsWith('/') ? server : `${server}/`;
  return new URL(pathname.replace(/^\//, ''), base).toString();
}

/**
 * Reads config maps and secrets through the core Kubernetes API. The
 * kubeconfig is loaded lazily so a missing or broken one is reported as a
 * fetch failure.
 */
export class KubeClusterReader implements ClusterReader {
  private connection?: Promise<KubeConnection>;
  private agent?: Agent;

  constructor(private readonly settings: KubeReaderSettings) {}

  async getConfigMap(namespace: string, name: string): Promise<Record<string, string>> {
    const resource = `configmaps "${name}" in namespace "${namespace}"`;
    const body = await this.get(
      `/api/v1/namespaces/${encodeURIComponent(namespace)}/configmaps/${encodeURIComponent(name)}`,
      resource
    );
    return readData(body, resource);
  }

  async getSecret(namespace: string, name: string): Promise<Record<string, string>> {
    const resource = `secrets "${name}" in namespace "${namespace}"`;
    const body = await this.get(
      `/api/v1/namespaces/${encodeURIComponent(namespace)}/secrets/${encodeURIComponent(name)}`,
      resource
    );
    const decoded: Record<string, string> = {};
    for (const [key, value] of Object.entries(readData(body, resource))) {
      decoded[key] = Buffer.from(value, 'base64').toString('utf-8');
    }
    return decoded;
  }

  async close(): Promise<void> {
    await this.agent?.close();
  }

  private connect(): Promise<KubeConnection> {
    this.connection ??= this.open();
    return this.connection;
  }

  private async open(): Promise<KubeConnection> {
    let settings: KubeConnectionSettings;
    try {
      settings = await loadKubeconfig(this.settings.kubeconfigPath, this.settings.context);
    } catch (err) {
      throw new FetchError(`failed to load kubernetes config: ${describeError(err)}`, { cause: err });
    }

    logger.debug({ context: settings.context, server: settings.server }, 'using kubeconfig context');
    this.agent = new Agent({
      connect: {
        ca: settings.ca,
        cert: settings.cert,
        key: settings.key,
        rejectUnauthorized: !settings.insecureSkipTlsVerify,
      },
    });
    return { settings, dispatcher: this.agent };
  }

  private async get(pathname: string, resource: string): Promise<unknown> {
    const { settings, dispatcher } = await this.connect();
    const headers: Record<string, string> = { accept: 'application/json' };
    if (settings.token) {
      headers.authorization = `Bearer ${settings.token}`;
    }

    let response: Dispatcher.ResponseData;
    try {
      response = await request(joinApiPath(settings.server, pathname), {
        method: 'GET',
        headers,
        dispatcher,
      });
    } catch (err) {
      throw new FetchError(`could not reach ${settings.server}: ${describeError(err)}`, { cause: err });
    }

    if (response.statusCode === 200) {
      try {
        return await response.body.json();
      } catch (err) {
        throw new FetchError(`${resource}: response was not JSON`, { cause: err });
      }
    }

    await response.body.dump();
    switch (response.statusCode) {
      case 401:
        throw new FetchError(`${resource}: unauthorized; check the credentials of context "${settings.context}"`);
      case 403:
        throw new FetchError(`${resource}: forbidden; the current user may not read it`);
      case 404:
        throw new FetchError(`${resource} not found`);
      default:
        throw new FetchError(`${resource}: unexpected status ${response.statusCode}`);
    }
  }
}
