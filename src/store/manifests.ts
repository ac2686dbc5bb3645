import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { InMemoryClusterReader, type ClusterReader, type StoredObject } from './cluster.js';
import { FetchError, describeError } from '../reconcile/errors.js';

const kubeObject = z
  .object({
    kind: z.string(),
    metadata: z
      .object({
        name: z.string(),
        namespace: z.string().optional(),
      })
      .passthrough(),
    data: z.record(z.string()).nullish(),
    stringData: z.record(z.string()).nullish(),
  })
  .passthrough();

function decodeBase64Values(data: Record<string, string>): Record<string, string> {
  const decoded: Record<string, string> = {};
  for (const [key, value] of Object.entries(data)) {
    decoded[key] = Buffer.from(value, 'base64').toString('utf-8');
  }
  return decoded;
}

/**
 * Turns a multi-document YAML stream into the config maps and secrets it
 * contains. Other kinds are skipped; objects without a namespace land in
 * "default" as they would on a cluster.
 */
export function parseManifests(text: string): StoredObject[] {
  const objects: StoredObject[] = [];
  const documents = YAML.parseAllDocuments(text);

  documents.forEach((document, index) => {
    if (document.errors.length > 0) {
      throw new Error(`document ${index + 1}: ${document.errors[0].message}`);
    }
    const value: unknown = document.toJS();
    if (value === null || value === undefined) return;

    const parsed = kubeObject.safeParse(value);
    if (!parsed.success) {
      throw new Error(`document ${index + 1} is not a Kubernetes object`);
    }

    const { kind, metadata, data, stringData } = parsed.data;
    const namespace = metadata.namespace ?? 'default';
    if (kind === 'ConfigMap') {
      objects.push({ kind, namespace, name: metadata.name, data: { ...data } });
    } else if (kind === 'Secret') {
      objects.push({
        kind,
        namespace,
        name: metadata.name,
        data: { ...decodeBase64Values(data ?? {}), ...stringData },
      });
    }
  });

  return objects;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Serves reads from a bundle of previously rendered manifests. The bundle is
 * loaded on first access so load failures surface inside the fetch step.
 */
export class ManifestClusterReader implements ClusterReader {
  private state?: Promise<InMemoryClusterReader>;

  constructor(
    private readonly source: string,
    private readonly load: () => Promise<string>
  ) {}

  static fromPath(path: string): ManifestClusterReader {
    if (path === '-') {
      return new ManifestClusterReader('stdin', readStdin);
    }
    return new ManifestClusterReader(path, () => readFile(path, 'utf-8'));
  }

  async getConfigMap(namespace: string, name: string): Promise<Record<string, string>> {
    const reader = await this.reader();
    return reader.getConfigMap(namespace, name);
  }

  async getSecret(namespace: string, name: string): Promise<Record<string, string>> {
    const reader = await this.reader();
    return reader.getSecret(namespace, name);
  }

  private reader(): Promise<InMemoryClusterReader> {
    this.state ??= this.open();
    return this.state;
  }

  private async open(): Promise<InMemoryClusterReader> {
    let text: string;
    try {
      text = await this.load();
    } catch (err) {
      throw new FetchError(`failed to read manifests from ${this.source}: ${describeError(err)}`, {
        cause: err,
      });
    }

    try {
      return new InMemoryClusterReader(parseManifests(text));
    } catch (err) {
      throw new FetchError(
        `failed to parse Kubernetes objects from ${this.source}: ${describeError(err)}`,
        { cause: err }
      );
    }
  }
}
