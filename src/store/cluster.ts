import { FetchError } from '../reconcile/errors.js';

export const CONFIG_MAP_NAME = 'mesh-config';
export const ISSUER_SECRET_NAME = 'mesh-identity-issuer';
export const ISSUER_KEY_NAME = 'key.pem';
export const ISSUER_CRT_NAME = 'crt.pem';
export const ISSUER_EXPIRY_ANNOTATION = 'mesh.io/identity-issuer-expiry';

/**
 * Read-only access to the two objects the reconciler needs. Implementations
 * throw `FetchError` for anything that keeps them from returning the data.
 */
export interface ClusterReader {
  getConfigMap(namespace: string, name: string): Promise<Record<string, string>>;
  /** Secret values are returned decoded. */
  getSecret(namespace: string, name: string): Promise<Record<string, string>>;
}

export type StoredObjectKind = 'ConfigMap' | 'Secret';

export interface StoredObject {
  kind: StoredObjectKind;
  namespace: string;
  name: string;
  data: Record<string, string>;
}

function objectKey(kind: StoredObjectKind, namespace: string, name: string): string {
  return `${kind}/${namespace}/${name}`;
}

export class InMemoryClusterReader implements ClusterReader {
  private readonly objects = new Map<string, StoredObject>();

  constructor(objects: StoredObject[] = []) {
    for (const object of objects) {
      this.objects.set(objectKey(object.kind, object.namespace, object.name), object);
    }
  }

  async getConfigMap(namespace: string, name: string): Promise<Record<string, string>> {
    return this.lookup('ConfigMap', namespace, name);
  }

  async getSecret(namespace: string, name: string): Promise<Record<string, string>> {
    return this.lookup('Secret', namespace, name);
  }

  private lookup(kind: StoredObjectKind, namespace: string, name: string): Record<string, string> {
    const object = this.objects.get(objectKey(kind, namespace, name));
    if (!object) {
      throw new FetchError(`${kind.toLowerCase()}s "${name}" not found in namespace "${namespace}"`);
    }
    return { ...object.data };
  }
}
