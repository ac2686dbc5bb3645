import { CONFIG_MAP_NAME, type ClusterReader } from './cluster.js';
import { DocumentError, parseConfigData } from './documents.js';
import { MalformedConfigError } from '../reconcile/errors.js';
import type { StoredConfig } from '../control-plane/types.js';

/**
 * Reads the persisted configuration straight from the config map rather than
 * through the control plane's API, so an upgrade works while that API is down.
 * Read failures propagate as `FetchError`; there is no default fallback.
 */
export async function fetchConfigs(reader: ClusterReader, namespace: string): Promise<StoredConfig> {
  const data = await reader.getConfigMap(namespace, CONFIG_MAP_NAME);
  try {
    return parseConfigData(data);
  } catch (err) {
    if (err instanceof DocumentError) {
      throw new MalformedConfigError(
        `config map "${CONFIG_MAP_NAME}" has an invalid ${err.message}`,
        { cause: err }
      );
    }
    throw err;
  }
}
