import { homedir } from 'node:os';
import { delimiter, join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_DOCS_URL, resolveRuntimeConfig } from '../config/env.js';

describe('resolveRuntimeConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveRuntimeConfig({})).toEqual({
      namespace: 'mesh-system',
      docsUrl: DEFAULT_DOCS_URL,
      kubeconfigPath: join(homedir(), '.kube', 'config'),
    });
  });

  it('reads the environment', () => {
    const config = resolveRuntimeConfig({
      MESHCTL_NAMESPACE: 'mesh-canary',
      MESHCTL_DOCS_URL: 'https://docs.example.test/mesh/',
      KUBECONFIG: ['/tmp/first.yaml', '/tmp/second.yaml'].join(delimiter),
    });

    expect(config).toEqual({
      namespace: 'mesh-canary',
      docsUrl: 'https://docs.example.test/mesh',
      kubeconfigPath: '/tmp/first.yaml',
    });
  });

  it('prefers command-line overrides', () => {
    const config = resolveRuntimeConfig(
      { MESHCTL_NAMESPACE: 'mesh-canary', KUBECONFIG: '/tmp/env.yaml' },
      { namespace: 'mesh-blue', kubeconfig: '/tmp/flag.yaml' }
    );

    expect(config.namespace).toBe('mesh-blue');
    expect(config.kubeconfigPath).toBe('/tmp/flag.yaml');
  });

  it('rejects invalid values', () => {
    expect(() => resolveRuntimeConfig({ MESHCTL_NAMESPACE: 'Mesh_System' })).toThrow('Invalid namespace "Mesh_System"');
    expect(() => resolveRuntimeConfig({ MESHCTL_DOCS_URL: 'ftp://docs.example.test' })).toThrow(
      'Invalid MESHCTL_DOCS_URL. It must use http or https.'
    );
    expect(() => resolveRuntimeConfig({ MESHCTL_DOCS_URL: 'not a url' })).toThrow('Invalid MESHCTL_DOCS_URL: not a url');
  });
});
