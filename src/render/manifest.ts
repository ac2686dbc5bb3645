import YAML from 'yaml';
import {
  CONFIG_MAP_NAME,
  ISSUER_CRT_NAME,
  ISSUER_KEY_NAME,
  ISSUER_SECRET_NAME,
} from '../store/cluster.js';
import { serializeGlobal, serializeInstall, serializeProxy } from '../store/documents.js';
import type { ReconciledValues } from '../control-plane/types.js';

export const CONTROLLER_IMAGE = 'mesh/controller';

const COMPONENT_LABEL = 'mesh.io/control-plane-component';

function base64(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

function configMap(values: ReconciledValues) {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: {
      name: CONFIG_MAP_NAME,
      namespace: values.namespace,
      labels: { [COMPONENT_LABEL]: 'controller' },
    },
    data: {
      global: serializeGlobal(values.global),
      proxy: serializeProxy(values.global.proxy),
      install: serializeInstall(values.install),
    },
  };
}

function issuerSecret(values: ReconciledValues) {
  const { issuer } = values.identity;
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    type: 'Opaque',
    metadata: {
      name: ISSUER_SECRET_NAME,
      namespace: values.namespace,
      labels: { [COMPONENT_LABEL]: 'identity' },
      annotations: { [issuer.crtExpiryAnnotation]: issuer.crtExpiry },
    },
    data: {
      [ISSUER_CRT_NAME]: base64(issuer.crtPem),
      [ISSUER_KEY_NAME]: base64(issuer.keyPem),
    },
  };
}

function identityDeployment(values: ReconciledValues) {
  const labels = { [COMPONENT_LABEL]: 'identity' };
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: 'mesh-identity', namespace: values.namespace, labels },
    spec: {
      replicas: values.identity.replicas,
      selector: { matchLabels: labels },
      template: {
        metadata: { labels },
        spec: {
          containers: [
            {
              name: 'identity',
              image: `${CONTROLLER_IMAGE}:${values.global.version}`,
              args: [
                'identity',
                `-log-level=${values.controllerLogLevel}`,
                `-trust-domain=${values.identity.trustDomain}`,
                `-issuance-lifetime=${values.identity.issuer.issuanceLifetime}`,
                `-clock-skew-allowance=${values.identity.issuer.clockSkewAllowance}`,
              ],
              volumeMounts: [{ name: 'identity-issuer', mountPath: '/var/run/mesh/identity/issuer' }],
            },
          ],
          volumes: [{ name: 'identity-issuer', secret: { secretName: ISSUER_SECRET_NAME } }],
        },
      },
    },
  };
}

/** Renders the reconciled values as a multi-document YAML stream. */
export function renderManifest(values: ReconciledValues): string {
  const documents = [configMap(values), issuerSecret(values), identityDeployment(values)];
  return documents.map((document) => `---\n${YAML.stringify(document, { lineWidth: 0 })}`).join('');
}
