import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

const kubeconfigSchema = z.object({
  'current-context': z.string().optional(),
  clusters: z
    .array(
      z.object({
        name: z.string(),
        cluster: z.object({
          server: z.string(),
          'certificate-authority': z.string().optional(),
          'certificate-authority-data': z.string().optional(),
          'insecure-skip-tls-verify': z.boolean().optional(),
        }),
      })
    )
    .nullish(),
  users: z
    .array(
      z.object({
        name: z.string(),
        user: z
          .object({
            token: z.string().optional(),
            tokenFile: z.string().optional(),
            'client-certificate': z.string().optional(),
            'client-certificate-data': z.string().optional(),
            'client-key': z.string().optional(),
            'client-key-data': z.string().optional(),
            exec: z.unknown().optional(),
            'auth-provider': z.unknown().optional(),
          })
          .nullish(),
      })
    )
    .nullish(),
  contexts: z
    .array(
      z.object({
        name: z.string(),
        context: z.object({
          cluster: z.string(),
          user: z.string().optional(),
        }),
      })
    )
    .nullish(),
});

export interface KubeConnectionSettings {
  context: string;
  server: string;
  ca?: string;
  cert?: string;
  key?: string;
  token?: string;
  insecureSkipTlsVerify: boolean;
}

async function readMaterial(
  baseDir: string,
  inline: string | undefined,
  file: string | undefined
): Promise<string | undefined> {
  if (inline) {
    return Buffer.from(inline, 'base64').toString('utf-8');
  }
  if (file) {
    return readFile(isAbsolute(file) ? file : resolve(baseDir, file), 'utf-8');
  }
  return undefined;
}

/**
 * Resolves the server and credentials for one kubeconfig context. Relative
 * file references are resolved against the kubeconfig's own directory.
 */
export async function loadKubeconfig(path: string, contextName?: string): Promise<KubeConnectionSettings> {
  const raw = await readFile(path, 'utf-8');
  const parsed = kubeconfigSchema.safeParse(YAML.parse(raw));
  if (!parsed.success) {
    throw new Error(`${path} is not a valid kubeconfig: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }

  const config = parsed.data;
  const name = contextName ?? config['current-context'];
  if (!name) {
    throw new Error(`${path} has no current-context; pass --context`);
  }

  const context = config.contexts?.find((entry) => entry.name === name)?.context;
  if (!context) {
    throw new Error(`context "${name}" not found in ${path}`);
  }
  const cluster = config.clusters?.find((entry) => entry.name === context.cluster)?.cluster;
  if (!cluster) {
    throw new Error(`cluster "${context.cluster}" not found in ${path}`);
  }
  const user = context.user
    ? config.users?.find((entry) => entry.name === context.user)?.user ?? undefined
    : undefined;

  if (user?.exec !== undefined || user?.['auth-provider'] !== undefined) {
    throw new Error(
      `user "${context.user}" uses a credential plugin, which is not supported; use a token or client certificate`
    );
  }

  const baseDir = dirname(path);
  const tokenFromFile = user?.tokenFile ? await readFile(resolve(baseDir, user.tokenFile), 'utf-8') : undefined;

  return {
    context: name,
    server: cluster.server,
    ca: await readMaterial(baseDir, cluster['certificate-authority-data'], cluster['certificate-authority']),
    cert: await readMaterial(baseDir, user?.['client-certificate-data'], user?.['client-certificate']),
    key: await readMaterial(baseDir, user?.['client-key-data'], user?.['client-key']),
    token: user?.token ?? tokenFromFile?.trim(),
    insecureSkipTlsVerify: cluster['insecure-skip-tls-verify'] ?? false,
  };
}
