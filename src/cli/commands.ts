import { Command } from 'commander';
import { generateInvocationId, generateUuid } from '../utils/id.js';
import { logger } from '../utils/logger.js';
import { resolveRuntimeConfig } from '../config/env.js';
import { CLI_VERSION } from '../config/version.js';
import { runUpgrade } from '../control-plane/orchestrator.js';
import { KubeClusterReader } from '../store/kube-client.js';
import { ManifestClusterReader } from '../store/manifests.js';
import type { ClusterReader } from '../store/cluster.js';
import { generateIdentity } from '../tls/generate.js';
import { collectFlagSet, registerFlags } from './flags.js';

interface UpgradeCommandOptions {
  fromManifests?: string;
  kubeconfig?: string;
  context?: string;
  namespace?: string;
  ledgerOut?: string;
  verbose?: boolean;
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('meshctl')
    .description('Manage a service-mesh control plane.')
    .version(CLI_VERSION);

  const upgrade = program
    .command('upgrade')
    .description(
      'Output Kubernetes configs to upgrade an existing control plane.\n\n' +
      'Default flag values for this command come from the installed control plane:\n' +
      'a flag not given here keeps the value recorded by the previous install or upgrade.'
    )
    // Not part of the recorded flag set: these never persist into the install record.
    .option('--from-manifests <path>', 'Read config from a saved install manifest rather than the cluster ("-" for stdin)')
    .option('--kubeconfig <path>', 'Path to the kubeconfig file (defaults to $KUBECONFIG or ~/.kube/config)')
    .option('--context <name>', 'Kubeconfig context to use')
    .option('--namespace <ns>', 'Namespace of the control plane')
    .option('--ledger-out <path>', 'Write a JSON record of the run to this path')
    .option('--verbose', 'Log each step to stderr');

  registerFlags(upgrade);

  upgrade.action(async (_opts: unknown, command: Command) => {
    const opts = command.opts<UpgradeCommandOptions>();
    if (opts.verbose) {
      logger.level = 'debug';
    }

    const runtime = resolveRuntimeConfig(process.env, {
      namespace: opts.namespace,
      kubeconfig: opts.kubeconfig,
    });
    let reader: ClusterReader;
    let kubeReader: KubeClusterReader | undefined;
    if (opts.fromManifests) {
      reader = ManifestClusterReader.fromPath(opts.fromManifests);
    } else {
      kubeReader = new KubeClusterReader({ kubeconfigPath: runtime.kubeconfigPath, context: opts.context });
      reader = kubeReader;
    }

    try {
      process.exitCode = await runUpgrade(
        {
          invocationId: generateInvocationId(),
          namespace: runtime.namespace,
          flags: collectFlagSet(command),
          ignoreCluster: false,
        },
        {
          reader,
          generateUuid,
          generateIdentity,
          now: () => new Date(),
          cliVersion: CLI_VERSION,
        },
        { stdout: process.stdout, stderr: process.stderr },
        {
          source: opts.fromManifests ? 'manifests' : 'cluster',
          docsUrl: runtime.docsUrl,
          ledgerOut: opts.ledgerOut,
        }
      );
    } finally {
      await kubeReader?.close();
    }
  });

  return program;
}
