import { StepTimer } from '../utils/timer.js';
import { Err, Ok, type Result } from '../utils/result.js';
import { logger } from '../utils/logger.js';
import { buildLedger, writeLedger } from '../ledger/ledger.js';
import type { ReconciliationLedger } from '../ledger/types.js';
import { renderManifest } from '../render/manifest.js';
import { ReconcileError, assertPrecondition, type ReconcileErrorKind } from '../reconcile/errors.js';
import { buildWorkflow, expectStage } from './workflow.js';
import type {
  ConfigSource,
  ReconcileDeps,
  ReconciledValues,
  UpgradeContext,
  UpgradeRequest,
  WorkflowPlan,
} from './types.js';

export const OK_STATUS = '√';
export const FAIL_STATUS = '×';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface UpgradeIO {
  stdout: OutputStream;
  stderr: OutputStream;
}

export interface UpgradeSettings {
  source: ConfigSource;
  docsUrl: string;
  ledgerOut?: string;
}

export function createContext(request: UpgradeRequest, deps: ReconcileDeps): UpgradeContext {
  return {
    request,
    deps,
    appliedRecordedFlags: [],
    ignoredRecordedFlags: [],
    stepResults: [],
  };
}

/**
 * Runs every step in order and stops at the first failure. Reconcile errors
 * come back as a failed result; anything else is a bug and is rethrown.
 */
export async function runReconciliation(
  ctx: UpgradeContext,
  plan: WorkflowPlan = buildWorkflow()
): Promise<Result<ReconciledValues, ReconcileError>> {
  assertPrecondition(!ctx.request.ignoreCluster, 'ignore-cluster must be unset for upgrades');

  const timer = new StepTimer();
  for (const step of plan.steps) {
    timer.begin();
    logger.debug({ step: step.name }, 'step started');

    try {
      await step.execute(ctx);
    } catch (err) {
      const duration = timer.elapsed();
      if (!(err instanceof ReconcileError)) {
        throw err;
      }
      ctx.stepResults.push({
        name: step.name,
        status: 'failed',
        durationMs: duration,
        error: err.message,
      });
      logger.error({ step: step.name, kind: err.kind, err }, 'step failed');
      return Err(err);
    }

    const duration = timer.elapsed();
    ctx.stepResults.push({ name: step.name, status: 'passed', durationMs: duration });
    logger.info({ step: step.name, durationMs: duration }, 'step passed');
  }

  return Ok(expectStage(ctx.values, 'build_values'));
}

export async function reconcile(
  request: UpgradeRequest,
  deps: ReconcileDeps
): Promise<Result<ReconciledValues, ReconcileError>> {
  return runReconciliation(createContext(request, deps));
}

export function formatSuccess(docsUrl: string): string {
  return (
    `\n${OK_STATUS} You're on your way to upgrading the control plane!\n` +
    `Visit this URL for further instructions: ${docsUrl}#nextsteps\n`
  );
}

/** Status line, optional hints and the troubleshooting pointer shared by every fatal report. */
export function formatFatal(message: string, docsUrl: string, hints: readonly string[] = []): string {
  return (
    `${FAIL_STATUS} ${message}\n` +
    hints.map((line) => `  - ${line}\n`).join('') +
    `For troubleshooting help, visit: ${docsUrl}#troubleshooting\n`
  );
}

export function formatFailure(error: ReconcileError, docsUrl: string): string {
  return formatFatal(
    `Failed to build upgrade configuration: ${error.message}`,
    docsUrl,
    remediation(error.kind)
  );
}

function remediation(kind: ReconcileErrorKind): string[] {
  switch (kind) {
    case 'FetchError':
      return [
        'Check that the current kubeconfig context can read config maps and secrets in the control-plane namespace',
        'Use --from-manifests to upgrade from a saved manifest bundle',
      ];
    case 'MalformedConfig':
      return ['The stored configuration is damaged; re-run with explicit flags for the invalid values'];
    case 'MalformedTrustAnchors':
    case 'MalformedIssuerCredential':
    case 'InvalidIssuerCredential':
      return [
        'The existing identity was not replaced; rotate the issuer credentials before upgrading',
      ];
    case 'GenerationError':
      return [];
  }
}

/** Returns the write error instead of throwing it, so it never hides the run's own outcome. */
async function tryWriteLedger(path: string, ledger: ReconciliationLedger): Promise<Error | undefined> {
  try {
    await writeLedger(path, ledger);
    return undefined;
  } catch (err) {
    logger.error({ err, path }, 'run ledger could not be written');
    return err instanceof Error ? err : new Error(String(err));
  }
}

function ledgerFailureMessage(path: string, err: Error): string {
  return `Could not write run ledger to ${path}: ${err.message}`;
}

/**
 * Reconciles, renders and writes the manifest. Output is all or nothing:
 * stdout receives the full manifest only after every step has passed and
 * the ledger, when requested, is on disk. Returns the process exit status.
 */
export async function runUpgrade(
  request: UpgradeRequest,
  deps: ReconcileDeps,
  io: UpgradeIO,
  settings: UpgradeSettings
): Promise<number> {
  const ctx = createContext(request, deps);
  const result = await runReconciliation(ctx);

  if (!result.ok) {
    io.stderr.write(formatFailure(result.error, settings.docsUrl));
    if (settings.ledgerOut) {
      const ledgerError = await tryWriteLedger(
        settings.ledgerOut,
        buildLedger(ctx, settings.source, result.error)
      );
      if (ledgerError) {
        io.stderr.write(formatFatal(ledgerFailureMessage(settings.ledgerOut, ledgerError), settings.docsUrl));
      }
    }
    return 1;
  }

  const manifest = renderManifest(result.value);
  if (settings.ledgerOut) {
    const ledgerError = await tryWriteLedger(settings.ledgerOut, buildLedger(ctx, settings.source));
    if (ledgerError) {
      io.stderr.write(formatFatal(ledgerFailureMessage(settings.ledgerOut, ledgerError), settings.docsUrl));
      return 1;
    }
  }

  io.stdout.write(manifest);
  io.stderr.write(formatSuccess(settings.docsUrl));
  return 0;
}
