import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ConfigSource, UpgradeContext } from '../control-plane/types.js';
import type { ReconcileError } from '../reconcile/errors.js';
import type { ReconciliationLedger } from './types.js';

/** Summarizes a run. Only names and outcomes are kept, never key material. */
export function buildLedger(
  ctx: UpgradeContext,
  source: ConfigSource,
  failure?: ReconcileError
): ReconciliationLedger {
  const durationsMs: Record<string, number> = {};
  for (const result of ctx.stepResults) {
    durationsMs[result.name] = result.durationMs;
  }

  return {
    invocationId: ctx.request.invocationId,
    timestamp: ctx.deps.now().toISOString(),
    cliVersion: ctx.deps.cliVersion,
    source,
    namespace: ctx.request.namespace,
    executedSteps: ctx.stepResults.map((result) => result.name),
    durationsMs,
    identityOutcome: ctx.identity?.outcome,
    appliedRecordedFlags: [...ctx.appliedRecordedFlags],
    ignoredRecordedFlags: [...ctx.ignoredRecordedFlags],
    passed: failure === undefined,
    failureKind: failure?.kind,
    failureReason: failure?.message,
  };
}

export async function writeLedger(path: string, ledger: ReconciliationLedger): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(ledger, null, 2)}\n`);
}
