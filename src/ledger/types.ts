import type { ConfigSource, IdentityOutcome, StepName } from '../control-plane/types.js';
import type { ReconcileErrorKind } from '../reconcile/errors.js';

export interface ReconciliationLedger {
  invocationId: string;
  timestamp: string;
  cliVersion: string;
  source: ConfigSource;
  namespace: string;
  executedSteps: StepName[];
  durationsMs: Record<string, number>;
  identityOutcome?: IdentityOutcome;
  appliedRecordedFlags: string[];
  ignoredRecordedFlags: string[];
  passed: boolean;
  failureKind?: ReconcileErrorKind;
  failureReason?: string;
}
