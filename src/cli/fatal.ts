import { docsUrlOrDefault } from '../config/env.js';
import { formatFatal, type OutputStream } from '../control-plane/orchestrator.js';
import { PreconditionViolation, describeError } from '../reconcile/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Reports an error that escaped the command and returns the exit status.
 * A broken precondition is a bug and keeps its own status; anything else
 * gets the same status marker and troubleshooting pointer as a failed run.
 */
export function reportFatal(
  err: unknown,
  stderr: OutputStream,
  env: NodeJS.ProcessEnv = process.env
): number {
  if (err instanceof PreconditionViolation) {
    logger.fatal({ err }, 'internal precondition violated');
    stderr.write(`meshctl: internal error: ${err.message}\n`);
    return 2;
  }
  logger.error({ err }, 'command failed');
  stderr.write(formatFatal(describeError(err), docsUrlOrDefault(env)));
  return 1;
}
