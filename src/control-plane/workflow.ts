import { fetchConfigs } from '../store/fetcher.js';
import { repairInstall } from '../reconcile/repair.js';
import { reconcileFlags, withRecordedFlags } from '../reconcile/flags.js';
import { resolveUpgradeOptions } from '../reconcile/options.js';
import { applyOptions } from '../reconcile/overlay.js';
import { resolveIdentity } from '../reconcile/identity.js';
import { buildValues } from '../reconcile/values.js';
import { assertPrecondition } from '../reconcile/errors.js';
import { logger } from '../utils/logger.js';
import type { StepName, WorkflowPlan } from './types.js';

export function expectStage<T>(value: T | undefined, produced: StepName): T {
  assertPrecondition(value !== undefined, `step "${produced}" has not produced its output`);
  return value;
}

/** Fetch → repair → merge flags → resolve identity → build values. */
export function buildWorkflow(): WorkflowPlan {
  return {
    steps: [
      {
        name: 'fetch',
        execute: async (ctx) => {
          ctx.stored = await fetchConfigs(ctx.deps.reader, ctx.request.namespace);
        },
      },
      {
        name: 'repair',
        execute: async (ctx) => {
          const stored = expectStage(ctx.stored, 'fetch');
          ctx.install = repairInstall(stored.install, {
            generateUuid: ctx.deps.generateUuid,
            cliVersion: ctx.deps.cliVersion,
          });
        },
      },
      {
        name: 'merge_flags',
        execute: async (ctx) => {
          const stored = expectStage(ctx.stored, 'fetch');
          const install = expectStage(ctx.install, 'repair');

          const merged = reconcileFlags(install.flags, ctx.request.flags);
          for (const name of merged.ignored) {
            logger.warn({ flag: name }, 'recorded flag is no longer supported; ignoring it');
          }

          const options = resolveUpgradeOptions(merged.flags, ctx.request.namespace);
          ctx.flags = merged.flags;
          ctx.options = options;
          ctx.appliedRecordedFlags = merged.applied;
          ctx.ignoredRecordedFlags = merged.ignored;
          ctx.install = withRecordedFlags(install, merged.flags);
          ctx.global = applyOptions(stored.global, options, ctx.deps.cliVersion);
        },
      },
      {
        name: 'resolve_identity',
        execute: async (ctx) => {
          const global = expectStage(ctx.global, 'merge_flags');
          const options = expectStage(ctx.options, 'merge_flags');

          const trustDomainFlag = ctx.flags?.get('identity-trust-domain');
          if (
            global.identity.kind === 'present' &&
            trustDomainFlag?.source === 'explicit' &&
            trustDomainFlag.value !== global.identity.context.trustDomain
          ) {
            logger.warn(
              { requested: trustDomainFlag.value, existing: global.identity.context.trustDomain },
              'existing identity is kept; --identity-trust-domain only applies to a new identity'
            );
          }

          ctx.identity = await resolveIdentity(global.identity, options, {
            reader: ctx.deps.reader,
            generateIdentity: ctx.deps.generateIdentity,
            now: ctx.deps.now,
          });
          logger.info({ outcome: ctx.identity.outcome }, 'identity resolved');
        },
      },
      {
        name: 'build_values',
        execute: async (ctx) => {
          ctx.values = buildValues(
            expectStage(ctx.global, 'merge_flags'),
            expectStage(ctx.install, 'merge_flags'),
            expectStage(ctx.identity, 'resolve_identity'),
            expectStage(ctx.options, 'merge_flags')
          );
        },
      },
    ],
  };
}
