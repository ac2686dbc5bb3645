import type { InstallRecord } from '../control-plane/types.js';

export interface RepairContext {
  generateUuid: () => string;
  cliVersion: string;
}

/**
 * Fills in what a stored install record is missing. A uuid is assigned once
 * and then kept; the CLI version always becomes the running one. Flags are
 * merged separately.
 */
export function repairInstall(install: InstallRecord, context: RepairContext): InstallRecord {
  return {
    uuid: install.uuid === '' ? context.generateUuid() : install.uuid,
    cliVersion: context.cliVersion,
    flags: install.flags.map((flag) => ({ ...flag })),
  };
}
