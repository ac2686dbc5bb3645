import type { FlagEntry, FlagSet, InstallRecord, RecordedFlag } from '../control-plane/types.js';

export interface FlagMergeResult {
  flags: FlagSet;
  /** Recorded names that replaced a default value. */
  applied: string[];
  /** Recorded names the current flag set no longer knows. */
  ignored: string[];
}

export function isChanged(entry: FlagEntry): boolean {
  return entry.source !== 'default';
}

/**
 * Applies flags recorded by a previous install or upgrade. A recorded value
 * only replaces a flag still at its default, giving the precedence
 * explicit > recorded > default. Returns a new map; `current` is untouched.
 */
export function reconcileFlags(recorded: readonly RecordedFlag[], current: FlagSet): FlagMergeResult {
  const flags = new Map(current);
  const applied: string[] = [];
  const ignored: string[] = [];

  for (const { name, value } of recorded) {
    const entry = flags.get(name);
    if (!entry) {
      ignored.push(name);
      continue;
    }
    if (isChanged(entry)) continue;

    flags.set(name, { name, value, source: 'recorded' });
    applied.push(name);
  }

  return { flags, applied, ignored };
}

/** The flags worth persisting: every one that is not at its default. */
export function recordFlags(flags: FlagSet): RecordedFlag[] {
  const recorded: RecordedFlag[] = [];
  for (const entry of flags.values()) {
    if (isChanged(entry)) {
      recorded.push({ name: entry.name, value: entry.value });
    }
  }
  return recorded;
}

export function withRecordedFlags(install: InstallRecord, flags: FlagSet): InstallRecord {
  return { ...install, flags: recordFlags(flags) };
}
