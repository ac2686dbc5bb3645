import { InvalidArgumentError, Option, type Command } from 'commander';
import {
  FLAG_DEFINITIONS,
  FlagValueError,
  normalizeFlagValue,
  type FlagDefinition,
} from '../reconcile/flag-schema.js';
import type { FlagEntry, FlagSet } from '../control-plane/types.js';

function placeholder(definition: FlagDefinition): string {
  switch (definition.kind) {
    case 'boolean':
      return '[enabled]';
    case 'count':
      return '<count>';
    case 'port':
      return '<port>';
    case 'portList':
      return '<ports>';
    case 'duration':
      return '<duration>';
    default:
      return '<value>';
  }
}

function flagOption(definition: FlagDefinition): Option {
  return new Option(`--${definition.name} ${placeholder(definition)}`, definition.description)
    .default(definition.defaultValue)
    .argParser((raw: string) => {
      try {
        return normalizeFlagValue(definition, raw);
      } catch (err) {
        if (err instanceof FlagValueError) {
          throw new InvalidArgumentError(err.message);
        }
        throw err;
      }
    });
}

export function registerFlags(command: Command): Command {
  for (const definition of FLAG_DEFINITIONS) {
    command.addOption(flagOption(definition));
  }
  return command;
}

/**
 * Snapshots the parsed command into a fresh flag set. Only values the user
 * typed (or supplied through the environment) count as explicit.
 */
export function collectFlagSet(command: Command): FlagSet {
  const flags = new Map<string, FlagEntry>();
  for (const definition of FLAG_DEFINITIONS) {
    const key = new Option(`--${definition.name}`).attributeName();
    const source = command.getOptionValueSource(key);
    if (source === 'cli' || source === 'env') {
      const value: unknown = command.getOptionValue(key);
      flags.set(definition.name, { name: definition.name, value: String(value), source: 'explicit' });
    } else {
      flags.set(definition.name, { name: definition.name, value: definition.defaultValue, source: 'default' });
    }
  }
  return flags;
}
