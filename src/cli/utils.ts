/**
 * Shared CLI utilities.
 */

import {
  loadConfig,
  toRuntimeConfig,
  validateExternalConfig,
  type ExternalConfig,
  type ResolvedConfig,
} from '../config/loader.js';
import type { RetrievalConfig } from '../config/retrieval-config.js';
import type { CommandOptions } from './types.js';
import { isContentType, type SearchFilter } from '../storage/types.js';
import { ConfigError } from '../utils/errors.js';

/** Options every command that opens the index accepts */
export const STORAGE_OPTIONS: CommandOptions = {
  '--db <path>': 'Index database (overrides storage.dbPath)',
  '--collection <name>': 'Corpus collection (overrides storage.collection)',
};

/** Flags that take a value; everything else starting with -- is boolean */
const VALUE_FLAGS = new Set([
  '--k',
  '--candidates',
  '--chapter',
  '--type',
  '--threshold',
  '--db',
  '--collection',
  '--id',
]);

/**
 * Value following a flag, or undefined when the flag is absent.
 */
export function getFlag(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index < 0) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function getIntFlag(args: string[], flag: string): number | undefined {
  const raw = getFlag(args, flag);
  if (raw === undefined) return undefined;
  if (!/^-?\d+$/.test(raw)) {
    throw new UsageError(`${flag} must be an integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

export function getNumberFlag(args: string[], flag: string): number | undefined {
  const raw = getFlag(args, flag);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new UsageError(`${flag} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Arguments that are neither flags nor flag values.
 */
export function positionalArgs(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
    } else if (!arg.startsWith('--')) {
      result.push(arg);
    }
  }
  return result;
}

export function parseFilter(args: string[]): SearchFilter {
  const chapterNum = getFlag(args, '--chapter');
  const contentType = getFlag(args, '--type');
  if (contentType !== undefined && !isContentType(contentType)) {
    throw new UsageError(`--type must be one of video, text, chapter_intro; got "${contentType}"`);
  }
  return {
    ...(chapterNum !== undefined ? { chapterNum } : {}),
    ...(contentType !== undefined ? { contentType } : {}),
  };
}

/**
 * Resolve configuration with --db / --collection applied on top.
 *
 * @throws ConfigError when the merged configuration is invalid
 */
export function resolveCliConfig(args: string[]): { resolved: ResolvedConfig; runtime: RetrievalConfig } {
  const dbPath = getFlag(args, '--db');
  const collection = getFlag(args, '--collection');
  const cliOverrides: ExternalConfig = {
    storage: {
      ...(dbPath !== undefined ? { dbPath } : {}),
      ...(collection !== undefined ? { collection } : {}),
    },
  };

  const resolved = loadConfig({ cliOverrides });
  const errors = validateExternalConfig(resolved);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }
  return { resolved, runtime: toRuntimeConfig(resolved) };
}

/**
 * Bad command-line usage; reported with exit code 2.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
