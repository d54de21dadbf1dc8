import type { Command } from '../types.js';
import { loadConfig, toRuntimeConfig, validateExternalConfig } from '../../config/loader.js';
import type { RetrievalConfig } from '../../config/retrieval-config.js';
import { STORAGE_OPTIONS, resolveCliConfig, UsageError } from '../utils.js';

/** Environment variables the configured providers read their keys from */
function requiredKeys(config: RetrievalConfig): string[] {
  const keys = new Set<string>(['OPENAI_API_KEY']);
  keys.add(config.judgeProvider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY');
  return [...keys];
}

export const configCommand: Command = {
  name: 'config',
  description: 'Show or validate the merged configuration',
  usage: 'studyrag config <show|validate> [options]',
  options: {
    '--runtime': 'show: print the flattened engine configuration',
    ...STORAGE_OPTIONS,
  },
  handler: async (args) => {
    const subcommand = args[0];

    switch (subcommand) {
      case 'show': {
        if (args.includes('--runtime')) {
          const { runtime } = resolveCliConfig(args.slice(1));
          console.log(JSON.stringify(runtime, null, 2));
        } else {
          console.log(JSON.stringify(loadConfig(), null, 2));
        }
        break;
      }
      case 'validate': {
        const resolved = loadConfig();
        const problems = validateExternalConfig(resolved);
        if (problems.length === 0) {
          const missing = requiredKeys(toRuntimeConfig(resolved)).filter((name) => !process.env[name]);
          problems.push(...missing.map((name) => `${name} is not set`));
        }
        if (problems.length === 0) {
          console.log('Configuration is valid.');
          break;
        }
        console.error('Configuration errors:');
        for (const problem of problems) {
          console.error(`  - ${problem}`);
        }
        process.exitCode = 3;
        break;
      }
      case undefined:
        throw new UsageError('Subcommand required');
      default:
        throw new UsageError(`Unknown subcommand: ${subcommand}`);
    }
  },
};
