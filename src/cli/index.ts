#!/usr/bin/env node
/**
 * studyrag command-line interface
 *
 * Usage: studyrag <command> [options]
 */

import type { Command } from './types.js';
import { configCommand } from './commands/config.js';
import { infoCommand } from './commands/info.js';
import { loadCommand } from './commands/load.js';
import { scenarioCommand } from './commands/scenario.js';
import { searchCommand } from './commands/search.js';
import { UsageError } from './utils.js';
import { RagError, errorMessage } from '../utils/errors.js';

const VERSION = '0.1.0';

const commands: Command[] = [loadCommand, searchCommand, scenarioCommand, infoCommand, configCommand];

function showHelp(): void {
  console.log('studyrag: retrieval and reranking over a study corpus');
  console.log('');
  console.log('Usage: studyrag <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('');
  console.log('Run "studyrag <command> --help" for command-specific help.');
}

function showCommandHelp(command: Command): void {
  console.log(`Usage: ${command.usage}`);
  console.log('');
  console.log(command.description);
  const options = Object.entries(command.options ?? {});
  if (options.length > 0) {
    const width = Math.max(...options.map(([flag]) => flag.length)) + 2;
    console.log('');
    console.log('Options:');
    for (const [flag, text] of options) {
      console.log(`  ${flag.padEnd(width)}${text}`);
    }
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`studyrag ${VERSION}`);
    return;
  }

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "studyrag --help" for available commands.');
    process.exit(2);
  }

  if (args.includes('--help') || args.includes('-h')) {
    showCommandHelp(command);
    return;
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.log(`Usage: ${command.usage}`);
      process.exit(2);
    }
    console.error(error instanceof RagError ? error.toDetailedString() : `Error: ${errorMessage(error)}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
