#!/usr/bin/env node
import { handleCheckCommand, printCheckHelp } from './cli/check-command.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';
import { printHelp, printVersion } from './cli/help.js';
import { handleInitCommand, printInitHelp } from './cli/init-command.js';
import { handleTasksCommand, printTasksHelp } from './cli/tasks-command.js';

const VERSION = '0.1.0';

const EXIT_FAILURE = 1;
const EXIT_STARTUP_FAILURE = 2;

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    process.exit(EXIT_FAILURE);
    return;
  }

  // Global help/version flags only count before the command.
  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return;
  }

  const command = args.shift();

  if (!command) {
    printHelp();
    process.exit(EXIT_FAILURE);
    return;
  }

  const helpFlags = extractBooleanFlags(args, ['--help', '-h']);
  const showHelp = helpFlags.has('--help') || helpFlags.has('-h');

  try {
    switch (command) {
      case 'help':
        printHelp();
        break;

      case 'check':
        if (showHelp) {
          printCheckHelp();
        } else {
          handleCheckCommand(args);
        }
        break;

      case 'tasks':
        if (showHelp) {
          printTasksHelp();
        } else {
          handleTasksCommand(args);
        }
        break;

      case 'init':
        if (showHelp) {
          printInitHelp();
        } else {
          handleInitCommand(args);
        }
        break;

      default:
        printHelp(`Unknown command '${command}'.`);
        process.exit(EXIT_FAILURE);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(EXIT_FAILURE);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(EXIT_STARTUP_FAILURE);
      return;
    }
    throw error;
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error);
  process.exit(EXIT_STARTUP_FAILURE);
}
