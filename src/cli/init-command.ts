import fs from 'node:fs';
import { ConfigSchema, getDefaultProjectConfigPath } from '../config/loader.js';
import { CliUsageError } from './errors.js';
import { assertNoExtraArgs, extractBooleanFlags, extractFlags } from './flag-utils.js';

interface InitOptions {
  configPath: string;
  force: boolean;
  dryRun: boolean;
}

export function handleInitCommand(args: string[]): void {
  const options = parseInitFlags(args);
  runInit(options);
}

export function printInitHelp(): void {
  console.log(`Usage: tidytree init [options]

Write a project config file with the default settings.

Options:
  --config <path>        Path for project config file (default: .tidytree.json)
  --force                Overwrite an existing config file
  --dry-run              Print the config without writing it
  -h, --help             Show help
`);
}

function parseInitFlags(args: string[]): InitOptions {
  const boolFlags = extractBooleanFlags(args, ['--force', '--dry-run']);
  const valueFlags = extractFlags(args, ['--config']);
  assertNoExtraArgs(args);

  return {
    configPath: valueFlags['--config'] ?? getDefaultProjectConfigPath(),
    force: boolFlags.has('--force'),
    dryRun: boolFlags.has('--dry-run'),
  };
}

function runInit(options: InitOptions): void {
  const { configPath, force, dryRun } = options;
  const contents = JSON.stringify(ConfigSchema.parse({}), null, 2) + '\n';

  if (dryRun) {
    console.log(`(dry-run) Would write: ${configPath}`);
    console.log(contents);
    return;
  }

  if (!force && fs.existsSync(configPath)) {
    throw new CliUsageError(`File already exists: ${configPath}. Use --force to overwrite.`);
  }

  fs.writeFileSync(configPath, contents, 'utf-8');
  console.log(`Created: ${configPath}`);
}
