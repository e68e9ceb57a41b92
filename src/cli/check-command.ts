import fs from 'node:fs';
import path from 'node:path';
import { Reporter, runChecker, type OutputStream, type RunResult } from '../checker/index.js';
import { loadConfig, type Config } from '../config/loader.js';
import { createTaskRegistry, type TaskSelection } from '../tasks/index.js';
import { PathNotFoundError, UnsupportedPathError } from './errors.js';
import { assertNoExtraArgs, extractBooleanFlags, extractFlags, extractMultipleFlags } from './flag-utils.js';
import { supportsAnsiColor } from './terminal.js';

export interface CheckOptions {
  root: string;
  accept: string[];
  ignore: string[];
  readOnly: boolean;
  showProgress: boolean;
  colors: boolean;
  selection: TaskSelection;
}

export function handleCheckCommand(args: string[], stream?: OutputStream): void {
  const options = parseCheckFlags(args);
  const result = runCheck(options, stream);
  process.exitCode = result.success ? 0 : 1;
}

export function parseCheckFlags(args: string[]): CheckOptions {
  const boolFlags = extractBooleanFlags(args, [
    '--fix',
    '-f',
    '--eol',
    '-l',
    '--no-progress',
    '--strict-types',
    '--tabs',
    '--no-color',
  ]);
  const valueFlags = extractFlags(args, ['-d', '--config', '-c']);
  const ignoreMasks = extractMultipleFlags(args, ['--ignore', '-i']);
  const acceptMasks = extractMultipleFlags(args, ['--accept']);
  assertNoExtraArgs(args);

  const config = loadConfig(valueFlags['--config'] ?? valueFlags['-c']);

  return resolveCheckOptions(config, {
    root: valueFlags['-d'] ?? process.cwd(),
    acceptMasks,
    ignoreMasks,
    fix: boolFlags.has('--fix') || boolFlags.has('-f'),
    eol: boolFlags.has('--eol') || boolFlags.has('-l'),
    noProgress: boolFlags.has('--no-progress'),
    strictTypes: boolFlags.has('--strict-types'),
    tabs: boolFlags.has('--tabs'),
    colors: supportsAnsiColor && !boolFlags.has('--no-color'),
  });
}

export interface CheckFlags {
  root: string;
  acceptMasks: string[];
  ignoreMasks: string[];
  fix: boolean;
  eol: boolean;
  noProgress: boolean;
  strictTypes: boolean;
  tabs: boolean;
  colors: boolean;
}

/** Flags extend the configured glob sets and can only switch optional tasks on. */
export function resolveCheckOptions(config: Config, flags: CheckFlags): CheckOptions {
  const selection: TaskSelection = {
    strictTypes: config.strictTypes || flags.strictTypes,
    tabIndentation: config.tabIndentation || flags.tabs,
  };
  if (config.normalizeEol || flags.eol) {
    selection.eol = config.eol;
  }

  return {
    root: path.resolve(flags.root),
    accept: [...config.accept, ...flags.acceptMasks],
    ignore: [...config.ignore, ...flags.ignoreMasks],
    readOnly: !flags.fix,
    showProgress: config.progress && !flags.noProgress,
    colors: flags.colors,
    selection,
  };
}

export function runCheck(options: CheckOptions, stream?: OutputStream): RunResult {
  if (!fs.existsSync(options.root)) {
    throw new PathNotFoundError(options.root);
  }
  const stats = fs.statSync(options.root);
  if (!stats.isFile() && !stats.isDirectory()) {
    throw new UnsupportedPathError(options.root);
  }

  const reporter = new Reporter({
    colors: options.colors,
    readOnly: options.readOnly,
    showProgress: options.showProgress,
    stream,
  });

  return runChecker({
    root: options.root,
    accept: options.accept,
    ignore: options.ignore,
    registry: createTaskRegistry(options.selection),
    reporter,
  });
}

export function printCheckHelp(): void {
  const lines = [
    'Usage: tidytree check [options]',
    '',
    'Check a folder or file and optionally fix what can be fixed.',
    '',
    'Options:',
    '  -d <path>              Folder or file to scan (default: current directory)',
    '  --ignore, -i <mask>    Files or folders to ignore (repeatable)',
    '  --accept <mask>        Additional files to scan (repeatable)',
    '  --fix, -f              Fix files (read-only otherwise)',
    '  --eol, -l              Convert newline characters',
    '  --no-progress          Do not show progress dots',
    '  --strict-types         Check that PHP files declare strict_types=1',
    '  --tabs                 Require tab indentation in code files',
    '  --no-color             Disable colored output',
    '  --config, -c <path>    Path to config file',
    '',
    'Examples:',
    '  tidytree check',
    '  tidytree check -d src --fix',
    '  tidytree check -i "docs/generated" -i "*.lock"',
  ];
  console.log(lines.join('\n'));
}
