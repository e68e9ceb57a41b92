import { CONFIG_FILENAME } from '../config/loader.js';
import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('tidytree')} ${dimText('— source tree checker and fixer')}`
    : 'tidytree — source tree checker and fixer';

  const lines = [
    title,
    '',
    'Usage: tidytree <command> [options]',
    '',
    formatSection('Commands', [
      ['help', 'Show this help'],
      ['check', 'Scan a folder or file and report (or fix) issues'],
      ['tasks', 'List the checks and fixers in pipeline order'],
      ['init', `Write a ${CONFIG_FILENAME} with the default settings`],
    ]),
    '',
    formatSection('Global flags', [
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Modes', [
      ['Read-only (default)', 'Fixable issues are reported as FOUND and fail the run'],
      ['Fix (--fix)', 'Fixable issues are corrected in place; only errors fail the run'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', `Nearest ${CONFIG_FILENAME} (walks up from cwd)`],
      ['Global config', '~/.config/tidytree/config.json'],
      ['Key fields', 'accept, ignore (glob masks), eol, normalizeEol, strictTypes, tabIndentation, progress'],
    ]),
    '',
    formatSection('Exit status', [
      ['0', 'No unresolved findings'],
      ['1', 'At least one file failed, or invalid usage'],
      ['2', 'Startup failure (missing path, invalid config)'],
    ]),
    '',
    dimText('Run `tidytree <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
