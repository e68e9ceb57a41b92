import { loadConfig } from '../config/loader.js';
import { describeTasks, type TaskSelection } from '../tasks/index.js';
import { assertNoExtraArgs, extractFlags } from './flag-utils.js';
import { boldText, dimText } from './terminal.js';

export function handleTasksCommand(args: string[]): void {
  const valueFlags = extractFlags(args, ['--config', '-c']);
  assertNoExtraArgs(args);

  const config = loadConfig(valueFlags['--config'] ?? valueFlags['-c']);
  const selection: TaskSelection = {
    strictTypes: config.strictTypes,
    tabIndentation: config.tabIndentation,
  };
  if (config.normalizeEol) {
    selection.eol = config.eol;
  }

  console.log(formatTaskList(selection).join('\n'));
}

export function formatTaskList(selection: TaskSelection): string[] {
  const entries = describeTasks(selection);
  const width = Math.max(...entries.map((entry) => entry.name.length));

  return entries.map((entry, index) => {
    const position = String(index + 1).padStart(2);
    const name = entry.enabled ? boldText(entry.name.padEnd(width)) : dimText(entry.name.padEnd(width));
    const pattern = entry.pattern ?? '*';
    const state = entry.enabled ? '' : dimText(` (off, enable with ${entry.option ?? 'config'})`);
    return `${position}. ${name}  ${pattern}${state}`;
  });
}

export function printTasksHelp(): void {
  console.log(`Usage: tidytree tasks [options]

List the checks and fixers in pipeline order, with the files they apply to.

Options:
  --config, -c <path>  Path to config file
  -h, --help           Show help
`);
}
