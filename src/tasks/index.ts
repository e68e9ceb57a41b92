import { TaskRegistry } from '../checker/registry.js';
import type { TaskHandler } from '../checker/types.js';
import type { Eol } from '../config/loader.js';
import { bomFixer } from './bom.js';
import { controlCharactersChecker } from './control-characters.js';
import { jsonSyntaxChecker } from './json-syntax.js';
import { createNewlineNormalizer } from './newline.js';
import { strictTypesChecker } from './strict-types.js';
import { tabIndentationChecker } from './tab-indentation.js';
import { trailingPhpTagRemover } from './trailing-php-tag.js';
import { trailingWhitespaceFixer } from './trailing-whitespace.js';
import { unexpectedTabsChecker } from './unexpected-tabs.js';
import { utf8Checker } from './utf8.js';

export interface TaskSelection {
  /** Line ending to normalize to; normalization is off when absent. */
  eol?: Eol;
  strictTypes: boolean;
  tabIndentation: boolean;
}

export interface TaskEntry {
  name: string;
  handler: TaskHandler;
  pattern?: string;
  /** Flag that turns an optional task on. */
  option?: string;
  enabled: boolean;
}

const PHP = '*.php,*.phpt';

export function describeTasks(selection: TaskSelection): TaskEntry[] {
  return [
    { name: 'controlCharactersChecker', handler: controlCharactersChecker, enabled: true },
    { name: 'bomFixer', handler: bomFixer, enabled: true },
    { name: 'utf8Checker', handler: utf8Checker, enabled: true },
    {
      name: 'strictTypesChecker',
      handler: strictTypesChecker,
      pattern: PHP,
      option: '--strict-types',
      enabled: selection.strictTypes,
    },
    {
      name: 'newlineNormalizer',
      handler: createNewlineNormalizer(selection.eol ?? 'lf'),
      pattern: '!*.sh,*.bat',
      option: '--eol',
      enabled: selection.eol !== undefined,
    },
    { name: 'trailingPhpTagRemover', handler: trailingPhpTagRemover, pattern: PHP, enabled: true },
    { name: 'jsonSyntaxChecker', handler: jsonSyntaxChecker, pattern: '*.json', enabled: true },
    { name: 'trailingWhitespaceFixer', handler: trailingWhitespaceFixer, enabled: true },
    {
      name: 'tabIndentationChecker',
      handler: tabIndentationChecker,
      pattern: '*.css,*.less,*.scss,*.js,*.json,*.neon,*.php,*.phpt',
      option: '--tabs',
      enabled: selection.tabIndentation,
    },
    { name: 'unexpectedTabsChecker', handler: unexpectedTabsChecker, pattern: '*.yml,*.yaml', enabled: true },
  ];
}

export function createTaskRegistry(selection: TaskSelection): TaskRegistry {
  const registry = new TaskRegistry();
  for (const entry of describeTasks(selection)) {
    if (entry.enabled) {
      registry.register(entry.handler, entry.pattern);
    }
  }
  return registry;
}

export {
  bomFixer,
  controlCharactersChecker,
  createNewlineNormalizer,
  jsonSyntaxChecker,
  strictTypesChecker,
  tabIndentationChecker,
  trailingPhpTagRemover,
  trailingWhitespaceFixer,
  unexpectedTabsChecker,
  utf8Checker,
};
