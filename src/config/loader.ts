import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../cli/errors.js';

export const DEFAULT_ACCEPT = [
  '*.php', '*.phpt', '*.inc',
  '*.txt', '*.texy', '*.md',
  '*.css', '*.less', '*.sass', '*.scss', '*.js', '*.json', '*.latte', '*.htm', '*.html', '*.phtml', '*.xml',
  '*.ini', '*.neon', '*.yml', '*.yaml',
  '*.sh', '*.bat',
  '*.sql',
  '.htaccess', '.gitignore',
];

export const DEFAULT_IGNORE = [
  '.git', '.svn', '.idea', '*.tmp', 'tmp', 'temp', 'log', 'vendor', 'node_modules', 'bower_components',
  '*.min.js', 'package.json', 'package-lock.json',
];

export const EolSchema = z.enum(['lf', 'crlf']);
export type Eol = z.infer<typeof EolSchema>;

export const ConfigSchema = z
  .object({
    accept: z.array(z.string().min(1)).default(DEFAULT_ACCEPT),
    ignore: z.array(z.string().min(1)).default(DEFAULT_IGNORE),
    eol: EolSchema.default('lf'),
    normalizeEol: z.boolean().default(false),
    strictTypes: z.boolean().default(false),
    tabIndentation: z.boolean().default(false),
    progress: z.boolean().default(true),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_FILENAME = '.tidytree.json';

export function getDefaultProjectConfigPath(startDir: string = process.cwd()): string {
  return path.join(startDir, CONFIG_FILENAME);
}

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(
    process.env.HOME ?? process.env.USERPROFILE ?? '',
    '.config',
    'tidytree',
    'config.json'
  );
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export function loadConfig(configPath?: string): Config {
  if (configPath !== undefined && !fs.existsSync(configPath)) {
    throw new ConfigError('config file does not exist', configPath);
  }

  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();
  if (!fs.existsSync(pathToLoad)) {
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`invalid JSON (${error.message})`, pathToLoad);
    }
    throw error;
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid configuration: ${details}`, pathToLoad);
  }
  return result.data;
}
