import { Chalk } from 'chalk';

interface TtyLike {
  isTTY?: boolean;
}

/**
 * Decide once whether output should carry ANSI colors. `NO_COLOR` and
 * `FORCE_COLOR` win; otherwise a TTY or a known ANSI-capable Windows console.
 */
export function detectColorSupport(
  stream: TtyLike = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') {
    return false;
  }
  if (env.FORCE_COLOR !== undefined) {
    return env.FORCE_COLOR !== '0' && env.FORCE_COLOR !== 'false';
  }
  return (
    stream.isTTY === true ||
    env.ConEmuANSI === 'ON' ||
    env.ANSICON !== undefined ||
    env.TERM === 'xterm-256color'
  );
}

export const supportsAnsiColor = detectColorSupport();

const chalk = new Chalk({ level: supportsAnsiColor ? 1 : 0 });

export function boldText(text: string): string {
  return chalk.bold(text);
}

export function dimText(text: string): string {
  return chalk.dim(text);
}
