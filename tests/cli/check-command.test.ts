import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  handleCheckCommand,
  parseCheckFlags,
  resolveCheckOptions,
  runCheck,
  type CheckFlags,
} from '../../src/cli/check-command.js';
import { CliUsageError, PathNotFoundError, UnsupportedPathError } from '../../src/cli/errors.js';
import { ConfigSchema, DEFAULT_IGNORE } from '../../src/config/loader.js';
import { createCaptureStream } from '../helpers/capture.js';

let originalCwd: string;
let originalHome: string | undefined;
let tempDir: string;

beforeEach(() => {
  originalCwd = process.cwd();
  originalHome = process.env.HOME;
  tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'tidytree-cli-check-')));
  process.chdir(tempDir);
  process.env.HOME = tempDir;
});

afterEach(() => {
  process.chdir(originalCwd);
  process.env.HOME = originalHome;
  process.exitCode = undefined;
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function flags(overrides: Partial<CheckFlags> = {}): CheckFlags {
  return {
    root: tempDir,
    acceptMasks: [],
    ignoreMasks: [],
    fix: false,
    eol: false,
    noProgress: true,
    strictTypes: false,
    tabs: false,
    colors: false,
    ...overrides,
  };
}

describe('parseCheckFlags', () => {
  it('defaults to a read-only scan of the working directory', () => {
    const options = parseCheckFlags(['--no-color']);

    expect(options.root).toBe(tempDir);
    expect(options.readOnly).toBe(true);
    expect(options.showProgress).toBe(true);
    expect(options.colors).toBe(false);
    expect(options.ignore).toEqual(DEFAULT_IGNORE);
    expect(options.selection).toEqual({ strictTypes: false, tabIndentation: false });
  });

  it('applies fix mode, extra masks and optional tasks', () => {
    const options = parseCheckFlags([
      '-d',
      'src',
      '--fix',
      '-i',
      'build',
      '--ignore',
      '*.lock',
      '--accept',
      '*.tpl',
      '--eol',
      '--tabs',
      '--no-progress',
    ]);

    expect(options.root).toBe(path.join(tempDir, 'src'));
    expect(options.readOnly).toBe(false);
    expect(options.showProgress).toBe(false);
    expect(options.ignore.slice(-2)).toEqual(['build', '*.lock']);
    expect(options.accept.at(-1)).toBe('*.tpl');
    expect(options.selection).toEqual({ eol: 'lf', strictTypes: false, tabIndentation: true });
  });

  it('rejects unknown arguments', () => {
    expect(() => parseCheckFlags(['--bogus'])).toThrow(CliUsageError);
  });
});

describe('resolveCheckOptions', () => {
  it('uses the configured line ending when normalization is enabled in config', () => {
    const config = ConfigSchema.parse({ eol: 'crlf', normalizeEol: true, strictTypes: true });
    const options = resolveCheckOptions(config, flags());

    expect(options.selection).toEqual({ eol: 'crlf', strictTypes: true, tabIndentation: false });
  });

  it('lets configuration turn progress off', () => {
    const config = ConfigSchema.parse({ progress: false });
    expect(resolveCheckOptions(config, flags({ noProgress: false })).showProgress).toBe(false);
  });
});

describe('runCheck', () => {
  it('reports unfixed issues in read-only mode', () => {
    fs.writeFileSync(path.join(tempDir, 'a.txt'), 'ok \n');
    const output = createCaptureStream();

    const result = runCheck(resolveCheckOptions(ConfigSchema.parse({}), flags()), output.stream);

    expect(result.success).toBe(false);
    expect(output.text()).toBe(
      [
        'Running in read-only mode',
        `Scanning ${tempDir}`,
        '[FOUND]   a.txt:1    has trailing whitespace on 1 line',
        'Done.',
        '',
      ].join('\n')
    );
  });

  it('fixes files and skips ignored directories', () => {
    fs.writeFileSync(path.join(tempDir, 'a.txt'), 'ok \n');
    fs.mkdirSync(path.join(tempDir, 'vendor'));
    fs.writeFileSync(path.join(tempDir, 'vendor', 'b.txt'), 'skip \n');
    const output = createCaptureStream();

    const result = runCheck(resolveCheckOptions(ConfigSchema.parse({}), flags({ fix: true })), output.stream);

    expect(result).toEqual({ success: true, filesChecked: 1, filesChanged: 1, filesFailed: 0 });
    expect(fs.readFileSync(path.join(tempDir, 'a.txt'), 'utf-8')).toBe('ok\n');
    expect(fs.readFileSync(path.join(tempDir, 'vendor', 'b.txt'), 'utf-8')).toBe('skip \n');
  });

  it('fails before scanning when the root does not exist', () => {
    const options = resolveCheckOptions(ConfigSchema.parse({}), flags({ root: path.join(tempDir, 'nope') }));
    const output = createCaptureStream();

    expect(() => runCheck(options, output.stream)).toThrow(PathNotFoundError);
    expect(output.text()).toBe('');
  });

  it.skipIf(process.platform === 'win32')('fails before scanning when the root is a device', () => {
    const options = resolveCheckOptions(ConfigSchema.parse({}), flags({ root: '/dev/null' }));
    const output = createCaptureStream();

    expect(() => runCheck(options, output.stream)).toThrow(UnsupportedPathError);
    expect(output.text()).toBe('');
  });
});

describe('handleCheckCommand', () => {
  it('sets a failing exit code when a file has an error', () => {
    fs.writeFileSync(path.join(tempDir, 'data.json'), '{"a": }');
    const output = createCaptureStream();

    handleCheckCommand(['--no-progress', '--no-color'], output.stream);

    expect(process.exitCode).toBe(1);
  });

  it('sets a zero exit code for a clean tree', () => {
    fs.writeFileSync(path.join(tempDir, 'data.json'), '{"a": 1}\n');
    const output = createCaptureStream();

    handleCheckCommand(['--no-progress', '--no-color', '--fix'], output.stream);

    expect(process.exitCode).toBe(0);
  });
});
