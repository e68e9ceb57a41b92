import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { scanFiles } from '../../src/checker/walker.js';
import { PathNotFoundError, UnsupportedPathError } from '../../src/cli/errors.js';

let tempDir: string;

function touch(relativePath: string, contents = ''): string {
  const filePath = path.join(tempDir, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, contents);
  return filePath;
}

function relativePaths(root: string, accept: string[], ignore: string[]): string[] {
  return [...scanFiles(root, { accept, ignore })].map((record) => record.relativePath);
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tidytree-walker-'));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('scanFiles', () => {
  it('yields accepted files and prunes ignored directories', () => {
    touch('a.php');
    touch('b.txt');
    touch('vendor/c.php');

    expect(relativePaths(tempDir, ['*.php'], ['vendor'])).toEqual(['a.php']);
  });

  it('walks in lexical order and reports paths relative to the root', () => {
    touch('sub/c.php');
    touch('b.php');
    touch('a.php');

    const records = [...scanFiles(tempDir, { accept: ['*.php'], ignore: [] })];
    expect(records.map((record) => record.relativePath)).toEqual([
      'a.php',
      'b.php',
      path.join('sub', 'c.php'),
    ]);
    expect(records[2]?.absolutePath).toBe(path.join(tempDir, 'sub', 'c.php'));
  });

  it('lets ignore patterns win over accept patterns for files', () => {
    touch('app.js');
    touch('app.min.js');

    expect(relativePaths(tempDir, ['*.js'], ['*.min.js'])).toEqual(['app.js']);
  });

  it('matches accept patterns case-insensitively', () => {
    touch('UPPER.PHP');
    expect(relativePaths(tempDir, ['*.php'], [])).toEqual(['UPPER.PHP']);
  });

  it('applies ignore masks containing a slash to the relative path', () => {
    touch('docs/generated/api.md');
    touch('docs/guide.md');
    touch('generated/keep.md');

    expect(relativePaths(tempDir, ['*.md'], ['docs/generated'])).toEqual([
      path.join('docs', 'guide.md'),
      path.join('generated', 'keep.md'),
    ]);
  });

  it('yields a single file root without applying the glob sets', () => {
    const filePath = touch('package.json', '{}');

    const records = [...scanFiles(filePath, { accept: ['*.php'], ignore: ['package.json'] })];
    expect(records).toEqual([{ absolutePath: filePath, relativePath: 'package.json' }]);
  });

  it('throws PathNotFoundError for a missing root once iterated', () => {
    const missing = path.join(tempDir, 'nope');
    const files = scanFiles(missing, { accept: ['*'], ignore: [] });

    expect(() => files.next()).toThrow(PathNotFoundError);
  });

  it('skips a symlink that points at itself and keeps walking', () => {
    touch('a.txt');
    touch('z.txt');
    fs.symlinkSync('loop.txt', path.join(tempDir, 'loop.txt'));

    expect(relativePaths(tempDir, ['*.txt'], [])).toEqual(['a.txt', 'z.txt']);
  });

  it('skips a dangling symlink', () => {
    touch('a.txt');
    fs.symlinkSync(path.join(tempDir, 'gone.txt'), path.join(tempDir, 'b.txt'));

    expect(relativePaths(tempDir, ['*.txt'], [])).toEqual(['a.txt']);
  });

  it.skipIf(process.platform === 'win32')('rejects a root that is neither a file nor a directory', () => {
    const files = scanFiles('/dev/null', { accept: ['*'], ignore: [] });

    expect(() => files.next()).toThrow(UnsupportedPathError);
  });

  it('yields nothing for an empty directory', () => {
    expect(relativePaths(tempDir, ['*'], [])).toEqual([]);
  });
});
