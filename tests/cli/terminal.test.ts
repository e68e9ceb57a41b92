import { describe, it, expect } from 'vitest';
import { detectColorSupport } from '../../src/cli/terminal.js';

describe('detectColorSupport', () => {
  it('enables colors on a TTY', () => {
    expect(detectColorSupport({ isTTY: true }, {})).toBe(true);
    expect(detectColorSupport({ isTTY: false }, {})).toBe(false);
  });

  it('honors NO_COLOR and FORCE_COLOR', () => {
    expect(detectColorSupport({ isTTY: true }, { NO_COLOR: '1' })).toBe(false);
    expect(detectColorSupport({ isTTY: false }, { FORCE_COLOR: '1' })).toBe(true);
    expect(detectColorSupport({ isTTY: true }, { FORCE_COLOR: '0' })).toBe(false);
  });

  it('recognizes ANSI-capable consoles without a TTY', () => {
    expect(detectColorSupport({}, { ConEmuANSI: 'ON' })).toBe(true);
    expect(detectColorSupport({}, { ANSICON: '80x25' })).toBe(true);
    expect(detectColorSupport({}, { TERM: 'xterm-256color' })).toBe(true);
    expect(detectColorSupport({}, { TERM: 'dumb' })).toBe(false);
  });
});
