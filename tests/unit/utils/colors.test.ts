/**
 * Terminal Color Utility Tests
 *
 * Tests for ANSI codes, color support detection and styling functions.
 */

import { afterEach, describe, expect, test } from 'vitest';
import {
  c,
  colorize,
  colors,
  detectColorSupport,
  isColorEnabled,
  setColorEnabled,
  stripAnsi,
  style
} from '@/utils/colors';

const initial = isColorEnabled();

afterEach(() => {
  setColorEnabled(initial);
});

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Code Constants
// ═══════════════════════════════════════════════════════════════════════════════

describe('colors constants', () => {
  test('modifiers and reset are correct', () => {
    expect(colors.reset).toBe('\x1b[0m');
    expect(colors.bright).toBe('\x1b[1m');
    expect(colors.dim).toBe('\x1b[2m');
  });

  test('standard and bright colors are defined', () => {
    expect(colors.red).toBe('\x1b[31m');
    expect(colors.gray).toBe('\x1b[90m');
    expect(colors.brightCyan).toBe('\x1b[96m');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Color Support
// ═══════════════════════════════════════════════════════════════════════════════

describe('detectColorSupport', () => {
  test('follows the terminal by default', () => {
    expect(detectColorSupport({}, true)).toBe(true);
    expect(detectColorSupport({}, false)).toBe(false);
  });

  test('NO_COLOR disables colors', () => {
    expect(detectColorSupport({ NO_COLOR: '1' }, true)).toBe(false);
  });

  test('empty NO_COLOR is ignored', () => {
    expect(detectColorSupport({ NO_COLOR: '' }, true)).toBe(true);
  });

  test('FORCE_COLOR enables colors off a terminal unless it is 0', () => {
    expect(detectColorSupport({ FORCE_COLOR: '1' }, false)).toBe(true);
    expect(detectColorSupport({ FORCE_COLOR: '0' }, false)).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Styling
// ═══════════════════════════════════════════════════════════════════════════════

describe('colorize', () => {
  test('wraps text in color and reset', () => {
    setColorEnabled(true);
    expect(colorize('hello', 'red')).toBe('\x1b[31mhello\x1b[0m');
  });

  test('returns plain text when colors are disabled', () => {
    setColorEnabled(false);
    expect(colorize('hello', 'red')).toBe('hello');
  });
});

describe('style', () => {
  test('combines multiple styles', () => {
    setColorEnabled(true);
    expect(style('x', 'bright', 'cyan')).toBe('\x1b[1m\x1b[36mx\x1b[0m');
  });

  test('no styles leaves text unchanged', () => {
    setColorEnabled(true);
    expect(style('x')).toBe('x');
  });
});

describe('convenience functions', () => {
  test('c.* map to colorize', () => {
    setColorEnabled(true);
    expect(c.green('ok')).toBe('\x1b[32mok\x1b[0m');
    expect(c.dim('faint')).toBe('\x1b[2mfaint\x1b[0m');
  });
});

describe('stripAnsi', () => {
  test('removes color sequences', () => {
    setColorEnabled(true);
    expect(stripAnsi(style('x', 'bright', 'cyan') + c.red('y'))).toBe('xy');
  });
});
