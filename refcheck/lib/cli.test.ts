import { describe, it, expect } from 'vitest';
import { formatDuration, parseCliArgs, parseIntOpt, stringOpt } from './cli.ts';

describe('parseCliArgs', () => {
  it('parses --key=value', () => {
    expect(parseCliArgs(['--config=refcheck.yaml'])).toEqual({
      _positional: [],
      config: 'refcheck.yaml',
    });
  });

  it('parses --key value', () => {
    expect(parseCliArgs(['--concurrency', '5'])).toEqual({ _positional: [], concurrency: '5' });
  });

  it('treats a flag followed by another option as boolean', () => {
    expect(parseCliArgs(['--verbose', '--ci'])).toEqual({ _positional: [], verbose: true, ci: true });
  });

  it('keeps positionals after boolean flags', () => {
    expect(parseCliArgs(['--verbose', 'docs', 'README.md'], ['verbose'])).toEqual({
      _positional: ['docs', 'README.md'],
      verbose: true,
    });
  });

  it('sets --no-<flag> to false', () => {
    expect(parseCliArgs(['--no-cache'])).toEqual({ _positional: [], cache: false });
  });

  it('skips bare -- separators', () => {
    expect(parseCliArgs(['--', 'docs'])).toEqual({ _positional: ['docs'] });
  });

  it('keeps values that contain =', () => {
    expect(parseCliArgs(['--report=out=1.json']).report).toBe('out=1.json');
  });
});

describe('parseIntOpt', () => {
  it('parses numeric strings', () => {
    expect(parseIntOpt('12', 3)).toBe(12);
    expect(parseIntOpt('0', 3)).toBe(0);
  });

  it('falls back for missing, boolean or invalid values', () => {
    expect(parseIntOpt(undefined, 3)).toBe(3);
    expect(parseIntOpt(true, 3)).toBe(3);
    expect(parseIntOpt('lots', 3)).toBe(3);
  });
});

describe('stringOpt', () => {
  it('returns strings only', () => {
    expect(stringOpt('x')).toBe('x');
    expect(stringOpt(true)).toBeUndefined();
    expect(stringOpt(undefined)).toBeUndefined();
  });
});

describe('formatDuration', () => {
  it('formats milliseconds and seconds', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(1000)).toBe('1.00s');
    expect(formatDuration(1500)).toBe('1.50s');
  });
});
