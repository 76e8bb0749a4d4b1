import { describe, expect, it } from 'vitest';

import { flagValue, flagValues, hasFlag, intFlag, parseArgs, rejectUnknownFlags, UsageError } from './args.js';

describe('parseArgs', () => {
  it('collects positionals and repeated flags', () => {
    const parsed = parseArgs(['add', '2401.00001', '--tag', 'ml', 'arxiv:2401.00002', '--tag=rl']);
    expect(parsed).toEqual({
      positional: ['add', '2401.00001', 'arxiv:2401.00002'],
      flags: { tag: ['ml', 'rl'] },
    });
    expect(flagValues(parsed, 'tag')).toEqual(['ml', 'rl']);
    expect(flagValue(parsed, 'tag')).toBe('rl');
    expect(flagValues(parsed, 'missing')).toEqual([]);
  });

  it('treats declared booleans as switches', () => {
    const parsed = parseArgs(['upload-shiori', '--prune', '--address', 'http://shiori.test', '--dry-run'], [
      'prune',
      'dry-run',
    ]);
    expect(parsed.positional).toEqual(['upload-shiori']);
    expect(hasFlag(parsed, 'prune')).toBe(true);
    expect(hasFlag(parsed, 'dry-run')).toBe(true);
    expect(hasFlag(parsed, 'help')).toBe(false);
    expect(flagValue(parsed, 'address')).toBe('http://shiori.test');
  });

  it('passes everything after -- through as positionals', () => {
    expect(parseArgs(['remove', '--', '--odd']).positional).toEqual(['remove', '--odd']);
  });

  it('rejects a value flag without a value', () => {
    expect(() => parseArgs(['download', '--save-path'])).toThrow(new UsageError('--save-path needs a value'));
    expect(() => parseArgs(['download', '--save-path', '--no-check'])).toThrow('--save-path needs a value');
  });

  it('rejects a value on a boolean flag', () => {
    expect(() => parseArgs(['--prune=yes'], ['prune'])).toThrow('--prune takes no value');
  });

  it('parses integer flags', () => {
    expect(intFlag(parseArgs(['--ids-per-request', '25']), 'ids-per-request')).toBe(25);
    expect(intFlag(parseArgs([]), 'ids-per-request')).toBeUndefined();
    expect(() => intFlag(parseArgs(['--ids-per-request', 'ten']), 'ids-per-request')).toThrow(
      '--ids-per-request expects an integer, got "ten"',
    );
  });

  it('reports the first unknown flag', () => {
    const parsed = parseArgs(['--tag', 'a', '--colour', 'red']);
    expect(() => rejectUnknownFlags(parsed, ['tag'])).toThrow('Unknown option: --colour');
    expect(() => rejectUnknownFlags(parsed, ['tag', 'colour'])).not.toThrow();
  });
});
