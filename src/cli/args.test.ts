/**
 * CLI argument parsing tests
 */

import { describe, it, expect } from '@jest/globals';
import { parseCliArgs, UsageError } from './args.js';

describe('parseCliArgs', () => {
  it('should default to help with no arguments', () => {
    expect(parseCliArgs([])).toEqual({ command: 'help', positionals: [], json: false });
  });

  it('should collect the request words of resolve', () => {
    expect(parseCliArgs(['resolve', 'check', 'bitcoin', 'balance', '--json'])).toEqual({
      command: 'resolve',
      positionals: ['check', 'bitcoin', 'balance'],
      json: true,
    });
  });

  it('should read --dir and --threshold with their short forms', () => {
    const args = parseCliArgs(['list', '-d', './skills', '-t', '0.75']);

    expect(args.dir).toBe('./skills');
    expect(args.threshold).toBe(0.75);
  });

  it('should treat everything after -- as positionals', () => {
    expect(parseCliArgs(['resolve', '--', '--json', '-x']).positionals).toEqual(['--json', '-x']);
  });

  it('should switch to help on --help', () => {
    expect(parseCliArgs(['show', 'qr', '--help']).command).toBe('help');
  });

  it('should reject unknown commands', () => {
    expect(() => parseCliArgs(['frobnicate'])).toThrow(new UsageError('Unknown command: frobnicate'));
  });

  it('should reject unknown options', () => {
    expect(() => parseCliArgs(['list', '--verbose'])).toThrow('Unknown option: --verbose');
  });

  it('should reject a missing --dir value', () => {
    expect(() => parseCliArgs(['list', '--dir'])).toThrow('--dir requires a path');
  });

  it.each(['1.5', '-0.1', 'high', '', ' '])('should reject threshold "%s"', (value) => {
    expect(() => parseCliArgs(['resolve', 'x', '--threshold', value])).toThrow(
      '--threshold requires a number between 0 and 1'
    );
  });
});
