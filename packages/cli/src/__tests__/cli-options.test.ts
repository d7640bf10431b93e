/**
 * Tests for CLI option parsing
 */

import { CommanderError, InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';

import {
  createProgram,
  parseCliOptions,
  parseClearOptions,
  parseDimension,
  parseFetchOptions,
} from '../cli.js';

describe('parseDimension', () => {
  it('parses non-negative numbers', () => {
    expect(parseDimension('120')).toBe(120);
    expect(parseDimension('0')).toBe(0);
    expect(parseDimension('64.5')).toBe(64.5);
  });

  it.each(['', '  ', 'abc', '-1', 'Infinity'])('rejects %j', (value) => {
    expect(() => parseDimension(value)).toThrow(InvalidArgumentError);
  });
});

describe('parseCliOptions', () => {
  it('maps commander options to shared CLI options', () => {
    expect(parseCliOptions({ config: 'cache.json', cacheDir: '/tmp/tc', color: false, verbose: true })).toEqual({
      config: 'cache.json',
      cacheDir: '/tmp/tc',
      noColor: true,
      verbose: true,
    });
  });

  it('leaves color enabled unless --no-color is given', () => {
    expect(parseCliOptions({ color: true })).toEqual({});
  });

  it('ignores values of the wrong type', () => {
    expect(parseCliOptions({ config: 5, verbose: 'yes' })).toEqual({});
  });
});

describe('parseFetchOptions', () => {
  it('maps size, strategy, headers and output', () => {
    const options = parseFetchOptions({
      width: 120,
      height: 80,
      strategy: 'diskOnly',
      header: ['Accept: image/png'],
      output: 'out.bin',
    });

    expect(options).toEqual({
      width: 120,
      height: 80,
      strategy: 'diskOnly',
      header: ['Accept: image/png'],
      output: 'out.bin',
    });
  });

  it('drops an unknown strategy', () => {
    expect(parseFetchOptions({ strategy: 'everywhere' }).strategy).toBeUndefined();
  });

  it('keeps only string header arguments', () => {
    expect(parseFetchOptions({ header: ['A: 1', 2] }).header).toEqual(['A: 1']);
  });
});

describe('parseClearOptions', () => {
  it('maps tier flags', () => {
    expect(parseClearOptions({ memory: true })).toEqual({ memory: true });
    expect(parseClearOptions({ disk: true, verbose: false })).toEqual({ disk: true, verbose: false });
  });
});

describe('createProgram', () => {
  it('registers every command', () => {
    const program = createProgram();

    expect(program.name()).toBe('tiercache');
    expect(program.commands.map((command) => command.name())).toEqual(['fetch', 'stats', 'inspect', 'clear', 'config']);
  });

  function quietFetchCommand(): ReturnType<typeof createProgram> {
    const program = createProgram();
    const fetch = program.commands.find((command) => command.name() === 'fetch');
    fetch?.exitOverride();
    fetch?.configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
    return program;
  }

  it('rejects an unknown strategy', async () => {
    const program = quietFetchCommand();

    await expect(
      program.parseAsync(['node', 'tiercache', 'fetch', 'https://assets.test/a.png', '--strategy', 'everywhere']),
    ).rejects.toBeInstanceOf(CommanderError);
  });

  it('rejects a negative width', async () => {
    const program = quietFetchCommand();

    await expect(
      program.parseAsync(['node', 'tiercache', 'fetch', 'https://assets.test/a.png', '--width=-5']),
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });
});
