/**
 * CLI options parsing tests
 */

import { describe, it, expect } from 'vitest';

import { createProgram, parseBatchOptions, parseCliOptions, parseExplainOptions, parseSeeOptions } from '../cli.js';
import { InputError } from '../errors/index.js';

describe('parseCliOptions', () => {
  describe('common options', () => {
    it('should parse config option', () => {
      expect(parseCliOptions({ config: './my-config.json' }).config).toBe('./my-config.json');
    });

    it('should parse showConfig and verbose flags', () => {
      const result = parseCliOptions({ showConfig: true, verbose: true });
      expect(result.showConfig).toBe(true);
      expect(result.verbose).toBe(true);
    });

    it('should turn Commander negations into no* flags', () => {
      expect(parseCliOptions({ color: false, see: false })).toEqual({ noColor: true, noSee: true });
      expect(parseCliOptions({ color: true, see: true })).toEqual({});
    });
  });

  describe('level', () => {
    it('should accept any case', () => {
      expect(parseCliOptions({ level: 'Beginner' }).level).toBe('beginner');
    });

    it('should reject unknown levels', () => {
      expect(() => parseCliOptions({ level: 'grandmaster' })).toThrow(InputError);
    });
  });

  it('should reject values of the wrong type', () => {
    expect(() => parseCliOptions({ verbose: 'yes' })).toThrow(InputError);
  });
});

describe('command options', () => {
  it('should keep the explain inputs', () => {
    expect(
      parseExplainOptions({ fen: '8/8/8/8/8/8/8/K6k', move: 'a1a2', eval: '+0.10', pv: ['a1a2 h1h2'], json: true }),
    ).toEqual({ fen: '8/8/8/8/8/8/8/K6k', move: 'a1a2', eval: '+0.10', pv: ['a1a2 h1h2'], json: true });
  });

  it('should require a move for see', () => {
    expect(() => parseSeeOptions({ fen: '8/8/8/8/8/8/8/K6k' })).toThrow(InputError);
  });

  it('should require an input file for batch', () => {
    expect(parseBatchOptions({ input: 'moves.json', output: 'out.json' })).toEqual({
      input: 'moves.json',
      output: 'out.json',
    });
    expect(() => parseBatchOptions({})).toThrow(InputError);
  });
});

describe('createProgram', () => {
  it('should register the three commands', () => {
    const program = createProgram();
    expect(program.name()).toBe('tactica');
    expect(program.commands.map((c) => c.name())).toEqual(['explain', 'see', 'batch']);
  });

  it('should hand Commander option names to the parsers', () => {
    const explain = createProgram().commands.find((c) => c.name() === 'explain');
    const names = explain?.options.map((o) => o.attributeName()) ?? [];

    expect(names).toEqual(
      expect.arrayContaining(['fen', 'move', 'eval', 'secondEval', 'evalBefore', 'pv', 'level', 'see', 'board', 'color']),
    );
  });
});
