/**
 * Tests for declarative command arguments
 */

import { describe, it, expect } from '@jest/globals';
import { ArgumentParser, toDest } from '../src/command/arguments.js';
import { CliError, ErrorCode } from '../src/cli/errors.js';

function parseError(parser: ArgumentParser, argv: string[]): CliError {
  try {
    parser.parse(argv);
  } catch (error) {
    if (error instanceof CliError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected parse to fail');
}

describe('toDest', () => {
  it('should camel-case dashed names', () => {
    expect(toDest('dry-run')).toBe('dryRun');
    expect(toDest('max-row-count')).toBe('maxRowCount');
    expect(toDest('name')).toBe('name');
  });
});

describe('ArgumentParser', () => {
  const buildParser = (): ArgumentParser =>
    new ArgumentParser({ prog: 'mytool deploy' })
      .addArgument('target', { help: 'Where to deploy' })
      .addArgument('--dry-run', { type: 'boolean', short: 'n', help: 'Only show what would happen' })
      .addArgument('--retries', { type: 'number', default: 3 })
      .addArgument('--env', { choices: ['dev', 'prod'], default: 'dev', metavar: 'ENV' })
      .addArgument('--tag', { multiple: true });

  describe('parse', () => {
    it('should apply defaults', () => {
      expect(buildParser().parse(['web'])).toEqual({
        target: 'web',
        dryRun: false,
        retries: 3,
        env: 'dev',
        tag: undefined,
      });
    });

    it('should parse options in any position', () => {
      expect(buildParser().parse(['-n', '--retries', '5', 'web', '--env=prod', '--tag', 'a', '--tag', 'b'])).toEqual({
        target: 'web',
        dryRun: true,
        retries: 5,
        env: 'prod',
        tag: ['a', 'b'],
      });
    });

    it('should reject a missing positional', () => {
      const error = parseError(buildParser(), []);
      expect(error.code).toBe(ErrorCode.INVALID_ARGUMENTS);
      expect(error.message).toBe('Missing required argument: target');
    });

    it('should reject values outside the choices', () => {
      expect(parseError(buildParser(), ['web', '--env', 'staging']).message).toBe(
        "Invalid value for --env: 'staging' (choose from dev, prod)"
      );
    });

    it('should reject non-numeric numbers', () => {
      expect(parseError(buildParser(), ['web', '--retries', 'many']).message).toBe(
        "Invalid number for --retries: 'many'"
      );
    });

    it('should reject extra positionals', () => {
      expect(parseError(buildParser(), ['web', 'api']).message).toBe('Unexpected argument: api');
    });

    it('should reject unknown options', () => {
      expect(parseError(buildParser(), ['web', '--force']).code).toBe(ErrorCode.INVALID_ARGUMENTS);
    });

    it('should enforce required options', () => {
      const parser = new ArgumentParser().addArgument('--token', { required: true });
      expect(parseError(parser, []).message).toBe('Missing required option: --token');
      expect(parser.parse(['--token', 'test-secret'])).toEqual({ token: 'test-secret' });
    });

    it('should collect remaining positionals for a multiple positional', () => {
      const parser = new ArgumentParser().addArgument('files', { multiple: true });
      expect(parser.parse(['a.txt', 'b.txt'])).toEqual({ files: ['a.txt', 'b.txt'] });
    });

    it('should allow an optional positional with a default', () => {
      const parser = new ArgumentParser().addArgument('name', { default: 'world' });
      expect(parser.parse([])).toEqual({ name: 'world' });
    });

    it('should store values under a custom destination', () => {
      const parser = new ArgumentParser().addArgument('--format', { dest: 'outputFormat' });
      expect(parser.parse(['--format', 'csv'])).toEqual({ outputFormat: 'csv' });
    });
  });

  describe('definitions', () => {
    it('should reject duplicate destinations', () => {
      const parser = new ArgumentParser().addArgument('--name');
      expect(() => parser.addArgument('name')).toThrow('Argument already defined: name');
    });

    it('should reject short aliases on positionals', () => {
      expect(() => new ArgumentParser().addArgument('file', { short: 'f' })).toThrow(
        'Positional argument file cannot have a short alias'
      );
    });

    it('should override defaults', () => {
      const parser = buildParser();
      parser.setDefault('env', 'prod');
      expect(parser.parse(['web']).env).toBe('prod');
      expect(() => parser.setDefault('nope', 1)).toThrow('Unknown argument: nope');
    });

    it('should look arguments up by destination', () => {
      const parser = buildParser();
      expect(parser.hasArgument('dryRun')).toBe(true);
      expect(parser.getArgument('retries')).toMatchObject({ name: 'retries', type: 'number', default: 3 });
      expect(parser.arguments.map((def) => def.dest)).toEqual(['target', 'dryRun', 'retries', 'env', 'tag']);
    });
  });

  describe('help', () => {
    it('should build a usage line', () => {
      expect(buildParser().usage()).toBe('mytool deploy <target> [options]');
    });

    it('should describe options for the help generator', () => {
      expect(buildParser().helpOptions()).toEqual([
        {
          short: 'n',
          long: 'dry-run',
          description: 'Only show what would happen',
          values: undefined,
          default: undefined,
        },
        { short: undefined, long: 'retries <RETRIES>', description: '', values: undefined, default: '3' },
        { short: undefined, long: 'env <ENV>', description: '', values: 'dev | prod', default: 'dev' },
        { short: undefined, long: 'tag <TAG>', description: '', values: undefined, default: undefined },
      ]);
    });
  });
});
