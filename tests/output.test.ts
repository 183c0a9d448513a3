/**
 * Tests for command output: JSON envelopes, tables and JSON model output
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { successEnvelope, errorEnvelope, createOutput, formatCell, Output } from '../src/cli/output.js';
import { CliError, ErrorCode } from '../src/cli/errors.js';
import { Model } from '../src/model/model.js';
import { captureLogger } from './helpers/log-capture.js';

describe('successEnvelope', () => {
  it('should create a success envelope with data', () => {
    const data = { items: [{ id: '1' }], total: 1 };

    expect(successEnvelope('list', data)).toEqual({
      success: true,
      command: 'list',
      data,
      error: null,
    });
  });
});

describe('errorEnvelope', () => {
  it('should create an error envelope', () => {
    expect(errorEnvelope('get', 'NOT_FOUND', 'Not found: abc', { id: 'abc' })).toEqual({
      success: false,
      command: 'get',
      data: null,
      error: {
        code: 'NOT_FOUND',
        message: 'Not found: abc',
        details: { id: 'abc' },
      },
    });
  });
});

describe('formatCell', () => {
  it('should render missing values as empty cells', () => {
    expect(formatCell(null)).toBe('');
    expect(formatCell(undefined)).toBe('');
  });

  it('should join lists and serialize nested objects', () => {
    expect(formatCell(['a', 'b', 3])).toBe('a, b, 3');
    expect(formatCell([{ x: 1 }, 'y'])).toBe('{"x":1}, y');
    expect(formatCell({ a: 1 })).toBe('{"a":1}');
    expect(formatCell(new Model({ b: [1, 2] }))).toBe('{"b":[1,2]}');
  });

  it('should stringify scalars', () => {
    expect(formatCell(42)).toBe('42');
    expect(formatCell(false)).toBe('false');
  });
});

describe('Output', () => {
  let consoleLogSpy: ReturnType<typeof jest.spyOn>;
  let consoleErrorSpy: ReturnType<typeof jest.spyOn>;
  const originalNoColor = process.env.NO_COLOR;

  beforeEach(() => {
    process.env.NO_COLOR = '1';
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    if (originalNoColor === undefined) {
      delete process.env.NO_COLOR;
    } else {
      process.env.NO_COLOR = originalNoColor;
    }
  });

  const rows = [
    { name: 'alpha', count: 3, tags: ['a', 'b'] },
    { name: 'beta', count: 12, tags: [] },
  ];

  describe('printModels as table', () => {
    it('should print a grid and the row count', () => {
      const { logger } = captureLogger();
      createOutput({ logger }).printModels(rows);

      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
      expect(consoleLogSpy.mock.calls[0][0]).toBe(
        [
          '+-------+-------+------+',
          '| name  | count | tags |',
          '+-------+-------+------+',
          '| alpha |     3 | a, b |',
          '| beta  |    12 |      |',
          '+-------+-------+------+',
        ].join('\n')
      );
      expect(consoleLogSpy.mock.calls[1][0]).toBe('2 rows');
    });

    it('should say "1 row" for a single model', () => {
      new Output().printModels(new Model({ id: 1 }));
      expect(consoleLogSpy.mock.calls[1][0]).toBe('1 row');
    });

    it('should apply exclusions, headers and formatters', () => {
      const model = new Model({ id: 7, name: 'alpha', secret: 'test-secret' }).formatColumn('name', (v) =>
        String(v).toUpperCase()
      );
      new Output().printModels([model], {
        exclude: ['secret'],
        headers: { id: 'ID' },
        formatters: { id: (v) => `#${String(v)}` },
      });

      expect(consoleLogSpy.mock.calls[0][0]).toBe(
        ['+----+-------+', '| ID | name  |', '+----+-------+', '| #7 | ALPHA |', '+----+-------+'].join('\n')
      );
    });

    it('should truncate long cells', () => {
      new Output().printModels([{ text: 'abcdefghij' }], { maxWidth: 5 });
      expect(consoleLogSpy.mock.calls[0][0]).toBe(
        ['+-------+', '| text  |', '+-------+', '| abcd… |', '+-------+'].join('\n')
      );
    });

    it('should log instead of printing an empty table', () => {
      const capture = captureLogger();
      new Output({ logger: capture.logger }).printModels([]);

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(capture.messages()).toEqual(['No results were found']);
    });

    it('should print nothing when quiet', () => {
      new Output({ quiet: true }).printModels(rows);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should not change the models it prints', () => {
      const model = new Model({ tags: ['a', 'b'] });
      new Output().printModels([model]);
      expect(model.get('tags')).toEqual(['a', 'b']);
    });
  });

  describe('printModels as JSON', () => {
    it('should print a pretty JSON array', () => {
      new Output({ format: 'json' }).printModels(rows);
      expect(consoleLogSpy).toHaveBeenCalledWith(JSON.stringify(rows, null, 2));
    });

    it('should print a single model as an object', () => {
      new Output({ format: 'json', quiet: true }).printModels(new Model({ id: 1, meta: { a: true } }));
      expect(consoleLogSpy).toHaveBeenCalledWith(JSON.stringify({ id: 1, meta: { a: true } }, null, 2));
    });
  });

  describe('printModels for external callers', () => {
    it('should return plain objects without printing', () => {
      const result = new Output({ externalCall: true }).printModels([new Model({ id: 1, meta: { a: 2 } })]);

      expect(result).toEqual([{ id: 1, meta: { a: 2 } }]);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('success', () => {
    it('should wrap data in an envelope for JSON', () => {
      new Output({ format: 'json', command: 'add' }).success({ id: 3 });
      expect(consoleLogSpy).toHaveBeenCalledWith(JSON.stringify(successEnvelope('add', { id: 3 }), null, 2));
    });

    it('should print strings as-is', () => {
      new Output().success('Done');
      expect(consoleLogSpy).toHaveBeenCalledWith('Done');
    });

    it('should stay silent when quiet', () => {
      new Output({ quiet: true }).success('Done');
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('error', () => {
    const error = new CliError(ErrorCode.NOT_FOUND, 'Not found: abc', { id: 'abc' });

    it('should print a plain error line on stderr', () => {
      new Output().error(error);
      expect(consoleErrorSpy).toHaveBeenCalledWith('Error: Not found: abc');
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should print an error envelope on stdout for JSON', () => {
      new Output({ format: 'json', command: 'get' }).error(error);
      expect(consoleLogSpy).toHaveBeenCalledWith(
        JSON.stringify(errorEnvelope('get', 'NOT_FOUND', 'Not found: abc', { id: 'abc' }), null, 2)
      );
    });
  });

  describe('log', () => {
    it('should print messages for table output only', () => {
      new Output().log('hello');
      new Output({ format: 'json' }).log('hidden');
      new Output({ quiet: true }).log('hidden');
      expect(consoleLogSpy.mock.calls).toEqual([['hello']]);
    });
  });
});
