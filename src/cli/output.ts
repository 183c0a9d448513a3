/**
 * Command output
 *
 * Prints models as a grid table or as JSON depending on --output, and
 * provides the JSON envelope used for machine-readable errors.
 */

import type { OutputFormat } from '../command/command.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { isPlainObject, Model, type ColumnFormatter, type ModelRow } from '../model/model.js';
import { formatError } from './colors.js';
import type { CliError } from './errors.js';
import { renderTable, truncate, type ColumnAlign } from './table.js';

/**
 * Error details in JSON output
 */
export interface ErrorDetails {
  /** Machine-readable error code */
  code: string;
  /** Human-readable error message */
  message: string;
  /** Additional context about the error */
  details?: Record<string, unknown>;
}

/**
 * Standard JSON response envelope
 */
export interface JsonEnvelope<T = unknown> {
  success: boolean;
  command: string | null;
  data: T | null;
  error: ErrorDetails | null;
}

export function successEnvelope<T>(command: string | null, data: T): JsonEnvelope<T> {
  return {
    success: true,
    command,
    data,
    error: null,
  };
}

export function errorEnvelope(
  command: string | null,
  code: string,
  message: string,
  details?: Record<string, unknown>
): JsonEnvelope<null> {
  return {
    success: false,
    command,
    data: null,
    error: {
      code,
      message,
      details,
    },
  };
}

export type ModelInput = Model | ModelRow;

export type PlainRecord = Record<string, unknown>;

export interface TableOptions {
  /** Column formatters, applied to the raw value before rendering */
  formatters?: Record<string, ColumnFormatter>;
  /** Column header overrides keyed by field name */
  headers?: Record<string, string>;
  /** Fields left out of the table */
  exclude?: string[];
  /** Longest cell, in characters; longer cells are truncated */
  maxWidth?: number;
}

export interface OutputOptions {
  format?: OutputFormat;
  /** Suppress table and informational output (JSON is still printed) */
  quiet?: boolean;
  /** Return dictionaries instead of printing, for programmatic callers */
  externalCall?: boolean;
  /** Command name recorded in JSON envelopes */
  command?: string;
  logger?: Logger;
}

function toModel(input: ModelInput): Model {
  return input instanceof Model ? input : new Model(input);
}

function toDict(input: ModelInput): PlainRecord {
  return toModel(input).toDict();
}

function stringify(value: unknown): string {
  return JSON.stringify(value instanceof Model ? value.toDict() : value);
}

/**
 * Render one value as a table cell: nested structures as JSON, lists joined
 * with ', ', missing values as empty cells
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Model || isPlainObject(value)) {
    return stringify(value);
  }
  if (Array.isArray(value)) {
    return value
      .map((item: unknown) => (item instanceof Model || isPlainObject(item) ? stringify(item) : String(item)))
      .join(', ');
  }
  return String(value);
}

export class Output {
  readonly format: OutputFormat;
  private readonly quiet: boolean;
  private readonly externalCall: boolean;
  private readonly command: string | null;
  private readonly logger: Logger;

  constructor(options: OutputOptions = {}) {
    this.format = options.format ?? 'table';
    this.quiet = options.quiet ?? false;
    this.externalCall = options.externalCall ?? false;
    this.command = options.command ?? null;
    this.logger = options.logger ?? createLogger('Output');
  }

  /**
   * Print models as a table or JSON.
   *
   * With `externalCall` nothing is printed and the models come back as plain
   * objects (a single object for a single model).
   */
  printModels(models: ModelInput | ModelInput[], tableOptions: TableOptions = {}): PlainRecord | PlainRecord[] | undefined {
    if (this.externalCall) {
      return Array.isArray(models) ? models.map(toDict) : toDict(models);
    }

    if (this.format === 'json') {
      const data = Array.isArray(models) ? models.map(toDict) : toDict(models);
      console.log(JSON.stringify(data, null, 2));
      return undefined;
    }

    if (this.quiet) {
      return undefined;
    }

    const list = (Array.isArray(models) ? models : [models]).map(toModel);
    if (list.length === 0) {
      this.logger.info('No results were found');
      return undefined;
    }

    this.printTable(list, tableOptions);
    return undefined;
  }

  private printTable(models: Model[], options: TableOptions): void {
    const exclude = new Set(options.exclude ?? []);
    const keys = models[0].keys().filter((key) => !exclude.has(key));

    const displayed = models.map((model) =>
      keys.map((key) => {
        const value = model.get(key);
        const formatter = options.formatters?.[key] ?? model.getFormatter(key);
        return formatter ? formatter(value) : value;
      })
    );

    const align: ColumnAlign[] = keys.map((_key, i) => {
      const present = displayed.map((row) => row[i]).filter((value) => value !== null && value !== undefined);
      return present.length > 0 && present.every((value) => typeof value === 'number') ? 'right' : 'left';
    });

    const maxWidth = options.maxWidth;
    const rows = displayed.map((row) =>
      row.map((value) => {
        const cell = formatCell(value);
        return maxWidth !== undefined ? truncate(cell, maxWidth) : cell;
      })
    );
    const headers = keys.map((key) => options.headers?.[key] ?? key);

    console.log(renderTable(headers, rows, { align }));
    const rowCount = rows.length;
    console.log(`${rowCount} ${rowCount === 1 ? 'row' : 'rows'}`);
  }

  /**
   * Print data wrapped in a success envelope (JSON) or as-is
   */
  success<T>(data: T): void {
    if (this.format === 'json') {
      console.log(JSON.stringify(successEnvelope(this.command, data), null, 2));
    } else if (!this.quiet) {
      console.log(typeof data === 'string' ? data : JSON.stringify(data, null, 2));
    }
  }

  /**
   * Report a failure: an error envelope on stdout for JSON, a red line on stderr otherwise
   */
  error(error: CliError): void {
    if (this.format === 'json') {
      console.log(JSON.stringify(errorEnvelope(this.command, error.code, error.message, error.details), null, 2));
    } else {
      console.error(formatError(error.message));
    }
  }

  /**
   * Output a message (respects quiet mode and JSON output)
   */
  log(message: string): void {
    if (!this.quiet && this.format !== 'json') {
      console.log(message);
    }
  }
}

export function createOutput(options: OutputOptions = {}): Output {
  return new Output(options);
}
