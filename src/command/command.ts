/**
 * Base class for all commands
 *
 * A command declares its arguments, optionally validates them and executes.
 * `safeExecute` wraps the run so a failing command yields an outcome rather
 * than an exception.
 */

import { CommandError, errorMessage } from '../cli/errors.js';
import type { CommandExample } from '../cli/help.js';
import { Output } from '../cli/output.js';
import { createLogger, setLogLevel, type Logger, type LogLevel } from '../logging/logger.js';
import type { ArgumentParser, CommandArgs } from './arguments.js';

export const OUTPUT_FORMATS = ['json', 'table'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface CommandOptions {
  /** Initial log level for the command's logger */
  logLevel?: LogLevel;
  /** Use this logger instead of one named after the class */
  logger?: Logger;
}

export type CommandOutcome<TResult> =
  | { success: true; result: TResult }
  | { success: false; error: CommandError };

export abstract class Command<TResult = unknown> {
  /** Name used to invoke the command */
  abstract readonly name: string;
  /** One-line description for help output */
  abstract readonly description: string;
  /** Longer description for the command's help */
  readonly details?: string;
  readonly examples?: CommandExample[];

  readonly log: Logger;

  constructor(options: CommandOptions = {}) {
    this.log = options.logger ?? createLogger(new.target.name, { level: options.logLevel });
  }

  /**
   * Add the arguments every command shares: --output and --verbose.
   * An argument already defined under the same destination is left as is.
   */
  static defineCommonArguments(parser: ArgumentParser): ArgumentParser {
    if (!parser.hasArgument('output')) {
      parser.addArgument('--output', {
        help: 'Output format',
        choices: OUTPUT_FORMATS,
        default: 'table',
        metavar: 'FORMAT',
      });
    }

    if (!parser.hasArgument('verbose')) {
      parser.addArgument('--verbose', {
        type: 'boolean',
        short: 'v',
        help: 'Verbose output',
        default: false,
      });
    }

    return parser;
  }

  /**
   * Add command-specific arguments; implementations usually finish with
   * `Command.defineCommonArguments(parser)`.
   */
  abstract defineArguments(parser: ArgumentParser): ArgumentParser;

  abstract execute(args: CommandArgs): TResult | Promise<TResult>;

  /**
   * Reject invalid arguments by throwing CommandError. Accepts everything by default.
   */
  validateArgs(_args: CommandArgs): void {
    // no constraints by default
  }

  /**
   * Output configured from the parsed --output and --quiet
   */
  protected output(args: CommandArgs): Output {
    return new Output({
      format: isOutputFormat(args.output) ? args.output : 'table',
      quiet: args.quiet === true,
      command: this.name,
      logger: this.log,
    });
  }

  async safeExecute(args: CommandArgs): Promise<CommandOutcome<TResult>> {
    try {
      if (args.verbose === true) {
        setLogLevel(this.log, 'debug');
      }

      this.validateArgs(args);
      const result = await this.execute(args);
      return { success: true, result };
    } catch (error) {
      if (error instanceof CommandError) {
        this.log.error(error.message);
        return { success: false, error };
      }

      this.log.error({ err: error }, `Unexpected error executing ${this.constructor.name}`);
      return {
        success: false,
        error: new CommandError(`Unexpected error: ${errorMessage(error)}`),
      };
    }
  }
}
