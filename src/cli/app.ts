/**
 * Command-line application
 *
 * Maps command names to Command instances and runs one per invocation:
 * global flags first, then the command name, then the command's own
 * arguments.
 */

import { ArgumentParser, type CommandArgs } from '../command/arguments.js';
import { Command, isOutputFormat, type OutputFormat } from '../command/command.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { UpdateChecker } from '../update/update-checker.js';
import { envPrefix, getAppEnv, isTruthy } from './env.js';
import { CliError, ErrorCode, ExitCode, errorMessage, invalidArgumentsError, unknownCommandError } from './errors.js';
import { applyGlobalFlags, parseGlobalFlags, type GlobalFlags } from './flags.js';
import { didYouMean, generateHelp, helpHint } from './help.js';
import { Output } from './output.js';

export interface CliOptions {
  /** Program name as typed by users; also the source of the environment prefix */
  name: string;
  version: string;
  description?: string;
  commands?: Command[];
  /** Checked after each successful run unless output is quiet or JSON */
  updateChecker?: UpdateChecker;
  logger?: Logger;
}

export interface Invocation {
  command: Command | null;
  args: CommandArgs;
  flags: GlobalFlags;
}

/**
 * `--output json` / `--output=json` anywhere in argv, else the environment
 */
function requestedFormat(argv: string[], prefix: string): OutputFormat {
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--') break;
    const value = argv[i] === '--output' ? argv[i + 1] : argv[i].startsWith('--output=') ? argv[i].slice(9) : undefined;
    if (isOutputFormat(value)) {
      return value;
    }
  }
  const fromEnv = getAppEnv(prefix, 'OUTPUT');
  return isOutputFormat(fromEnv) ? fromEnv : 'table';
}

export class Cli {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly envPrefix: string;
  private readonly commands = new Map<string, Command>();
  private readonly updateChecker?: UpdateChecker;
  private readonly logger: Logger;

  constructor(options: CliOptions) {
    this.name = options.name;
    this.version = options.version;
    this.description = options.description ?? '';
    this.envPrefix = envPrefix(options.name);
    this.updateChecker = options.updateChecker;
    this.logger = options.logger ?? createLogger(options.name);

    for (const command of options.commands ?? []) {
      this.register(command);
    }
  }

  register(command: Command): this {
    if (this.commands.has(command.name)) {
      throw new Error(`Command already registered: ${command.name}`);
    }
    this.commands.set(command.name, command);
    return this;
  }

  getCommand(name: string): Command | undefined {
    return this.commands.get(name);
  }

  get commandNames(): string[] {
    return [...this.commands.keys()];
  }

  /**
   * Parser for a command: its own arguments plus the common ones, with
   * <PREFIX>_OUTPUT and <PREFIX>_VERBOSE as defaults
   */
  buildParser(command: Command | null): ArgumentParser {
    const parser = new ArgumentParser({
      prog: command ? `${this.name} ${command.name}` : this.name,
      description: command ? command.description : this.description,
    });
    if (command) {
      command.defineArguments(parser);
    }
    Command.defineCommonArguments(parser);

    const output = getAppEnv(this.envPrefix, 'OUTPUT');
    if (isOutputFormat(output)) {
      parser.setDefault('output', output);
    }
    if (isTruthy(getAppEnv(this.envPrefix, 'VERBOSE'))) {
      parser.setDefault('verbose', true);
    }
    return parser;
  }

  parse(argv: string[]): Invocation {
    const { flags, remaining } = parseGlobalFlags(argv, this.envPrefix);

    let command: Command | null = null;
    let rest = remaining;
    const first = remaining[0];
    if (first !== undefined && !first.startsWith('-')) {
      const found = this.commands.get(first);
      if (!found) {
        throw unknownCommandError(first);
      }
      command = found;
      rest = remaining.slice(1);
    }

    const parser = this.buildParser(command);
    // Help must not trip over missing required arguments
    const args: CommandArgs = flags.help && command ? {} : parser.parse(rest);
    if (flags.help && command) {
      for (const def of parser.arguments) {
        args[def.dest] = def.default;
      }
    }

    if (flags.quiet && args.verbose === true) {
      throw invalidArgumentsError('--quiet and --verbose cannot be used together');
    }

    args.quiet = flags.quiet;
    args.config = flags.configPath;

    return { command, args, flags };
  }

  /**
   * Run one invocation; resolves to the process exit code
   */
  async run(argv: string[] = process.argv.slice(2)): Promise<number> {
    let invocation: Invocation;
    try {
      invocation = this.parse(argv);
    } catch (error) {
      return this.fail(error, requestedFormat(argv, this.envPrefix));
    }

    const { command, args, flags } = invocation;
    applyGlobalFlags(flags);
    const format: OutputFormat = isOutputFormat(args.output) ? args.output : 'table';

    if (flags.help) {
      console.log(command ? this.commandHelp(command) : this.help());
      return ExitCode.SUCCESS;
    }

    if (flags.version) {
      if (format === 'json') {
        console.log(JSON.stringify({ version: this.version }, null, 2));
      } else {
        console.log(`${this.name} v${this.version}`);
      }
      return ExitCode.SUCCESS;
    }

    if (!command) {
      console.log(this.help());
      return ExitCode.GENERAL_ERROR;
    }

    const outcome = await command.safeExecute(args);
    if (!outcome.success) {
      new Output({ format, command: command.name, logger: this.logger }).error(outcome.error);
      return outcome.error.exitCode;
    }

    if (!flags.quiet && format !== 'json') {
      await this.notifyUpdates();
    }
    return ExitCode.SUCCESS;
  }

  /**
   * Run and set process.exitCode
   */
  async main(argv: string[] = process.argv.slice(2)): Promise<void> {
    process.exitCode = await this.run(argv);
  }

  help(): string {
    return generateHelp({
      program: this.name,
      description: this.description,
      commands: [...this.commands.values()].map((command) => ({
        name: command.name,
        description: command.description,
      })),
      envPrefix: this.envPrefix,
    });
  }

  commandHelp(command: Command): string {
    const parser = this.buildParser(command);
    return generateHelp({
      program: this.name,
      command: command.name,
      description: command.description,
      details: command.details,
      usage: [parser.usage()],
      options: parser.helpOptions(),
      examples: command.examples,
      showExitCodes: false,
    });
  }

  private fail(error: unknown, format: OutputFormat): number {
    const cliError = error instanceof CliError ? error : new CliError(ErrorCode.INTERNAL_ERROR, errorMessage(error));
    new Output({ format, logger: this.logger }).error(cliError);

    if (format !== 'json') {
      if (cliError.code === ErrorCode.UNKNOWN_COMMAND) {
        const provided = cliError.details?.command;
        const suggestion = typeof provided === 'string' ? didYouMean(provided, this.commandNames) : null;
        if (suggestion) {
          console.error(suggestion);
        }
        console.error(helpHint(this.name));
      } else if (cliError.code === ErrorCode.INVALID_ARGUMENTS) {
        console.error(helpHint(this.name));
      }
    }

    return cliError.exitCode;
  }

  private async notifyUpdates(): Promise<void> {
    if (!this.updateChecker) {
      return;
    }
    try {
      await this.updateChecker.notifyIfUpdateAvailable({ quiet: true });
    } catch (error) {
      this.logger.debug('Update check failed: %s', errorMessage(error));
    }
  }
}
