/**
 * Global flags parser
 *
 * Parses flags that apply to the whole application, wherever they appear:
 * - Display: --quiet, --no-color, --help
 * - Configuration: --config
 * - Version: --version
 *
 * Per-command flags (including --output and --verbose) are left in place for
 * the command's own ArgumentParser.
 */

import { getAppEnv, isAppEnvTrue, shouldDisableColors } from './env.js';
import { invalidArgumentsError } from './errors.js';

/**
 * Parsed global options available to all commands
 */
export interface GlobalFlags {
  /** Minimal output (-q, --quiet) */
  quiet: boolean;
  /** Show help (-h, --help) */
  help: boolean;
  /** Show version (--version) */
  version: boolean;
  /** Disable colors (--no-color) */
  noColor: boolean;
  /** Custom config path (--config) */
  configPath?: string;
}

/**
 * Result of parsing global flags
 */
export interface ParsedArgs {
  flags: GlobalFlags;
  /** Args left over for command parsing, in their original order */
  remaining: string[];
}

export function getDefaultFlags(): GlobalFlags {
  return {
    quiet: false,
    help: false,
    version: false,
    noColor: false,
    configPath: undefined,
  };
}

/**
 * Load flag defaults from the application's environment variables
 */
export function loadEnvFlags(prefix: string): Partial<GlobalFlags> {
  const env: Partial<GlobalFlags> = {};

  if (isAppEnvTrue(prefix, 'QUIET')) {
    env.quiet = true;
  }
  if (shouldDisableColors(prefix)) {
    env.noColor = true;
  }
  const configPath = getAppEnv(prefix, 'CONFIG');
  if (configPath) {
    env.configPath = configPath;
  }

  return env;
}

/**
 * Parse global flags from command line arguments
 *
 * Everything after a literal `--` is passed through untouched.
 */
export function parseGlobalFlags(args: string[], prefix: string): ParsedArgs {
  const flags: GlobalFlags = {
    ...getDefaultFlags(),
    ...loadEnvFlags(prefix),
  };

  const remaining: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];

    if (arg === '--') {
      remaining.push(...args.slice(i));
      break;
    }

    switch (arg) {
      case '-h':
      case '--help':
        flags.help = true;
        i++;
        break;

      case '--version':
        flags.version = true;
        i++;
        break;

      case '-q':
      case '--quiet':
        flags.quiet = true;
        i++;
        break;

      case '--no-color':
        flags.noColor = true;
        i++;
        break;

      case '--config':
        if (i + 1 >= args.length) {
          throw invalidArgumentsError('--config requires a path argument');
        }
        flags.configPath = args[i + 1];
        i += 2;
        break;

      default:
        if (arg.startsWith('--config=')) {
          flags.configPath = arg.slice('--config='.length);
        } else {
          remaining.push(arg);
        }
        i++;
    }
  }

  return { flags, remaining };
}

/**
 * Apply global flags to runtime behavior
 */
export function applyGlobalFlags(flags: GlobalFlags): void {
  if (flags.noColor) {
    process.env.NO_COLOR = '1';
  }
}
