/**
 * Help text generation
 *
 * Templates for consistent help output across an application's commands.
 */

import { describeEnvVars } from './env.js';

/**
 * Help section structure
 */
export interface HelpSection {
  title: string;
  content: string;
}

/**
 * Command example
 */
export interface CommandExample {
  command: string;
  description: string;
}

/**
 * Option definition for help text
 */
export interface OptionDef {
  short?: string;
  long: string;
  description: string;
  values?: string;
  default?: string;
}

/**
 * Entry in a command listing
 */
export interface CommandSummary {
  name: string;
  description: string;
}

/**
 * Help template configuration
 */
export interface HelpTemplate {
  /** Application name (e.g. 'mytool') */
  program: string;
  /** Command name; omitted for application-level help */
  command?: string;
  /** Short one-line description */
  description: string;
  /** Detailed description (optional) */
  details?: string;
  /** Usage lines */
  usage?: string[];
  /** Commands listed under COMMANDS */
  commands?: CommandSummary[];
  /** Command-specific options */
  options?: OptionDef[];
  /** Examples with descriptions */
  examples?: CommandExample[];
  /** Custom sections */
  sections?: HelpSection[];
  /** Environment prefix; when set the ENVIRONMENT VARIABLES section is shown */
  envPrefix?: string;
  /** Whether to show global options (default: true) */
  showGlobalOptions?: boolean;
  /** Whether to show exit codes (default: true) */
  showExitCodes?: boolean;
}

function formatOption(opt: OptionDef): string {
  const flags = opt.short ? `-${opt.short}, --${opt.long}` : `    --${opt.long}`;
  const paddedFlags = flags.padEnd(24);

  let desc = opt.description;
  if (opt.values) {
    desc += `\n${' '.repeat(26)}Values: ${opt.values}`;
  }
  if (opt.default) {
    desc += `\n${' '.repeat(26)}Default: ${opt.default}`;
  }

  return `  ${paddedFlags}${desc}`;
}

function formatExample(ex: CommandExample): string {
  return `  ${ex.command.padEnd(40)} # ${ex.description}`;
}

/**
 * Options handled before command dispatch
 */
export const GLOBAL_OPTIONS: OptionDef[] = [
  { short: 'h', long: 'help', description: 'Show help' },
  { long: 'version', description: 'Show version' },
  { short: 'q', long: 'quiet', description: 'Minimal output' },
  { long: 'no-color', description: 'Disable colored output' },
  { long: 'config <path>', description: 'Custom config file path' },
];

const EXIT_CODES_SECTION = `
EXIT CODES:
  0  Success
  1  General error
  2  Invalid arguments or unknown command
  3  Configuration error
  4  Resource not found
  5  Permission denied
`;

/**
 * Generate help text from template
 */
export function generateHelp(template: HelpTemplate): string {
  const lines: string[] = [];
  const name = template.command ? `${template.program} ${template.command}` : template.program;

  lines.push(`${name} - ${template.description}`);
  lines.push('');

  lines.push('USAGE:');
  if (template.usage && template.usage.length > 0) {
    for (const usage of template.usage) {
      lines.push(`  ${usage}`);
    }
  } else if (template.command) {
    lines.push(`  ${name} [options]`);
  } else {
    lines.push(`  ${name} <command> [options]`);
  }
  lines.push('');

  if (template.details) {
    lines.push('DESCRIPTION:');
    for (const line of template.details.trim().split('\n')) {
      lines.push(line ? `  ${line}` : '');
    }
    lines.push('');
  }

  if (template.commands && template.commands.length > 0) {
    lines.push('COMMANDS:');
    for (const cmd of template.commands) {
      lines.push(`  ${cmd.name.padEnd(20)}${cmd.description}`);
    }
    lines.push('');
  }

  if (template.options && template.options.length > 0) {
    lines.push('OPTIONS:');
    for (const opt of template.options) {
      lines.push(formatOption(opt));
    }
    lines.push('');
  }

  if (template.showGlobalOptions !== false) {
    lines.push('GLOBAL OPTIONS:');
    for (const opt of GLOBAL_OPTIONS) {
      lines.push(formatOption(opt));
    }
    lines.push('');
  }

  if (template.examples && template.examples.length > 0) {
    lines.push('EXAMPLES:');
    for (const ex of template.examples) {
      lines.push(formatExample(ex));
    }
    lines.push('');
  }

  for (const section of template.sections ?? []) {
    lines.push(`${section.title}:`);
    for (const line of section.content.trim().split('\n')) {
      lines.push(line ? `  ${line}` : '');
    }
    lines.push('');
  }

  if (template.envPrefix) {
    lines.push('ENVIRONMENT VARIABLES:');
    for (const [variable, description] of describeEnvVars(template.envPrefix)) {
      lines.push(`  ${variable.padEnd(24)}${description}`);
    }
    lines.push('');
  }

  if (template.showExitCodes !== false) {
    lines.push(EXIT_CODES_SECTION.trim());
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Compact help hint for error messages
 */
export function helpHint(program: string, command?: string): string {
  if (command) {
    return `Run '${program} ${command} --help' for usage information.`;
  }
  return `Run '${program} --help' for usage information.`;
}

/**
 * Format a "Did you mean?" suggestion
 */
export function didYouMean(provided: string, options: string[]): string | null {
  const distances = options.map((opt) => ({
    option: opt,
    distance: levenshtein(provided.toLowerCase(), opt.toLowerCase()),
  }));

  distances.sort((a, b) => a.distance - b.distance);

  // Only suggest if distance is at most half the input length
  if (distances[0] && distances[0].distance <= provided.length / 2) {
    return `Did you mean '${distances[0].option}'?`;
  }

  return null;
}

function levenshtein(a: string, b: string): number {
  const matrix: number[][] = [];

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }

  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1, // substitution
          matrix[i][j - 1] + 1,     // insertion
          matrix[i - 1][j] + 1      // deletion
        );
      }
    }
  }

  return matrix[b.length][a.length];
}
