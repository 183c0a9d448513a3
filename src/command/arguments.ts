/**
 * Declarative argument definitions for commands
 *
 * Commands describe their options and positionals once; parsing is done by
 * node:util parseArgs and the result is converted, defaulted and validated
 * here.
 */

import { parseArgs, type ParseArgsConfig } from 'node:util';
import { errorMessage, invalidArgumentsError } from '../cli/errors.js';
import type { OptionDef } from '../cli/help.js';

export type ArgumentType = 'string' | 'boolean' | 'number';

export type ArgumentValue = string | number | boolean | string[] | number[] | undefined;

/**
 * Parsed arguments keyed by destination name
 */
export type CommandArgs = Record<string, ArgumentValue>;

export interface ArgumentSpec {
  /** Value type (default 'string') */
  type?: ArgumentType;
  /** Single-letter alias, options only */
  short?: string;
  help?: string;
  /** Allowed values (string and number arguments) */
  choices?: readonly string[];
  default?: ArgumentValue;
  /** Options default to optional, positionals to required */
  required?: boolean;
  /** Accept the option repeatedly / collect remaining positionals */
  multiple?: boolean;
  /** Placeholder shown in help, e.g. FORMAT */
  metavar?: string;
  /** Key in the parsed result (default: camel-cased name) */
  dest?: string;
}

export interface ArgumentDefinition {
  name: string;
  dest: string;
  type: ArgumentType;
  positional: boolean;
  required: boolean;
  multiple: boolean;
  short?: string;
  help?: string;
  choices?: readonly string[];
  default?: ArgumentValue;
  metavar?: string;
}

type OptionsConfig = NonNullable<ParseArgsConfig['options']>;

type RawValue = string | boolean | Array<string | boolean> | undefined;

/**
 * `dry-run` -> `dryRun`
 */
export function toDest(name: string): string {
  return name.replace(/-+([a-z0-9])/gi, (_match, char: string) => char.toUpperCase());
}

export class ArgumentParser {
  readonly prog: string;
  readonly description: string;
  private readonly definitions: ArgumentDefinition[] = [];

  constructor(options: { prog?: string; description?: string } = {}) {
    this.prog = options.prog ?? '';
    this.description = options.description ?? '';
  }

  /**
   * Add an option (`--name`) or a positional (`name`)
   */
  addArgument(name: string, spec: ArgumentSpec = {}): this {
    const positional = !name.startsWith('-');
    const bare = name.replace(/^-+/, '');
    if (!bare) {
      throw new Error(`Invalid argument name: ${name}`);
    }

    const dest = spec.dest ?? toDest(bare);
    if (this.hasArgument(dest)) {
      throw new Error(`Argument already defined: ${dest}`);
    }
    if (positional && spec.short) {
      throw new Error(`Positional argument ${bare} cannot have a short alias`);
    }

    const type = spec.type ?? 'string';
    this.definitions.push({
      name: bare,
      dest,
      type,
      positional,
      required: spec.required ?? (positional && spec.default === undefined),
      multiple: spec.multiple ?? false,
      short: spec.short,
      help: spec.help,
      choices: spec.choices,
      default: spec.default ?? (type === 'boolean' && !positional ? false : undefined),
      metavar: spec.metavar,
    });
    return this;
  }

  hasArgument(dest: string): boolean {
    return this.definitions.some((def) => def.dest === dest);
  }

  getArgument(dest: string): ArgumentDefinition | undefined {
    return this.definitions.find((def) => def.dest === dest);
  }

  /**
   * Override the default of an existing argument
   */
  setDefault(dest: string, value: ArgumentValue): void {
    const def = this.getArgument(dest);
    if (!def) {
      throw new Error(`Unknown argument: ${dest}`);
    }
    def.default = value;
  }

  get arguments(): readonly ArgumentDefinition[] {
    return this.definitions;
  }

  /**
   * Parse argv into a destination -> value map
   */
  parse(argv: string[]): CommandArgs {
    const options: OptionsConfig = {};
    for (const def of this.definitions) {
      if (def.positional) continue;
      options[def.name] = {
        type: def.type === 'boolean' ? 'boolean' : 'string',
        multiple: def.multiple,
        ...(def.short ? { short: def.short } : {}),
      };
    }

    let parsed: { values: Record<string, RawValue>; positionals: string[] };
    try {
      parsed = parseArgs({ args: argv, options, allowPositionals: true, strict: true });
    } catch (error) {
      throw invalidArgumentsError(errorMessage(error));
    }

    const result: CommandArgs = {};

    for (const def of this.definitions) {
      if (def.positional) continue;
      const raw = parsed.values[def.name];
      if (raw === undefined && def.required) {
        throw invalidArgumentsError(`Missing required option: --${def.name}`);
      }
      result[def.dest] = raw === undefined ? def.default : this.convert(def, raw);
    }

    const positionals = [...parsed.positionals];
    for (const def of this.definitions) {
      if (!def.positional) continue;
      const raw: string[] = def.multiple ? positionals.splice(0) : positionals.splice(0, 1);
      if (raw.length === 0) {
        if (def.required) {
          throw invalidArgumentsError(`Missing required argument: ${def.name}`);
        }
        result[def.dest] = def.default;
        continue;
      }
      result[def.dest] = this.convert(def, def.multiple ? raw : raw[0]);
    }

    if (positionals.length > 0) {
      throw invalidArgumentsError(`Unexpected argument: ${positionals[0]}`);
    }

    return result;
  }

  private convert(def: ArgumentDefinition, raw: string | boolean | Array<string | boolean>): ArgumentValue {
    if (def.type === 'boolean') {
      return Array.isArray(raw) ? raw.some((value) => value === true) : raw === true;
    }

    const items = (Array.isArray(raw) ? raw : [raw]).map(String);
    for (const item of items) {
      if (def.choices && !def.choices.includes(item)) {
        throw invalidArgumentsError(
          `Invalid value for ${def.positional ? def.name : `--${def.name}`}: '${item}' (choose from ${def.choices.join(', ')})`
        );
      }
    }

    if (def.type === 'number') {
      const numbers = items.map((item) => {
        const value = Number(item);
        if (item.trim() === '' || Number.isNaN(value)) {
          throw invalidArgumentsError(`Invalid number for ${def.positional ? def.name : `--${def.name}`}: '${item}'`);
        }
        return value;
      });
      return def.multiple ? numbers : numbers[0];
    }

    return def.multiple ? items : items[0];
  }

  /**
   * One-line usage, e.g. `<name> [--output <FORMAT>] [options]`
   */
  usage(): string {
    const parts: string[] = [];
    if (this.prog) parts.push(this.prog);
    for (const def of this.definitions) {
      if (!def.positional) continue;
      const label = def.multiple ? `<${def.name}...>` : `<${def.name}>`;
      parts.push(def.required ? label : `[${label}]`);
    }
    for (const def of this.definitions) {
      if (def.positional || !def.required) continue;
      parts.push(`--${def.name} <${def.metavar ?? def.name.toUpperCase()}>`);
    }
    if (this.definitions.some((def) => !def.positional && !def.required)) {
      parts.push('[options]');
    }
    return parts.join(' ');
  }

  /**
   * Option definitions for the help generator
   */
  helpOptions(): OptionDef[] {
    return this.definitions
      .filter((def) => !def.positional)
      .map((def) => ({
        short: def.short,
        long: def.type === 'boolean' ? def.name : `${def.name} <${def.metavar ?? def.name.toUpperCase()}>`,
        description: def.help ?? '',
        values: def.choices ? def.choices.join(' | ') : undefined,
        default: def.default !== undefined && def.type !== 'boolean' ? String(def.default) : undefined,
      }));
  }
}
