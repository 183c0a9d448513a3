/**
 * Colored terminal output
 *
 * Respects NO_COLOR (no-color.org) and the --no-color flag, which sets it.
 */

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

/**
 * Colors are disabled if NO_COLOR is set or stdout is not a TTY
 */
export function colorsEnabled(): boolean {
  return process.env.NO_COLOR === undefined && process.stdout.isTTY === true;
}

function colorize(text: string, color: string): string {
  if (!colorsEnabled()) {
    return text;
  }
  return `${color}${text}${COLORS.reset}`;
}

export const colors = {
  red(text: string): string {
    return colorize(text, COLORS.red);
  },

  green(text: string): string {
    return colorize(text, COLORS.green);
  },

  yellow(text: string): string {
    return colorize(text, COLORS.yellow);
  },

  cyan(text: string): string {
    return colorize(text, COLORS.cyan);
  },

  gray(text: string): string {
    return colorize(text, COLORS.gray);
  },

  bold(text: string): string {
    return colorize(text, COLORS.bold);
  },

  dim(text: string): string {
    return colorize(text, COLORS.dim);
  },
};

/**
 * Format error message with red color
 */
export function formatError(message: string): string {
  return colors.red(`Error: ${message}`);
}

export function formatWarning(message: string): string {
  return colors.yellow(`Warning: ${message}`);
}
