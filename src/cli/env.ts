/**
 * Environment variable support
 *
 * Every application gets its own prefix derived from its name
 * (`my-tool` -> `MY_TOOL`). Environment variables override defaults but are
 * themselves overridden by explicit CLI flags.
 */

/**
 * Suffixes of the application-scoped variables cmdkit reads
 */
export const APP_ENV_SUFFIXES = {
  /** Custom config path (maps to --config) */
  CONFIG: 'CONFIG',
  /** Output format (maps to --output) */
  OUTPUT: 'OUTPUT',
  /** Minimal output (maps to --quiet) */
  QUIET: 'QUIET',
  /** Detailed output (maps to --verbose) */
  VERBOSE: 'VERBOSE',
  /** Disable colors (maps to --no-color) */
  NO_COLOR: 'NO_COLOR',
} as const;

export type AppEnvSuffix = keyof typeof APP_ENV_SUFFIXES;

/**
 * Well-known variables set by CI systems
 */
const CI_VARS: ReadonlyArray<[string, string]> = [
  ['GITHUB_ACTIONS', 'GitHub Actions'],
  ['GITLAB_CI', 'GitLab CI'],
  ['CIRCLECI', 'CircleCI'],
  ['TRAVIS', 'Travis CI'],
  ['JENKINS_URL', 'Jenkins'],
  ['CONTINUOUS_INTEGRATION', 'Generic CI'],
  ['CI', 'Generic CI'],
];

/**
 * Derive the environment prefix for an application name
 */
export function envPrefix(appName: string): string {
  return appName
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Full name of an application-scoped variable, e.g. `MY_TOOL_QUIET`
 */
export function appEnvVar(prefix: string, suffix: AppEnvSuffix): string {
  return `${prefix}_${APP_ENV_SUFFIXES[suffix]}`;
}

/**
 * Accepts: '1', 'true', 'yes', 'on' (case-insensitive)
 */
export function isTruthy(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.toLowerCase().trim();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

/**
 * Accepts: '0', 'false', 'no', 'off'. Empty and undefined mean "not set".
 */
export function isFalsy(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.toLowerCase().trim();
  return normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off';
}

export function getAppEnv(prefix: string, suffix: AppEnvSuffix): string | undefined {
  return process.env[appEnvVar(prefix, suffix)];
}

export function isAppEnvTrue(prefix: string, suffix: AppEnvSuffix): boolean {
  return isTruthy(getAppEnv(prefix, suffix));
}

export function isCI(): boolean {
  return CI_VARS.some(([name]) => !!process.env[name]);
}

/**
 * Detect which CI system is running (if any)
 */
export function getCISystem(): string | null {
  for (const [name, label] of CI_VARS) {
    if (process.env[name]) return label;
  }
  return null;
}

/**
 * Colors are off when NO_COLOR is set (any value, see no-color.org) or the
 * application's own NO_COLOR variable is truthy
 */
export function shouldDisableColors(prefix?: string): boolean {
  if (process.env.NO_COLOR !== undefined) return true;
  return prefix !== undefined && isAppEnvTrue(prefix, 'NO_COLOR');
}

/**
 * All variables carrying the application prefix, for debugging
 */
export function getEnvSnapshot(prefix: string): Record<string, string> {
  const snapshot: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (key.startsWith(`${prefix}_`) && value !== undefined) {
      snapshot[key] = value;
    }
  }
  return snapshot;
}

/**
 * Lines for the ENVIRONMENT VARIABLES help section
 */
export function describeEnvVars(prefix: string): Array<[string, string]> {
  return [
    [appEnvVar(prefix, 'CONFIG'), 'Custom config path (--config)'],
    [appEnvVar(prefix, 'OUTPUT'), 'Output format: json, table (--output)'],
    [appEnvVar(prefix, 'QUIET'), 'Minimal output (--quiet)'],
    [appEnvVar(prefix, 'VERBOSE'), 'Detailed output (--verbose)'],
    [appEnvVar(prefix, 'NO_COLOR'), 'Disable colors (--no-color)'],
    ['NO_COLOR', 'Standard no-color variable'],
    ['LOG_LEVEL', 'Log level: trace, debug, info, warn, error, fatal, silent'],
    ['LOG_FORMAT', 'Set to json for JSON log lines'],
  ];
}
