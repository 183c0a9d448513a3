/**
 * Check for new releases of a package on the npm registry or GitHub
 *
 * The last result is cached in <dataDir>/update.json so the network is hit at
 * most once per check interval. Nothing here throws on network or cache
 * problems; the checker falls back to what it already knows.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import Ajv from 'ajv';
import { errorMessage } from '../cli/errors.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { compareVersions } from './version.js';

export type UpdateSource = 'npm' | 'github';

export const DEFAULT_REGISTRY_URL = 'https://registry.npmjs.org';
export const DEFAULT_CHECK_INTERVAL_MS = 60 * 60 * 1000;
export const DEFAULT_TIMEOUT_MS = 5000;

const CACHE_FILE = 'update.json';
const FALLBACK_VERSION = '0.0.0';

export interface UpdateCheckerOptions {
  packageName: string;
  /** Installed version; read from the package's package.json when omitted */
  currentVersion?: string;
  source?: UpdateSource;
  /** GitHub repository as owner/name, for source 'github' */
  repo?: string;
  /** Minimum time between network checks, in milliseconds */
  checkInterval?: number;
  /** Directory holding the update cache */
  dataDir?: string;
  registryUrl?: string;
  /** Request timeout, in milliseconds */
  timeout?: number;
  logger?: Logger;
}

export interface UpdateCache {
  lastCheck: string | null;
  latestVersion: string | null;
  currentVersion: string | null;
}

export interface UpdateStatus {
  packageName: string;
  currentVersion: string;
  latestVersion: string;
  updateAvailable: boolean;
  lastChecked: Date | null;
}

const nullableString = { type: ['string', 'null'] };

const cacheSchema = {
  type: 'object',
  properties: {
    lastCheck: nullableString,
    latestVersion: nullableString,
    currentVersion: nullableString,
  },
};

interface NpmLatest {
  version: string;
}

interface GithubRelease {
  tag_name: string;
}

const ajv = new Ajv();
const isUpdateCache = ajv.compile<Partial<UpdateCache>>(cacheSchema);
const isNpmLatest = ajv.compile<NpmLatest>({
  type: 'object',
  properties: { version: { type: 'string' } },
  required: ['version'],
});
const isGithubRelease = ajv.compile<GithubRelease>({
  type: 'object',
  properties: { tag_name: { type: 'string' } },
  required: ['tag_name'],
});
const isPackageJson = ajv.compile<{ version: string }>({
  type: 'object',
  properties: { version: { type: 'string' } },
  required: ['version'],
});

function emptyCache(): UpdateCache {
  return { lastCheck: null, latestVersion: null, currentVersion: null };
}

/**
 * %APPDATA%/<name> on Windows, ~/.config/<name> elsewhere
 */
export function getDefaultDataDir(packageName: string): string {
  if (process.platform === 'win32') {
    return join(process.env.APPDATA || join(homedir(), 'AppData', 'Roaming'), packageName);
  }
  return join(homedir(), '.config', packageName);
}

/**
 * Version of an installed package, or null when it cannot be resolved
 */
export function readInstalledVersion(packageName: string): string | null {
  try {
    const manifest: unknown = JSON.parse(readFileSync(require.resolve(`${packageName}/package.json`), 'utf-8'));
    return isPackageJson(manifest) ? manifest.version : null;
  } catch {
    return null;
  }
}

export class UpdateChecker {
  readonly packageName: string;
  readonly currentVersion: string;
  readonly source: UpdateSource;
  readonly repo?: string;
  readonly checkInterval: number;
  readonly dataDir: string;
  readonly registryUrl: string;
  readonly timeout: number;
  private readonly logger: Logger;
  private cache: UpdateCache;

  constructor(options: UpdateCheckerOptions) {
    this.packageName = options.packageName;
    this.logger = options.logger ?? createLogger('UpdateChecker');
    this.repo = options.repo;
    this.source = options.source === 'github' && options.repo ? 'github' : 'npm';
    this.checkInterval = options.checkInterval ?? DEFAULT_CHECK_INTERVAL_MS;
    this.registryUrl = (options.registryUrl ?? DEFAULT_REGISTRY_URL).replace(/\/+$/, '');
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.dataDir = this.prepareDataDir(options.dataDir ?? getDefaultDataDir(options.packageName));

    if (options.source === 'github' && !options.repo) {
      this.logger.warn('No GitHub repository given for %s; checking npm instead', this.packageName);
    }

    let currentVersion = options.currentVersion ?? readInstalledVersion(this.packageName);
    if (!currentVersion) {
      this.logger.warn('Could not determine the installed version of %s', this.packageName);
      currentVersion = FALLBACK_VERSION;
    }
    this.currentVersion = currentVersion;

    this.cache = this.loadCache();
  }

  get cacheFile(): string {
    return join(this.dataDir, CACHE_FILE);
  }

  /**
   * URL of the latest-release document for the configured source
   */
  get latestUrl(): string {
    if (this.source === 'github' && this.repo) {
      return `https://api.github.com/repos/${this.repo}/releases/latest`;
    }
    return `${this.registryUrl}/${this.packageName}/latest`;
  }

  private prepareDataDir(dir: string): string {
    try {
      mkdirSync(dir, { recursive: true });
      return dir;
    } catch (error) {
      this.logger.debug('Cannot create %s (%s); using the temp directory', dir, errorMessage(error));
      return tmpdir();
    }
  }

  private loadCache(): UpdateCache {
    if (!existsSync(this.cacheFile)) {
      return emptyCache();
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.cacheFile, 'utf-8'));
      if (isUpdateCache(parsed)) {
        return {
          lastCheck: parsed.lastCheck ?? null,
          latestVersion: parsed.latestVersion ?? null,
          currentVersion: parsed.currentVersion ?? null,
        };
      }
      this.logger.debug('Ignoring malformed update cache at %s', this.cacheFile);
    } catch (error) {
      this.logger.debug('Ignoring unreadable update cache at %s: %s', this.cacheFile, errorMessage(error));
    }
    return emptyCache();
  }

  private saveCache(): void {
    try {
      writeFileSync(this.cacheFile, JSON.stringify(this.cache, null, 2), 'utf-8');
    } catch (error) {
      this.logger.debug('Could not write update cache: %s', errorMessage(error));
    }
  }

  private isDue(now: Date): boolean {
    if (!this.cache.lastCheck) {
      return true;
    }
    const last = Date.parse(this.cache.lastCheck);
    return isNaN(last) || now.getTime() - last >= this.checkInterval;
  }

  /**
   * Latest published version, or null when the lookup fails
   */
  async fetchLatestVersion(): Promise<string | null> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.source === 'github') {
      headers.Accept = 'application/vnd.github+json';
    }

    try {
      const response = await fetch(this.latestUrl, {
        headers,
        signal: AbortSignal.timeout(this.timeout),
      });

      if (!response.ok) {
        this.logger.debug('Update check failed: HTTP %d from %s', response.status, this.latestUrl);
        return null;
      }

      const body: unknown = await response.json();
      if (this.source === 'github') {
        return isGithubRelease(body) ? body.tag_name.replace(/^v/, '') : null;
      }
      return isNpmLatest(body) ? body.version : null;
    } catch (error) {
      this.logger.debug('Update check failed: %s', errorMessage(error));
      return null;
    }
  }

  /**
   * Refresh the cached latest version when forced or when the interval has elapsed
   */
  async checkForUpdates(options: { force?: boolean } = {}): Promise<UpdateStatus> {
    const now = new Date();
    if (options.force || this.isDue(now)) {
      const latest = await this.fetchLatestVersion();
      this.cache = {
        lastCheck: now.toISOString(),
        latestVersion: latest ?? this.cache.latestVersion ?? this.currentVersion,
        currentVersion: this.currentVersion,
      };
      this.saveCache();
    }
    return this.getUpdateStatus();
  }

  getUpdateStatus(): UpdateStatus {
    const latestVersion = this.cache.latestVersion ?? this.currentVersion;
    const lastChecked = this.cache.lastCheck ? new Date(this.cache.lastCheck) : null;

    return {
      packageName: this.packageName,
      currentVersion: this.currentVersion,
      latestVersion,
      updateAvailable: compareVersions(latestVersion, this.currentVersion) > 0,
      lastChecked: lastChecked && !isNaN(lastChecked.getTime()) ? lastChecked : null,
    };
  }

  /**
   * Log a notice when a newer version exists. Returns whether one does.
   */
  async notifyIfUpdateAvailable(options: { quiet?: boolean; force?: boolean } = {}): Promise<boolean> {
    const status = await this.checkForUpdates({ force: options.force });

    if (status.updateAvailable) {
      this.logger.warn(
        'A new version of %s is available: %s (current: %s). Update with: npm install -g %s@latest',
        status.packageName,
        status.latestVersion,
        status.currentVersion,
        status.packageName
      );
    } else if (!options.quiet) {
      this.logger.info('%s is up to date (%s).', status.packageName, status.currentVersion);
    }

    return status.updateAvailable;
  }
}

export interface CheckPackageOptions extends Omit<UpdateCheckerOptions, 'packageName'> {
  /** Log a notice (default true) */
  notify?: boolean;
  force?: boolean;
  /** Stay silent when up to date (default true) */
  quiet?: boolean;
}

/**
 * One-shot check for a package; returns the resulting status
 */
export async function checkPackageForUpdates(
  packageName: string,
  options: CheckPackageOptions = {}
): Promise<UpdateStatus> {
  const { notify = true, force = false, quiet = true, ...checkerOptions } = options;
  const checker = new UpdateChecker({ ...checkerOptions, packageName });

  if (notify) {
    await checker.notifyIfUpdateAvailable({ quiet, force });
    return checker.getUpdateStatus();
  }
  return checker.checkForUpdates({ force });
}
