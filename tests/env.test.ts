/**
 * Tests for environment variable support
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  envPrefix,
  appEnvVar,
  isTruthy,
  isFalsy,
  getAppEnv,
  isAppEnvTrue,
  isCI,
  getCISystem,
  shouldDisableColors,
  getEnvSnapshot,
  describeEnvVars,
} from '../src/cli/env.js';

const CI_NAMES = ['GITHUB_ACTIONS', 'GITLAB_CI', 'CIRCLECI', 'TRAVIS', 'JENKINS_URL', 'CONTINUOUS_INTEGRATION', 'CI'];

describe('envPrefix', () => {
  it('should upper-case the application name', () => {
    expect(envPrefix('mytool')).toBe('MYTOOL');
  });

  it('should turn separators into underscores', () => {
    expect(envPrefix('my-tool')).toBe('MY_TOOL');
    expect(envPrefix('my.cool tool')).toBe('MY_COOL_TOOL');
  });

  it('should trim leading and trailing separators', () => {
    expect(envPrefix('@scope/tool-')).toBe('SCOPE_TOOL');
  });

  it('should build full variable names', () => {
    expect(appEnvVar('MY_TOOL', 'NO_COLOR')).toBe('MY_TOOL_NO_COLOR');
  });
});

describe('isTruthy / isFalsy', () => {
  it.each(['1', 'true', 'TRUE', 'yes', 'on', ' On '])('should treat %p as truthy', (value) => {
    expect(isTruthy(value)).toBe(true);
    expect(isFalsy(value)).toBe(false);
  });

  it.each(['0', 'false', 'No', 'off'])('should treat %p as falsy', (value) => {
    expect(isFalsy(value)).toBe(true);
    expect(isTruthy(value)).toBe(false);
  });

  it('should treat empty and undefined as neither', () => {
    expect(isTruthy('')).toBe(false);
    expect(isFalsy('')).toBe(false);
    expect(isTruthy(undefined)).toBe(false);
    expect(isFalsy(undefined)).toBe(false);
  });
});

describe('application variables', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should read prefixed variables', () => {
    process.env.MY_TOOL_OUTPUT = 'json';
    process.env.MY_TOOL_VERBOSE = 'on';
    expect(getAppEnv('MY_TOOL', 'OUTPUT')).toBe('json');
    expect(isAppEnvTrue('MY_TOOL', 'VERBOSE')).toBe(true);
    expect(isAppEnvTrue('MY_TOOL', 'QUIET')).toBe(false);
  });

  it('should snapshot only variables with the prefix', () => {
    process.env.MY_TOOL_QUIET = '1';
    process.env.MY_TOOL_CONFIG = '/tmp/c.yaml';
    process.env.MY_TOOLBOX = 'nope';
    expect(getEnvSnapshot('MY_TOOL')).toEqual({
      MY_TOOL_QUIET: '1',
      MY_TOOL_CONFIG: '/tmp/c.yaml',
    });
  });

  it('should describe variables for help output', () => {
    const names = describeEnvVars('MY_TOOL').map(([name]) => name);
    expect(names).toEqual([
      'MY_TOOL_CONFIG',
      'MY_TOOL_OUTPUT',
      'MY_TOOL_QUIET',
      'MY_TOOL_VERBOSE',
      'MY_TOOL_NO_COLOR',
      'NO_COLOR',
      'LOG_LEVEL',
      'LOG_FORMAT',
    ]);
  });
});

describe('shouldDisableColors', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.NO_COLOR;
    delete process.env.MY_TOOL_NO_COLOR;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should keep colors by default', () => {
    expect(shouldDisableColors('MY_TOOL')).toBe(false);
  });

  it('should disable colors when NO_COLOR is present, even empty', () => {
    process.env.NO_COLOR = '';
    expect(shouldDisableColors()).toBe(true);
  });

  it('should disable colors for a truthy application variable', () => {
    process.env.MY_TOOL_NO_COLOR = 'true';
    expect(shouldDisableColors('MY_TOOL')).toBe(true);
    expect(shouldDisableColors()).toBe(false);
  });
});

describe('CI detection', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    for (const name of CI_NAMES) {
      delete process.env[name];
    }
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('should report no CI when nothing is set', () => {
    expect(isCI()).toBe(false);
    expect(getCISystem()).toBeNull();
  });

  it('should name a specific CI system before the generic one', () => {
    process.env.CI = 'true';
    process.env.GITHUB_ACTIONS = 'true';
    expect(isCI()).toBe(true);
    expect(getCISystem()).toBe('GitHub Actions');
  });

  it('should fall back to generic CI', () => {
    process.env.CI = '1';
    expect(getCISystem()).toBe('Generic CI');
  });
});
