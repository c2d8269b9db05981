import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { ConfigError, defaultSocketPath, loadConfig } from '../src/config/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ SHELL: '/bin/zsh', XDG_RUNTIME_DIR: '/run/user/1000' });

    expect(config).toEqual({
      socketPath: defaultSocketPath({ XDG_RUNTIME_DIR: '/run/user/1000' }),
      shellPath: '/bin/zsh',
      shellArgs: [],
      defaultTimeoutMs: 30_000,
      denyPatterns: [],
      allowPatterns: [],
      logLevel: 'info',
      logFile: path.join(os.homedir(), '.local', 'share', 'shellgate', 'logs', 'shellgate.log'),
    });
    expect(config.socketPath.startsWith('/run/user/1000/shellgate-')).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      SHELLGATE_SOCKET: '/tmp/agent.sock',
      SHELLGATE_SHELL: '/bin/bash',
      SHELLGATE_SHELL_ARGS: '["--norc", "--noprofile"]',
      SHELLGATE_TIMEOUT: '2.5',
      SHELLGATE_DENY_PATTERNS: '["curl .*\\\\| *sh"]',
      SHELLGATE_ALLOW_PATTERNS: '["^git "]',
      SHELLGATE_LOG_LEVEL: 'debug',
      SHELLGATE_LOG_FILE: '/tmp/shellgate.log',
    });

    expect(config).toEqual({
      socketPath: '/tmp/agent.sock',
      shellPath: '/bin/bash',
      shellArgs: ['--norc', '--noprofile'],
      defaultTimeoutMs: 2500,
      denyPatterns: ['curl .*\\| *sh'],
      allowPatterns: ['^git '],
      logLevel: 'debug',
      logFile: '/tmp/shellgate.log',
    });
  });

  it('rejects a non-positive timeout', () => {
    expect(() => loadConfig({ SHELLGATE_TIMEOUT: '-1' })).toThrow(ConfigError);
  });

  it('rejects pattern lists that are not JSON arrays of strings', () => {
    expect(() => loadConfig({ SHELLGATE_DENY_PATTERNS: 'rm' })).toThrow(
      'SHELLGATE_DENY_PATTERNS must be a JSON array of strings.',
    );
  });

  it('rejects invalid regular expressions', () => {
    expect(() => loadConfig({ SHELLGATE_ALLOW_PATTERNS: '["("]' })).toThrow(
      /^SHELLGATE_ALLOW_PATTERNS contains an invalid pattern "\("/u,
    );
  });
});
