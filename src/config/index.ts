import 'dotenv/config';

import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import type { LogLevel } from '../logging/logger.js';

export interface ShellgateConfig {
  socketPath: string;
  shellPath: string;
  shellArgs: string[];
  defaultTimeoutMs: number;
  denyPatterns: string[];
  allowPatterns: string[];
  logLevel: LogLevel;
  logFile: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_TIMEOUT_SECONDS = 30;

const patternListSchema = z.array(z.string().min(1));

const envSchema = z.object({
  SHELLGATE_SOCKET: z.string().min(1).optional(),
  SHELLGATE_SHELL: z.string().min(1).optional(),
  SHELLGATE_SHELL_ARGS: z.string().optional(),
  SHELLGATE_TIMEOUT: z.coerce.number().positive().optional(),
  SHELLGATE_DENY_PATTERNS: z.string().optional(),
  SHELLGATE_ALLOW_PATTERNS: z.string().optional(),
  SHELLGATE_LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .optional(),
  SHELLGATE_LOG_FILE: z.string().min(1).optional(),
});

export function defaultSocketPath(env: NodeJS.ProcessEnv = process.env): string {
  const runtimeDir = env.XDG_RUNTIME_DIR ?? os.tmpdir();
  const uid = typeof process.getuid === 'function' ? process.getuid() : 0;
  return path.join(runtimeDir, `shellgate-${uid}.sock`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ShellgateConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${issue?.path.join('.') ?? 'environment'}: ${issue?.message}`);
  }

  const values = parsed.data;

  return {
    socketPath: values.SHELLGATE_SOCKET ?? defaultSocketPath(env),
    shellPath: values.SHELLGATE_SHELL ?? env.SHELL ?? '/bin/bash',
    shellArgs: parseJsonList('SHELLGATE_SHELL_ARGS', values.SHELLGATE_SHELL_ARGS),
    defaultTimeoutMs: (values.SHELLGATE_TIMEOUT ?? DEFAULT_TIMEOUT_SECONDS) * 1000,
    denyPatterns: parsePatterns('SHELLGATE_DENY_PATTERNS', values.SHELLGATE_DENY_PATTERNS),
    allowPatterns: parsePatterns('SHELLGATE_ALLOW_PATTERNS', values.SHELLGATE_ALLOW_PATTERNS),
    logLevel: values.SHELLGATE_LOG_LEVEL ?? 'info',
    logFile:
      values.SHELLGATE_LOG_FILE ??
      path.join(os.homedir(), '.local', 'share', 'shellgate', 'logs', 'shellgate.log'),
  };
}

function parseJsonList(name: string, raw: string | undefined): string[] {
  if (raw === undefined || raw.trim().length === 0) {
    return [];
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    throw new ConfigError(`${name} must be a JSON array of strings.`);
  }

  const result = patternListSchema.safeParse(decoded);
  if (!result.success) {
    throw new ConfigError(`${name} must be a JSON array of strings.`);
  }

  return result.data;
}

function parsePatterns(name: string, raw: string | undefined): string[] {
  const patterns = parseJsonList(name, raw);

  for (const pattern of patterns) {
    try {
      new RegExp(pattern, 'u');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`${name} contains an invalid pattern "${pattern}": ${message}`);
    }
  }

  return patterns;
}
