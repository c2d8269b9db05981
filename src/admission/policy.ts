import type { ExecutionMode, PolicyDecision } from './types.js';

export interface CommandPolicyOptions {
  /** Extra deny patterns (regular expressions) on top of the built-in rules. */
  denyPatterns?: string[];
  /**
   * When non-empty, autonomous commands matching none of these are escalated to
   * operator confirmation.
   */
  allowPatterns?: string[];
}

export interface CommandAnalysis {
  command: string;
  sanitizedCommand: string;
  programs: string[];
  violations: string[];
}

const COMMAND_PREFIXES = new Set(['sudo', 'doas', 'nohup', 'exec', 'command', 'time', 'env']);

const DISK_FORMAT_PROGRAMS = new Set([
  'mkfs',
  'mke2fs',
  'mkswap',
  'wipefs',
  'fdisk',
  'sfdisk',
  'parted',
]);

const POWER_PROGRAMS = new Set(['shutdown', 'reboot', 'halt', 'poweroff']);

const PROTECTED_PATHS = new Set([
  '/',
  '/*',
  '~',
  '~/*',
  '$HOME',
  '/bin',
  '/boot',
  '/dev',
  '/etc',
  '/home',
  '/lib',
  '/lib64',
  '/opt',
  '/proc',
  '/root',
  '/sbin',
  '/srv',
  '/sys',
  '/usr',
  '/var',
]);

const PATTERN_RULES: Array<{ reason: string; pattern: RegExp }> = [
  { reason: 'fork-bomb', pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/u },
  { reason: 'raw-device-write', pattern: /\bdd\b[^;&|]*\bof=\/dev\/(?!null\b)/u },
  {
    reason: 'raw-device-write',
    pattern: />\s*\/dev\/(?:sd[a-z]|hd[a-z]|vd[a-z]|xvd[a-z]|nvme\d|mmcblk\d)/u,
  },
  { reason: 'recursive-permission-reset', pattern: /\bchmod\s+-R\s+0?777\s+\/(?:\s|$)/u },
];

export class CommandPolicy {
  private readonly denyPatterns: RegExp[];
  private readonly allowPatterns: RegExp[];

  constructor(options: CommandPolicyOptions = {}) {
    this.denyPatterns = (options.denyPatterns ?? []).map((pattern) => new RegExp(pattern, 'u'));
    this.allowPatterns = (options.allowPatterns ?? []).map((pattern) => new RegExp(pattern, 'u'));
  }

  /**
   * Deny rules run for every mode and win over allow patterns; the mode only
   * decides how much operator gating is added on top.
   */
  evaluate(command: string, mode: ExecutionMode): PolicyDecision {
    const denied = this.checkDenied(command);
    if (denied) {
      return denied;
    }

    if (mode === 'tutor') {
      return { verdict: 'require_confirmation', reason: 'Tutor mode requires operator approval.' };
    }

    const allowMatch = this.findAllowMatch(command);

    if (mode === 'review') {
      return { verdict: 'allow', reason: 'Staged for operator confirmation in the terminal.' };
    }

    if (this.allowPatterns.length > 0 && !allowMatch) {
      return {
        verdict: 'require_confirmation',
        reason: 'Command does not match any allow pattern.',
      };
    }

    return {
      verdict: 'allow',
      reason: allowMatch ? `Matches allow pattern ${allowMatch}.` : 'No deny rule matched.',
    };
  }

  /** Returns a deny decision when any deny rule matches, otherwise `undefined`. */
  checkDenied(command: string): PolicyDecision | undefined {
    const analysis = analyzeShellCommand(command, this.denyPatterns);
    if (analysis.violations.length === 0) {
      return undefined;
    }

    return {
      verdict: 'deny',
      reason: `Blocked by policy: ${analysis.violations.join(', ')}.`,
    };
  }

  private findAllowMatch(command: string): string | undefined {
    const sanitized = command.trim();
    return this.allowPatterns.find((pattern) => pattern.test(sanitized))?.toString();
  }
}

export function analyzeShellCommand(
  command: string,
  extraDenyPatterns: RegExp[] = [],
): CommandAnalysis {
  const sanitizedCommand = command.trim();
  const violations = new Set<string>();
  const programs: string[] = [];

  for (const segment of splitCommandSegments(sanitizedCommand)) {
    const tokens = stripCommandPrefixes(tokenizeShellCommand(segment));
    const program = tokens[0];
    if (!program) {
      continue;
    }

    const name = program.split('/').pop() ?? program;
    programs.push(name);

    if (name === 'rm' && isRecursiveProtectedDelete(tokens.slice(1))) {
      violations.add('recursive-root-delete');
    }

    if (DISK_FORMAT_PROGRAMS.has(name) || name.startsWith('mkfs.')) {
      violations.add('disk-format');
    }

    if (POWER_PROGRAMS.has(name)) {
      violations.add('power-state');
    }
  }

  for (const rule of PATTERN_RULES) {
    if (rule.pattern.test(sanitizedCommand)) {
      violations.add(rule.reason);
    }
  }

  for (const pattern of extraDenyPatterns) {
    if (pattern.test(sanitizedCommand)) {
      violations.add(`deny-pattern ${pattern.toString()}`);
    }
  }

  return {
    command,
    sanitizedCommand,
    programs,
    violations: Array.from(violations),
  };
}

function isRecursiveProtectedDelete(args: string[]): boolean {
  let recursive = false;
  const targets: string[] = [];
  let endOfOptions = false;

  for (const arg of args) {
    if (!endOfOptions && arg === '--') {
      endOfOptions = true;
    } else if (!endOfOptions && arg === '--recursive') {
      recursive = true;
    } else if (!endOfOptions && /^-[a-zA-Z]+$/u.test(arg)) {
      recursive ||= /[rR]/u.test(arg);
    } else if (endOfOptions || !arg.startsWith('--')) {
      targets.push(arg);
    }
  }

  return recursive && targets.some((target) => PROTECTED_PATHS.has(normalizeTarget(target)));
}

function normalizeTarget(target: string): string {
  const trimmed = target.replace(/\/+$/u, '');
  return trimmed.length === 0 ? '/' : trimmed;
}

function stripCommandPrefixes(tokens: string[]): string[] {
  let index = 0;
  while (index < tokens.length) {
    const token = tokens[index] ?? '';
    if (!COMMAND_PREFIXES.has(token) && !/^[A-Za-z_][A-Za-z0-9_]*=/u.test(token)) {
      break;
    }
    index += 1;
  }
  return tokens.slice(index);
}

/** Splits on `;`, `&&`, `||`, `|`, `&` and newlines, ignoring quoted text. */
function splitCommandSegments(command: string): string[] {
  const segments: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;

  for (let index = 0; index < command.length; index += 1) {
    const char = command[index] ?? '';

    if (quote) {
      if (char === quote) {
        quote = null;
      }
      current += char;
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      current += char;
      continue;
    }

    if (char === ';' || char === '|' || char === '&' || char === '\n') {
      segments.push(current);
      current = '';
      continue;
    }

    current += char;
  }

  segments.push(current);
  return segments.map((segment) => segment.trim()).filter((segment) => segment.length > 0);
}

function tokenizeShellCommand(command: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let escaping = false;

  for (let index = 0; index < command.length; index += 1) {
    const char = command[index] ?? '';

    if (escaping) {
      current += char;
      escaping = false;
      continue;
    }

    if (char === '\\') {
      escaping = true;
      continue;
    }

    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      continue;
    }

    if (/\s/u.test(char)) {
      if (current.length > 0) {
        tokens.push(current);
        current = '';
      }
      continue;
    }

    current += char;
  }

  if (current.length > 0) {
    tokens.push(current);
  }

  return tokens;
}
