import { accessSync, constants } from 'node:fs';
import path from 'node:path';

import { spawn as spawnPty, type IPty } from '@lydell/node-pty';

export interface TerminalSessionOptions {
  shellPath: string;
  args?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cols?: number;
  rows?: number;
}

export interface TerminalExitEvent {
  exitCode: number;
  signal?: number;
}

export class SpawnError extends Error {
  constructor(
    message: string,
    public readonly shellPath: string,
  ) {
    super(message);
    this.name = 'SpawnError';
  }
}

export class TerminalClosedError extends Error {
  constructor(message = 'Terminal session has exited.') {
    super(message);
    this.name = 'TerminalClosedError';
  }
}

const DEFAULT_COLS = 120;
const DEFAULT_ROWS = 30;

export class TerminalSession {
  private readonly pending: string[] = [];
  private readonly waiters = new Set<() => void>();
  private readonly dataListeners = new Set<(data: string) => void>();
  private readonly exitListeners = new Set<(event: TerminalExitEvent) => void>();
  private exitEvent: TerminalExitEvent | undefined;

  private constructor(
    private readonly handle: IPty,
    readonly shellPath: string,
    readonly cwd: string,
  ) {
    handle.onData((data) => {
      this.pending.push(data);
      this.dataListeners.forEach((listener) => listener(data));
      this.wakeWaiters();
    });

    handle.onExit(({ exitCode, signal }) => {
      this.exitEvent = { exitCode, signal };
      this.exitListeners.forEach((listener) => listener({ exitCode, signal }));
      this.wakeWaiters();
    });
  }

  static spawn(options: TerminalSessionOptions): TerminalSession {
    const env = options.env ?? process.env;
    const cwd = options.cwd ?? process.cwd();
    const executable = resolveExecutable(options.shellPath, env.PATH);

    if (!executable) {
      throw new SpawnError(
        `Shell "${options.shellPath}" was not found or is not executable.`,
        options.shellPath,
      );
    }

    try {
      const handle = spawnPty(executable, options.args ?? [], {
        name: 'xterm-256color',
        cols: options.cols ?? DEFAULT_COLS,
        rows: options.rows ?? DEFAULT_ROWS,
        cwd,
        env: toStringRecord(env),
      });
      return new TerminalSession(handle, executable, cwd);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SpawnError(`Failed to spawn "${executable}": ${message}`, options.shellPath);
    }
  }

  get pid(): number {
    return this.handle.pid;
  }

  isAlive(): boolean {
    return this.exitEvent === undefined;
  }

  write(data: string): void {
    if (!this.isAlive()) {
      throw new TerminalClosedError();
    }

    this.handle.write(data);
  }

  /**
   * Resolves with everything produced since the previous read. Waits up to
   * `deadlineMs` when nothing is buffered and resolves `''` if nothing arrives.
   */
  async readAvailable(deadlineMs: number): Promise<string> {
    if (this.pending.length === 0 && this.isAlive() && deadlineMs > 0) {
      await new Promise<void>((resolve) => {
        const wake = (): void => {
          clearTimeout(timer);
          this.waiters.delete(wake);
          resolve();
        };
        const timer = setTimeout(wake, deadlineMs);
        this.waiters.add(wake);
      });
    }

    return this.pending.splice(0, this.pending.length).join('');
  }

  resize(cols: number, rows: number): void {
    if (!this.isAlive()) {
      throw new TerminalClosedError();
    }

    this.handle.resize(cols, rows);
  }

  onData(listener: (data: string) => void): () => void {
    this.dataListeners.add(listener);
    return () => {
      this.dataListeners.delete(listener);
    };
  }

  onExit(listener: (event: TerminalExitEvent) => void): () => void {
    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  kill(): void {
    if (this.isAlive()) {
      this.handle.kill();
    }
  }

  private wakeWaiters(): void {
    Array.from(this.waiters).forEach((wake) => wake());
  }
}

function resolveExecutable(command: string, searchPath: string | undefined): string | undefined {
  if (command.includes(path.sep)) {
    return isExecutable(command) ? command : undefined;
  }

  for (const directory of (searchPath ?? '').split(path.delimiter)) {
    if (directory.length === 0) {
      continue;
    }

    const candidate = path.join(directory, command);
    if (isExecutable(candidate)) {
      return candidate;
    }
  }

  return undefined;
}

function isExecutable(candidate: string): boolean {
  try {
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function toStringRecord(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}
