import { EventEmitter } from 'node:events';

import { AdmissionPipeline } from '../admission/pipeline.js';
import { CommandPolicy } from '../admission/policy.js';
import type { ExecutionRequest, ExecutionResult } from '../admission/types.js';
import type { ShellgateConfig } from '../config/index.js';
import {
  createErrorMessage,
  fromExecuteMessage,
  toResultMessage,
  type RequestMessage,
  type ResponseMessage,
} from '../ipc/protocol.js';
import { IpcServer } from '../ipc/server.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { findPromptMarker, PROMPT_MARKER_SETUP } from '../terminal/prompt-marker.js';
import { TerminalSession, type TerminalExitEvent } from '../terminal/session.js';
import type { ConfirmationBroker } from '../ui/providers/confirmation-broker.js';

export type AgentState = 'stopped' | 'starting' | 'running' | 'unavailable';

export type AgentConfig = Pick<
  ShellgateConfig,
  'socketPath' | 'shellPath' | 'shellArgs' | 'defaultTimeoutMs' | 'denyPatterns' | 'allowPatterns'
>;

export interface ShellAgentOptions {
  config: AgentConfig;
  logger?: Logger;
  /** Omitted in headless mode; gated commands are then denied. */
  confirmations?: ConfirmationBroker;
  cwd?: string;
  /** How long to wait for the shell to report its first prompt marker. */
  setupTimeoutMs?: number;
}

export interface ExecutionEvent {
  request: ExecutionRequest;
  result: ExecutionResult;
}

const STATE_EVENT = 'state';
const EXECUTION_EVENT = 'execution';
const DEFAULT_SETUP_TIMEOUT_MS = 3000;
const UNAVAILABLE_REASON = 'Terminal session is unavailable; restart the agent.';

/**
 * Owns the PTY shell, the IPC server and the admission pipeline. One agent
 * serves exactly one shell; a dead shell is never restarted automatically.
 */
export class ShellAgent extends EventEmitter {
  private state: AgentState = 'stopped';
  private terminal: TerminalSession | undefined;
  private pipeline: AdmissionPipeline | undefined;
  private server: IpcServer | undefined;
  private readonly logger: Logger;
  private readonly disposers: Array<() => void> = [];

  constructor(private readonly options: ShellAgentOptions) {
    super();
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'agent' });
  }

  getState(): AgentState {
    return this.state;
  }

  get socketPath(): string {
    return this.options.config.socketPath;
  }

  get shellPid(): number | undefined {
    return this.terminal?.pid;
  }

  /**
   * Spawns the shell and starts listening. A `SpawnError` propagates: the agent
   * does not run without its shell.
   */
  async start(): Promise<void> {
    if (this.state !== 'stopped') {
      throw new Error(`Agent cannot start from state "${this.state}".`);
    }

    this.transition('starting');
    const { config } = this.options;

    let terminal: TerminalSession;
    try {
      terminal = TerminalSession.spawn({
        shellPath: config.shellPath,
        args: config.shellArgs,
        cwd: this.options.cwd,
      });
    } catch (error) {
      this.transition('stopped');
      throw error;
    }

    this.terminal = terminal;
    this.logger.info('Shell started', { shellPath: terminal.shellPath, pid: terminal.pid });
    this.disposers.push(terminal.onExit((event) => this.handleTerminalExit(event)));

    await this.installPromptMarker(terminal);

    this.pipeline = new AdmissionPipeline({
      terminal,
      policy: new CommandPolicy({
        denyPatterns: config.denyPatterns,
        allowPatterns: config.allowPatterns,
      }),
      confirmationHandler: this.options.confirmations,
      logger: this.logger,
    });

    const server = new IpcServer({
      socketPath: config.socketPath,
      handler: (message, { signal }) => this.handleRequest(message, signal),
      logger: this.logger,
    });

    try {
      await server.start();
    } catch (error) {
      terminal.kill();
      this.transition('stopped');
      throw error;
    }

    this.server = server;
    this.options.confirmations?.start();

    if (terminal.isAlive()) {
      this.transition('running');
    } else {
      this.transition('unavailable');
    }
  }

  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }

    this.options.confirmations?.close('Agent is shutting down.');
    await this.server?.stop();
    this.server = undefined;

    this.disposers.splice(0, this.disposers.length).forEach((dispose) => dispose());
    this.terminal?.kill();
    this.terminal = undefined;
    this.pipeline = undefined;

    this.transition('stopped');
    this.logger.info('Agent stopped');
  }

  /** `signal` aborts when the requesting controller disconnects. */
  async handleRequest(message: RequestMessage, signal?: AbortSignal): Promise<ResponseMessage> {
    switch (message.type) {
      case 'execute': {
        const request = fromExecuteMessage(message, this.options.config.defaultTimeoutMs);
        const result = await this.execute(request, signal);
        this.emit(EXECUTION_EVENT, { request, result } satisfies ExecutionEvent);
        return toResultMessage(result);
      }
      case 'resize': {
        const terminal = this.terminal;
        if (!terminal || !terminal.isAlive()) {
          return createErrorMessage(message.id, UNAVAILABLE_REASON);
        }
        terminal.resize(message.payload.cols, message.payload.rows);
        return { id: message.id, type: 'ack', payload: {} };
      }
    }
  }

  /** Keystrokes typed by the operator in the terminal UI. */
  sendOperatorInput(data: string): void {
    if (this.terminal?.isAlive()) {
      this.terminal.write(data);
    }
  }

  resizeTerminal(cols: number, rows: number): void {
    if (this.terminal?.isAlive()) {
      this.terminal.resize(cols, rows);
    }
  }

  onTerminalData(listener: (data: string) => void): () => void {
    return this.terminal?.onData(listener) ?? (() => undefined);
  }

  onStateChange(listener: (state: AgentState) => void): () => void {
    this.on(STATE_EVENT, listener);
    return () => {
      this.off(STATE_EVENT, listener);
    };
  }

  onExecution(listener: (event: ExecutionEvent) => void): () => void {
    this.on(EXECUTION_EVENT, listener);
    return () => {
      this.off(EXECUTION_EVENT, listener);
    };
  }

  private async execute(
    request: ExecutionRequest,
    signal: AbortSignal | undefined,
  ): Promise<ExecutionResult> {
    if (this.state !== 'running' || !this.pipeline) {
      return {
        id: request.id,
        stdout: '',
        stderr: UNAVAILABLE_REASON,
        exitCode: null,
        status: 'error',
        reason: UNAVAILABLE_REASON,
      };
    }

    return this.pipeline.submit(request, { signal });
  }

  private async installPromptMarker(terminal: TerminalSession): Promise<void> {
    const timeoutMs = this.options.setupTimeoutMs ?? DEFAULT_SETUP_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;
    terminal.write(PROMPT_MARKER_SETUP);

    let output = '';
    while (terminal.isAlive()) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        break;
      }

      output += await terminal.readAvailable(remaining);
      if (findPromptMarker(output)) {
        this.logger.debug('Prompt marker installed');
        return;
      }
    }

    this.logger.warn('Shell did not report a prompt marker; executions will time out', {
      shellPath: terminal.shellPath,
      timeoutMs,
    });
  }

  private handleTerminalExit(event: TerminalExitEvent): void {
    this.logger.error('Shell exited; agent is unavailable until restarted', { ...event });
    if (this.state === 'running' || this.state === 'starting') {
      this.transition('unavailable');
    }
  }

  private transition(next: AgentState): void {
    if (this.state === next) {
      return;
    }
    this.state = next;
    this.emit(STATE_EVENT, next);
  }
}
