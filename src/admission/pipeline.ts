import PQueue from 'p-queue';

import { createSilentLogger, type Logger } from '../logging/logger.js';
import { cleanCommandOutput, findPromptMarker } from '../terminal/prompt-marker.js';
import type { TerminalSession } from '../terminal/session.js';
import type { CommandPolicy } from './policy.js';
import type {
  ConfirmationDecision,
  ConfirmationHandler,
  ExecutionRequest,
  ExecutionResult,
  PolicyDecision,
} from './types.js';

export type PipelineTerminal = Pick<TerminalSession, 'write' | 'readAvailable' | 'isAlive'>;

export interface SubmitOptions {
  /** Aborted when the result can no longer be delivered. Work not yet written is dropped. */
  signal?: AbortSignal;
}

export interface AdmissionPipelineOptions {
  terminal: PipelineTerminal;
  policy: CommandPolicy;
  confirmationHandler?: ConfirmationHandler;
  logger?: Logger;
  /** Upper bound for a single `readAvailable` wait while polling for the prompt. */
  pollIntervalMs?: number;
}

const EXECUTE_TERMINATOR = '\r';
// readline's unix-line-discard; clears a staged command the operator never ran.
const DISCARD_LINE = '\x15';
const DEFAULT_POLL_INTERVAL_MS = 100;

interface PromptWait {
  output: string;
  exitCode?: number;
  outcome: 'returned' | 'timed_out' | 'exited';
}

export class AdmissionPipeline {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private stalePromptReturns = 0;

  constructor(private readonly options: AdmissionPipelineOptions) {
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'pipeline' });
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  async submit(request: ExecutionRequest, options: SubmitOptions = {}): Promise<ExecutionResult> {
    const log = this.logger.child({ requestId: request.id, mode: request.mode });
    const command = request.command.trim();
    const { signal } = options;

    if (signal?.aborted) {
      return abortedResult(request.id, signal);
    }

    if (command.length === 0) {
      return errorResult(request.id, 'Command must be a non-empty string.');
    }

    if (!this.options.terminal.isAlive()) {
      return errorResult(request.id, 'Terminal session is unavailable; restart the agent.');
    }

    const decision = this.options.policy.evaluate(command, request.mode);
    log.info('Admission decision', { verdict: decision.verdict, reason: decision.reason });

    if (decision.verdict === 'deny') {
      return deniedResult(request.id, decision.reason);
    }

    if (decision.verdict === 'require_confirmation') {
      return this.confirmAndExecute(request, command, decision, log, signal);
    }

    if (request.mode === 'review') {
      return this.exclusive(request.id, () => this.stage(request, command, log), signal);
    }

    return this.exclusive(request.id, () => this.execute(request, command, log), signal);
  }

  private async confirmAndExecute(
    request: ExecutionRequest,
    command: string,
    decision: PolicyDecision,
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<ExecutionResult> {
    const handler = this.options.confirmationHandler;
    if (!handler) {
      return deniedResult(
        request.id,
        'No confirmation surface is available to approve this command.',
      );
    }

    let answer: ConfirmationDecision;
    try {
      answer = await handler.onConfirmationNeeded({
        request: { ...request, command },
        decision,
        signal,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn('Confirmation failed; treating as denied', { reason });
      return deniedResult(request.id, `Confirmation failed: ${reason}`);
    }

    log.info('Operator decision', { decision: answer.type });

    if (signal?.aborted) {
      return abortedResult(request.id, signal);
    }

    switch (answer.type) {
      case 'deny':
        return deniedResult(request.id, answer.reason ?? 'Denied by operator.');
      case 'approve':
        return this.recheckAndExecute(request, command, log, signal);
      case 'edit': {
        const edited = answer.command.trim();
        if (edited.length === 0) {
          return deniedResult(request.id, 'Edited command is empty.');
        }
        log.info('Executing edited command', { command: edited });
        return this.recheckAndExecute(request, edited, log, signal);
      }
    }
  }

  private async recheckAndExecute(
    request: ExecutionRequest,
    command: string,
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<ExecutionResult> {
    const denied = this.options.policy.checkDenied(command);
    if (denied) {
      return deniedResult(request.id, denied.reason);
    }

    if (!this.options.terminal.isAlive()) {
      return errorResult(request.id, 'Terminal session is unavailable; restart the agent.');
    }

    return this.exclusive(request.id, () => this.execute(request, command, log), signal);
  }

  private async execute(
    request: ExecutionRequest,
    command: string,
    log: Logger,
  ): Promise<ExecutionResult> {
    const failure = await this.writeToTerminal(request.id, `${command}${EXECUTE_TERMINATOR}`);
    if (failure) {
      return failure;
    }

    const wait = await this.waitForPrompt(request.timeoutMs);

    if (wait.outcome === 'timed_out') {
      this.stalePromptReturns += 1;
      log.warn('Timed out waiting for the prompt', { timeoutMs: request.timeoutMs });
      return timedOutResult(request.id, cleanCommandOutput(wait.output, command));
    }

    return this.finish(request.id, wait, command);
  }

  private async stage(
    request: ExecutionRequest,
    command: string,
    log: Logger,
  ): Promise<ExecutionResult> {
    const failure = await this.writeToTerminal(request.id, command);
    if (failure) {
      return failure;
    }

    log.info('Command staged; waiting for the operator to press Enter');
    const wait = await this.waitForPrompt(request.timeoutMs);

    if (wait.outcome === 'timed_out') {
      if (lineWasSubmitted(wait.output)) {
        // The operator ran it; its prompt return is still owed.
        this.stalePromptReturns += 1;
        log.warn('Staged command is still running past the timeout', {
          timeoutMs: request.timeoutMs,
        });
        return timedOutResult(
          request.id,
          cleanCommandOutput(wait.output),
          'Staged command was run but did not finish in time.',
        );
      }

      if (this.options.terminal.isAlive()) {
        this.options.terminal.write(DISCARD_LINE);
      }
      log.warn('Operator did not run the staged command in time', {
        timeoutMs: request.timeoutMs,
      });
      return timedOutResult(request.id, '', 'Operator did not confirm the staged command in time.');
    }

    return this.finish(request.id, wait);
  }

  private finish(id: string, wait: PromptWait, echoedCommand?: string): ExecutionResult {
    const stdout = cleanCommandOutput(wait.output, echoedCommand);

    if (wait.outcome === 'exited') {
      return { ...errorResult(id, 'Shell exited while the command was running.'), stdout };
    }

    return {
      id,
      stdout,
      stderr: '',
      exitCode: wait.exitCode ?? null,
      status: 'completed',
    };
  }

  private async writeToTerminal(id: string, data: string): Promise<ExecutionResult | undefined> {
    await this.drainStalePrompts();

    try {
      this.options.terminal.write(data);
      return undefined;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return errorResult(id, `Failed to write to the terminal: ${reason}`);
    }
  }

  /**
   * Discards output produced since the last request. Prompt returns owed by
   * earlier timed-out commands that show up here are settled.
   */
  private async drainStalePrompts(): Promise<void> {
    let leftover = await this.options.terminal.readAvailable(0);
    let marker = findPromptMarker(leftover);

    while (marker && this.stalePromptReturns > 0) {
      this.stalePromptReturns -= 1;
      leftover = leftover.slice(marker.end);
      marker = findPromptMarker(leftover);
    }
  }

  private async waitForPrompt(timeoutMs: number): Promise<PromptWait> {
    const deadline = Date.now() + timeoutMs;
    let raw = '';

    for (;;) {
      let marker = findPromptMarker(raw);
      while (marker && this.stalePromptReturns > 0) {
        this.stalePromptReturns -= 1;
        raw = raw.slice(marker.end);
        marker = findPromptMarker(raw);
      }

      if (marker) {
        return {
          output: raw.slice(0, marker.index),
          exitCode: marker.exitCode,
          outcome: 'returned',
        };
      }

      if (!this.options.terminal.isAlive()) {
        return { output: raw, outcome: 'exited' };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return { output: raw, outcome: 'timed_out' };
      }

      raw += await this.options.terminal.readAvailable(Math.min(remaining, this.pollIntervalMs));
    }
  }

  /**
   * Runs `task` under the terminal lock. The signal is checked when the task
   * gets the lock rather than handed to the queue: an abort must not release
   * the lock while a command is still running.
   */
  private exclusive(
    id: string,
    task: () => Promise<ExecutionResult>,
    signal: AbortSignal | undefined,
  ): Promise<ExecutionResult> {
    return this.queue.add<ExecutionResult>(
      () => (signal?.aborted ? Promise.resolve(abortedResult(id, signal)) : task()),
      { throwOnTimeout: true },
    );
  }
}

function errorResult(id: string, reason: string): ExecutionResult {
  return { id, stdout: '', stderr: reason, exitCode: null, status: 'error', reason };
}

function abortedResult(id: string, signal: AbortSignal): ExecutionResult {
  const cause = signal.reason instanceof Error ? signal.reason.message : 'request aborted';
  return errorResult(id, `Cancelled before reaching the terminal: ${cause}`);
}

/** True once the echoed staged line has been followed by a line break. */
function lineWasSubmitted(output: string): boolean {
  return /[\r\n]/u.test(output);
}

function deniedResult(id: string, reason: string): ExecutionResult {
  return { id, stdout: '', stderr: '', exitCode: null, status: 'denied', reason };
}

function timedOutResult(
  id: string,
  stdout: string,
  reason = 'Timed out waiting for the command to finish.',
): ExecutionResult {
  return { id, stdout, stderr: '', exitCode: null, status: 'timed_out', reason };
}
