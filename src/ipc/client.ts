import { randomUUID } from 'node:crypto';
import net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';

import type { ExecutionRequest, ExecutionResult } from '../admission/types.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { FramedChannel } from './channel.js';
import { ChannelClosedError, ConnectionRefusedError } from './errors.js';
import {
  fromResultMessage,
  toExecuteMessage,
  type InboundFrame,
  type RequestMessage,
  type ResponseMessage,
} from './protocol.js';

export interface RetryOptions {
  attempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

export interface IpcClientOptions {
  logger?: Logger;
}

interface PendingResponse {
  resolve: (message: ResponseMessage) => void;
  reject: (error: ChannelClosedError) => void;
}

const DEFAULT_ATTEMPTS = 5;
const DEFAULT_INITIAL_DELAY_MS = 100;
const DEFAULT_MAX_DELAY_MS = 2000;

/**
 * Controller side of the IPC channel. One instance owns one connection; when
 * the connection breaks the caller has to create a new client.
 */
export class IpcClient {
  private readonly pending = new Map<string, PendingResponse>();
  private readonly logger: Logger;

  private constructor(
    private readonly channel: FramedChannel,
    readonly socketPath: string,
    logger: Logger,
  ) {
    this.logger = logger;
    channel.onClosed((error) => {
      const entries = Array.from(this.pending.values());
      this.pending.clear();
      entries.forEach((entry) => entry.reject(error));
    });
    void this.receiveLoop();
  }

  static async connect(socketPath: string, options: IpcClientOptions = {}): Promise<IpcClient> {
    const logger = (options.logger ?? createSilentLogger()).child({ component: 'ipc-client' });

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const connection = net.createConnection(socketPath);
      connection.once('connect', () => {
        connection.off('error', reject);
        resolve(connection);
      });
      connection.once('error', reject);
    }).catch((error: unknown) => {
      throw new ConnectionRefusedError(socketPath, error);
    });

    logger.debug('Connected to agent', { socketPath });
    return new IpcClient(new FramedChannel(socket), socketPath, logger);
  }

  /**
   * Retries `connect` with exponential backoff while the agent refuses
   * connections. The last `ConnectionRefusedError` is rethrown.
   */
  static async connectWithRetry(
    socketPath: string,
    retry: RetryOptions = {},
    options: IpcClientOptions = {},
  ): Promise<IpcClient> {
    const attempts = Math.max(1, retry.attempts ?? DEFAULT_ATTEMPTS);
    const maxDelayMs = retry.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    let delayMs = retry.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
    let lastError: ConnectionRefusedError | undefined;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        return await IpcClient.connect(socketPath, options);
      } catch (error) {
        if (!(error instanceof ConnectionRefusedError)) {
          throw error;
        }

        lastError = error;
        options.logger?.debug('Agent not reachable yet', { socketPath, attempt });
        if (attempt < attempts) {
          await sleep(delayMs);
          delayMs = Math.min(delayMs * 2, maxDelayMs);
        }
      }
    }

    throw lastError ?? new ConnectionRefusedError(socketPath);
  }

  get isClosed(): boolean {
    return this.channel.isClosed;
  }

  send(message: RequestMessage): void {
    this.channel.send(message);
  }

  /**
   * Submits one execution and resolves with its result. A channel failure while
   * the request is in flight resolves with `status: 'error'` rather than
   * rejecting, so every request still yields exactly one result.
   */
  async submitExecution(request: ExecutionRequest): Promise<ExecutionResult> {
    let response: ResponseMessage;
    try {
      response = await this.request(toExecuteMessage(request));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn('Execution lost with the channel', { requestId: request.id, reason });
      return errorResult(request.id, reason);
    }

    switch (response.type) {
      case 'result':
        return fromResultMessage(response);
      case 'error':
        return errorResult(request.id, response.payload.message);
      default:
        return errorResult(request.id, `Unexpected "${response.type}" response to execute.`);
    }
  }

  async resize(cols: number, rows: number): Promise<void> {
    const response = await this.request({
      id: randomUUID(),
      type: 'resize',
      payload: { cols, rows },
    });

    if (response.type === 'error') {
      throw new Error(response.payload.message);
    }
  }

  close(): void {
    this.channel.close('Controller closed the connection.');
  }

  private request(message: RequestMessage): Promise<ResponseMessage> {
    if (this.pending.has(message.id)) {
      return Promise.reject(new Error(`Request "${message.id}" is already in flight.`));
    }

    return new Promise<ResponseMessage>((resolve, reject) => {
      this.pending.set(message.id, { resolve, reject });
      try {
        this.channel.send(message);
      } catch (error) {
        this.pending.delete(message.id);
        reject(error);
      }
    });
  }

  private async receiveLoop(): Promise<void> {
    for (;;) {
      let frame: InboundFrame;
      try {
        frame = await this.channel.receive();
      } catch (error) {
        if (!(error instanceof ChannelClosedError)) {
          this.logger.error('Receive loop failed', { err: error });
        }
        return;
      }

      if (!frame.ok) {
        this.logger.warn('Ignoring malformed message from agent', { reason: frame.error });
        continue;
      }

      const { message } = frame;
      if (message.type !== 'result' && message.type !== 'error' && message.type !== 'ack') {
        this.logger.warn('Ignoring unexpected message from agent', { type: message.type });
        continue;
      }

      const entry = this.pending.get(message.id);
      if (!entry) {
        this.logger.warn('Ignoring response without a pending request', { requestId: message.id });
        continue;
      }

      this.pending.delete(message.id);
      entry.resolve(message);
    }
  }
}

function errorResult(id: string, reason: string): ExecutionResult {
  return {
    id,
    stdout: '',
    stderr: reason,
    exitCode: null,
    status: 'error',
    reason,
  };
}
