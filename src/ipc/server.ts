import { promises as fs } from 'node:fs';
import net from 'node:net';
import path from 'node:path';

import { createSilentLogger, type Logger } from '../logging/logger.js';
import { FramedChannel } from './channel.js';
import { ChannelClosedError } from './errors.js';
import {
  createErrorMessage,
  type RequestMessage,
  type ResponseMessage,
} from './protocol.js';

export interface IpcConnectionContext {
  connectionId: number;
  /** Aborted, with the `ChannelClosedError` as reason, once the connection is gone. */
  signal: AbortSignal;
}

export type IpcRequestHandler = (
  message: RequestMessage,
  context: IpcConnectionContext,
) => Promise<ResponseMessage>;

export interface IpcServerOptions {
  socketPath: string;
  handler: IpcRequestHandler;
  logger?: Logger;
}

const SOCKET_MODE = 0o600;
const SOCKET_DIRECTORY_MODE = 0o700;

export class IpcServer {
  private server: net.Server | undefined;
  private readonly channels = new Set<FramedChannel>();
  private readonly logger: Logger;
  private connectionCounter = 0;

  constructor(private readonly options: IpcServerOptions) {
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'ipc-server' });
  }

  get socketPath(): string {
    return this.options.socketPath;
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const { socketPath } = this.options;
    await fs.mkdir(path.dirname(socketPath), { recursive: true, mode: SOCKET_DIRECTORY_MODE });
    await removeStaleSocket(socketPath);

    const server = net.createServer((socket) => {
      this.accept(socket);
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.logger.error('IPC server error', { err: error });
    });

    await fs.chmod(socketPath, SOCKET_MODE);
    this.server = server;
    this.logger.info('IPC server listening', { socketPath });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    this.server = undefined;
    this.channels.forEach((channel) => channel.close('Agent shutting down.'));
    this.channels.clear();

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    await fs.rm(this.options.socketPath, { force: true });
    this.logger.info('IPC server stopped');
  }

  private accept(socket: net.Socket): void {
    this.connectionCounter += 1;
    const connectionId = this.connectionCounter;
    const disconnected = new AbortController();
    const context: IpcConnectionContext = { connectionId, signal: disconnected.signal };
    const channel = new FramedChannel(socket);
    this.channels.add(channel);
    this.logger.debug('Controller connected', { connectionId });

    channel.onClosed((error) => {
      this.channels.delete(channel);
      disconnected.abort(error);
      this.logger.debug('Controller disconnected', { connectionId, reason: error.message });
    });

    void this.receiveLoop(channel, context);
  }

  private async receiveLoop(channel: FramedChannel, context: IpcConnectionContext): Promise<void> {
    const { connectionId } = context;
    for (;;) {
      let frame;
      try {
        frame = await channel.receive();
      } catch (error) {
        if (!(error instanceof ChannelClosedError)) {
          this.logger.error('Receive loop failed', { connectionId, err: error });
        }
        return;
      }

      if (!frame.ok) {
        this.logger.warn('Rejected malformed message', { connectionId, reason: frame.error });
        this.reply(channel, createErrorMessage(frame.id ?? '', frame.error), connectionId);
        continue;
      }

      const { message } = frame;
      if (message.type !== 'execute' && message.type !== 'resize') {
        this.reply(
          channel,
          createErrorMessage(message.id, `Unsupported message type "${message.type}".`),
          connectionId,
        );
        continue;
      }

      // Requests on one connection are handled concurrently; responses carry ids.
      void this.dispatch(channel, message, context);
    }
  }

  private async dispatch(
    channel: FramedChannel,
    message: RequestMessage,
    context: IpcConnectionContext,
  ): Promise<void> {
    let response: ResponseMessage;
    try {
      response = await this.options.handler(message, context);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('Request handler failed', {
        connectionId: context.connectionId,
        requestId: message.id,
        reason,
      });
      response = createErrorMessage(message.id, reason);
    }

    this.reply(channel, response, context.connectionId);
  }

  private reply(
    channel: FramedChannel,
    response: ResponseMessage,
    connectionId: number,
  ): void {
    if (channel.isClosed) {
      this.logger.warn('Dropping response for closed connection', {
        connectionId,
        requestId: response.id,
      });
      return;
    }

    try {
      channel.send(response);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn('Failed to send response', { connectionId, requestId: response.id, reason });
    }
  }
}

async function removeStaleSocket(socketPath: string): Promise<void> {
  let stats;
  try {
    stats = await fs.lstat(socketPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return;
    }
    throw error;
  }

  if (!stats.isSocket()) {
    throw new Error(`Refusing to replace ${socketPath}: it exists and is not a socket.`);
  }

  await fs.rm(socketPath, { force: true });
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
