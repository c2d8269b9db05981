import { promises as fs } from 'node:fs';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { FramedChannel } from '../../src/ipc/channel.js';
import { IpcClient } from '../../src/ipc/client.js';
import { ChannelClosedError, ConnectionRefusedError } from '../../src/ipc/errors.js';
import {
  createErrorMessage,
  toResultMessage,
  type RequestMessage,
  type ResponseMessage,
} from '../../src/ipc/protocol.js';
import { IpcServer, type IpcRequestHandler } from '../../src/ipc/server.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

const echoHandler: IpcRequestHandler = async (
  message: RequestMessage,
): Promise<ResponseMessage> => {
  if (message.type === 'resize') {
    return { id: message.id, type: 'ack', payload: {} };
  }
  return toResultMessage({
    id: message.id,
    stdout: `ran ${message.payload.command}`,
    stderr: '',
    exitCode: 0,
    status: 'completed',
  });
};

function connectRaw(socketPath: string): Promise<{ socket: net.Socket; channel: FramedChannel }> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection(socketPath);
    socket.once('connect', () => resolve({ socket, channel: new FramedChannel(socket) }));
    socket.once('error', reject);
  });
}

describe('IPC server and client', () => {
  let directory: string;
  let socketPath: string;
  const servers: IpcServer[] = [];
  const clients: IpcClient[] = [];

  async function startServer(handler: IpcRequestHandler = echoHandler): Promise<IpcServer> {
    const server = new IpcServer({ socketPath, handler });
    servers.push(server);
    await server.start();
    return server;
  }

  async function connect(): Promise<IpcClient> {
    const client = await IpcClient.connect(socketPath);
    clients.push(client);
    return client;
  }

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'shellgate-ipc-'));
    socketPath = path.join(directory, 'agent.sock');
  });

  afterEach(async () => {
    clients.splice(0).forEach((client) => client.close());
    await Promise.all(servers.splice(0).map((server) => server.stop()));
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('round-trips an execution request', async () => {
    await startServer();
    const client = await connect();

    const result = await client.submitExecution({
      id: 'req-1',
      command: 'ls',
      mode: 'autonomous',
      timeoutMs: 1000,
    });

    expect(result).toEqual({
      id: 'req-1',
      stdout: 'ran ls',
      stderr: '',
      exitCode: 0,
      status: 'completed',
    });
  });

  it('creates the socket with owner-only permissions', async () => {
    await startServer();

    const stats = await fs.stat(socketPath);

    expect(stats.mode & 0o777).toBe(0o600);
  });

  it('refuses to replace a file that is not a socket', async () => {
    await fs.writeFile(socketPath, 'not a socket');

    await expect(startServer()).rejects.toThrow(/Refusing to replace/u);
  });

  it('turns a handler failure into an error result', async () => {
    await startServer(async () => {
      throw new Error('handler exploded');
    });
    const client = await connect();

    const result = await client.submitExecution({
      id: 'req-2',
      command: 'ls',
      mode: 'autonomous',
      timeoutMs: 1000,
    });

    expect(result).toMatchObject({ id: 'req-2', status: 'error', stderr: 'handler exploded' });
  });

  it('acknowledges resize requests and surfaces resize errors', async () => {
    let fail = false;
    await startServer(async (message, context) =>
      fail ? createErrorMessage(message.id, 'Terminal is gone.') : echoHandler(message, context),
    );
    const client = await connect();

    await expect(client.resize(100, 40)).resolves.toBeUndefined();
    fail = true;
    await expect(client.resize(100, 40)).rejects.toThrow('Terminal is gone.');
  });

  it('answers malformed and unsupported messages with errors', async () => {
    await startServer();
    const { socket, channel } = await connectRaw(socketPath);

    const body = Buffer.from('{broken', 'utf8');
    const header = Buffer.alloc(4);
    header.writeUInt32BE(body.length, 0);
    socket.write(Buffer.concat([header, body]));
    const malformed = await channel.receive();

    channel.send({ id: 'req-3', type: 'ack', payload: {} });
    const unsupported = await channel.receive();
    channel.close();

    expect(malformed.ok && malformed.message.type === 'error' && malformed.message.id).toBe('');
    expect(
      malformed.ok &&
        malformed.message.type === 'error' &&
        malformed.message.payload.message.startsWith('Malformed JSON: '),
    ).toBe(true);
    expect(unsupported).toEqual({
      ok: true,
      message: {
        id: 'req-3',
        type: 'error',
        payload: { message: 'Unsupported message type "ack".' },
      },
    });
  });

  it('fails with ConnectionRefusedError when no agent listens', async () => {
    await expect(IpcClient.connect(socketPath)).rejects.toBeInstanceOf(ConnectionRefusedError);
    await expect(
      IpcClient.connectWithRetry(socketPath, { attempts: 2, initialDelayMs: 10 }),
    ).rejects.toBeInstanceOf(ConnectionRefusedError);
  });

  it('connects once the agent comes up during retries', async () => {
    const connecting = IpcClient.connectWithRetry(socketPath, {
      attempts: 10,
      initialDelayMs: 20,
      maxDelayMs: 50,
    });
    await startServer();

    const client = await connecting;
    clients.push(client);

    expect(client.isClosed).toBe(false);
  });

  it('resolves an in-flight request with an error when the connection breaks', async () => {
    const gate = deferred();
    const signals: AbortSignal[] = [];
    await startServer(async (message, context) => {
      signals.push(context.signal);
      if (message.type === 'execute' && message.payload.command === 'slow') {
        await gate.promise;
      }
      return echoHandler(message, context);
    });
    const doomed = await connect();

    const pending = doomed.submitExecution({
      id: 'req-4',
      command: 'slow',
      mode: 'autonomous',
      timeoutMs: 1000,
    });
    doomed.close();
    const result = await pending;
    gate.resolve();

    expect(result).toMatchObject({
      id: 'req-4',
      status: 'error',
      exitCode: null,
      stderr: 'Controller closed the connection.',
    });

    const survivor = await connect();
    const next = await survivor.submitExecution({
      id: 'req-5',
      command: 'ls',
      mode: 'autonomous',
      timeoutMs: 1000,
    });
    expect(next.status).toBe('completed');
    await vi.waitFor(() => {
      expect(signals[0]?.aborted).toBe(true);
    });
    expect(signals[0]?.reason).toBeInstanceOf(ChannelClosedError);
    expect(signals[1]?.aborted).toBe(false);
  });
});
