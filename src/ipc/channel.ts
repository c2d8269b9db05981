import { EventEmitter } from 'node:events';
import type { Socket } from 'node:net';

import { ChannelClosedError, ProtocolError } from './errors.js';
import { encodeFrame, FrameDecoder, type Envelope, type InboundFrame } from './protocol.js';

interface PendingReceive {
  resolve: (frame: InboundFrame) => void;
  reject: (error: ChannelClosedError) => void;
}

const CLOSED_EVENT = 'closed';

/**
 * A framed, bidirectional message channel over one connected socket. Used on
 * both ends: the agent wraps each accepted connection, the controller wraps its
 * outgoing one.
 */
export class FramedChannel extends EventEmitter {
  private readonly decoder = new FrameDecoder();
  private readonly inbox: InboundFrame[] = [];
  private readonly receivers: PendingReceive[] = [];
  private closedError: ChannelClosedError | undefined;

  constructor(private readonly socket: Socket) {
    super();

    socket.on('data', (chunk: Buffer) => {
      let frames: InboundFrame[];
      try {
        frames = this.decoder.push(chunk);
      } catch (error) {
        const reason = error instanceof ProtocolError ? error.message : String(error);
        this.close(`Protocol violation: ${reason}`);
        return;
      }

      frames.forEach((frame) => this.deliver(frame));
    });

    socket.on('error', (error) => {
      this.markClosed(`IPC channel failed: ${error.message}`);
    });

    socket.on('close', () => {
      this.markClosed('IPC channel closed by peer.');
    });
  }

  get isClosed(): boolean {
    return this.closedError !== undefined;
  }

  send(message: Envelope): void {
    if (this.closedError) {
      throw this.closedError;
    }

    this.socket.write(encodeFrame(message));
  }

  /**
   * Resolves with the next inbound frame. Frames already received are still
   * delivered after the peer disconnects; after that the call rejects with
   * `ChannelClosedError`.
   */
  receive(): Promise<InboundFrame> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }

    if (this.closedError) {
      return Promise.reject(this.closedError);
    }

    return new Promise<InboundFrame>((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  onClosed(listener: (error: ChannelClosedError) => void): () => void {
    this.once(CLOSED_EVENT, listener);
    return () => {
      this.off(CLOSED_EVENT, listener);
    };
  }

  close(reason = 'IPC channel closed locally.'): void {
    this.markClosed(reason);
    this.socket.destroy();
  }

  private deliver(frame: InboundFrame): void {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(frame);
    } else {
      this.inbox.push(frame);
    }
  }

  private markClosed(reason: string): void {
    if (this.closedError) {
      return;
    }

    const error = new ChannelClosedError(reason);
    this.closedError = error;
    const receivers = this.receivers.splice(0, this.receivers.length);
    receivers.forEach((receiver) => receiver.reject(error));
    this.emit(CLOSED_EVENT, error);
  }
}
