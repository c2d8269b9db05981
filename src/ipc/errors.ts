export class ConnectionRefusedError extends Error {
  constructor(
    readonly socketPath: string,
    cause?: unknown,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`No agent is listening on ${socketPath}${detail}`);
    this.name = 'ConnectionRefusedError';
  }
}

export class ChannelClosedError extends Error {
  constructor(message = 'IPC channel closed.') {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}
