import { z } from 'zod';

import {
  EXECUTION_MODES,
  type ExecutionRequest,
  type ExecutionResult,
} from '../admission/types.js';
import { ProtocolError } from './errors.js';

export const MAX_FRAME_BYTES = 16 * 1024 * 1024;
const HEADER_BYTES = 4;

const idSchema = z.string().min(1);

export const executeMessageSchema = z.object({
  id: idSchema,
  type: z.literal('execute'),
  payload: z.object({
    command: z.string().min(1),
    mode: z.enum(EXECUTION_MODES),
    timeout: z.number().positive().optional(),
  }),
});

export const resultMessageSchema = z.object({
  id: idSchema,
  type: z.literal('result'),
  payload: z.object({
    stdout: z.string(),
    stderr: z.string(),
    exit_code: z.number().int().nullable(),
    status: z.enum(['completed', 'denied', 'timed_out', 'error']),
    reason: z.string().optional(),
  }),
});

export const errorMessageSchema = z.object({
  id: z.string(),
  type: z.literal('error'),
  payload: z.object({
    message: z.string(),
  }),
});

export const resizeMessageSchema = z.object({
  id: idSchema,
  type: z.literal('resize'),
  payload: z.object({
    cols: z.number().int().positive(),
    rows: z.number().int().positive(),
  }),
});

export const ackMessageSchema = z.object({
  id: idSchema,
  type: z.literal('ack'),
  payload: z.object({}),
});

export const envelopeSchema = z.discriminatedUnion('type', [
  executeMessageSchema,
  resultMessageSchema,
  errorMessageSchema,
  resizeMessageSchema,
  ackMessageSchema,
]);

export type ExecuteMessage = z.infer<typeof executeMessageSchema>;
export type ResultMessage = z.infer<typeof resultMessageSchema>;
export type ErrorMessage = z.infer<typeof errorMessageSchema>;
export type ResizeMessage = z.infer<typeof resizeMessageSchema>;
export type AckMessage = z.infer<typeof ackMessageSchema>;
export type Envelope = z.infer<typeof envelopeSchema>;

/** Messages a controller sends to the agent. */
export type RequestMessage = ExecuteMessage | ResizeMessage;

/** Messages the agent sends back. */
export type ResponseMessage = ResultMessage | ErrorMessage | AckMessage;

export type InboundFrame =
  | { ok: true; message: Envelope }
  | { ok: false; id?: string; error: string };

export function toExecuteMessage(request: ExecutionRequest): ExecuteMessage {
  return {
    id: request.id,
    type: 'execute',
    payload: {
      command: request.command,
      mode: request.mode,
      timeout: request.timeoutMs / 1000,
    },
  };
}

export function fromExecuteMessage(
  message: ExecuteMessage,
  defaultTimeoutMs: number,
): ExecutionRequest {
  const { command, mode, timeout } = message.payload;
  return {
    id: message.id,
    command,
    mode,
    timeoutMs: timeout === undefined ? defaultTimeoutMs : Math.round(timeout * 1000),
  };
}

export function toResultMessage(result: ExecutionResult): ResultMessage {
  return {
    id: result.id,
    type: 'result',
    payload: {
      stdout: result.stdout,
      stderr: result.stderr,
      exit_code: result.exitCode,
      status: result.status,
      ...(result.reason === undefined ? {} : { reason: result.reason }),
    },
  };
}

export function fromResultMessage(message: ResultMessage): ExecutionResult {
  const { stdout, stderr, exit_code: exitCode, status, reason } = message.payload;
  return {
    id: message.id,
    stdout,
    stderr,
    exitCode,
    status,
    ...(reason === undefined ? {} : { reason }),
  };
}

export function createErrorMessage(id: string, message: string): ErrorMessage {
  return { id, type: 'error', payload: { message } };
}

export function parseEnvelope(value: unknown): InboundFrame {
  const result = envelopeSchema.safeParse(value);
  if (result.success) {
    return { ok: true, message: result.data };
  }

  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return {
    ok: false,
    id: extractId(value),
    error: `Invalid message${where}: ${issue?.message ?? 'unknown error'}`,
  };
}

export function encodeFrame(message: Envelope): Buffer {
  const body = Buffer.from(JSON.stringify(message), 'utf8');
  if (body.length > MAX_FRAME_BYTES) {
    throw new ProtocolError(`Message of ${body.length} bytes exceeds ${MAX_FRAME_BYTES} bytes.`);
  }

  const header = Buffer.alloc(HEADER_BYTES);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

/**
 * Reassembles length-prefixed frames from arbitrary socket chunks. A frame is a
 * 4-byte big-endian byte count followed by that many bytes of UTF-8 JSON.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes: number = MAX_FRAME_BYTES) {}

  push(chunk: Buffer): InboundFrame[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: InboundFrame[] = [];

    while (this.buffer.length >= HEADER_BYTES) {
      const length = this.buffer.readUInt32BE(0);
      if (length > this.maxFrameBytes) {
        throw new ProtocolError(
          `Incoming frame of ${length} bytes exceeds ${this.maxFrameBytes} bytes.`,
        );
      }

      if (this.buffer.length < HEADER_BYTES + length) {
        break;
      }

      const body = this.buffer.subarray(HEADER_BYTES, HEADER_BYTES + length);
      this.buffer = this.buffer.subarray(HEADER_BYTES + length);
      frames.push(decodeBody(body));
    }

    return frames;
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }
}

function decodeBody(body: Buffer): InboundFrame {
  let value: unknown;
  try {
    value = JSON.parse(body.toString('utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `Malformed JSON: ${message}` };
  }

  return parseEnvelope(value);
}

function extractId(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('id' in value)) {
    return undefined;
  }

  const { id } = value;
  return typeof id === 'string' && id.length > 0 ? id : undefined;
}
