import { EventEmitter } from 'node:events';

import type {
  ConfirmationDecision,
  ConfirmationHandler,
  ConfirmationRequest,
} from '../../admission/types.js';

export type SurfaceState = 'idle' | 'streaming' | 'awaiting-confirmation' | 'resolved';

export interface ConfirmationRequestEvent {
  id: string;
  request: ConfirmationRequest;
  createdAt: Date;
}

export interface ConfirmationResolutionEvent {
  id: string;
  request: ConfirmationRequest;
  decision: ConfirmationDecision;
  resolvedAt: Date;
}

interface PendingConfirmation {
  request: ConfirmationRequest;
  createdAt: Date;
  resolve: (decision: ConfirmationDecision) => void;
  detach: () => void;
}

const REQUEST_EVENT = 'request';
const RESOLVED_EVENT = 'resolved';
const STATE_EVENT = 'state';
const WITHDRAWN_REASON = 'Request withdrawn: the controller disconnected.';

/**
 * Bridges the admission pipeline and the terminal UI. Each gated request
 * becomes a pending confirmation the UI answers with approve, deny or edit.
 */
export class ConfirmationBroker extends EventEmitter implements ConfirmationHandler {
  private readonly pending = new Map<string, PendingConfirmation>();
  private state: SurfaceState = 'idle';
  private closedReason: string | undefined;
  private counter = 0;

  getState(): SurfaceState {
    return this.state;
  }

  get isClosed(): boolean {
    return this.closedReason !== undefined;
  }

  start(): void {
    if (this.state === 'idle') {
      this.transition('streaming');
    }
  }

  onConfirmationNeeded(request: ConfirmationRequest): Promise<ConfirmationDecision> {
    if (this.closedReason !== undefined) {
      return Promise.resolve({ type: 'deny', reason: this.closedReason });
    }

    const { signal } = request;
    if (signal?.aborted) {
      return Promise.resolve({ type: 'deny', reason: WITHDRAWN_REASON });
    }

    const id = this.nextId();
    const createdAt = new Date();

    return new Promise<ConfirmationDecision>((resolve) => {
      const withdraw = (): void => {
        this.cancel(id, WITHDRAWN_REASON);
      };
      signal?.addEventListener('abort', withdraw, { once: true });
      const detach = (): void => {
        signal?.removeEventListener('abort', withdraw);
      };

      this.pending.set(id, { request, createdAt, resolve, detach });
      this.transition('awaiting-confirmation');
      this.emit(REQUEST_EVENT, { id, request, createdAt } satisfies ConfirmationRequestEvent);
    });
  }

  respond(id: string, decision: ConfirmationDecision): boolean {
    const entry = this.pending.get(id);
    if (!entry) {
      return false;
    }

    this.pending.delete(id);
    entry.detach();
    entry.resolve(decision);

    this.emit(RESOLVED_EVENT, {
      id,
      request: entry.request,
      decision,
      resolvedAt: new Date(),
    } satisfies ConfirmationResolutionEvent);

    this.transition('resolved');
    this.transition(this.pending.size > 0 ? 'awaiting-confirmation' : 'streaming');
    return true;
  }

  cancel(id: string, reason?: string): boolean {
    return this.respond(id, { type: 'deny', reason: reason ?? 'Cancelled by operator.' });
  }

  cancelAll(reason?: string): void {
    Array.from(this.pending.keys()).forEach((id) => {
      this.cancel(id, reason);
    });
  }

  /**
   * Denies everything pending and every later request. Called when the
   * operator quits the UI and on agent shutdown.
   */
  close(reason = 'Confirmation surface closed.'): void {
    if (this.closedReason === undefined) {
      this.closedReason = reason;
    }
    this.cancelAll(reason);
  }

  listPending(): ConfirmationRequestEvent[] {
    return Array.from(this.pending.entries()).map(([id, entry]) => ({
      id,
      request: entry.request,
      createdAt: entry.createdAt,
    }));
  }

  onRequest(listener: (event: ConfirmationRequestEvent) => void): () => void {
    this.on(REQUEST_EVENT, listener);
    return () => {
      this.off(REQUEST_EVENT, listener);
    };
  }

  onResolved(listener: (event: ConfirmationResolutionEvent) => void): () => void {
    this.on(RESOLVED_EVENT, listener);
    return () => {
      this.off(RESOLVED_EVENT, listener);
    };
  }

  onStateChange(listener: (state: SurfaceState) => void): () => void {
    this.on(STATE_EVENT, listener);
    return () => {
      this.off(STATE_EVENT, listener);
    };
  }

  private transition(next: SurfaceState): void {
    if (this.state === next) {
      return;
    }
    this.state = next;
    this.emit(STATE_EVENT, next);
  }

  private nextId(): string {
    this.counter += 1;
    return `confirm-${this.counter}`;
  }
}
