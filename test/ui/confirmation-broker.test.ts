import { describe, expect, it, vi } from 'vitest';

import type { ConfirmationRequest } from '../../src/admission/types.js';
import { ConfirmationBroker } from '../../src/ui/providers/confirmation-broker.js';

function confirmationFor(command: string): ConfirmationRequest {
  return {
    request: { id: `req-${command}`, command, mode: 'tutor', timeoutMs: 1000 },
    decision: { verdict: 'require_confirmation', reason: 'Tutor mode requires operator approval.' },
  };
}

describe('ConfirmationBroker', () => {
  it('publishes requests and resolves them with the operator decision', async () => {
    const broker = new ConfirmationBroker();
    const onRequest = vi.fn();
    const onResolved = vi.fn();
    broker.onRequest(onRequest);
    broker.onResolved(onResolved);
    broker.start();

    const decision = broker.onConfirmationNeeded(confirmationFor('ls'));

    expect(broker.getState()).toBe('awaiting-confirmation');
    expect(onRequest).toHaveBeenCalledWith(
      expect.objectContaining({ id: 'confirm-1', request: confirmationFor('ls') }),
    );
    expect(broker.respond('confirm-1', { type: 'approve' })).toBe(true);
    await expect(decision).resolves.toEqual({ type: 'approve' });
    expect(onResolved).toHaveBeenCalledWith(
      expect.objectContaining({ id: 'confirm-1', decision: { type: 'approve' } }),
    );
    expect(broker.getState()).toBe('streaming');
    expect(broker.listPending()).toEqual([]);
  });

  it('walks through the surface states', async () => {
    const broker = new ConfirmationBroker();
    const states: string[] = [];
    broker.onStateChange((state) => states.push(state));

    broker.start();
    const first = broker.onConfirmationNeeded(confirmationFor('a'));
    const second = broker.onConfirmationNeeded(confirmationFor('b'));
    broker.respond('confirm-1', { type: 'deny' });
    broker.respond('confirm-2', { type: 'edit', command: 'b --dry-run' });

    await expect(first).resolves.toEqual({ type: 'deny' });
    await expect(second).resolves.toEqual({ type: 'edit', command: 'b --dry-run' });
    expect(states).toEqual([
      'streaming',
      'awaiting-confirmation',
      'resolved',
      'awaiting-confirmation',
      'resolved',
      'streaming',
    ]);
  });

  it('ignores responses to unknown requests', () => {
    expect(new ConfirmationBroker().respond('confirm-9', { type: 'approve' })).toBe(false);
  });

  it('cancels pending requests as denials', async () => {
    const broker = new ConfirmationBroker();
    const pending = broker.onConfirmationNeeded(confirmationFor('ls'));

    broker.cancel('confirm-1');

    await expect(pending).resolves.toEqual({ type: 'deny', reason: 'Cancelled by operator.' });
  });

  it('denies everything once closed', async () => {
    const broker = new ConfirmationBroker();
    const pending = broker.onConfirmationNeeded(confirmationFor('ls'));

    broker.close('Operator left.');

    expect(broker.isClosed).toBe(true);
    await expect(pending).resolves.toEqual({ type: 'deny', reason: 'Operator left.' });
    await expect(broker.onConfirmationNeeded(confirmationFor('pwd'))).resolves.toEqual({
      type: 'deny',
      reason: 'Operator left.',
    });
  });

  it('withdraws a pending confirmation when its signal aborts', async () => {
    const broker = new ConfirmationBroker();
    broker.start();
    const controller = new AbortController();

    const decision = broker.onConfirmationNeeded({
      ...confirmationFor('ls'),
      signal: controller.signal,
    });
    controller.abort();

    await expect(decision).resolves.toEqual({
      type: 'deny',
      reason: 'Request withdrawn: the controller disconnected.',
    });
    expect(broker.listPending()).toEqual([]);
    expect(broker.getState()).toBe('streaming');
  });

  it('denies at once when the signal has already aborted', async () => {
    const broker = new ConfirmationBroker();
    const onRequest = vi.fn();
    broker.onRequest(onRequest);

    const decision = broker.onConfirmationNeeded({
      ...confirmationFor('ls'),
      signal: AbortSignal.abort(),
    });

    await expect(decision).resolves.toEqual({
      type: 'deny',
      reason: 'Request withdrawn: the controller disconnected.',
    });
    expect(onRequest).not.toHaveBeenCalled();
  });
});
