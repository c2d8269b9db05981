export const EXECUTION_MODES = ['autonomous', 'review', 'tutor'] as const;

export type ExecutionMode = (typeof EXECUTION_MODES)[number];

export type ExecutionStatus = 'completed' | 'denied' | 'timed_out' | 'error';

export interface ExecutionRequest {
  readonly id: string;
  readonly command: string;
  readonly mode: ExecutionMode;
  readonly timeoutMs: number;
}

export interface ExecutionResult {
  id: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  status: ExecutionStatus;
  reason?: string;
}

export type PolicyVerdict = 'allow' | 'deny' | 'require_confirmation';

export interface PolicyDecision {
  verdict: PolicyVerdict;
  reason: string;
}

export type ConfirmationDecision =
  | { type: 'approve' }
  | { type: 'deny'; reason?: string }
  | { type: 'edit'; command: string };

export interface ConfirmationRequest {
  request: ExecutionRequest;
  decision: PolicyDecision;
  /** Aborted when the requesting controller goes away; the confirmation is then withdrawn. */
  signal?: AbortSignal;
}

/**
 * Implemented by the confirmation surface. The pipeline awaits the returned
 * promise before any byte of a gated command reaches the terminal.
 */
export interface ConfirmationHandler {
  onConfirmationNeeded(request: ConfirmationRequest): Promise<ConfirmationDecision>;
}
