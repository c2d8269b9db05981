export { App } from './app/index.js';
export {
  ConfirmationBroker,
  type ConfirmationRequestEvent,
  type ConfirmationResolutionEvent,
  type SurfaceState,
} from './providers/confirmation-broker.js';
export { TerminalTranscript } from './terminal-transcript.js';
export { toTerminalInput } from './terminal-input.js';
