import { SessionStatus } from '../catalog/session-status';
import { PipelineState } from './pipeline.types';

/** Catalog status an observer sees while the execution is in a state. */
export const STATE_STATUS = {
  Validating: 'validating',
  Transcoding: 'transcoding',
  AwaitingTranscription: 'transcribing',
  Summarizing: 'summarizing',
  Finalizing: 'finalizing',
  Completed: 'completed',
  Failed: 'failed',
} as const satisfies Record<PipelineState, SessionStatus>;

const SUCCESSOR: Partial<Record<PipelineState, PipelineState>> = {
  Validating: 'Transcoding',
  Transcoding: 'AwaitingTranscription',
  AwaitingTranscription: 'Summarizing',
  Summarizing: 'Finalizing',
  Finalizing: 'Completed',
};

/** Statuses from which a session may enter `state`; includes `state`'s own status for re-entry. */
const ENTRY: Partial<Record<PipelineState, readonly SessionStatus[]>> = {
  Validating: ['ready', 'dispatched', 'validating'],
  Transcoding: ['validating', 'transcoding'],
  AwaitingTranscription: ['transcoding', 'transcribing'],
  Summarizing: ['transcribing', 'summarizing'],
  Finalizing: ['summarizing', 'finalizing'],
};

/** Everything an execution may be in when it fails. */
export const FAILABLE_STATUSES: readonly SessionStatus[] = [
  'ready',
  'dispatched',
  'validating',
  'transcoding',
  'transcribing',
  'summarizing',
  'finalizing',
];

export function isTerminalState(state: PipelineState) {
  return state === 'Completed' || state === 'Failed';
}

export function nextState(state: PipelineState): PipelineState {
  const next = SUCCESSOR[state];
  if (!next) throw new Error(`${state} has no successor`);
  return next;
}

export function entryStatuses(state: PipelineState): readonly SessionStatus[] {
  const from = ENTRY[state];
  if (!from) throw new Error(`${state} cannot be entered by a step`);
  return from;
}

/** `base * 2^(attempt-1)` */
export function retryDelayMs(attempt: number, baseMs: number) {
  return baseMs * 2 ** Math.max(0, attempt - 1);
}

/** Initial wait doubled per completed poll, capped. */
export function pollDelayMs(pollCount: number, initialMs: number, maxMs: number) {
  return Math.min(maxMs, initialMs * 2 ** Math.max(0, pollCount));
}
