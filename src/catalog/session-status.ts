export const SESSION_STATUSES = [
  'recording',
  'incomplete',
  'ready',
  'dispatched',
  'dispatch_failed',
  'validating',
  'transcoding',
  'transcribing',
  'summarizing',
  'finalizing',
  'completed',
  'failed',
] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export const TERMINAL_STATUSES: readonly SessionStatus[] = ['completed', 'failed'];

/**
 * Statuses from which the completion detector may still claim a dispatch and
 * in which the declared segment count may still change.
 */
export const PRE_DISPATCH_STATUSES: readonly SessionStatus[] = [
  'recording',
  'incomplete',
  'dispatch_failed',
];

const PIPELINE_PROGRESS: readonly SessionStatus[] = [
  'dispatched',
  'validating',
  'transcoding',
  'transcribing',
  'summarizing',
  'finalizing',
  'completed',
];

function buildGraph(): ReadonlyMap<SessionStatus, ReadonlySet<SessionStatus>> {
  const edges = new Map<SessionStatus, Set<SessionStatus>>();
  const add = (from: SessionStatus, ...to: SessionStatus[]) => {
    const set = edges.get(from) ?? new Set<SessionStatus>();
    to.forEach((s) => set.add(s));
    edges.set(from, set);
  };

  add('recording', 'incomplete', 'ready');
  add('incomplete', 'incomplete', 'ready');
  // the first pipeline step may be consumed before `dispatched` is written
  add('ready', 'dispatched', 'dispatch_failed', 'validating');
  add('dispatch_failed', 'incomplete', 'ready');

  for (let i = 0; i < PIPELINE_PROGRESS.length - 1; i++) {
    add(PIPELINE_PROGRESS[i], PIPELINE_PROGRESS[i + 1]);
  }
  // re-entry of a running stage (retries, transcription polls)
  add('validating', 'validating');
  add('transcoding', 'transcoding');
  add('transcribing', 'transcribing');
  add('summarizing', 'summarizing');
  add('finalizing', 'finalizing');

  for (const s of SESSION_STATUSES) {
    if (!TERMINAL_STATUSES.includes(s)) add(s, 'failed');
  }
  return edges;
}

const GRAPH = buildGraph();

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return GRAPH.get(from)?.has(to) ?? false;
}

export function isTerminal(status: SessionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
