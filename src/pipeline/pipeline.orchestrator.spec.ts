import { testConfig, testSettings } from '../../test/fakes/config';
import { FakeObjectStore, TEST_BUCKET } from '../../test/fakes/fake-object-store';
import { FakeRedisHashClient } from '../../test/fakes/fake-redis';
import {
  FakeSummaryModel,
  FakeTranscoder,
  FakeTranscriber,
} from '../../test/fakes/fake-workers';
import { RAW_TRANSCRIPTION, pipelineInput } from '../../test/fakes/fixtures';
import { InMemoryBus } from '../../test/fakes/in-memory-bus';
import { InMemorySessionCatalog } from '../../test/fakes/in-memory-session-catalog';
import { SessionStatus } from '../catalog/session-status';
import { CatalogError } from '../common/pipeline-errors';
import { chunkKey } from '../intake/chunk-key';
import { RequeueError } from '../mq/message-bus';
import { RedisSegmentRegistry } from '../registry/redis-segment-registry';
import { PipelineOrchestrator } from './pipeline.orchestrator';
import { PipelineState, PipelineStep } from './pipeline.types';
import { FinalizeCatalogStage } from './stages/finalize-catalog.stage';
import { PollTranscribeStage } from './stages/poll-transcribe.stage';
import { StartTranscodeStage } from './stages/start-transcode.stage';
import { StartTranscribeStage } from './stages/start-transcribe.stage';
import { SummarizeStage } from './stages/summarize.stage';
import { ValidateInputStage } from './stages/validate-input.stage';

const QUEUE = 'pipeline_steps';
const EXECUTION = 'r1_exec_1';

function step(state: PipelineState, overrides: Partial<PipelineStep> = {}): PipelineStep {
  return {
    executionId: EXECUTION,
    state,
    input: pipelineInput(),
    context: {},
    attempt: 1,
    enteredAt: '2024-05-01T10:30:00.000Z',
    ...overrides,
  };
}

describe('PipelineOrchestrator', () => {
  const t0 = new Date('2024-05-01T10:30:00.000Z');
  let bus: InMemoryBus;
  let catalog: InMemorySessionCatalog;
  let store: FakeObjectStore;
  let registry: RedisSegmentRegistry;
  let transcoder: FakeTranscoder;
  let transcriber: FakeTranscriber;
  let model: FakeSummaryModel;
  let orchestrator: PipelineOrchestrator;

  function session(status: SessionStatus, executionHandle: string | null = EXECUTION) {
    catalog.seed({
      tenantId: 'u1',
      sessionId: 'r1',
      expectedSegmentCount: 3,
      status,
      executionHandle,
    });
  }

  async function uploadAll() {
    for (const i of [0, 1, 2]) {
      const key = chunkKey('u1', 'r1', i);
      store.seed(key, 'chunk');
      await registry.upsertSegment({
        tenantId: 'u1',
        sessionId: 'r1',
        chunkIndex: i,
        storageRef: { bucket: TEST_BUCKET, key },
        byteSize: 5,
        integrityTag: '',
      });
    }
  }

  function at(seconds: number) {
    return new Date(t0.getTime() + seconds * 1000);
  }

  beforeEach(() => {
    bus = new InMemoryBus();
    catalog = new InMemorySessionCatalog();
    store = new FakeObjectStore();
    registry = new RedisSegmentRegistry(new FakeRedisHashClient(), store, testConfig());
    transcoder = new FakeTranscoder();
    transcriber = new FakeTranscriber();
    model = new FakeSummaryModel();
    orchestrator = new PipelineOrchestrator(
      bus,
      catalog,
      testSettings({
        maxAttempts: 3,
        retryBaseMs: 1000,
        pollInitialMs: 15_000,
        pollMaxMs: 60_000,
        transcribeTimeoutMs: 3_600_000,
      }),
      new ValidateInputStage(),
      new StartTranscodeStage(registry, catalog, transcoder),
      new StartTranscribeStage(transcriber),
      new PollTranscribeStage(transcriber, store, catalog),
      new SummarizeStage(store, model, catalog),
      new FinalizeCatalogStage(catalog),
      testConfig(),
    );
  });

  it('consumes the pipeline queue', async () => {
    await orchestrator.onModuleInit();

    expect([...bus.handlers.keys()]).toEqual([QUEUE]);
  });

  it('builds execution ids from the session id', () => {
    expect(orchestrator.newExecutionId({ sessionId: 'r1' })).toMatch(/^r1_\d+_[0-9a-f]{8}$/);
  });

  it('schedules Validating as the first step', async () => {
    await orchestrator.start(EXECUTION, pipelineInput());

    const first = bus.take();
    expect(first.queue).toBe(QUEUE);
    expect(first.delayMs).toBe(0);
    expect(first.message).toMatchObject({
      executionId: EXECUTION,
      state: 'Validating',
      input: pipelineInput(),
      context: {},
      attempt: 1,
    });
  });

  it('runs a dispatched session through to completed', async () => {
    session('ready');
    await uploadAll();
    store.seed('users/u1/transcripts/r1.raw.json', JSON.stringify(RAW_TRANSCRIPTION));
    transcriber.script = [{ status: 'IN_PROGRESS' }, { status: 'COMPLETED' }];

    await orchestrator.start(EXECUTION, pipelineInput());
    expect(await orchestrator.handleStep(bus.take().message, at(0))).toEqual({
      result: 'advanced',
      next: 'Transcoding',
    });
    expect(await orchestrator.handleStep(bus.take().message, at(1))).toEqual({
      result: 'advanced',
      next: 'AwaitingTranscription',
    });

    expect(await orchestrator.handleStep(bus.take().message, at(2))).toEqual({
      result: 'waiting',
      delayMs: 15_000,
    });
    const jobName = transcriber.started[0].jobName;
    expect(catalog.row('u1', 'r1')).toMatchObject({
      status: 'transcribing',
      transcriptionJobName: jobName,
      nextCheckAfter: '2024-05-01T10:30:17.000Z',
    });

    const firstPoll = bus.take();
    expect(firstPoll.delayMs).toBe(15_000);
    expect(await orchestrator.handleStep(firstPoll.message, at(17))).toEqual({
      result: 'waiting',
      delayMs: 30_000,
    });
    expect(catalog.row('u1', 'r1')?.nextCheckAfter).toBe('2024-05-01T10:30:47.000Z');

    expect(await orchestrator.handleStep(bus.take().message, at(47))).toEqual({
      result: 'advanced',
      next: 'Summarizing',
    });
    expect(await orchestrator.handleStep(bus.take().message, at(48))).toEqual({
      result: 'advanced',
      next: 'Finalizing',
    });
    expect(await orchestrator.handleStep(bus.take().message, at(49))).toEqual({
      result: 'completed',
    });

    expect(bus.deliveries).toHaveLength(0);
    expect(transcriber.polled).toEqual([jobName, jobName]);
    expect(catalog.row('u1', 'r1')).toMatchObject({
      status: 'completed',
      completedAt: '2024-05-01T10:30:49.000Z',
      videoLocation: 's3://test-bucket/users/u1/videos/r1.mp4',
      audioLocation: 's3://test-bucket/users/u1/audio/r1.wav',
      transcriptLocation: 's3://test-bucket/users/u1/transcripts/r1.json',
      summaryLocation: 's3://test-bucket/users/u1/summaries/r1.json',
      errorDetail: null,
    });
    expect(catalog.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      'ready->validating',
      'validating->transcoding',
      'transcoding->transcribing',
      'transcribing->transcribing',
      'transcribing->transcribing',
      'transcribing->summarizing',
      'summarizing->finalizing',
      'finalizing->completed',
    ]);
  });

  it('drops messages it cannot read', async () => {
    expect(await orchestrator.handleStep({ state: 'Validating' }, t0)).toEqual({
      result: 'dropped',
      reason: 'unreadable step',
    });
  });

  it('drops steps of a superseded execution', async () => {
    session('dispatched', 'r1_exec_2');

    expect(await orchestrator.handleStep(step('Validating'), t0)).toEqual({
      result: 'dropped',
      reason: 'stale execution',
    });
    expect(catalog.transitions).toHaveLength(0);
  });

  it('drops steps for a session that already finished', async () => {
    session('failed');

    expect(await orchestrator.handleStep(step('Summarizing'), t0)).toEqual({
      result: 'dropped',
      reason: 'session already failed',
    });
  });

  it('drops a step whose state the session has moved past', async () => {
    session('summarizing');

    expect(await orchestrator.handleStep(step('Validating'), t0)).toEqual({
      result: 'dropped',
      reason: 'status moved on',
    });
    expect(catalog.row('u1', 'r1')?.status).toBe('summarizing');
  });

  it('retries a retryable failure with backoff', async () => {
    session('validating');

    expect(await orchestrator.handleStep(step('Transcoding', { attempt: 2 }), t0)).toEqual({
      result: 'retrying',
      attempt: 3,
      delayMs: 2000,
    });
    const retry = bus.take();
    expect(retry.delayMs).toBe(2000);
    expect(retry.message).toMatchObject({
      executionId: EXECUTION,
      state: 'Transcoding',
      attempt: 3,
      enteredAt: '2024-05-01T10:30:00.000Z',
    });
    expect(catalog.row('u1', 'r1')?.status).toBe('transcoding');
  });

  it('fails the session once retries are exhausted', async () => {
    session('transcoding');

    expect(await orchestrator.handleStep(step('Transcoding', { attempt: 3 }), t0)).toEqual({
      result: 'failed',
      errorDetail: 'ProcessingError: expected 3 segments for r1, registry has 0',
    });
    expect(bus.deliveries).toHaveLength(0);
    expect(catalog.row('u1', 'r1')).toMatchObject({
      status: 'failed',
      errorDetail: 'ProcessingError: expected 3 segments for r1, registry has 0',
    });
  });

  it('fails immediately on a non-retryable error', async () => {
    session('dispatched');
    const input = pipelineInput({ storagePrefix: 'users/u2/chunks/r1/' });

    expect(await orchestrator.handleStep(step('Validating', { input }), t0)).toEqual({
      result: 'failed',
      errorDetail: 'ValidationError: storagePrefix users/u2/chunks/r1/ does not belong to u1/r1',
    });
    expect(catalog.row('u1', 'r1')?.status).toBe('failed');
  });

  it('gives up on a transcription that outlives its deadline', async () => {
    session('transcribing');
    const context = {
      audioKey: 'users/u1/audio/r1.wav',
      transcriptionJobName: 'job-1',
      rawTranscriptKey: 'users/u1/transcripts/r1.raw.json',
      transcriptionDeadline: '2024-05-01T10:30:00.000Z',
      pollCount: 6,
    };

    expect(
      await orchestrator.handleStep(step('AwaitingTranscription', { context }), at(1)),
    ).toEqual({
      result: 'failed',
      errorDetail: 'TranscriptionError: transcription job-1 still running after 3600000ms',
    });
  });

  it('caps the poll interval', async () => {
    session('transcribing');
    const context = {
      audioKey: 'users/u1/audio/r1.wav',
      transcriptionJobName: 'job-1',
      transcriptionDeadline: '2024-05-01T11:30:00.000Z',
      pollCount: 4,
    };

    expect(
      await orchestrator.handleStep(step('AwaitingTranscription', { context }), t0),
    ).toEqual({ result: 'waiting', delayMs: 60_000 });
    expect(bus.take().message).toMatchObject({ context: { ...context, pollCount: 5 } });
  });

  it('fails on a malformed summary without storing it', async () => {
    session('transcribing');
    store.seed(
      'users/u1/transcripts/r1.json',
      JSON.stringify({
        recording_id: 'r1',
        generated_at: '2024-05-01T10:40:00.000Z',
        segments: [],
        pipeline_version: '1.0.0',
        model_version: 'fake-transcribe',
      }),
    );
    model.reply = 'not json';

    expect(
      await orchestrator.handleStep(
        step('Summarizing', { context: { transcriptKey: 'users/u1/transcripts/r1.json' } }),
        t0,
      ),
    ).toEqual({ result: 'failed', errorDetail: 'SummaryFormatError: model reply is not valid JSON' });
    expect(catalog.row('u1', 'r1')?.summaryLocation).toBeNull();
  });

  it('retries when the catalog cannot be read', async () => {
    session('transcribing');
    catalog.failReadsWith = new Error('connection refused');

    expect(await orchestrator.handleStep(step('Summarizing'), t0)).toEqual({
      result: 'retrying',
      attempt: 2,
      delayMs: 1000,
    });
  });

  it('retries the state when its next step cannot be published', async () => {
    session('dispatched');
    jest.spyOn(bus, 'publish').mockRejectedValueOnce(new Error('broker down'));

    expect(await orchestrator.handleStep(step('Validating'), t0)).toEqual({
      result: 'retrying',
      attempt: 2,
      delayMs: 1000,
    });
    expect(bus.take().message).toMatchObject({ state: 'Validating', attempt: 2 });
    expect(catalog.row('u1', 'r1')?.status).toBe('validating');
  });

  it('hands the step back to the broker when nothing can be published', async () => {
    session('dispatched');
    await orchestrator.onModuleInit();
    bus.publishFailure = new Error('broker down');

    expect(await bus.deliver(QUEUE, step('Validating'))).toBe('requeue');
    expect(catalog.row('u1', 'r1')?.status).toBe('validating');

    bus.publishFailure = null;
    expect(await orchestrator.handleStep(step('Validating'), t0)).toEqual({
      result: 'advanced',
      next: 'Transcoding',
    });
    expect(bus.take().message).toMatchObject({ state: 'Transcoding', attempt: 1 });
  });

  it('hands the step back to the broker when the failure cannot be recorded', async () => {
    session('dispatched');
    const transition = catalog.transitionStatus.bind(catalog);
    jest.spyOn(catalog, 'transitionStatus').mockImplementation(async (t, s, from, to, extra) => {
      if (to === 'failed') throw new CatalogError('db down');
      return transition(t, s, from, to, extra);
    });
    const input = pipelineInput({ storagePrefix: 'users/u2/chunks/r1/' });

    await expect(orchestrator.handleStep(step('Validating', { input }), t0)).rejects.toThrow(
      new RequeueError('u1/r1: cannot record failure of Validating: CatalogError: db down'),
    );
    expect(catalog.row('u1', 'r1')?.status).toBe('validating');
  });
});
