import { DataSource } from 'typeorm';
import { CatalogError } from '../common/pipeline-errors';
import { Session } from '../db/session.entity';
import { TypeOrmSessionCatalog } from './typeorm-session-catalog';

describe('TypeOrmSessionCatalog', () => {
  let dataSource: DataSource;
  let catalog: TypeOrmSessionCatalog;

  beforeEach(async () => {
    dataSource = new DataSource({
      type: 'better-sqlite3',
      database: ':memory:',
      entities: [Session],
      synchronize: true,
    });
    await dataSource.initialize();
    catalog = new TypeOrmSessionCatalog(dataSource.getRepository(Session));
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('creates a declared session in recording', async () => {
    const session = await catalog.declareSession({
      tenantId: 'u1',
      sessionId: 'r1',
      expectedSegmentCount: 3,
      totalDurationSeconds: 95,
      createdAt: '2024-05-01T10:00:00.000Z',
    });

    expect(session.status).toBe('recording');
    expect(session.expectedSegmentCount).toBe(3);
    expect(session.totalDurationSeconds).toBe(95);
    expect(session.declaredAt).toBe('2024-05-01T10:00:00.000Z');
    expect(await catalog.getExpectedCount('u1', 'r1')).toBe(3);
  });

  it('returns null for an undeclared session', async () => {
    expect(await catalog.getSession('u1', 'nope')).toBeNull();
    expect(await catalog.getExpectedCount('u1', 'nope')).toBeNull();
  });

  it('scopes sessions by tenant', async () => {
    await catalog.declareSession({ tenantId: 'u1', sessionId: 'r1', expectedSegmentCount: 2 });

    expect(await catalog.getSession('u2', 'r1')).toBeNull();
  });

  it('re-declaring before dispatch updates the size', async () => {
    await catalog.declareSession({ tenantId: 'u1', sessionId: 'r1', expectedSegmentCount: 2 });
    const again = await catalog.declareSession({
      tenantId: 'u1',
      sessionId: 'r1',
      expectedSegmentCount: 5,
    });

    expect(again.expectedSegmentCount).toBe(5);
  });

  it('keeps the size once dispatched', async () => {
    await catalog.declareSession({ tenantId: 'u1', sessionId: 'r1', expectedSegmentCount: 2 });
    await catalog.transitionStatus('u1', 'r1', ['recording'], 'ready');

    const again = await catalog.declareSession({
      tenantId: 'u1',
      sessionId: 'r1',
      expectedSegmentCount: 7,
    });

    expect(again.expectedSegmentCount).toBe(2);
    expect(again.status).toBe('ready');
  });

  it('applies a transition only from the listed statuses', async () => {
    await catalog.declareSession({ tenantId: 'u1', sessionId: 'r1', expectedSegmentCount: 2 });

    const first = await catalog.transitionStatus('u1', 'r1', ['recording', 'incomplete'], 'ready', {
      executionHandle: 'r1_exec_1',
    });
    const second = await catalog.transitionStatus('u1', 'r1', ['recording', 'incomplete'], 'ready', {
      executionHandle: 'r1_exec_2',
    });

    expect(first.applied).toBe(true);
    expect(second.applied).toBe(false);
    const stored = await catalog.getSession('u1', 'r1');
    expect(stored?.status).toBe('ready');
    expect(stored?.executionHandle).toBe('r1_exec_1');
  });

  it('reports a transition on a missing session as not applied', async () => {
    expect(await catalog.transitionStatus('u1', 'ghost', ['recording'], 'incomplete')).toEqual({
      applied: false,
    });
  });

  it('refuses edges the status graph does not have', async () => {
    await expect(catalog.transitionStatus('u1', 'r1', ['completed'], 'ready')).rejects.toThrow(
      'Illegal session transition [completed] -> ready',
    );
  });

  it('stores missing indices as JSON', async () => {
    await catalog.declareSession({ tenantId: 'u1', sessionId: 'r1', expectedSegmentCount: 5 });
    await catalog.transitionStatus('u1', 'r1', ['recording'], 'incomplete', {
      missingIndices: [2, 4],
    });

    expect((await catalog.getSession('u1', 'r1'))?.missingIndices).toEqual([2, 4]);
  });

  it('records artifacts and the poll schedule', async () => {
    await catalog.declareSession({ tenantId: 'u1', sessionId: 'r1', expectedSegmentCount: 1 });
    await catalog.recordArtifact('u1', 'r1', 'audio', 's3://test-bucket/users/u1/audio/r1.wav');
    await catalog.recordPollSchedule('u1', 'r1', 'job-1', '2024-05-01T10:05:00.000Z');

    const stored = await catalog.getSession('u1', 'r1');
    expect(stored?.audioLocation).toBe('s3://test-bucket/users/u1/audio/r1.wav');
    expect(stored?.transcriptionJobName).toBe('job-1');
    expect(stored?.nextCheckAfter).toBe('2024-05-01T10:05:00.000Z');
  });

  it('wraps storage failures in CatalogError', async () => {
    const repo = dataSource.getRepository(Session);
    jest.spyOn(repo, 'update').mockRejectedValue(new Error('disk I/O error'));
    const failing = new TypeOrmSessionCatalog(repo).recordArtifact('u1', 'r1', 'video', 's3://b/k');

    await expect(failing).rejects.toBeInstanceOf(CatalogError);
    await expect(failing).rejects.toThrow('artifact video for u1/r1: disk I/O error');
  });
});
