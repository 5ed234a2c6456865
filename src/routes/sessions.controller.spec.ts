import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { testConfig, testSettings } from '../../test/fakes/config';
import { FakeObjectStore, TEST_BUCKET } from '../../test/fakes/fake-object-store';
import { FakeRedisHashClient } from '../../test/fakes/fake-redis';
import { FakeLauncher } from '../../test/fakes/fake-workers';
import { InMemorySessionCatalog } from '../../test/fakes/in-memory-session-catalog';
import { SessionCatalog } from '../catalog/session-catalog';
import { CompletionDetector } from '../completion/completion-detector.service';
import { ValidationError } from '../common/pipeline-errors';
import { chunkKey } from '../intake/chunk-key';
import { SessionDeclarationService } from '../intake/session-declaration.service';
import { RedisSegmentRegistry } from '../registry/redis-segment-registry';
import { SegmentRegistry } from '../registry/segment-registry';
import { ObjectStore } from '../s3/object-store';
import { SessionsController } from './sessions.controller';

describe('SessionsController', () => {
  let catalog: InMemorySessionCatalog;
  let store: FakeObjectStore;
  let registry: RedisSegmentRegistry;
  let controller: SessionsController;

  async function upload(...indices: number[]) {
    for (const i of indices) {
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

  beforeEach(async () => {
    catalog = new InMemorySessionCatalog();
    store = new FakeObjectStore();
    registry = new RedisSegmentRegistry(new FakeRedisHashClient(), store, testConfig());
    const detector = new CompletionDetector(catalog, registry, new FakeLauncher(), testSettings());

    const moduleRef = await Test.createTestingModule({
      controllers: [SessionsController],
      providers: [
        { provide: SessionCatalog, useValue: catalog },
        { provide: SegmentRegistry, useValue: registry },
        { provide: ObjectStore, useValue: store },
        { provide: SessionDeclarationService, useValue: new SessionDeclarationService(catalog, detector) },
      ],
    }).compile();
    controller = moduleRef.get(SessionsController);
  });

  it('declares a session and returns its view', async () => {
    const { session, completion } = await controller.declare('u1', {
      sessionId: 'r1',
      expectedSegmentCount: 2,
    });

    expect(session).toMatchObject({
      tenantId: 'u1',
      sessionId: 'r1',
      status: 'incomplete',
      expectedSegmentCount: 2,
      missingIndices: [0, 1],
      artifacts: { video: null, audio: null, transcript: null, summary: null },
    });
    expect(completion).toEqual({ complete: false, reason: 'missing-segments', missing: [0, 1] });
  });

  it('rejects an invalid declaration body', async () => {
    await expect(controller.declare('u1', { sessionId: 'r1' })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('returns 404 for an unknown session', async () => {
    await expect(controller.get('u1', 'nope')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('reports segment progress against the declared size', async () => {
    catalog.seed({ tenantId: 'u1', sessionId: 'r1', expectedSegmentCount: 3 });
    await upload(2, 0);

    expect(await controller.segments('u1', 'r1')).toEqual({
      expectedSegmentCount: 3,
      validated: [0, 2],
      missing: [1],
      unexpected: [],
    });
  });

  it('reports segments of an undeclared session without gaps', async () => {
    await upload(1);

    expect(await controller.segments('u1', 'r1')).toEqual({
      expectedSegmentCount: null,
      validated: [1],
      missing: null,
      unexpected: null,
    });
  });

  it('does not show one tenant\'s segments to another', async () => {
    await upload(0);

    await expect(controller.segments('u2', 'r1')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('presigns a stored artifact', async () => {
    catalog.seed({
      tenantId: 'u1',
      sessionId: 'r1',
      status: 'completed',
      summaryLocation: 's3://test-bucket/users/u1/summaries/r1.json',
    });

    expect(await controller.artifact('u1', 'r1', 'summary')).toEqual({
      kind: 'summary',
      location: 's3://test-bucket/users/u1/summaries/r1.json',
      url: 'https://test-bucket.s3.test/users/u1/summaries/r1.json?X-Amz-Expires=900',
      expiresIn: 900,
    });
  });

  it('returns 404 for an artifact not produced yet', async () => {
    catalog.seed({ tenantId: 'u1', sessionId: 'r1', status: 'transcribing' });

    await expect(controller.artifact('u1', 'r1', 'summary')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('refuses an artifact stored outside the tenant prefix', async () => {
    catalog.seed({
      tenantId: 'u1',
      sessionId: 'r1',
      videoLocation: 's3://test-bucket/users/u2/videos/r1.mp4',
    });

    await expect(controller.artifact('u1', 'r1', 'video')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it.each(['thumbnail', 'constructor'])('rejects the artifact kind %s', async (kind) => {
    await expect(controller.artifact('u1', 'r1', kind)).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });
});
