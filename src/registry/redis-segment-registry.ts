import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { CatalogError, InvalidSegmentError, describeError } from '../common/pipeline-errors';
import { AppEnv } from '../config/env.validation';
import { REDIS_CLIENT, RedisHashClient } from '../db/redis.service';
import { Segment } from '../db/segment.entity';
import { ObjectHead, ObjectStore } from '../s3/object-store';
import { SegmentRegistry, SegmentUpsert } from './segment-registry';

function kSegments(tenantId: string, sessionId: string) {
  return `tenant:${tenantId}:session:${sessionId}:segments`; // HASH: field="{index}", value=JSON
}
function kRejections(tenantId: string, sessionId: string) {
  return `tenant:${tenantId}:session:${sessionId}:rejections`;
}

const SCAN_PAGE = 100;

const segmentSchema = z.object({
  tenantId: z.string(),
  sessionId: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  storageRef: z.object({ bucket: z.string(), key: z.string() }),
  byteSize: z.number(),
  integrityTag: z.string(),
  uploadedAt: z.string(),
  validationState: z.enum(['validated', 'rejected']),
  rejectionReason: z.string().optional(),
});

function parseSegment(raw: string | null): Segment | null {
  if (!raw) return null;
  try {
    const parsed = segmentSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

@Injectable()
export class RedisSegmentRegistry extends SegmentRegistry {
  private readonly log = new Logger(RedisSegmentRegistry.name);
  private readonly ttlSeconds: number;

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: RedisHashClient,
    private readonly store: ObjectStore,
    cfg: ConfigService<AppEnv, true>,
  ) {
    super();
    this.ttlSeconds = cfg.get('SEGMENT_TTL_SECONDS', { infer: true });
  }

  async upsertSegment(input: SegmentUpsert): Promise<{ created: boolean }> {
    const { tenantId, sessionId, chunkIndex } = input;

    if (!(input.byteSize > 0)) {
      return this.reject(input, `byteSize must be positive, got ${input.byteSize}`);
    }

    let head: ObjectHead | null;
    try {
      head = await this.store.headObject(input.storageRef);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.reject(input, `existence check failed: ${reason}`, error);
    }
    if (!head) {
      return this.reject(input, 'object is not reachable');
    }
    if (head.size <= 0) {
      return this.reject(input, 'stored object is empty');
    }

    const record: Segment = {
      tenantId,
      sessionId,
      chunkIndex,
      storageRef: input.storageRef,
      byteSize: input.byteSize,
      integrityTag: input.integrityTag,
      uploadedAt: input.uploadedAt ?? new Date().toISOString(),
      validationState: 'validated',
    };

    const key = kSegments(tenantId, sessionId);
    const created =
      (await this.storage('HSETNX', () =>
        this.redis.hsetnx(key, String(chunkIndex), JSON.stringify(record)),
      )) === 1;

    if (created) {
      await this.storage('EXPIRE', () => this.redis.expire(key, this.ttlSeconds));
      this.log.log(
        `🧩 Segment recorded: ${tenantId}/${sessionId}#${chunkIndex} (${input.byteSize} bytes)`,
      );
      return { created: true };
    }

    const existing = parseSegment(
      await this.storage('HGET', () => this.redis.hget(key, String(chunkIndex))),
    );
    if (
      existing &&
      (existing.byteSize !== record.byteSize ||
        existing.integrityTag !== record.integrityTag)
    ) {
      // first write wins; the redelivered metadata is not applied
      this.log.warn(
        `⚠️  Conflicting metadata for ${tenantId}/${sessionId}#${chunkIndex} ignored ` +
          `(stored size=${existing.byteSize} tag=${existing.integrityTag}, ` +
          `incoming size=${record.byteSize} tag=${record.integrityTag})`,
      );
    } else {
      this.log.debug(`🔁 Duplicate segment ${tenantId}/${sessionId}#${chunkIndex}`);
    }
    return { created: false };
  }

  async listValidatedIndices(
    tenantId: string,
    sessionId: string,
  ): Promise<Set<number>> {
    const segments = await this.scanSegments(tenantId, sessionId);
    return new Set(segments.keys());
  }

  async listSegments(tenantId: string, sessionId: string): Promise<Segment[]> {
    const segments = await this.scanSegments(tenantId, sessionId);
    return [...segments.values()].sort((a, b) => a.chunkIndex - b.chunkIndex);
  }

  /** HSCAN may return a field more than once; the map collapses repeats. */
  private async scanSegments(
    tenantId: string,
    sessionId: string,
  ): Promise<Map<number, Segment>> {
    const key = kSegments(tenantId, sessionId);
    const out = new Map<number, Segment>();
    let cursor = '0';
    do {
      const [next, flat] = await this.storage('HSCAN', () =>
        this.redis.hscan(key, cursor, 'COUNT', SCAN_PAGE),
      );
      for (let i = 0; i + 1 < flat.length; i += 2) {
        const index = Number(flat[i]);
        const segment = parseSegment(flat[i + 1]);
        if (
          !Number.isInteger(index) ||
          !segment ||
          segment.validationState !== 'validated' ||
          segment.tenantId !== tenantId
        ) {
          continue;
        }
        out.set(index, segment);
      }
      cursor = next;
    } while (cursor !== '0');
    return out;
  }

  private async storage<T>(command: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (error) {
      throw new CatalogError(`segment registry ${command} failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private async reject(
    input: SegmentUpsert,
    reason: string,
    cause?: unknown,
  ): Promise<never> {
    const { tenantId, sessionId, chunkIndex } = input;
    const rejection: Segment = {
      tenantId,
      sessionId,
      chunkIndex,
      storageRef: input.storageRef,
      byteSize: input.byteSize,
      integrityTag: input.integrityTag,
      uploadedAt: input.uploadedAt ?? new Date().toISOString(),
      validationState: 'rejected',
      rejectionReason: reason,
    };
    const key = kRejections(tenantId, sessionId);
    await this.storage('HSET', () =>
      this.redis.hset(key, String(chunkIndex), JSON.stringify(rejection)),
    );
    await this.storage('EXPIRE', () => this.redis.expire(key, this.ttlSeconds));

    this.log.warn(`🚫 Segment rejected: ${tenantId}/${sessionId}#${chunkIndex}: ${reason}`);
    throw new InvalidSegmentError(
      `segment ${chunkIndex} of ${sessionId}: ${reason}`,
      { cause },
    );
  }
}
