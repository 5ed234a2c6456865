import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { ValidationError } from '../../common/pipeline-errors';
import { chunkPrefix } from '../pipeline-input';
import { PipelineInput } from '../pipeline.types';

const nonBlank = z.string().trim().min(1);

export const pipelineInputSchema = z.object({
  sessionId: nonBlank,
  tenantId: nonBlank,
  storageBucket: nonBlank,
  storagePrefix: nonBlank,
  chunkCount: z.number().int().positive(),
  pipelineVersion: nonBlank,
  createdAt: nonBlank,
  totalDurationSeconds: z.number().nonnegative().default(0),
  metadata: z.object({
    trigger: nonBlank,
    originalChunkCount: z.number().int().positive(),
    triggeredAt: nonBlank,
  }),
});

export function parsePipelineInput(raw: unknown): PipelineInput {
  const parsed = pipelineInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      `pipeline input rejected: ${parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'} ${i.message}`)
        .join('; ')}`,
    );
  }
  return parsed.data;
}

@Injectable()
export class ValidateInputStage {
  private readonly log = new Logger(ValidateInputStage.name);

  run(input: PipelineInput): void {
    const expectedPrefix = chunkPrefix(input.tenantId, input.sessionId);
    if (input.storagePrefix !== expectedPrefix) {
      throw new ValidationError(
        `storagePrefix ${input.storagePrefix} does not belong to ${input.tenantId}/${input.sessionId}`,
      );
    }
    if (input.chunkCount !== input.metadata.originalChunkCount) {
      throw new ValidationError(
        `chunkCount ${input.chunkCount} differs from declared ${input.metadata.originalChunkCount}`,
      );
    }
    this.log.log(`✅ Input valid for ${input.tenantId}/${input.sessionId}`);
  }
}
