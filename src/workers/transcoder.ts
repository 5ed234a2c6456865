import { InvokeCommand, InvokeCommandOutput, LambdaClient } from '@aws-sdk/client-lambda';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { ProcessingError } from '../common/pipeline-errors';
import { AppEnv } from '../config/env.validation';

export interface TranscodeRequest {
  tenantId: string;
  sessionId: string;
  bucket: string;
  /** Chunk object keys in index order. */
  segmentKeys: string[];
  videoKey: string;
  audioKey: string;
}

export interface TranscodeResult {
  videoKey: string;
  audioKey: string;
}

/** Concatenates the chunks into one video and extracts its audio track. */
export abstract class Transcoder {
  abstract transcode(req: TranscodeRequest): Promise<TranscodeResult>;
}

const lambdaResponseSchema = z.object({
  videoKey: z.string().min(1),
  audioKey: z.string().min(1),
});

@Injectable()
export class LambdaTranscoder extends Transcoder {
  private readonly log = new Logger(LambdaTranscoder.name);
  private readonly lambda: LambdaClient;
  private readonly functionArn: string;

  constructor(cfg: ConfigService<AppEnv, true>) {
    super();
    this.lambda = new LambdaClient({ region: cfg.get('AWS_REGION', { infer: true }) });
    this.functionArn = cfg.get('TRANSCODER_LAMBDA_ARN', { infer: true });
  }

  async transcode(req: TranscodeRequest): Promise<TranscodeResult> {
    this.log.log(
      `🎬 Transcoding ${req.tenantId}/${req.sessionId} (${req.segmentKeys.length} chunks)`,
    );

    let out: InvokeCommandOutput;
    try {
      out = await this.lambda.send(
        new InvokeCommand({
          FunctionName: this.functionArn,
          InvocationType: 'RequestResponse',
          Payload: Buffer.from(JSON.stringify(req)),
        }),
      );
    } catch (error) {
      throw new ProcessingError(`transcoder invocation failed: ${String(error)}`, {
        cause: error,
      });
    }

    const body = Buffer.from(out.Payload ?? []).toString('utf8');
    if (out.FunctionError) {
      throw new ProcessingError(`transcoder reported ${out.FunctionError}: ${body.slice(0, 500)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(body || '{}');
    } catch (error) {
      throw new ProcessingError('transcoder returned a non-JSON payload', { cause: error });
    }
    const parsed = lambdaResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProcessingError('transcoder response is missing videoKey/audioKey');
    }

    this.log.log(`✅ Transcoded ${req.sessionId}: ${parsed.data.videoKey}`);
    return parsed.data;
  }
}
