import {
  BedrockRuntimeClient,
  InvokeModelCommand,
  InvokeModelCommandOutput,
  ModelNotReadyException,
  ServiceUnavailableException,
  ThrottlingException,
} from '@aws-sdk/client-bedrock-runtime';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { ProcessingError, SummaryFormatError } from '../common/pipeline-errors';
import { AppEnv } from '../config/env.validation';

/** A text-in, text-out language model. */
export abstract class SummaryModel {
  abstract readonly modelVersion: string;

  /** Returns the model's raw text reply. Throttling surfaces as `ProcessingError`. */
  abstract complete(prompt: string): Promise<string>;
}

const messagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).min(1),
});

@Injectable()
export class BedrockSummaryModel extends SummaryModel {
  readonly modelVersion: string;
  private readonly log = new Logger(BedrockSummaryModel.name);
  private readonly client: BedrockRuntimeClient;
  private readonly maxTokens: number;

  constructor(cfg: ConfigService<AppEnv, true>) {
    super();
    this.client = new BedrockRuntimeClient({ region: cfg.get('AWS_REGION', { infer: true }) });
    this.modelVersion = cfg.get('BEDROCK_MODEL_ID', { infer: true });
    this.maxTokens = cfg.get('BEDROCK_MAX_TOKENS', { infer: true });
  }

  async complete(prompt: string): Promise<string> {
    let res: InvokeModelCommandOutput;
    try {
      res = await this.client.send(
        new InvokeModelCommand({
          modelId: this.modelVersion,
          contentType: 'application/json',
          accept: 'application/json',
          body: JSON.stringify({
            anthropic_version: 'bedrock-2023-05-31',
            max_tokens: this.maxTokens,
            temperature: 0.1,
            messages: [{ role: 'user', content: prompt }],
          }),
        }),
      );
    } catch (error) {
      if (
        error instanceof ThrottlingException ||
        error instanceof ModelNotReadyException ||
        error instanceof ServiceUnavailableException
      ) {
        this.log.warn(`🐢 Model busy: ${error.name}`);
        throw new ProcessingError(`summarizer throttled: ${error.message}`, { cause: error });
      }
      throw error;
    }

    let envelope: unknown;
    try {
      envelope = JSON.parse(new TextDecoder().decode(res.body));
    } catch (error) {
      throw new SummaryFormatError('model response body is not JSON', { cause: error });
    }
    const parsed = messagesResponseSchema.safeParse(envelope);
    const text = parsed.success ? parsed.data.content[0].text : undefined;
    if (text === undefined) {
      throw new SummaryFormatError('model response carries no text content');
    }

    this.log.log(`🧠 Model replied with ${text.length} chars`);
    return text;
  }
}
