import { Injectable, Logger } from '@nestjs/common';
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { ConfigService } from '@nestjs/config';
import { ProcessingError, describeError } from '../common/pipeline-errors';
import { AppEnv } from '../config/env.validation';
import { ObjectHead, ObjectStore, StorageRef } from './object-store';

const UNREACHABLE_STATUS = new Set([403, 404]);

@Injectable()
export class S3Service extends ObjectStore {
  private readonly log = new Logger(S3Service.name);
  private s3: S3Client;
  private bucket: string;

  constructor(cfg: ConfigService<AppEnv, true>) {
    super();
    const region = cfg.get('AWS_REGION', { infer: true });
    this.bucket = cfg.get('S3_BUCKET', { infer: true });
    // credentials come from the default provider chain (task role / env)
    this.s3 = new S3Client({ region });
    this.log.log(`🔧 S3Service ready (region=${region}, bucket=${this.bucket})`);
  }

  async headObject(ref: StorageRef): Promise<ObjectHead | null> {
    try {
      const res = await this.s3.send(
        new HeadObjectCommand({ Bucket: ref.bucket, Key: ref.key }),
      );
      return { size: res.ContentLength ?? 0, etag: res.ETag ?? null };
    } catch (error) {
      if (
        error instanceof S3ServiceException &&
        (error.name === 'NotFound' ||
          UNREACHABLE_STATUS.has(error.$metadata.httpStatusCode ?? 0))
      ) {
        this.log.warn(`🔍 S3 HEAD miss: s3://${ref.bucket}/${ref.key}`);
        return null;
      }
      this.log.error(`❌ S3 HEAD failed: s3://${ref.bucket}/${ref.key}`);
      throw error;
    }
  }

  async getObjectText(
    key: string,
    bucket: string = this.bucket,
  ): Promise<string> {
    const startTime = Date.now();
    try {
      const res = await this.s3.send(
        new GetObjectCommand({ Bucket: bucket, Key: key }),
      );
      if (!res.Body) throw new Error('GetObject returned empty Body');
      const text = await res.Body.transformToString('utf-8');
      this.log.debug(
        `📥 S3 GET ${key} (${text.length} chars, ${Date.now() - startTime}ms)`,
      );
      return text;
    } catch (error) {
      this.log.error(`❌ S3 GET Object failed: ${key}`);
      throw new ProcessingError(`cannot read s3://${bucket}/${key}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async putObject(key: string, body: Buffer, contentType?: string) {
    const startTime = Date.now();

    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        }),
      );
      this.log.debug(
        `📤 S3 PUT ${key} (${body.length} bytes, ${Date.now() - startTime}ms)`,
      );
    } catch (error) {
      this.log.error(`❌ S3 PUT Object failed: ${key}`);
      throw new ProcessingError(`cannot write s3://${this.bucket}/${key}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async presignGet(key: string, expiresIn = 3600) {
    const url = await getSignedUrl(
      this.s3,
      new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      { expiresIn },
    );
    this.log.debug(`🔗 S3 presigned GET ${key} (expires in ${expiresIn}s)`);
    return url;
  }

  bucketName() {
    return this.bucket;
  }
}
