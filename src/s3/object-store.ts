export interface StorageRef {
  bucket: string;
  key: string;
}

export interface ObjectHead {
  size: number;
  etag: string | null;
}

/**
 * Narrow view of object storage used by the registry and the stage adapters.
 * `S3Service` is the production implementation.
 */
export abstract class ObjectStore {
  abstract bucketName(): string;

  /** `null` when the object does not exist or is not readable. */
  abstract headObject(ref: StorageRef): Promise<ObjectHead | null>;

  /** Read and write failures reject with a retryable `ProcessingError`. */
  abstract getObjectText(key: string, bucket?: string): Promise<string>;

  abstract putObject(
    key: string,
    body: Buffer,
    contentType?: string,
  ): Promise<void>;

  abstract presignGet(key: string, expiresIn?: number): Promise<string>;
}
