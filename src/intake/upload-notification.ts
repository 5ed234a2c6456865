import { z } from 'zod';
import { ValidationError } from '../common/pipeline-errors';

export const uploadNotificationSchema = z.object({
  bucket: z.string().min(1),
  objectKey: z.string().min(1),
  objectSize: z.number().int(),
  etag: z.string().default(''),
  eventTimestamp: z.string().optional(),
  /** Set when the intake consumer re-queues a notification. */
  deliveryAttempt: z.number().int().positive().default(1),
});

export type UploadNotification = z.infer<typeof uploadNotificationSchema>;

// EventBridge "Object Created" event as emitted by S3
const objectCreatedEventSchema = z.object({
  time: z.string().optional(),
  detail: z.object({
    bucket: z.object({ name: z.string().min(1) }),
    object: z.object({
      key: z.string().min(1),
      size: z.number().int().default(0),
      etag: z.string().default(''),
    }),
  }),
});

/** Accepts either a plain notification or a storage event. */
export function parseUploadNotification(raw: unknown): UploadNotification {
  const event = objectCreatedEventSchema.safeParse(raw);
  if (event.success) {
    const { bucket, object } = event.data.detail;
    return {
      bucket: bucket.name,
      objectKey: object.key,
      objectSize: object.size,
      etag: object.etag,
      eventTimestamp: event.data.time,
      deliveryAttempt: 1,
    };
  }

  const parsed = uploadNotificationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      `invalid upload notification: ${parsed.error.issues
        .map((i) => `${i.path.join('.')} ${i.message}`)
        .join('; ')}`,
    );
  }
  return parsed.data;
}
