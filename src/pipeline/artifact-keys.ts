import { StorageRef } from '../s3/object-store';

export const artifactKeys = {
  video: (tenantId: string, sessionId: string) => `users/${tenantId}/videos/${sessionId}.mp4`,
  audio: (tenantId: string, sessionId: string) => `users/${tenantId}/audio/${sessionId}.wav`,
  rawTranscript: (tenantId: string, sessionId: string) =>
    `users/${tenantId}/transcripts/${sessionId}.raw.json`,
  transcript: (tenantId: string, sessionId: string) =>
    `users/${tenantId}/transcripts/${sessionId}.json`,
  summary: (tenantId: string, sessionId: string) =>
    `users/${tenantId}/summaries/${sessionId}.json`,
};

export function toS3Uri(ref: StorageRef) {
  return `s3://${ref.bucket}/${ref.key}`;
}

export function parseS3Uri(uri: string): StorageRef | null {
  const m = /^s3:\/\/([^/]+)\/(.+)$/.exec(uri);
  return m ? { bucket: m[1], key: m[2] } : null;
}

/** Artifacts always live under the owning tenant's prefix. */
export function belongsToTenant(key: string, tenantId: string) {
  return key.startsWith(`users/${tenantId}/`);
}
