import { MalformedKeyError } from '../common/pipeline-errors';

const CHUNK_KEY = /^users\/([^/]+)\/chunks\/([^/]+)\/chunk_(\d{3})\.mp4$/;

export interface ChunkKey {
  tenantId: string;
  sessionId: string;
  chunkIndex: number;
}

/** `users/{tenantId}/chunks/{sessionId}/chunk_{NNN}.mp4` */
export function parseChunkKey(objectKey: string): ChunkKey {
  const m = CHUNK_KEY.exec(objectKey);
  if (!m) {
    throw new MalformedKeyError(`unrecognised chunk key "${objectKey}"`);
  }
  return { tenantId: m[1], sessionId: m[2], chunkIndex: Number(m[3]) };
}

export function chunkKey(tenantId: string, sessionId: string, chunkIndex: number) {
  return `users/${tenantId}/chunks/${sessionId}/chunk_${String(chunkIndex).padStart(3, '0')}.mp4`;
}
