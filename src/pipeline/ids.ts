import { createHash } from 'crypto';
import fs from 'fs-extra';

export const MEDIA_ID_LENGTH = 32;

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/** Media identity is the content hash, so a moved or renamed file keeps its id. */
export async function toMediaId(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  await new Promise<void>((resolve, reject) => {
    const stream = fs.createReadStream(filePath);
    stream.on('data', (d) => hash.update(d));
    stream.on('error', reject);
    stream.on('end', () => resolve());
  });
  return hash.digest('hex').slice(0, MEDIA_ID_LENGTH);
}

export function toChunkId(mediaId: string, index: number, contentHash: string): string {
  return `${mediaId}-${String(index).padStart(5, '0')}-${contentHash.slice(0, 12)}`;
}
