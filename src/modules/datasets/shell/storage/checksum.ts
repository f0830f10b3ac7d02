/**
 * Git blob ids: SHA-1 over `blob <size>\0` followed by the content.
 * Stored checksums compare directly with `ls-tree` oids.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

export const computeBlobChecksum = (data: Uint8Array): string =>
  createHash('sha1').update(`blob ${String(data.byteLength)}\0`).update(data).digest('hex');

export const computeFileChecksum = async (filePath: string, size: number): Promise<string> => {
  const hash = createHash('sha1').update(`blob ${String(size)}\0`);
  for await (const chunk of createReadStream(filePath)) {
    if (chunk instanceof Uint8Array) {
      hash.update(chunk);
    }
  }
  return hash.digest('hex');
};
