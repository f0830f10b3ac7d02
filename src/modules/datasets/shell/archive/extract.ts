/**
 * Unpacks downloaded `.zip` and `.gz` payloads with fflate.
 */

import fs from 'node:fs/promises';
import path, { posix } from 'node:path';

import { gunzipSync, unzipSync } from 'fflate';
import { err, ok, type Result } from 'neverthrow';

import { createStorageError, type DatasetError } from '../../core/errors.js';
import { isInsideRoot } from '../../core/paths.js';

import type { ArchiveExtractor } from '../../core/ports.js';

const ARCHIVE_RE = /\.(zip|gz)$/i;

const stemOf = (archivePath: string): string => path.basename(archivePath).replace(ARCHIVE_RE, '');

const writeEntries = async (
  baseDir: string,
  entries: readonly (readonly [string, Uint8Array])[]
): Promise<void> => {
  for (const [relative, data] of entries) {
    const target = path.join(baseDir, ...relative.split('/'));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
  }
};

const unpackZip = (data: Uint8Array, archivePath: string): Result<[string, Uint8Array][], DatasetError> => {
  const stem = stemOf(archivePath);
  const entries: [string, Uint8Array][] = [];

  for (const [name, content] of Object.entries(unzipSync(data))) {
    if (name.endsWith('/')) {
      continue;
    }
    // Entries must stay inside the extraction directory
    const normalized = name.replace(/\\/g, '/');
    if (!isInsideRoot(normalized)) {
      return err(createStorageError(archivePath, new Error(`Archive entry escapes its directory: ${name}`)));
    }
    entries.push([posix.join(stem, normalized), content]);
  }

  return ok(entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
};

const unpackGzip = (data: Uint8Array, archivePath: string): Result<[string, Uint8Array][], DatasetError> => {
  const entry: [string, Uint8Array] = [stemOf(archivePath), gunzipSync(data)];
  return ok([entry]);
};

export const createArchiveExtractor = (): ArchiveExtractor => ({
  isArchive: (filePath) => ARCHIVE_RE.test(filePath),

  async extract(archivePath) {
    let data: Uint8Array;
    try {
      data = await fs.readFile(archivePath);
    } catch (error) {
      return err(createStorageError(archivePath, error));
    }

    let entries: Result<[string, Uint8Array][], DatasetError>;
    try {
      entries = archivePath.toLowerCase().endsWith('.zip')
        ? unpackZip(data, archivePath)
        : unpackGzip(data, archivePath);
    } catch (error) {
      return err(createStorageError(archivePath, error));
    }
    if (entries.isErr()) {
      return err(entries.error);
    }

    try {
      await writeEntries(path.dirname(archivePath), entries.value);
    } catch (error) {
      return err(createStorageError(archivePath, error));
    }

    return ok(entries.value.map(([relative]) => relative));
  },
});
