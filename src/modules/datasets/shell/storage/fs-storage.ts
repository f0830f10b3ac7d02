import { randomUUID } from 'node:crypto';
import { createReadStream, type Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { computeFileChecksum } from './checksum.js';
import { hasErrorCode } from '../../../../common/utils/errno.js';
import { createStorageError, type DatasetError } from '../../core/errors.js';

import type { FileSystemPort, WrittenFile } from '../../core/ports.js';
import type { ContentStream, FileStat } from '../../core/types.js';

const statOrNull = async (filePath: string): Promise<FileStat | null> => {
  let linkStat: Stats;
  try {
    linkStat = await fs.lstat(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return null;
    }
    throw error;
  }

  const isSymlink = linkStat.isSymbolicLink();
  let target = linkStat;
  if (isSymlink) {
    try {
      target = await fs.stat(filePath);
    } catch (error) {
      // dangling link
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  return {
    kind: target.isDirectory() ? 'directory' : 'file',
    size: target.size,
    isSymlink,
  };
};

const walkDirectory = async (root: string, relative: string, out: string[]): Promise<void> => {
  const entries = await fs.readdir(path.join(root, relative), { withFileTypes: true });

  for (const entry of entries) {
    const child = relative === '' ? entry.name : `${relative}/${entry.name}`;
    if (entry.isDirectory()) {
      await walkDirectory(root, child, out);
    } else if (entry.isFile() || entry.isSymbolicLink()) {
      out.push(child);
    }
  }
};

/**
 * Local filesystem adapter. Writes go to a sibling `.part` file that is
 * renamed over the target once complete.
 */
export const createFsStorage = (): FileSystemPort => ({
  async stat(filePath): Promise<Result<FileStat | null, DatasetError>> {
    try {
      return ok(await statOrNull(filePath));
    } catch (error) {
      return err(createStorageError(filePath, error));
    }
  },

  async walk(dir): Promise<Result<string[], DatasetError>> {
    const files: string[] = [];
    try {
      await walkDirectory(dir, '', files);
    } catch (error) {
      return err(createStorageError(dir, error));
    }
    return ok(files.sort());
  },

  async read(filePath): Promise<Result<ContentStream, DatasetError>> {
    try {
      await fs.access(filePath, fs.constants.R_OK);
    } catch (error) {
      return err(createStorageError(filePath, error));
    }
    return ok(createReadStream(filePath));
  },

  async write(filePath, content, onBytes): Promise<Result<WrittenFile, DatasetError>> {
    const partial = `${filePath}.${randomUUID()}.part`;
    let size = 0;

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      const handle = await fs.open(partial, 'w');
      try {
        for await (const chunk of content) {
          await handle.write(chunk);
          size += chunk.byteLength;
          onBytes?.(chunk.byteLength);
        }
      } finally {
        await handle.close();
      }

      const checksum = await computeFileChecksum(partial, size);
      await fs.rename(partial, filePath);
      return ok({ checksum, size });
    } catch (error) {
      await fs.rm(partial, { force: true }).catch(() => undefined);
      return err(createStorageError(filePath, error));
    }
  },

  async symlink(filePath, target): Promise<Result<void, DatasetError>> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.rm(filePath, { force: true });
      await fs.symlink(target, filePath);
      return ok(undefined);
    } catch (error) {
      return err(createStorageError(filePath, error));
    }
  },

  async checksum(filePath): Promise<Result<string | null, DatasetError>> {
    try {
      const stat = await statOrNull(filePath);
      if (stat?.kind !== 'file') {
        return ok(null);
      }
      return ok(await computeFileChecksum(filePath, stat.size));
    } catch (error) {
      return err(createStorageError(filePath, error));
    }
  },

  async remove(filePath): Promise<Result<void, DatasetError>> {
    try {
      await fs.rm(filePath, { force: true });
      return ok(undefined);
    } catch (error) {
      return err(createStorageError(filePath, error));
    }
  },
});
