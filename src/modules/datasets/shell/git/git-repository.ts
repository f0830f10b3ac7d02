/**
 * RepositoryPort over the git CLI.
 *
 * Remote repositories are mirrored into a cache directory (one bare mirror per
 * URL, fetched again on every ref resolution). Absolute local paths are used
 * in place.
 */

import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { runGit, streamGit, toGitFailure, type GitRunner } from './git-cli.js';
import { withRetry } from '../../../../common/utils/retry.js';
import { isValidEmail } from '../../core/creators.js';
import {
  createGitError,
  createReferenceNotFoundError,
  createStorageError,
  isRetryableError,
  type DatasetError,
} from '../../core/errors.js';
import { matchesSourcePattern } from '../../core/filters.js';

import type { RepositoryPort } from '../../core/ports.js';
import type { ContentStream, Creator, TreeEntry } from '../../core/types.js';
import type { Logger } from 'pino';

export interface GitRepositoryOptions {
  /** Absolute project root; `currentCommit` reads its HEAD */
  projectDir: string;
  cacheDir?: string | undefined;
  retries: number;
  retryDelayMs: number;
  logger: Logger;
  run?: GitRunner | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Output parsing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses `git ls-tree -r -l -z` output, keeping blobs only.
 */
export const parseLsTree = (output: string): TreeEntry[] => {
  const entries: TreeEntry[] = [];

  for (const record of output.split('\0')) {
    const tab = record.indexOf('\t');
    if (tab === -1) {
      continue;
    }
    const [, type, oid, size] = record.slice(0, tab).trim().split(/\s+/);
    if (type !== 'blob' || oid === undefined) {
      continue;
    }
    const parsedSize = Number.parseInt(size ?? '', 10);
    entries.push({
      path: record.slice(tab + 1),
      oid,
      size: Number.isNaN(parsedSize) ? null : parsedSize,
    });
  }

  return entries;
};

/**
 * Parses `git log --format=%aN%x09%aE` output into distinct creators,
 * most recent first.
 */
export const parseAuthors = (output: string): Creator[] => {
  const seen = new Set<string>();
  const creators: Creator[] = [];

  for (const line of output.split('\n')) {
    const [name = '', email = ''] = line.split('\t');
    if (name.trim() === '') {
      continue;
    }
    const key = `${name.trim().toLowerCase()}\0${email.trim().toLowerCase()}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    creators.push({
      name: name.trim(),
      email: isValidEmail(email.trim()) ? email.trim() : null,
      affiliation: null,
    });
  }

  return creators;
};

const cacheKey = (uri: string): string => createHash('sha1').update(uri).digest('hex').slice(0, 16);

// ─────────────────────────────────────────────────────────────────────────────
// Adapter
// ─────────────────────────────────────────────────────────────────────────────

export const createGitRepository = (options: GitRepositoryOptions): RepositoryPort => {
  const run = options.run ?? runGit;
  const log = options.logger.child({ repo: 'GitRepository' });
  const cacheDir = options.cacheDir ?? path.join(os.tmpdir(), 'dataset-sync-git-cache');
  // In-flight syncs are shared; finished ones only mark the mirror as present
  const inFlight = new Map<string, Promise<Result<string, DatasetError>>>();
  const synced = new Map<string, string>();

  const retrying = <T>(
    operation: () => Promise<Result<T, DatasetError>>,
    uri: string
  ): Promise<Result<T, DatasetError>> =>
    withRetry(operation, {
      retries: options.retries,
      delayMs: options.retryDelayMs,
      isRetryable: isRetryableError,
      onRetry: (error, attempt) => {
        log.warn({ uri, attempt, error: error.message }, 'Retrying git operation');
      },
    });

  const syncMirror = async (uri: string): Promise<Result<string, DatasetError>> => {
    const mirror = path.join(cacheDir, cacheKey(uri));
    const exists = await fs
      .stat(path.join(mirror, 'HEAD'))
      .then(() => true)
      .catch(() => false);

    if (exists) {
      log.debug({ uri, mirror }, 'Fetching mirror');
      return retrying(async (): Promise<Result<string, DatasetError>> => {
        const result = await run(['-C', mirror, 'remote', 'update', '--prune']);
        return result.isErr() ? err(toGitFailure(uri, 'git fetch', result.error)) : ok(mirror);
      }, uri);
    }

    log.debug({ uri, mirror }, 'Cloning mirror');
    try {
      await fs.mkdir(cacheDir, { recursive: true });
    } catch (error) {
      return err(createStorageError(cacheDir, error));
    }
    return retrying(async (): Promise<Result<string, DatasetError>> => {
      // A failed clone can leave a partial mirror behind
      try {
        await fs.rm(mirror, { recursive: true, force: true });
      } catch (error) {
        return err(createStorageError(mirror, error));
      }
      const result = await run(['clone', '--mirror', '--quiet', uri, mirror]);
      return result.isErr() ? err(toGitFailure(uri, 'git clone', result.error)) : ok(mirror);
    }, uri);
  };

  /**
   * Directory to run git in for a URI. With `refresh` the mirror is fetched
   * even when an earlier call already synced it.
   */
  const repositoryDir = (uri: string, refresh = false): Promise<Result<string, DatasetError>> => {
    if (path.isAbsolute(uri)) {
      return Promise.resolve(ok(uri));
    }
    const pending = inFlight.get(uri);
    if (pending !== undefined) {
      return pending;
    }
    const mirror = synced.get(uri);
    if (mirror !== undefined && !refresh) {
      return Promise.resolve(ok(mirror));
    }
    const sync = syncMirror(uri).then((result) => {
      inFlight.delete(uri);
      if (result.isOk()) {
        synced.set(uri, result.value);
      }
      return result;
    });
    inFlight.set(uri, sync);
    return sync;
  };

  const gitIn = async (
    uri: string,
    args: readonly string[],
    action: string
  ): Promise<Result<string, DatasetError>> => {
    const dir = await repositoryDir(uri);
    if (dir.isErr()) {
      return err(dir.error);
    }
    const result = await run(['-C', dir.value, ...args]);
    return result.isErr() ? err(toGitFailure(uri, action, result.error)) : ok(result.value.stdout);
  };

  return {
    async resolveRef(uri, ref) {
      const target = ref ?? 'HEAD';
      if (target.startsWith('-')) {
        return err(createReferenceNotFoundError(uri, target));
      }

      const dir = await repositoryDir(uri, true);
      if (dir.isErr()) {
        return err(dir.error);
      }

      const result = await run(['-C', dir.value, 'rev-parse', '--verify', '--quiet', `${target}^{commit}`]);
      if (result.isErr()) {
        return err(createReferenceNotFoundError(uri, target));
      }
      return ok(result.value.stdout.trim());
    },

    async listTree(uri, commit, pattern) {
      const output = await gitIn(uri, ['ls-tree', '-r', '-l', '-z', '--full-tree', commit], 'git ls-tree');
      if (output.isErr()) {
        return err(output.error);
      }
      return ok(parseLsTree(output.value).filter((entry) => matchesSourcePattern(entry.path, pattern)));
    },

    async readBlob(uri, commit, filePath): Promise<Result<ContentStream, DatasetError>> {
      const dir = await repositoryDir(uri);
      if (dir.isErr()) {
        return err(dir.error);
      }

      const object = `${commit}:${filePath}`;
      const exists = await run(['-C', dir.value, 'cat-file', '-e', object]);
      if (exists.isErr()) {
        return err(createGitError(uri, `No file '${filePath}' at ${commit}`, exists.error.stderr));
      }

      return ok(streamGit(['-C', dir.value, 'cat-file', 'blob', object]));
    },

    async fileCreators(uri, commit, filePath) {
      const output = await gitIn(
        uri,
        ['log', '--format=%aN%x09%aE', commit, '--', filePath],
        'git log'
      );
      if (output.isErr()) {
        return err(output.error);
      }
      return ok(parseAuthors(output.value));
    },

    async currentCommit() {
      const result = await run(['-C', options.projectDir, 'rev-parse', '--verify', 'HEAD']);
      if (result.isErr()) {
        return err(
          createGitError(options.projectDir, 'Cannot read the current commit', result.error.stderr)
        );
      }
      return ok(result.value.stdout.trim());
    },
  };
};
