/**
 * Where engine operations run: the current project, or a scoped checkout of
 * a remote project that is removed afterwards.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { createStorageError, type DatasetError } from '../../core/errors.js';
import { runGit, toGitFailure, type GitRunner } from '../git/git-cli.js';

import type { Logger } from 'pino';

export interface WorkingContext {
  /** Runs `operation` with the absolute project directory it should act on */
  withWorkingContext<T>(
    operation: (projectDir: string) => Promise<Result<T, DatasetError>>
  ): Promise<Result<T, DatasetError>>;
}

export const createLocalContext = (projectDir: string): WorkingContext => ({
  withWorkingContext: (operation) => operation(path.resolve(projectDir)),
});

export type Checkout = (
  uri: string,
  ref: string | null,
  targetDir: string
) => Promise<Result<void, DatasetError>>;

/**
 * Shallow clone of one branch (or the default branch).
 */
export const gitCheckout =
  (run: GitRunner = runGit): Checkout =>
  async (uri, ref, targetDir) => {
    const args = ['clone', '--depth', '1', '--quiet'];
    if (ref !== null) {
      args.push('--branch', ref);
    }
    args.push('--', uri, targetDir);

    const result = await run(args, {});
    return result.isErr() ? err(toGitFailure(uri, 'clone', result.error)) : ok(undefined);
  };

export interface RemoteContextOptions {
  uri: string;
  ref?: string | null | undefined;
  logger: Logger;
  checkout?: Checkout | undefined;
  /** Parent of the temporary checkout directory */
  tmpDir?: string | undefined;
}

export const createRemoteContext = (options: RemoteContextOptions): WorkingContext => {
  const checkout = options.checkout ?? gitCheckout();
  const log = options.logger.child({ component: 'RemoteContext', uri: options.uri });

  return {
    async withWorkingContext(operation) {
      let workDir: string;
      try {
        workDir = await fs.mkdtemp(path.join(options.tmpDir ?? os.tmpdir(), 'dataset-sync-'));
      } catch (error) {
        return err(createStorageError(options.tmpDir ?? os.tmpdir(), error));
      }

      try {
        const checkedOut = await checkout(options.uri, options.ref ?? null, workDir);
        if (checkedOut.isErr()) {
          return err(checkedOut.error);
        }
        log.debug({ workDir }, 'Remote project checked out');
        return await operation(workDir);
      } finally {
        await fs.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
          log.warn({ workDir, error }, 'Failed to remove temporary checkout');
        });
      }
    },
  };
};
