/**
 * git command execution through argv arrays; nothing goes through a shell.
 */

import { execFile, spawn } from 'node:child_process';

import { err, ok, type Result } from 'neverthrow';

import {
  createGitError,
  createNetworkError,
  type GitError,
  type NetworkError,
} from '../../core/errors.js';

import type { ContentStream } from '../../core/types.js';

export interface GitRunOptions {
  cwd?: string | undefined;
  /** Default: 5 minutes */
  timeoutMs?: number | undefined;
}

export interface GitOutput {
  stdout: string;
  stderr: string;
}

export type GitRunner = (
  args: readonly string[],
  options?: GitRunOptions
) => Promise<Result<GitOutput, GitCommandFailure>>;

export interface GitCommandFailure {
  exitCode: number | null;
  stderr: string;
  message: string;
}

const GIT_ENV = {
  ...process.env,
  GIT_TERMINAL_PROMPT: '0',
  LC_ALL: 'C',
};

const NETWORK_FAILURE_RE =
  /could not resolve host|connection (?:timed out|refused|reset)|operation timed out|early eof|rpc failed|unable to access|network is unreachable/i;

export const runGit: GitRunner = (args, options = {}) =>
  new Promise((resolve) => {
    execFile(
      'git',
      [...args],
      {
        cwd: options.cwd,
        env: GIT_ENV,
        timeout: options.timeoutMs ?? 5 * 60 * 1000,
        maxBuffer: 256 * 1024 * 1024,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        if (error !== null) {
          resolve(
            err({
              exitCode: typeof error.code === 'number' ? error.code : null,
              stderr,
              message: error.message,
            })
          );
          return;
        }
        resolve(ok({ stdout, stderr }));
      }
    );
  });

/**
 * Maps a failed command to a retryable NetworkError when stderr looks like a
 * transport problem, otherwise to a GitError.
 */
export const toGitFailure = (
  uri: string,
  action: string,
  failure: GitCommandFailure
): GitError | NetworkError =>
  NETWORK_FAILURE_RE.test(failure.stderr)
    ? createNetworkError(uri, `${action} failed`, { retryable: true, cause: failure.stderr.trim() })
    : createGitError(uri, `${action} failed`, failure.stderr || failure.message);

/**
 * Streams stdout of a git command. A non-zero exit surfaces as an error
 * thrown from the iterator once output ends.
 */
export async function* streamGit(
  args: readonly string[],
  options: GitRunOptions = {}
): ContentStream {
  const child = spawn('git', [...args], {
    cwd: options.cwd,
    env: GIT_ENV,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  const stderr: Buffer[] = [];
  child.stderr.on('data', (chunk: Buffer) => {
    stderr.push(chunk);
  });

  const spawnFailure: { error: Error | null } = { error: null };
  const exitCode = new Promise<number | null>((resolve) => {
    child.once('error', (error) => {
      spawnFailure.error = error;
      resolve(null);
    });
    child.once('close', (code) => {
      resolve(code);
    });
  });

  for await (const chunk of child.stdout) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    }
  }

  const code = await exitCode;
  if (spawnFailure.error !== null || code !== 0) {
    const detail = Buffer.concat(stderr).toString('utf8').trim();
    throw new Error(
      `git ${args.join(' ')} exited with ${String(code)}${detail !== '' ? `: ${detail}` : ''}`,
      { cause: spawnFailure.error ?? undefined }
    );
  }
}
