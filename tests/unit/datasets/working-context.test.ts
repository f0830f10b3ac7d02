import { mkdtemp, readdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { err, ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { createGitError } from '@/modules/datasets/core/errors.js';
import {
  createLocalContext,
  createRemoteContext,
  gitCheckout,
  type Checkout,
} from '@/modules/datasets/shell/context/working-context.js';

import { makeSilentLogger } from '../../fixtures/fakes.js';

import type { GitRunner } from '@/modules/datasets/shell/git/git-cli.js';

const REMOTE = 'https://github.com/lab/survey.git';

describe('local context', () => {
  it('runs operations in the resolved project directory', async () => {
    const result = await createLocalContext('/project/./sub/..').withWorkingContext(async (dir) => ok(dir));

    expect(result._unsafeUnwrap()).toBe('/project');
  });
});

describe('remote context', () => {
  it('checks out into a temporary directory and removes it afterwards', async () => {
    const parent = await mkdtemp(path.join(tmpdir(), 'remote-context-'));
    const checkouts: [string, string | null][] = [];
    const checkout: Checkout = async (uri, ref, targetDir) => {
      checkouts.push([uri, ref]);
      await writeFile(path.join(targetDir, 'README.md'), 'survey\n');
      return ok(undefined);
    };
    const context = createRemoteContext({
      uri: REMOTE,
      ref: 'main',
      checkout,
      tmpDir: parent,
      logger: makeSilentLogger(),
    });

    const result = await context.withWorkingContext(async (dir) => ok(await readdir(dir)));

    expect(result._unsafeUnwrap()).toEqual(['README.md']);
    expect(checkouts).toEqual([[REMOTE, 'main']]);
    expect(await readdir(parent)).toEqual([]);
  });

  it('skips the operation when the checkout fails', async () => {
    const parent = await mkdtemp(path.join(tmpdir(), 'remote-context-'));
    let ran = false;
    const context = createRemoteContext({
      uri: REMOTE,
      checkout: async () => err(createGitError(REMOTE, 'clone failed', 'fatal: repository not found')),
      tmpDir: parent,
      logger: makeSilentLogger(),
    });

    const result = await context.withWorkingContext(async () => {
      ran = true;
      return ok(undefined);
    });

    expect(result._unsafeUnwrapErr().type).toBe('GitError');
    expect(ran).toBe(false);
    expect(await readdir(parent)).toEqual([]);
  });
});

describe('gitCheckout', () => {
  it('clones one branch shallowly', async () => {
    const calls: string[][] = [];
    const run: GitRunner = async (args) => {
      calls.push([...args]);
      return ok({ stdout: '', stderr: '' });
    };

    const result = await gitCheckout(run)(REMOTE, 'v2', '/tmp/work');

    expect(result.isOk()).toBe(true);
    expect(calls).toEqual([['clone', '--depth', '1', '--quiet', '--branch', 'v2', '--', REMOTE, '/tmp/work']]);
  });

  it('maps clone failures', async () => {
    const run: GitRunner = async () =>
      err({ exitCode: 128, stderr: "fatal: Remote branch v9 not found", message: 'Command failed' });

    const result = await gitCheckout(run)(REMOTE, 'v9', '/tmp/work');

    expect(result._unsafeUnwrapErr().message).toBe(`clone failed (${REMOTE}): fatal: Remote branch v9 not found`);
  });
});
