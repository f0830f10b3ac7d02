/**
 * Bounded-concurrency transfer runner shared by import and update.
 */

import { mapWithConcurrency } from '../../../common/utils/concurrency.js';

import { createOperationCancelledError, type DatasetError } from './errors.js';

import type { ContentStream } from './types.js';
import type { FileSystemPort, ProgressSinkFactory, WrittenFile } from './ports.js';
import type { Result } from 'neverthrow';

export interface TransferOptions {
  concurrency: number;
  signal?: AbortSignal | undefined;
}

export interface TransferBatch<R> {
  /** Results of the transfers that completed, in input order */
  completed: R[];
  /** First failure, or the cancellation; later transfers were not started */
  failure: DatasetError | null;
}

/**
 * Runs transfers with at most `concurrency` in flight. Cancellation and the
 * first failure are checked before each transfer starts; transfers already in
 * flight are allowed to finish.
 */
export const runTransfers = async <T, R>(
  items: readonly T[],
  options: TransferOptions,
  transfer: (item: T) => Promise<Result<R, DatasetError>>
): Promise<TransferBatch<R>> => {
  let failure: DatasetError | null = null;

  const results = await mapWithConcurrency(items, options.concurrency, async (item) => {
    if (failure !== null) {
      return null;
    }
    if (options.signal?.aborted === true) {
      failure = createOperationCancelledError('Operation cancelled between file transfers');
      return null;
    }

    const result = await transfer(item);
    if (result.isErr()) {
      failure ??= result.error;
      return null;
    }
    return result;
  });

  const completed: R[] = [];
  for (const result of results) {
    if (result !== null && result.isOk()) {
      completed.push(result.value);
    }
  }

  return { completed, failure };
};

/**
 * Writes a stream to `target`, reporting bytes to a fresh progress sink.
 */
export const writeWithProgress = async (
  fileSystem: FileSystemPort,
  progress: ProgressSinkFactory,
  target: string,
  label: string,
  size: number | null,
  content: ContentStream
): Promise<Result<WrittenFile, DatasetError>> => {
  const sink = progress();
  sink.onStart(label, size);
  try {
    return await fileSystem.write(target, content, (bytes) => {
      sink.onProgress(bytes);
    });
  } finally {
    sink.onFinish();
  }
};
