import { err, ok, type Result } from 'neverthrow';

import { requireDataset } from '../lookup.js';

import type { DatasetError } from '../errors.js';
import type { DatasetStore } from '../ports.js';
import type { Logger } from 'pino';

export interface RemoveTagsDeps {
  store: DatasetStore;
  logger: Logger;
}

export interface RemoveTagsInput {
  name: string;
  tags: readonly string[];
}

export interface RemoveTagsResult {
  removed: string[];
  /** Requested names the dataset has no tag for */
  unknown: string[];
}

/**
 * Deletes tag records. Unknown names are reported, not treated as errors.
 */
export const removeTags = async (
  deps: RemoveTagsDeps,
  input: RemoveTagsInput
): Promise<Result<RemoveTagsResult, DatasetError>> => {
  const datasetResult = await requireDataset(deps.store, input.name);
  if (datasetResult.isErr()) {
    return err(datasetResult.error);
  }

  const dataset = datasetResult.value;
  const tagsResult = await deps.store.loadTags(dataset);
  if (tagsResult.isErr()) {
    return err(tagsResult.error);
  }

  const existing = new Set(tagsResult.value.map((tag) => tag.name));
  const requested = [...new Set(input.tags)];
  const removed = requested.filter((name) => existing.has(name));
  const unknown = requested.filter((name) => !existing.has(name));

  if (removed.length > 0) {
    const doomed = new Set(removed);
    const saved = await deps.store.saveTags(
      dataset,
      tagsResult.value.filter((tag) => !doomed.has(tag.name))
    );
    if (saved.isErr()) {
      return err(saved.error);
    }
    deps.logger.info({ dataset: dataset.name, removed }, 'Tags removed');
  }

  return ok({ removed, unknown });
};
