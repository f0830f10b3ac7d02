import { err, ok, type Result } from 'neverthrow';

import { requireDataset } from '../lookup.js';
import { toDatasetView, type DatasetView } from '../views.js';

import type { DatasetError } from '../errors.js';
import type { DatasetStore } from '../ports.js';
import type { Logger } from 'pino';

export interface RemoveDatasetDeps {
  store: DatasetStore;
  logger: Logger;
}

/**
 * Removes a dataset's metadata and tags. Data files stay on disk; removing
 * them is left to the project's version control.
 */
export const removeDataset = async (
  deps: RemoveDatasetDeps,
  input: { name: string }
): Promise<Result<DatasetView, DatasetError>> => {
  const datasetResult = await requireDataset(deps.store, input.name);
  if (datasetResult.isErr()) {
    return err(datasetResult.error);
  }

  const removed = await deps.store.remove(datasetResult.value);
  if (removed.isErr()) {
    return err(removed.error);
  }

  deps.logger.info({ dataset: input.name }, 'Dataset removed');

  return ok(toDatasetView(datasetResult.value));
};
