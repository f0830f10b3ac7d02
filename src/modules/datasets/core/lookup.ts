import { err, ok, type Result } from 'neverthrow';

import { createDatasetNotFoundError, type DatasetError } from './errors.js';

import type { DatasetStore } from './ports.js';
import type { Dataset } from './types.js';

export const requireDataset = async (
  store: DatasetStore,
  name: string
): Promise<Result<Dataset, DatasetError>> => {
  const found = await store.findByName(name);
  if (found.isErr()) {
    return err(found.error);
  }
  if (found.value === null) {
    return err(createDatasetNotFoundError(name));
  }
  return ok(found.value);
};

/**
 * Loads the named datasets, or all of them when `names` is empty.
 * The first unknown name fails the whole lookup.
 */
export const requireDatasets = async (
  store: DatasetStore,
  names: readonly string[]
): Promise<Result<Dataset[], DatasetError>> => {
  if (names.length === 0) {
    return store.list();
  }

  const datasets: Dataset[] = [];
  for (const name of new Set(names)) {
    const dataset = await requireDataset(store, name);
    if (dataset.isErr()) {
      return err(dataset.error);
    }
    datasets.push(dataset.value);
  }
  return ok(datasets);
};
