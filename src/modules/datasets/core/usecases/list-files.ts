import { err, ok, type Result } from 'neverthrow';

import { matchesFileFilter, type FileFilter } from '../filters.js';
import { requireDatasets } from '../lookup.js';
import { toDatasetFileView, type DatasetFileView } from '../views.js';

import type { DatasetError } from '../errors.js';
import type { DatasetStore } from '../ports.js';

export interface ListFilesDeps {
  store: DatasetStore;
}

export interface ListFilesInput extends FileFilter {
  /** Empty lists files of every dataset */
  names?: readonly string[] | undefined;
}

export const listFiles = async (
  deps: ListFilesDeps,
  input: ListFilesInput = {}
): Promise<Result<DatasetFileView[], DatasetError>> => {
  const datasets = await requireDatasets(deps.store, input.names ?? []);
  if (datasets.isErr()) {
    return err(datasets.error);
  }

  return ok(
    datasets.value.flatMap((dataset) =>
      dataset.files
        .filter((file) => matchesFileFilter(file, input))
        .map((file) => toDatasetFileView(dataset.name, file))
    )
  );
};
