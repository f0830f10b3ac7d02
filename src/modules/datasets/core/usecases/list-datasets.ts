// eslint-disable-next-line @typescript-eslint/naming-convention -- Fuse.js library exports PascalCase
import Fuse, { type IFuseOptions } from 'fuse.js';
import { err, ok, type Result } from 'neverthrow';

import { toDatasetView, type DatasetView } from '../views.js';

import type { DatasetError } from '../errors.js';
import type { DatasetHistory, DatasetStore } from '../ports.js';

export interface ListDatasetsDeps {
  store: DatasetStore;
  history: DatasetHistory;
}

export interface ListDatasetsInput {
  /** Fuzzy search over name, title, description and keywords */
  search?: string | undefined;
  /** Project branch, tag or commit to list from instead of the working tree */
  revision?: string | undefined;
}

/**
 * Threshold of 0.3 keeps near matches without pulling in unrelated titles.
 */
const FUSE_OPTIONS: IFuseOptions<DatasetView> = {
  keys: [
    { name: 'name', weight: 1.0 },
    { name: 'title', weight: 1.0 },
    { name: 'description', weight: 0.6 },
    { name: 'keywords', weight: 0.6 },
  ],
  threshold: 0.3,
  ignoreLocation: true,
  includeScore: false,
};

/**
 * Lists every dataset of the project, sorted by name. With `revision` the
 * datasets are read as committed there.
 */
export const listDatasets = async (
  deps: ListDatasetsDeps,
  input: ListDatasetsInput = {}
): Promise<Result<DatasetView[], DatasetError>> => {
  const revision = input.revision?.trim() ?? '';
  const datasetsResult =
    revision === '' ? await deps.store.list() : await deps.history.listAt(revision);
  if (datasetsResult.isErr()) {
    return err(datasetsResult.error);
  }

  const views = datasetsResult.value
    .map(toDatasetView)
    .sort((a, b) => a.name.localeCompare(b.name));

  const search = input.search?.trim() ?? '';
  if (search === '') {
    return ok(views);
  }

  const fuse = new Fuse(views, FUSE_OPTIONS);
  const matched = new Set(fuse.search(search).map((result) => result.item.name));
  return ok(views.filter((view) => matched.has(view.name)));
};
