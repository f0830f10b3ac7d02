import { err, ok, type Result } from 'neverthrow';

import { requireDataset } from '../lookup.js';
import { toTagView, type TagView } from '../views.js';

import type { DatasetError } from '../errors.js';
import type { DatasetStore } from '../ports.js';
import type { Tag } from '../types.js';

export interface ListTagsDeps {
  store: DatasetStore;
}

export const byCreation = (a: Tag, b: Tag): number => {
  if (a.created !== b.created) {
    return a.created < b.created ? -1 : 1;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
};

/**
 * Tags of a dataset, oldest first.
 */
export const listTags = async (
  deps: ListTagsDeps,
  input: { name: string }
): Promise<Result<TagView[], DatasetError>> => {
  const datasetResult = await requireDataset(deps.store, input.name);
  if (datasetResult.isErr()) {
    return err(datasetResult.error);
  }

  const tags = await deps.store.loadTags(datasetResult.value);
  if (tags.isErr()) {
    return err(tags.error);
  }

  return ok([...tags.value].sort(byCreation).map((tag) => toTagView(input.name, tag)));
};
