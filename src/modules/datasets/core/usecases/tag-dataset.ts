/**
 * Tag Dataset Use Case
 *
 * A tag binds a name to the project's current commit and freezes the
 * dataset's file records, so later updates do not change what it denotes.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createDuplicateTagError,
  createInvalidInputError,
  type DatasetError,
} from '../errors.js';
import { requireDataset } from '../lookup.js';
import { isValidTagName } from '../naming.js';

import type { Clock, DatasetStore, RepositoryPort } from '../ports.js';
import type { Dataset, Tag } from '../types.js';
import type { Logger } from 'pino';

export interface TagDatasetDeps {
  store: DatasetStore;
  repository: RepositoryPort;
  clock: Clock;
  logger: Logger;
}

export interface TagDatasetInput {
  name: string;
  tag: string;
  description?: string | undefined;
  /** Rebind an existing tag instead of failing */
  force?: boolean | undefined;
}

/**
 * Adds a tag to an already loaded dataset.
 */
export const addTag = async (
  deps: TagDatasetDeps,
  dataset: Dataset,
  input: Omit<TagDatasetInput, 'name'>
): Promise<Result<Tag, DatasetError>> => {
  if (!isValidTagName(input.tag)) {
    return err(
      createInvalidInputError(
        'tag',
        `Tag '${input.tag}' is not valid. Use letters, digits, '.', '_', '+' and '-'`
      )
    );
  }

  const tagsResult = await deps.store.loadTags(dataset);
  if (tagsResult.isErr()) {
    return err(tagsResult.error);
  }

  const tags = tagsResult.value;
  if (input.force !== true && tags.some((tag) => tag.name === input.tag)) {
    return err(createDuplicateTagError(dataset.name, input.tag));
  }

  const commit = await deps.repository.currentCommit();
  if (commit.isErr()) {
    return err(commit.error);
  }

  const tag: Tag = {
    name: input.tag,
    description: input.description ?? '',
    created: deps.clock().toISOString(),
    commit: commit.value,
    snapshot: {
      version: dataset.version,
      files: dataset.files.map((file) => ({
        ...file,
        creators: file.creators.map((creator) => ({ ...creator })),
      })),
    },
  };

  const saved = await deps.store.saveTags(dataset, [
    ...tags.filter((existing) => existing.name !== input.tag),
    tag,
  ]);
  if (saved.isErr()) {
    return err(saved.error);
  }

  deps.logger.info({ dataset: dataset.name, tag: tag.name, commit: tag.commit }, 'Dataset tagged');

  return ok(tag);
};

export const tagDataset = async (
  deps: TagDatasetDeps,
  input: TagDatasetInput
): Promise<Result<Tag, DatasetError>> => {
  const dataset = await requireDataset(deps.store, input.name);
  if (dataset.isErr()) {
    return err(dataset.error);
  }

  return addTag(deps, dataset.value, input);
};
