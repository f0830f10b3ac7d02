/**
 * Export Dataset Use Case
 *
 * Sends the working state (HEAD) or a tagged snapshot of a dataset to a
 * provider as a draft, then records the exported snapshot id as the
 * dataset's version.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidAccessTokenError,
  createInvalidInputError,
  createTagNotFoundError,
  createUnsupportedOperationError,
  type DatasetError,
} from '../errors.js';
import { saveDataset } from '../invariants.js';
import { requireDataset } from '../lookup.js';
import { absolutePath } from '../paths.js';
import { byCreation } from './list-tags.js';

import type {
  DatasetStore,
  DraftReceipt,
  ExportFile,
  FileSystemPort,
  Interaction,
  ProjectLayout,
  ProviderClient,
  RepositoryPort,
  TokenProvider,
} from '../ports.js';
import type { Dataset, DatasetFile, ProviderName, Tag } from '../types.js';
import type { Logger } from 'pino';

export interface ExportDatasetDeps {
  store: DatasetStore;
  repository: RepositoryPort;
  fileSystem: FileSystemPort;
  providers: readonly ProviderClient[];
  tokens: TokenProvider;
  interaction: Interaction;
  layout: ProjectLayout;
  logger: Logger;
}

export interface ExportDatasetInput {
  name: string;
  provider: ProviderName;
  /** Tag to export; when absent and tags exist the caller is asked to pick */
  tag?: string | undefined;
  publish?: boolean | undefined;
  dataverseServer?: string | undefined;
  dataverseName?: string | undefined;
}

export interface ExportDatasetResult {
  receipt: DraftReceipt;
  /** Tag name, or the project commit for the working state */
  version: string;
}

const selectTag = async (
  deps: ExportDatasetDeps,
  dataset: Dataset,
  tagName: string | undefined
): Promise<Result<Tag | null, DatasetError>> => {
  const tags = await deps.store.loadTags(dataset);
  if (tags.isErr()) {
    return err(tags.error);
  }

  if (tagName !== undefined) {
    const tag = tags.value.find((candidate) => candidate.name === tagName);
    return tag === undefined ? err(createTagNotFoundError(dataset.name, tagName)) : ok(tag);
  }

  if (tags.value.length === 0) {
    return ok(null);
  }

  return ok(await deps.interaction.selectTag([...tags.value].sort(byCreation)));
};

/**
 * Tagged content comes from disk while the file is unchanged since the tag,
 * otherwise from project history at the tag's commit.
 */
const exportFileFor = (
  deps: ExportDatasetDeps,
  dataset: Dataset,
  file: DatasetFile,
  tag: Tag | null
): ExportFile => {
  const live = dataset.files.find((candidate) => candidate.path === file.path);
  const fromDisk = tag === null || (live !== undefined && live.checksum === file.checksum);

  return {
    path: file.path,
    size: null,
    open: () =>
      fromDisk || tag === null
        ? deps.fileSystem.read(absolutePath(deps.layout, file.fullPath))
        : deps.repository.readBlob(deps.layout.rootDir, tag.commit, file.fullPath),
  };
};

export const exportDataset = async (
  deps: ExportDatasetDeps,
  input: ExportDatasetInput
): Promise<Result<ExportDatasetResult, DatasetError>> => {
  const log = deps.logger.child({ usecase: 'exportDataset', dataset: input.name });

  const datasetResult = await requireDataset(deps.store, input.name);
  if (datasetResult.isErr()) {
    return err(datasetResult.error);
  }
  const dataset = datasetResult.value;

  const client = deps.providers.find((provider) => provider.name === input.provider);
  if (client === undefined) {
    return err(createInvalidInputError('provider', `Unknown provider '${input.provider}'`));
  }
  if (!client.exportable) {
    return err(createUnsupportedOperationError(client.name, 'export'));
  }

  const tagResult = await selectTag(deps, dataset, input.tag);
  if (tagResult.isErr()) {
    return err(tagResult.error);
  }
  const tag = tagResult.value;

  const token = await deps.tokens.getToken(client.name, client.accessTokenUrl());
  if (token === null || token === '') {
    return err(createInvalidAccessTokenError(client.name, client.accessTokenUrl()));
  }

  let version: string;
  if (tag !== null) {
    version = tag.name;
  } else {
    const commit = await deps.repository.currentCommit();
    if (commit.isErr()) {
      return err(commit.error);
    }
    version = commit.value;
  }

  const files = (tag?.snapshot.files ?? dataset.files).map((file) =>
    exportFileFor(deps, dataset, file, tag)
  );

  const receipt = await client.createDraft(
    {
      title: dataset.title,
      description: dataset.description,
      creators: dataset.creators,
      keywords: dataset.keywords,
      license: dataset.license,
      language: dataset.language,
      version,
      files,
      publish: input.publish ?? false,
      dataverseServer: input.dataverseServer,
      dataverseName: input.dataverseName,
    },
    token
  );
  if (receipt.isErr()) {
    return err(receipt.error);
  }

  const saved = await saveDataset(deps.store, deps.layout.dataDir, { ...dataset, version });
  if (saved.isErr()) {
    return err(saved.error);
  }

  log.info({ provider: client.name, version, draft: receipt.value.id }, 'Dataset exported');

  return ok({ receipt: receipt.value, version });
};
