/**
 * Import Dataset Use Case
 *
 * Materializes a dataset held by a provider (or by another project) as a new
 * local dataset. Catalog imports are tagged with the remote version.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createDatasetExistsError,
  createInvalidInputError,
  createOperationCancelledError,
  type DatasetError,
} from '../errors.js';
import { saveDataset } from '../invariants.js';
import { isValidDatasetName, slugify, toTagName } from '../naming.js';
import { materializeProviderFiles, type ProviderFilesDeps } from '../provider-files.js';
import { resolveProviderReference } from '../source-resolver.js';
import { toDatasetView, type DatasetView } from '../views.js';
import { addTag } from './tag-dataset.js';

import type {
  DatasetStore,
  DoiResolver,
  Interaction,
  ProviderClient,
  ProviderFileHandle,
  RepositoryPort,
} from '../ports.js';
import type { Dataset } from '../types.js';
import type { Logger } from 'pino';

export interface ImportDatasetDeps extends ProviderFilesDeps {
  store: DatasetStore;
  repository: RepositoryPort;
  providers: readonly ProviderClient[];
  doiResolver: DoiResolver;
  gitHosts: readonly string[];
  interaction: Interaction;
  createId: () => string;
  logger: Logger;
}

export interface ImportDatasetInput {
  /** DOI, provider URL or another project's dataset URL */
  uri: string;
  /** Local name; defaults to the slugified remote title */
  name?: string | undefined;
  /** Unpack .zip and .gz payloads */
  extract?: boolean | undefined;
  /** Skip the download confirmation */
  yes?: boolean | undefined;
  signal?: AbortSignal | undefined;
}

export interface ImportDatasetResult {
  dataset: DatasetView;
  /** Version tag created for catalog imports */
  tag: string | null;
}

const describeSize = (handles: readonly ProviderFileHandle[]): string => {
  const sizes = handles.map((handle) => handle.size);
  if (sizes.some((size) => size === null)) {
    return 'unknown size';
  }
  const total = sizes.reduce<number>((sum, size) => sum + (size ?? 0), 0);
  return `${String(total)} bytes`;
};

export const importDataset = async (
  deps: ImportDatasetDeps,
  input: ImportDatasetInput
): Promise<Result<ImportDatasetResult, DatasetError>> => {
  const log = deps.logger.child({ usecase: 'importDataset', uri: input.uri });

  const match = await resolveProviderReference(deps, input.uri);
  if (match.isErr()) {
    return err(match.error);
  }
  const { client, ref } = match.value;

  const recordResult = await client.fetchMetadata(ref);
  if (recordResult.isErr()) {
    return err(recordResult.error);
  }
  const record = recordResult.value;

  const name = input.name ?? (slugify(record.title) || slugify(record.ref.id));
  if (!isValidDatasetName(name)) {
    return err(
      createInvalidInputError('name', `Cannot derive a valid dataset name from '${record.title}'; pass a name`)
    );
  }

  const existing = await deps.store.findByName(name);
  if (existing.isErr()) {
    return err(existing.error);
  }
  if (existing.value !== null) {
    return err(createDatasetExistsError(name));
  }

  const handles = await client.fetchFiles(record.ref);
  if (handles.isErr()) {
    return err(handles.error);
  }

  if (input.yes !== true) {
    const confirmed = await deps.interaction.confirm(
      `Import ${String(handles.value.length)} files (${describeSize(handles.value)}) from ${client.name} into '${name}'?`
    );
    if (!confirmed) {
      return err(createOperationCancelledError(`Import of ${input.uri} was declined`));
    }
  }

  const extract = input.extract ?? false;
  const dataset: Dataset = {
    id: deps.createId(),
    name,
    title: record.title,
    description: record.description,
    creators: record.creators,
    keywords: record.keywords,
    license: record.license,
    language: record.language,
    dateCreated: deps.clock().toISOString(),
    datePublished: record.datePublished,
    version: record.version,
    importedFrom: {
      provider: client.name,
      uri: record.ref.uri,
      recordId: record.ref.id,
      version: record.version,
      extract,
    },
    files: [],
  };

  const materialized = await materializeProviderFiles(deps, {
    dataset,
    record,
    handles: handles.value,
    extract,
    signal: input.signal,
  });
  if (materialized.isErr()) {
    return err(materialized.error);
  }

  const saved = await saveDataset(deps.store, deps.layout.dataDir, {
    ...dataset,
    files: materialized.value.files,
  });
  if (saved.isErr()) {
    return err(saved.error);
  }

  if (materialized.value.failure !== null) {
    log.warn(
      { dataset: name, recorded: materialized.value.files.length, error: materialized.value.failure },
      'Import stopped before all files were downloaded'
    );
    return err(materialized.value.failure);
  }

  let tag: string | null = null;
  const tagName = client.versioned ? toTagName(record.version ?? record.ref.id) : null;
  if (tagName !== null) {
    const tagged = await addTag(deps, saved.value, {
      tag: tagName,
      description: `Version ${record.version ?? record.ref.id} imported from ${client.name}`,
    });
    if (tagged.isErr()) {
      return err(tagged.error);
    }
    tag = tagged.value.name;
  }

  log.info({ dataset: name, files: saved.value.files.length, tag }, 'Dataset imported');

  return ok({ dataset: toDatasetView(saved.value), tag });
};
