/**
 * Add Files Use Case
 *
 * Resolves each source, imports the resulting entries and persists the new
 * records. Transfers that completed before a failure or cancellation are
 * still recorded so the dataset matches what is on disk.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createDatasetNotFoundError,
  createInvalidInputError,
  type DatasetError,
} from '../errors.js';
import { importFiles, type FileImporterDeps } from '../file-importer.js';
import { saveDataset } from '../invariants.js';
import { mergeFiles } from '../paths.js';
import { resolveSources } from '../source-resolver.js';
import { toDatasetView, type DatasetView } from '../views.js';
import { buildDataset } from './create-dataset.js';

import type { DatasetStore, ProviderClient } from '../ports.js';
import type { Dataset, ResolvedSource } from '../types.js';

export interface AddFilesDeps extends FileImporterDeps {
  store: DatasetStore;
  providers: readonly ProviderClient[];
  gitHosts: readonly string[];
  createId: () => string;
}

export interface AddFilesInput {
  name: string;
  urls: readonly string[];
  /** Sub-path patterns applied to every URL */
  sources?: readonly string[] | undefined;
  destination?: string | undefined;
  ref?: string | null | undefined;
  external?: boolean | undefined;
  overwrite?: boolean | undefined;
  /** Create the dataset when it does not exist yet */
  create?: boolean | undefined;
  signal?: AbortSignal | undefined;
}

export interface AddFilesResult {
  dataset: DatasetView;
  /** Dataset-relative paths of the new or replaced records */
  added: string[];
  skipped: string[];
}

const loadOrCreate = async (
  deps: AddFilesDeps,
  input: AddFilesInput
): Promise<Result<Dataset, DatasetError>> => {
  const found = await deps.store.findByName(input.name);
  if (found.isErr()) {
    return err(found.error);
  }
  if (found.value !== null) {
    return ok(found.value);
  }
  if (input.create !== true) {
    return err(createDatasetNotFoundError(input.name));
  }

  const built = buildDataset(deps, { name: input.name });
  if (built.isErr()) {
    return err(built.error);
  }
  return saveDataset(deps.store, deps.layout.dataDir, built.value.dataset);
};

export const addFiles = async (
  deps: AddFilesDeps,
  input: AddFilesInput
): Promise<Result<AddFilesResult, DatasetError>> => {
  const log = deps.logger.child({ usecase: 'addFiles', dataset: input.name });

  if (input.urls.length === 0) {
    return err(createInvalidInputError('urls', 'At least one source is required'));
  }

  const datasetResult = await loadOrCreate(deps, input);
  if (datasetResult.isErr()) {
    return err(datasetResult.error);
  }
  const dataset = datasetResult.value;

  // Resolve everything first so a bad URI fails before any transfer
  const sources: ResolvedSource[] = [];
  for (const uri of input.urls) {
    const resolved = await resolveSources(
      {
        repository: deps.repository,
        fileSystem: deps.fileSystem,
        rootDir: deps.layout.rootDir,
        gitHosts: deps.gitHosts,
        providers: deps.providers,
      },
      { uri, sources: input.sources, ref: input.ref }
    );
    if (resolved.isErr()) {
      return err(resolved.error);
    }
    sources.push(...resolved.value);
  }

  const report = await importFiles(deps, {
    dataset,
    sources,
    destination: input.destination,
    overwrite: input.overwrite,
    external: input.external,
    signal: input.signal,
  });
  if (report.isErr()) {
    return err(report.error);
  }

  const { files, skipped, failure } = report.value;
  let current = dataset;

  if (files.length > 0) {
    const saved = await saveDataset(deps.store, deps.layout.dataDir, {
      ...dataset,
      files: mergeFiles(dataset, files),
    });
    if (saved.isErr()) {
      return err(saved.error);
    }
    current = saved.value;
  }

  if (failure !== null) {
    log.warn({ recorded: files.length, error: failure }, 'Adding files stopped early');
    return err(failure);
  }

  log.info({ added: files.length, skipped: skipped.length }, 'Files added');

  return ok({
    dataset: toDatasetView(current),
    added: files.map((file) => file.path),
    skipped,
  });
};
