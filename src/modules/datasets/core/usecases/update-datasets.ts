/**
 * Update Datasets Use Case
 *
 * Reconciles datasets against their sources. Each dataset goes down one of
 * three independent paths:
 * - external files, only when `external` is set
 * - provider-origin datasets, refreshed as a whole
 * - git-sourced files, grouped by (source URL, requested ref)
 *
 * Failures are collected per dataset; the batch keeps going. Within a dataset
 * the first failure stops reconciliation, and whatever was already written to
 * disk is recorded before the outcome is reported.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createIncompatibleFilterError,
  createLocalModificationError,
  createOperationCancelledError,
  createUnsupportedOperationError,
  type DatasetError,
} from '../errors.js';
import { checkExternalFiles } from '../external-links.js';
import { hasPathFilters, matchesFileFilter, type FileFilter } from '../filters.js';
import { saveDataset } from '../invariants.js';
import { requireDatasets } from '../lookup.js';
import { toTagName } from '../naming.js';
import { absolutePath, mergeFiles } from '../paths.js';
import { materializeProviderFiles } from '../provider-files.js';
import { runTransfers, writeWithProgress } from '../transfers.js';
import { addTag } from './tag-dataset.js';

import type { FileImporterDeps } from '../file-importer.js';
import type { ArchiveExtractor, DatasetStore, ProviderClient } from '../ports.js';
import type { Dataset, DatasetFile, ProviderOrigin, TreeEntry } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface UpdateDatasetsDeps extends FileImporterDeps {
  store: DatasetStore;
  providers: readonly ProviderClient[];
  extractor: ArchiveExtractor;
}

export interface UpdateDatasetsInput {
  /** Empty updates every dataset */
  names?: readonly string[] | undefined;
  creators?: readonly string[] | undefined;
  include?: readonly string[] | undefined;
  exclude?: readonly string[] | undefined;
  /** Ref to update git files to; defaults to each file's requested ref */
  ref?: string | null | undefined;
  /** Remove records whose source is gone */
  delete?: boolean | undefined;
  /** Check external files instead of git and provider sources */
  external?: boolean | undefined;
  /** Allow provider refreshes to overwrite local modifications */
  discardLocalChanges?: boolean | undefined;
  signal?: AbortSignal | undefined;
}

export interface DatasetUpdateOutcome {
  dataset: string;
  /** Paths re-imported or re-linked */
  updated: string[];
  /** Paths removed from the dataset */
  deleted: string[];
  /** Paths whose source is gone but were kept */
  missing: string[];
  /** Version tag created by a provider refresh */
  tag: string | null;
  error: DatasetError | null;
}

export interface UpdateReport {
  outcomes: DatasetUpdateOutcome[];
}

type RefreshedMetadata = Omit<Dataset, 'id' | 'name' | 'dateCreated' | 'files'>;

interface Reconciliation {
  replacements: DatasetFile[];
  /** Unchanged files whose recorded ref and commit move to an override ref */
  retargeted: DatasetFile[];
  removed: string[];
  missing: string[];
  metadata: RefreshedMetadata | null;
  /** Remote version to tag once the refresh is saved */
  tagVersion: string | null;
  error: DatasetError | null;
}

const emptyReconciliation = (): Reconciliation => ({
  replacements: [],
  retargeted: [],
  removed: [],
  missing: [],
  metadata: null,
  tagVersion: null,
  error: null,
});

const failed = (error: DatasetError): Reconciliation => ({ ...emptyReconciliation(), error });

// ─────────────────────────────────────────────────────────────────────────────
// External files
// ─────────────────────────────────────────────────────────────────────────────

const reconcileExternal = async (
  deps: UpdateDatasetsDeps,
  dataset: Dataset,
  input: UpdateDatasetsInput,
  filter: FileFilter
): Promise<Reconciliation> => {
  const files = dataset.files.filter((file) => file.external && matchesFileFilter(file, filter));
  const report = await checkExternalFiles(deps, {
    dataset,
    files,
    delete: input.delete ?? false,
  });
  if (report.isErr()) {
    return failed(report.error);
  }

  return {
    ...emptyReconciliation(),
    replacements: report.value.updated,
    removed: report.value.removed,
    missing: report.value.missing,
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Provider datasets
// ─────────────────────────────────────────────────────────────────────────────

const findLocalModifications = async (
  deps: UpdateDatasetsDeps,
  dataset: Dataset
): Promise<Result<string[], DatasetError>> => {
  const modified: string[] = [];

  for (const file of dataset.files) {
    if (file.external) {
      continue;
    }
    const checksum = await deps.fileSystem.checksum(absolutePath(deps.layout, file.fullPath));
    if (checksum.isErr()) {
      return err(checksum.error);
    }
    if (checksum.value !== file.checksum) {
      modified.push(file.path);
    }
  }

  return ok(modified);
};

const reconcileProvider = async (
  deps: UpdateDatasetsDeps,
  dataset: Dataset,
  origin: ProviderOrigin,
  input: UpdateDatasetsInput,
  filter: FileFilter
): Promise<Reconciliation> => {
  if (hasPathFilters(filter)) {
    return failed(createIncompatibleFilterError(dataset.name));
  }

  const client = deps.providers.find((provider) => provider.name === origin.provider);
  if (client === undefined) {
    return failed(createUnsupportedOperationError(origin.provider, 'updates'));
  }

  const modified = await findLocalModifications(deps, dataset);
  if (modified.isErr()) {
    return failed(modified.error);
  }
  if (modified.value.length > 0 && input.discardLocalChanges !== true) {
    return failed(createLocalModificationError(dataset.name, modified.value));
  }

  const record = await client.fetchMetadata(
    { provider: origin.provider, uri: origin.uri, id: origin.recordId },
    { latest: true }
  );
  if (record.isErr()) {
    return failed(record.error);
  }

  const latest = record.value;
  const versionChanged = latest.ref.id !== origin.recordId || latest.version !== origin.version;
  if (!versionChanged && modified.value.length === 0) {
    return emptyReconciliation();
  }

  const handles = await client.fetchFiles(latest.ref);
  if (handles.isErr()) {
    return failed(handles.error);
  }

  const materialized = await materializeProviderFiles(deps, {
    dataset,
    record: latest,
    handles: handles.value,
    extract: origin.extract,
    signal: input.signal,
  });
  if (materialized.isErr()) {
    return failed(materialized.error);
  }

  const reconciliation: Reconciliation = {
    ...emptyReconciliation(),
    replacements: materialized.value.files,
  };

  // Metadata and removals only follow a complete refresh
  if (materialized.value.failure !== null) {
    reconciliation.error = materialized.value.failure;
    return reconciliation;
  }

  const fresh = new Set(materialized.value.files.map((file) => file.path));
  for (const file of dataset.files) {
    if (file.external || fresh.has(file.path)) {
      continue;
    }
    const removed = await deps.fileSystem.remove(absolutePath(deps.layout, file.fullPath));
    if (removed.isErr()) {
      reconciliation.error = removed.error;
      return reconciliation;
    }
    reconciliation.removed.push(file.path);
  }

  reconciliation.metadata = {
    title: latest.title,
    description: latest.description,
    creators: latest.creators,
    keywords: latest.keywords,
    license: latest.license,
    language: latest.language,
    datePublished: latest.datePublished,
    version: latest.version,
    importedFrom: {
      provider: origin.provider,
      uri: latest.ref.uri,
      recordId: latest.ref.id,
      version: latest.version,
      extract: origin.extract,
    },
  };
  reconciliation.tagVersion =
    versionChanged && client.versioned ? (latest.version ?? latest.ref.id) : null;

  return reconciliation;
};

// ─────────────────────────────────────────────────────────────────────────────
// Git files
// ─────────────────────────────────────────────────────────────────────────────

interface GitGroup {
  uri: string;
  requestedRef: string | null;
  files: DatasetFile[];
}

const reimportGitFile = async (
  deps: UpdateDatasetsDeps,
  group: GitGroup,
  commit: string,
  file: DatasetFile,
  entry: TreeEntry,
  ref: string | null
): Promise<Result<DatasetFile, DatasetError>> => {
  const authors = await deps.repository.fileCreators(group.uri, commit, entry.path);
  if (authors.isErr()) {
    return err(authors.error);
  }

  const content = await deps.repository.readBlob(group.uri, commit, entry.path);
  if (content.isErr()) {
    return err(content.error);
  }

  const written = await writeWithProgress(
    deps.fileSystem,
    deps.progress,
    absolutePath(deps.layout, file.fullPath),
    file.fullPath,
    entry.size,
    content.value
  );
  if (written.isErr()) {
    return err(written.error);
  }

  return ok({
    ...file,
    requestedRef: ref ?? file.requestedRef,
    originRef: commit,
    checksum: written.value.checksum,
    added: deps.clock().toISOString(),
    creators: authors.value.length > 0 ? authors.value : file.creators,
  });
};

const reconcileGitGroup = async (
  deps: UpdateDatasetsDeps,
  group: GitGroup,
  input: UpdateDatasetsInput,
  reconciliation: Reconciliation
): Promise<Result<void, DatasetError>> => {
  const ref = input.ref ?? null;

  const commit = await deps.repository.resolveRef(group.uri, ref ?? group.requestedRef);
  if (commit.isErr()) {
    return err(commit.error);
  }

  const tree = await deps.repository.listTree(group.uri, commit.value, null);
  if (tree.isErr()) {
    return err(tree.error);
  }

  const entries = new Map(tree.value.map((entry) => [entry.path, entry]));
  const changed: { file: DatasetFile; entry: TreeEntry }[] = [];

  for (const file of group.files) {
    const entry = entries.get(file.sourcePath ?? file.path);
    if (entry === undefined) {
      if (input.delete !== true) {
        reconciliation.missing.push(file.path);
        continue;
      }
      const removed = await deps.fileSystem.remove(absolutePath(deps.layout, file.fullPath));
      if (removed.isErr()) {
        return err(removed.error);
      }
      reconciliation.removed.push(file.path);
      continue;
    }
    if (entry.oid !== file.checksum) {
      changed.push({ file, entry });
    } else if (ref !== null && (file.requestedRef !== ref || file.originRef !== commit.value)) {
      reconciliation.retargeted.push({ ...file, requestedRef: ref, originRef: commit.value });
    }
  }

  const batch = await runTransfers(
    changed,
    { concurrency: deps.concurrency, signal: input.signal },
    ({ file, entry }) => reimportGitFile(deps, group, commit.value, file, entry, ref)
  );
  reconciliation.replacements.push(...batch.completed);

  return batch.failure === null ? ok(undefined) : err(batch.failure);
};

const reconcileGit = async (
  deps: UpdateDatasetsDeps,
  dataset: Dataset,
  input: UpdateDatasetsInput,
  filter: FileFilter
): Promise<Reconciliation> => {
  const groups = new Map<string, GitGroup>();

  for (const file of dataset.files) {
    if (file.sourceKind !== 'git' || file.external || file.sourceUrl === null) {
      continue;
    }
    if (!matchesFileFilter(file, filter)) {
      continue;
    }
    const key = `${file.sourceUrl}\0${file.requestedRef ?? ''}`;
    const group = groups.get(key) ?? { uri: file.sourceUrl, requestedRef: file.requestedRef, files: [] };
    group.files.push(file);
    groups.set(key, group);
  }

  const reconciliation = emptyReconciliation();

  for (const group of groups.values()) {
    if (input.signal?.aborted === true) {
      reconciliation.error = createOperationCancelledError('Update cancelled');
      break;
    }
    const result = await reconcileGitGroup(deps, group, input, reconciliation);
    if (result.isErr()) {
      reconciliation.error = result.error;
      break;
    }
  }

  return reconciliation;
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

const reconcile = async (
  deps: UpdateDatasetsDeps,
  dataset: Dataset,
  input: UpdateDatasetsInput
): Promise<Reconciliation> => {
  const filter: FileFilter = {
    include: input.include,
    exclude: input.exclude,
    creators: input.creators,
  };

  if (input.signal?.aborted === true) {
    return failed(createOperationCancelledError('Update cancelled'));
  }
  if (input.external === true) {
    return reconcileExternal(deps, dataset, input, filter);
  }
  if (dataset.importedFrom !== null) {
    // Provider refreshes are all-or-nothing, so the creators filter does not apply
    return reconcileProvider(deps, dataset, dataset.importedFrom, input, filter);
  }
  return reconcileGit(deps, dataset, input, filter);
};

const updateOne = async (
  deps: UpdateDatasetsDeps,
  dataset: Dataset,
  input: UpdateDatasetsInput,
  log: Logger
): Promise<DatasetUpdateOutcome> => {
  const reconciliation = await reconcile(deps, dataset, input);

  const outcome: DatasetUpdateOutcome = {
    dataset: dataset.name,
    updated: reconciliation.replacements.map((file) => file.path),
    deleted: reconciliation.removed,
    missing: reconciliation.missing,
    tag: null,
    error: reconciliation.error,
  };

  const changed =
    reconciliation.replacements.length > 0 ||
    reconciliation.retargeted.length > 0 ||
    reconciliation.removed.length > 0 ||
    reconciliation.metadata !== null;

  if (changed) {
    const saved = await saveDataset(deps.store, deps.layout.dataDir, {
      ...dataset,
      ...(reconciliation.metadata ?? {}),
      files: mergeFiles(
        dataset,
        [...reconciliation.retargeted, ...reconciliation.replacements],
        reconciliation.removed
      ),
    });

    if (saved.isErr()) {
      log.error({ dataset: dataset.name, error: saved.error }, 'Updated dataset could not be saved');
      return { ...outcome, error: saved.error };
    }

    const tagName =
      reconciliation.error === null && reconciliation.tagVersion !== null
        ? toTagName(reconciliation.tagVersion)
        : null;

    if (tagName !== null) {
      const tagged = await addTag(deps, saved.value, {
        tag: tagName,
        description: `Version ${reconciliation.tagVersion ?? tagName} from ${dataset.importedFrom?.provider ?? 'provider'}`,
      });
      if (tagged.isOk()) {
        outcome.tag = tagName;
      } else if (tagged.error.type === 'DuplicateTagError') {
        log.info({ dataset: dataset.name, tag: tagName }, 'Version tag already exists');
      } else {
        outcome.error = tagged.error;
      }
    }
  }

  if (outcome.error !== null) {
    log.warn({ dataset: dataset.name, error: outcome.error }, 'Dataset update failed');
  } else {
    log.info(
      {
        dataset: dataset.name,
        updated: outcome.updated.length,
        deleted: outcome.deleted.length,
        missing: outcome.missing.length,
      },
      'Dataset updated'
    );
  }

  return outcome;
};

/**
 * Updates the named datasets (all when none are named). Unknown names fail
 * the call before any dataset is touched.
 */
export const updateDatasets = async (
  deps: UpdateDatasetsDeps,
  input: UpdateDatasetsInput = {}
): Promise<Result<UpdateReport, DatasetError>> => {
  const log = deps.logger.child({ usecase: 'updateDatasets' });

  const datasets = await requireDatasets(deps.store, input.names ?? []);
  if (datasets.isErr()) {
    return err(datasets.error);
  }

  const outcomes: DatasetUpdateOutcome[] = [];
  for (const dataset of datasets.value) {
    outcomes.push(await updateOne(deps, dataset, input, log));
  }

  return ok({ outcomes });
};
