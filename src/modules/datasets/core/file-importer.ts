/**
 * Copies (or links) resolved source entries into a dataset's storage root.
 * Returns new records; persisting them is up to the caller.
 */

import { posix } from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import {
  createDestinationConflictError,
  createInvalidSourceError,
  type DatasetError,
} from './errors.js';
import { linkExternal } from './external-links.js';
import { normalizeSourcePath } from './filters.js';
import { absolutePath, fullPathOf, isInsideRoot, sortFiles } from './paths.js';
import { runTransfers, writeWithProgress } from './transfers.js';

import type {
  Clock,
  FileSystemPort,
  ProgressSinkFactory,
  ProjectLayout,
  RepositoryPort,
  UrlReader,
} from './ports.js';
import type { ContentStream, Dataset, DatasetFile, ResolvedSource, SourceEntry } from './types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface FileImporterDeps {
  fileSystem: FileSystemPort;
  repository: RepositoryPort;
  urlReader: UrlReader;
  layout: ProjectLayout;
  clock: Clock;
  progress: ProgressSinkFactory;
  concurrency: number;
  logger: Logger;
}

export interface ImportFilesInput {
  dataset: Dataset;
  sources: readonly ResolvedSource[];
  /** Dataset-relative directory (or file, for a single entry); empty = storage root */
  destination?: string | undefined;
  overwrite?: boolean | undefined;
  external?: boolean | undefined;
  signal?: AbortSignal | undefined;
}

export interface ImportReport {
  /** One new record per completed transfer, sorted by path */
  files: DatasetFile[];
  /** Dataset-relative paths left alone because the dataset already records them */
  skipped: string[];
  /** Error or cancellation that stopped the remaining transfers */
  failure: DatasetError | null;
}

interface PlannedTransfer {
  source: ResolvedSource;
  entry: SourceEntry;
  /** Dataset-relative target path */
  target: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Planning
// ─────────────────────────────────────────────────────────────────────────────

const uniqueEntries = (
  sources: readonly ResolvedSource[]
): { source: ResolvedSource; entry: SourceEntry }[] => {
  const seen = new Set<string>();
  const pairs: { source: ResolvedSource; entry: SourceEntry }[] = [];

  for (const source of sources) {
    for (const entry of source.entries) {
      const key = `${source.reference.uri}\0${entry.sourcePath}\0${entry.relativeTarget}`;
      if (!seen.has(key)) {
        seen.add(key);
        pairs.push({ source, entry });
      }
    }
  }

  return pairs;
};

const planTransfers = async (
  deps: FileImporterDeps,
  dataset: Dataset,
  pairs: { source: ResolvedSource; entry: SourceEntry }[],
  destination: string
): Promise<Result<PlannedTransfer[], DatasetError>> => {
  const { fileSystem, layout } = deps;

  let destinationIsFile = dataset.files.some((file) => file.path === destination);
  if (destination !== '' && !destinationIsFile) {
    const stat = await fileSystem.stat(
      absolutePath(layout, fullPathOf(layout.dataDir, dataset.name, destination))
    );
    if (stat.isErr()) {
      return err(stat.error);
    }
    destinationIsFile = stat.value?.kind === 'file';
  }

  if (destinationIsFile && pairs.length > 1) {
    return err(
      createDestinationConflictError(
        dataset.name,
        destination,
        `destination is an existing file and ${String(pairs.length)} files are being added`
      )
    );
  }

  const targets = new Map<string, string>();
  const planned: PlannedTransfer[] = [];

  for (const { source, entry } of pairs) {
    const target = destinationIsFile
      ? destination
      : posix.normalize(destination === '' ? entry.relativeTarget : `${destination}/${entry.relativeTarget}`);

    if (!isInsideRoot(target)) {
      return err(
        createDestinationConflictError(dataset.name, target, 'target is outside the dataset root')
      );
    }

    const previous = targets.get(target);
    if (previous !== undefined) {
      return err(
        createDestinationConflictError(
          dataset.name,
          target,
          `'${previous}' and '${entry.sourcePath}' both map to it`
        )
      );
    }

    targets.set(target, entry.sourcePath);
    planned.push({ source, entry, target });
  }

  return ok(planned);
};

// ─────────────────────────────────────────────────────────────────────────────
// Transfer
// ─────────────────────────────────────────────────────────────────────────────

const openSource = async (
  deps: FileImporterDeps,
  item: PlannedTransfer
): Promise<Result<ContentStream, DatasetError>> => {
  const { source, entry } = item;

  switch (source.reference.kind) {
    case 'local':
      return deps.fileSystem.read(entry.sourcePath);
    case 'git':
      if (source.commit === null) {
        return err(createInvalidSourceError(source.reference.uri, 'Git source was not resolved'));
      }
      return deps.repository.readBlob(source.reference.uri, source.commit, entry.sourcePath);
    case 'url':
      return deps.urlReader.open(entry.sourcePath);
    case 'provider':
      return err(
        createInvalidSourceError(source.reference.uri, 'Provider files are transferred by import')
      );
  }
};

const transferOne = async (
  deps: FileImporterDeps,
  dataset: Dataset,
  item: PlannedTransfer,
  external: boolean
): Promise<Result<DatasetFile, DatasetError>> => {
  const { layout, clock } = deps;
  const { source, entry, target } = item;

  if (external) {
    return linkExternal(deps, { dataset, path: target, sourcePath: entry.sourcePath });
  }

  const fullPath = fullPathOf(layout.dataDir, dataset.name, target);

  // Looked up first so a failure leaves nothing on disk without a record
  let creators = dataset.creators;
  if (source.reference.kind === 'git' && source.commit !== null) {
    const authors = await deps.repository.fileCreators(
      source.reference.uri,
      source.commit,
      entry.sourcePath
    );
    if (authors.isErr()) {
      return err(authors.error);
    }
    if (authors.value.length > 0) {
      creators = authors.value;
    }
  }

  const content = await openSource(deps, item);
  if (content.isErr()) {
    return err(content.error);
  }

  const written = await writeWithProgress(
    deps.fileSystem,
    deps.progress,
    absolutePath(layout, fullPath),
    fullPath,
    entry.size,
    content.value
  );
  if (written.isErr()) {
    return err(written.error);
  }

  const isLocal = source.reference.kind === 'local';

  return ok({
    path: target,
    fullPath,
    sourceKind: source.reference.kind,
    sourceUrl: isLocal ? null : source.reference.uri,
    sourcePath: source.reference.kind === 'url' ? null : entry.sourcePath,
    requestedRef: source.reference.ref,
    originRef: source.commit,
    added: clock().toISOString(),
    external: false,
    checksum: written.value.checksum,
    creators,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Imports resolved entries below `destination`.
 *
 * Conflicts (destination is a file while several files are added, a target
 * outside the root, two entries mapping to one target) fail before anything
 * is transferred. With `overwrite` unset, recorded targets are skipped and a
 * target found on disk without a record is a conflict.
 */
export const importFiles = async (
  deps: FileImporterDeps,
  input: ImportFilesInput
): Promise<Result<ImportReport, DatasetError>> => {
  const { fileSystem, layout, logger } = deps;
  const { dataset } = input;
  const overwrite = input.overwrite ?? false;
  const external = input.external ?? false;
  const destination = normalizeSourcePath(input.destination ?? '');

  if (destination !== '' && !isInsideRoot(destination)) {
    return err(
      createDestinationConflictError(dataset.name, destination, 'destination is outside the dataset root')
    );
  }

  if (external) {
    const nonLocal = input.sources.find((source) => source.reference.kind !== 'local');
    if (nonLocal !== undefined) {
      return err(
        createInvalidSourceError(
          nonLocal.reference.uri,
          'External files must already be present on the local filesystem'
        )
      );
    }
  }

  const pairs = uniqueEntries(input.sources);
  if (pairs.length === 0) {
    return ok({ files: [], skipped: [], failure: null });
  }

  const planResult = await planTransfers(deps, dataset, pairs, destination);
  if (planResult.isErr()) {
    return err(planResult.error);
  }

  const recorded = new Set(dataset.files.map((file) => file.path));
  const pending: PlannedTransfer[] = [];
  const skipped: string[] = [];

  for (const item of planResult.value) {
    if (!overwrite) {
      if (recorded.has(item.target)) {
        skipped.push(item.target);
        continue;
      }
      const stat = await fileSystem.stat(
        absolutePath(layout, fullPathOf(layout.dataDir, dataset.name, item.target))
      );
      if (stat.isErr()) {
        return err(stat.error);
      }
      if (stat.value !== null) {
        return err(
          createDestinationConflictError(
            dataset.name,
            item.target,
            'a file exists there but is not recorded in the dataset; use overwrite to replace it'
          )
        );
      }
    }
    pending.push(item);
  }

  logger.debug(
    { dataset: dataset.name, pending: pending.length, skipped: skipped.length },
    'Importing files'
  );

  const batch = await runTransfers(
    pending,
    { concurrency: deps.concurrency, signal: input.signal },
    (item) => transferOne(deps, dataset, item, external)
  );

  if (batch.failure !== null) {
    logger.warn(
      { dataset: dataset.name, completed: batch.completed.length, error: batch.failure },
      'Import stopped before all files were transferred'
    );
  }

  return ok({ files: sortFiles(batch.completed), skipped: skipped.sort(), failure: batch.failure });
};
