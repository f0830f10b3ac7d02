/**
 * Downloads a provider's file list into a dataset, unpacking archives when
 * asked to. Used by import and by whole-dataset refreshes.
 */

import { posix } from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { createDestinationConflictError, type DatasetError } from './errors.js';
import { normalizeSourcePath } from './filters.js';
import { absolutePath, fullPathOf, isInsideRoot, sortFiles } from './paths.js';
import { runTransfers, writeWithProgress } from './transfers.js';

import type {
  ArchiveExtractor,
  Clock,
  FileSystemPort,
  ProgressSinkFactory,
  ProjectLayout,
  ProviderFileHandle,
} from './ports.js';
import type { Dataset, DatasetFile, ProviderDatasetRecord } from './types.js';

export interface ProviderFilesDeps {
  fileSystem: FileSystemPort;
  extractor: ArchiveExtractor;
  layout: ProjectLayout;
  clock: Clock;
  progress: ProgressSinkFactory;
  concurrency: number;
}

export interface MaterializeInput {
  dataset: Dataset;
  record: ProviderDatasetRecord;
  handles: readonly ProviderFileHandle[];
  extract: boolean;
  signal?: AbortSignal | undefined;
}

export interface MaterializeReport {
  files: DatasetFile[];
  failure: DatasetError | null;
}

const recordFor = (
  deps: ProviderFilesDeps,
  input: MaterializeInput,
  handle: ProviderFileHandle,
  path: string,
  checksum: string | null
): DatasetFile => ({
  path,
  fullPath: fullPathOf(deps.layout.dataDir, input.dataset.name, path),
  sourceKind: 'provider',
  sourceUrl: handle.url,
  sourcePath: handle.path,
  requestedRef: null,
  originRef: input.record.version,
  added: deps.clock().toISOString(),
  external: false,
  checksum,
  creators: input.record.creators,
});

const materializeOne = async (
  deps: ProviderFilesDeps,
  input: MaterializeInput,
  handle: ProviderFileHandle,
  target: string
): Promise<Result<DatasetFile[], DatasetError>> => {
  const { fileSystem, extractor, layout } = deps;
  const fullPath = fullPathOf(layout.dataDir, input.dataset.name, target);
  const absolute = absolutePath(layout, fullPath);

  const content = await handle.open();
  if (content.isErr()) {
    return err(content.error);
  }

  const written = await writeWithProgress(
    fileSystem,
    deps.progress,
    absolute,
    fullPath,
    handle.size,
    content.value
  );
  if (written.isErr()) {
    return err(written.error);
  }

  if (!input.extract || !extractor.isArchive(target)) {
    return ok([recordFor(deps, input, handle, target, written.value.checksum)]);
  }

  const extracted = await extractor.extract(absolute);
  if (extracted.isErr()) {
    return err(extracted.error);
  }

  const removed = await fileSystem.remove(absolute);
  if (removed.isErr()) {
    return err(removed.error);
  }

  const directory = posix.dirname(target);
  const files: DatasetFile[] = [];

  for (const relative of extracted.value) {
    const path = directory === '.' ? relative : `${directory}/${relative}`;
    const checksum = await fileSystem.checksum(
      absolutePath(layout, fullPathOf(layout.dataDir, input.dataset.name, path))
    );
    if (checksum.isErr()) {
      return err(checksum.error);
    }
    files.push(recordFor(deps, input, handle, path, checksum.value));
  }

  return ok(files);
};

/**
 * Downloads every handle to its provider path below the storage root.
 * Existing files are replaced.
 */
export const materializeProviderFiles = async (
  deps: ProviderFilesDeps,
  input: MaterializeInput
): Promise<Result<MaterializeReport, DatasetError>> => {
  const seen = new Set<string>();
  const planned: { handle: ProviderFileHandle; target: string }[] = [];

  for (const handle of input.handles) {
    const target = posix.normalize(normalizeSourcePath(handle.path));
    if (!isInsideRoot(target)) {
      return err(
        createDestinationConflictError(input.dataset.name, handle.path, 'target is outside the dataset root')
      );
    }
    if (seen.has(target)) {
      return err(
        createDestinationConflictError(input.dataset.name, target, 'the provider lists it twice')
      );
    }
    seen.add(target);
    planned.push({ handle, target });
  }

  const batch = await runTransfers(
    planned,
    { concurrency: deps.concurrency, signal: input.signal },
    ({ handle, target }) => materializeOne(deps, input, handle, target)
  );

  const files = new Map<string, DatasetFile>();
  for (const file of batch.completed.flat()) {
    files.set(file.path, file);
  }

  return ok({ files: sortFiles([...files.values()]), failure: batch.failure });
};
