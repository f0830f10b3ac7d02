/**
 * External files: symlinks to content mounted outside the project, tracked
 * by checksum only.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidSourceError, type DatasetError } from './errors.js';
import { absolutePath, fullPathOf } from './paths.js';

import type { Clock, FileSystemPort, ProjectLayout } from './ports.js';
import type { Dataset, DatasetFile } from './types.js';

export interface ExternalLinkDeps {
  fileSystem: FileSystemPort;
  layout: ProjectLayout;
  clock: Clock;
}

export interface LinkExternalInput {
  dataset: Dataset;
  /** Dataset-relative path of the link */
  path: string;
  /** Absolute path of the mounted file */
  sourcePath: string;
}

/**
 * Links an already-present local file into the dataset and records its checksum.
 * Content is never copied.
 */
export const linkExternal = async (
  deps: ExternalLinkDeps,
  input: LinkExternalInput
): Promise<Result<DatasetFile, DatasetError>> => {
  const { fileSystem, layout, clock } = deps;
  const { dataset, path, sourcePath } = input;

  const stat = await fileSystem.stat(sourcePath);
  if (stat.isErr()) {
    return err(stat.error);
  }
  if (stat.value?.kind !== 'file') {
    return err(createInvalidSourceError(sourcePath, 'External source must be an existing file'));
  }

  const checksum = await fileSystem.checksum(sourcePath);
  if (checksum.isErr()) {
    return err(checksum.error);
  }
  if (checksum.value === null) {
    return err(createInvalidSourceError(sourcePath, 'External source disappeared while linking'));
  }

  const fullPath = fullPathOf(layout.dataDir, dataset.name, path);
  const linked = await fileSystem.symlink(absolutePath(layout, fullPath), sourcePath);
  if (linked.isErr()) {
    return err(linked.error);
  }

  return ok({
    path,
    fullPath,
    sourceKind: 'local',
    sourceUrl: null,
    sourcePath,
    requestedRef: null,
    originRef: null,
    added: clock().toISOString(),
    external: true,
    checksum: checksum.value,
    creators: dataset.creators,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Staleness check
// ─────────────────────────────────────────────────────────────────────────────

export interface CheckExternalInput {
  dataset: Dataset;
  /** External records to check; non-external records are ignored */
  files: readonly DatasetFile[];
  /** Remove records (and links) whose target is gone */
  delete: boolean;
}

export interface ExternalCheckReport {
  /** Replacement records for stale files */
  updated: DatasetFile[];
  /** Paths whose target is missing and were left alone */
  missing: string[];
  /** Paths removed because their target is missing */
  removed: string[];
  unchanged: string[];
}

/**
 * Recomputes each target's checksum. Stale files are re-linked and get a new
 * record; missing targets are reported, or removed when `delete` is set.
 */
export const checkExternalFiles = async (
  deps: ExternalLinkDeps,
  input: CheckExternalInput
): Promise<Result<ExternalCheckReport, DatasetError>> => {
  const { fileSystem, layout, clock } = deps;
  const report: ExternalCheckReport = { updated: [], missing: [], removed: [], unchanged: [] };

  for (const file of input.files) {
    if (!file.external) {
      continue;
    }

    const checksum: Result<string | null, DatasetError> =
      file.sourcePath === null ? ok(null) : await fileSystem.checksum(file.sourcePath);
    if (checksum.isErr()) {
      return err(checksum.error);
    }

    if (checksum.value === null || file.sourcePath === null) {
      if (!input.delete) {
        report.missing.push(file.path);
        continue;
      }
      const removed = await fileSystem.remove(absolutePath(layout, file.fullPath));
      if (removed.isErr()) {
        return err(removed.error);
      }
      report.removed.push(file.path);
      continue;
    }

    if (checksum.value === file.checksum) {
      report.unchanged.push(file.path);
      continue;
    }

    const linked = await fileSystem.symlink(absolutePath(layout, file.fullPath), file.sourcePath);
    if (linked.isErr()) {
      return err(linked.error);
    }

    report.updated.push({ ...file, checksum: checksum.value, added: clock().toISOString() });
  }

  return ok(report);
};
