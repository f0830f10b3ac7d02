import path, { posix } from 'node:path';

import type { ProjectLayout } from './ports.js';
import type { Dataset, DatasetFile } from './types.js';

/**
 * Project-relative storage root of a dataset.
 */
export const datasetRoot = (dataDir: string, name: string): string => posix.join(dataDir, name);

export const fullPathOf = (dataDir: string, datasetName: string, filePath: string): string =>
  posix.join(dataDir, datasetName, filePath);

export const absolutePath = (layout: ProjectLayout, projectRelative: string): string =>
  path.join(layout.rootDir, ...projectRelative.split('/'));

/**
 * True when a dataset-relative path is normalized and stays below the root.
 */
export const isInsideRoot = (relative: string): boolean => {
  if (relative === '' || posix.isAbsolute(relative)) {
    return false;
  }
  const normalized = posix.normalize(relative);
  return (
    normalized === relative &&
    normalized !== '.' &&
    normalized !== '..' &&
    !normalized.startsWith('../')
  );
};

export const toPosixPath = (filePath: string): string => filePath.split(path.sep).join(posix.sep);

const byPath = (a: DatasetFile, b: DatasetFile): number => {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
};

export const sortFiles = (files: readonly DatasetFile[]): DatasetFile[] => [...files].sort(byPath);

/**
 * Replaces records by path, drops `removed` paths and returns the list sorted.
 */
export const mergeFiles = (
  dataset: Dataset,
  replacements: readonly DatasetFile[],
  removed: readonly string[] = []
): DatasetFile[] => {
  const byPathMap = new Map(dataset.files.map((file) => [file.path, file]));
  for (const file of replacements) {
    byPathMap.set(file.path, file);
  }
  for (const filePath of removed) {
    byPathMap.delete(filePath);
  }
  return sortFiles([...byPathMap.values()]);
};
