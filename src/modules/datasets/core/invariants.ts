/**
 * Invariant guard applied before any dataset record is persisted.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvariantViolationError, type DatasetError } from './errors.js';
import { fullPathOf, isInsideRoot } from './paths.js';

import type { DatasetStore } from './ports.js';
import type { Dataset } from './types.js';

export const findInvariantViolations = (dataset: Dataset, dataDir: string): string[] => {
  const violations: string[] = [];
  const seen = new Set<string>();

  for (const file of dataset.files) {
    if (seen.has(file.path)) {
      violations.push(`duplicate file path '${file.path}'`);
    }
    seen.add(file.path);

    if (!isInsideRoot(file.path)) {
      violations.push(`file path '${file.path}' is outside the dataset root`);
    } else if (file.fullPath !== fullPathOf(dataDir, dataset.name, file.path)) {
      violations.push(`file '${file.path}' has inconsistent full path '${file.fullPath}'`);
    }

    if (file.external && file.checksum === null) {
      violations.push(`external file '${file.path}' has no checksum`);
    }
  }

  return violations;
};

/**
 * Validates invariants, then saves. A violating dataset is never written.
 */
export const saveDataset = async (
  store: DatasetStore,
  dataDir: string,
  dataset: Dataset
): Promise<Result<Dataset, DatasetError>> => {
  const violations = findInvariantViolations(dataset, dataDir);
  if (violations.length > 0) {
    return err(createInvariantViolationError(dataset.name, violations));
  }

  const saved = await store.save(dataset);
  if (saved.isErr()) {
    return err(saved.error);
  }

  return ok(dataset);
};
