/**
 * Unlink Files Use Case
 *
 * Drops file records from a dataset. The files themselves stay on disk.
 */

import { err, ok, type Result } from 'neverthrow';

import { createOperationCancelledError, type DatasetError } from '../errors.js';
import { matchesFileFilter } from '../filters.js';
import { saveDataset } from '../invariants.js';
import { requireDataset } from '../lookup.js';
import { mergeFiles } from '../paths.js';
import { toDatasetFileView, type DatasetFileView } from '../views.js';

import type { DatasetStore, Interaction } from '../ports.js';
import type { Logger } from 'pino';

export interface UnlinkFilesDeps {
  store: DatasetStore;
  interaction: Interaction;
  dataDir: string;
  logger: Logger;
}

export interface UnlinkFilesInput {
  name: string;
  include?: readonly string[] | undefined;
  exclude?: readonly string[] | undefined;
  /** Skip the confirmation asked before every file is unlinked */
  yes?: boolean | undefined;
}

export const unlinkFiles = async (
  deps: UnlinkFilesDeps,
  input: UnlinkFilesInput
): Promise<Result<DatasetFileView[], DatasetError>> => {
  const datasetResult = await requireDataset(deps.store, input.name);
  if (datasetResult.isErr()) {
    return err(datasetResult.error);
  }

  const dataset = datasetResult.value;
  const matching = dataset.files.filter((file) =>
    matchesFileFilter(file, { include: input.include, exclude: input.exclude })
  );

  if (matching.length === 0) {
    return ok([]);
  }

  if (matching.length === dataset.files.length && input.yes !== true) {
    const confirmed = await deps.interaction.confirm(
      `This removes all ${String(matching.length)} files from dataset '${dataset.name}'. Continue?`
    );
    if (!confirmed) {
      return err(createOperationCancelledError(`Unlinking files from '${dataset.name}' was declined`));
    }
  }

  const saved = await saveDataset(deps.store, deps.dataDir, {
    ...dataset,
    files: mergeFiles(
      dataset,
      [],
      matching.map((file) => file.path)
    ),
  });
  if (saved.isErr()) {
    return err(saved.error);
  }

  deps.logger.info({ dataset: dataset.name, count: matching.length }, 'Files unlinked');

  return ok(matching.map((file) => toDatasetFileView(dataset.name, file)));
};
