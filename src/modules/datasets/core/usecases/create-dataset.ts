/**
 * Create Dataset Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { parseCreators } from '../creators.js';
import {
  createDatasetExistsError,
  createInvalidInputError,
  type DatasetError,
} from '../errors.js';
import { saveDataset } from '../invariants.js';
import { isValidDatasetName } from '../naming.js';
import { toDatasetView, type DatasetView } from '../views.js';

import type { Clock, DatasetStore } from '../ports.js';
import type { Dataset } from '../types.js';
import type { Logger } from 'pino';

export interface CreateDatasetDeps {
  store: DatasetStore;
  dataDir: string;
  clock: Clock;
  createId: () => string;
  logger: Logger;
}

export interface CreateDatasetInput {
  name: string;
  title?: string | undefined;
  description?: string | undefined;
  /** `Forename Surname <email> [affiliation]` strings */
  creators?: readonly string[] | undefined;
  keywords?: readonly string[] | undefined;
  license?: string | null | undefined;
  language?: string | null | undefined;
}

export interface CreateDatasetResult {
  dataset: DatasetView;
  /** Creator strings without a valid email */
  noEmailWarnings: string[];
}

/**
 * Builds an empty dataset record. Does not check for name collisions.
 */
export const buildDataset = (
  deps: Pick<CreateDatasetDeps, 'clock' | 'createId'>,
  input: CreateDatasetInput
): Result<{ dataset: Dataset; noEmailWarnings: string[] }, DatasetError> => {
  if (!isValidDatasetName(input.name)) {
    return err(
      createInvalidInputError(
        'name',
        `Dataset name '${input.name}' is not valid. Use letters, digits, '.', '_' and '-', starting with a letter or digit`
      )
    );
  }

  const parsed = parseCreators(input.creators ?? []);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  return ok({
    dataset: {
      id: deps.createId(),
      name: input.name,
      title: input.title ?? input.name,
      description: input.description ?? '',
      creators: parsed.value.creators,
      keywords: [...(input.keywords ?? [])],
      license: input.license ?? null,
      language: input.language ?? null,
      dateCreated: deps.clock().toISOString(),
      datePublished: null,
      version: null,
      importedFrom: null,
      files: [],
    },
    noEmailWarnings: parsed.value.noEmailWarnings,
  });
};

export const createDataset = async (
  deps: CreateDatasetDeps,
  input: CreateDatasetInput
): Promise<Result<CreateDatasetResult, DatasetError>> => {
  const log = deps.logger.child({ usecase: 'createDataset' });

  const built = buildDataset(deps, input);
  if (built.isErr()) {
    return err(built.error);
  }

  const existing = await deps.store.findByName(input.name);
  if (existing.isErr()) {
    return err(existing.error);
  }
  if (existing.value !== null) {
    return err(createDatasetExistsError(input.name));
  }

  const saved = await saveDataset(deps.store, deps.dataDir, built.value.dataset);
  if (saved.isErr()) {
    return err(saved.error);
  }

  log.info({ dataset: input.name, id: saved.value.id }, 'Dataset created');

  return ok({ dataset: toDatasetView(saved.value), noEmailWarnings: built.value.noEmailWarnings });
};
