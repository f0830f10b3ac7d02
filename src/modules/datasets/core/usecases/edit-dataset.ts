/**
 * Edit Dataset Use Case
 *
 * Only the fields present in the input are changed.
 */

import { err, ok, type Result } from 'neverthrow';

import { parseCreators } from '../creators.js';
import { saveDataset } from '../invariants.js';
import { requireDataset } from '../lookup.js';
import { toDatasetView, type DatasetView } from '../views.js';

import type { DatasetError } from '../errors.js';
import type { DatasetStore } from '../ports.js';
import type { Dataset } from '../types.js';
import type { Logger } from 'pino';

export interface EditDatasetDeps {
  store: DatasetStore;
  dataDir: string;
  logger: Logger;
}

export interface EditDatasetInput {
  name: string;
  title?: string | undefined;
  description?: string | undefined;
  creators?: readonly string[] | undefined;
  keywords?: readonly string[] | undefined;
  license?: string | null | undefined;
  language?: string | null | undefined;
}

export interface EditDatasetResult {
  dataset: DatasetView;
  /** Names of the fields whose value changed */
  updated: string[];
  noEmailWarnings: string[];
}

const sameJson = (a: unknown, b: unknown): boolean => JSON.stringify(a) === JSON.stringify(b);

export const editDataset = async (
  deps: EditDatasetDeps,
  input: EditDatasetInput
): Promise<Result<EditDatasetResult, DatasetError>> => {
  const datasetResult = await requireDataset(deps.store, input.name);
  if (datasetResult.isErr()) {
    return err(datasetResult.error);
  }

  const dataset = datasetResult.value;
  const next: Dataset = { ...dataset };
  let noEmailWarnings: string[] = [];

  if (input.title !== undefined) {
    next.title = input.title;
  }
  if (input.description !== undefined) {
    next.description = input.description;
  }
  if (input.keywords !== undefined) {
    next.keywords = [...input.keywords];
  }
  if (input.license !== undefined) {
    next.license = input.license;
  }
  if (input.language !== undefined) {
    next.language = input.language;
  }

  if (input.creators !== undefined) {
    const parsed = parseCreators(input.creators);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    next.creators = parsed.value.creators;
    noEmailWarnings = parsed.value.noEmailWarnings;
  }

  const fields = ['title', 'description', 'creators', 'keywords', 'license', 'language'] as const;
  const updated = fields.filter((field) => !sameJson(dataset[field], next[field]));

  if (updated.length === 0) {
    return ok({ dataset: toDatasetView(dataset), updated, noEmailWarnings });
  }

  const saved = await saveDataset(deps.store, deps.dataDir, next);
  if (saved.isErr()) {
    return err(saved.error);
  }

  deps.logger.info({ dataset: dataset.name, updated }, 'Dataset metadata updated');

  return ok({ dataset: toDatasetView(saved.value), updated: [...updated], noEmailWarnings });
};
