/**
 * Dataset metadata persisted as YAML under `<metadataDir>/<id>/`:
 * `metadata.yml` for the dataset and `tags.yml` for its tags.
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { hasErrorCode } from '../../../../common/utils/errno.js';
import {
  createMetadataError,
  createStorageError,
  formatSchemaErrors,
  type DatasetError,
} from '../../core/errors.js';
import {
  DatasetDocumentSchema,
  TagsDocumentSchema,
  type Dataset,
  type DatasetDocument,
  type Tag,
  type TagsDocument,
} from '../../core/types.js';

import type { DatasetStore } from '../../core/ports.js';
import type { Static, TSchema } from '@sinclair/typebox';
import type { TypeCheck } from '@sinclair/typebox/compiler';
import type { Logger } from 'pino';

const datasetValidator = TypeCompiler.Compile(DatasetDocumentSchema);
const tagsValidator = TypeCompiler.Compile(TagsDocumentSchema);

const METADATA_FILE = 'metadata.yml';
const TAGS_FILE = 'tags.yml';

export interface YamlDatasetStoreOptions {
  /** Absolute project root */
  rootDir: string;
  /** Project-relative metadata directory */
  metadataDir: string;
  logger: Logger;
}

/**
 * Reads and validates a YAML document. A missing file yields null.
 */
const readDocument = async <T extends TSchema>(
  filePath: string,
  validator: TypeCheck<T>
): Promise<Result<Static<T> | null, DatasetError>> => {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return ok(null);
    }
    return err(createStorageError(filePath, error));
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err(
      createMetadataError(filePath, `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`)
    );
  }

  if (!validator.Check(parsed)) {
    return err(
      createMetadataError(filePath, 'Schema validation failed', formatSchemaErrors(validator.Errors(parsed)))
    );
  }

  return ok(parsed);
};

/**
 * Writes through a temporary sibling and a rename.
 */
const writeDocument = async (
  filePath: string,
  document: DatasetDocument | TagsDocument
): Promise<Result<void, DatasetError>> => {
  const temporary = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(temporary, stringifyYaml(document), 'utf8');
    await fs.rename(temporary, filePath);
    return ok(undefined);
  } catch (error) {
    await fs.rm(temporary, { force: true }).catch(() => undefined);
    return err(createStorageError(filePath, error));
  }
};

const toDocument = (dataset: Dataset): DatasetDocument => ({ schemaVersion: 1, ...dataset });

export const fromDocument = (document: DatasetDocument): Dataset => ({
  id: document.id,
  name: document.name,
  title: document.title,
  description: document.description,
  creators: document.creators,
  keywords: document.keywords,
  license: document.license,
  language: document.language,
  dateCreated: document.dateCreated,
  datePublished: document.datePublished,
  version: document.version,
  importedFrom: document.importedFrom,
  files: document.files,
});

export const createYamlDatasetStore = (options: YamlDatasetStoreOptions): DatasetStore => {
  const log = options.logger.child({ repo: 'YamlDatasetStore' });
  const metadataRoot = path.join(options.rootDir, options.metadataDir);

  const datasetDir = (dataset: Dataset): string => path.join(metadataRoot, dataset.id);

  const readDataset = async (id: string): Promise<Result<Dataset | null, DatasetError>> => {
    const document = await readDocument(path.join(metadataRoot, id, METADATA_FILE), datasetValidator);
    if (document.isErr()) {
      return err(document.error);
    }
    return ok(document.value === null ? null : fromDocument(document.value));
  };

  const list = async (): Promise<Result<Dataset[], DatasetError>> => {
    let ids: string[];
    try {
      const entries = await fs.readdir(metadataRoot, { withFileTypes: true });
      ids = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return ok([]);
      }
      return err(createStorageError(metadataRoot, error));
    }

    const datasets: Dataset[] = [];
    for (const id of ids.sort()) {
      const dataset = await readDataset(id);
      if (dataset.isErr()) {
        return err(dataset.error);
      }
      if (dataset.value !== null) {
        datasets.push(dataset.value);
      }
    }

    return ok(datasets.sort((a, b) => a.name.localeCompare(b.name)));
  };

  return {
    list,

    async findByName(name) {
      const datasets = await list();
      if (datasets.isErr()) {
        return err(datasets.error);
      }
      return ok(datasets.value.find((dataset) => dataset.name === name) ?? null);
    },

    async save(dataset) {
      const filePath = path.join(datasetDir(dataset), METADATA_FILE);
      const written = await writeDocument(filePath, toDocument(dataset));
      if (written.isOk()) {
        log.debug({ dataset: dataset.name, path: filePath }, 'Dataset metadata written');
      }
      return written;
    },

    async remove(dataset) {
      const dir = datasetDir(dataset);
      try {
        await fs.rm(dir, { recursive: true, force: true });
        return ok(undefined);
      } catch (error) {
        return err(createStorageError(dir, error));
      }
    },

    async loadTags(dataset): Promise<Result<Tag[], DatasetError>> {
      const document = await readDocument(path.join(datasetDir(dataset), TAGS_FILE), tagsValidator);
      if (document.isErr()) {
        return err(document.error);
      }
      return ok(document.value?.tags ?? []);
    },

    async saveTags(dataset, tags) {
      return writeDocument(path.join(datasetDir(dataset), TAGS_FILE), {
        schemaVersion: 1,
        datasetId: dataset.id,
        tags,
      });
    },
  };
};
