/**
 * Dataset metadata read from a commit instead of the working tree.
 */

import { posix } from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { readAll } from '../../../../common/utils/streams.js';
import { createMetadataError, formatSchemaErrors, type DatasetError } from '../../core/errors.js';
import { DatasetDocumentSchema, type DatasetDocument } from '../../core/types.js';

import type { RepositoryPort } from '../../core/ports.js';

const documentValidator = TypeCompiler.Compile(DatasetDocumentSchema);

export const readCommittedDocument = async (
  repository: RepositoryPort,
  uri: string,
  commit: string,
  filePath: string
): Promise<Result<DatasetDocument, DatasetError>> => {
  const blob = await repository.readBlob(uri, commit, filePath);
  if (blob.isErr()) {
    return err(blob.error);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(new TextDecoder().decode(await readAll(blob.value)));
  } catch (error) {
    return err(
      createMetadataError(
        `${uri}:${filePath}`,
        `Failed to read metadata: ${error instanceof Error ? error.message : String(error)}`
      )
    );
  }

  if (!documentValidator.Check(parsed)) {
    return err(
      createMetadataError(
        `${uri}:${filePath}`,
        'Schema validation failed',
        formatSchemaErrors(documentValidator.Errors(parsed))
      )
    );
  }
  return ok(parsed);
};

/**
 * Every `<metadataDir>/<id>/metadata.yml` at `commit`, in tree order.
 */
export const readCommittedDocuments = async (
  repository: RepositoryPort,
  uri: string,
  commit: string,
  metadataDir: string
): Promise<Result<DatasetDocument[], DatasetError>> => {
  const entries = await repository.listTree(uri, commit, posix.join(metadataDir, '*', 'metadata.yml'));
  if (entries.isErr()) {
    return err(entries.error);
  }

  const documents: DatasetDocument[] = [];
  for (const entry of entries.value) {
    const document = await readCommittedDocument(repository, uri, commit, entry.path);
    if (document.isErr()) {
      return err(document.error);
    }
    documents.push(document.value);
  }
  return ok(documents);
};
