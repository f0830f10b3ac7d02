/**
 * Read-only views handed to callers. Fields are computed once when the
 * view is built and the objects are frozen.
 */

import { formatCreator } from './creators.js';

import type { Creator, Dataset, DatasetFile, Tag } from './types.js';

export interface DatasetFileView {
  readonly datasetName: string;
  readonly path: string;
  readonly fullPath: string;
  readonly added: string;
  readonly sourceUrl: string | null;
  readonly external: boolean;
  readonly checksum: string | null;
  readonly creators: readonly Creator[];
  readonly creatorNames: string;
}

export interface DatasetView {
  readonly id: string;
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly creators: readonly Creator[];
  /** Creators rendered with the creator grammar, comma separated */
  readonly creatorNames: string;
  readonly keywords: readonly string[];
  readonly license: string | null;
  readonly language: string | null;
  readonly dateCreated: string;
  readonly datePublished: string | null;
  readonly version: string | null;
  readonly importedFrom: string | null;
  readonly files: readonly DatasetFileView[];
}

export interface TagView {
  readonly datasetName: string;
  readonly name: string;
  readonly description: string;
  readonly created: string;
  readonly commit: string;
  readonly fileCount: number;
}

const freezeCreators = (creators: readonly Creator[]): readonly Creator[] =>
  Object.freeze(creators.map((creator) => Object.freeze({ ...creator })));

export const toDatasetFileView = (datasetName: string, file: DatasetFile): DatasetFileView =>
  Object.freeze({
    datasetName,
    path: file.path,
    fullPath: file.fullPath,
    added: file.added,
    sourceUrl: file.sourceUrl,
    external: file.external,
    checksum: file.checksum,
    creators: freezeCreators(file.creators),
    creatorNames: file.creators.map((creator) => creator.name).join(', '),
  });

export const toDatasetView = (dataset: Dataset): DatasetView =>
  Object.freeze({
    id: dataset.id,
    name: dataset.name,
    title: dataset.title,
    description: dataset.description,
    creators: freezeCreators(dataset.creators),
    creatorNames: dataset.creators.map(formatCreator).join(', '),
    keywords: Object.freeze([...dataset.keywords]),
    license: dataset.license,
    language: dataset.language,
    dateCreated: dataset.dateCreated,
    datePublished: dataset.datePublished,
    version: dataset.version,
    importedFrom: dataset.importedFrom?.uri ?? null,
    files: Object.freeze(dataset.files.map((file) => toDatasetFileView(dataset.name, file))),
  });

export const toTagView = (datasetName: string, tag: Tag): TagView =>
  Object.freeze({
    datasetName,
    name: tag.name,
    description: tag.description,
    created: tag.created,
    commit: tag.commit,
    fileCount: tag.snapshot.files.length,
  });
