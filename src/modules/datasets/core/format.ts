/**
 * Tabular and JSON rendering of dataset, file and tag listings.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from './errors.js';

import type { DatasetFileView, DatasetView, TagView } from './views.js';

export type OutputFormat = 'tabular' | 'json';

export interface FormatOptions {
  format?: OutputFormat | undefined;
  /** Comma-separated column keys; rows are sorted by the first one */
  columns?: string | undefined;
}

interface Column<T> {
  header: string;
  value: (item: T) => string;
}

type ColumnSet<T> = Record<string, Column<T>>;

const orEmpty = (value: string | null): string => value ?? '';

export const DATASET_COLUMNS: ColumnSet<DatasetView> = {
  id: { header: 'ID', value: (d) => d.id },
  name: { header: 'NAME', value: (d) => d.name },
  title: { header: 'TITLE', value: (d) => d.title },
  version: { header: 'VERSION', value: (d) => orEmpty(d.version) },
  created: { header: 'CREATED', value: (d) => d.dateCreated },
  published: { header: 'PUBLISHED', value: (d) => orEmpty(d.datePublished) },
  creators: { header: 'CREATORS', value: (d) => d.creators.map((c) => c.name).join(', ') },
  keywords: { header: 'KEYWORDS', value: (d) => d.keywords.join(', ') },
  description: { header: 'DESCRIPTION', value: (d) => d.description },
  license: { header: 'LICENSE', value: (d) => orEmpty(d.license) },
  language: { header: 'LANGUAGE', value: (d) => orEmpty(d.language) },
  files: { header: 'FILES', value: (d) => String(d.files.length) },
};

export const FILE_COLUMNS: ColumnSet<DatasetFileView> = {
  dataset: { header: 'DATASET NAME', value: (f) => f.datasetName },
  added: { header: 'ADDED', value: (f) => f.added },
  path: { header: 'PATH', value: (f) => f.fullPath },
  source: { header: 'SOURCE', value: (f) => orEmpty(f.sourceUrl) },
  external: { header: 'EXTERNAL', value: (f) => (f.external ? '*' : '') },
  checksum: { header: 'CHECKSUM', value: (f) => orEmpty(f.checksum) },
  creators: { header: 'CREATORS', value: (f) => f.creatorNames },
};

export const TAG_COLUMNS: ColumnSet<TagView> = {
  created: { header: 'CREATED', value: (t) => t.created },
  name: { header: 'NAME', value: (t) => t.name },
  description: { header: 'DESCRIPTION', value: (t) => t.description },
  dataset: { header: 'DATASET', value: (t) => t.datasetName },
  commit: { header: 'COMMIT', value: (t) => t.commit },
};

export const DEFAULT_DATASET_COLUMNS = 'id,name,title,version';
export const DEFAULT_FILE_COLUMNS = 'dataset,added,path';
export const DEFAULT_TAG_COLUMNS = 'created,name,description,dataset,commit';

const selectColumns = <T>(
  available: ColumnSet<T>,
  columns: string
): Result<[string, Column<T>][], InvalidInputError> => {
  const selected: [string, Column<T>][] = [];

  for (const key of columns.split(',').map((part) => part.trim().toLowerCase())) {
    if (key === '') {
      continue;
    }
    const column = available[key];
    if (column === undefined) {
      return err(
        createInvalidInputError(
          'columns',
          `Unknown column '${key}'. Available: ${Object.keys(available).join(', ')}`
        )
      );
    }
    selected.push([key, column]);
  }

  if (selected.length === 0) {
    return err(createInvalidInputError('columns', 'At least one column is required'));
  }

  return ok(selected);
};

const renderTable = <T>(items: readonly T[], columns: [string, Column<T>][]): string => {
  const rows = items.map((item) => columns.map(([, column]) => column.value(item)));
  const widths = columns.map(([, column], index) =>
    Math.max(column.header.length, ...rows.map((row) => (row[index] ?? '').length))
  );

  const renderRow = (cells: string[]): string =>
    cells
      .map((cell, index) => cell.padEnd(widths[index] ?? 0))
      .join('  ')
      .trimEnd();

  return [
    renderRow(columns.map(([, column]) => column.header)),
    renderRow(widths.map((width) => '-'.repeat(width))),
    ...rows.map(renderRow),
  ].join('\n');
};

const renderJson = <T>(items: readonly T[], columns: [string, Column<T>][]): string =>
  JSON.stringify(
    items.map((item) => Object.fromEntries(columns.map(([key, column]) => [key, column.value(item)]))),
    null,
    2
  );

const formatItems = <T>(
  items: readonly T[],
  available: ColumnSet<T>,
  defaults: string,
  options: FormatOptions
): Result<string, InvalidInputError> => {
  const columnsResult = selectColumns(available, options.columns ?? defaults);
  if (columnsResult.isErr()) {
    return err(columnsResult.error);
  }

  const columns = columnsResult.value;
  const first = columns[0];
  const sorted =
    first === undefined
      ? [...items]
      : [...items].sort((a, b) => first[1].value(a).localeCompare(first[1].value(b)));

  return ok(
    (options.format ?? 'tabular') === 'json' ? renderJson(sorted, columns) : renderTable(sorted, columns)
  );
};

export const formatDatasets = (
  views: readonly DatasetView[],
  options: FormatOptions = {}
): Result<string, InvalidInputError> =>
  formatItems(views, DATASET_COLUMNS, DEFAULT_DATASET_COLUMNS, options);

export const formatFiles = (
  views: readonly DatasetFileView[],
  options: FormatOptions = {}
): Result<string, InvalidInputError> => formatItems(views, FILE_COLUMNS, DEFAULT_FILE_COLUMNS, options);

export const formatTags = (
  views: readonly TagView[],
  options: FormatOptions = {}
): Result<string, InvalidInputError> => formatItems(views, TAG_COLUMNS, DEFAULT_TAG_COLUMNS, options);
