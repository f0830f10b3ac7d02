import { type Static, Type } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Persisted schemas (metadata.yml / tags.yml)
// ─────────────────────────────────────────────────────────────────────────────

const NullableString = Type.Union([Type.String(), Type.Null()]);

export const CreatorSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  email: NullableString,
  affiliation: NullableString,
});

const SourceKindSchema = Type.Union([
  Type.Literal('local'),
  Type.Literal('git'),
  Type.Literal('provider'),
  Type.Literal('url'),
]);

export const DatasetFileSchema = Type.Object({
  path: Type.String({ minLength: 1, description: 'Path relative to the dataset storage root' }),
  fullPath: Type.String({ minLength: 1, description: 'Project-relative path' }),
  sourceKind: SourceKindSchema,
  sourceUrl: NullableString,
  sourcePath: NullableString,
  requestedRef: NullableString,
  originRef: NullableString,
  added: Type.String(),
  external: Type.Boolean(),
  checksum: NullableString,
  creators: Type.Array(CreatorSchema),
});

const ProviderNameSchema = Type.Union([
  Type.Literal('zenodo'),
  Type.Literal('dataverse'),
  Type.Literal('project'),
]);

export const ProviderOriginSchema = Type.Object({
  provider: ProviderNameSchema,
  uri: Type.String(),
  recordId: Type.String(),
  version: NullableString,
  /** Archives were unpacked on import; refreshes do the same */
  extract: Type.Boolean(),
});

export const DatasetDocumentSchema = Type.Object({
  schemaVersion: Type.Literal(1),
  id: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  title: Type.String(),
  description: Type.String(),
  creators: Type.Array(CreatorSchema),
  keywords: Type.Array(Type.String()),
  license: NullableString,
  language: NullableString,
  dateCreated: Type.String(),
  datePublished: NullableString,
  version: NullableString,
  importedFrom: Type.Union([ProviderOriginSchema, Type.Null()]),
  files: Type.Array(DatasetFileSchema),
});

export const DatasetSnapshotSchema = Type.Object({
  version: NullableString,
  files: Type.Array(DatasetFileSchema),
});

export const TagSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  description: Type.String(),
  created: Type.String(),
  commit: Type.String(),
  snapshot: DatasetSnapshotSchema,
});

export const TagsDocumentSchema = Type.Object({
  schemaVersion: Type.Literal(1),
  datasetId: Type.String(),
  tags: Type.Array(TagSchema),
});

export type DatasetDocument = Static<typeof DatasetDocumentSchema>;
export type TagsDocument = Static<typeof TagsDocumentSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Domain types
// ─────────────────────────────────────────────────────────────────────────────

export type Creator = Static<typeof CreatorSchema>;

/**
 * Where a file came from.
 * `local` also covers external (linked) files.
 */
export type SourceKind = Static<typeof SourceKindSchema>;

export type DatasetFile = Static<typeof DatasetFileSchema>;

export type ProviderName = Static<typeof ProviderNameSchema>;

export type ProviderOrigin = Static<typeof ProviderOriginSchema>;

export type DatasetSnapshot = Static<typeof DatasetSnapshotSchema>;

export type Tag = Static<typeof TagSchema>;

export interface Dataset {
  id: string;
  name: string;
  title: string;
  description: string;
  creators: Creator[];
  keywords: string[];
  license: string | null;
  language: string | null;
  dateCreated: string;
  datePublished: string | null;
  /** Version label; export records the chosen snapshot id here */
  version: string | null;
  importedFrom: ProviderOrigin | null;
  /** Sorted by path */
  files: DatasetFile[];
}

/**
 * Resolved description of a source.
 */
export interface SourceReference {
  kind: SourceKind;
  uri: string;
  /** Sub-path pattern inside the source (glob allowed) */
  path: string | null;
  /** Requested branch, tag or commit */
  ref: string | null;
}

/**
 * One file of a resolved source, ready to be transferred.
 */
export interface SourceEntry {
  /** Path inside the source (repository path, local path or URL) */
  sourcePath: string;
  /** Relative structure to reproduce below the destination */
  relativeTarget: string;
  size: number | null;
  /** Checksum in the source when known without downloading */
  checksum: string | null;
}

export interface ResolvedSource {
  reference: SourceReference;
  /** Commit the ref resolved to (git sources only) */
  commit: string | null;
  entries: SourceEntry[];
}

/**
 * Entry of a remote tree listing.
 */
export interface TreeEntry {
  path: string;
  /** Git blob id, comparable with DatasetFile.checksum */
  oid: string;
  size: number | null;
}

export type ContentStream = AsyncIterable<Uint8Array>;

export type FileKind = 'file' | 'directory';

export interface FileStat {
  kind: FileKind;
  size: number;
  isSymlink: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Provider records
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reference to a dataset held by a provider, produced by URI matching.
 */
export interface ProviderRef {
  provider: ProviderName;
  uri: string;
  /** Provider-side identifier (record id, persistent id, dataset id) */
  id: string;
}

export interface ProviderDatasetRecord {
  ref: ProviderRef;
  title: string;
  description: string;
  creators: Creator[];
  keywords: string[];
  license: string | null;
  language: string | null;
  datePublished: string | null;
  version: string | null;
}

export interface ProviderFile {
  path: string;
  size: number | null;
  url: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_DATA_DIR = 'data';
export const DEFAULT_METADATA_DIR = '.datasets';
export const DEFAULT_TRANSFER_CONCURRENCY = 4;
export const HEAD_SNAPSHOT = 'HEAD';
