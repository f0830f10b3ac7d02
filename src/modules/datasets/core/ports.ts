/**
 * Datasets Module - Port Interfaces
 *
 * Contracts the shell layer implements. Core use cases only talk to these.
 */

import type { DatasetError } from './errors.js';
import type {
  ContentStream,
  Creator,
  Dataset,
  FileStat,
  ProviderDatasetRecord,
  ProviderFile,
  ProviderName,
  ProviderRef,
  Tag,
  TreeEntry,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Version control
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read access to git repositories (remote sources and the project itself).
 */
export interface RepositoryPort {
  /**
   * Resolves a branch, tag or commit to a commit id.
   * `null` means the remote's default branch.
   * Fails with ReferenceNotFoundError when the ref does not exist.
   */
  resolveRef(uri: string, ref: string | null): Promise<Result<string, DatasetError>>;

  /**
   * Lists blobs at a commit. When `pattern` is given only matching paths
   * are returned (see `matchesSourcePattern`).
   */
  listTree(
    uri: string,
    commit: string,
    pattern: string | null
  ): Promise<Result<TreeEntry[], DatasetError>>;

  readBlob(uri: string, commit: string, path: string): Promise<Result<ContentStream, DatasetError>>;

  /**
   * Authors of the commits that touched a path, up to `commit`.
   */
  fileCreators(uri: string, commit: string, path: string): Promise<Result<Creator[], DatasetError>>;

  /**
   * Commit currently checked out in the project.
   */
  currentCommit(): Promise<Result<string, DatasetError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Filesystem
// ─────────────────────────────────────────────────────────────────────────────

export interface WrittenFile {
  checksum: string;
  size: number;
}

/**
 * Filesystem access. All paths are absolute.
 */
export interface FileSystemPort {
  /** Follows symlinks; null when nothing exists at the path */
  stat(path: string): Promise<Result<FileStat | null, DatasetError>>;

  /** Files below a directory as sorted POSIX paths relative to it */
  walk(dir: string): Promise<Result<string[], DatasetError>>;

  read(path: string): Promise<Result<ContentStream, DatasetError>>;

  /**
   * Writes content, creating parent directories. The target only changes
   * once the whole stream has been written.
   */
  write(
    path: string,
    content: ContentStream,
    onBytes?: (bytes: number) => void
  ): Promise<Result<WrittenFile, DatasetError>>;

  /** Replaces whatever is at `path` with a symlink to `target` */
  symlink(path: string, target: string): Promise<Result<void, DatasetError>>;

  /** Git blob id of the content (links are followed); null when missing */
  checksum(path: string): Promise<Result<string | null, DatasetError>>;

  remove(path: string): Promise<Result<void, DatasetError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Persistence
// ─────────────────────────────────────────────────────────────────────────────

export interface DatasetStore {
  list(): Promise<Result<Dataset[], DatasetError>>;
  findByName(name: string): Promise<Result<Dataset | null, DatasetError>>;
  save(dataset: Dataset): Promise<Result<void, DatasetError>>;
  /** Removes metadata and tags; data files are left alone */
  remove(dataset: Dataset): Promise<Result<void, DatasetError>>;
  loadTags(dataset: Dataset): Promise<Result<Tag[], DatasetError>>;
  saveTags(dataset: Dataset, tags: Tag[]): Promise<Result<void, DatasetError>>;
}

/**
 * Datasets as committed at an earlier project revision.
 */
export interface DatasetHistory {
  listAt(revision: string): Promise<Result<Dataset[], DatasetError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Providers
// ─────────────────────────────────────────────────────────────────────────────

export interface ProviderFileHandle extends ProviderFile {
  open(): Promise<Result<ContentStream, DatasetError>>;
}

export interface ExportFile {
  path: string;
  size: number | null;
  open(): Promise<Result<ContentStream, DatasetError>>;
}

export interface ExportDraft {
  title: string;
  description: string;
  creators: Creator[];
  keywords: string[];
  license: string | null;
  language: string | null;
  /** Snapshot id being exported (tag name or commit) */
  version: string;
  files: ExportFile[];
  publish: boolean;
  dataverseServer?: string | undefined;
  dataverseName?: string | undefined;
}

export interface DraftReceipt {
  id: string;
  /** URI the draft can be imported back from, when the provider returns one */
  uri: string | null;
  published: boolean;
}

/**
 * One provider variant. Selection happens by URI grammar (`parseUri`).
 */
export interface ProviderClient {
  readonly name: ProviderName;
  /** Catalog providers hold versioned records; imports from them get a version tag */
  readonly versioned: boolean;
  /** False for read-only sources; `createDraft` then fails */
  readonly exportable: boolean;
  parseUri(uri: string): ProviderRef | null;
  /**
   * With `latest`, versioned providers return the newest version of the
   * record rather than the one `ref` points at.
   */
  fetchMetadata(
    ref: ProviderRef,
    options?: { latest?: boolean }
  ): Promise<Result<ProviderDatasetRecord, DatasetError>>;
  fetchFiles(ref: ProviderRef): Promise<Result<ProviderFileHandle[], DatasetError>>;
  createDraft(draft: ExportDraft, token: string): Promise<Result<DraftReceipt, DatasetError>>;
  accessTokenUrl(): string;
}

/**
 * Unpacks archives next to where they were downloaded.
 */
export interface ArchiveExtractor {
  isArchive(path: string): boolean;
  /**
   * Extracts next to the archive: a .zip into a directory named after it,
   * a .gz into the file it compresses. Returns POSIX paths relative to the
   * archive's directory. The archive itself is left in place.
   */
  extract(archivePath: string): Promise<Result<string[], DatasetError>>;
}

/**
 * Downloads single files from plain http(s) URLs.
 */
export interface UrlReader {
  open(url: string): Promise<Result<ContentStream, DatasetError>>;
}

/**
 * Resolves a DOI to the landing URL it points at.
 */
export interface DoiResolver {
  resolve(doi: string): Promise<Result<string | null, DatasetError>>;
}

export interface TokenProvider {
  getToken(provider: ProviderName, accessTokenUrl: string): Promise<string | null>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Interaction & progress
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decisions that a caller may delegate to a user. The engine never prompts itself.
 */
export interface Interaction {
  /** null selects the working state (HEAD) */
  selectTag(tags: readonly Tag[]): Promise<Tag | null>;
  confirm(prompt: string): Promise<boolean>;
}

export interface ProgressSink {
  onStart(label: string, totalSize: number | null): void;
  onProgress(bytes: number): void;
  onFinish(): void;
}

/**
 * Creates one sink per transfer.
 */
export type ProgressSinkFactory = () => ProgressSink;

const noopSink: ProgressSink = {
  onStart: () => undefined,
  onProgress: () => undefined,
  onFinish: () => undefined,
};

export const noopProgress: ProgressSinkFactory = () => noopSink;

/**
 * Exports HEAD and declines every confirmation.
 */
export const nonInteractive: Interaction = {
  selectTag: () => Promise.resolve(null),
  confirm: () => Promise.resolve(false),
};

export const noTokens: TokenProvider = {
  getToken: () => Promise.resolve(null),
};

// ─────────────────────────────────────────────────────────────────────────────
// Project layout
// ─────────────────────────────────────────────────────────────────────────────

export interface ProjectLayout {
  /** Absolute project root */
  rootDir: string;
  /** Project-relative directory that holds one data directory per dataset */
  dataDir: string;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
