/**
 * Source classification and resolution.
 *
 * A URI is classified by its syntax only. Resolution then turns it into
 * concrete entries: remote trees are listed at the resolved commit, local
 * directories are walked.
 */

import path, { posix } from 'node:path';
import { fileURLToPath } from 'node:url';

import { err, ok, type Result } from 'neverthrow';

import {
  createDatasetNotFoundError,
  createInvalidInputError,
  createInvalidSourceError,
  type DatasetError,
} from './errors.js';
import { matchesSourcePattern, normalizeSourcePath, relativeTargetFor } from './filters.js';

import type {
  DoiResolver,
  FileSystemPort,
  ProviderClient,
  RepositoryPort,
} from './ports.js';
import type { ProviderRef, ResolvedSource, SourceEntry } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────────────────

export type SourceClassification =
  | { kind: 'local'; path: string }
  | { kind: 'git'; uri: string }
  | { kind: 'url'; uri: string }
  | { kind: 'provider'; client: ProviderClient; ref: ProviderRef }
  /** A DOI no provider grammar recognises; needs resolving first */
  | { kind: 'doi'; doi: string };

export interface ClassifyOptions {
  gitHosts: readonly string[];
  providers: readonly ProviderClient[];
}

const SCHEME_RE = /^([a-z][a-z0-9+.-]*):\/\//i;
const BARE_SSH_RE = /^[\w.-]+@[\w.-]+:(?!\/)\S+$/;
const DOI_RE = /^(?:doi:|https?:\/\/(?:dx\.)?doi\.org\/)?(10\.\d{4,9}\/\S+)$/i;
const GIT_SCHEMES = new Set(['ssh', 'git', 'git+ssh', 'git+https', 'git+http']);

const matchProvider = (
  uri: string,
  providers: readonly ProviderClient[]
): SourceClassification | null => {
  for (const client of providers) {
    const ref = client.parseUri(uri);
    if (ref !== null) {
      return { kind: 'provider', client, ref };
    }
  }
  return null;
};

const isGitHost = (hostname: string, gitHosts: readonly string[]): boolean =>
  gitHosts.some((host) => hostname === host || hostname.endsWith(`.${host}`));

export const classifySource = (
  uri: string,
  options: ClassifyOptions
): Result<SourceClassification, DatasetError> => {
  const trimmed = uri.trim();
  if (trimmed === '') {
    return err(createInvalidInputError('uri', 'A source is required'));
  }

  const doi = DOI_RE.exec(trimmed);
  if (doi !== null) {
    return ok(matchProvider(trimmed, options.providers) ?? { kind: 'doi', doi: doi[1] ?? trimmed });
  }

  if (BARE_SSH_RE.test(trimmed)) {
    return ok({ kind: 'git', uri: trimmed });
  }

  const scheme = SCHEME_RE.exec(trimmed)?.[1]?.toLowerCase();
  if (scheme === undefined) {
    return ok({ kind: 'local', path: trimmed });
  }

  if (scheme === 'file') {
    return ok({ kind: 'local', path: fileURLToPath(trimmed) });
  }

  if (GIT_SCHEMES.has(scheme)) {
    return ok({ kind: 'git', uri: trimmed.replace(/^git\+/i, '') });
  }

  if (scheme !== 'http' && scheme !== 'https') {
    return err(createInvalidSourceError(trimmed, `Unsupported URI scheme '${scheme}'`));
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch (error) {
    return err(createInvalidSourceError(trimmed, `Malformed URL (${String(error)})`));
  }

  if (url.pathname.endsWith('.git')) {
    return ok({ kind: 'git', uri: trimmed });
  }

  const provider = matchProvider(trimmed, options.providers);
  if (provider !== null) {
    return ok(provider);
  }

  if (isGitHost(url.hostname, options.gitHosts)) {
    return ok({ kind: 'git', uri: trimmed });
  }

  return ok({ kind: 'url', uri: trimmed });
};

// ─────────────────────────────────────────────────────────────────────────────
// Provider references
// ─────────────────────────────────────────────────────────────────────────────

export interface ResolveProviderDeps extends ClassifyOptions {
  doiResolver: DoiResolver;
}

export interface ProviderMatch {
  client: ProviderClient;
  ref: ProviderRef;
}

/**
 * Finds the provider variant for a DOI or provider URL. DOIs that no grammar
 * recognises are resolved to their landing URL and matched again.
 */
export const resolveProviderReference = async (
  deps: ResolveProviderDeps,
  uri: string
): Promise<Result<ProviderMatch, DatasetError>> => {
  const classified = classifySource(uri, deps);
  if (classified.isErr()) {
    return err(classified.error);
  }

  let classification = classified.value;

  if (classification.kind === 'doi') {
    const landing = await deps.doiResolver.resolve(classification.doi);
    if (landing.isErr()) {
      return err(landing.error);
    }
    if (landing.value === null) {
      return err(createDatasetNotFoundError(uri));
    }
    const reclassified = classifySource(landing.value, deps);
    if (reclassified.isErr()) {
      return err(reclassified.error);
    }
    classification = reclassified.value;
  }

  if (classification.kind !== 'provider') {
    return err(createInvalidSourceError(uri, 'No provider recognises this identifier'));
  }

  return ok({ client: classification.client, ref: classification.ref });
};

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

export interface ResolveSourcesDeps extends ClassifyOptions {
  repository: RepositoryPort;
  fileSystem: FileSystemPort;
  /** Base for relative local paths */
  rootDir: string;
}

export interface ResolveSourcesInput {
  uri: string;
  /** Sub-path patterns inside the source; empty selects everything */
  sources?: readonly string[] | undefined;
  ref?: string | null | undefined;
}

const urlBasename = (uri: string): string => {
  const pathname = new URL(uri).pathname;
  const base = posix.basename(decodeURIComponent(pathname));
  return base === '' ? 'index.html' : base;
};

const resolveGit = async (
  deps: ResolveSourcesDeps,
  uri: string,
  patterns: readonly (string | null)[],
  ref: string | null
): Promise<Result<ResolvedSource[], DatasetError>> => {
  const commitResult = await deps.repository.resolveRef(uri, ref);
  if (commitResult.isErr()) {
    return err(commitResult.error);
  }
  const commit = commitResult.value;

  const resolved: ResolvedSource[] = [];
  for (const pattern of patterns) {
    const tree = await deps.repository.listTree(uri, commit, pattern);
    if (tree.isErr()) {
      return err(tree.error);
    }
    if (tree.value.length === 0) {
      return err(createInvalidSourceError(uri, `No files match '${pattern ?? '*'}' at ${commit}`));
    }

    resolved.push({
      reference: { kind: 'git', uri, path: pattern, ref },
      commit,
      entries: tree.value.map((entry) => ({
        sourcePath: entry.path,
        relativeTarget: relativeTargetFor(entry.path, pattern),
        size: entry.size,
        checksum: entry.oid,
      })),
    });
  }

  return ok(resolved);
};

const resolveLocal = async (
  deps: ResolveSourcesDeps,
  localPath: string,
  patterns: readonly (string | null)[]
): Promise<Result<ResolvedSource[], DatasetError>> => {
  const absolute = path.resolve(deps.rootDir, localPath);
  const statResult = await deps.fileSystem.stat(absolute);
  if (statResult.isErr()) {
    return err(statResult.error);
  }

  const stat = statResult.value;
  if (stat === null) {
    return err(createInvalidSourceError(absolute, 'Source path does not exist'));
  }

  if (stat.kind === 'file') {
    return ok([
      {
        reference: { kind: 'local', uri: absolute, path: null, ref: null },
        commit: null,
        entries: [
          {
            sourcePath: absolute,
            relativeTarget: path.basename(absolute),
            size: stat.size,
            checksum: null,
          },
        ],
      },
    ]);
  }

  const walked = await deps.fileSystem.walk(absolute);
  if (walked.isErr()) {
    return err(walked.error);
  }

  const dirName = path.basename(absolute);
  const resolved: ResolvedSource[] = [];

  for (const pattern of patterns) {
    const entries: SourceEntry[] = walked.value
      .filter((relative) => matchesSourcePattern(relative, pattern))
      .map((relative) => ({
        sourcePath: path.join(absolute, ...relative.split('/')),
        relativeTarget:
          pattern === null ? `${dirName}/${relative}` : relativeTargetFor(relative, pattern),
        size: null,
        checksum: null,
      }));

    if (entries.length === 0) {
      return err(createInvalidSourceError(absolute, `No files match '${pattern ?? '*'}'`));
    }

    resolved.push({
      reference: { kind: 'local', uri: absolute, path: pattern, ref: null },
      commit: null,
      entries,
    });
  }

  return ok(resolved);
};

/**
 * Resolves a source URI into one ResolvedSource per sub-path pattern.
 * Provider references are rejected here; they go through import.
 */
export const resolveSources = async (
  deps: ResolveSourcesDeps,
  input: ResolveSourcesInput
): Promise<Result<ResolvedSource[], DatasetError>> => {
  const classified = classifySource(input.uri, deps);
  if (classified.isErr()) {
    return err(classified.error);
  }

  const classification = classified.value;
  const ref = input.ref ?? null;
  const normalized = (input.sources ?? []).map(normalizeSourcePath);
  const patterns: (string | null)[] = normalized.length > 0 ? normalized : [null];

  if (ref !== null && classification.kind !== 'git') {
    return err(createInvalidInputError('ref', 'A ref can only be used with git sources'));
  }

  switch (classification.kind) {
    case 'git':
      return resolveGit(deps, classification.uri, patterns, ref);
    case 'local':
      return resolveLocal(deps, classification.path, patterns);
    case 'url':
      if (normalized.length > 0) {
        return err(
          createInvalidInputError('sources', 'Sub-path patterns cannot be used with URL sources')
        );
      }
      return ok([
        {
          reference: { kind: 'url', uri: classification.uri, path: null, ref: null },
          commit: null,
          entries: [
            {
              sourcePath: classification.uri,
              relativeTarget: urlBasename(classification.uri),
              size: null,
              checksum: null,
            },
          ],
        },
      ]);
    case 'provider':
    case 'doi':
      return err(
        createInvalidSourceError(
          input.uri,
          'Provider datasets cannot be added file by file; import the dataset instead'
        )
      );
  }
};
