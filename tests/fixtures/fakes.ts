/**
 * Test fakes for the dataset ports
 */

import { ok, err, type Result } from 'neverthrow';
import pinoLib, { type Logger } from 'pino';

import { readAll } from '@/common/utils/streams.js';
import {
  createDatasetNotFoundError,
  createGitError,
  createReferenceNotFoundError,
  createStorageError,
  type DatasetError,
} from '@/modules/datasets/core/errors.js';
import { matchesSourcePattern } from '@/modules/datasets/core/filters.js';
import { computeBlobChecksum } from '@/modules/datasets/shell/storage/checksum.js';

import type { FetchFn } from '@/modules/datasets/shell/providers/http.js';
import type {
  DatasetStore,
  DraftReceipt,
  ExportDraft,
  FileSystemPort,
  Interaction,
  ProviderClient,
  ProviderFileHandle,
  RepositoryPort,
  TokenProvider,
} from '@/modules/datasets/core/ports.js';
import type {
  ContentStream,
  Creator,
  Dataset,
  FileStat,
  ProviderDatasetRecord,
  ProviderName,
  Tag,
  TreeEntry,
} from '@/modules/datasets/core/types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const bytes = (text: string): Uint8Array => encoder.encode(text);

export async function* streamOf(data: Uint8Array): ContentStream {
  yield data;
}

/**
 * Stream that yields `first` and then throws.
 */
export async function* brokenStream(first: string): ContentStream {
  yield bytes(first);
  throw new Error('connection reset');
}

export const checksumOf = (text: string): string => computeBlobChecksum(bytes(text));

export const makeSilentLogger = (): Logger => pinoLib({ level: 'silent' });

export const fixedClock = (iso = '2024-01-02T03:04:05.000Z'): (() => Date) => () => new Date(iso);

export const makeSequentialIds = (prefix = 'id'): (() => string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${String(next)}`;
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Filesystem
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeFileSystem extends FileSystemPort {
  files: Map<string, Uint8Array>;
  links: Map<string, string>;
  putFile(path: string, content: string): void;
  readText(path: string): string | undefined;
  /** Paths passed to `write`, in call order */
  writes: string[];
}

/**
 * In-memory filesystem over absolute POSIX paths. Symlinks resolve one level.
 */
export const makeFakeFileSystem = (): FakeFileSystem => {
  const files = new Map<string, Uint8Array>();
  const links = new Map<string, string>();
  const writes: string[] = [];

  const resolve = (path: string): string => links.get(path) ?? path;

  const below = (dir: string): string[] =>
    [...files.keys(), ...links.keys()].filter((key) => key.startsWith(`${dir}/`));

  return {
    files,
    links,
    writes,

    putFile(path, content) {
      links.delete(path);
      files.set(path, bytes(content));
    },

    readText(path) {
      const data = files.get(resolve(path));
      return data === undefined ? undefined : decoder.decode(data);
    },

    async stat(path) {
      const data = files.get(resolve(path));
      if (data !== undefined) {
        const file: FileStat = { kind: 'file', size: data.byteLength, isSymlink: links.has(path) };
        return ok(file);
      }
      if (links.has(path) || below(path).length === 0) {
        return ok(null);
      }
      const directory: FileStat = { kind: 'directory', size: 0, isSymlink: false };
      return ok(directory);
    },

    async walk(dir) {
      return ok(below(dir).map((key) => key.slice(dir.length + 1)).sort());
    },

    async read(path) {
      const data = files.get(resolve(path));
      if (data === undefined) {
        return err(createStorageError(path, new Error('ENOENT: no such file')));
      }
      return ok(streamOf(data));
    },

    async write(path, content, onBytes) {
      writes.push(path);
      let data: Uint8Array;
      try {
        data = await readAll(
          (async function* () {
            for await (const chunk of content) {
              onBytes?.(chunk.byteLength);
              yield chunk;
            }
          })()
        );
      } catch (error) {
        return err(createStorageError(path, error));
      }
      links.delete(path);
      files.set(path, data);
      return ok({ checksum: computeBlobChecksum(data), size: data.byteLength });
    },

    async symlink(path, target) {
      files.delete(path);
      links.set(path, target);
      return ok(undefined);
    },

    async checksum(path) {
      const data = files.get(resolve(path));
      return ok(data === undefined ? null : computeBlobChecksum(data));
    },

    async remove(path) {
      files.delete(path);
      links.delete(path);
      for (const key of below(path)) {
        files.delete(key);
        links.delete(key);
      }
      return ok(undefined);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Repository
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeRemote {
  /** commit → path → content */
  commits: Record<string, Record<string, string>>;
  /** branch or tag → commit */
  refs?: Record<string, string>;
  /** Commit of the default branch */
  head: string;
  /** path → authors */
  authors?: Record<string, Creator[]>;
}

export interface FakeRepository extends RepositoryPort {
  remotes: Map<string, FakeRemote>;
  setRemote(uri: string, remote: FakeRemote): void;
  setCurrentCommit(commit: string): void;
}

export const makeFakeRepository = (currentCommit = 'project-head'): FakeRepository => {
  const remotes = new Map<string, FakeRemote>();
  let head = currentCommit;

  const treeAt = (uri: string, commit: string): Result<Record<string, string>, DatasetError> => {
    const remote = remotes.get(uri);
    if (remote === undefined) {
      return err(createGitError(uri, 'Repository not found', ''));
    }
    const tree = remote.commits[commit];
    return tree === undefined ? err(createReferenceNotFoundError(uri, commit)) : ok(tree);
  };

  return {
    remotes,

    setRemote(uri, remote) {
      remotes.set(uri, remote);
    },

    setCurrentCommit(commit) {
      head = commit;
    },

    async resolveRef(uri, ref) {
      const remote = remotes.get(uri);
      if (remote === undefined) {
        return err(createGitError(uri, 'Repository not found', ''));
      }
      if (ref === null) {
        return ok(remote.head);
      }
      const commit = remote.refs?.[ref] ?? (remote.commits[ref] !== undefined ? ref : undefined);
      return commit === undefined ? err(createReferenceNotFoundError(uri, ref)) : ok(commit);
    },

    async listTree(uri, commit, pattern) {
      const tree = treeAt(uri, commit);
      if (tree.isErr()) {
        return err(tree.error);
      }
      const entries: TreeEntry[] = Object.entries(tree.value)
        .filter(([path]) => matchesSourcePattern(path, pattern))
        .map(([path, content]) => ({
          path,
          oid: checksumOf(content),
          size: bytes(content).byteLength,
        }))
        .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
      return ok(entries);
    },

    async readBlob(uri, commit, path) {
      const tree = treeAt(uri, commit);
      if (tree.isErr()) {
        return err(tree.error);
      }
      const content = tree.value[path];
      return content === undefined
        ? err(createGitError(uri, `Path '${path}' does not exist at ${commit}`, ''))
        : ok(streamOf(bytes(content)));
    },

    async fileCreators(uri, _commit, path) {
      return ok(remotes.get(uri)?.authors?.[path] ?? []);
    },

    async currentCommit() {
      return ok(head);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeDatasetStore extends DatasetStore {
  datasets: Map<string, Dataset>;
  tags: Map<string, Tag[]>;
  saves: number;
}

/**
 * Keeps deep copies so callers cannot mutate stored state.
 */
export const makeFakeDatasetStore = (initial: Dataset[] = []): FakeDatasetStore => {
  const datasets = new Map<string, Dataset>(initial.map((dataset) => [dataset.id, structuredClone(dataset)]));
  const tags = new Map<string, Tag[]>();

  const store: FakeDatasetStore = {
    datasets,
    tags,
    saves: 0,

    async list() {
      return ok(
        [...datasets.values()]
          .map((dataset) => structuredClone(dataset))
          .sort((a, b) => a.name.localeCompare(b.name))
      );
    },

    async findByName(name) {
      const found = [...datasets.values()].find((dataset) => dataset.name === name);
      return ok(found === undefined ? null : structuredClone(found));
    },

    async save(dataset) {
      store.saves += 1;
      datasets.set(dataset.id, structuredClone(dataset));
      return ok(undefined);
    },

    async remove(dataset) {
      datasets.delete(dataset.id);
      tags.delete(dataset.id);
      return ok(undefined);
    },

    async loadTags(dataset) {
      return ok(structuredClone(tags.get(dataset.id) ?? []));
    },

    async saveTags(dataset, next) {
      tags.set(dataset.id, structuredClone(next));
      return ok(undefined);
    },
  };

  return store;
};

// ─────────────────────────────────────────────────────────────────────────────
// Provider
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeRecordInput {
  id: string;
  title?: string;
  version?: string | null;
  creators?: Creator[];
  files: Record<string, string>;
}

export interface FakeDraft {
  draft: ExportDraft;
  token: string;
  /** path → uploaded content */
  contents: Record<string, string>;
}

export interface FakeProvider extends ProviderClient {
  addRecord(input: FakeRecordInput): void;
  /** Makes `latestId` the newest version of `id` */
  setLatest(id: string, latestId: string): void;
  drafts: FakeDraft[];
}

export const FAKE_CATALOG_URL = 'https://catalog.test';

export const makeFakeProvider = (
  options: { name?: ProviderName; versioned?: boolean; exportable?: boolean } = {}
): FakeProvider => {
  const name = options.name ?? 'zenodo';
  const records = new Map<string, { record: ProviderDatasetRecord; files: Record<string, string> }>();
  const latest = new Map<string, string>();
  const drafts: FakeDraft[] = [];

  const refFor = (id: string) => ({ provider: name, uri: `${FAKE_CATALOG_URL}/records/${id}`, id });

  const addRecord = (input: FakeRecordInput): void => {
    records.set(input.id, {
      record: {
        ref: refFor(input.id),
        title: input.title ?? `Record ${input.id}`,
        description: '',
        creators: input.creators ?? [{ name: 'Ada Lovelace', email: null, affiliation: null }],
        keywords: [],
        license: null,
        language: null,
        datePublished: null,
        version: input.version ?? null,
      },
      files: input.files,
    });
  };

  return {
    name,
    versioned: options.versioned ?? true,
    exportable: options.exportable ?? true,
    drafts,
    addRecord,

    setLatest(id, latestId) {
      latest.set(id, latestId);
    },

    parseUri(uri) {
      const match = /^https:\/\/catalog\.test\/records\/([\w-]+)$/.exec(uri.trim());
      return match?.[1] === undefined ? null : refFor(match[1]);
    },

    async fetchMetadata(ref, fetchOptions = {}) {
      const id = fetchOptions.latest === true ? (latest.get(ref.id) ?? ref.id) : ref.id;
      const found = records.get(id);
      return found === undefined ? err(createDatasetNotFoundError(ref.uri)) : ok(structuredClone(found.record));
    },

    async fetchFiles(ref) {
      const found = records.get(ref.id);
      if (found === undefined) {
        return err(createDatasetNotFoundError(ref.uri));
      }
      const handles: ProviderFileHandle[] = Object.entries(found.files).map(([path, content]) => ({
        path,
        size: bytes(content).byteLength,
        url: `${ref.uri}/files/${path}`,
        open: async () => ok(streamOf(bytes(content))),
      }));
      return ok(handles);
    },

    async createDraft(draft, token): Promise<Result<DraftReceipt, DatasetError>> {
      const contents: Record<string, string> = {};
      for (const file of draft.files) {
        const opened = await file.open();
        if (opened.isErr()) {
          return err(opened.error);
        }
        contents[file.path] = decoder.decode(await readAll(opened.value));
      }

      const id = `draft-${String(drafts.length + 1)}`;
      drafts.push({ draft, token, contents });
      addRecord({ id, title: draft.title, version: draft.version, creators: draft.creators, files: contents });

      return ok({ id, uri: refFor(id).uri, published: draft.publish });
    },

    accessTokenUrl: () => `${FAKE_CATALOG_URL}/tokens`,
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Interaction & tokens
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeInteraction extends Interaction {
  prompts: string[];
  offeredTags: string[][];
}

export const makeFakeInteraction = (
  options: { confirm?: boolean; selectTag?: string | null } = {}
): FakeInteraction => {
  const prompts: string[] = [];
  const offeredTags: string[][] = [];

  return {
    prompts,
    offeredTags,
    async confirm(prompt) {
      prompts.push(prompt);
      return options.confirm ?? false;
    },
    async selectTag(tags) {
      offeredTags.push(tags.map((tag) => tag.name));
      return tags.find((tag) => tag.name === options.selectTag) ?? null;
    },
  };
};

export const makeFakeTokens = (token: string | null = 'test-secret'): TokenProvider => ({
  getToken: async () => token,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP
// ─────────────────────────────────────────────────────────────────────────────

export interface RecordedRequest {
  method: string;
  url: string;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: RequestInit['body'];
}

export type FakeRoute = (request: RecordedRequest) => Response;

export interface FakeFetch {
  fetch: FetchFn;
  requests: RecordedRequest[];
}

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

export const textResponse = (body: string, status = 200): Response => new Response(body, { status });

/**
 * Fetch stand-in keyed by `METHOD url`. Unknown routes answer 404.
 */
export const makeFakeFetch = (routes: Record<string, FakeRoute> = {}): FakeFetch => {
  const requests: RecordedRequest[] = [];

  const fetchFn: FetchFn = async (url, init = {}) => {
    const request: RecordedRequest = {
      method: init.method ?? 'GET',
      url,
      headers: Object.fromEntries(new Headers(init.headers).entries()),
      body: init.body,
    };
    requests.push(request);
    const route = routes[`${request.method} ${url}`];
    return route === undefined ? new Response('not found', { status: 404, statusText: 'Not Found' }) : route(request);
  };

  return { fetch: fetchFn, requests };
};
