/**
 * Datasets published by another project.
 *
 * A URL of the form `https://<host>/projects/<namespace>/<project>/datasets/<id>`
 * names a dataset kept in `<host>/<namespace>/<project>.git`. Metadata and
 * content are read from the default branch through the repository port.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createDatasetNotFoundError,
  createUnsupportedOperationError,
  type DatasetError,
} from '../../core/errors.js';
import { DEFAULT_METADATA_DIR, type DatasetDocument } from '../../core/types.js';
import { readCommittedDocuments } from '../repo/committed-documents.js';

import type { ProviderClient, ProviderFileHandle, RepositoryPort } from '../../core/ports.js';
import type { ProviderDatasetRecord, ProviderRef } from '../../core/types.js';

const PATH_RE = /^\/projects\/(.+)\/datasets\/([^/]+)\/?$/;

interface ProjectLocation {
  gitUri: string;
  datasetId: string;
}

interface RemoteDataset {
  commit: string;
  document: DatasetDocument;
}

const locate = (uri: string): ProjectLocation | null => {
  if (!/^https?:\/\//i.test(uri)) {
    return null;
  }
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    return null;
  }
  const match = PATH_RE.exec(url.pathname);
  if (match?.[1] === undefined || match[2] === undefined) {
    return null;
  }
  return {
    gitUri: `${url.origin}/${match[1]}.git`,
    datasetId: decodeURIComponent(match[2]),
  };
};

export interface ProjectClientOptions {
  repository: RepositoryPort;
  /** Metadata directory inside the remote project */
  metadataDir?: string | undefined;
}

export const createProjectClient = (options: ProjectClientOptions): ProviderClient => {
  const { repository } = options;
  const metadataDir = options.metadataDir ?? DEFAULT_METADATA_DIR;
  // Metadata and file listings of one ref are read at the same commit
  const resolved = new Map<string, RemoteDataset>();

  const loadDataset = async (ref: ProviderRef): Promise<Result<RemoteDataset, DatasetError>> => {
    const location = locate(ref.uri);
    if (location === null) {
      return err(createDatasetNotFoundError(ref.uri));
    }

    const commit = await repository.resolveRef(location.gitUri, null);
    if (commit.isErr()) {
      return err(commit.error);
    }

    const documents = await readCommittedDocuments(repository, location.gitUri, commit.value, metadataDir);
    if (documents.isErr()) {
      return err(documents.error);
    }

    const document = documents.value.find(
      (candidate) => candidate.id === location.datasetId || candidate.name === location.datasetId
    );
    if (document !== undefined) {
      const remote = { commit: commit.value, document };
      resolved.set(ref.uri, remote);
      return ok(remote);
    }

    return err(createDatasetNotFoundError(ref.uri));
  };

  return {
    name: 'project',
    versioned: false,
    exportable: false,

    parseUri(uri) {
      const location = locate(uri.trim());
      return location === null
        ? null
        : { provider: 'project', uri: uri.trim(), id: location.datasetId };
    },

    // The default branch is always the newest state, so `latest` changes nothing
    async fetchMetadata(ref) {
      const remote = await loadDataset(ref);
      if (remote.isErr()) {
        return err(remote.error);
      }

      const { document, commit } = remote.value;
      const record: ProviderDatasetRecord = {
        ref,
        title: document.title,
        description: document.description,
        creators: document.creators,
        keywords: document.keywords,
        license: document.license,
        language: document.language,
        datePublished: document.datePublished,
        version: commit,
      };
      return ok(record);
    },

    async fetchFiles(ref): Promise<Result<ProviderFileHandle[], DatasetError>> {
      const cached = resolved.get(ref.uri);
      let remote: RemoteDataset;
      if (cached !== undefined) {
        remote = cached;
      } else {
        const loaded = await loadDataset(ref);
        if (loaded.isErr()) {
          return err(loaded.error);
        }
        remote = loaded.value;
      }

      const location = locate(ref.uri);
      if (location === null) {
        return err(createDatasetNotFoundError(ref.uri));
      }
      const { commit, document } = remote;

      // Linked files point outside the remote repository
      return ok(
        document.files
          .filter((file) => !file.external)
          .map((file) => ({
            path: file.path,
            size: null,
            url: location.gitUri,
            open: () => repository.readBlob(location.gitUri, commit, file.fullPath),
          }))
      );
    },

    createDraft: () => Promise.resolve(err(createUnsupportedOperationError('project', 'export'))),

    accessTokenUrl: () => '',
  };
};
