import { err, ok } from 'neverthrow';

import { readCommittedDocuments } from './committed-documents.js';
import { fromDocument } from './yaml-dataset-store.js';

import type { DatasetHistory, RepositoryPort } from '../../core/ports.js';

export interface GitDatasetHistoryOptions {
  repository: RepositoryPort;
  /** Absolute project root, used as the repository URI */
  rootDir: string;
  /** Project-relative metadata directory */
  metadataDir: string;
}

/**
 * Reads `metadata.yml` files from project history. Tags are not part of the
 * listing.
 */
export const createGitDatasetHistory = (options: GitDatasetHistoryOptions): DatasetHistory => ({
  async listAt(revision) {
    const { repository, rootDir, metadataDir } = options;

    const commit = await repository.resolveRef(rootDir, revision);
    if (commit.isErr()) {
      return err(commit.error);
    }

    const documents = await readCommittedDocuments(repository, rootDir, commit.value, metadataDir);
    if (documents.isErr()) {
      return err(documents.error);
    }
    return ok(documents.value.map(fromDocument).sort((a, b) => a.name.localeCompare(b.name)));
  },
});
