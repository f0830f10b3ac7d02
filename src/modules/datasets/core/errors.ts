/**
 * Datasets Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Transient failure talking to a git remote or provider.
 */
export interface NetworkError {
  readonly type: 'NetworkError';
  readonly message: string;
  readonly url: string;
  readonly retryable: boolean;
  readonly status?: number | undefined;
  readonly cause?: unknown;
}

/**
 * Local filesystem failure.
 */
export interface StorageError {
  readonly type: 'StorageError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

/**
 * A git command failed for a reason other than a missing ref.
 */
export interface GitError {
  readonly type: 'GitError';
  readonly message: string;
  readonly uri: string;
  readonly stderr: string;
}

/**
 * Provider answered with an unexpected status or payload.
 */
export interface ProviderError {
  readonly type: 'ProviderError';
  readonly message: string;
  readonly provider: string;
  readonly status?: number | undefined;
}

/**
 * Metadata file could not be parsed or failed schema validation.
 */
export interface MetadataError {
  readonly type: 'MetadataError';
  readonly message: string;
  readonly path: string;
  readonly details: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface ReferenceNotFoundError {
  readonly type: 'ReferenceNotFoundError';
  readonly message: string;
  readonly uri: string;
  readonly ref: string;
}

export interface DestinationConflictError {
  readonly type: 'DestinationConflictError';
  readonly message: string;
  readonly dataset: string;
  readonly destination: string;
}

export interface IncompatibleFilterError {
  readonly type: 'IncompatibleFilterError';
  readonly message: string;
  readonly dataset: string;
}

export interface LocalModificationError {
  readonly type: 'LocalModificationError';
  readonly message: string;
  readonly dataset: string;
  readonly paths: string[];
}

export interface InvalidAccessTokenError {
  readonly type: 'InvalidAccessTokenError';
  readonly message: string;
  readonly provider: string;
  readonly accessTokenUrl: string;
}

export interface DatasetNotFoundError {
  readonly type: 'DatasetNotFound';
  readonly message: string;
  /** Dataset name or remote identifier */
  readonly identifier: string;
}

export interface DuplicateTagError {
  readonly type: 'DuplicateTagError';
  readonly message: string;
  readonly dataset: string;
  readonly tag: string;
}

export interface TagNotFoundError {
  readonly type: 'TagNotFoundError';
  readonly message: string;
  readonly dataset: string;
  readonly tag: string;
}

export interface DatasetExistsError {
  readonly type: 'DatasetExistsError';
  readonly message: string;
  readonly name: string;
}

export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
}

export interface InvalidSourceError {
  readonly type: 'InvalidSourceError';
  readonly message: string;
  readonly uri: string;
}

/**
 * A write would break a dataset invariant; nothing is persisted.
 */
export interface InvariantViolationError {
  readonly type: 'InvariantViolationError';
  readonly message: string;
  readonly dataset: string;
  readonly details: string[];
}

export interface OperationCancelledError {
  readonly type: 'OperationCancelledError';
  readonly message: string;
}

export interface UnsupportedOperationError {
  readonly type: 'UnsupportedOperationError';
  readonly message: string;
  readonly provider: string;
  readonly operation: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type DatasetError =
  | NetworkError
  | StorageError
  | GitError
  | ProviderError
  | MetadataError
  | ReferenceNotFoundError
  | DestinationConflictError
  | IncompatibleFilterError
  | LocalModificationError
  | InvalidAccessTokenError
  | DatasetNotFoundError
  | DuplicateTagError
  | TagNotFoundError
  | DatasetExistsError
  | InvalidInputError
  | InvalidSourceError
  | InvariantViolationError
  | OperationCancelledError
  | UnsupportedOperationError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createNetworkError = (
  url: string,
  message: string,
  options: { retryable?: boolean; status?: number; cause?: unknown } = {}
): NetworkError => ({
  type: 'NetworkError',
  message: `${message} (${url})`,
  url,
  retryable: options.retryable ?? true,
  status: options.status,
  cause: options.cause,
});

export const createStorageError = (path: string, cause: unknown): StorageError => ({
  type: 'StorageError',
  message: `Filesystem operation failed at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
  path,
  cause,
});

export const createGitError = (uri: string, message: string, stderr: string): GitError => ({
  type: 'GitError',
  message: `${message} (${uri})${stderr.trim() !== '' ? `: ${stderr.trim()}` : ''}`,
  uri,
  stderr,
});

export const createProviderError = (
  provider: string,
  message: string,
  status?: number
): ProviderError => ({
  type: 'ProviderError',
  message: `${provider}: ${message}`,
  provider,
  status,
});

export const createMetadataError = (
  path: string,
  message: string,
  details: string[] = []
): MetadataError => ({
  type: 'MetadataError',
  message: `${message} (${path})`,
  path,
  details,
});

export const createReferenceNotFoundError = (uri: string, ref: string): ReferenceNotFoundError => ({
  type: 'ReferenceNotFoundError',
  message: `Reference '${ref}' does not name a branch, tag or commit in ${uri}`,
  uri,
  ref,
});

export const createDestinationConflictError = (
  dataset: string,
  destination: string,
  reason: string
): DestinationConflictError => ({
  type: 'DestinationConflictError',
  message: `Cannot add to '${destination}' in dataset '${dataset}': ${reason}`,
  dataset,
  destination,
});

export const createIncompatibleFilterError = (dataset: string): IncompatibleFilterError => ({
  type: 'IncompatibleFilterError',
  message: `Dataset '${dataset}' was imported from a provider and is updated as a whole; --include/--exclude cannot be used`,
  dataset,
});

export const createLocalModificationError = (
  dataset: string,
  paths: string[]
): LocalModificationError => ({
  type: 'LocalModificationError',
  message: `Dataset '${dataset}' has local modifications that an update would discard: ${paths.join(', ')}`,
  dataset,
  paths,
});

export const createInvalidAccessTokenError = (
  provider: string,
  accessTokenUrl: string
): InvalidAccessTokenError => ({
  type: 'InvalidAccessTokenError',
  message: `Missing or rejected access token for ${provider}. Create one at: ${accessTokenUrl}`,
  provider,
  accessTokenUrl,
});

export const createDatasetNotFoundError = (identifier: string): DatasetNotFoundError => ({
  type: 'DatasetNotFound',
  message: `Dataset '${identifier}' not found`,
  identifier,
});

export const createDuplicateTagError = (dataset: string, tag: string): DuplicateTagError => ({
  type: 'DuplicateTagError',
  message: `Tag '${tag}' already exists on dataset '${dataset}'; use force to overwrite it`,
  dataset,
  tag,
});

export const createTagNotFoundError = (dataset: string, tag: string): TagNotFoundError => ({
  type: 'TagNotFoundError',
  message: `Tag '${tag}' not found on dataset '${dataset}'`,
  dataset,
  tag,
});

export const createDatasetExistsError = (name: string): DatasetExistsError => ({
  type: 'DatasetExistsError',
  message: `Dataset '${name}' already exists`,
  name,
});

export const createInvalidInputError = (field: string, message: string): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
});

export const createInvalidSourceError = (uri: string, message: string): InvalidSourceError => ({
  type: 'InvalidSourceError',
  message: `${message}: ${uri}`,
  uri,
});

export const createInvariantViolationError = (
  dataset: string,
  details: string[]
): InvariantViolationError => ({
  type: 'InvariantViolationError',
  message: `Refusing to save dataset '${dataset}': ${details.join('; ')}`,
  dataset,
  details,
});

export const createOperationCancelledError = (message: string): OperationCancelledError => ({
  type: 'OperationCancelledError',
  message,
});

export const createUnsupportedOperationError = (
  provider: string,
  operation: string
): UnsupportedOperationError => ({
  type: 'UnsupportedOperationError',
  message: `Provider '${provider}' does not support ${operation}`,
  provider,
  operation,
});

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const isRetryableError = (error: DatasetError): boolean =>
  error.type === 'NetworkError' && error.retryable;

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
