// Persistence & storage
export { createYamlDatasetStore, type YamlDatasetStoreOptions } from './shell/repo/yaml-dataset-store.js';
export { createGitDatasetHistory, type GitDatasetHistoryOptions } from './shell/repo/dataset-history.js';
export { createFsStorage } from './shell/storage/fs-storage.js';
export { computeBlobChecksum, computeFileChecksum } from './shell/storage/checksum.js';
export { createArchiveExtractor } from './shell/archive/extract.js';

// Version control
export { createGitRepository, type GitRepositoryOptions } from './shell/git/git-repository.js';
export { runGit, type GitRunner } from './shell/git/git-cli.js';
export {
  createLocalContext,
  createRemoteContext,
  gitCheckout,
  type Checkout,
  type RemoteContextOptions,
  type WorkingContext,
} from './shell/context/working-context.js';

// Providers
export { createHttpClient, type FetchFn, type HttpClient } from './shell/providers/http.js';
export { createZenodoClient } from './shell/providers/zenodo.js';
export { createDataverseClient, DEFAULT_DATAVERSE_SERVER } from './shell/providers/dataverse.js';
export { createProjectClient } from './shell/providers/project.js';
export {
  createDoiResolver,
  createProviderClients,
  type ProviderClientsOptions,
} from './shell/providers/registry.js';

// Progress
export { createLoggerProgress } from './shell/progress/logger-progress.js';

// Use cases
export { createDataset, buildDataset } from './core/usecases/create-dataset.js';
export { editDataset } from './core/usecases/edit-dataset.js';
export { removeDataset } from './core/usecases/remove-dataset.js';
export { listDatasets } from './core/usecases/list-datasets.js';
export { listFiles } from './core/usecases/list-files.js';
export { unlinkFiles } from './core/usecases/unlink-files.js';
export { addFiles } from './core/usecases/add-files.js';
export { updateDatasets } from './core/usecases/update-datasets.js';
export { tagDataset, addTag } from './core/usecases/tag-dataset.js';
export { removeTags } from './core/usecases/remove-tags.js';
export { listTags } from './core/usecases/list-tags.js';
export { importDataset } from './core/usecases/import-dataset.js';
export { exportDataset } from './core/usecases/export-dataset.js';
export type { CreateDatasetDeps, CreateDatasetInput, CreateDatasetResult } from './core/usecases/create-dataset.js';
export type { EditDatasetDeps, EditDatasetInput, EditDatasetResult } from './core/usecases/edit-dataset.js';
export type { AddFilesDeps, AddFilesInput, AddFilesResult } from './core/usecases/add-files.js';
export type {
  DatasetUpdateOutcome,
  UpdateDatasetsDeps,
  UpdateDatasetsInput,
  UpdateReport,
} from './core/usecases/update-datasets.js';
export type { TagDatasetInput } from './core/usecases/tag-dataset.js';
export type { RemoveTagsInput, RemoveTagsResult } from './core/usecases/remove-tags.js';
export type { ImportDatasetDeps, ImportDatasetInput, ImportDatasetResult } from './core/usecases/import-dataset.js';
export type { ExportDatasetDeps, ExportDatasetInput, ExportDatasetResult } from './core/usecases/export-dataset.js';
export type { ListDatasetsInput } from './core/usecases/list-datasets.js';
export type { ListFilesInput } from './core/usecases/list-files.js';
export type { UnlinkFilesInput } from './core/usecases/unlink-files.js';

// Source resolution
export { classifySource, resolveSources, type SourceClassification } from './core/source-resolver.js';

// Output
export {
  formatDatasets,
  formatFiles,
  formatTags,
  DEFAULT_DATASET_COLUMNS,
  DEFAULT_FILE_COLUMNS,
  DEFAULT_TAG_COLUMNS,
  type FormatOptions,
  type OutputFormat,
} from './core/format.js';
export type { DatasetFileView, DatasetView, TagView } from './core/views.js';

// Ports
export {
  noopProgress,
  nonInteractive,
  noTokens,
  systemClock,
  type ArchiveExtractor,
  type Clock,
  type DatasetHistory,
  type DatasetStore,
  type DoiResolver,
  type FileSystemPort,
  type Interaction,
  type ProgressSink,
  type ProgressSinkFactory,
  type ProjectLayout,
  type ProviderClient,
  type RepositoryPort,
  type TokenProvider,
  type UrlReader,
} from './core/ports.js';

// Types
export type {
  Creator,
  Dataset,
  DatasetFile,
  ProviderName,
  ProviderOrigin,
  SourceKind,
  Tag,
} from './core/types.js';

// Errors
export type { DatasetError } from './core/errors.js';
