/**
 * Engine factory
 * Wires the dataset use cases to their shell adapters for one project directory
 */

import { randomUUID } from 'node:crypto';

import {
  addFiles,
  createArchiveExtractor,
  createDataset,
  createDoiResolver,
  createFsStorage,
  createGitDatasetHistory,
  createGitRepository,
  createHttpClient,
  createProviderClients,
  createYamlDatasetStore,
  editDataset,
  exportDataset,
  importDataset,
  listDatasets,
  listFiles,
  listTags,
  nonInteractive,
  noopProgress,
  noTokens,
  removeDataset,
  removeTags,
  systemClock,
  tagDataset,
  unlinkFiles,
  updateDatasets,
} from '../modules/datasets/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type {
  AddFilesInput,
  AddFilesResult,
  Clock,
  CreateDatasetInput,
  CreateDatasetResult,
  DatasetError,
  DatasetFileView,
  DatasetHistory,
  DatasetStore,
  DatasetView,
  DoiResolver,
  EditDatasetInput,
  EditDatasetResult,
  ExportDatasetInput,
  ExportDatasetResult,
  FetchFn,
  FileSystemPort,
  GitRunner,
  ImportDatasetInput,
  ImportDatasetResult,
  Interaction,
  ListDatasetsInput,
  ListFilesInput,
  ProgressSinkFactory,
  ProviderClient,
  RemoveTagsInput,
  RemoveTagsResult,
  RepositoryPort,
  Tag,
  TagDatasetInput,
  TagView,
  TokenProvider,
  UnlinkFilesInput,
  UpdateDatasetsInput,
  UpdateReport,
  WorkingContext,
} from '../modules/datasets/index.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export interface DatasetEngineOverrides {
  fetch?: FetchFn;
  runGit?: GitRunner;
  store?: DatasetStore;
  history?: DatasetHistory;
  fileSystem?: FileSystemPort;
  repository?: RepositoryPort;
  providers?: readonly ProviderClient[];
  doiResolver?: DoiResolver;
  interaction?: Interaction;
  tokens?: TokenProvider;
  progress?: ProgressSinkFactory;
  clock?: Clock;
  createId?: () => string;
}

export interface DatasetEngine {
  createDataset(input: CreateDatasetInput): Promise<Result<CreateDatasetResult, DatasetError>>;
  editDataset(input: EditDatasetInput): Promise<Result<EditDatasetResult, DatasetError>>;
  removeDataset(name: string): Promise<Result<DatasetView, DatasetError>>;
  listDatasets(input?: ListDatasetsInput): Promise<Result<DatasetView[], DatasetError>>;
  listFiles(input?: ListFilesInput): Promise<Result<DatasetFileView[], DatasetError>>;
  unlinkFiles(input: UnlinkFilesInput): Promise<Result<DatasetFileView[], DatasetError>>;
  addFiles(input: AddFilesInput): Promise<Result<AddFilesResult, DatasetError>>;
  updateDatasets(input?: UpdateDatasetsInput): Promise<Result<UpdateReport, DatasetError>>;
  tagDataset(input: TagDatasetInput): Promise<Result<Tag, DatasetError>>;
  removeTags(input: RemoveTagsInput): Promise<Result<RemoveTagsResult, DatasetError>>;
  listTags(name: string): Promise<Result<TagView[], DatasetError>>;
  importDataset(input: ImportDatasetInput): Promise<Result<ImportDatasetResult, DatasetError>>;
  exportDataset(input: ExportDatasetInput): Promise<Result<ExportDatasetResult, DatasetError>>;
}

/**
 * Tokens from configuration, falling back to `fallback` for providers
 * without one.
 */
export const configTokens = (config: AppConfig, fallback: TokenProvider = noTokens): TokenProvider => ({
  async getToken(provider, accessTokenUrl) {
    const configured =
      provider === 'zenodo'
        ? config.providers.zenodo.accessToken
        : provider === 'dataverse'
          ? config.providers.dataverse.accessToken
          : undefined;
    if (configured !== undefined && configured !== '') {
      return configured;
    }
    return fallback.getToken(provider, accessTokenUrl);
  },
});

export const createDatasetEngine = (
  config: AppConfig,
  logger: Logger,
  overrides: DatasetEngineOverrides = {}
): DatasetEngine => {
  const log = logger.child({ component: 'DatasetEngine' });
  const layout = { rootDir: config.project.rootDir, dataDir: config.project.dataDir };

  const http = createHttpClient({
    fetch: overrides.fetch,
    retries: config.transfer.retries,
    retryDelayMs: config.transfer.retryDelayMs,
    logger: log,
  });

  const repository =
    overrides.repository ??
    createGitRepository({
      projectDir: layout.rootDir,
      cacheDir: config.git.cacheDir,
      retries: config.transfer.retries,
      retryDelayMs: config.transfer.retryDelayMs,
      logger: log,
      run: overrides.runGit,
    });

  const store =
    overrides.store ??
    createYamlDatasetStore({
      rootDir: layout.rootDir,
      metadataDir: config.project.metadataDir,
      logger: log,
    });

  const history =
    overrides.history ??
    createGitDatasetHistory({
      repository,
      rootDir: layout.rootDir,
      metadataDir: config.project.metadataDir,
    });

  const providers =
    overrides.providers ??
    createProviderClients({
      http,
      repository,
      zenodoUrl: config.providers.zenodo.baseUrl,
      dataverseServerUrl: config.providers.dataverse.serverUrl,
      dataverseName: config.providers.dataverse.dataverseName,
      metadataDir: config.project.metadataDir,
    });

  const shared = {
    store,
    history,
    repository,
    providers,
    layout,
    dataDir: layout.dataDir,
    fileSystem: overrides.fileSystem ?? createFsStorage(),
    extractor: createArchiveExtractor(),
    urlReader: http,
    doiResolver: overrides.doiResolver ?? createDoiResolver(http),
    gitHosts: config.git.hosts,
    interaction: overrides.interaction ?? nonInteractive,
    tokens: configTokens(config, overrides.tokens),
    progress: overrides.progress ?? noopProgress,
    clock: overrides.clock ?? systemClock,
    createId: overrides.createId ?? randomUUID,
    concurrency: config.transfer.concurrency,
    logger: log,
  };

  return {
    createDataset: (input) => createDataset(shared, input),
    editDataset: (input) => editDataset(shared, input),
    removeDataset: (name) => removeDataset(shared, { name }),
    listDatasets: (input = {}) => listDatasets(shared, input),
    listFiles: (input = {}) => listFiles(shared, input),
    unlinkFiles: (input) => unlinkFiles(shared, input),
    addFiles: (input) => addFiles(shared, input),
    updateDatasets: (input = {}) => updateDatasets(shared, input),
    tagDataset: (input) => tagDataset(shared, input),
    removeTags: (input) => removeTags(shared, input),
    listTags: (name) => listTags(shared, { name }),
    importDataset: (input) => importDataset(shared, input),
    exportDataset: (input) => exportDataset(shared, input),
  };
};

/**
 * Runs `operation` against an engine bound to the context's project directory.
 */
export const withDatasetEngine = <T>(
  config: AppConfig,
  logger: Logger,
  context: WorkingContext,
  operation: (engine: DatasetEngine) => Promise<Result<T, DatasetError>>,
  overrides: DatasetEngineOverrides = {}
): Promise<Result<T, DatasetError>> =>
  context.withWorkingContext((projectDir) =>
    operation(
      createDatasetEngine(
        { ...config, project: { ...config.project, rootDir: projectDir } },
        logger,
        overrides
      )
    )
  );
