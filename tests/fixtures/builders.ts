/**
 * Test data builders/factories
 * Provides sensible defaults for test entities
 */

import { err, ok } from 'neverthrow';

import { createConfig, parseEnv, type AppConfig } from '@/infra/config/env.js';
import { createNetworkError } from '@/modules/datasets/core/errors.js';
import { noopProgress } from '@/modules/datasets/core/ports.js';

import {
  bytes,
  fixedClock,
  makeFakeDatasetStore,
  makeFakeFileSystem,
  makeFakeInteraction,
  makeFakeProvider,
  makeFakeRepository,
  makeFakeTokens,
  makeSequentialIds,
  makeSilentLogger,
  streamOf,
  type FakeDatasetStore,
  type FakeFileSystem,
  type FakeInteraction,
  type FakeProvider,
  type FakeRepository,
} from './fakes.js';

import type {
  ArchiveExtractor,
  DoiResolver,
  ProgressSinkFactory,
  ProjectLayout,
  TokenProvider,
  UrlReader,
} from '@/modules/datasets/core/ports.js';
import type { Dataset, DatasetFile } from '@/modules/datasets/core/types.js';
import type { Logger } from 'pino';

export const ROOT_DIR = '/project';
export const DATA_DIR = 'data';
export const NOW = '2024-01-02T03:04:05.000Z';

/**
 * Create an application config with defaults for tests
 */
export const makeTestConfig = (env: NodeJS.ProcessEnv = {}): AppConfig =>
  createConfig(parseEnv({ NODE_ENV: 'test', LOG_LEVEL: 'silent', PROJECT_DIR: ROOT_DIR, ...env }));

export const makeTestDataset = (overrides: Partial<Dataset> = {}): Dataset => ({
  id: `ds-${overrides.name ?? 'demo'}`,
  name: 'demo',
  title: 'Demo',
  description: '',
  creators: [{ name: 'Ada Lovelace', email: 'ada@example.com', affiliation: null }],
  keywords: [],
  license: null,
  language: null,
  dateCreated: '2024-01-01T00:00:00.000Z',
  datePublished: null,
  version: null,
  importedFrom: null,
  files: [],
  ...overrides,
});

export const makeTestFile = (
  datasetName: string,
  path: string,
  overrides: Partial<DatasetFile> = {}
): DatasetFile => ({
  path,
  fullPath: `${DATA_DIR}/${datasetName}/${path}`,
  sourceKind: 'local',
  sourceUrl: null,
  sourcePath: null,
  requestedRef: null,
  originRef: null,
  added: '2024-01-01T00:00:00.000Z',
  external: false,
  checksum: null,
  creators: [],
  ...overrides,
});

/**
 * Absolute path of a dataset file in the fake filesystem
 */
export const dataPath = (datasetName: string, path: string): string =>
  `${ROOT_DIR}/${DATA_DIR}/${datasetName}/${path}`;

/**
 * Extractor that reads `.zip` payloads as newline-separated `name=content`
 * lines, so archive handling runs without real archives.
 */
export const makeFakeExtractor = (fileSystem: FakeFileSystem): ArchiveExtractor => ({
  isArchive: (path) => path.endsWith('.zip'),
  async extract(archivePath) {
    const text = fileSystem.readText(archivePath) ?? '';
    const dir = archivePath.slice(0, archivePath.lastIndexOf('/'));
    const stem = archivePath.slice(dir.length + 1).replace(/\.zip$/, '');
    const extracted: string[] = [];
    for (const line of text.split('\n').filter((entry) => entry !== '')) {
      const [name = '', content = ''] = line.split('=');
      fileSystem.putFile(`${dir}/${stem}/${name}`, content);
      extracted.push(`${stem}/${name}`);
    }
    return ok(extracted);
  },
});

/**
 * URL reader serving fixed bodies; unknown URLs answer 404.
 */
export const makeFakeUrlReader = (bodies: Record<string, string> = {}): UrlReader => ({
  async open(url) {
    const body = bodies[url];
    return body === undefined
      ? err(createNetworkError(url, 'HTTP 404 Not Found', { retryable: false, status: 404 }))
      : ok(streamOf(bytes(body)));
  },
});

export const makeFakeDoiResolver = (targets: Record<string, string> = {}): DoiResolver => ({
  async resolve(doi) {
    return ok(targets[doi] ?? null);
  },
});

export interface TestDeps {
  store: FakeDatasetStore;
  fileSystem: FakeFileSystem;
  repository: FakeRepository;
  provider: FakeProvider;
  providers: FakeProvider[];
  extractor: ArchiveExtractor;
  urlReader: UrlReader;
  doiResolver: DoiResolver;
  layout: ProjectLayout;
  dataDir: string;
  gitHosts: string[];
  interaction: FakeInteraction;
  tokens: TokenProvider;
  clock: () => Date;
  createId: () => string;
  progress: ProgressSinkFactory;
  concurrency: number;
  logger: Logger;
}

/**
 * Every dependency a dataset use case takes, backed by fakes
 */
export const makeTestDeps = (overrides: Partial<TestDeps> = {}): TestDeps => {
  const fileSystem = overrides.fileSystem ?? makeFakeFileSystem();
  const provider = overrides.provider ?? makeFakeProvider();

  return {
    store: makeFakeDatasetStore(),
    fileSystem,
    repository: makeFakeRepository(),
    provider,
    providers: [provider],
    extractor: makeFakeExtractor(fileSystem),
    urlReader: makeFakeUrlReader(),
    doiResolver: makeFakeDoiResolver(),
    layout: { rootDir: ROOT_DIR, dataDir: DATA_DIR },
    dataDir: DATA_DIR,
    gitHosts: ['github.com', 'gitlab.com'],
    interaction: makeFakeInteraction(),
    tokens: makeFakeTokens(),
    clock: fixedClock(NOW),
    createId: makeSequentialIds(),
    progress: noopProgress,
    concurrency: 2,
    logger: makeSilentLogger(),
    ...overrides,
  };
};
