/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Project layout
  PROJECT_DIR: Type.String({ minLength: 1 }),
  DATA_DIR: Type.String({ minLength: 1, default: 'data' }),
  METADATA_DIR: Type.String({ minLength: 1, default: '.datasets' }),

  // Git
  GIT_CACHE_DIR: Type.Optional(Type.String({ minLength: 1 })),
  GIT_HOSTS: Type.String({ default: 'github.com,gitlab.com,bitbucket.org' }),

  // Transfers
  TRANSFER_CONCURRENCY: Type.Integer({ minimum: 1, maximum: 64, default: 4 }),
  NETWORK_RETRIES: Type.Integer({ minimum: 0, maximum: 10, default: 3 }),
  RETRY_DELAY_MS: Type.Integer({ minimum: 0, default: 500 }),

  // Providers
  ZENODO_URL: Type.String({ default: 'https://zenodo.org' }),
  ZENODO_ACCESS_TOKEN: Type.Optional(Type.String()),
  DATAVERSE_SERVER_URL: Type.Optional(Type.String()),
  DATAVERSE_NAME: Type.Optional(Type.String()),
  DATAVERSE_ACCESS_TOKEN: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number.parseInt(value, 10) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    PROJECT_DIR: env['PROJECT_DIR'] ?? process.cwd(),
    DATA_DIR: env['DATA_DIR'] ?? 'data',
    METADATA_DIR: env['METADATA_DIR'] ?? '.datasets',
    GIT_CACHE_DIR: env['GIT_CACHE_DIR'],
    GIT_HOSTS: env['GIT_HOSTS'] ?? 'github.com,gitlab.com,bitbucket.org',
    TRANSFER_CONCURRENCY: parseInteger(env['TRANSFER_CONCURRENCY'], 4),
    NETWORK_RETRIES: parseInteger(env['NETWORK_RETRIES'], 3),
    RETRY_DELAY_MS: parseInteger(env['RETRY_DELAY_MS'], 500),
    ZENODO_URL: env['ZENODO_URL'] ?? 'https://zenodo.org',
    ZENODO_ACCESS_TOKEN: env['ZENODO_ACCESS_TOKEN'],
    DATAVERSE_SERVER_URL: env['DATAVERSE_SERVER_URL'],
    DATAVERSE_NAME: env['DATAVERSE_NAME'],
    DATAVERSE_ACCESS_TOKEN: env['DATAVERSE_ACCESS_TOKEN'],
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  project: {
    rootDir: env.PROJECT_DIR,
    /** Directory (project-relative) holding each dataset's data directory */
    dataDir: env.DATA_DIR,
    /** Directory (project-relative) holding dataset metadata and tags */
    metadataDir: env.METADATA_DIR,
  },
  git: {
    cacheDir: env.GIT_CACHE_DIR,
    hosts: env.GIT_HOSTS.split(',')
      .map((host) => host.trim())
      .filter(Boolean),
  },
  transfer: {
    concurrency: env.TRANSFER_CONCURRENCY,
    retries: env.NETWORK_RETRIES,
    retryDelayMs: env.RETRY_DELAY_MS,
  },
  providers: {
    zenodo: {
      baseUrl: env.ZENODO_URL,
      accessToken: env.ZENODO_ACCESS_TOKEN,
    },
    dataverse: {
      serverUrl: env.DATAVERSE_SERVER_URL,
      dataverseName: env.DATAVERSE_NAME,
      accessToken: env.DATAVERSE_ACCESS_TOKEN,
    },
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
