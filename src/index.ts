export {
  configTokens,
  createDatasetEngine,
  withDatasetEngine,
  type DatasetEngine,
  type DatasetEngineOverrides,
} from './app/build-engine.js';
export { createConfig, parseEnv, type AppConfig, type Env } from './infra/config/env.js';
export { createLogger, type Logger, type LoggerConfig } from './infra/logger/index.js';
export * from './modules/datasets/index.js';
