export * from './models/cslItem';
export { getRuntimeConfig, reloadRuntimeConfig } from './config/runtimeConfig';
export type { RuntimeConfig, LogLevel } from './config/runtimeConfig';
export { log, logDebug, logInfo, logWarn, logError, closeLogFile } from './services/logger';
export * from './services/errors';
export * from './services/isbn';
export * from './services/shortDoi';
export * from './services/citekey';
export * from './services/noteCodec';
export * from './services/cslSchema';
export * from './services/schemaPruner';
export * from './services/cslItem';
export * from './services/citeproc';
export * from './services/bibliography';
export { PACKAGE_NAME, PACKAGE_VERSION } from './versioning/packageVersion';
