export * from './common/errors';
export { Logger, getLogger, configureLogger } from './common/logger';
export type { LogLevel, LogFormat, LoggerOptions } from './common/logger';
export * from './detectors';
export * from './engine';
export * from './policy';
export * from './guard';
export * from './config';
export * from './reports';
export * from './scan';
export { createServer } from './api/server';
export type { ServerOptions } from './api/server';
