/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, type LogLevel } from './Logger.js';
export { ConfigError, ProviderError, IPLookupError } from './errors.js';
export { Application, createApplication, type ApplicationOptions, type Reconciler } from './Application.js';
