/**
 * @fileoverview Public entry point of the unified storage library.
 * Call `composeContainer()` once to build the configured provider, then
 * resolve `StorageService` from the container, or construct providers directly.
 * @module src/index
 */
import 'reflect-metadata';

export { config, type AppConfig } from '@/config/index.js';
export {
  composeContainer,
  default as container,
  SecretProvider,
  StorageProvider,
  StorageService as StorageServiceToken,
} from '@/container/index.js';
export * from '@/secrets/index.js';
export * from '@/storage/index.js';
export { StorageError, StorageErrorCode } from '@/types-global/errors.js';
export { ErrorHandler } from '@/utils/internal/error-handler/index.js';
export {
  logger,
  type LogLevel,
  type StorageLogger,
} from '@/utils/internal/logger.js';
export {
  requestContextService,
  type RequestContext,
} from '@/utils/internal/requestContext.js';
