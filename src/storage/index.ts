/**
 * @fileoverview Barrel file for the storage module.
 * This file re-exports the main storage service, the provider contract, and the
 * concrete providers, providing a single entry point to the storage layer.
 * @module src/storage
 */

export type {
  AddOptions,
  IStorageEndpointFactory,
  IStorageProvider,
  StorageContent,
  StorageItem,
} from './core/IStorageProvider.js';
export { StorageItemKind } from './core/IStorageProvider.js';
export { runInBatches } from './core/batching.js';
export {
  createStorageProvider,
  type StorageFactoryDeps,
} from './core/storageFactory.js';
export { StorageService } from './core/StorageService.js';
export * from './core/storageValidation.js';

export type {
  BlobEndpoint,
  BlobHierarchyItem,
} from './providers/azureBlob/azureBlob.types.js';
export {
  AzureBlobEndpoint,
  AzureBlobEndpointFactory,
} from './providers/azureBlob/azureBlobEndpoint.js';
export {
  AzureBlobProvider,
  type AzureBlobProviderOptions,
} from './providers/azureBlob/azureBlobProvider.js';
export { DrivePathResolver } from './providers/googleDrive/drivePathResolver.js';
export type {
  DriveEndpoint,
  DriveFileRecord,
  DrivePermission,
  HierarchicalStorageItem,
} from './providers/googleDrive/googleDrive.types.js';
export {
  GoogleDriveEndpoint,
  GoogleDriveEndpointFactory,
} from './providers/googleDrive/googleDriveEndpoint.js';
export {
  buildFileLink,
  extractFileIdFromLink,
  GoogleDriveProvider,
  type GoogleDriveProviderOptions,
} from './providers/googleDrive/googleDriveProvider.js';
export { InMemoryProvider } from './providers/inMemory/inMemoryProvider.js';
export {
  LocalDiskProvider,
  type LocalDiskProviderOptions,
} from './providers/localDisk/localDiskProvider.js';
