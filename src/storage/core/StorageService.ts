/**
 * @fileoverview Provides a singleton service for interacting with the application's storage layer.
 * This service acts as a proxy to the configured storage provider, ensuring a consistent
 * interface for all storage operations throughout the application. It receives its concrete
 * provider via dependency injection and opens a request context for every call.
 * @module src/storage/core/StorageService
 */
import type { Readable } from 'stream';
import { injectable, inject } from 'tsyringe';

import { StorageProvider } from '@/container/tokens.js';
import type {
  AddOptions,
  IStorageProvider,
  StorageContent,
  StorageItem,
} from '@/storage/core/IStorageProvider.js';
import { streamToBuffer } from '@/utils/internal/encoding.js';
import {
  requestContextService,
  type RequestContext,
} from '@/utils/internal/requestContext.js';

@injectable()
export class StorageService {
  constructor(@inject(StorageProvider) private provider: IStorageProvider) {}

  private contextFor(
    operation: string,
    parentContext?: RequestContext,
  ): RequestContext {
    return requestContextService.createRequestContext({
      operation: `StorageService.${operation}`,
      ...(parentContext ? { parentContext } : {}),
    });
  }

  add(
    path: string,
    content: StorageContent,
    options?: AddOptions,
    parentContext?: RequestContext,
  ): Promise<string> {
    return this.provider.add(
      path,
      content,
      this.contextFor('add', parentContext),
      options,
    );
  }

  delete(path: string, parentContext?: RequestContext): Promise<void> {
    return this.provider.delete(path, this.contextFor('delete', parentContext));
  }

  exists(path: string, parentContext?: RequestContext): Promise<boolean> {
    return this.provider.exists(path, this.contextFor('exists', parentContext));
  }

  list(path: string, parentContext?: RequestContext): Promise<StorageItem[]> {
    return this.provider.list(path, this.contextFor('list', parentContext));
  }

  read(path: string, parentContext?: RequestContext): Promise<Readable> {
    return this.provider.read(path, this.contextFor('read', parentContext));
  }

  /**
   * Reads the whole entry at `path` into memory.
   */
  async readBuffer(
    path: string,
    parentContext?: RequestContext,
  ): Promise<Buffer> {
    const stream = await this.provider.read(
      path,
      this.contextFor('readBuffer', parentContext),
    );
    return streamToBuffer(stream);
  }
}
