/**
 * @fileoverview An in-memory storage provider implementation.
 * Content is kept in a path-addressed map; folders exist implicitly while at
 * least one file lives beneath them, as in an object store. Nothing is
 * persisted.
 * @module src/storage/providers/inMemory/inMemoryProvider
 */
import { Readable } from 'stream';

import type {
  AddOptions,
  IStorageProvider,
  StorageContent,
  StorageItem,
} from '@/storage/core/IStorageProvider.js';
import { StorageItemKind } from '@/storage/core/IStorageProvider.js';
import { splitPath } from '@/storage/core/storageValidation.js';
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import { contentToBuffer } from '@/utils/internal/encoding.js';
import {
  logger as sharedLogger,
  type StorageLogger,
} from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

export const IN_MEMORY_LOCATOR_SCHEME = 'memory://';

export class InMemoryProvider implements IStorageProvider {
  private readonly store = new Map<string, Buffer>();
  private readonly logger: StorageLogger;

  constructor(options: { logger?: StorageLogger } = {}) {
    this.logger = options.logger ?? sharedLogger;
  }

  private toKey(path: string, context: RequestContext): string {
    return splitPath(path, context).join('/');
  }

  private isFolder(key: string): boolean {
    const prefix = `${key}/`;
    for (const existing of this.store.keys()) {
      if (existing.startsWith(prefix)) return true;
    }
    return false;
  }

  async add(
    path: string,
    content: StorageContent,
    context: RequestContext,
    options: AddOptions = {},
  ): Promise<string> {
    const key = this.toKey(path, context);
    this.logger.debug(`[InMemoryProvider] Adding key: ${key}`, context);

    if (this.isFolder(key)) {
      throw new StorageError(
        StorageErrorCode.AlreadyExists,
        `A folder already exists at '${path}'.`,
        { ...context, path },
      );
    }
    if (this.store.has(key) && !options.overwrite) {
      throw new StorageError(
        StorageErrorCode.AlreadyExists,
        `An entry already exists at '${path}'.`,
        { ...context, path },
      );
    }
    const segments = key.split('/');
    for (let depth = 1; depth < segments.length; depth++) {
      const parent = segments.slice(0, depth).join('/');
      if (this.store.has(parent)) {
        throw new StorageError(
          StorageErrorCode.AlreadyExists,
          `A file exists where a folder is needed: '${parent}'.`,
          { ...context, path },
        );
      }
    }

    this.store.set(key, await contentToBuffer(content));
    return `${IN_MEMORY_LOCATOR_SCHEME}${key}`;
  }

  async delete(path: string, context: RequestContext): Promise<void> {
    const key = this.toKey(path, context);
    this.logger.debug(`[InMemoryProvider] Deleting key: ${key}`, context);

    if (this.store.delete(key)) {
      return;
    }
    const prefix = `${key}/`;
    const nested = [...this.store.keys()].filter((k) => k.startsWith(prefix));
    if (nested.length === 0) {
      throw new StorageError(
        StorageErrorCode.NotFound,
        `Nothing exists at '${path}'.`,
        { ...context, path },
      );
    }
    for (const nestedKey of nested) {
      this.store.delete(nestedKey);
    }
    this.logger.debug(
      `[InMemoryProvider] Deleted ${nested.length} keys under: ${key}`,
      context,
    );
  }

  async exists(path: string, context: RequestContext): Promise<boolean> {
    const key = this.toKey(path, context);
    return this.store.has(key) || this.isFolder(key);
  }

  async list(path: string, context: RequestContext): Promise<StorageItem[]> {
    const key = this.toKey(path, context);
    this.logger.debug(`[InMemoryProvider] Listing folder: ${key}`, context);

    const prefix = `${key}/`;
    const children = new Map<string, StorageItemKind>();
    for (const existing of this.store.keys()) {
      if (!existing.startsWith(prefix)) continue;
      const remainder = existing.slice(prefix.length);
      const slash = remainder.indexOf('/');
      if (slash === -1) {
        children.set(remainder, StorageItemKind.File);
      } else {
        children.set(remainder.slice(0, slash), StorageItemKind.Folder);
      }
    }

    if (children.size === 0) {
      throw new StorageError(
        StorageErrorCode.NotFound,
        `No folder exists at '${path}'.`,
        { ...context, path },
      );
    }
    return [...children].map(([name, kind]) => ({ name, kind }));
  }

  async read(path: string, context: RequestContext): Promise<Readable> {
    const key = this.toKey(path, context);
    const content = this.store.get(key);
    if (!content) {
      throw new StorageError(
        StorageErrorCode.NotFound,
        `No file exists at '${path}'.`,
        { ...context, path },
      );
    }
    return Readable.from([content]);
  }
}
