/**
 * @fileoverview Defines the core interface for a storage provider.
 * This contract lets local disk, object-store and hierarchical-drive backends be
 * used interchangeably: callers address content by slash-delimited logical paths
 * and never see backend identifiers.
 * @module src/storage/core/IStorageProvider
 */
import type { Readable } from 'stream';

import type { StorageContent } from '@/utils/internal/encoding.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

export type { StorageContent } from '@/utils/internal/encoding.js';

/**
 * Whether a listed entry can hold content (`file`) or other entries (`folder`).
 */
export enum StorageItemKind {
  File = 'file',
  Folder = 'folder',
}

/**
 * An entry returned by `list`. A fresh snapshot per call; never updated.
 */
export interface StorageItem {
  /** The entry's own name (last path segment), not a full path. */
  name: string;
  kind: StorageItemKind;
}

/**
 * Options for `add`.
 *
 * @property overwrite - Replace an existing entry at the same path instead of
 *   failing with `AlreadyExists`. Defaults to false.
 */
export interface AddOptions {
  overwrite?: boolean;
}

/**
 * Defines the contract for a storage provider.
 * All methods are asynchronous and accept a RequestContext for tracing and logging.
 * Failures are reported as `StorageError`s whose `code` is one of the
 * operation-level kinds.
 */
export interface IStorageProvider {
  /**
   * Writes content at `path`, creating missing containers on the way.
   * Containers created before a failed write may remain.
   * @returns A backend-specific locator for the stored content (a filesystem
   *   path, a blob URL, a shareable link).
   * @throws `AlreadyExists` if an entry exists and `overwrite` is not set.
   */
  add(
    path: string,
    content: StorageContent,
    context: RequestContext,
    options?: AddOptions,
  ): Promise<string>;

  /**
   * Deletes the file or container at `path`, recursively for containers.
   * @throws `NotFound` if nothing exists at `path`.
   */
  delete(path: string, context: RequestContext): Promise<void>;

  /**
   * Reports whether an entry exists at `path`. A missing entry or a missing
   * parent yields false; only malformed input throws.
   */
  exists(path: string, context: RequestContext): Promise<boolean>;

  /**
   * Lists the immediate children of the container at `path`. Order is not
   * guaranteed.
   * @throws `NotFound` if `path` is not an existing container.
   */
  list(path: string, context: RequestContext): Promise<StorageItem[]>;

  /**
   * Opens the content at `path` for reading. The caller owns the stream.
   * @throws `NotFound` if nothing exists at `path`.
   */
  read(path: string, context: RequestContext): Promise<Readable>;
}

/**
 * Builds the backend client handle a provider owns for its lifetime, from a
 * connection string or serialized credential bundle.
 */
export interface IStorageEndpointFactory<TEndpoint> {
  createEndpoint(configuration: string): TEndpoint;
}
