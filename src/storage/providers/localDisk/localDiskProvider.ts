/**
 * @fileoverview A local-disk storage provider.
 * Logical paths map directly onto filesystem paths, or onto paths under a
 * configured root directory when one is given (traversal outside it is rejected).
 * @module src/storage/providers/localDisk/localDiskProvider
 */
import type { Stats } from 'fs';
import { mkdir, open, readdir, rm, stat, unlink } from 'fs/promises';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';

import type {
  AddOptions,
  IStorageProvider,
  StorageContent,
  StorageItem,
} from '@/storage/core/IStorageProvider.js';
import { StorageItemKind } from '@/storage/core/IStorageProvider.js';
import { splitPath, validatePath } from '@/storage/core/storageValidation.js';
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import { toReadable } from '@/utils/internal/encoding.js';
import {
  ErrorHandler,
  type ErrorHandlerOptions,
} from '@/utils/internal/error-handler/index.js';
import {
  logger as sharedLogger,
  type StorageLogger,
} from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';
import { sanitization } from '@/utils/security/sanitization.js';

export interface LocalDiskProviderOptions {
  /** Confine every path to this directory. Paths are used as-is when omitted. */
  rootDir?: string;
  logger?: StorageLogger;
}

const MISSING_ENTRY_CODES = new Set(['ENOENT', 'ENOTDIR']);

function isMissingEntryError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    MISSING_ENTRY_CODES.has(error.code)
  );
}

/**
 * `stat` that reports a missing entry (or a missing parent) as undefined.
 */
async function statIfExists(filePath: string): Promise<Stats | undefined> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (isMissingEntryError(error)) {
      return undefined;
    }
    throw error;
  }
}

export class LocalDiskProvider implements IStorageProvider {
  private readonly rootDir: string | undefined;
  private readonly logger: StorageLogger;

  constructor(options: LocalDiskProviderOptions = {}) {
    this.rootDir = options.rootDir ? path.resolve(options.rootDir) : undefined;
    this.logger = options.logger ?? sharedLogger;
  }

  private resolvePath(logicalPath: string, context: RequestContext): string {
    const valid = validatePath(logicalPath, context);
    if (!this.rootDir) {
      return path.resolve(valid);
    }
    const relative = splitPath(valid, context).join('/');
    return sanitization.sanitizePath(relative, { rootDir: this.rootDir })
      .resolvedPath;
  }

  private handlerOptions(
    operation: string,
    logicalPath: string,
    context: RequestContext,
    input: Record<string, unknown> = {},
  ): Omit<ErrorHandlerOptions, 'rethrow'> {
    return {
      operation: `LocalDiskProvider.${operation}`,
      context: { ...context, path: logicalPath, backend: 'local-disk' },
      input: { path: logicalPath, ...input },
      fallbackErrorCode: StorageErrorCode.BackendUnavailable,
      logger: this.logger,
    };
  }

  async add(
    logicalPath: string,
    content: StorageContent,
    context: RequestContext,
    options: AddOptions = {},
  ): Promise<string> {
    const filePath = this.resolvePath(logicalPath, context);
    const overwrite = options.overwrite ?? false;
    return ErrorHandler.tryCatch(
      async () => {
        this.logger.debug(
          `[LocalDiskProvider] Adding file: ${filePath}`,
          context,
        );
        const existing = await statIfExists(filePath);
        if (existing && !overwrite) {
          throw new StorageError(
            StorageErrorCode.AlreadyExists,
            `An entry already exists at '${logicalPath}'.`,
          );
        }

        await mkdir(path.dirname(filePath), { recursive: true });
        // 'wx' fails with EEXIST if the file appeared after the check.
        const handle = await open(filePath, overwrite ? 'w' : 'wx');
        await pipeline(toReadable(content), handle.createWriteStream());
        this.logger.debug(
          `[LocalDiskProvider] Successfully added file: ${filePath}`,
          context,
        );
        // Without a root directory the caller's path is the locator.
        return this.rootDir ? filePath : logicalPath;
      },
      this.handlerOptions('add', logicalPath, context, { overwrite }),
    );
  }

  async delete(logicalPath: string, context: RequestContext): Promise<void> {
    const filePath = this.resolvePath(logicalPath, context);
    if (this.rootDir && filePath === this.rootDir) {
      throw new StorageError(
        StorageErrorCode.InvalidArgument,
        'The storage root directory cannot be deleted.',
        { ...context, path: logicalPath },
      );
    }
    return ErrorHandler.tryCatch(
      async () => {
        const stats = await statIfExists(filePath);
        if (!stats) {
          throw new StorageError(
            StorageErrorCode.NotFound,
            `Nothing exists at '${logicalPath}'.`,
          );
        }
        if (stats.isDirectory()) {
          this.logger.debug(
            `[LocalDiskProvider] Deleting directory recursively: ${filePath}`,
            context,
          );
          await rm(filePath, { recursive: true });
        } else {
          this.logger.debug(
            `[LocalDiskProvider] Deleting file: ${filePath}`,
            context,
          );
          await unlink(filePath);
        }
      },
      this.handlerOptions('delete', logicalPath, context),
    );
  }

  async exists(logicalPath: string, context: RequestContext): Promise<boolean> {
    const filePath = this.resolvePath(logicalPath, context);
    return ErrorHandler.tryCatch(
      async () => {
        const stats = await statIfExists(filePath);
        return stats?.isFile() ?? false;
      },
      this.handlerOptions('exists', logicalPath, context),
    );
  }

  async list(
    logicalPath: string,
    context: RequestContext,
  ): Promise<StorageItem[]> {
    const dirPath = this.resolvePath(logicalPath, context);
    return ErrorHandler.tryCatch(
      async () => {
        const stats = await statIfExists(dirPath);
        if (!stats?.isDirectory()) {
          throw new StorageError(
            StorageErrorCode.NotFound,
            `No directory exists at '${logicalPath}'.`,
          );
        }

        const entries = await readdir(dirPath, { withFileTypes: true });
        const items: StorageItem[] = [];
        for (const entry of entries) {
          if (entry.isDirectory()) {
            items.push({ name: entry.name, kind: StorageItemKind.Folder });
          } else if (entry.isFile()) {
            items.push({ name: entry.name, kind: StorageItemKind.File });
          }
        }
        this.logger.debug(
          `[LocalDiskProvider] Listed ${items.length} entries in: ${dirPath}`,
          context,
        );
        return items;
      },
      this.handlerOptions('list', logicalPath, context),
    );
  }

  async read(logicalPath: string, context: RequestContext): Promise<Readable> {
    const filePath = this.resolvePath(logicalPath, context);
    return ErrorHandler.tryCatch(
      async () => {
        const stats = await statIfExists(filePath);
        if (!stats?.isFile()) {
          throw new StorageError(
            StorageErrorCode.NotFound,
            `No file exists at '${logicalPath}'.`,
          );
        }
        this.logger.debug(
          `[LocalDiskProvider] Opening file for reading: ${filePath}`,
          context,
        );
        const handle = await open(filePath, 'r');
        return handle.createReadStream();
      },
      this.handlerOptions('read', logicalPath, context),
    );
  }
}
