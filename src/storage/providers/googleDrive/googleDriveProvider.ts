/**
 * @fileoverview Implements the IStorageProvider interface for Google Drive.
 * Every path segment is resolved to a Drive node ID through `DrivePathResolver`.
 * Uploaded files are shared through a permission grant and addressed by their
 * shareable link.
 * @module src/storage/providers/googleDrive/googleDriveProvider
 */
import type { Readable } from 'stream';

import { runInBatches } from '@/storage/core/batching.js';
import type {
  AddOptions,
  IStorageEndpointFactory,
  IStorageProvider,
  StorageContent,
} from '@/storage/core/IStorageProvider.js';
import { StorageItemKind } from '@/storage/core/IStorageProvider.js';
import {
  splitPath,
  validateBatchSize,
} from '@/storage/core/storageValidation.js';
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
import { requestContextService } from '@/utils/internal/requestContext.js';

import { DrivePathResolver, splitTerminal } from './drivePathResolver.js';
import {
  DRIVE_FOLDER_MIME_TYPE,
  DRIVE_ROOT_ALIAS,
  type DriveEndpoint,
  type DriveFileRecord,
  type DrivePermission,
  type HierarchicalStorageItem,
} from './googleDrive.types.js';
import { GoogleDriveEndpointFactory } from './googleDriveEndpoint.js';

const DEFAULT_DELETE_BATCH_THRESHOLD = 50;
const DEFAULT_SHARE_PERMISSION: DrivePermission = {
  type: 'anyone',
  role: 'reader',
};

const FILE_LINK_PATTERN = /\/file\/d\/(.*?)\/view/;

export interface GoogleDriveProviderOptions {
  /** Folder ID every path is resolved from. Defaults to the account's root. */
  rootFolderId?: string;
  /** Concurrent deletes per batch. */
  deleteBatchThreshold?: number;
  /** Granted on every uploaded file. */
  sharePermission?: DrivePermission;
  logger?: StorageLogger;
}

/**
 * The shareable link of a Drive file.
 */
export function buildFileLink(fileId: string): string {
  return `https://drive.google.com/file/d/${fileId}/view`;
}

/**
 * Extracts the file ID from a link produced by `buildFileLink`.
 * @throws {StorageError} `InvalidArgument` if the link carries no file ID.
 */
export function extractFileIdFromLink(link: string): string {
  const fileId = FILE_LINK_PATTERN.exec(link)?.[1];
  if (!fileId) {
    throw new StorageError(
      StorageErrorCode.InvalidArgument,
      'Link does not contain a Drive file ID.',
      { link },
    );
  }
  return fileId;
}

export class GoogleDriveProvider implements IStorageProvider {
  private readonly logger: StorageLogger;
  private readonly resolver: DrivePathResolver;
  private readonly deleteBatchThreshold: number;
  private readonly sharePermission: DrivePermission;

  constructor(
    private readonly endpoint: DriveEndpoint,
    options: GoogleDriveProviderOptions = {},
  ) {
    this.logger = options.logger ?? sharedLogger;
    this.resolver = new DrivePathResolver(
      endpoint,
      options.rootFolderId ?? DRIVE_ROOT_ALIAS,
    );
    this.deleteBatchThreshold =
      options.deleteBatchThreshold ?? DEFAULT_DELETE_BATCH_THRESHOLD;
    this.sharePermission = options.sharePermission ?? DEFAULT_SHARE_PERMISSION;
    validateBatchSize(
      this.deleteBatchThreshold,
      requestContextService.createRequestContext({
        operation: 'GoogleDriveProvider.constructor',
      }),
    );
  }

  /**
   * Builds a provider whose endpoint is created once from a service-account
   * credentials JSON document.
   */
  static fromCredentials(
    credentialsJson: string,
    options: GoogleDriveProviderOptions & {
      endpointFactory?: IStorageEndpointFactory<DriveEndpoint>;
    } = {},
  ): GoogleDriveProvider {
    const factory = options.endpointFactory ?? new GoogleDriveEndpointFactory();
    return new GoogleDriveProvider(
      factory.createEndpoint(credentialsJson),
      options,
    );
  }

  private handlerOptions(
    operation: string,
    path: string,
    context: RequestContext,
    input: Record<string, unknown> = {},
  ): Omit<ErrorHandlerOptions, 'rethrow'> {
    return {
      operation: `GoogleDriveProvider.${operation}`,
      context: { ...context, path, backend: 'google-drive' },
      input: { path, ...input },
      fallbackErrorCode: StorageErrorCode.BackendUnavailable,
      logger: this.logger,
    };
  }

  private deleteRecords(
    records: readonly DriveFileRecord[],
    context: RequestContext,
  ): Promise<void> {
    return runInBatches(
      records,
      this.deleteBatchThreshold,
      (record) => this.endpoint.deleteFile(record.id),
      (batchIndex, size) =>
        this.logger.debug(
          `[GoogleDriveProvider] Deleting batch ${batchIndex + 1} (${size} entries)`,
          context,
        ),
    );
  }

  async add(
    path: string,
    content: StorageContent,
    context: RequestContext,
    options: AddOptions = {},
  ): Promise<string> {
    const { parents, name } = splitTerminal(splitPath(path, context));
    const overwrite = options.overwrite ?? false;
    return ErrorHandler.tryCatch(
      async () => {
        const parentId = await this.resolver.ensureFolder(parents);
        const existing = await this.endpoint.findFiles({ parentId, name });
        if (existing.length > 0 && !overwrite) {
          throw new StorageError(
            StorageErrorCode.AlreadyExists,
            `An entry named '${name}' already exists.`,
          );
        }
        // Overwrite replaces files only; a same-named folder stays.
        const replaced = existing.filter(
          (record) => record.mimeType !== DRIVE_FOLDER_MIME_TYPE,
        );
        if (replaced.length > 0) {
          this.logger.debug(
            `[GoogleDriveProvider] Replacing ${replaced.length} existing files named: ${name}`,
            context,
          );
          await this.deleteRecords(replaced, context);
        }

        const file = await this.endpoint.uploadFile(
          name,
          parentId,
          toReadable(content),
        );
        await this.endpoint.grantPermission(file.id, this.sharePermission);
        const link = buildFileLink(file.id);
        this.logger.debug(
          `[GoogleDriveProvider] Uploaded file: ${link}`,
          context,
        );
        return link;
      },
      this.handlerOptions('add', path, context, { overwrite }),
    );
  }

  async delete(path: string, context: RequestContext): Promise<void> {
    const segments = splitPath(path, context);
    return ErrorHandler.tryCatch(
      async () => {
        const matches = await this.resolver.resolveEntries(segments);
        this.logger.debug(
          `[GoogleDriveProvider] Deleting ${matches.length} entries at: ${path}`,
          context,
        );
        await this.deleteRecords(matches, context);
      },
      this.handlerOptions('delete', path, context),
    );
  }

  async exists(path: string, context: RequestContext): Promise<boolean> {
    const { parents, name } = splitTerminal(splitPath(path, context));
    return ErrorHandler.tryCatch(
      async () => {
        const parentId = await this.resolver.tryResolveFolder(parents);
        if (parentId === undefined) {
          return false;
        }
        const matches = await this.endpoint.findFiles({ parentId, name });
        return matches.length > 0;
      },
      this.handlerOptions('exists', path, context),
    );
  }

  async list(
    path: string,
    context: RequestContext,
  ): Promise<HierarchicalStorageItem[]> {
    const segments = splitPath(path, context);
    return ErrorHandler.tryCatch(
      async () => {
        const isRootAlias =
          segments.length === 1 && segments[0] === DRIVE_ROOT_ALIAS;
        const folderId = isRootAlias
          ? this.resolver.rootFolderId
          : await this.resolver.resolveFolder(segments);
        const children = await this.endpoint.findFiles({ parentId: folderId });
        return children.map((child) => ({
          name: child.name,
          kind:
            child.mimeType === DRIVE_FOLDER_MIME_TYPE
              ? StorageItemKind.Folder
              : StorageItemKind.File,
          id: child.id,
          parentId: child.parentId,
        }));
      },
      this.handlerOptions('list', path, context),
    );
  }

  async read(path: string, context: RequestContext): Promise<Readable> {
    const segments = splitPath(path, context);
    return ErrorHandler.tryCatch(
      async () => {
        const file = await this.resolver.resolveFile(segments);
        this.logger.debug(
          `[GoogleDriveProvider] Downloading file: ${file.id}`,
          context,
        );
        return this.endpoint.downloadFile(file.id);
      },
      this.handlerOptions('read', path, context),
    );
  }

  /**
   * Reads a file addressed by the link `add` returned.
   */
  async readFromLink(link: string, context: RequestContext): Promise<Readable> {
    const fileId = extractFileIdFromLink(link);
    return ErrorHandler.tryCatch(
      () => this.endpoint.downloadFile(fileId),
      this.handlerOptions('readFromLink', link, context, { fileId }),
    );
  }
}
