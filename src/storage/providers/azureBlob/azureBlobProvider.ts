/**
 * @fileoverview Implements the IStorageProvider interface for Azure Blob Storage.
 * The first path segment names the container (lower-cased, as Azure requires);
 * the remaining segments, joined with `/`, form the blob name.
 * @module src/storage/providers/azureBlob/azureBlobProvider
 */
import type { Readable } from 'stream';

import { runInBatches } from '@/storage/core/batching.js';
import type {
  AddOptions,
  IStorageEndpointFactory,
  IStorageProvider,
  StorageContent,
  StorageItem,
} from '@/storage/core/IStorageProvider.js';
import { StorageItemKind } from '@/storage/core/IStorageProvider.js';
import {
  parseContainerPath,
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

import type { BlobEndpoint } from './azureBlob.types.js';
import { AzureBlobEndpointFactory } from './azureBlobEndpoint.js';

const DEFAULT_DELETE_BATCH_SIZE = 50;

export interface AzureBlobProviderOptions {
  /** Concurrent blob deletes per batch when a virtual folder is deleted. */
  deleteBatchSize?: number;
  logger?: StorageLogger;
}

interface BlobLocation {
  container: string;
  blobName: string;
}

export class AzureBlobProvider implements IStorageProvider {
  private readonly logger: StorageLogger;
  private readonly deleteBatchSize: number;

  constructor(
    private readonly endpoint: BlobEndpoint,
    options: AzureBlobProviderOptions = {},
  ) {
    this.logger = options.logger ?? sharedLogger;
    this.deleteBatchSize = options.deleteBatchSize ?? DEFAULT_DELETE_BATCH_SIZE;
    validateBatchSize(
      this.deleteBatchSize,
      requestContextService.createRequestContext({
        operation: 'AzureBlobProvider.constructor',
      }),
    );
  }

  /**
   * Builds a provider whose endpoint is created once from `connectionString`.
   */
  static fromConnectionString(
    connectionString: string,
    options: AzureBlobProviderOptions & {
      endpointFactory?: IStorageEndpointFactory<BlobEndpoint>;
    } = {},
  ): AzureBlobProvider {
    const factory = options.endpointFactory ?? new AzureBlobEndpointFactory();
    return new AzureBlobProvider(
      factory.createEndpoint(connectionString),
      options,
    );
  }

  private locate(path: string, context: RequestContext): BlobLocation {
    const { container, rest } = parseContainerPath(path, context);
    return { container: container.toLowerCase(), blobName: rest };
  }

  private handlerOptions(
    operation: string,
    path: string,
    context: RequestContext,
    input: Record<string, unknown> = {},
  ): Omit<ErrorHandlerOptions, 'rethrow'> {
    return {
      operation: `AzureBlobProvider.${operation}`,
      context: { ...context, path, backend: 'azure-blob' },
      input: { path, ...input },
      fallbackErrorCode: StorageErrorCode.BackendUnavailable,
      logger: this.logger,
    };
  }

  async add(
    path: string,
    content: StorageContent,
    context: RequestContext,
    options: AddOptions = {},
  ): Promise<string> {
    const { container, blobName } = this.locate(path, context);
    if (!blobName) {
      throw new StorageError(
        StorageErrorCode.InvalidArgument,
        'Path must name a blob inside a container.',
        { ...context, path },
      );
    }
    const overwrite = options.overwrite ?? false;
    return ErrorHandler.tryCatch(
      async () => {
        await this.endpoint.createContainerIfNotExists(container);
        if (
          !overwrite &&
          (await this.endpoint.blobExists(container, blobName))
        ) {
          throw new StorageError(
            StorageErrorCode.AlreadyExists,
            `Blob '${blobName}' already exists in container '${container}'.`,
          );
        }
        this.logger.debug(
          `[AzureBlobProvider] Uploading blob: ${container}/${blobName}`,
          context,
        );
        const url = await this.endpoint.uploadBlob(
          container,
          blobName,
          toReadable(content),
          { overwrite },
        );
        this.logger.debug(
          `[AzureBlobProvider] Successfully uploaded blob: ${url}`,
          context,
        );
        return url;
      },
      this.handlerOptions('add', path, context, { overwrite }),
    );
  }

  async delete(path: string, context: RequestContext): Promise<void> {
    const { container, blobName } = this.locate(path, context);
    return ErrorHandler.tryCatch(
      async () => {
        if (!(await this.endpoint.containerExists(container))) {
          throw new StorageError(
            StorageErrorCode.NotFound,
            `Container '${container}' does not exist.`,
          );
        }

        if (!blobName) {
          this.logger.debug(
            `[AzureBlobProvider] Deleting container: ${container}`,
            context,
          );
          await this.endpoint.deleteContainer(container);
          return;
        }

        if (await this.endpoint.blobExists(container, blobName)) {
          this.logger.debug(
            `[AzureBlobProvider] Deleting blob: ${container}/${blobName}`,
            context,
          );
          await this.endpoint.deleteBlob(container, blobName);
          return;
        }

        // No blob by that name: treat the path as a virtual folder.
        const nested: string[] = [];
        for await (const name of this.endpoint.listBlobNames(
          container,
          `${blobName}/`,
        )) {
          nested.push(name);
        }
        if (nested.length === 0) {
          throw new StorageError(
            StorageErrorCode.NotFound,
            `Nothing exists at '${blobName}' in container '${container}'.`,
          );
        }
        await runInBatches(
          nested,
          this.deleteBatchSize,
          (name) => this.endpoint.deleteBlob(container, name),
          (batchIndex, size) =>
            this.logger.debug(
              `[AzureBlobProvider] Deleting batch ${batchIndex + 1} (${size} blobs) under: ${container}/${blobName}/`,
              context,
            ),
        );
      },
      this.handlerOptions('delete', path, context),
    );
  }

  async exists(path: string, context: RequestContext): Promise<boolean> {
    const { container, blobName } = this.locate(path, context);
    return ErrorHandler.tryCatch(
      async () => {
        if (!blobName) {
          return this.endpoint.containerExists(container);
        }
        return this.endpoint.blobExists(container, blobName);
      },
      this.handlerOptions('exists', path, context),
    );
  }

  async list(path: string, context: RequestContext): Promise<StorageItem[]> {
    const { container, blobName } = this.locate(path, context);
    return ErrorHandler.tryCatch(
      async () => {
        if (!(await this.endpoint.containerExists(container))) {
          throw new StorageError(
            StorageErrorCode.NotFound,
            `Container '${container}' does not exist.`,
          );
        }

        const prefix = blobName ? `${blobName}/` : '';
        const items: StorageItem[] = [];
        for await (const entry of this.endpoint.listBlobsByHierarchy(
          container,
          prefix,
        )) {
          const relative = entry.name.slice(prefix.length);
          if (entry.kind === 'prefix') {
            items.push({
              name: relative.replace(/\/+$/, ''),
              kind: StorageItemKind.Folder,
            });
          } else {
            items.push({ name: relative, kind: StorageItemKind.File });
          }
        }

        if (blobName && items.length === 0) {
          throw new StorageError(
            StorageErrorCode.NotFound,
            `No folder exists at '${blobName}' in container '${container}'.`,
          );
        }
        return items;
      },
      this.handlerOptions('list', path, context),
    );
  }

  async read(path: string, context: RequestContext): Promise<Readable> {
    const { container, blobName } = this.locate(path, context);
    return ErrorHandler.tryCatch(
      async () => {
        if (!blobName || !(await this.endpoint.blobExists(container, blobName))) {
          throw new StorageError(
            StorageErrorCode.NotFound,
            `No blob exists at '${path}'.`,
          );
        }
        this.logger.debug(
          `[AzureBlobProvider] Downloading blob: ${container}/${blobName}`,
          context,
        );
        return this.endpoint.downloadBlob(container, blobName);
      },
      this.handlerOptions('read', path, context),
    );
  }
}
