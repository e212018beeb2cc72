/**
 * @fileoverview `BlobEndpoint` backed by `@azure/storage-blob`, and the factory
 * that builds it from a storage-account connection string.
 * @module src/storage/providers/azureBlob/azureBlobEndpoint
 */
import { BlobServiceClient } from '@azure/storage-blob';
import { Readable } from 'stream';

import type { IStorageEndpointFactory } from '@/storage/core/IStorageProvider.js';
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';

import type {
  BlobEndpoint,
  BlobHierarchyItem,
  BlobUploadOptions,
} from './azureBlob.types.js';

const UPLOAD_BUFFER_SIZE = 4 * 1024 * 1024;
const UPLOAD_MAX_CONCURRENCY = 5;

export class AzureBlobEndpoint implements BlobEndpoint {
  constructor(private readonly client: BlobServiceClient) {}

  async containerExists(container: string): Promise<boolean> {
    return this.client.getContainerClient(container).exists();
  }

  async createContainerIfNotExists(container: string): Promise<void> {
    await this.client.getContainerClient(container).createIfNotExists();
  }

  async deleteContainer(container: string): Promise<void> {
    await this.client.getContainerClient(container).delete();
  }

  async blobExists(container: string, blobName: string): Promise<boolean> {
    return this.client
      .getContainerClient(container)
      .getBlobClient(blobName)
      .exists();
  }

  async uploadBlob(
    container: string,
    blobName: string,
    content: Readable,
    options: BlobUploadOptions,
  ): Promise<string> {
    const blockBlobClient = this.client
      .getContainerClient(container)
      .getBlockBlobClient(blobName);
    await blockBlobClient.uploadStream(
      content,
      UPLOAD_BUFFER_SIZE,
      UPLOAD_MAX_CONCURRENCY,
      options.overwrite ? {} : { conditions: { ifNoneMatch: '*' } },
    );
    return blockBlobClient.url;
  }

  async deleteBlob(container: string, blobName: string): Promise<void> {
    await this.client.getContainerClient(container).deleteBlob(blobName);
  }

  async downloadBlob(container: string, blobName: string): Promise<Readable> {
    const response = await this.client
      .getContainerClient(container)
      .getBlobClient(blobName)
      .download();
    const body = response.readableStreamBody;
    if (!body) {
      throw new StorageError(
        StorageErrorCode.BackendUnavailable,
        `Blob '${blobName}' returned no content stream.`,
        { container, blobName },
      );
    }
    return body instanceof Readable ? body : new Readable().wrap(body);
  }

  async *listBlobsByHierarchy(
    container: string,
    prefix: string,
  ): AsyncIterable<BlobHierarchyItem> {
    const containerClient = this.client.getContainerClient(container);
    for await (const item of containerClient.listBlobsByHierarchy('/', {
      prefix,
    })) {
      yield { kind: item.kind, name: item.name };
    }
  }

  async *listBlobNames(
    container: string,
    prefix: string,
  ): AsyncIterable<string> {
    const containerClient = this.client.getContainerClient(container);
    for await (const item of containerClient.listBlobsFlat({ prefix })) {
      yield item.name;
    }
  }
}

/**
 * Builds one `AzureBlobEndpoint` per provider instance from a connection string.
 */
export class AzureBlobEndpointFactory
  implements IStorageEndpointFactory<BlobEndpoint>
{
  createEndpoint(connectionString: string): BlobEndpoint {
    try {
      return new AzureBlobEndpoint(
        BlobServiceClient.fromConnectionString(connectionString),
      );
    } catch (error) {
      throw new StorageError(
        StorageErrorCode.ConfigurationError,
        `Invalid Azure Blob connection string: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error },
      );
    }
  }
}
