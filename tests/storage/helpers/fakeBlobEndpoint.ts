/**
 * @fileoverview In-process `BlobEndpoint` holding containers and blobs in maps.
 * Errors carry the HTTP status the real service would return.
 * @module tests/storage/helpers/fakeBlobEndpoint
 */
import { Readable } from 'stream';

import type {
  BlobEndpoint,
  BlobHierarchyItem,
  BlobUploadOptions,
} from '@/storage/providers/azureBlob/azureBlob.types.js';
import { streamToBuffer } from '@/utils/internal/encoding.js';

export class FakeRestError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'RestError';
  }
}

export class FakeBlobEndpoint implements BlobEndpoint {
  readonly containers = new Map<string, Map<string, Buffer>>();
  readonly deletedBlobs: string[] = [];

  private requireContainer(container: string): Map<string, Buffer> {
    const blobs = this.containers.get(container);
    if (!blobs) {
      throw new FakeRestError('The specified container does not exist.', 404);
    }
    return blobs;
  }

  async containerExists(container: string): Promise<boolean> {
    return this.containers.has(container);
  }

  async createContainerIfNotExists(container: string): Promise<void> {
    if (!this.containers.has(container)) {
      this.containers.set(container, new Map());
    }
  }

  async deleteContainer(container: string): Promise<void> {
    this.requireContainer(container);
    this.containers.delete(container);
  }

  async blobExists(container: string, blobName: string): Promise<boolean> {
    return this.containers.get(container)?.has(blobName) ?? false;
  }

  async uploadBlob(
    container: string,
    blobName: string,
    content: Readable,
    options: BlobUploadOptions,
  ): Promise<string> {
    const blobs = this.requireContainer(container);
    if (!options.overwrite && blobs.has(blobName)) {
      throw new FakeRestError('The specified blob already exists.', 409);
    }
    blobs.set(blobName, await streamToBuffer(content));
    return `https://fakeaccount.blob.core.windows.net/${container}/${blobName}`;
  }

  async deleteBlob(container: string, blobName: string): Promise<void> {
    const blobs = this.requireContainer(container);
    if (!blobs.delete(blobName)) {
      throw new FakeRestError('The specified blob does not exist.', 404);
    }
    this.deletedBlobs.push(`${container}/${blobName}`);
  }

  async downloadBlob(container: string, blobName: string): Promise<Readable> {
    const content = this.requireContainer(container).get(blobName);
    if (!content) {
      throw new FakeRestError('The specified blob does not exist.', 404);
    }
    return Readable.from([content]);
  }

  async *listBlobsByHierarchy(
    container: string,
    prefix: string,
  ): AsyncIterable<BlobHierarchyItem> {
    const seenPrefixes = new Set<string>();
    for (const name of this.requireContainer(container).keys()) {
      if (!name.startsWith(prefix)) continue;
      const slash = name.indexOf('/', prefix.length);
      if (slash === -1) {
        yield { kind: 'blob', name };
        continue;
      }
      const virtualDirectory = name.slice(0, slash + 1);
      if (!seenPrefixes.has(virtualDirectory)) {
        seenPrefixes.add(virtualDirectory);
        yield { kind: 'prefix', name: virtualDirectory };
      }
    }
  }

  async *listBlobNames(
    container: string,
    prefix: string,
  ): AsyncIterable<string> {
    for (const name of [...this.requireContainer(container).keys()]) {
      if (name.startsWith(prefix)) {
        yield name;
      }
    }
  }
}
