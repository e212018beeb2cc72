/**
 * @fileoverview Narrow client contract the Azure Blob provider talks to.
 * The SDK-backed implementation lives in `azureBlobEndpoint.ts`; tests use an
 * in-process fake.
 * @module src/storage/providers/azureBlob/azureBlob.types
 */
import type { Readable } from 'stream';

/**
 * One entry of a delimiter (`/`) listing: a blob, or a virtual-directory prefix.
 * `name` is the full name within the container; prefixes end with `/`.
 */
export interface BlobHierarchyItem {
  kind: 'blob' | 'prefix';
  name: string;
}

export interface BlobUploadOptions {
  /** When false, the upload fails if a blob with the same name appears meanwhile. */
  overwrite: boolean;
}

export interface BlobEndpoint {
  containerExists(container: string): Promise<boolean>;
  createContainerIfNotExists(container: string): Promise<void>;
  deleteContainer(container: string): Promise<void>;

  blobExists(container: string, blobName: string): Promise<boolean>;
  /** @returns The URL of the uploaded blob. */
  uploadBlob(
    container: string,
    blobName: string,
    content: Readable,
    options: BlobUploadOptions,
  ): Promise<string>;
  deleteBlob(container: string, blobName: string): Promise<void>;
  downloadBlob(container: string, blobName: string): Promise<Readable>;

  /** Lists the immediate children under `prefix` using `/` as the delimiter. */
  listBlobsByHierarchy(
    container: string,
    prefix: string,
  ): AsyncIterable<BlobHierarchyItem>;
  /** Lists every blob name under `prefix`, at any depth. */
  listBlobNames(container: string, prefix: string): AsyncIterable<string>;
}
