/**
 * @fileoverview Resolves slash-delimited logical paths to Drive node IDs.
 *
 * Drive addresses nodes by opaque ID and allows several nodes with the same
 * name under one parent. The resolver walks a path one segment at a time from
 * a well-known root ID. For intermediate segments it adopts the first matching
 * folder; only the terminal segment of a delete resolves to every match.
 * @module src/storage/providers/googleDrive/drivePathResolver
 */
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';

import {
  DRIVE_ROOT_ALIAS,
  type DriveEndpoint,
  type DriveFileRecord,
} from './googleDrive.types.js';

export class DrivePathResolver {
  constructor(
    private readonly endpoint: DriveEndpoint,
    private readonly rootId: string = DRIVE_ROOT_ALIAS,
  ) {}

  get rootFolderId(): string {
    return this.rootId;
  }

  /**
   * Walks `segments` as folders, creating each missing one.
   * @returns The ID of the deepest folder.
   */
  async ensureFolder(segments: readonly string[]): Promise<string> {
    let currentId = this.rootId;
    for (const segment of segments) {
      const [existing] = await this.endpoint.findFiles({
        parentId: currentId,
        name: segment,
        kind: 'folder',
      });
      currentId = existing
        ? existing.id
        : (await this.endpoint.createFolder(segment, currentId)).id;
    }
    return currentId;
  }

  /**
   * Walks `segments` as folders without creating anything.
   * @returns The folder ID, or undefined at the first missing segment.
   */
  async tryResolveFolder(
    segments: readonly string[],
  ): Promise<string | undefined> {
    let currentId = this.rootId;
    for (const segment of segments) {
      const [existing] = await this.endpoint.findFiles({
        parentId: currentId,
        name: segment,
        kind: 'folder',
      });
      if (!existing) {
        return undefined;
      }
      currentId = existing.id;
    }
    return currentId;
  }

  /**
   * Walks `segments` as folders.
   * @throws {StorageError} `NotFound` naming the first missing segment.
   */
  async resolveFolder(segments: readonly string[]): Promise<string> {
    let currentId = this.rootId;
    for (const segment of segments) {
      const [existing] = await this.endpoint.findFiles({
        parentId: currentId,
        name: segment,
        kind: 'folder',
      });
      if (!existing) {
        throw new StorageError(
          StorageErrorCode.NotFound,
          `Folder '${segment}' not found.`,
          { segment },
        );
      }
      currentId = existing.id;
    }
    return currentId;
  }

  /**
   * Resolves the parents of `segments` as folders, then returns every node of
   * any kind named by the terminal segment.
   * @throws {StorageError} `NotFound` if a parent or the terminal segment is missing.
   */
  async resolveEntries(segments: readonly string[]): Promise<DriveFileRecord[]> {
    const { parents, name } = splitTerminal(segments);
    const parentId = await this.resolveFolder(parents);
    const matches = await this.endpoint.findFiles({ parentId, name });
    if (matches.length === 0) {
      throw new StorageError(
        StorageErrorCode.NotFound,
        `'${name}' not found.`,
        { segment: name },
      );
    }
    return matches;
  }

  /**
   * Resolves the parents of `segments` as folders, then returns the first
   * non-folder node named by the terminal segment.
   * @throws {StorageError} `NotFound` if a parent or the file is missing.
   */
  async resolveFile(segments: readonly string[]): Promise<DriveFileRecord> {
    const { parents, name } = splitTerminal(segments);
    const parentId = await this.resolveFolder(parents);
    const [file] = await this.endpoint.findFiles({
      parentId,
      name,
      kind: 'file',
    });
    if (!file) {
      throw new StorageError(
        StorageErrorCode.NotFound,
        `File '${name}' not found.`,
        { segment: name },
      );
    }
    return file;
  }
}

/**
 * Splits a non-empty segment list into its parent segments and terminal name.
 */
export function splitTerminal(segments: readonly string[]): {
  parents: string[];
  name: string;
} {
  const name = segments[segments.length - 1];
  if (name === undefined) {
    throw new StorageError(
      StorageErrorCode.InvalidArgument,
      'Path must contain at least one segment.',
    );
  }
  return { parents: segments.slice(0, -1), name };
}
