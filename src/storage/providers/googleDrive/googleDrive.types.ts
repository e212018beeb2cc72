/**
 * @fileoverview Types for the Google Drive backend: the narrow endpoint the
 * provider and path resolver talk to, and the records it returns.
 * @module src/storage/providers/googleDrive/googleDrive.types
 */
import type { Readable } from 'stream';

import type { StorageItem } from '@/storage/core/IStorageProvider.js';

export const DRIVE_FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
export const DRIVE_UPLOAD_MIME_TYPE = 'application/octet-stream';
/** The well-known alias Drive accepts for the signed-in account's root folder. */
export const DRIVE_ROOT_ALIAS = 'root';

/**
 * A Drive node. Names are not unique under a parent; the ID is.
 */
export interface DriveFileRecord {
  id: string;
  name: string;
  mimeType: string;
  parentId: string;
}

export type DriveEntryKind = 'file' | 'folder';

export interface DriveFileQuery {
  parentId: string;
  /** Exact name match. */
  name?: string;
  /** Restrict to folders or to non-folders; any kind when omitted. */
  kind?: DriveEntryKind;
}

export type DrivePermissionRole =
  | 'owner'
  | 'organizer'
  | 'fileOrganizer'
  | 'writer'
  | 'commenter'
  | 'reader';

export type DrivePermissionType = 'user' | 'group' | 'domain' | 'anyone';

export interface DrivePermission {
  type: DrivePermissionType;
  role: DrivePermissionRole;
  /** Required for `user` and `group` grants. */
  emailAddress?: string;
  /** Required for `domain` grants. */
  domain?: string;
}

export interface DriveEndpoint {
  /** Every non-trashed node matching the query, across all result pages. */
  findFiles(query: DriveFileQuery): Promise<DriveFileRecord[]>;
  createFolder(name: string, parentId: string): Promise<DriveFileRecord>;
  uploadFile(
    name: string,
    parentId: string,
    content: Readable,
  ): Promise<DriveFileRecord>;
  grantPermission(fileId: string, permission: DrivePermission): Promise<void>;
  deleteFile(fileId: string): Promise<void>;
  downloadFile(fileId: string): Promise<Readable>;
}

/**
 * A listed Drive entry, carrying the IDs the hierarchy is built from.
 */
export interface HierarchicalStorageItem extends StorageItem {
  id: string;
  parentId: string;
}
