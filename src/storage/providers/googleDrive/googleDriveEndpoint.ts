/**
 * @fileoverview `DriveEndpoint` backed by the `googleapis` Drive v3 client, and
 * the factory that builds it from a service-account credentials JSON document.
 * @module src/storage/providers/googleDrive/googleDriveEndpoint
 */
import { google, type drive_v3 } from 'googleapis';
import type { Readable } from 'stream';
import { z } from 'zod';

import type { IStorageEndpointFactory } from '@/storage/core/IStorageProvider.js';
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';

import { buildDriveQuery } from './driveQuery.js';
import {
  DRIVE_FOLDER_MIME_TYPE,
  DRIVE_UPLOAD_MIME_TYPE,
  type DriveEndpoint,
  type DriveFileQuery,
  type DriveFileRecord,
  type DrivePermission,
} from './googleDrive.types.js';

/** Access limited to files the service account created or opened. */
export const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive.file'];

const FILE_FIELDS = 'id, name, mimeType, parents';
const LIST_PAGE_SIZE = 1000;
// Folders may live on a shared drive.
const SHARED_DRIVES = { supportsAllDrives: true } as const;

const ServiceAccountCredentialsSchema = z.object({
  type: z.string().optional(),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

function toRecord(
  file: drive_v3.Schema$File,
  fallbackParentId: string,
): DriveFileRecord {
  if (!file.id) {
    throw new StorageError(
      StorageErrorCode.BackendUnavailable,
      'Drive returned a file without an id.',
      { name: file.name },
    );
  }
  return {
    id: file.id,
    name: file.name ?? '',
    mimeType: file.mimeType ?? DRIVE_UPLOAD_MIME_TYPE,
    parentId: file.parents?.[0] ?? fallbackParentId,
  };
}

export class GoogleDriveEndpoint implements DriveEndpoint {
  constructor(private readonly drive: drive_v3.Drive) {}

  async findFiles(query: DriveFileQuery): Promise<DriveFileRecord[]> {
    const q = buildDriveQuery(query);
    const records: DriveFileRecord[] = [];
    let pageToken: string | undefined;
    do {
      const response = await this.drive.files.list({
        q,
        fields: `nextPageToken, files(${FILE_FIELDS})`,
        pageSize: LIST_PAGE_SIZE,
        spaces: 'drive',
        includeItemsFromAllDrives: true,
        ...SHARED_DRIVES,
        ...(pageToken ? { pageToken } : {}),
      });
      for (const file of response.data.files ?? []) {
        records.push(toRecord(file, query.parentId));
      }
      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);
    return records;
  }

  async createFolder(name: string, parentId: string): Promise<DriveFileRecord> {
    const response = await this.drive.files.create({
      requestBody: {
        name,
        mimeType: DRIVE_FOLDER_MIME_TYPE,
        parents: [parentId],
      },
      fields: FILE_FIELDS,
      ...SHARED_DRIVES,
    });
    return toRecord(response.data, parentId);
  }

  async uploadFile(
    name: string,
    parentId: string,
    content: Readable,
  ): Promise<DriveFileRecord> {
    const response = await this.drive.files.create({
      requestBody: { name, parents: [parentId] },
      media: { mimeType: DRIVE_UPLOAD_MIME_TYPE, body: content },
      fields: FILE_FIELDS,
      ...SHARED_DRIVES,
    });
    return toRecord(response.data, parentId);
  }

  async grantPermission(
    fileId: string,
    permission: DrivePermission,
  ): Promise<void> {
    await this.drive.permissions.create({
      fileId,
      requestBody: { ...permission },
      fields: 'id',
      ...SHARED_DRIVES,
    });
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.drive.files.delete({ fileId, ...SHARED_DRIVES });
  }

  async downloadFile(fileId: string): Promise<Readable> {
    const response = await this.drive.files.get(
      { fileId, alt: 'media', ...SHARED_DRIVES },
      { responseType: 'stream' },
    );
    return response.data;
  }
}

/**
 * Builds one `GoogleDriveEndpoint` per provider instance from a service-account
 * credentials JSON document.
 */
export class GoogleDriveEndpointFactory
  implements IStorageEndpointFactory<DriveEndpoint>
{
  createEndpoint(credentialsJson: string): DriveEndpoint {
    let raw: unknown;
    try {
      raw = JSON.parse(credentialsJson);
    } catch (error) {
      throw new StorageError(
        StorageErrorCode.ConfigurationError,
        'Google Drive credentials are not valid JSON.',
        undefined,
        { cause: error },
      );
    }

    const parsed = ServiceAccountCredentialsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(
        StorageErrorCode.ConfigurationError,
        'Google Drive credentials are missing required service-account fields.',
        { validationErrors: parsed.error.flatten().fieldErrors },
      );
    }

    const auth = new google.auth.GoogleAuth({
      credentials: {
        client_email: parsed.data.client_email,
        private_key: parsed.data.private_key,
      },
      scopes: DRIVE_SCOPES,
    });
    return new GoogleDriveEndpoint(google.drive({ version: 'v3', auth }));
  }
}
