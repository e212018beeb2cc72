/**
 * @fileoverview Tests for the `googleapis`-backed Drive endpoint, with the
 * Drive client replaced by in-process doubles.
 * @module tests/storage/providers/googleDrive/googleDriveEndpoint.test
 */
import { Readable } from 'stream';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  DRIVE_SCOPES,
  GoogleDriveEndpointFactory,
} from '@/storage/providers/googleDrive/googleDriveEndpoint.js';
import { StorageErrorCode } from '@/types-global/errors.js';

const sdk = vi.hoisted(() => {
  const drive = {
    files: {
      list: vi.fn(),
      create: vi.fn(),
      delete: vi.fn(async () => ({ data: {} })),
      get: vi.fn(),
    },
    permissions: {
      create: vi.fn(async () => ({ data: { id: 'perm-1' } })),
    },
  };
  return {
    drive,
    GoogleAuth: vi.fn(),
    driveFactory: vi.fn(() => drive),
  };
});

vi.mock('googleapis', () => ({
  google: {
    auth: { GoogleAuth: sdk.GoogleAuth },
    drive: sdk.driveFactory,
  },
}));

const credentials = JSON.stringify({
  type: 'service_account',
  client_email: 'storage-bot@example.iam.gserviceaccount.com',
  private_key: 'test-private-key',
});

describe('GoogleDriveEndpoint', () => {
  const factory = new GoogleDriveEndpointFactory();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('GoogleDriveEndpointFactory', () => {
    it('authenticates with the service-account fields and Drive scope', () => {
      factory.createEndpoint(credentials);

      expect(sdk.GoogleAuth).toHaveBeenCalledWith({
        credentials: {
          client_email: 'storage-bot@example.iam.gserviceaccount.com',
          private_key: 'test-private-key',
        },
        scopes: DRIVE_SCOPES,
      });
      expect(sdk.driveFactory).toHaveBeenCalledWith(
        expect.objectContaining({ version: 'v3' }),
      );
    });

    it('rejects credentials that are not JSON', () => {
      expect(() => factory.createEndpoint('{not json')).toThrow(
        'Google Drive credentials are not valid JSON.',
      );
    });

    it('rejects credentials without a private key', () => {
      let caught: unknown;
      try {
        factory.createEndpoint(
          JSON.stringify({ client_email: 'storage-bot@example.com' }),
        );
      } catch (error) {
        caught = error;
      }
      expect(caught).toMatchObject({
        code: StorageErrorCode.ConfigurationError,
        data: { validationErrors: { private_key: ['Required'] } },
      });
      expect(sdk.GoogleAuth).not.toHaveBeenCalled();
    });
  });

  it('follows result pages and maps files to records', async () => {
    sdk.drive.files.list
      .mockResolvedValueOnce({
        data: {
          files: [
            {
              id: 'f1',
              name: 'a.txt',
              mimeType: 'text/plain',
              parents: ['folder-1'],
            },
          ],
          nextPageToken: 'page-2',
        },
      })
      .mockResolvedValueOnce({
        data: { files: [{ id: 'f2', name: 'a.txt' }] },
      });
    const endpoint = factory.createEndpoint(credentials);

    const records = await endpoint.findFiles({
      parentId: 'folder-1',
      name: 'a.txt',
      kind: 'file',
    });

    expect(records).toEqual([
      {
        id: 'f1',
        name: 'a.txt',
        mimeType: 'text/plain',
        parentId: 'folder-1',
      },
      {
        id: 'f2',
        name: 'a.txt',
        mimeType: 'application/octet-stream',
        parentId: 'folder-1',
      },
    ]);
    expect(sdk.drive.files.list).toHaveBeenNthCalledWith(1, {
      q: "'folder-1' in parents and name = 'a.txt' and mimeType != 'application/vnd.google-apps.folder' and trashed = false",
      fields: 'nextPageToken, files(id, name, mimeType, parents)',
      pageSize: 1000,
      spaces: 'drive',
      includeItemsFromAllDrives: true,
      supportsAllDrives: true,
    });
    expect(sdk.drive.files.list).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ pageToken: 'page-2' }),
    );
  });

  it('fails when Drive returns a file without an id', async () => {
    sdk.drive.files.list.mockResolvedValueOnce({
      data: { files: [{ name: 'orphan.txt' }] },
    });
    const endpoint = factory.createEndpoint(credentials);

    await expect(
      endpoint.findFiles({ parentId: 'root' }),
    ).rejects.toHaveProperty('code', StorageErrorCode.BackendUnavailable);
  });

  it('creates folders with the folder MIME type', async () => {
    sdk.drive.files.create.mockResolvedValueOnce({
      data: {
        id: 'new-folder',
        name: 'reports',
        mimeType: 'application/vnd.google-apps.folder',
        parents: ['root'],
      },
    });
    const endpoint = factory.createEndpoint(credentials);

    const folder = await endpoint.createFolder('reports', 'root');

    expect(folder.id).toBe('new-folder');
    expect(sdk.drive.files.create).toHaveBeenCalledWith({
      requestBody: {
        name: 'reports',
        mimeType: 'application/vnd.google-apps.folder',
        parents: ['root'],
      },
      fields: 'id, name, mimeType, parents',
      supportsAllDrives: true,
    });
  });

  it('uploads content as a media body', async () => {
    sdk.drive.files.create.mockResolvedValueOnce({
      data: { id: 'new-file', name: 'a.txt', parents: ['folder-1'] },
    });
    const endpoint = factory.createEndpoint(credentials);
    const content = Readable.from(['hello']);

    await endpoint.uploadFile('a.txt', 'folder-1', content);

    expect(sdk.drive.files.create).toHaveBeenCalledWith({
      requestBody: { name: 'a.txt', parents: ['folder-1'] },
      media: { mimeType: 'application/octet-stream', body: content },
      fields: 'id, name, mimeType, parents',
      supportsAllDrives: true,
    });
  });

  it('grants permissions and deletes by id', async () => {
    const endpoint = factory.createEndpoint(credentials);

    await endpoint.grantPermission('f1', { type: 'anyone', role: 'reader' });
    await endpoint.deleteFile('f1');

    expect(sdk.drive.permissions.create).toHaveBeenCalledWith({
      fileId: 'f1',
      requestBody: { type: 'anyone', role: 'reader' },
      fields: 'id',
      supportsAllDrives: true,
    });
    expect(sdk.drive.files.delete).toHaveBeenCalledWith({
      fileId: 'f1',
      supportsAllDrives: true,
    });
  });

  it('downloads media as a stream', async () => {
    const body = Readable.from(['payload']);
    sdk.drive.files.get.mockResolvedValueOnce({ data: body });
    const endpoint = factory.createEndpoint(credentials);

    expect(await endpoint.downloadFile('f1')).toBe(body);
    expect(sdk.drive.files.get).toHaveBeenCalledWith(
      { fileId: 'f1', alt: 'media', supportsAllDrives: true },
      { responseType: 'stream' },
    );
  });
});
