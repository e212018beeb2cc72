/**
 * @fileoverview Builds Drive v3 `files.list` search expressions.
 * @module src/storage/providers/googleDrive/driveQuery
 */
import {
  DRIVE_FOLDER_MIME_TYPE,
  type DriveFileQuery,
} from './googleDrive.types.js';

/**
 * Escapes a value for use inside a single-quoted Drive query string literal.
 * Backslashes are escaped first so the quote escapes are not doubled.
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * @example
 * buildDriveQuery({ parentId: 'root', name: "it's", kind: 'folder' })
 * // 'root' in parents and name = 'it\'s' and mimeType = 'application/vnd.google-apps.folder' and trashed = false
 */
export function buildDriveQuery(query: DriveFileQuery): string {
  const clauses = [`'${escapeQueryValue(query.parentId)}' in parents`];
  if (query.name !== undefined) {
    clauses.push(`name = '${escapeQueryValue(query.name)}'`);
  }
  if (query.kind === 'folder') {
    clauses.push(`mimeType = '${DRIVE_FOLDER_MIME_TYPE}'`);
  } else if (query.kind === 'file') {
    clauses.push(`mimeType != '${DRIVE_FOLDER_MIME_TYPE}'`);
  }
  clauses.push('trashed = false');
  return clauses.join(' and ');
}
