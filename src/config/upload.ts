/**
 * Upload Configuration Module
 *
 * Limits and storage for the roster CSV import. Files are kept in memory and
 * parsed in the request; nothing is written to disk.
 *
 * @module config/upload
 */

import path from 'path';

import multer, { type StorageEngine } from 'multer';

export type AllowedCsvMimeType = 'text/csv' | 'application/csv' | 'application/vnd.ms-excel' | 'text/plain';

export interface UploadConfig {
  readonly maxFileSize: number;
  readonly allowedMimeTypes: readonly AllowedCsvMimeType[];
  readonly allowedExtensions: readonly string[];
  readonly storage: StorageEngine;
}

const DEFAULT_MAX_FILE_SIZE = 2 * 1024 * 1024; // 2MB

const MAX_FILE_SIZE = 20 * 1024 * 1024;

// Browsers report .csv under several types depending on the platform
const ALLOWED_MIME_TYPES: readonly AllowedCsvMimeType[] = [
  'text/csv',
  'application/csv',
  'application/vnd.ms-excel',
  'text/plain',
];

function loadMaxFileSize(): number {
  const envSize = process.env.IMPORT_MAX_FILE_SIZE;

  if (envSize && envSize.trim().length > 0) {
    const parsedSize = parseInt(envSize.trim(), 10);

    if (!isNaN(parsedSize) && parsedSize > 0 && parsedSize <= MAX_FILE_SIZE) {
      return parsedSize;
    }

    console.warn('[UPLOAD_CONFIG] Invalid IMPORT_MAX_FILE_SIZE, using default:', {
      provided: envSize,
      default: DEFAULT_MAX_FILE_SIZE,
      timestamp: new Date().toISOString(),
    });
  }

  return DEFAULT_MAX_FILE_SIZE;
}

let uploadConfigInstance: UploadConfig | null = null;

export function getUploadConfig(): UploadConfig {
  if (!uploadConfigInstance) {
    uploadConfigInstance = {
      maxFileSize: loadMaxFileSize(),
      allowedMimeTypes: ALLOWED_MIME_TYPES,
      allowedExtensions: ['.csv'],
      storage: multer.memoryStorage(),
    };

    console.log('[UPLOAD_CONFIG] Configuration loaded:', {
      maxFileSize: uploadConfigInstance.maxFileSize,
      allowedExtensions: uploadConfigInstance.allowedExtensions,
      timestamp: new Date().toISOString(),
    });
  }

  return uploadConfigInstance;
}

export function isAllowedMimeType(mimeType: string): boolean {
  return getUploadConfig().allowedMimeTypes.some((allowed) => allowed === mimeType.toLowerCase());
}

export function isAllowedExtension(filename: string): boolean {
  const extension = path.extname(filename).toLowerCase();
  return getUploadConfig().allowedExtensions.includes(extension);
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
