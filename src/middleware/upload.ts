/**
 * CSV Upload Middleware
 *
 * Accepts a single `.csv` file in memory for the roster import.
 *
 * @module middleware/upload
 */

import path from 'path';

import type { NextFunction, RequestHandler, Response } from 'express';
import multer from 'multer';

import { formatFileSize, getUploadConfig, isAllowedExtension, isAllowedMimeType } from '../config/upload.js';
import { ServiceErrorCode } from '../types/index.js';
import type { AuthenticatedRequest } from './authenticate.js';

const DEFAULT_FIELD_NAME = 'file';

const HTTP_STATUS = {
  BAD_REQUEST: 400,
  PAYLOAD_TOO_LARGE: 413,
} as const;

class UnsupportedFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedFileError';
  }
}

function sendUploadError(
  res: Response,
  statusCode: number,
  code: string,
  message: string,
  details?: Record<string, unknown>
): void {
  res.status(statusCode).json({
    success: false,
    code,
    message,
    details,
    timestamp: new Date().toISOString(),
  });
}

function csvFileFilter(
  req: AuthenticatedRequest,
  file: Express.Multer.File,
  callback: multer.FileFilterCallback
): void {
  if (!isAllowedExtension(file.originalname) || !isAllowedMimeType(file.mimetype)) {
    console.warn('[UPLOAD_MIDDLEWARE] Rejected non-CSV upload:', {
      correlationId: req.correlationId,
      filename: file.originalname,
      extension: path.extname(file.originalname).toLowerCase(),
      mimetype: file.mimetype,
      timestamp: new Date().toISOString(),
    });
    callback(new UnsupportedFileError(`File '${file.originalname}' is not a CSV file`));
    return;
  }

  callback(null, true);
}

function handleUploadError(error: unknown, req: AuthenticatedRequest, res: Response): void {
  console.error('[UPLOAD_MIDDLEWARE] Upload error:', {
    correlationId: req.correlationId,
    error: error instanceof Error ? error.message : String(error),
    timestamp: new Date().toISOString(),
  });

  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      const { maxFileSize } = getUploadConfig();
      sendUploadError(
        res,
        HTTP_STATUS.PAYLOAD_TOO_LARGE,
        'FILE_TOO_LARGE',
        `File size exceeds maximum allowed size of ${formatFileSize(maxFileSize)}`,
        { maxSize: maxFileSize, field: error.field }
      );
      return;
    }

    sendUploadError(res, HTTP_STATUS.BAD_REQUEST, 'INVALID_REQUEST', 'Invalid upload request format', {
      code: error.code,
      field: error.field,
    });
    return;
  }

  const message = error instanceof UnsupportedFileError ? error.message : 'Upload failed';
  sendUploadError(res, HTTP_STATUS.BAD_REQUEST, ServiceErrorCode.InvalidCsv, message);
}

/**
 * Parse a single CSV file from a multipart request into `req.file`
 *
 * Responds 400 INVALID_CSV when no file or a non-CSV file is sent, 413 when it
 * is too large.
 */
export function uploadCsv(fieldName: string = DEFAULT_FIELD_NAME): RequestHandler {
  const config = getUploadConfig();
  const upload = multer({
    storage: config.storage,
    limits: { fileSize: config.maxFileSize, files: 1 },
    fileFilter: csvFileFilter,
  }).single(fieldName);

  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    upload(req, res, (error: unknown) => {
      if (error) {
        handleUploadError(error, req, res);
        return;
      }

      if (!req.file) {
        sendUploadError(res, HTTP_STATUS.BAD_REQUEST, ServiceErrorCode.InvalidCsv, 'No file uploaded', {
          fieldName,
        });
        return;
      }

      next();
    });
  };
}
