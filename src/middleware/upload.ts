import multer from 'multer';
import path from 'path';
import fs from 'fs';
import type { ErrorRequestHandler, Request } from 'express';
import { config } from '../config/env';
import { BadRequestError } from '../errors';
import { StringUtils } from '../utils/stringUtils';

const ALLOWED_EXTENSIONS = ['.csv', '.txt', '.tsv'];

const uploadDir = config.upload.directory;

// Configure multer storage
const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    fs.mkdir(uploadDir, { recursive: true }, (err) => cb(err, uploadDir));
  },
  filename: (_req, file, cb) => {
    // Generate unique filename: timestamp-originalname
    cb(null, `${Date.now()}-${StringUtils.sanitizeFilename(file.originalname)}`);
  },
});

// File filter - delimited text only
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const ext = path.extname(file.originalname).toLowerCase();

  if (ALLOWED_EXTENSIONS.includes(ext)) {
    cb(null, true);
  } else {
    cb(new BadRequestError('Only delimited text files (.csv, .txt, .tsv) are allowed', { fileName: file.originalname }));
  }
};

export const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: config.upload.maxFileSizeMB * 1024 * 1024, // Convert MB to bytes
  },
});

/**
 * Converts multer failures into BadRequestError for the central error handler
 */
export const handleUploadErrors: ErrorRequestHandler = (err, _req, _res, next) => {
  if (err instanceof multer.MulterError) {
    const message =
      err.code === 'LIMIT_FILE_SIZE' ? `Maximum file size is ${config.upload.maxFileSizeMB}MB` : err.message;
    next(new BadRequestError(message, { code: err.code, field: err.field }));
    return;
  }
  next(err);
};
