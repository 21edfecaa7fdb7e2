// src/middleware/errorMiddleware.ts
import type { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { config } from '../config';

function hasCode(err: unknown): err is { code: string } {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

function hasType(err: unknown): err is { type: string } {
  return typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string';
}

export const errorMiddleware = (
  err: unknown,
  _req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  _next: NextFunction
) => {
  console.error('Server error:', err);
  const timestamp = new Date().toISOString();

  // Multer errors
  if (err instanceof MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return res.status(400).json({
        success: false,
        error: `File too large. Maximum upload size is ${config.files.uploadLimitMb}MB per file`,
        timestamp
      });
    }

    if (err.code === 'LIMIT_FILE_COUNT') {
      return res.status(400).json({
        success: false,
        error: `Too many files. Maximum ${config.files.maxBatch} files per batch`,
        timestamp
      });
    }

    return res.status(400).json({
      success: false,
      error: `Upload error: ${err.message}`,
      timestamp
    });
  }

  // Body parser errors
  if (hasType(err) && err.type === 'entity.parse.failed') {
    return res.status(400).json({
      success: false,
      error: 'Invalid JSON in request body',
      timestamp
    });
  }

  // Request timeout errors
  if (hasCode(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')) {
    return res.status(408).json({
      success: false,
      error: 'Request timeout',
      timestamp
    });
  }

  // Default error
  return res.status(500).json({
    success: false,
    error: 'Internal server error',
    details: process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : undefined,
    timestamp
  });
};
