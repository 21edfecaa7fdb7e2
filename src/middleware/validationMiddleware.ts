// src/middleware/validationMiddleware.ts
import type { Request, Response, NextFunction } from 'express';
import { param, body, query, validationResult } from 'express-validator';
import { config } from '../config';
import { cleanupFile } from '../utils/uploads';

export const SCORE_KEYS = ['ai_ml_experience', 'gen_ai_experience', 'overall_experience'];
export const DOWNLOAD_TYPES = ['excel', 'json', 'bundle'];

function discardUploads(req: Request) {
  if (req.file) cleanupFile(req.file.path);
  if (Array.isArray(req.files)) req.files.forEach((file) => cleanupFile(file.path));
}

function handleValidationErrors(req: Request, res: Response, next: NextFunction) {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    console.log('❌ Validation failed:', errors.array());
    discardUploads(req);
    return res.status(400).json({
      success: false,
      error: 'Validation failed',
      details: errors.array(),
      timestamp: new Date().toISOString()
    });
  }
  next();
}

const { bounds } = config;

const conversationId = () =>
  body('conversationId')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 100 })
    .withMessage('conversationId must be 1-100 characters');

export const validationMiddleware = {
  validateBatchOverrides: [
    body('batchSize')
      .optional()
      .isInt({ min: bounds.chunkSize.min, max: bounds.chunkSize.max })
      .withMessage(`batchSize must be between ${bounds.chunkSize.min} and ${bounds.chunkSize.max}`),
    body('maxConcurrent')
      .optional()
      .isInt({ min: bounds.maxConcurrent.min, max: bounds.maxConcurrent.max })
      .withMessage(`maxConcurrent must be between ${bounds.maxConcurrent.min} and ${bounds.maxConcurrent.max}`),
    body('rateLimitDelay')
      .optional()
      .isFloat({ min: bounds.interChunkDelaySeconds.min, max: bounds.interChunkDelaySeconds.max })
      .withMessage(`rateLimitDelay must be between ${bounds.interChunkDelaySeconds.min} and ${bounds.interChunkDelaySeconds.max} seconds`),
    handleValidationErrors
  ],

  validateBatchId: [
    param('batchId')
      .isUUID()
      .withMessage('Invalid batch ID format'),
    handleValidationErrors
  ],

  validateDownloadType: [
    param('type')
      .isIn(DOWNLOAD_TYPES)
      .withMessage(`Download type must be: ${DOWNLOAD_TYPES.join(', ')}`),
    handleValidationErrors
  ],

  validateRanking: [
    query('score')
      .optional()
      .isIn(SCORE_KEYS)
      .withMessage(`score must be one of: ${SCORE_KEYS.join(', ')}`),
    query('limit')
      .optional()
      .isInt({ min: 1, max: 100 })
      .withMessage('limit must be between 1 and 100'),
    handleValidationErrors
  ],

  validateChat: [
    body('question')
      .isString()
      .trim()
      .isLength({ min: 1, max: 2000 })
      .withMessage('Question must be 1-2000 characters'),
    body('batchId')
      .optional()
      .isUUID()
      .withMessage('Invalid batch ID format'),
    conversationId(),
    handleValidationErrors
  ],

  validateChatContext: [
    conversationId(),
    handleValidationErrors
  ],

  validateFiles: (req: Request, res: Response, next: NextFunction) => {
    const files = req.files;

    if (!Array.isArray(files) || files.length === 0) {
      return res.status(400).json({
        success: false,
        error: 'No files uploaded',
        timestamp: new Date().toISOString()
      });
    }

    if (files.length > config.files.maxBatch) {
      discardUploads(req);
      return res.status(400).json({
        success: false,
        error: `Too many files. Maximum ${config.files.maxBatch} files allowed`,
        timestamp: new Date().toISOString()
      });
    }

    next();
  }
};
