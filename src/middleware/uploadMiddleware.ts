// src/middleware/uploadMiddleware.ts
import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { serverConfig, config } from '../config';

// Ensure upload directory exists
if (!fs.existsSync(serverConfig.uploadDir)) {
  fs.mkdirSync(serverConfig.uploadDir, { recursive: true });
}

const storage = multer.diskStorage({
  destination: (_req, _file, cb) => cb(null, serverConfig.uploadDir),
  filename: (_req, file, cb) => {
    const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1E9);
    const ext = path.extname(file.originalname);
    const name = path.basename(file.originalname, ext);
    cb(null, `${name}-${uniqueSuffix}${ext}`);
  }
});

// Format and per-resume size checks happen in the analysis pipeline so that a
// bad file becomes a failed outcome instead of rejecting the whole upload.
// The hard limit here only protects the server.
export const uploadMiddleware = multer({
  storage,
  limits: {
    fileSize: config.files.uploadLimitMb * 1024 * 1024,
    files: config.files.maxBatch,
  },
});
