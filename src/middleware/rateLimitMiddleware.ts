// src/middleware/rateLimitMiddleware.ts
import rateLimit from 'express-rate-limit';
import { serverConfig } from '../config';

export const rateLimitMiddleware = rateLimit({
  windowMs: serverConfig.rateLimitWindow,
  max: serverConfig.rateLimitMax,
  message: {
    success: false,
    error: 'Too many requests from this IP, please try again later',
  },
  standardHeaders: true,
  legacyHeaders: false,
  // Progress polling should not eat into the request budget
  skip: (req) => /\/batch\/[^/]+\/progress$/.test(req.path)
});
