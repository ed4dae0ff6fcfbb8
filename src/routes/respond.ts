import type { Response } from 'express';
import multer from 'multer';
import type { ZodIssue } from 'zod';

import { InvalidFileError, SessionClosedError, describeError } from '../errors';

export const sendValidationErrors = (res: Response, issues: ZodIssue[]): Response =>
  res.status(400).json({
    errors: issues.map((issue) => ({
      path: issue.path.join('.') || undefined,
      message: issue.message,
    })),
  });

export const sendError = (res: Response, error: unknown): Response => {
  if (error instanceof InvalidFileError || error instanceof multer.MulterError) {
    return res.status(400).json({ error: error.message });
  }

  if (error instanceof SessionClosedError) {
    return res.status(409).json({ error: error.message });
  }

  console.error('[HTTP] Request failed:', error);
  return res.status(500).json({ error: `Internal server error: ${describeError(error)}` });
};
