import fs from 'node:fs/promises';
import path from 'node:path';

import { DocumentLoadError, InvalidFileError, describeError } from '../errors';

export const ALLOWED_EXTENSIONS: readonly string[] = ['.pdf', '.doc', '.docx'];

export type UploadLimits = {
  maxFileSizeBytes: number;
};

export const validateUpload = (filename: string, sizeBytes: number, { maxFileSizeBytes }: UploadLimits): void => {
  const extension = path.extname(filename).toLowerCase();

  if (!ALLOWED_EXTENSIONS.includes(extension)) {
    throw new InvalidFileError(
      `Invalid file ${filename}: file type not allowed. Allowed: ${ALLOWED_EXTENSIONS.join(', ')}`,
    );
  }

  if (sizeBytes > maxFileSizeBytes) {
    const maxMb = Math.round((maxFileSizeBytes / (1024 * 1024)) * 100) / 100;
    throw new InvalidFileError(`Invalid file ${filename}: file too large. Max size: ${maxMb}MB`);
  }
};

const loadPdf = async (buffer: Buffer): Promise<string> => {
  // Loaded lazily: pdf-parse only needs to be resolved once a PDF arrives.
  const { default: pdfParse } = await import('pdf-parse');
  const result = await pdfParse(buffer);
  return (result.text ?? '').trim();
};

const loadWord = async (buffer: Buffer): Promise<string> => {
  const mammoth = await import('mammoth');
  const result = await mammoth.extractRawText({ buffer });
  return result.value.trim();
};

export const loadDocument = async (filePath: string): Promise<string> => {
  const extension = path.extname(filePath).toLowerCase();

  if (!ALLOWED_EXTENSIONS.includes(extension)) {
    throw new DocumentLoadError(filePath, `Unsupported file format: ${extension || '(none)'}`);
  }

  try {
    const buffer = await fs.readFile(filePath);
    return extension === '.pdf' ? await loadPdf(buffer) : await loadWord(buffer);
  } catch (error) {
    throw new DocumentLoadError(filePath, `Error reading ${path.basename(filePath)}: ${describeError(error)}`, {
      cause: error,
    });
  }
};

/** Loads every file; files that fail are logged and left out of the result. */
export const loadDocuments = async (filePaths: string[]): Promise<Map<string, string>> => {
  const settled = await Promise.allSettled(filePaths.map((filePath) => loadDocument(filePath)));
  const documents = new Map<string, string>();

  settled.forEach((outcome, index) => {
    const filePath = filePaths[index];

    if (outcome.status === 'fulfilled') {
      console.info(`[LOAD] Successfully loaded: ${filePath}`);
      documents.set(filePath, outcome.value);
    } else {
      console.error(`[LOAD] Failed to load ${filePath}: ${describeError(outcome.reason)}`);
    }
  });

  return documents;
};
