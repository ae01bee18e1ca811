import fs from 'node:fs/promises';
import path from 'node:path';
import { NotFoundError, ValidationError } from '../errors.js';

export interface LoadedDocument {
  text: string;
  sourcePath: string;
  filename: string;
  fileType: string;
  fileSizeMb: number;
}

export interface LoadOptions {
  supportedFileTypes: string[];
  maxFileSizeMb: number;
}

const PLAIN_TEXT_TYPES = new Set(['.txt', '.md']);

export function fileTypeOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function bytesToMb(bytes: number): number {
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}

/**
 * Reads a plain-text or Markdown file. PDF and DOCX are accepted types but
 * need an external extractor to produce text first.
 */
export async function loadTextFile(filePath: string, opts: LoadOptions): Promise<LoadedDocument> {
  const sourcePath = path.resolve(filePath);
  const fileType = fileTypeOf(sourcePath);

  if (!opts.supportedFileTypes.includes(fileType)) {
    throw new ValidationError(
      `unsupported file type "${fileType || '(none)'}" for ${path.basename(sourcePath)}; supported: ${opts.supportedFileTypes.join(', ')}`
    );
  }

  let size: number;
  try {
    const stat = await fs.stat(sourcePath);
    if (!stat.isFile()) throw new ValidationError(`${sourcePath} is not a regular file`);
    size = stat.size;
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new NotFoundError(`file not found: ${sourcePath}`, error);
  }

  if (size > opts.maxFileSizeMb * 1024 * 1024) {
    throw new ValidationError(`${path.basename(sourcePath)} is ${bytesToMb(size)} MB; the limit is ${opts.maxFileSizeMb} MB`);
  }
  if (!PLAIN_TEXT_TYPES.has(fileType)) {
    throw new ValidationError(`${fileType} files need a text extractor; convert ${path.basename(sourcePath)} to .txt or .md first`);
  }

  const text = await fs.readFile(sourcePath, 'utf8');
  return {
    text,
    sourcePath,
    filename: path.basename(sourcePath),
    fileType,
    fileSizeMb: bytesToMb(size)
  };
}
