import fs from 'fs/promises';
import path from 'path';
import { createChildLogger } from './logger.js';
import { OutputWriteError } from '../types/errors.js';

const logger = createChildLogger({ component: 'outputFile' });

// Characters rejected in file names on at least one common platform
const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

/**
 * File name for an exported form, e.g. "Tree Survey" -> "tree_survey.csv"
 */
export function outputFileName(label: string, extension: string = '.csv'): string {
  const base = label
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(UNSAFE_FILENAME_CHARS, '_')
    .replace(/^\.+/, '');
  return `${base || 'form'}${extension}`;
}

/**
 * Write a file atomically (write to temp file, then rename)
 *
 * The destination only appears once its full content is on disk; on failure
 * the temp file is removed and nothing is left at the destination.
 *
 * @throws OutputWriteError if the directory or file cannot be written
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    // Ensure directory exists
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    // Clean up temp file on error
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.debug({ tempPath, error: cleanupError }, 'Could not remove temp file');
    });
    throw new OutputWriteError(filePath, error);
  }

  logger.debug({ filePath, bytes: Buffer.byteLength(content, 'utf-8') }, 'Wrote output file');
}
