/**
 * KmzArchiveLoader - Locate the KML document inside a KMZ archive
 *
 * A KMZ file is a zip container. The loader returns the decompressed bytes of
 * the first entry whose name ends in the document extension. Entries are
 * visited in the archive's central-directory order, so when several entries
 * match, the first listed one wins and the rest are only logged.
 */

import { readFile } from 'fs/promises';
import JSZip from 'jszip';
import { createChildLogger } from '../../utils/logger.js';
import {
  ArchiveReadError,
  InvalidArchiveError,
  MissingDocumentError,
  getErrorMessage,
} from '../../types/errors.js';

const logger = createChildLogger({ component: 'KmzArchiveLoader' });

export const DEFAULT_DOCUMENT_EXTENSION = '.kml';

/**
 * Document entry extracted from the archive
 */
export interface KmlDocumentSource {
  entryName: string;
  content: Buffer;
}

export interface KmzArchiveLoaderOptions {
  /** Entry name suffix to look for, compared case-insensitively */
  documentExtension?: string;
}

export class KmzArchiveLoader {
  private readonly documentExtension: string;

  constructor(options: KmzArchiveLoaderOptions = {}) {
    this.documentExtension = (options.documentExtension || DEFAULT_DOCUMENT_EXTENSION).toLowerCase();
  }

  /**
   * Read a KMZ file from disk and extract its document
   *
   * @throws ArchiveReadError if the file cannot be read
   */
  async load(archivePath: string): Promise<KmlDocumentSource> {
    let buffer: Buffer;
    try {
      buffer = await readFile(archivePath);
    } catch (error) {
      throw new ArchiveReadError(archivePath, error);
    }

    return this.loadFromBuffer(buffer, archivePath);
  }

  /**
   * Extract the document from an in-memory KMZ archive
   *
   * @throws InvalidArchiveError if the bytes are not a zip archive
   * @throws MissingDocumentError if no entry has the document extension
   */
  async loadFromBuffer(zipBuffer: Buffer, archivePath?: string): Promise<KmlDocumentSource> {
    const zip = new JSZip();
    try {
      await zip.loadAsync(zipBuffer);
    } catch (error) {
      throw new InvalidArchiveError(`Not a valid KMZ archive: ${getErrorMessage(error)}`, { archivePath });
    }

    const candidates = Object.entries(zip.files)
      .filter(([filename, file]) => !file.dir && filename.toLowerCase().endsWith(this.documentExtension));

    if (candidates.length === 0) {
      throw new MissingDocumentError(this.documentExtension, {
        archivePath,
        entries: Object.keys(zip.files),
      });
    }

    const [entryName, file] = candidates[0];
    if (candidates.length > 1) {
      logger.warn(
        { selected: entryName, ignored: candidates.slice(1).map(([name]) => name) },
        'Archive holds several documents, using the first one listed'
      );
    }

    const content = await file.async('nodebuffer');

    logger.debug({ entryName, bytes: content.length }, 'Extracted document from archive');

    return { entryName, content };
  }
}
