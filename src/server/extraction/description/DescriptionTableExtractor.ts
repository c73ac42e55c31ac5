/**
 * DescriptionTableExtractor - Recover form label and attributes from placemark descriptions
 *
 * Survey apps write the description as a small HTML fragment: an <h1> naming
 * the form followed by one or more two-column tables of answers. The markup
 * is often not well-formed (bare ampersands, unclosed cells), so parsing goes
 * through cheerio's HTML5 parser rather than an XML parser.
 */

import * as cheerio from 'cheerio';
import { createChildLogger } from '../../utils/logger.js';
import { DescriptionParseFailure } from '../../types/errors.js';

const logger = createChildLogger({ component: 'DescriptionTableExtractor' });

/**
 * Heading and key/value extraction over a description fragment.
 * Implementations never throw: unusable markup yields an empty result.
 */
export interface DescriptionParser {
  extractHeading(html: string): string | undefined;
  extractTable(html: string): Map<string, string>;
}

export interface DescriptionTableExtractorOptions {
  /** Tag whose first occurrence names the form */
  headingTag?: string;
}

export class DescriptionTableExtractor implements DescriptionParser {
  private readonly headingTag: string;

  constructor(options: DescriptionTableExtractorOptions = {}) {
    this.headingTag = options.headingTag || 'h1';
  }

  /**
   * Text of the first heading element, or undefined when there is none
   * or it is blank
   */
  extractHeading(html: string): string | undefined {
    if (!html) {
      return undefined;
    }

    try {
      const $ = cheerio.load(html);
      const heading = $(this.headingTag).first();
      if (heading.length === 0) {
        return undefined;
      }
      const text = heading.text().trim();
      return text.length > 0 ? text : undefined;
    } catch (error) {
      const failure = new DescriptionParseFailure('heading', error);
      logger.warn({ code: failure.code, error: failure.message }, 'Could not read description heading');
      return undefined;
    }
  }

  /**
   * Key/value pairs from every two-cell table row, across all tables in
   * document order. Later rows overwrite earlier rows with the same key.
   * Line breaks inside a cell become newlines.
   */
  extractTable(html: string): Map<string, string> {
    const fields = new Map<string, string>();
    if (!html) {
      return fields;
    }

    try {
      const $ = cheerio.load(html);
      $('table br').replaceWith('\n');
      $('table tr').each((_index, row) => {
        const cells = $(row).children('td');
        if (cells.length !== 2) {
          return;
        }
        const key = cells.eq(0).text().trim();
        if (!key) {
          return;
        }
        fields.set(key, cells.eq(1).text().trim());
      });
    } catch (error) {
      const failure = new DescriptionParseFailure('table', error);
      logger.warn({ code: failure.code, error: failure.message }, 'Could not read description table');
      return new Map();
    }

    return fields;
  }
}
