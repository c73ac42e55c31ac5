/**
 * PlacemarkExtractor - Flatten KML placemarks into survey records
 */

import type { KmlDocument, KmlNode } from './KmlDocumentParser.js';
import type { DescriptionParser } from '../../extraction/description/DescriptionTableExtractor.js';
import type { PlacemarkRecord } from '../../types/survey.js';

/**
 * Split a KML coordinate tuple into longitude, latitude and altitude.
 * Tokens are positional and kept verbatim; missing positions are empty and
 * anything past the third is ignored.
 */
export function splitCoordinates(text: string): [string, string, string] {
  const trimmed = text.trim();
  if (!trimmed) {
    return ['', '', ''];
  }
  const [longitude = '', latitude = '', altitude = ''] = trimmed.split(',');
  return [longitude, latitude, altitude];
}

export class PlacemarkExtractor {
  constructor(
    private readonly document: KmlDocument,
    private readonly descriptionParser: DescriptionParser
  ) {}

  /**
   * Records for every placemark in the document, in document order
   */
  extractAll(): PlacemarkRecord[] {
    return this.document.placemarks().map((placemark) => this.extract(placemark));
  }

  extract(placemark: KmlNode): PlacemarkRecord {
    const name = this.document.childText(placemark, 'name') ?? '';
    const [longitude, latitude, altitude] = splitCoordinates(
      this.document.descendantText(placemark, 'coordinates') ?? ''
    );
    const description = this.document.childText(placemark, 'description') ?? '';

    return {
      name,
      longitude,
      latitude,
      altitude,
      extra: this.descriptionParser.extractTable(description),
      description,
    };
  }
}
