import { describe, it, expect } from 'vitest';
import { PlacemarkExtractor, splitCoordinates } from './PlacemarkExtractor.js';
import { KmlDocumentParser } from './KmlDocumentParser.js';
import { DescriptionTableExtractor } from '../../extraction/description/DescriptionTableExtractor.js';
import { buildKml, tableHtml } from '../../test-utils/kmzFixtures.js';

describe('splitCoordinates', () => {
  it('assigns up to three tokens positionally', () => {
    expect(splitCoordinates('1.0,2.0,3.0')).toEqual(['1.0', '2.0', '3.0']);
    expect(splitCoordinates('1.0,2.0')).toEqual(['1.0', '2.0', '']);
    expect(splitCoordinates('1.0')).toEqual(['1.0', '', '']);
    expect(splitCoordinates('')).toEqual(['', '', '']);
  });

  it('ignores tokens past the third', () => {
    expect(splitCoordinates('1,2,3,4')).toEqual(['1', '2', '3']);
  });

  it('trims the tuple but keeps tokens verbatim', () => {
    expect(splitCoordinates('  -70.123400,-33.40 \n')).toEqual(['-70.123400', '-33.40', '']);
  });
});

describe('PlacemarkExtractor', () => {
  async function extractFrom(kml: string) {
    const document = await new KmlDocumentParser().parse(kml);
    return new PlacemarkExtractor(document, new DescriptionTableExtractor()).extractAll();
  }

  it('builds a record from name, coordinates and description table', async () => {
    const description = `<h1>Trees</h1>${tableHtml([
      ['Species', 'Quercus'],
      ['Height', '12'],
    ])}`;

    const [record] = await extractFrom(
      buildKml([{ name: 'Oak 1', coordinates: '-70.1,-33.4,512', description }])
    );

    expect(record.name).toBe('Oak 1');
    expect([record.longitude, record.latitude, record.altitude]).toEqual(['-70.1', '-33.4', '512']);
    expect([...record.extra.entries()]).toEqual([
      ['Species', 'Quercus'],
      ['Height', '12'],
    ]);
    expect(record.description).toBe(description);
  });

  it('defaults missing parts to empty values', async () => {
    const [record] = await extractFrom(buildKml([{}]));

    expect(record).toEqual({
      name: '',
      longitude: '',
      latitude: '',
      altitude: '',
      extra: new Map(),
      description: '',
    });
  });

  it('returns one record per placemark in document order', async () => {
    const records = await extractFrom(buildKml([{ name: 'first' }, { name: 'second' }, { name: 'third' }]));

    expect(records.map((record) => record.name)).toEqual(['first', 'second', 'third']);
  });
});
