import { describe, it, expect } from 'vitest';
import { KmlDocumentParser } from './KmlDocumentParser.js';
import { MalformedDocumentError } from '../../types/errors.js';
import { buildKml } from '../../test-utils/kmzFixtures.js';

describe('KmlDocumentParser', () => {
  const parser = new KmlDocumentParser();

  it('lists placemarks in document order across folders', async () => {
    const kml = `<?xml version="1.0" encoding="UTF-8"?>
<kml xmlns="http://www.opengis.net/kml/2.2">
  <Document>
    <Placemark><name>A</name></Placemark>
    <Folder>
      <name>Nested</name>
      <Placemark><name>B</name></Placemark>
      <Folder><Placemark><name>C</name></Placemark></Folder>
    </Folder>
    <Placemark><name>D</name></Placemark>
  </Document>
</kml>`;

    const document = await parser.parse(kml);
    const names = document.placemarks().map((placemark) => document.childText(placemark, 'name'));

    expect(names).toEqual(['A', 'B', 'C', 'D']);
  });

  it('accepts a buffer and prefixed KML elements', async () => {
    const kml = `<kml:kml xmlns:kml="http://www.opengis.net/kml/2.2">
  <kml:Placemark><kml:name> Prefixed </kml:name></kml:Placemark>
</kml:kml>`;

    const document = await parser.parse(Buffer.from(kml, 'utf-8'));
    const [placemark] = document.placemarks();

    expect(document.placemarks()).toHaveLength(1);
    expect(document.childText(placemark, 'name')).toBe('Prefixed');
  });

  it('ignores placemarks outside the KML namespace', async () => {
    const document = await parser.parse('<kml><Document><Placemark><name>x</name></Placemark></Document></kml>');

    expect(document.placemarks()).toEqual([]);
  });

  it('reads trimmed child text and reports absent children as undefined', async () => {
    const document = await parser.parse(
      buildKml([{ name: '  Well 7  ', description: '<h1>Wells</h1>' }])
    );
    const [placemark] = document.placemarks();

    expect(document.childText(placemark, 'name')).toBe('Well 7');
    expect(document.childText(placemark, 'description')).toBe('<h1>Wells</h1>');
    expect(document.childText(placemark, 'styleUrl')).toBeUndefined();
  });

  it('finds coordinates nested below the placemark', async () => {
    const document = await parser.parse(buildKml([{ name: 'P', coordinates: '-70.5,-33.4,512' }]));
    const [placemark] = document.placemarks();

    expect(document.childText(placemark, 'coordinates')).toBeUndefined();
    expect(document.descendantText(placemark, 'coordinates')).toBe('-70.5,-33.4,512');
  });

  it('decodes entities in element text', async () => {
    const document = await parser.parse(buildKml([{ name: 'Smith &amp; Sons' }]));
    const [placemark] = document.placemarks();

    expect(document.childText(placemark, 'name')).toBe('Smith & Sons');
  });

  it('decodes a buffer in the encoding its XML declaration names', async () => {
    const kml = `<?xml version="1.0" encoding="ISO-8859-1"?>
<kml xmlns="http://www.opengis.net/kml/2.2"><Placemark><name>Peñalolén</name></Placemark></kml>`;

    const document = await parser.parse(Buffer.from(kml, 'latin1'));
    const [placemark] = document.placemarks();

    expect(document.childText(placemark, 'name')).toBe('Peñalolén');
  });

  it('decodes a UTF-16 buffer marked with a byte order mark', async () => {
    const kml = '<kml xmlns="http://www.opengis.net/kml/2.2"><Placemark><name>Ñuñoa</name></Placemark></kml>';
    const content = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(kml, 'utf16le')]);

    const document = await parser.parse(content);
    const [placemark] = document.placemarks();

    expect(document.childText(placemark, 'name')).toBe('Ñuñoa');
  });

  it('rejects a buffer declaring an unknown encoding', async () => {
    const kml = '<?xml version="1.0" encoding="x-no-such-charset"?><kml/>';

    await expect(parser.parse(Buffer.from(kml, 'latin1'))).rejects.toThrow(
      "Unsupported KML document encoding 'x-no-such-charset'"
    );
  });

  it('rejects markup that is not well-formed', async () => {
    await expect(parser.parse('<kml><Document></kml>')).rejects.toBeInstanceOf(MalformedDocumentError);
  });

  it('rejects empty content', async () => {
    await expect(parser.parse('   ')).rejects.toThrow('KML document is empty');
  });
});
