import JSZip from 'jszip';

export interface PlacemarkFixture {
  name?: string;
  coordinates?: string;
  description?: string;
}

function placemarkXml(placemark: PlacemarkFixture): string {
  const parts: string[] = ['<Placemark>'];
  if (placemark.name !== undefined) {
    parts.push(`<name>${placemark.name}</name>`);
  }
  if (placemark.description !== undefined) {
    parts.push(`<description><![CDATA[${placemark.description}]]></description>`);
  }
  if (placemark.coordinates !== undefined) {
    parts.push(`<Point><coordinates>${placemark.coordinates}</coordinates></Point>`);
  }
  parts.push('</Placemark>');
  return parts.join('\n');
}

/**
 * KML 2.2 document holding the given placemarks in order
 */
export function buildKml(placemarks: readonly PlacemarkFixture[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<kml xmlns="http://www.opengis.net/kml/2.2">',
    '<Document>',
    '<name>survey export</name>',
    ...placemarks.map(placemarkXml),
    '</Document>',
    '</kml>',
  ].join('\n');
}

/**
 * Zip archive with the given entries, in insertion order
 */
export async function buildZip(entries: Record<string, string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}

export async function buildKmz(placemarks: readonly PlacemarkFixture[]): Promise<Buffer> {
  return buildZip({ 'doc.kml': buildKml(placemarks) });
}

export function tableHtml(rows: ReadonlyArray<readonly [string, string]>): string {
  const body = rows.map(([key, value]) => `<tr><td>${key}</td><td>${value}</td></tr>`).join('');
  return `<table>${body}</table>`;
}
