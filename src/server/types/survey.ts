/**
 * Survey record types shared across the extraction pipeline
 */

/**
 * A single placemark flattened into tabular form
 */
export interface PlacemarkRecord {
  name: string;
  // Coordinates stay textual so the exported precision matches the source
  longitude: string;
  latitude: string;
  altitude: string;
  /** Key/value attributes from the description table, in source order */
  extra: ReadonlyMap<string, string>;
  /** Trimmed raw description markup */
  description: string;
}

/**
 * Form label to records, in document order
 */
export type FormGroups = Map<string, PlacemarkRecord[]>;

/**
 * Label used for placemarks whose description carries no heading
 */
export const UNCLASSIFIED_FORM = '__NO_FORM__';

export const CORE_COLUMNS = ['name', 'longitude', 'latitude', 'altitude'] as const;

export type CoreColumn = (typeof CORE_COLUMNS)[number];

export function isCoreColumn(column: string): column is CoreColumn {
  return CORE_COLUMNS.some((core) => core === column);
}
