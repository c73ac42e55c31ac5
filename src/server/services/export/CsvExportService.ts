/**
 * CsvExportService - Serialize one form's records as delimited text
 *
 * The column list comes from the first record of the group: the four core
 * columns followed by that record's description keys. Later records are
 * written under the same columns, so any key they carry outside that set is
 * not exported. `buildExport` reports those keys so callers can surface them.
 */

import { CORE_COLUMNS, isCoreColumn, type PlacemarkRecord } from '../../types/survey.js';
import { createChildLogger } from '../../utils/logger.js';

const logger = createChildLogger({ component: 'CsvExportService' });

export interface CsvExportOptions {
  /** Single-character field delimiter, ',' by default */
  delimiter?: string;
}

export interface CsvExport {
  columns: string[];
  content: string;
  recordCount: number;
  /** Description keys present in some record but not exported */
  droppedKeys: string[];
}

export class CsvExportService {
  private readonly delimiter: string;

  constructor(options: CsvExportOptions = {}) {
    this.delimiter = options.delimiter ?? ',';
  }

  /**
   * Column list derived from the group's first record
   */
  buildSchema(records: readonly PlacemarkRecord[]): string[] {
    const columns: string[] = [...CORE_COLUMNS];
    const exemplar = records[0];
    if (!exemplar) {
      return columns;
    }
    for (const key of exemplar.extra.keys()) {
      if (!isCoreColumn(key)) {
        columns.push(key);
      }
    }
    return columns;
  }

  /**
   * Cell values for each record under a fixed column list
   */
  toRows(records: readonly PlacemarkRecord[], columns: readonly string[]): string[][] {
    return records.map((record) => columns.map((column) => this.cellValue(record, column)));
  }

  serialize(columns: readonly string[], rows: readonly string[][]): string {
    const lines = [columns, ...rows].map((row) => row.map((value) => this.escapeField(value)).join(this.delimiter));
    return lines.map((line) => `${line}\n`).join('');
  }

  /**
   * Schema, rows and serialized text for a group of records
   */
  buildExport(records: readonly PlacemarkRecord[]): CsvExport {
    const columns = this.buildSchema(records);
    const content = this.serialize(columns, this.toRows(records, columns));
    const droppedKeys = this.findDroppedKeys(records, columns);

    if (droppedKeys.length > 0) {
      logger.warn(
        { droppedKeys },
        'Some records carry fields outside the first record\'s columns; those fields are not exported'
      );
    }

    return { columns, content, recordCount: records.length, droppedKeys };
  }

  private cellValue(record: PlacemarkRecord, column: string): string {
    if (isCoreColumn(column)) {
      return record[column];
    }
    return record.extra.get(column) ?? '';
  }

  private findDroppedKeys(records: readonly PlacemarkRecord[], columns: readonly string[]): string[] {
    const known = new Set(columns.filter((column) => !isCoreColumn(column)));
    const dropped = new Set<string>();
    for (const record of records) {
      for (const key of record.extra.keys()) {
        if (!known.has(key)) {
          dropped.add(key);
        }
      }
    }
    return [...dropped];
  }

  /**
   * Escape CSV field value
   */
  private escapeField(value: string): string {
    if (!value) return '';
    if (
      value.includes(this.delimiter) ||
      value.includes('"') ||
      value.includes('\n') ||
      value.includes('\r')
    ) {
      return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
  }
}
