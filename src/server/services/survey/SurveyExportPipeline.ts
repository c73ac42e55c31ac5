/**
 * SurveyExportPipeline - KMZ archive in, one CSV file per chosen form out
 *
 * Stages run strictly one after another: archive → KML document → records →
 * form groups. Exporting builds the whole CSV text before the output file is
 * touched, and the file itself is written atomically.
 */

import path from 'path';
import { KmzArchiveLoader } from '../../adapters/kmz/KmzArchiveLoader.js';
import { KmlDocumentParser } from '../../adapters/kmz/KmlDocumentParser.js';
import { PlacemarkExtractor } from '../../adapters/kmz/PlacemarkExtractor.js';
import {
  DescriptionTableExtractor,
  type DescriptionParser,
} from '../../extraction/description/DescriptionTableExtractor.js';
import { CsvExportService } from '../export/CsvExportService.js';
import { FormGroupingService, formLabels } from './FormGroupingService.js';
import type { ExportConfig } from '../../config/exportConfig.js';
import type { FormGroups } from '../../types/survey.js';
import { SelectionError } from '../../types/errors.js';
import { outputFileName, writeFileAtomic } from '../../utils/outputFile.js';
import { createChildLogger } from '../../utils/logger.js';

const logger = createChildLogger({ component: 'SurveyExportPipeline' });

/**
 * Everything read from one archive
 */
export interface SurveyArchive {
  sourcePath: string;
  entryName: string;
  placemarkCount: number;
  groups: FormGroups;
  /** Form labels in selection order */
  labels: string[];
}

export interface ExportResult {
  form: string;
  outputPath: string;
  recordCount: number;
  columns: string[];
  droppedKeys: string[];
}

export type SurveyExportPipelineConfig = Pick<
  ExportConfig,
  'outputDir' | 'delimiter' | 'documentExtension' | 'dropUnclassified'
>;

export class SurveyExportPipeline {
  private readonly loader: KmzArchiveLoader;
  private readonly documentParser: KmlDocumentParser;
  private readonly grouping: FormGroupingService;
  private readonly exporter: CsvExportService;

  constructor(
    private readonly config: SurveyExportPipelineConfig,
    private readonly descriptionParser: DescriptionParser = new DescriptionTableExtractor()
  ) {
    this.loader = new KmzArchiveLoader({ documentExtension: config.documentExtension });
    this.documentParser = new KmlDocumentParser();
    this.grouping = new FormGroupingService(descriptionParser, {
      dropUnclassified: config.dropUnclassified,
    });
    this.exporter = new CsvExportService({ delimiter: config.delimiter });
  }

  /**
   * Load an archive and group its placemarks by form
   */
  async readForms(archivePath: string): Promise<SurveyArchive> {
    const source = await this.loader.load(archivePath);
    return this.readFormsFromDocument(archivePath, source.entryName, source.content);
  }

  /**
   * Same as readForms for an archive already in memory
   */
  async readFormsFromBuffer(zipBuffer: Buffer, sourcePath: string = '<buffer>'): Promise<SurveyArchive> {
    const source = await this.loader.loadFromBuffer(zipBuffer, sourcePath);
    return this.readFormsFromDocument(sourcePath, source.entryName, source.content);
  }

  /**
   * Write the records of one form to `<outputDir>/<form>.csv`
   *
   * @throws SelectionError if the archive has no such form
   */
  async exportForm(archive: SurveyArchive, form: string): Promise<ExportResult> {
    const records = archive.groups.get(form);
    if (!records) {
      throw new SelectionError(`Form '${form}' not found in ${archive.sourcePath}`, {
        form,
        available: archive.labels,
      });
    }

    const csv = this.exporter.buildExport(records);
    const outputPath = path.join(this.config.outputDir, outputFileName(form));
    await writeFileAtomic(outputPath, csv.content);

    logger.info({ form, outputPath, recordCount: csv.recordCount }, 'Exported form');

    return {
      form,
      outputPath,
      recordCount: csv.recordCount,
      columns: csv.columns,
      droppedKeys: csv.droppedKeys,
    };
  }

  private async readFormsFromDocument(
    sourcePath: string,
    entryName: string,
    content: Buffer
  ): Promise<SurveyArchive> {
    const document = await this.documentParser.parse(content);
    const records = new PlacemarkExtractor(document, this.descriptionParser).extractAll();
    const groups = this.grouping.group(records);
    const labels = formLabels(groups);

    logger.info(
      { sourcePath, entryName, placemarkCount: records.length, formCount: labels.length },
      'Read survey archive'
    );

    return { sourcePath, entryName, placemarkCount: records.length, groups, labels };
  }
}
