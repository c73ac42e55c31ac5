export { KmzArchiveLoader, DEFAULT_DOCUMENT_EXTENSION } from './adapters/kmz/KmzArchiveLoader.js';
export type { KmlDocumentSource, KmzArchiveLoaderOptions } from './adapters/kmz/KmzArchiveLoader.js';
export { KmlDocument, KmlDocumentParser, KML_NAMESPACE } from './adapters/kmz/KmlDocumentParser.js';
export type { KmlNode, KmlDocumentParserOptions } from './adapters/kmz/KmlDocumentParser.js';
export { PlacemarkExtractor, splitCoordinates } from './adapters/kmz/PlacemarkExtractor.js';
export { DescriptionTableExtractor } from './extraction/description/DescriptionTableExtractor.js';
export type {
  DescriptionParser,
  DescriptionTableExtractorOptions,
} from './extraction/description/DescriptionTableExtractor.js';
export { FormGroupingService, formLabels } from './services/survey/FormGroupingService.js';
export type { FormGroupingOptions } from './services/survey/FormGroupingService.js';
export { selectForm } from './services/survey/formSelection.js';
export { SurveyExportPipeline } from './services/survey/SurveyExportPipeline.js';
export type { ExportResult, SurveyArchive, SurveyExportPipelineConfig } from './services/survey/SurveyExportPipeline.js';
export { CsvExportService } from './services/export/CsvExportService.js';
export type { CsvExport, CsvExportOptions } from './services/export/CsvExportService.js';
export { exportConfigSchema, loadExportConfig } from './config/exportConfig.js';
export type { ExportConfig, ExportConfigInput } from './config/exportConfig.js';
export { outputFileName, writeFileAtomic } from './utils/outputFile.js';
export * from './types/errors.js';
export * from './types/survey.js';
