// Re-export all writers
export {
  formatObservationCsv,
  writeObservationCsv,
  formatGroundTruth,
  writeGroundTruthJson,
  type ObservationWriterOptions
} from './observationWriter.js';

export {
  formatExtractionReport,
  writeExtractionReport,
  formatResultsTable,
  formatValue,
  type ReportMeta,
  type ResultsRow
} from './reportWriter.js';
