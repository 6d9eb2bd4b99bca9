export {
  CSV_HEADER,
  RESULTS_FILE,
  ReportWriter,
  SUMMARY_FILE,
  formatCsvCell,
  formatCsvRow,
  type ReportWriterConfig
} from './ReportWriter.js'
