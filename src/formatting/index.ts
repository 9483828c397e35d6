export { ReportFormatter, FileFormatterOptions } from './Formatter'
export { FormatterFactory, FormatterFactoryOptions } from './FormatterFactory'
export { TableFormatter } from './TableFormatter'
export { TextReportFormatter, renderTextReport } from './TextReportFormatter'
export { SpreadsheetFormatter, SpreadsheetFormatterOptions, EXISTING_SHEET, NEW_SHEET } from './SpreadsheetFormatter'
export { BaseFormatter } from './formatters/BaseFormatter'
export { resolveOutputPath } from './outputPath'
