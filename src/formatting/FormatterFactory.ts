import { ReportFormatter } from './Formatter'
import { TableFormatter } from './TableFormatter'
import { TextReportFormatter } from './TextReportFormatter'
import { SpreadsheetFormatter } from './SpreadsheetFormatter'
import { DecodiffConfig, Notify, ReportKind } from '../contracts'

export interface FormatterFactoryOptions {
  cwd?: string
  notify?: Notify
}

/**
 * Factory for creating formatter instances based on configuration
 */
export class FormatterFactory {
  constructor(
    private config: DecodiffConfig,
    private options: FormatterFactoryOptions = {}
  ) {}

  createFormatter(kind: ReportKind): ReportFormatter {
    const { cwd, notify } = this.options
    const defaultName = this.config.output.defaultName

    switch (kind) {
      case 'terminal':
        return new TableFormatter(notify)
      case 'text':
        return new TextReportFormatter({ defaultName, cwd, notify })
      case 'spreadsheet':
        return new SpreadsheetFormatter({
          defaultName,
          cwd,
          notify,
          sheetStyle: this.config.output.spreadsheet.sheetStyle,
          columnPadding: this.config.output.spreadsheet.columnPadding,
        })
    }
  }
}
