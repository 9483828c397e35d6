import { TableProperties, Workbook, Worksheet } from 'exceljs'
import { BaseFormatter } from './formatters/BaseFormatter'
import { FileFormatterOptions } from './Formatter'
import { ensureParentDir } from './outputPath'
import { DiffResult, TableTheme } from '../contracts'

export const EXISTING_SHEET = 'Existing Decorations'
export const NEW_SHEET = 'New Decorations'

type SheetCell = string | number

export interface SheetData {
  name: string
  tableName: string
  headers: string[]
  rows: SheetCell[][]
}

export interface SpreadsheetFormatterOptions extends FileFormatterOptions {
  /**
   * Table style applied to each sheet (default: TableStyleLight1)
   */
  sheetStyle?: TableTheme

  /**
   * Extra characters added to each column width, room for the filter button
   */
  columnPadding?: number
}

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0)

export class SpreadsheetFormatter extends BaseFormatter {
  readonly kind = 'spreadsheet'
  readonly extension = '.xlsx'

  private sheetStyle: TableTheme
  private columnPadding: number

  constructor(options: SpreadsheetFormatterOptions) {
    super(options)
    this.sheetStyle = options.sheetStyle ?? 'TableStyleLight1'
    this.columnPadding = options.columnPadding ?? 6
  }

  describeTable(data: SheetData): TableProperties {
    return {
      name: data.tableName,
      ref: 'A1',
      headerRow: true,
      style: { theme: this.sheetStyle, showRowStripes: false },
      columns: data.headers.map(name => ({ name, filterButton: true })),
      rows: data.rows,
    }
  }

  /**
   * Build the workbook, or null when there is nothing to put in it
   */
  buildWorkbook(result: DiffResult): Workbook | null {
    const workbook = new Workbook()

    if (result.changes.length > 0) {
      const sheet = this.addSheet(workbook, {
        name: EXISTING_SHEET,
        tableName: 'ExistingDecorations',
        headers: ['Decoration', 'Added', 'Total'],
        rows: result.changes.map(change => [change.identifier, change.delta, change.newTotal]),
      })
      const n = result.changes.length
      const totalsRow = n + 3
      sheet.getCell(totalsRow, 1).value = 'Total number added:'
      sheet.getCell(totalsRow, 2).value = {
        formula: `SUM(B2:B${n + 1})`,
        result: sum(result.changes.map(change => change.delta)),
        date1904: false,
      }
      sheet.getCell(totalsRow, 3).value = {
        formula: `SUM(C2:C${n + 1})`,
        result: sum(result.changes.map(change => change.newTotal)),
        date1904: false,
      }
    } else {
      this.notify(
        "No changes to existing decorations compared to previous data. The creation of the 'Existing Decorations' worksheet has been skipped."
      )
    }

    if (result.newItems.length > 0) {
      const sheet = this.addSheet(workbook, {
        name: NEW_SHEET,
        tableName: 'NewDecorations',
        headers: ['Decoration', 'Amount'],
        rows: result.newItems.map(item => [item.identifier, item.amount]),
      })
      const n = result.newItems.length
      sheet.getCell(n + 3, 1).value = 'Total number added:'
      sheet.getCell(n + 3, 2).value = {
        formula: `SUM(B2:B${n + 1})`,
        result: sum(result.newItems.map(item => item.amount)),
        date1904: false,
      }
      sheet.getCell(n + 4, 1).value = 'Total number added variations:'
      sheet.getCell(n + 4, 2).value = {
        formula: `COUNTA(A2:A${n + 1})`,
        result: n,
        date1904: false,
      }
    } else {
      this.notify(
        "No new decoration types identified compared to the previous export. The creation of the 'New Decorations' worksheet has been skipped."
      )
    }

    return workbook.worksheets.length > 0 ? workbook : null
  }

  protected async writeReport(result: DiffResult, filePath: string): Promise<boolean> {
    const workbook = this.buildWorkbook(result)
    if (!workbook) {
      this.notify('No changes found between the two specified files. Therefore, no file was created.')
      return false
    }

    await ensureParentDir(filePath)
    await workbook.xlsx.writeFile(filePath)
    this.notify(`Comparison data saved in the Excel file '${filePath}'.`)
    return true
  }

  private addSheet(workbook: Workbook, data: SheetData): Worksheet {
    const sheet = workbook.addWorksheet(data.name, {
      views: [{ state: 'frozen', xSplit: 0, ySplit: 1 }],
    })

    sheet.addTable(this.describeTable(data))

    data.headers.forEach((header, index) => {
      const column = sheet.getColumn(index + 1)
      const longest = Math.max(header.length, ...data.rows.map(row => String(row[index]).length))
      column.width = longest + this.columnPadding
      column.alignment = { horizontal: 'left', vertical: 'middle' }
    })

    const headerRow = sheet.getRow(1)
    headerRow.font = { bold: true }
    headerRow.alignment = { horizontal: 'center', vertical: 'middle', wrapText: true }

    return sheet
  }
}
