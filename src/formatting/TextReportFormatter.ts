import { promises as fs } from 'fs'
import { BaseFormatter } from './formatters/BaseFormatter'
import { ensureParentDir } from './outputPath'
import { DiffResult } from '../contracts'

export function renderTextReport(result: DiffResult): string {
  const lines: string[] = []

  if (result.changes.length > 0) {
    lines.push('-----Changes to Existing Decorations-----')
    for (const change of result.changes) {
      lines.push(`${change.identifier}, added: ${change.delta} | ${change.newTotal}`)
    }
  } else {
    lines.push('-----No Changes to Existing Decorations-----')
  }

  lines.push('')
  if (result.newItems.length > 0) {
    lines.push('-----Newly Added Decorations-----')
    for (const item of result.newItems) {
      lines.push(`${item.identifier}, amount: ${item.amount}`)
    }
  } else {
    lines.push('-----No Newly Added Decorations-----')
  }

  lines.push('')
  lines.push(`Total added (changed decorations): ${result.totalChanged}`)
  lines.push(`Total added (new decorations): ${result.totalNewCount}`)

  return lines.join('\n')
}

/**
 * Plain-text report, one line per decoration
 */
export class TextReportFormatter extends BaseFormatter {
  readonly kind = 'text'
  readonly extension = '.txt'

  protected async writeReport(result: DiffResult, filePath: string): Promise<boolean> {
    await ensureParentDir(filePath)
    await fs.writeFile(filePath, renderTextReport(result), 'utf8')
    this.notify(`Comparison data saved in the text file '${filePath}'.`)
    return true
  }
}
