import Table from 'cli-table3'
import { ReportFormatter } from './Formatter'
import { DiffResult, ReportArtifact } from '../contracts'

export const changeRows = (result: DiffResult): Array<[string, number, number]> =>
  result.changes.map(change => [change.identifier, change.delta, change.newTotal])

export const newItemRows = (result: DiffResult): Array<[string, number]> =>
  result.newItems.map(item => [item.identifier, item.amount])

const renderTable = (head: string[], rows: Array<Array<string | number>>): string => {
  const table = new Table({ head, style: { head: [], border: [] } })
  table.push(...rows)
  return table.toString()
}

/**
 * Terminal output: one table for changed decorations, one for new ones
 */
export class TableFormatter implements ReportFormatter {
  readonly kind = 'terminal'

  constructor(private print: (text: string) => void = text => console.log(text)) {}

  async write(result: DiffResult): Promise<ReportArtifact> {
    this.print('Changes to Existing Decorations:')
    this.print(renderTable(['Decoration', 'Added', 'Total'], changeRows(result)))
    this.print('\nNewly Added Decorations:')
    this.print(renderTable(['Decoration', 'Amount'], newItemRows(result)))
    this.print(`\nTotal number added (changed decorations): ${result.totalChanged}`)
    this.print(`\nTotal number added (new decorations): ${result.totalNewCount}`)
    return { kind: this.kind, path: null, created: false }
  }
}
