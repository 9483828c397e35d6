import { TableStyleProperties } from 'exceljs'

/**
 * Point-in-time inventory: decoration name to owned quantity.
 */
export type Snapshot = ReadonlyMap<string, number>

export interface ChangeRecord {
  identifier: string
  /** new quantity minus old quantity */
  delta: number
  newTotal: number
}

export interface NewItemRecord {
  identifier: string
  amount: number
}

export interface DiffResult {
  changes: ChangeRecord[]
  newItems: NewItemRecord[]
  totalChanged: number
  totalNewCount: number
}

export type DiffOutcome =
  | { identical: true }
  | { identical: false; result: DiffResult }

export type Classification =
  | { kind: 'new'; record: NewItemRecord }
  | { kind: 'changed'; record: ChangeRecord }
  | { kind: 'unchanged' }

export type ReportKind = 'terminal' | 'spreadsheet' | 'text'

export interface ReportArtifact {
  kind: ReportKind
  path: string | null
  created: boolean
}

export type OutputRequest =
  | { kind: 'terminal' }
  | { kind: 'spreadsheet' | 'text'; path?: string }

export type CompareSummary =
  | { status: 'identical' }
  | { status: 'compared'; result: DiffResult; artifacts: ReportArtifact[] }

export interface InputConfig {
  acceptedExtensions: string[]
  warningMarker: string
}

/** Built-in Excel table style, e.g. "TableStyleLight1" */
export type TableTheme = NonNullable<TableStyleProperties['theme']>

export interface DecodiffConfig {
  input: InputConfig
  output: {
    defaultName: string
    spreadsheet: {
      sheetStyle: TableTheme
      columnPadding: number
    }
  }
  prompt: {
    openCreatedFiles: boolean
  }
}

export type Notify = (message: string) => void
