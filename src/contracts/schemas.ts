import { z } from 'zod'
import { TableTheme } from './types'

// Export files hold one flat object; values are checked separately
export const SnapshotObjectSchema = z.record(z.string(), z.unknown())

export const QuantitySchema = z.number().int()

const TABLE_THEME = /^TableStyle(Light([1-9]|1\d|2[01])|Medium([1-9]|1\d|2[0-8])|Dark([1-9]|1[01]))$/

export const isTableTheme = (value: string): value is TableTheme => TABLE_THEME.test(value)

export const TableThemeSchema = z.custom<TableTheme>(
  value => typeof value === 'string' && isTableTheme(value),
  { message: 'Expected a built-in table style such as TableStyleLight1' }
)

export const InputConfigSchema = z.object({
  acceptedExtensions: z.array(z.string().min(1)).min(1).default(['.json', '.txt']),
  warningMarker: z.string().default('WARNING:'),
})

// Config schema
export const DecodiffConfigSchema = z.object({
  input: InputConfigSchema.default({
    acceptedExtensions: ['.json', '.txt'],
    warningMarker: 'WARNING:',
  }),
  output: z.object({
    defaultName: z.string().min(1).default('DecoChanges'),
    spreadsheet: z.object({
      sheetStyle: TableThemeSchema.default('TableStyleLight1'),
      columnPadding: z.number().int().nonnegative().default(6),
    }).default({
      sheetStyle: 'TableStyleLight1',
      columnPadding: 6,
    }),
  }).default({
    defaultName: 'DecoChanges',
    spreadsheet: { sheetStyle: 'TableStyleLight1', columnPadding: 6 },
  }),
  prompt: z.object({
    openCreatedFiles: z.boolean().default(true),
  }).default({
    openCreatedFiles: true,
  }),
})
