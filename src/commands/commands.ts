import { Command, CommandContext, CreatedReports } from './types'

const createCommand = (
  name: string,
  description: string,
  isAvailable: Command['isAvailable'],
  execute: Command['execute'],
  options: { label?: string; aliases?: string[] } = {}
): Command => ({ name, description, isAvailable, execute, ...options })

const openAll = async ({ opener, reports }: CommandContext): Promise<void> => {
  if (reports.spreadsheet) {
    await opener.open(reports.spreadsheet)
  }
  if (reports.text) {
    await opener.open(reports.text)
  }
}

const hasAnyReport = (reports: CreatedReports): boolean =>
  reports.spreadsheet !== undefined || reports.text !== undefined

export const commands: Command[] = [
  createCommand('e', 'Open the spreadsheet report',
    (reports) => reports.spreadsheet !== undefined,
    async ({ opener, reports }) => {
      if (reports.spreadsheet) await opener.open(reports.spreadsheet)
    },
    { label: 'Excel', aliases: ['excel'] }),

  createCommand('t', 'Open the text report',
    (reports) => reports.text !== undefined,
    async ({ opener, reports }) => {
      if (reports.text) await opener.open(reports.text)
    },
    { label: 'Text', aliases: ['text'] }),

  // Pressing Enter submits an empty answer
  createCommand('all', 'Open every created report', hasAnyReport, openAll,
    { aliases: [''] }),

  createCommand('q', 'Exit without opening anything', () => true,
    async ({ notify }) => notify('Exiting script.'),
    { label: 'Exit', aliases: ['quit', 'exit'] }),
]
