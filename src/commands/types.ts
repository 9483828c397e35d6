import { Notify } from '../contracts'

/**
 * Report files written during this run, by kind
 */
export interface CreatedReports {
  spreadsheet?: string
  text?: string
}

export interface FileOpener {
  open(filePath: string): Promise<void>
}

export interface CommandContext {
  opener: FileOpener
  reports: CreatedReports
  notify: Notify
}

export interface Command {
  name: string
  aliases?: string[]
  /** Menu label; commands without one are not listed */
  label?: string
  description: string
  isAvailable: (reports: CreatedReports) => boolean
  execute: (context: CommandContext) => Promise<void>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
}
