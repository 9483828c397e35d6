import { DiffResult, ReportArtifact, ReportKind } from '../contracts'

/**
 * Presents a diff result somewhere: the terminal or a report file
 */
export interface ReportFormatter {
  readonly kind: ReportKind

  /**
   * Render the result
   * @param outputPath Requested file path; ignored by terminal output
   */
  write(result: DiffResult, outputPath?: string): Promise<ReportArtifact>
}

/**
 * Settings shared by the file-based formatters
 */
export interface FileFormatterOptions {
  /**
   * File name (without extension) used when no path or a directory is given
   */
  defaultName: string

  /**
   * Directory relative paths are resolved against (default: process.cwd())
   */
  cwd?: string

  /**
   * Sink for user-facing messages (default: console.log)
   */
  notify?: (message: string) => void
}
