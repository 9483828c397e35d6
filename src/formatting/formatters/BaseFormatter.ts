import { ReportFormatter, FileFormatterOptions } from '../Formatter'
import { DiffResult, OutputAccessError, ReportArtifact, isAccessError } from '../../contracts'
import { resolveOutputPath } from '../outputPath'
import { debugLog } from '../../debug/debugLog'

/**
 * Base implementation for formatters that write a report file
 */
export abstract class BaseFormatter implements ReportFormatter {
  abstract readonly kind: 'spreadsheet' | 'text'
  abstract readonly extension: string

  protected readonly notify: (message: string) => void

  constructor(protected options: FileFormatterOptions) {
    this.notify = options.notify ?? ((message: string) => console.log(message))
  }

  resolveTarget(outputPath?: string): string {
    return resolveOutputPath(
      outputPath || this.options.defaultName + this.extension,
      this.options.defaultName,
      this.extension,
      this.options.cwd
    )
  }

  async write(result: DiffResult, outputPath?: string): Promise<ReportArtifact> {
    const target = this.resolveTarget(outputPath)

    try {
      const created = await this.writeReport(result, target)
      debugLog({ event: 'report_written', kind: this.kind, path: target, created })
      return { kind: this.kind, path: target, created }
    } catch (error) {
      if (!isAccessError(error)) {
        throw error
      }
      // Access problems skip this output only
      const accessError = new OutputAccessError(target, error.code ?? 'EACCES')
      debugLog({ event: 'report_access_denied', kind: this.kind, path: target, code: accessError.code })
      this.notify(accessError.message)
      return { kind: this.kind, path: target, created: false }
    }
  }

  /**
   * Write the report to `filePath`, creating its directory only when there
   * is something to write. Resolves to false when nothing was written.
   */
  protected abstract writeReport(result: DiffResult, filePath: string): Promise<boolean>
}
