import {
  CompareSummary,
  DiffOutcome,
  DiffResult,
  Notify,
  OutputRequest,
  ReportArtifact,
} from '../contracts'
import { SnapshotLoader } from '../snapshot/SnapshotLoader'
import { InventoryDiffer } from '../snapshot/InventoryDiffer'
import { FormatterFactory } from '../formatting/FormatterFactory'
import { debugLog } from '../debug/debugLog'

export const IDENTICAL_MESSAGE = 'The JSON files contain identical data. The files will not be compared.'

export class ReportManager {
  private differ = new InventoryDiffer()

  constructor(
    private loader: SnapshotLoader,
    private formatterFactory: FormatterFactory,
    private notify: Notify = message => console.log(message)
  ) {}

  async compare(oldPath: string, newPath: string): Promise<DiffOutcome> {
    debugLog({ event: 'compare_start', oldPath, newPath })

    // Old export first, so a failure always names the same file
    const before = await this.loader.load(oldPath)
    const after = await this.loader.load(newPath)
    return this.differ.diff(before, after)
  }

  async publish(result: DiffResult, requests: OutputRequest[]): Promise<ReportArtifact[]> {
    const artifacts: ReportArtifact[] = []

    // Sequential so messages from each output stay together
    for (const request of requests) {
      const formatter = this.formatterFactory.createFormatter(request.kind)
      const outputPath = request.kind === 'terminal' ? undefined : request.path
      artifacts.push(await formatter.write(result, outputPath))
    }

    return artifacts
  }

  /**
   * Load, compare and present. Identical inputs produce no output at all.
   */
  async run(oldPath: string, newPath: string, requests: OutputRequest[]): Promise<CompareSummary> {
    const outcome = await this.compare(oldPath, newPath)

    if (outcome.identical) {
      this.notify(IDENTICAL_MESSAGE)
      return { status: 'identical' }
    }

    const artifacts = await this.publish(outcome.result, requests)
    return { status: 'compared', result: outcome.result, artifacts }
  }
}
