import { promises as fs } from 'fs'
import {
  InputConfig,
  MalformedSnapshotError,
  ParseError,
  QuantitySchema,
  Snapshot,
  SnapshotObjectSchema,
  UnsupportedFormatError,
} from '../contracts'
import { debugLog } from '../debug/debugLog'

export const DEFAULT_INPUT_CONFIG: InputConfig = {
  acceptedExtensions: ['.json', '.txt'],
  warningMarker: 'WARNING:',
}

/**
 * Drop the leading warning line some exporters prepend to their output.
 */
export function stripWarningLine(content: string, marker: string): string {
  if (!marker || !content.startsWith(marker)) {
    return content
  }
  const newline = content.indexOf('\n')
  return newline === -1 ? '' : content.slice(newline + 1)
}

const isSnapshotObject = (value: unknown): value is Record<string, unknown> =>
  SnapshotObjectSchema.safeParse(value).success

export class SnapshotLoader {
  constructor(private config: InputConfig = DEFAULT_INPUT_CONFIG) {}

  isExtensionAccepted(filePath: string): boolean {
    const lower = filePath.toLowerCase()
    return this.config.acceptedExtensions.some(extension =>
      lower.endsWith(extension.toLowerCase())
    )
  }

  async load(filePath: string): Promise<Snapshot> {
    if (!this.isExtensionAccepted(filePath)) {
      throw new UnsupportedFormatError(filePath, this.config.acceptedExtensions)
    }

    const content = await fs.readFile(filePath, 'utf8')
    const snapshot = this.parse(content, filePath)

    debugLog({
      event: 'snapshot_loaded',
      file: filePath,
      itemCount: snapshot.size,
    })

    return snapshot
  }

  parse(content: string, source: string): Snapshot {
    const body = stripWarningLine(content, this.config.warningMarker)

    let parsed: unknown
    try {
      parsed = JSON.parse(body)
    } catch (error) {
      throw new ParseError(source, error instanceof Error ? error.message : 'invalid JSON')
    }

    if (!isSnapshotObject(parsed)) {
      throw new ParseError(source, 'expected a single object of decoration quantities')
    }

    // Walk the parsed object itself: zod's record output drops a "__proto__" key
    const snapshot = new Map<string, number>()
    for (const [identifier, value] of Object.entries(parsed)) {
      const quantity = QuantitySchema.safeParse(value)
      if (!quantity.success) {
        throw new MalformedSnapshotError(identifier, value, source)
      }
      snapshot.set(identifier, quantity.data)
    }
    return snapshot
  }
}
