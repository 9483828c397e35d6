export class DecodiffError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class UnsupportedFormatError extends DecodiffError {
  constructor(
    readonly filePath: string,
    readonly acceptedExtensions: string[]
  ) {
    super(`File extension not supported: ${filePath}. Supported extensions: ${acceptedExtensions.join(', ')}`)
  }
}

export class ParseError extends DecodiffError {
  constructor(
    readonly source: string,
    reason: string
  ) {
    super(`Could not parse ${source}: ${reason}`)
  }
}

/**
 * A quantity that is not an integer. Fatal: no partial diff is produced.
 */
export class MalformedSnapshotError extends DecodiffError {
  constructor(
    readonly identifier: string,
    readonly value: unknown,
    readonly source?: string
  ) {
    super(
      `Quantity for "${identifier}" is not an integer: ${JSON.stringify(value)}` +
        (source ? ` (in ${source})` : '')
    )
  }
}

export class OutputAccessError extends DecodiffError {
  constructor(
    readonly filePath: string,
    readonly code: string
  ) {
    super(
      `Error: Access to '${filePath}' denied. Ensure that the file is not open in another program and that you have the necessary permissions.`
    )
  }
}

const ACCESS_ERROR_CODES = ['EACCES', 'EPERM', 'EBUSY']

export const isAccessError = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error &&
  'code' in error &&
  typeof error.code === 'string' &&
  ACCESS_ERROR_CODES.includes(error.code)
