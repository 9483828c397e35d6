import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when DECODIFF_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.DECODIFF_DEBUG === 'true' || process.env.DECODIFF_DEBUG === '1'

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const decodiffDir = join(homedir(), '.decodiff')
  const logPath = join(decodiffDir, 'debug.log')

  // Ensure directory exists
  mkdirSync(decodiffDir, { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
