import fs from 'fs'
import path from 'path'

const isDirectory = (candidate: string): boolean =>
  fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()

/**
 * Turn a requested output location into a concrete file path.
 *
 * A directory gets `defaultName + extension` appended, a path without the
 * extension gets it added. Relative paths resolve against `cwd`.
 */
export function resolveOutputPath(
  requested: string,
  defaultName: string,
  extension: string,
  cwd: string = process.cwd()
): string {
  const absolute = path.resolve(cwd, requested)

  if (isDirectory(absolute)) {
    return path.join(absolute, defaultName + extension)
  }
  if (!absolute.toLowerCase().endsWith(extension.toLowerCase())) {
    return absolute + extension
  }
  return absolute
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
}
