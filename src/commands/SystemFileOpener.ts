import { spawn } from 'child_process'
import { FileOpener } from './types'

/**
 * The platform's "open with default application" command
 */
export function openerCommandFor(
  filePath: string,
  platform: NodeJS.Platform = process.platform
): { command: string; args: string[] } {
  switch (platform) {
    case 'win32':
      // `start` takes the first quoted argument as the window title
      return { command: 'cmd', args: ['/c', 'start', '', filePath] }
    case 'darwin':
      return { command: 'open', args: [filePath] }
    default:
      return { command: 'xdg-open', args: [filePath] }
  }
}

export class SystemFileOpener implements FileOpener {
  constructor(private platform: NodeJS.Platform = process.platform) {}

  async open(filePath: string): Promise<void> {
    const { command, args } = openerCommandFor(filePath, this.platform)

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        detached: true,
        stdio: 'ignore',
      })

      child.on('error', (error) => {
        reject(new Error(`Could not open ${filePath}: ${error.message}`))
      })

      child.on('spawn', () => {
        child.unref()
        resolve()
      })
    })
  }
}
