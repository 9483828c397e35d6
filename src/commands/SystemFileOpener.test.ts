import { describe, it, expect, vi, beforeEach } from 'vitest'
import { EventEmitter } from 'events'
import * as child_process from 'child_process'
import { SystemFileOpener, openerCommandFor } from './SystemFileOpener'

vi.mock('child_process')

class FakeChild extends EventEmitter {
  unref = vi.fn()
}

describe('openerCommandFor', () => {
  it('should use the platform launcher', () => {
    expect(openerCommandFor('/r/a.xlsx', 'darwin')).toEqual({ command: 'open', args: ['/r/a.xlsx'] })
    expect(openerCommandFor('/r/a.xlsx', 'linux')).toEqual({ command: 'xdg-open', args: ['/r/a.xlsx'] })
    expect(openerCommandFor('C:\\r\\a.xlsx', 'win32')).toEqual({
      command: 'cmd',
      args: ['/c', 'start', '', 'C:\\r\\a.xlsx'],
    })
  })
})

describe('SystemFileOpener', () => {
  const mockSpawn = vi.mocked(child_process.spawn)

  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('should spawn a detached launcher and resolve once it starts', async () => {
    const child = new FakeChild()
    mockSpawn.mockReturnValue(child as unknown as child_process.ChildProcess)

    const opening = new SystemFileOpener('linux').open('/r/DecoChanges.txt')
    child.emit('spawn')
    await opening

    expect(mockSpawn).toHaveBeenCalledWith('xdg-open', ['/r/DecoChanges.txt'], {
      detached: true,
      stdio: 'ignore',
    })
    expect(child.unref).toHaveBeenCalled()
  })

  it('should reject when the launcher cannot start', async () => {
    const child = new FakeChild()
    mockSpawn.mockReturnValue(child as unknown as child_process.ChildProcess)

    const opening = new SystemFileOpener('darwin').open('/r/DecoChanges.xlsx')
    child.emit('error', new Error('spawn open ENOENT'))

    await expect(opening).rejects.toThrow('Could not open /r/DecoChanges.xlsx: spawn open ENOENT')
  })
})
