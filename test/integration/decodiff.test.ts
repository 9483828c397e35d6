import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import path from 'path'
import os from 'os'
import { run, parseArgs, outputRequests, CliDependencies, CliOptions } from '../../src/cli/decodiff'
import { FileOpener } from '../../src/commands'

class RecordingOpener implements FileOpener {
  opened: string[] = []

  async open(filePath: string): Promise<void> {
    this.opened.push(filePath)
  }
}

describe('decodiff integration', () => {
  let tempDir: string
  let out: string[]
  let err: string[]
  let opener: RecordingOpener

  const deps = (answer?: string): CliDependencies => ({
    cwd: tempDir,
    out: message => {
      out.push(message)
    },
    err: message => {
      err.push(message)
    },
    opener,
    ask: answer === undefined ? undefined : async () => answer,
  })

  const writeExport = (name: string, content: string): void => {
    fs.writeFileSync(path.join(tempDir, name), content)
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'decodiff-cli-'))
    out = []
    err = []
    opener = new RecordingOpener()
    writeExport('old.json', JSON.stringify({ 'Attack Jewel 1': 4, 'Earplug Jewel 3': 0, 'Flawless Jewel 2': 1 }))
    writeExport(
      'new.txt',
      'WARNING: Items may be missing\n' +
        JSON.stringify({ 'Attack Jewel 1': 6, 'Earplug Jewel 3': 1, 'Flawless Jewel 2': 1, 'Tenderizer Jewel 2': 2 })
    )
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('terminal output', () => {
    it('should print tables when no output file is requested', async () => {
      const code = await run(['old.json', 'new.txt'], deps())

      expect(code).toBe(0)
      expect(out[0]).toBe('Changes to Existing Decorations:')
      expect(out[1]).toContain('Attack Jewel 1')
      expect(out[3]).toContain('Earplug Jewel 3')
      expect(out[3]).toContain('Tenderizer Jewel 2')
      expect(out[4]).toBe('\nTotal number added (changed decorations): 2')
      expect(out[5]).toBe('\nTotal number added (new decorations): 2')
      expect(fs.readdirSync(tempDir).sort()).toEqual(['new.txt', 'old.json'])
    })

    it('should stop early for identical exports', async () => {
      writeExport('same.json', fs.readFileSync(path.join(tempDir, 'old.json'), 'utf8'))

      const code = await run(['old.json', 'same.json', '--text'], deps('q'))

      expect(code).toBe(0)
      expect(out).toEqual(['The JSON files contain identical data. The files will not be compared.'])
      expect(fs.existsSync(path.join(tempDir, 'DecoChanges.txt'))).toBe(false)
    })
  })

  describe('file output', () => {
    it('should write the text report to the default path', async () => {
      const code = await run(['old.json', 'new.txt', '-t'], deps())

      expect(code).toBe(0)
      expect(fs.readFileSync(path.join(tempDir, 'DecoChanges.txt'), 'utf8')).toBe(
        [
          '-----Changes to Existing Decorations-----',
          'Attack Jewel 1, added: 2 | 6',
          '',
          '-----Newly Added Decorations-----',
          'Earplug Jewel 3, amount: 1',
          'Tenderizer Jewel 2, amount: 2',
          '',
          'Total added (changed decorations): 2',
          'Total added (new decorations): 2',
        ].join('\n')
      )
    })

    it('should write both reports and open them on Enter', async () => {
      const code = await run(['old.json', 'new.txt', '--both'], deps(''))
      const xlsx = path.join(tempDir, 'DecoChanges.xlsx')
      const txt = path.join(tempDir, 'DecoChanges.txt')

      expect(code).toBe(0)
      expect(fs.existsSync(xlsx)).toBe(true)
      expect(fs.existsSync(txt)).toBe(true)
      expect(out).toContain('[e] Excel\n[t] Text\n[q] Exit')
      expect(opener.opened).toEqual([xlsx, txt])
    })

    it('should honor an explicit path together with --both', async () => {
      fs.mkdirSync(path.join(tempDir, 'reports'))

      await run(['old.json', 'new.txt', '--both', '--excel', 'reports'], deps('q'))

      expect(fs.existsSync(path.join(tempDir, 'reports', 'DecoChanges.xlsx'))).toBe(true)
      expect(fs.existsSync(path.join(tempDir, 'DecoChanges.txt'))).toBe(true)
      expect(out[out.length - 1]).toBe('Exiting script.')
      expect(opener.opened).toEqual([])
    })

    it('should use the last path when an output flag is repeated', async () => {
      const code = await run(['old.json', 'new.txt', '-e', 'first', '-e', 'second', '--no-open'], deps())

      expect(code).toBe(0)
      expect(fs.existsSync(path.join(tempDir, 'second.xlsx'))).toBe(true)
      expect(fs.existsSync(path.join(tempDir, 'first.xlsx'))).toBe(false)
      expect(err).toEqual([])
    })

    it('should skip the prompt with --no-open', async () => {
      await run(['old.json', 'new.txt', '-t', '--no-open'], deps(''))

      expect(out.some(line => line.includes('Press Enter'))).toBe(false)
      expect(opener.opened).toEqual([])
    })

    it('should skip the prompt when the config disables it', async () => {
      fs.writeFileSync(
        path.join(tempDir, 'decodiff.config.json'),
        JSON.stringify({ prompt: { openCreatedFiles: false }, output: { defaultName: 'Weekly' } })
      )

      await run(['old.json', 'new.txt', '-t'], deps(''))

      expect(fs.existsSync(path.join(tempDir, 'Weekly.txt'))).toBe(true)
      expect(opener.opened).toEqual([])
    })
  })

  describe('errors', () => {
    it('should fail with exit code 1 for unsupported extensions', async () => {
      writeExport('old.csv', '{}')

      const code = await run(['old.csv', 'new.txt'], deps())

      expect(code).toBe(1)
      expect(err).toEqual([
        'An unexpected error occurred: \nFile extension not supported: ' +
          path.join(tempDir, 'old.csv') +
          '. Supported extensions: .json, .txt',
      ])
    })

    it('should fail for malformed quantities', async () => {
      writeExport('bad.json', '{"Attack Jewel 1": "four"}')

      const code = await run(['bad.json', 'new.txt'], deps())

      expect(code).toBe(1)
      expect(err[0]).toContain('Quantity for "Attack Jewel 1" is not an integer: "four"')
    })

    it('should print help and fail when an export is missing', async () => {
      const code = await run(['old.json'], deps())

      expect(code).toBe(1)
      expect(err).toEqual(['Two export files are required: <old_export> <new_export>'])
      expect(out[0]).toContain('Usage: decodiff [options] <old_export> <new_export>')
    })

    it('should print help on -h', async () => {
      const code = await run(['-h'], deps())

      expect(code).toBe(0)
      expect(out[0]).toContain('By default, outputs are displayed in the terminal.')
    })
  })
})

describe('argument handling', () => {
  const base: CliOptions = { oldExport: 'a.json', newExport: 'b.json', both: false, open: true }

  it('should parse positional exports and flags', async () => {
    expect(await parseArgs(['a.json', 'b.json', '-e', 'out.xlsx', '-t'])).toEqual({
      kind: 'compare',
      options: {
        oldExport: 'a.json',
        newExport: 'b.json',
        excel: 'out.xlsx',
        text: '',
        both: false,
        config: undefined,
        open: true,
      },
    })
  })

  it('should keep the last value of a repeated output flag', async () => {
    const parsed = await parseArgs(['a.json', 'b.json', '-t', 'x', '--text', 'y', '-e', 'one', '-e', 'two'])

    expect(parsed.kind === 'compare' && parsed.options.text).toBe('y')
    expect(parsed.kind === 'compare' && parsed.options.excel).toBe('two')
  })

  it('should default to terminal output', () => {
    expect(outputRequests(base)).toEqual([{ kind: 'terminal' }])
  })

  it('should request default paths for bare flags', () => {
    expect(outputRequests({ ...base, excel: '', text: '' })).toEqual([
      { kind: 'spreadsheet', path: undefined },
      { kind: 'text', path: undefined },
    ])
  })

  it('should request both files for --both', () => {
    expect(outputRequests({ ...base, both: true, text: 'notes' })).toEqual([
      { kind: 'spreadsheet', path: undefined },
      { kind: 'text', path: 'notes' },
    ])
  })
})
