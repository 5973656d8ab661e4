import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { CommanderError } from 'commander'

import { handleCliError, runCli, runValidateCommand } from '../../src/cli.js'
import { MissingIdentifierError, RecordLoadError } from '../../src/utils/errors.js'
import { createDuplicateScenario } from '../fixtures/people.js'

let tempDir: string

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(tmpdir(), 'record-cli-'))
})

afterEach(async () => {
  vi.restoreAllMocks()
  process.exitCode = undefined
  await rm(tempDir, { recursive: true, force: true })
})

async function writeRecords(name: string, records: unknown): Promise<string> {
  const filePath = path.join(tempDir, name)
  await writeFile(filePath, JSON.stringify(records), 'utf8')
  return filePath
}

function captureStdout(): string[] {
  const chunks: string[] = []
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    chunks.push(String(chunk))
    return true
  })
  return chunks
}

function silenceStderr(): void {
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
}

function sortedLines(output: string): string[] {
  return output.split('\n').filter(Boolean).sort()
}

describe('runValidateCommand', () => {
  it('should list the bad ids one per line', async () => {
    const filePath = await writeRecords('data.json', createDuplicateScenario())

    const output = await runValidateCommand({ inputPath: filePath, format: 'text' })

    expect(sortedLines(output)).toEqual(['1192', '7152', '9222', '9913'])
  })

  it('should render the full report as JSON', async () => {
    const filePath = await writeRecords('data.json', createDuplicateScenario())

    const output = await runValidateCommand({ inputPath: filePath, format: 'json' })
    const parsed = JSON.parse(output) as { badRecords: string[]; stats: { badRecordCount: number } }

    expect(parsed.badRecords.sort()).toEqual(['1192', '7152', '9222', '9913'])
    expect(parsed.stats.badRecordCount).toBe(4)
  })

  it('should print nothing when every record is valid', async () => {
    const filePath = await writeRecords('clean.json', [
      { id: 1, name: 'Ada Example', address: '12 Test Lane', zip: '00000' },
    ])

    await expect(runValidateCommand({ inputPath: filePath, format: 'text' })).resolves.toBe('')
  })

  it('should fail on a record without id', async () => {
    const filePath = await writeRecords('no-id.json', [
      { id: 1, name: 'Ada Example', address: '12 Test Lane', zip: '00000' },
      { name: 'Grace Example', address: '3 Test Road', zip: '00000' },
    ])

    await expect(
      runValidateCommand({ inputPath: filePath, format: 'text' })
    ).rejects.toBeInstanceOf(MissingIdentifierError)
  })

  it('should fail on a missing file', async () => {
    await expect(
      runValidateCommand({ inputPath: path.join(tempDir, 'nope.json'), format: 'text' })
    ).rejects.toBeInstanceOf(RecordLoadError)
  })
})

describe('runCli', () => {
  it('should write the bad ids to stdout', async () => {
    const filePath = await writeRecords('data.json', createDuplicateScenario())
    const chunks = captureStdout()

    await runCli(['node', 'record-validator', filePath], {})

    expect(sortedLines(chunks.join(''))).toEqual(['1192', '7152', '9222', '9913'])
  })

  it('should read the default input path from the environment', async () => {
    const filePath = await writeRecords('people.json', [
      { id: 'only', name: '', address: '12 Test Lane', zip: '00000' },
    ])
    const chunks = captureStdout()

    await runCli(['node', 'record-validator'], { RECORD_VALIDATOR_INPUT: filePath })

    expect(chunks.join('')).toBe('only\n')
  })

  it('should honour --format json', async () => {
    const filePath = await writeRecords('data.json', [
      { id: 'a', name: 'Ada Example', address: '12 Test Lane', zip: '1234' },
    ])
    const chunks = captureStdout()

    await runCli(['node', 'record-validator', filePath, '--format', 'json'], {})

    expect(JSON.parse(chunks.join(''))).toEqual({
      badRecords: ['a'],
      entries: [{ id: 'a', reasons: [{ kind: 'invalid-zip', value: '1234' }] }],
      stats: {
        recordsProcessed: 1,
        uniqueRecords: 1,
        duplicateRecords: 0,
        invalidRecords: 1,
        badRecordCount: 1,
      },
    })
  })

  it('should log progress to stderr at info level', async () => {
    const filePath = await writeRecords('data.json', createDuplicateScenario())
    captureStdout()
    const lines: string[] = []
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      lines.push(String(chunk))
      return true
    })

    await runCli(['node', 'record-validator', filePath, '--log-level', 'info'], {})

    expect(lines.some((line) => line.includes('[info] records loaded'))).toBe(true)
    expect(lines.some((line) => line.includes('[debug]'))).toBe(false)
  })

  it('should reject an unknown format', async () => {
    const filePath = await writeRecords('data.json', [])
    silenceStderr()

    await expect(
      runCli(['node', 'record-validator', filePath, '--format', 'csv'], {})
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' })
  })

  it('should stop on a record without id', async () => {
    const filePath = await writeRecords('no-id.json', [{ name: 'x', address: 'y', zip: '00000' }])
    const chunks = captureStdout()

    await expect(runCli(['node', 'record-validator', filePath], {})).rejects.toBeInstanceOf(
      MissingIdentifierError
    )
    expect(chunks).toEqual([])
  })

  it('should print help without failing', async () => {
    const chunks = captureStdout()

    await runCli(['node', 'record-validator', '--help'], {})

    expect(chunks.join('')).toContain('Usage: record-validator [options] [file]')
  })
})

describe('handleCliError', () => {
  it('should print the message and fail the process', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined)

    handleCliError(new MissingIdentifierError(['name'], 0))

    expect(spy).toHaveBeenCalledWith("Record at index 0 has no 'id' field")
    expect(process.exitCode).toBe(1)
  })

  it('should not repeat errors commander has already printed', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined)

    handleCliError(
      new CommanderError(1, 'commander.invalidArgument', "error: option '--format <format>' argument 'csv' is invalid.")
    )

    expect(spy).not.toHaveBeenCalled()
    expect(process.exitCode).toBe(1)
  })
})
