import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { Readable } from 'node:stream'
import { describe, it, expect } from 'vitest'
import { fileDatasetProvider, readProtocolSource } from '@core/protocols/dataset-source'
import { ProtocolSourceError } from '@core/protocols/errors'

const fixturesDir = resolve(process.cwd(), 'tests/fixtures/protocols')
const replacementPath = resolve(fixturesDir, 'replacement.csv')
const replacementTable = readFileSync(replacementPath, 'utf8')

const decode = (bytes: Uint8Array): string => Buffer.from(bytes).toString('utf8')

describe('readProtocolSource', () => {
  it('returns bytes unchanged', async () => {
    const bytes = Buffer.from('Decimal\n6\n')
    await expect(readProtocolSource(bytes)).resolves.toBe(bytes)
  })

  it('reads a file path', async () => {
    expect(decode(await readProtocolSource(replacementPath))).toBe(replacementTable)
  })

  it('drains a stream of text chunks', async () => {
    const stream = Readable.from(['Decimal,Keyword\n', '6,TCP\n', '17,UDP\n'])
    expect(decode(await readProtocolSource(stream))).toBe('Decimal,Keyword\n6,TCP\n17,UDP\n')
  })

  it('drains a stream of byte chunks', async () => {
    const stream = Readable.from([Buffer.from('Decimal\n'), Buffer.from('6\n')], { objectMode: false })
    expect(decode(await readProtocolSource(stream))).toBe('Decimal\n6\n')
  })

  it('reports a missing file as unreadable', async () => {
    const missing = resolve(fixturesDir, 'missing.csv')
    const error = await readProtocolSource(missing).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ProtocolSourceError)
    expect(error).toMatchObject({ code: 'UNREADABLE_SOURCE' })
    expect(error instanceof Error ? error.message : '').toContain(missing)
  })

  it('reports a failing stream as unreadable', async () => {
    const stream = new Readable({
      read() {
        this.destroy(new Error('socket hang up'))
      }
    })

    await expect(readProtocolSource(stream)).rejects.toMatchObject({
      code: 'UNREADABLE_SOURCE',
      message: 'Protocol table source stream could not be read: socket hang up'
    })
  })

  it('rejects streams that yield neither text nor bytes', async () => {
    await expect(readProtocolSource(Readable.from([{ decimal: 6 }]))).rejects.toMatchObject({
      code: 'UNREADABLE_SOURCE',
      message: 'Protocol table source stream could not be read: Protocol table stream must yield text or bytes'
    })
  })
})

describe('fileDatasetProvider', () => {
  it('returns the file contents', () => {
    const provider = fileDatasetProvider(replacementPath)
    const contents = provider()
    expect(typeof contents === 'string' ? contents : decode(contents)).toBe(replacementTable)
  })

  it('throws an unreadable source error for a missing file', () => {
    const provider = fileDatasetProvider(resolve(fixturesDir, 'missing.csv'))
    expect(provider).toThrow(ProtocolSourceError)
  })
})
