import { readFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import type { Readable } from 'node:stream'
import type { DatasetProvider, ProtocolSource } from '@shared/interfaces/protocols'
import { ProtocolSourceError } from './errors'

async function drain(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    const data: unknown = chunk
    if (typeof data === 'string') {
      chunks.push(Buffer.from(data, 'utf8'))
    } else if (data instanceof Uint8Array) {
      chunks.push(Buffer.from(data))
    } else {
      throw new TypeError('Protocol table stream must yield text or bytes')
    }
  }
  return Buffer.concat(chunks)
}

/**
 * Read an override source fully into memory. A string is treated as a
 * file path; use `loadFromText` on the registry for inline CSV text.
 */
export async function readProtocolSource(source: ProtocolSource): Promise<Uint8Array> {
  if (source instanceof Uint8Array) {
    return source
  }

  try {
    if (typeof source === 'string') {
      return await readFile(source)
    }
    return await drain(source)
  } catch (error) {
    const origin = typeof source === 'string' ? source : 'stream'
    const reason = error instanceof Error ? error.message : String(error)
    throw new ProtocolSourceError(
      'UNREADABLE_SOURCE',
      `Protocol table source ${origin} could not be read: ${reason}`,
      { cause: error }
    )
  }
}

/**
 * Provider for the dataset shipped with the package. The file is read on
 * the first lookup, not at import time.
 */
export function fileDatasetProvider(path: string): DatasetProvider {
  return () => {
    try {
      return readFileSync(path)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ProtocolSourceError(
        'UNREADABLE_SOURCE',
        `Default protocol table ${path} could not be read: ${reason}`,
        { cause: error }
      )
    }
  }
}
