import type {
  DatasetProvider,
  ParsedProtocolTable,
  ProtocolEntry,
  ProtocolRegistryOptions,
  ProtocolSnapshot,
  ProtocolSource,
  ProtocolTableDialect,
  RegistryState,
  RegistryStatus
} from '@shared/interfaces/protocols'
import { DEFAULT_REGISTRY_NAME } from '@config/constants'
import { logger } from '@infra/logging'
import {
  DEFAULT_DIALECT,
  normalizeKeyword,
  normalizeProtocolName,
  parseProtocolTable
} from './protocol-parser'
import { readProtocolSource } from './dataset-source'
import { isProtocolSourceError } from './errors'

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error))

const describeSource = (source: ProtocolSource): string => {
  if (typeof source === 'string') return source
  return source instanceof Uint8Array ? 'bytes' : 'stream'
}

/**
 * Bidirectional lookup between IP protocol numbers and their names.
 *
 * The default dataset is parsed on the first lookup and the outcome is kept:
 * a failed load is not retried, lookups just report nothing. Overrides build
 * a complete snapshot before publishing it, so a lookup sees either the old
 * table or the new one.
 */
export class ProtocolRegistry {
  private state: RegistryState = { status: 'uninitialized' }
  private readonly name: string
  private readonly dialect: ProtocolTableDialect
  private readonly retainSnapshotOnFailure: boolean
  private readonly datasetProvider: DatasetProvider

  constructor(options: ProtocolRegistryOptions) {
    this.datasetProvider = options.datasetProvider
    this.name = options.name ?? DEFAULT_REGISTRY_NAME
    this.dialect = { ...DEFAULT_DIALECT, ...options.dialect }
    this.retainSnapshotOnFailure = options.retainSnapshotOnFailure ?? false
  }

  getState(): RegistryStatus {
    return this.state.status
  }

  getLoadError(): Error | undefined {
    return this.state.status === 'failed' ? this.state.error : undefined
  }

  lookupByNumber(n: number): ProtocolEntry | undefined {
    if (!Number.isInteger(n)) return undefined
    return this.ensureLoaded()?.byNumber.get(n)
  }

  /**
   * Resolve a keyword (`tcp`) or long name (`Transmission  Control`) to its
   * protocol number. Keywords win over long names. For a range row the
   * first number of the range is returned.
   */
  lookupDecimal(name: string): number | undefined {
    const snapshot = this.ensureLoaded()
    if (!snapshot) return undefined

    const trimmed = name.trim()
    if (!trimmed) return undefined

    const entry =
      snapshot.byKeyword.get(normalizeKeyword(trimmed)) ??
      snapshot.byLongName.get(normalizeProtocolName(trimmed))

    return entry?.rangeStart
  }

  lookupKeyword(n: number): string | undefined {
    return this.lookupByNumber(n)?.keyword || undefined
  }

  lookupProtocolName(n: number): string | undefined {
    return this.lookupByNumber(n)?.longName || undefined
  }

  isIPv6ExtensionHeader(n: number): boolean {
    return this.lookupByNumber(n)?.auxFlag.toUpperCase() === 'Y'
  }

  listEntries(): readonly ProtocolEntry[] {
    return this.ensureLoaded()?.entries ?? []
  }

  /**
   * Replace the table with one read from a file path, bytes or a stream.
   * Rejects with a ProtocolSourceError when the source cannot be read or
   * parsed.
   */
  async loadFromSource(source: ProtocolSource): Promise<void> {
    const bytes = await readProtocolSource(source)
    this.replaceSnapshot(bytes, describeSource(source))
  }

  async loadFromFile(path: string): Promise<void> {
    await this.loadFromSource(path)
  }

  loadFromText(text: string): void {
    this.replaceSnapshot(text, 'text')
  }

  /**
   * Forget the current table; the next lookup loads the default dataset again.
   */
  reset(): void {
    this.state = { status: 'uninitialized' }
  }

  private ensureLoaded(): ProtocolSnapshot | undefined {
    switch (this.state.status) {
      case 'ready':
        return this.state.snapshot
      case 'uninitialized':
        return this.initialize()
      case 'initializing':
      case 'failed':
        return undefined
    }
  }

  private initialize(): ProtocolSnapshot | undefined {
    this.state = { status: 'initializing' }

    let parsed: ParsedProtocolTable
    try {
      parsed = parseProtocolTable(this.datasetProvider(), this.dialect)
    } catch (error) {
      const failure = toError(error)
      this.state = { status: 'failed', error: failure }
      logger.error('Default protocol table failed to load, lookups will report not found', {
        registry: this.name,
        code: isProtocolSourceError(failure) ? failure.code : undefined,
        error: failure.message
      })
      return undefined
    }

    this.publish(parsed, 'default dataset')
    return parsed.snapshot
  }

  private replaceSnapshot(input: Uint8Array | string, origin: string): void {
    let parsed: ParsedProtocolTable
    try {
      parsed = parseProtocolTable(input, this.dialect)
    } catch (error) {
      const failure = toError(error)
      if (!this.retainSnapshotOnFailure) {
        this.state = { status: 'failed', error: failure }
      }
      logger.warn('Protocol table override rejected', {
        registry: this.name,
        origin,
        retained: this.retainSnapshotOnFailure,
        error: failure.message
      })
      throw failure
    }

    this.publish(parsed, origin)
  }

  private publish({ snapshot, stats }: ParsedProtocolTable, origin: string): void {
    this.state = { status: 'ready', snapshot }

    logger.debug('Protocol table parsed', {
      registry: this.name,
      origin,
      dataRows: stats.dataRows,
      droppedRows: stats.droppedRows
    })
    logger.info('Protocol table loaded', {
      registry: this.name,
      origin,
      entries: snapshot.entries.length,
      numbers: snapshot.byNumber.size
    })
  }
}
