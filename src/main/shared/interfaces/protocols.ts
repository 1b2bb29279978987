import type { Readable } from 'node:stream'

/**
 * One row of the protocol numbers table. Range rows such as `148-252`
 * cover every number from rangeStart to rangeEnd inclusive.
 */
export interface ProtocolEntry {
  readonly rangeStart: number
  readonly rangeEnd: number
  readonly keyword: string
  readonly longName: string
  /** "IPv6 Extension Header" column, usually `Y` or empty */
  readonly auxFlag: string
  readonly reference: string
}

export interface ProtocolSnapshot {
  readonly entries: readonly ProtocolEntry[]
  readonly byNumber: ReadonlyMap<number, ProtocolEntry>
  readonly byKeyword: ReadonlyMap<string, ProtocolEntry>
  readonly byLongName: ReadonlyMap<string, ProtocolEntry>
}

export interface ParseStats {
  dataRows: number
  droppedRows: number
}

export interface ParsedProtocolTable {
  snapshot: ProtocolSnapshot
  stats: ParseStats
}

export interface ProtocolTableDialect {
  delimiter: string
  commentMarker: string
}

export type RegistryStatus = 'uninitialized' | 'initializing' | 'ready' | 'failed'

export type RegistryState =
  | { status: 'uninitialized' }
  | { status: 'initializing' }
  | { status: 'ready'; snapshot: ProtocolSnapshot }
  | { status: 'failed'; error: Error }

export type ProtocolSource = string | Uint8Array | Readable

export type DatasetProvider = () => Uint8Array | string

export interface ProtocolRegistryOptions {
  /** Supplies the default dataset on first use */
  datasetProvider: DatasetProvider
  name?: string
  dialect?: Partial<ProtocolTableDialect>
  /** Keep the last good snapshot when an override fails to parse */
  retainSnapshotOnFailure?: boolean
}
