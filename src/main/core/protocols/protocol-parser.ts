import { parse } from 'csv-parse/sync'
import type {
  ParsedProtocolTable,
  ProtocolEntry,
  ProtocolSnapshot,
  ProtocolTableDialect
} from '@shared/interfaces/protocols'
import { CSV_COMMENT_MARKER, CSV_DELIMITER, PROTOCOL_TABLE_COLUMNS } from '@config/constants'
import { parseDecimalField } from './decimal-field'
import { ProtocolSourceError } from './errors'

export const DEFAULT_DIALECT: ProtocolTableDialect = {
  delimiter: CSV_DELIMITER,
  commentMarker: CSV_COMMENT_MARKER
}

/**
 * Normalize a long protocol name for lookup: lowercase, whitespace runs
 * collapsed to one space, trimmed.
 */
export function normalizeProtocolName(name: string): string {
  return name.trim().toLowerCase().split(/\s+/).filter(Boolean).join(' ')
}

export function normalizeKeyword(keyword: string): string {
  return keyword.trim().toUpperCase()
}

function decodeInput(input: Uint8Array | string): string {
  return typeof input === 'string' ? input : Buffer.from(input).toString('utf8')
}

function readRows(text: string, dialect: ProtocolTableDialect): string[][] {
  let records: unknown
  try {
    records = parse(text, {
      delimiter: dialect.delimiter,
      comment: dialect.commentMarker,
      comment_no_infix: true,
      relax_column_count: true,
      skip_empty_lines: true,
      bom: true
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ProtocolSourceError('MALFORMED_SOURCE', `Protocol table could not be read: ${reason}`, {
      cause: error
    })
  }

  if (!Array.isArray(records)) {
    throw new ProtocolSourceError('MALFORMED_SOURCE', 'Protocol table reader returned no rows')
  }

  return records.map((record: unknown) =>
    Array.isArray(record) ? record.map((field: unknown) => String(field)) : []
  )
}

function padRow(row: string[]): string[] {
  const fields = row.slice(0, PROTOCOL_TABLE_COLUMNS).map((field) => field.trim())
  while (fields.length < PROTOCOL_TABLE_COLUMNS) {
    fields.push('')
  }
  return fields
}

/**
 * Parse a protocol numbers table into an immutable snapshot.
 *
 * The first row is the header and is always skipped. Rows whose Decimal
 * column is not a number or range are dropped. Every index is
 * first-claim-wins: a number, keyword or long name already bound by an
 * earlier row keeps that binding.
 */
export function parseProtocolTable(
  input: Uint8Array | string,
  dialect: ProtocolTableDialect = DEFAULT_DIALECT
): ParsedProtocolTable {
  const text = decodeInput(input)
  if (text.length === 0) {
    throw new ProtocolSourceError('EMPTY_SOURCE', 'Protocol table source is empty')
  }

  const rows = readRows(text, dialect)
  if (rows.length <= 1) {
    throw new ProtocolSourceError('EMPTY_SOURCE', 'Protocol table has no data rows after the header')
  }

  const entries: ProtocolEntry[] = []
  const byNumber = new Map<number, ProtocolEntry>()
  const byKeyword = new Map<string, ProtocolEntry>()
  const byLongName = new Map<string, ProtocolEntry>()
  let droppedRows = 0

  for (const row of rows.slice(1)) {
    const [decimal, keyword, longName, auxFlag, reference] = padRow(row)

    const range = decimal ? parseDecimalField(decimal) : null
    if (!range) {
      droppedRows++
      continue
    }

    const entry: ProtocolEntry = Object.freeze({
      rangeStart: range.start,
      rangeEnd: range.end,
      keyword,
      longName,
      auxFlag,
      reference
    })
    entries.push(entry)

    for (let n = range.start; n <= range.end; n++) {
      if (!byNumber.has(n)) {
        byNumber.set(n, entry)
      }
    }

    if (keyword) {
      const key = normalizeKeyword(keyword)
      if (!byKeyword.has(key)) {
        byKeyword.set(key, entry)
      }
    }

    if (longName) {
      const key = normalizeProtocolName(longName)
      if (!byLongName.has(key)) {
        byLongName.set(key, entry)
      }
    }
  }

  const snapshot: ProtocolSnapshot = Object.freeze({
    entries: Object.freeze(entries),
    byNumber,
    byKeyword,
    byLongName
  })

  return {
    snapshot,
    stats: {
      dataRows: rows.length - 1,
      droppedRows
    }
  }
}
