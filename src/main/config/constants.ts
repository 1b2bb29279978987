import { fileURLToPath } from 'node:url'
import { readBooleanEnv } from '@shared/utils/environment'

export const BUNDLED_DATASET_PATH = fileURLToPath(
  new URL('../../../resources/protocol-numbers.csv', import.meta.url)
)

export const DATASET_PATH = process.env.PROTOCOL_REGISTRY_DATASET || BUNDLED_DATASET_PATH

export const CSV_DELIMITER = ','
export const CSV_COMMENT_MARKER = '#'

// Decimal, Keyword, Protocol, IPv6 Extension Header, Reference
export const PROTOCOL_TABLE_COLUMNS = 5

export const RETAIN_SNAPSHOT_ON_FAILURE = readBooleanEnv(
  'PROTOCOL_REGISTRY_RETAIN_ON_FAILURE',
  false
)

export const LOG_LEVEL: string | undefined = process.env.LOG_LEVEL || undefined

export const DEFAULT_REGISTRY_NAME = 'ip-protocols'
