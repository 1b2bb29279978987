export {
  ipProtocols,
  lookupByNumber,
  lookupDecimal,
  lookupKeyword,
  lookupProtocolName,
  isIPv6ExtensionHeader,
  listEntries,
  formatIpProtocol,
  loadFromSource,
  loadFromFile,
  loadFromText
} from '@shared/lookups/ip-protocols'
export { ProtocolRegistry } from '@core/protocols/protocol-registry'
export { parseProtocolTable, normalizeProtocolName } from '@core/protocols/protocol-parser'
export { parseDecimalField } from '@core/protocols/decimal-field'
export type { DecimalRange } from '@core/protocols/decimal-field'
export { fileDatasetProvider, readProtocolSource } from '@core/protocols/dataset-source'
export { ProtocolSourceError, isProtocolSourceError } from '@core/protocols/errors'
export type { ProtocolSourceErrorCode } from '@core/protocols/errors'
export type {
  ProtocolEntry,
  ProtocolSnapshot,
  ProtocolSource,
  ProtocolRegistryOptions,
  ProtocolTableDialect,
  DatasetProvider,
  RegistryStatus
} from '@shared/interfaces/protocols'
