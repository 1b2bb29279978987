import type { ProtocolEntry, ProtocolSource } from '@shared/interfaces/protocols'
import { ProtocolRegistry } from '@core/protocols/protocol-registry'
import { fileDatasetProvider } from '@core/protocols/dataset-source'
import { DATASET_PATH, RETAIN_SNAPSHOT_ON_FAILURE } from '@config/constants'

export const ipProtocols = new ProtocolRegistry({
  datasetProvider: fileDatasetProvider(DATASET_PATH),
  retainSnapshotOnFailure: RETAIN_SNAPSHOT_ON_FAILURE
})

// 6 -> TCP entry, 150 -> the 148-252 "Unassigned" entry
export function lookupByNumber(n: number): ProtocolEntry | undefined {
  return ipProtocols.lookupByNumber(n)
}

// "tcp" -> 6, "Transmission Control" -> 6
export function lookupDecimal(name: string): number | undefined {
  return ipProtocols.lookupDecimal(name)
}

// 6 -> "TCP"
export function lookupKeyword(n: number): string | undefined {
  return ipProtocols.lookupKeyword(n)
}

// 6 -> "Transmission Control"
export function lookupProtocolName(n: number): string | undefined {
  return ipProtocols.lookupProtocolName(n)
}

export function isIPv6ExtensionHeader(n: number): boolean {
  return ipProtocols.isIPv6ExtensionHeader(n)
}

export function listEntries(): readonly ProtocolEntry[] {
  return ipProtocols.listEntries()
}

/**
 * Label for a protocol field of a decoded packet, e.g. 17 -> "UDP".
 */
export function formatIpProtocol(n: number): string {
  return ipProtocols.lookupKeyword(n) ?? `Unknown (${n})`
}

/**
 * Override the bundled table. Not needed for normal use.
 */
export function loadFromSource(source: ProtocolSource): Promise<void> {
  return ipProtocols.loadFromSource(source)
}

export function loadFromFile(path: string): Promise<void> {
  return ipProtocols.loadFromFile(path)
}

export function loadFromText(text: string): void {
  ipProtocols.loadFromText(text)
}
