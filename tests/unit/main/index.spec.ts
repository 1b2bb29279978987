import { describe, expect, it, vi } from 'vitest'
import * as registryApi from '@main/index'

vi.mock('@infra/logging', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}))

describe('package entry point', () => {
  it('exposes the process-wide lookups', () => {
    expect(registryApi.lookupKeyword(17)).toBe('UDP')
    expect(registryApi.lookupDecimal('Transmission Control')).toBe(6)
    expect(registryApi.ipProtocols.getState()).toBe('ready')
  })

  it('exposes the building blocks for separate registries', () => {
    const registry = new registryApi.ProtocolRegistry({
      datasetProvider: () => 'Decimal,Keyword,Protocol\n47,GRE,Generic Routing Encapsulation\n'
    })

    expect(registry.lookupDecimal('generic routing encapsulation')).toBe(47)
    expect(registryApi.parseDecimalField('148-252')).toEqual({ start: 148, end: 252 })
    expect(registryApi.normalizeProtocolName(' IPv6  Hop-by-Hop Option ')).toBe('ipv6 hop-by-hop option')
    expect(registryApi.isProtocolSourceError(new registryApi.ProtocolSourceError('EMPTY_SOURCE', 'empty'))).toBe(
      true
    )
  })
})
