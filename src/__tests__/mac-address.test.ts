import { inspect } from 'util'
import { describe, it, expect } from 'vitest'
import { MacAddress, MAC_ADDRESS_FORMATS, formatOctets, parse } from '../index'
import type { Eui48 } from '../index'

const SAMPLE = MacAddress.fromOctets([0x12, 0x34, 0x56, 0xab, 0xcd, 0xef])

const ADDRESSES: Eui48[] = [
  [0x00, 0x00, 0x00, 0x00, 0x00, 0x00],
  [0xff, 0xff, 0xff, 0xff, 0xff, 0xff],
  [0x01, 0x02, 0x03, 0x0a, 0x0b, 0x0f],
  [0x12, 0x34, 0x56, 0x78, 0x90, 0xab],
  [0x00, 0x1b, 0x63, 0x84, 0x45, 0xe6],
  [0xfe, 0x80, 0x00, 0x00, 0x00, 0x01],
]

describe('fromOctets', () => {
  it('wraps the octets verbatim', () => {
    expect(SAMPLE.octets).toEqual([0x12, 0x34, 0x56, 0xab, 0xcd, 0xef])
  })

  it('keeps only the low 8 bits of each value', () => {
    expect(MacAddress.fromOctets([256, -1, 0x1ff, 0, 0, 0]).toCanonical()).toBe('00:FF:FF:00:00:00')
  })
})

describe('constants', () => {
  it('zero is 00:00:00:00:00:00', () => {
    expect(MacAddress.zero().toCanonical()).toBe('00:00:00:00:00:00')
    expect(MacAddress.zero().isZero()).toBe(true)
    expect(MacAddress.zero().isBroadcast()).toBe(false)
  })

  it('broadcast is FF:FF:FF:FF:FF:FF', () => {
    expect(MacAddress.broadcast().toCanonical()).toBe('FF:FF:FF:FF:FF:FF')
    expect(MacAddress.broadcast().isBroadcast()).toBe(true)
    expect(MacAddress.broadcast().isZero()).toBe(false)
  })

  it('an ordinary address is neither', () => {
    expect(SAMPLE.isZero()).toBe(false)
    expect(SAMPLE.isBroadcast()).toBe(false)
  })
})

describe('immutability', () => {
  it('freezes the instance and its octets', () => {
    expect(Object.isFrozen(SAMPLE)).toBe(true)
    expect(Object.isFrozen(SAMPLE.octets)).toBe(true)
  })

  it('hands out independent copies', () => {
    const copy = SAMPLE.toOctets()
    copy[0] = 0
    expect(SAMPLE.octets[0]).toBe(0x12)

    const bytes = SAMPLE.toBytes()
    bytes[1] = 0
    expect(SAMPLE.octets[1]).toBe(0x34)
  })

  it('does not share storage with the input', () => {
    const input: [number, number, number, number, number, number] = [1, 2, 3, 4, 5, 6]
    const mac = MacAddress.fromOctets(input)
    input[5] = 7
    expect(mac.toCanonical()).toBe('01:02:03:04:05:06')
  })
})

describe('formatting', () => {
  it('renders each notation with uppercase digits', () => {
    expect(SAMPLE.toCanonical()).toBe('12:34:56:AB:CD:EF')
    expect(SAMPLE.toHexString()).toBe('12-34-56-AB-CD-EF')
    expect(SAMPLE.toDotString()).toBe('1234.56AB.CDEF')
    expect(SAMPLE.toHexadecimal()).toBe('0x123456ABCDEF')
  })

  it('zero-pads every octet', () => {
    const mac = MacAddress.fromOctets([1, 2, 3, 4, 5, 6])
    expect(mac.toCanonical()).toBe('01:02:03:04:05:06')
    expect(mac.toDotString()).toBe('0102.0304.0506')
    expect(mac.toHexadecimal()).toBe('0x010203040506')
  })

  it('selects a notation by name', () => {
    expect(SAMPLE.format('canonical')).toBe('12:34:56:AB:CD:EF')
    expect(SAMPLE.format('hex-string')).toBe('12-34-56-AB-CD-EF')
    expect(SAMPLE.format('dot')).toBe('1234.56AB.CDEF')
    expect(SAMPLE.format('hexadecimal')).toBe('0x123456ABCDEF')
    expect(formatOctets([0, 0, 0, 0, 0, 0xa], 'dot')).toBe('0000.0000.000A')
  })

  it('converts to the canonical form by default', () => {
    expect(SAMPLE.toString()).toBe('12:34:56:AB:CD:EF')
    expect(String(SAMPLE)).toBe('12:34:56:AB:CD:EF')
    expect(`${SAMPLE}`).toBe('12:34:56:AB:CD:EF')
  })

  it('serializes to JSON as the canonical form', () => {
    expect(JSON.stringify({ mac: SAMPLE })).toBe('{"mac":"12:34:56:AB:CD:EF"}')
  })

  it('inspects as MacAddress("...")', () => {
    expect(inspect(SAMPLE)).toBe('MacAddress("12:34:56:AB:CD:EF")')
  })
})

describe('round trip', () => {
  it('parses every rendering back to the same value', () => {
    for (const octets of ADDRESSES) {
      const mac = MacAddress.fromOctets(octets)
      for (const style of MAC_ADDRESS_FORMATS) {
        const back = parse(mac.format(style))
        expect(back.equals(mac)).toBe(true)
        expect(back.octets).toEqual(octets)
      }
    }
  })

  it('parses lowercased renderings too', () => {
    for (const octets of ADDRESSES) {
      const mac = MacAddress.fromOctets(octets)
      expect(parse(mac.toDotString().toLowerCase()).equals(mac)).toBe(true)
    }
  })
})

describe('equality and ordering', () => {
  const a = MacAddress.fromOctets([0, 0, 0, 0, 0, 0])
  const b = MacAddress.fromOctets([0, 0, 0, 0, 0, 1])
  const c = MacAddress.fromOctets([255, 255, 255, 255, 255, 255])

  it('compares equal values as equal', () => {
    const x = parse('12:34:56:ab:cd:ef')
    expect(x).not.toBe(SAMPLE)
    expect(x.equals(SAMPLE)).toBe(true)
    expect(x.compare(SAMPLE)).toBe(0)
    expect(x.equals(b)).toBe(false)
  })

  it('orders by octet, most significant first', () => {
    expect(a.compare(b)).toBe(-1)
    expect(b.compare(c)).toBe(-1)
    expect(c.compare(a)).toBe(1)
    expect(MacAddress.compare(
      MacAddress.fromOctets([1, 0, 0, 0, 0, 0]),
      MacAddress.fromOctets([0, 255, 255, 255, 255, 255]),
    )).toBe(1)
  })

  it('sorts with MacAddress.compare', () => {
    const sorted = [c, a, SAMPLE, b].sort(MacAddress.compare)
    expect(sorted.map(m => m.toCanonical())).toEqual([
      '00:00:00:00:00:00',
      '00:00:00:00:00:01',
      '12:34:56:AB:CD:EF',
      'FF:FF:FF:FF:FF:FF',
    ])
  })

  it('agrees with the numeric value', () => {
    expect(parse('0x1234567890AB').toNumber()).toBe(0x1234567890ab)
    expect(c.toNumber()).toBe(281474976710655)
    expect(a.toNumber()).toBe(0)
  })
})

describe('hashCode', () => {
  it('is FNV-1a over the octets', () => {
    expect(MacAddress.zero().hashCode()).toBe(2138539933)
    expect(MacAddress.broadcast().hashCode()).toBe(3304228975)
    expect(MacAddress.fromOctets([1, 2, 3, 4, 5, 6]).hashCode()).toBe(64115370)
  })

  it('is equal for equal values', () => {
    expect(parse('0102.0304.0506').hashCode()).toBe(parse('01-02-03-04-05-06').hashCode())
  })
})
