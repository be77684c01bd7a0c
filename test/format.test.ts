import { describe, expect, test } from 'vitest'

import {
  formatAsciiField,
  formatByteChar,
  formatHeader,
  formatLine,
  hexFieldWidth,
} from '../src/dump/format'
import { DEFAULT_DUMP_OPTIONS, type DumpOptions } from '../src/dump/config'

const bytes = (...values: number[]) => Uint8Array.from(values)
const range = (length: number) => Uint8Array.from({ length }, (_, i) => i)
const filled = (length: number, value: number) => new Uint8Array(length).fill(value)

function options(overrides: Partial<DumpOptions> = {}): DumpOptions {
  return { ...DEFAULT_DUMP_OPTIONS, ...overrides }
}

describe('hex field width', () => {
  test('covers every group and the spaces between them', () => {
    expect(hexFieldWidth({ lineWidth: 16, byteGroupLength: 1 })).toBe(47)
    expect(hexFieldWidth({ lineWidth: 16, byteGroupLength: 4 })).toBe(35)
    expect(hexFieldWidth({ lineWidth: 5, byteGroupLength: 2 })).toBe(12)
    expect(hexFieldWidth({ lineWidth: 3, byteGroupLength: 2 })).toBe(7)
  })

  test('a group longer than the line collapses to one group', () => {
    expect(hexFieldWidth({ lineWidth: 1, byteGroupLength: 4 })).toBe(2)
    expect(hexFieldWidth({ lineWidth: 4, byteGroupLength: 256 })).toBe(8)
  })
})

describe('byte characters', () => {
  test('printable ASCII is shown as itself', () => {
    expect(formatByteChar(0x20, false)).toBe(' ')
    expect(formatByteChar(0x41, false)).toBe('A')
    expect(formatByteChar(0x7e, false)).toBe('~')
  })

  test('DEL and high bytes are placeholders in both modes', () => {
    expect(formatByteChar(0x7f, false)).toBe('.')
    expect(formatByteChar(0x80, true)).toBe('.')
    expect(formatByteChar(0xff, true)).toBe('.')
  })

  test('C0 controls map to placeholders or control pictures', () => {
    expect(formatByteChar(0x00, false)).toBe('.')
    expect(formatByteChar(0x1f, false)).toBe('.')
    expect(formatByteChar(0x00, true)).toBe('␀')
    expect(formatByteChar(0x0a, true)).toBe('␊')
    expect(formatByteChar(0x1f, true)).toBe('␟')
  })

  test('ascii field keeps one character per byte without padding', () => {
    expect(formatAsciiField(bytes(0x48, 0x69, 0x00, 0xff, 0x21), false)).toBe('Hi..!')
    expect(formatAsciiField(new Uint8Array(0), false)).toBe('')
  })
})

describe('data lines', () => {
  test('formats sixteen control bytes with defaults', () => {
    expect(formatLine(0, range(16), options())).toBe(
      '00000000 | 00 01 02 03 04 05 06 07 08 09 0a 0b 0c 0d 0e 0f | ................',
    )
  })

  test('uses control pictures when enabled', () => {
    expect(formatLine(0, range(16), options({ controlPictures: true }))).toBe(
      '00000000 | 00 01 02 03 04 05 06 07 08 09 0a 0b 0c 0d 0e 0f | ' +
        '␀␁␂␃␄␅␆␇' +
        '␈␉␊␋␌␍␎␏',
    )
  })

  test('groups bytes without internal spaces', () => {
    expect(formatLine(0, filled(16, 0xff), options({ byteGroupLength: 4 }))).toBe(
      '00000000 | ffffffff ffffffff ffffffff ffffffff | ................',
    )
  })

  test('pads a short line to the configured width', () => {
    expect(formatLine(0x30, filled(2, 0xff), options())).toBe(
      `00000030 | ff ff${' '.repeat(42)} | ..`,
    )
  })

  test('leaves a trailing partial group unpadded inside the field', () => {
    expect(formatLine(0, bytes(0xab, 0xcd, 0xef), options({ lineWidth: 4, byteGroupLength: 2 }))).toBe(
      '00000000 | abcd ef   | ...',
    )
  })

  test('offsets past 32 bits print every digit', () => {
    expect(formatLine(0x1_0000_0000, bytes(0x41), options({ lineWidth: 1 }))).toBe(
      '100000000 | 41 | A',
    )
  })
})

describe('header', () => {
  test('default legend and rule', () => {
    const [legend, rule] = formatHeader(options())
    expect(legend).toBe(
      `         | 00 01 02 03 04 05 06 07 08 09 0a 0b 0c 0d 0e 0f | ${' '.repeat(16)}`,
    )
    expect(rule).toBe(`${'-'.repeat(9)}+${'-'.repeat(49)}+${'-'.repeat(17)}`)
  })

  test('legend follows the byte grouping', () => {
    const [legend, rule] = formatHeader({ lineWidth: 4, byteGroupLength: 2 })
    expect(legend).toBe('         | 0001 0203 |     ')
    expect(rule).toBe('---------+-----------+-----')
  })

  test('legend indices continue past 0x0f', () => {
    const [legend] = formatHeader({ lineWidth: 18, byteGroupLength: 9 })
    expect(legend).toBe(`         | 000102030405060708 090a0b0c0d0e0f1011 | ${' '.repeat(18)}`)
  })

  test('rule joints sit under the data line separators', () => {
    for (const [lineWidth, byteGroupLength] of [[16, 1], [8, 3], [32, 8], [7, 7], [1, 256]]) {
      const layout = options({ lineWidth, byteGroupLength })
      const [legend, rule] = formatHeader(layout)
      const line = formatLine(0, filled(1, 0x41), layout)
      const separators = [...line.matchAll(/\|/g)].map((m) => m.index)
      const joints = [...rule.matchAll(/\+/g)].map((m) => m.index)
      const legendBars = [...legend.matchAll(/\|/g)].map((m) => m.index)
      expect(joints).toEqual(separators)
      expect(legendBars).toEqual(separators)
    }
  })
})
