import { describe, expect, test } from 'vitest'

import { DumpConfig } from '../src/dump/config'
import { InvalidConfigurationError } from '../src/dump/errors'

describe('DumpConfig', () => {
  test('starts from the defaults', () => {
    expect(new DumpConfig().snapshot()).toEqual({
      controlPictures: false,
      lineCount: undefined,
      lineWidth: 16,
      byteGroupLength: 1,
    })
  })

  test('setters chain on the same builder', () => {
    const config = new DumpConfig()
    const chained = config.lineWidth(8).byteGroupLength(2).controlPictures(true).lineCount(3)
    expect(chained).toBe(config)
    expect(config.snapshot()).toEqual({
      controlPictures: true,
      lineCount: 3,
      lineWidth: 8,
      byteGroupLength: 2,
    })
  })

  test('accepts the range boundaries', () => {
    const options = new DumpConfig().lineWidth(256).byteGroupLength(1).snapshot()
    expect(options.lineWidth).toBe(256)
    expect(new DumpConfig().lineWidth(1).byteGroupLength(256).snapshot().byteGroupLength).toBe(256)
  })

  test.each([0, 257, -1, 1.5, Number.NaN])('rejects line width %s', (width) => {
    expect(() => new DumpConfig().lineWidth(width)).toThrow(InvalidConfigurationError)
  })

  test.each([0, 257, 2.5])('rejects byte group length %s', (length) => {
    expect(() => new DumpConfig().byteGroupLength(length)).toThrow(InvalidConfigurationError)
  })

  test('error names the option and the value', () => {
    try {
      new DumpConfig().byteGroupLength(300)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError)
      if (!(error instanceof InvalidConfigurationError)) return
      expect(error.option).toBe('byte group length')
      expect(error.value).toBe(300)
      expect(error.message).toBe('invalid byte group length: 300 (expected an integer from 1 to 256)')
    }
  })

  test('line count must be a non-negative integer', () => {
    expect(() => new DumpConfig().lineCount(-1)).toThrow('invalid line count: -1 (expected a non-negative integer)')
    expect(new DumpConfig().lineCount(0).snapshot().lineCount).toBe(0)
    expect(new DumpConfig().lineCount(5).lineCount(undefined).snapshot().lineCount).toBeUndefined()
  })

  test('constructor validates initial values', () => {
    expect(new DumpConfig({ lineWidth: 32, controlPictures: true }).snapshot()).toEqual({
      controlPictures: true,
      lineCount: undefined,
      lineWidth: 32,
      byteGroupLength: 1,
    })
    expect(() => new DumpConfig({ lineWidth: 0 })).toThrow(InvalidConfigurationError)
  })

  test('snapshots are frozen copies', () => {
    const config = new DumpConfig().lineWidth(8)
    const before = config.snapshot()
    config.lineWidth(4)
    expect(before.lineWidth).toBe(8)
    expect(Object.isFrozen(before)).toBe(true)
  })
})
