import { describe, it, expect } from 'vitest'
import {
  resolveConfig,
  readEnvPositive,
  readEnvNonNegative,
  readEnvDType,
  readEnvLogLevel,
  DEFAULTS,
  ENV_KEYS,
} from '../index.js'

describe('resolveConfig', () => {
  it('returns built-in defaults for an empty env', () => {
    expect(resolveConfig({})).toEqual(DEFAULTS)
  })

  it('applies valid overrides', () => {
    const resolved = resolveConfig({
      RINGSTREAM_DTYPE: 'float64',
      RINGSTREAM_COLUMNS: '2',
      RINGSTREAM_SAMPLE_RATE: '48000',
      RINGSTREAM_SECONDS: '0.5',
      RINGSTREAM_BUFFER_DELAY: '0.25',
      RINGSTREAM_LOG_LEVEL: 'DEBUG',
    })
    expect(resolved).toEqual({
      dtype: 'float64',
      columns: 2,
      sampleRate: 48000,
      seconds: 0.5,
      bufferDelay: 0.25,
      logLevel: 'debug',
    })
  })

  it('falls back on malformed overrides', () => {
    const resolved = resolveConfig({
      RINGSTREAM_DTYPE: 'complex128',
      RINGSTREAM_COLUMNS: '1.5',
      RINGSTREAM_SAMPLE_RATE: '-1',
      RINGSTREAM_SECONDS: 'abc',
      RINGSTREAM_BUFFER_DELAY: '-0.1',
      RINGSTREAM_LOG_LEVEL: 'verbose',
    })
    expect(resolved).toEqual(DEFAULTS)
  })

  it('uses one env key per default', () => {
    expect(Object.keys(ENV_KEYS).sort()).toEqual(Object.keys(DEFAULTS).sort())
  })
})

describe('env readers', () => {
  it('readEnvPositive rejects zero and blanks', () => {
    expect(readEnvPositive({ K: '0' }, 'K')).toBeUndefined()
    expect(readEnvPositive({ K: '  ' }, 'K')).toBeUndefined()
    expect(readEnvPositive({ K: '3' }, 'K')).toBe(3)
  })

  it('readEnvNonNegative accepts zero', () => {
    expect(readEnvNonNegative({ K: '0' }, 'K')).toBe(0)
    expect(readEnvNonNegative({}, 'K')).toBeUndefined()
  })

  it('readEnvDType trims and lowercases', () => {
    expect(readEnvDType({ K: ' Int16 ' }, 'K')).toBe('int16')
  })

  it('readEnvLogLevel ignores unknown levels', () => {
    expect(readEnvLogLevel({ K: 'trace' }, 'K')).toBeUndefined()
    expect(readEnvLogLevel({ K: 'silent' }, 'K')).toBe('silent')
  })
})
