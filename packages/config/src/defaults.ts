/** Element types a buffer can be allocated with. */
export type DTypeName =
  | 'float32'
  | 'float64'
  | 'int8'
  | 'int16'
  | 'int32'
  | 'uint8'
  | 'uint16'
  | 'uint32'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/** Library-wide defaults applied when a buffer option is left out. */
export interface BufferDefaults {
  dtype: DTypeName
  columns: number
  sampleRate: number
  seconds: number
  bufferDelay: number
  logLevel: LogLevel
}

export type BufferDefaultKey = keyof BufferDefaults

export const DTYPE_NAMES: readonly DTypeName[] = [
  'float32',
  'float64',
  'int8',
  'int16',
  'int32',
  'uint8',
  'uint16',
  'uint32',
]

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

/** Environment variable consulted for each default. */
export const ENV_KEYS: Record<BufferDefaultKey, string> = {
  dtype: 'RINGSTREAM_DTYPE',
  columns: 'RINGSTREAM_COLUMNS',
  sampleRate: 'RINGSTREAM_SAMPLE_RATE',
  seconds: 'RINGSTREAM_SECONDS',
  bufferDelay: 'RINGSTREAM_BUFFER_DELAY',
  logLevel: 'RINGSTREAM_LOG_LEVEL',
}

/** Built-in values: 22.05 kHz mono float32, two seconds, no priming delay. */
export const DEFAULTS: BufferDefaults = {
  dtype: 'float32',
  columns: 1,
  sampleRate: 22050,
  seconds: 2,
  bufferDelay: 0,
  logLevel: 'warn',
}

export type Env = Record<string, string | undefined>

function processEnv(): Env {
  if (typeof process !== 'undefined' && process.env) return process.env
  return {}
}

function isDTypeName(value: string): value is DTypeName {
  return DTYPE_NAMES.some((name) => name === value)
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/** Read a positive number; anything else is ignored. */
export function readEnvPositive(env: Env, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const val = Number(raw)
  return Number.isFinite(val) && val > 0 ? val : undefined
}

/** Read a non-negative number; anything else is ignored. */
export function readEnvNonNegative(env: Env, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const val = Number(raw)
  return Number.isFinite(val) && val >= 0 ? val : undefined
}

export function readEnvDType(env: Env, key: string): DTypeName | undefined {
  const raw = env[key]?.trim().toLowerCase()
  return raw !== undefined && isDTypeName(raw) ? raw : undefined
}

export function readEnvLogLevel(env: Env, key: string): LogLevel | undefined {
  const raw = env[key]?.trim().toLowerCase()
  return raw !== undefined && isLogLevel(raw) ? raw : undefined
}

/** Resolve every default: env override > built-in value. Malformed overrides fall back. */
export function resolveConfig(env: Env = processEnv()): BufferDefaults {
  const columns = readEnvPositive(env, ENV_KEYS.columns)
  return {
    dtype: readEnvDType(env, ENV_KEYS.dtype) ?? DEFAULTS.dtype,
    columns: columns !== undefined && Number.isInteger(columns) ? columns : DEFAULTS.columns,
    sampleRate: readEnvPositive(env, ENV_KEYS.sampleRate) ?? DEFAULTS.sampleRate,
    seconds: readEnvPositive(env, ENV_KEYS.seconds) ?? DEFAULTS.seconds,
    bufferDelay: readEnvNonNegative(env, ENV_KEYS.bufferDelay) ?? DEFAULTS.bufferDelay,
    logLevel: readEnvLogLevel(env, ENV_KEYS.logLevel) ?? DEFAULTS.logLevel,
  }
}

/** Defaults resolved once from the process environment at import time. */
export const config: BufferDefaults = resolveConfig()
