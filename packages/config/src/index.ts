// Shared configuration: buffer defaults and their environment overrides.

export {
  config,
  resolveConfig,
  readEnvPositive,
  readEnvNonNegative,
  readEnvDType,
  readEnvLogLevel,
  DEFAULTS,
  DTYPE_NAMES,
  LOG_LEVELS,
  ENV_KEYS,
  type BufferDefaults,
  type BufferDefaultKey,
  type DTypeName,
  type LogLevel,
  type Env,
} from './defaults.js'
