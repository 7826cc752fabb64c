import winston from 'winston'

/**
 * The subset of a winston logger the core modules depend on.
 */
export type Logger = Pick<winston.Logger, 'error' | 'warn' | 'info' | 'debug'>

export interface LoggerOptions {
  verbose: boolean
  quiet: boolean
  /** Discard everything, e.g. while Ink owns the terminal */
  silent?: boolean
}

const SECRET_KEYS = ['apiKey', 'refreshToken', 'clientSecret', 'accessToken', 'token', 'password']

const SECRET_PATTERNS = [
  /api[_-]?key[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
  /Bearer\s+([^\s"']+)/g,
]

/**
 * Redacts credentials from log messages and metadata.
 */
export const redactSecrets = (value: unknown): unknown => {
  if (typeof value === 'string') {
    let redacted = value
    for (const pattern of SECRET_PATTERNS) {
      redacted = redacted.replace(pattern, (match: string, secret: string) =>
        match.replace(secret, '***REDACTED***')
      )
    }
    return redacted
  }

  if (Array.isArray(value)) {
    return value.map(redactSecrets)
  }

  if (value && typeof value === 'object') {
    const redacted: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(value)) {
      redacted[key] = SECRET_KEYS.includes(key) ? '***REDACTED***' : redactSecrets(entry)
    }
    return redacted
  }

  return value
}

const redactFormat = winston.format((info) => {
  info.message = redactSecrets(info.message)
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue
    info[key] = SECRET_KEYS.includes(key) ? '***REDACTED***' : redactSecrets(info[key])
  }
  return info
})

const levelFor = ({ verbose, quiet }: LoggerOptions): string => {
  if (quiet) return 'warn'
  if (verbose) return 'debug'
  return 'info'
}

/**
 * Creates the run logger. Everything goes to stderr so stdout stays clean for
 * JSON output.
 */
export const createLogger = (options: LoggerOptions): winston.Logger =>
  winston.createLogger({
    level: levelFor(options),
    silent: options.silent ?? false,
    format: winston.format.combine(
      redactFormat(),
      winston.format.errors({ stack: options.verbose }),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
        return `${timestamp} [${level}]: ${message}${metaStr}`
      })
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ],
    exitOnError: false,
  })
