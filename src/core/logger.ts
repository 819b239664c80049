import type { Logger } from './types.js'

type Fields = Record<string, unknown>

const LEVELS = { info: 'INFO', warn: 'WARN', error: 'ERROR' } as const

type Method = keyof typeof LEVELS

let muted = false

export function setLoggerMuted(value: boolean): void {
  muted = value
}

function write(method: Method, event: string, fields: Fields): void {
  if (muted) return
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ ts: new Date().toISOString(), level: LEVELS[method], event, ...fields }))
}

function build(sink: (method: Method, event: string, data?: Fields) => void): Logger {
  return {
    info: (event, data) => sink('info', event, data),
    warn: (event, data) => sink('warn', event, data),
    error: (event, data) => sink('error', event, data)
  }
}

/**
 * JSON line logger on stdout. `fields` go on every line; fields passed at the
 * call site win over them.
 */
export function createLogger(fields: Fields = {}): Logger {
  return build((method, event, data) => write(method, event, { ...fields, ...data }))
}

export const logger: Logger = createLogger()

/** Same binding for any Logger, e.g. a session id on an injected one. */
export function withFields(base: Logger, fields: Fields): Logger {
  return build((method, event, data) => base[method](event, { ...fields, ...data }))
}
