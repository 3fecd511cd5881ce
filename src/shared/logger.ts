export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const styles = {
  debug: { label: 'DEBUG', ansi: '\x1b[34m', rank: 0 },
  info: { label: 'INFO', ansi: '\x1b[32m', rank: 1 },
  warn: { label: 'WARN', ansi: '\x1b[33m', rank: 2 },
  error: { label: 'ERROR', ansi: '\x1b[31m', rank: 3 }
} satisfies Record<LogLevel, { label: string; ansi: string; rank: number }>

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

function enabled(level: LogLevel): boolean {
  return styles[level].rank >= styles[threshold].rank
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

export const log = {
  debug: (message: unknown, ...args: unknown[]) => {
    if (enabled('debug')) console.debug(...format('debug', message, args))
  },
  info: (message: unknown, ...args: unknown[]) => {
    if (enabled('info')) console.info(...format('info', message, args))
  },
  warn: (message: unknown, ...args: unknown[]) => {
    if (enabled('warn')) console.warn(...format('warn', message, args))
  },
  error: (message: unknown, ...args: unknown[]) => {
    if (enabled('error')) console.error(...format('error', message, args))
  }
}
